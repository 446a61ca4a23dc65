import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { loadConfig } from "../config";

/**
 * Server-only. Service-role client for the calibration store (operator scripts, scoring service).
 * Requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
 */
export function createServiceRoleClient(): SupabaseClient {
  const config = loadConfig();
  const url = config.SUPABASE_URL;
  const key = config.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new Error("Missing SUPABASE_URL and/or SUPABASE_SERVICE_ROLE_KEY for service role client");
  }
  return createClient(url, key, { auth: { persistSession: false } });
}
