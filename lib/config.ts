import { z } from "zod";

const envSchema = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  /** Pins scoring to one version id instead of the published pointer (e.g. during a staged rollout). */
  SCORING_MODEL_VERSION: z.string().min(1).optional(),
  SNAPSHOT_CACHE_SIZE: z.coerce.number().int().positive().default(16),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
});

export type RiskEngineConfig = z.infer<typeof envSchema>;

/** Parse engine configuration from an env map (defaults to process.env). Throws on malformed values. */
export function loadConfig(env: Record<string, string | undefined> = process.env): RiskEngineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid risk engine configuration: ${issues.join("; ")}`);
  }
  return result.data;
}
