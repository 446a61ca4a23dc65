/**
 * Applicant segments. Companies and private persons share some factors and rules (LTV, term,
 * bureau score) and have their own for the rest; a record's party_scope says where it applies.
 */

import type { ApplicantAttributes, PartyScope } from "./modelVersion";

export type ApplicantSegment = Exclude<PartyScope, "ALL">;

/** Only an explicit "B2B" party type selects the company segment. */
export function applicantSegment(attributes: ApplicantAttributes): ApplicantSegment {
  return attributes.party_type === "B2B" ? "B2B" : "B2C";
}

export function appliesToSegment(scope: PartyScope, segment: ApplicantSegment): boolean {
  return scope === "ALL" || scope === segment;
}
