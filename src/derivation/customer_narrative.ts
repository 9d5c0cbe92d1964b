/**
 * Customer Narrative Derivation
 *
 * A structural copy of the internal report into customer wording. The only
 * text added is the fixed template around the internal values, so the
 * customer report can never say more than the internal report does.
 */

import { NOT_SPECIFIED } from "../shared/types.js";
import type { CustomerReport, InternalReport } from "../record/schema.js";

export const UNSPECIFIED_FINDING =
  "The notes did not identify a specific issue. Further inspection is needed to confirm conditions.";
export const UNSPECIFIED_CONDITIONS =
  "Site conditions were not specified in the notes.";

export function whatWeFound(primaryIssue: string): string {
  if (primaryIssue === NOT_SPECIFIED) return UNSPECIFIED_FINDING;
  return `During the service visit, we found: ${primaryIssue}.`;
}

export function whyThisMatters(conditions: readonly string[]): string {
  if (conditions.length === 0) return UNSPECIFIED_CONDITIONS;
  return `Conditions noted on site: ${conditions.join("; ")}.`;
}

export function deriveCustomerNarrative(internal: InternalReport): CustomerReport {
  return {
    what_we_found: whatWeFound(internal.primary_issue),
    why_this_matters: whyThisMatters(internal.installation_site_conditions),
    what_this_could_lead_to: [...internal.potential_concerns],
    recommended_next_steps: [...internal.recommended_next_steps],
    priority: internal.urgency,
  };
}
