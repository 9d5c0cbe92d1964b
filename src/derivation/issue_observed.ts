import { NOT_SPECIFIED } from "../shared/types.js";
import type { StructuredRecord } from "../record/schema.js";

/**
 * "Issue Observed" block of the field report: summary line, the roof system
 * and location when known, then bullet blocks for whatever lists are present.
 */
export function buildIssueObserved(record: StructuredRecord): string {
  const internal = record.internal_report;
  const parts: string[] = [];

  if (internal.service_summary !== NOT_SPECIFIED) {
    parts.push(internal.service_summary);
  } else {
    parts.push(`Primary issue: ${internal.primary_issue}.`);
  }

  if (internal.roof_system !== NOT_SPECIFIED) parts.push(`Roof system: ${internal.roof_system}.`);
  if (internal.location !== NOT_SPECIFIED) parts.push(`Location: ${internal.location}.`);

  const blocks: Array<[string, readonly string[]]> = [
    ["Observations:", internal.observations],
    ["Unknown / needs confirmation:", internal.installation_site_conditions],
    ["Clarifying questions:", record.clarifying_questions],
  ];
  for (const [heading, items] of blocks) {
    if (items.length === 0) continue;
    parts.push("", heading);
    for (const item of items) parts.push(`- ${item}`);
  }

  return parts.join("\n");
}
