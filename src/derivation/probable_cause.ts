/**
 * Probable Cause Builder
 *
 * Composes: base sentence (by issue category) → roof-system clause → location clause.
 * A clause is only added for a field that is not "Not specified". Every
 * sentence is fixed template text plus the record's own values: no
 * measurements, products or manufacturers are ever introduced here.
 */

import { classifyIssue } from "../record/issue_category.js";
import { NOT_SPECIFIED } from "../shared/types.js";
import type { InternalReport } from "../record/schema.js";
import type { IssueCategory } from "../shared/types.js";

export const GENERIC_CAUSE =
  "Cause is not specified in the notes and should be confirmed through closer inspection of the area and adjacent details.";

const BASE_CAUSES: Partial<Record<IssueCategory, string>> = {
  ActiveLeak:
    "Water entry is reported. The source may be near a roof detail or condition in the vicinity, but requires confirmation on-site.",
  Ponding:
    "Ponding/standing water is indicated. This is commonly associated with drainage limitations, slope conditions, or obstructions, and should be confirmed by inspection.",
  OpenSeam:
    "An opening or weakness at seams/laps is indicated. Seam integrity issues can lead to water entry and should be verified and repaired per system requirements.",
  Flashing:
    "A flashing/detail concern is indicated. Movement, aging sealant, or termination issues can contribute to leakage risk and should be inspected.",
};

// ── Roof-system clauses ────────────────────────────────────────────

const ROOF_SYSTEM_FAMILIES: ReadonlyArray<{ pattern: RegExp; clause: (system: string) => string }> = [
  {
    pattern: /\b(tpo|pvc|epdm)\b/i,
    clause: (system) =>
      `Roof system noted: ${system}. Single-ply membranes are sensitive to seam condition and prolonged standing water, so both should be checked on-site.`,
  },
  {
    pattern: /\b(sbs|bur|bitumen|built-up)\b/i,
    clause: (system) =>
      `Roof system noted: ${system}. Multi-ply bituminous systems should be checked for lap condition and surfacing wear near the area.`,
  },
  {
    pattern: /\bmetal\b/i,
    clause: (system) =>
      `Roof system noted: ${system}. Panel laps and fastener locations near the area should be checked.`,
  },
  {
    pattern: /\bshingle/i,
    clause: (system) =>
      `Roof system noted: ${system}. Steep-slope details such as valleys and step flashing near the area should be checked.`,
  },
];

function roofSystemClause(system: string): string {
  const family = ROOF_SYSTEM_FAMILIES.find((f) => f.pattern.test(system));
  return family ? family.clause(system) : `Roof system noted: ${system}.`;
}

// ── Location clauses ───────────────────────────────────────────────

const LOCATION_CLAUSES: ReadonlyArray<{ pattern: RegExp; clause: (location: string) => string }> = [
  {
    pattern: /drain|scupper|gutter/i,
    clause: (location) =>
      `Location noted: ${location}. Drain and scupper outlets at this location should be checked for obstruction and flow.`,
  },
  {
    pattern: /penetration|curb|rtu|pipe|vent/i,
    clause: (location) =>
      `Location noted: ${location}. Details around penetrations and curbs at this location should be inspected.`,
  },
  {
    pattern: /perimeter|edge|wall|parapet|coping/i,
    clause: (location) =>
      `Location noted: ${location}. Terminations and wall details at this location should be inspected.`,
  },
];

function locationClause(location: string): string {
  const match = LOCATION_CLAUSES.find((l) => l.pattern.test(location));
  return match ? match.clause(location) : `Location noted: ${location}.`;
}

/** Base cause sentence for an issue category. */
export function baseCauseFor(category: IssueCategory): string {
  return BASE_CAUSES[category] ?? GENERIC_CAUSE;
}

export function buildProbableCause(
  record: Pick<InternalReport, "primary_issue" | "roof_system" | "location">,
): string {
  const parts = [baseCauseFor(classifyIssue(record.primary_issue))];
  if (record.roof_system !== NOT_SPECIFIED) parts.push(roofSystemClause(record.roof_system));
  if (record.location !== NOT_SPECIFIED) parts.push(locationClause(record.location));
  return parts.join(" ");
}
