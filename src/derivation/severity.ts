/**
 * Severity / urgency inference.
 *
 * Leak signals (explicit flag, or "leak" anywhere in the notes) dominate and
 * return (High, Immediate). Otherwise the issue category picks a bucket;
 * categories outside both buckets get the (Moderate, Soon) baseline.
 */

import { classifyIssue } from "../record/issue_category.js";
import { ISSUE_CATEGORIES } from "../shared/types.js";
import type { IssueCategory, Severity, Urgency } from "../shared/types.js";

export interface SeverityUrgency {
  severity: Severity;
  urgency: Urgency;
}

const LEAK_RESULT: SeverityUrgency = { severity: "High", urgency: "Immediate" };
const BASELINE: SeverityUrgency = { severity: "Moderate", urgency: "Soon" };

const CATEGORY_BUCKETS: Partial<Record<IssueCategory, SeverityUrgency>> = {
  Puncture: { severity: "High", urgency: "Soon" },
  OpenSeam: { severity: "High", urgency: "Soon" },
  Flashing: { severity: "High", urgency: "Soon" },
  ClogDrain: { severity: "High", urgency: "Soon" },
  Debris: { severity: "Low", urgency: "Routine" },
  Blistering: { severity: "Low", urgency: "Routine" },
  MechanicalDamage: { severity: "Low", urgency: "Routine" },
  Moisture: { severity: "Low", urgency: "Routine" },
};

const CATEGORY_NAMES: ReadonlySet<string> = new Set(ISSUE_CATEGORIES);

function isIssueCategory(value: string): value is IssueCategory {
  return CATEGORY_NAMES.has(value);
}

/**
 * @param issue raw primary-issue text or an already classified IssueCategory
 */
export function inferSeverityUrgency(
  notesText: string,
  issue: string,
  activeLeakFlag: boolean,
): SeverityUrgency {
  if (activeLeakFlag || notesText.toLowerCase().includes("leak")) {
    return { ...LEAK_RESULT };
  }
  const category = isIssueCategory(issue) ? issue : classifyIssue(issue);
  return { ...(CATEGORY_BUCKETS[category] ?? BASELINE) };
}
