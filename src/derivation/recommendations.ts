import { classifyIssue } from "../record/issue_category.js";
import type { InternalReport } from "../record/schema.js";
import type { IssueCategory } from "../shared/types.js";

export const FALLBACK_STEPS: readonly string[] = [
  "Perform closer inspection of the reported area and surrounding details.",
  "Complete localized repairs as required to restore watertightness.",
  "Reinspect after the next significant rainfall event.",
];

export const LEAK_PRIORITY_STEP =
  "Prioritize locating and temporarily controlling the reported leak to limit interior damage.";

const CATEGORY_STEPS: Partial<Record<IssueCategory, string>> = {
  Ponding: "Check drains, scuppers and low areas for obstruction and note where water collects.",
  OpenSeam: "Probe and document the affected seams/laps before repair.",
  Flashing: "Inspect flashing terminations and sealant at the affected detail.",
  Puncture: "Document the extent of the puncture/tear before repair.",
  ClogDrain: "Clear the affected drain or scupper and confirm flow.",
};

/**
 * Recommended steps are passed through verbatim when the record has any.
 * Otherwise a conservative fallback is built: leak-priority step (when a
 * leak is flagged), then the category step, then the three fixed steps.
 */
export function buildRecommendations(
  record: Pick<InternalReport, "recommended_next_steps" | "primary_issue" | "active_leak_reported">,
): string[] {
  if (record.recommended_next_steps.length > 0) return [...record.recommended_next_steps];

  const steps: string[] = [];
  if (record.active_leak_reported) steps.push(LEAK_PRIORITY_STEP);
  const categoryStep = CATEGORY_STEPS[classifyIssue(record.primary_issue)];
  if (categoryStep) steps.push(categoryStep);
  steps.push(...FALLBACK_STEPS);
  return steps;
}
