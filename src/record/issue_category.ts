/**
 * Maps free-text primary issues onto the closed IssueCategory enumeration.
 *
 * Patterns are tried in order; the first hit wins. "Ponding at drain" is
 * Ponding, not ClogDrain, because ponding is listed first. Negated leak
 * phrases ("no leak found", "not leaking") are removed before matching, so
 * they never classify as ActiveLeak.
 */

import type { IssueCategory } from "../shared/types.js";

const CATEGORY_PATTERNS: ReadonlyArray<{ category: IssueCategory; pattern: RegExp }> = [
  { category: "ActiveLeak", pattern: /leak/ },
  { category: "Ponding", pattern: /pond|standing water/ },
  { category: "OpenSeam", pattern: /seam|open lap|\blap\b/ },
  { category: "Flashing", pattern: /flashing/ },
  { category: "Puncture", pattern: /puncture|tear/ },
  { category: "ClogDrain", pattern: /drain|scupper|clog/ },
  { category: "Debris", pattern: /debris/ },
  { category: "Moisture", pattern: /moisture|wet insulation/ },
  { category: "Adhesion", pattern: /adhesion|install/ },
  { category: "Blistering", pattern: /blister|ridg/ },
  { category: "MechanicalDamage", pattern: /mechanical/ },
];

const NEGATED_LEAK_RE = /\b(?:no|not|without|non)[\s-]+(?:(?:active|visible|evidence of|signs? of)\s+)*leak\w*/g;

export function classifyIssue(issue: string): IssueCategory {
  const normalized = issue.trim().toLowerCase().replace(NEGATED_LEAK_RE, " ").trim();
  if (!normalized) return "Unclassified";
  for (const { category, pattern } of CATEGORY_PATTERNS) {
    if (pattern.test(normalized)) return category;
  }
  return "Unclassified";
}
