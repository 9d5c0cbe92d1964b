/**
 * Customer Consistency Gate — post-hoc check on extracted customer reports.
 *
 * The manual path derives the customer report from the internal one, so it
 * cannot add facts. The extraction path only has a prompt instruction, so
 * this gate flags customer-report tokens the internal report never mentions:
 *  - numbers (measurements, counts, ages)
 *  - roof-system and warranty vocabulary
 *  - uppercase acronyms
 * Violations are warnings; the record is still returned to the caller.
 */

import type { StructuredRecord } from "../record/schema.js";

export interface ConsistencyViolation {
  field: string;
  token: string;
}

export interface ConsistencyResult {
  passed: boolean;
  violations: ConsistencyViolation[];
}

const NUMBER_RE = /\d+(?:[.,]\d+)*/g;
const ACRONYM_RE = /\b[A-Z]{2,}\b/g;

const TECHNICAL_TERMS: readonly string[] = [
  "tpo",
  "epdm",
  "pvc",
  "sbs",
  "bur",
  "bitumen",
  "metal",
  "shingle",
  "membrane",
  "warranty",
  "manufacturer",
];

function stringsOf(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.flatMap(stringsOf);
  if (value !== null && typeof value === "object") return Object.values(value).flatMap(stringsOf);
  return [];
}

function wordPattern(word: string): RegExp {
  return new RegExp(`\\b${word}\\b`, "i");
}

export function checkCustomerConsistency(record: StructuredRecord): ConsistencyResult {
  const internalText = stringsOf(record.internal_report).join("\n");
  const internalNumbers = new Set(internalText.match(NUMBER_RE) ?? []);

  const violations: ConsistencyViolation[] = [];
  const seen = new Set<string>();
  const flag = (field: string, token: string) => {
    const key = `${field}:${token.toLowerCase()}`;
    if (seen.has(key)) return;
    seen.add(key);
    violations.push({ field, token });
  };

  for (const [field, value] of Object.entries(record.customer_report)) {
    for (const text of stringsOf(value)) {
      for (const num of text.match(NUMBER_RE) ?? []) {
        if (!internalNumbers.has(num)) flag(field, num);
      }
      for (const acronym of text.match(ACRONYM_RE) ?? []) {
        if (!wordPattern(acronym).test(internalText)) flag(field, acronym);
      }
      for (const term of TECHNICAL_TERMS) {
        const pattern = wordPattern(term);
        if (pattern.test(text) && !pattern.test(internalText)) flag(field, term);
      }
    }
  }

  return { passed: violations.length === 0, violations };
}

export function describeViolation(v: ConsistencyViolation): string {
  return `Customer report field "${v.field}" mentions "${v.token}", which is not in the internal report.`;
}
