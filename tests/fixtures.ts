import { deriveCustomerNarrative } from "../src/derivation/customer_narrative.js";
import { validate } from "../src/record/validator.js";
import { ExtractorError } from "../src/shared/errors.js";
import type { NoteExtractor } from "../src/generation/llm_client.js";
import type { StructuredRecord } from "../src/record/schema.js";
import type { ExtractorFailureKind } from "../src/shared/errors.js";

export const PONDING_INTERNAL = {
  service_summary: "Inspected roof after tenant call",
  roof_system: "TPO",
  primary_issue: "Ponding",
  location: "At drain / scupper",
  active_leak_reported: "no",
  observations: ["Standing water at rear drain"],
  installation_site_conditions: [],
  potential_concerns: ["Membrane deterioration"],
  recommended_next_steps: [],
  severity: "moderate",
  urgency: "soon",
};

export function makeRecord(
  internal: Record<string, unknown>,
  extra: { customer?: Record<string, unknown>; clarifying?: string[] } = {},
): StructuredRecord {
  return validate({
    internal_report: internal,
    customer_report: extra.customer,
    clarifying_questions: extra.clarifying ?? [],
  });
}

/** Record whose customer report is derived from the internal one, as the manual path does. */
export function makeDerivedRecord(internal: Record<string, unknown>, clarifying: string[] = []): StructuredRecord {
  const record = makeRecord(internal, { clarifying });
  return { ...record, customer_report: deriveCustomerNarrative(record.internal_report) };
}

export function textExtractor(text: string): NoteExtractor {
  return async () => ({ text });
}

export function jsonExtractor(payload: unknown): NoteExtractor {
  return textExtractor(JSON.stringify(payload));
}

export function failingExtractor(kind: ExtractorFailureKind, message: string): NoteExtractor {
  return async () => {
    throw new ExtractorError(kind, message);
  };
}

export const FIXED_CLOCK = () => new Date(Date.UTC(2026, 2, 14, 9, 30));
