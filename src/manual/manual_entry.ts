/**
 * Manual Entry Path
 *
 * Builds a record from directly typed fields, without the note extractor.
 * The internal report is normalized first, the customer report is derived
 * from it, and the combined object goes through the same validator as
 * extracted payloads so both paths end in the same shape.
 */

import { z } from "zod";
import { deriveCustomerNarrative } from "../derivation/customer_narrative.js";
import { inferSeverityUrgency } from "../derivation/severity.js";
import { validate } from "../record/validator.js";
import { SeveritySchema, UrgencySchema } from "../record/schema.js";
import { NOT_SPECIFIED } from "../shared/types.js";
import type { StructuredRecord } from "../record/schema.js";

export const AUTO = "Auto";

/** Leading "-", "*", "•", "1." or "1)" markers. */
const BULLET_MARKER_RE = /^(?:[-*•]|\d+[.)])(?:\s+|$)/;

const optionalText = z.string().optional();

export const ManualEntrySchema = z.object({
  serviceSummary: optionalText,
  roofSystem: optionalText,
  primaryIssue: optionalText,
  location: optionalText,
  activeLeakReported: z.boolean().optional(),
  /** Multi-line text fields: one entry per non-blank line. */
  observations: optionalText,
  installationSiteConditions: optionalText,
  potentialConcerns: optionalText,
  recommendedNextSteps: optionalText,
  clarifyingQuestions: optionalText,
  severity: z.union([z.literal(AUTO), SeveritySchema]).optional(),
  urgency: z.union([z.literal(AUTO), UrgencySchema]).optional(),
});

export type ManualEntryInput = z.infer<typeof ManualEntrySchema>;

/** Split multi-line input into entries, stripping bullet markers and blank lines. */
export function splitLines(text: string | undefined): string[] {
  if (!text) return [];
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(BULLET_MARKER_RE, "").trim())
    .filter((line) => line.length > 0);
}

export function buildManualRecord(input: ManualEntryInput): StructuredRecord {
  const observations = splitLines(input.observations);
  const activeLeak = input.activeLeakReported ?? false;

  const normalized = validate({
    internal_report: {
      service_summary: input.serviceSummary,
      roof_system: input.roofSystem,
      primary_issue: input.primaryIssue,
      location: input.location,
      active_leak_reported: activeLeak,
      observations,
      installation_site_conditions: splitLines(input.installationSiteConditions),
      potential_concerns: splitLines(input.potentialConcerns),
      recommended_next_steps: splitLines(input.recommendedNextSteps),
    },
  }).internal_report;

  const severity = input.severity === undefined || input.severity === AUTO ? null : input.severity;
  const urgency = input.urgency === undefined || input.urgency === AUTO ? null : input.urgency;
  if (severity === null || urgency === null) {
    const notesText = [normalized.service_summary, normalized.primary_issue, ...observations]
      .filter((part) => part !== NOT_SPECIFIED)
      .join("\n");
    const inferred = inferSeverityUrgency(notesText, normalized.primary_issue, activeLeak);
    normalized.severity = severity ?? inferred.severity;
    normalized.urgency = urgency ?? inferred.urgency;
  } else {
    normalized.severity = severity;
    normalized.urgency = urgency;
  }

  return validate({
    internal_report: normalized,
    customer_report: deriveCustomerNarrative(normalized),
    clarifying_questions: splitLines(input.clarifyingQuestions),
  });
}
