/**
 * Structured record schema.
 *
 * Two layers describe the same shape:
 *  - FIELD DESCRIPTORS drive coercion (validator.ts) and report layout (renderer.ts).
 *  - ZOD SCHEMAS carry the TypeScript types and check the coerced output.
 * tests/record-schema.test.ts keeps the two key sets aligned.
 */

import { z } from "zod";
import { SEVERITIES, URGENCIES } from "../shared/types.js";

// ── Field Descriptors ──────────────────────────────────────────────

interface BaseField {
  key: string;
  label: string;
  /** Keys from the single-report payload that feed this field. */
  aliases?: readonly string[];
}

export interface TextField extends BaseField {
  kind: "text";
}

export interface ListField extends BaseField {
  kind: "list";
}

export interface FlagField extends BaseField {
  kind: "flag";
}

export interface ChoiceField extends BaseField {
  kind: "choice";
  allowed: readonly string[];
  fallback: string;
  /** Internal-report key whose value is used before `fallback`. */
  inheritFrom?: string;
}

export type FieldDescriptor = TextField | ListField | FlagField | ChoiceField;

export const INTERNAL_REPORT_FIELDS: readonly FieldDescriptor[] = [
  { key: "service_summary", label: "Service Summary", kind: "text", aliases: ["job_summary"] },
  { key: "roof_system", label: "Roof System", kind: "text" },
  { key: "primary_issue", label: "Primary Issue", kind: "text" },
  { key: "location", label: "Location", kind: "text" },
  { key: "active_leak_reported", label: "Active Leak Reported", kind: "flag" },
  { key: "observations", label: "Observations", kind: "list" },
  {
    key: "installation_site_conditions",
    label: "Installation/Site Conditions",
    kind: "list",
    aliases: ["constraints_or_unknowns"],
  },
  { key: "potential_concerns", label: "Potential Concerns", kind: "list" },
  { key: "recommended_next_steps", label: "Recommended Next Steps", kind: "list" },
  { key: "severity", label: "Severity", kind: "choice", allowed: SEVERITIES, fallback: "Moderate" },
  { key: "urgency", label: "Urgency", kind: "choice", allowed: URGENCIES, fallback: "Soon" },
];

export const CUSTOMER_REPORT_FIELDS: readonly FieldDescriptor[] = [
  { key: "what_we_found", label: "What We Found", kind: "text" },
  { key: "why_this_matters", label: "Why This Matters", kind: "text" },
  { key: "what_this_could_lead_to", label: "What This Could Lead To", kind: "list" },
  { key: "recommended_next_steps", label: "Recommended Next Steps", kind: "list" },
  {
    key: "priority",
    label: "Priority",
    kind: "choice",
    allowed: URGENCIES,
    fallback: "Soon",
    inheritFrom: "urgency",
  },
];

export const RECORD_FIELDS: readonly FieldDescriptor[] = [
  { key: "clarifying_questions", label: "Clarifying Questions", kind: "list" },
];

// ── Zod Schemas ────────────────────────────────────────────────────

const text = z.string().min(1);
const list = z.array(z.string().min(1));

export const SeveritySchema = z.enum(SEVERITIES);
export const UrgencySchema = z.enum(URGENCIES);

export const InternalReportSchema = z.object({
  service_summary: text,
  roof_system: text,
  primary_issue: text,
  location: text,
  active_leak_reported: z.boolean(),
  observations: list,
  installation_site_conditions: list,
  potential_concerns: list,
  recommended_next_steps: list,
  severity: SeveritySchema,
  urgency: UrgencySchema,
});

export type InternalReport = z.infer<typeof InternalReportSchema>;

export const CustomerReportSchema = z.object({
  what_we_found: text,
  why_this_matters: text,
  what_this_could_lead_to: list,
  recommended_next_steps: list,
  priority: UrgencySchema,
});

export type CustomerReport = z.infer<typeof CustomerReportSchema>;

export const StructuredRecordSchema = z.object({
  internal_report: InternalReportSchema,
  customer_report: CustomerReportSchema,
  clarifying_questions: list,
});

export type StructuredRecord = z.infer<typeof StructuredRecordSchema>;
