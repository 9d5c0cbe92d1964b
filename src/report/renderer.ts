/**
 * Report Renderer
 *
 * Pure text templating over a validated record. Section order and labels
 * come from the field descriptors, so every section is always present; an
 * empty list renders as a single "Not specified" line.
 *
 * Output is markdown-flavoured: "# " title, "## " sections, "- " bullets and
 * **bold** enum values. The exporters understand exactly these markers.
 */

import { buildIssueObserved } from "../derivation/issue_observed.js";
import { buildProbableCause } from "../derivation/probable_cause.js";
import { buildRecommendations } from "../derivation/recommendations.js";
import { CUSTOMER_REPORT_FIELDS, INTERNAL_REPORT_FIELDS } from "../record/schema.js";
import { NOT_SPECIFIED } from "../shared/types.js";
import type { FieldDescriptor, StructuredRecord } from "../record/schema.js";

export type ReportKind = "internal" | "customer" | "field";

export const REPORT_TITLES: Record<ReportKind, string> = {
  internal: "Internal Service Report",
  customer: "Customer Summary",
  field: "Roof Service Report",
};

export const FIELD_REPORT_DISCLAIMER =
  "Note: This tool supports documentation. Final assessment should be confirmed by a qualified roofing professional.";

export interface RenderedReports {
  internal: string;
  customer: string;
}

function bulletLines(items: readonly string[]): string[] {
  if (items.length === 0) return [NOT_SPECIFIED];
  return items.map((item) => `- ${item}`);
}

function fieldBody(field: FieldDescriptor, value: unknown): string[] {
  switch (field.kind) {
    case "text":
      return [typeof value === "string" ? value : NOT_SPECIFIED];
    case "flag":
      return [value === true ? "Yes" : "No"];
    case "list":
      return bulletLines(Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : []);
    case "choice":
      return [`**${typeof value === "string" ? value : field.fallback}**`];
  }
}

function renderSections(
  title: string,
  fields: readonly FieldDescriptor[],
  section: Record<string, unknown>,
): string {
  const lines = [`# ${title}`];
  for (const field of fields) {
    lines.push("", `## ${field.label}`, ...fieldBody(field, section[field.key]));
  }
  return lines.join("\n") + "\n";
}

export function renderInternalReport(record: StructuredRecord): string {
  return renderSections(REPORT_TITLES.internal, INTERNAL_REPORT_FIELDS, record.internal_report);
}

export function renderCustomerReport(record: StructuredRecord): string {
  return renderSections(REPORT_TITLES.customer, CUSTOMER_REPORT_FIELDS, record.customer_report);
}

export function renderReports(record: StructuredRecord): RenderedReports {
  return {
    internal: renderInternalReport(record),
    customer: renderCustomerReport(record),
  };
}

/** "2026-03-14 09:30 UTC" */
export function formatGeneratedAt(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

/**
 * Five-section field report: Issue Observed, Probable Cause,
 * Recommendations, Severity, Urgency, followed by the generation footer.
 */
export function renderFieldReport(record: StructuredRecord, generatedAt: Date = new Date()): string {
  const internal = record.internal_report;
  const lines = [
    `# ${REPORT_TITLES.field}`,
    "",
    "## 1. Issue Observed",
    buildIssueObserved(record),
    "",
    "## 2. Probable Cause",
    buildProbableCause(internal),
    "",
    "## 3. Recommendations",
    ...bulletLines(buildRecommendations(internal)),
    "",
    "## 4. Severity",
    `**${internal.severity}**`,
    "",
    "## 5. Urgency",
    `**${internal.urgency}**`,
    "",
    `Generated on: ${formatGeneratedAt(generatedAt)}`,
    FIELD_REPORT_DISCLAIMER,
  ];
  return lines.join("\n") + "\n";
}

export function renderReport(kind: ReportKind, record: StructuredRecord, generatedAt?: Date): string {
  switch (kind) {
    case "internal":
      return renderInternalReport(record);
    case "customer":
      return renderCustomerReport(record);
    case "field":
      return renderFieldReport(record, generatedAt);
  }
}
