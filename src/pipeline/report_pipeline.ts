/**
 * Report Pipeline
 *
 * Ties one session's actions together:
 * 1. Normalize notes through the extraction orchestrator, or build a record
 *    from manual entry
 * 2. Swap the result into the session (replace-only)
 * 3. Render the internal, customer and field reports
 * 4. Export single reports or the full ZIP bundle
 * Every step appends to the session's decision trace.
 */

import { checkCustomerConsistency, describeViolation } from "../derivation/consistency_gate.js";
import { classifyIssue } from "../record/issue_category.js";
import { buildManualRecord } from "../manual/manual_entry.js";
import { ExtractionOrchestrator } from "../extraction/orchestrator.js";
import { bundleEntries, createZipBundle, exportReports } from "../exports/bundle.js";
import { exportReport, DEFAULT_EXPORTERS, EXPORT_FORMATS } from "../exports/exporter.js";
import { REPORT_TITLES, renderReport } from "../report/renderer.js";
import { PreconditionError } from "../shared/errors.js";
import { contentHash, sha256String } from "../shared/hash.js";
import { logStep } from "../shared/log.js";
import type { ExtractionOutcome } from "../extraction/orchestrator.js";
import type { ExportFormat, ExportResult, Exporters } from "../exports/exporter.js";
import type { ReportBundle } from "../exports/bundle.js";
import type { NoteExtractor } from "../generation/llm_client.js";
import type { ManualEntryInput } from "../manual/manual_entry.js";
import type { StructuredRecord } from "../record/schema.js";
import type { ReportKind } from "../report/renderer.js";
import type { ReportSession } from "../session/report_session.js";

export const REPORT_KINDS: readonly ReportKind[] = ["internal", "customer", "field"];

export const NO_RECORD_MESSAGE = "No record yet. Normalize notes or use manual entry first.";

export interface ReportPipelineOptions {
  extractor: NoteExtractor | null;
  exporters?: Exporters;
  /** Timestamp source for the field report footer. */
  clock?: () => Date;
}

export type RenderedReportSet = Record<ReportKind, string>;

export class ReportPipeline {
  private readonly extractor: NoteExtractor | null;
  private readonly exporters: Exporters;
  private readonly clock: () => Date;

  constructor(options: ReportPipelineOptions) {
    this.extractor = options.extractor;
    this.exporters = options.exporters ?? DEFAULT_EXPORTERS;
    this.clock = options.clock ?? (() => new Date());
  }

  get extractorAvailable(): boolean {
    return this.extractor !== null;
  }

  async normalize(session: ReportSession, notes: string): Promise<ExtractionOutcome> {
    const t0 = new Date();
    const outcome = await new ExtractionOrchestrator(this.extractor).normalize(notes);

    if (outcome.status === "failure") {
      session.noteFailure(outcome.message, outcome.rawPayload);
      session.trace.record({
        traceType: "NORMALIZATION",
        initiatedAt: t0,
        completedAt: new Date(),
        inputHash: sha256String(notes),
        steps: [{ action: "extract", detail: `Failed (${outcome.kind})` }],
        outputContent: { status: outcome.status, kind: outcome.kind },
        validationResults: { pass: false, messages: [outcome.message] },
      });
      return outcome;
    }

    session.replace(outcome.record, "extraction", outcome.rawPayload);
    const internal = outcome.record.internal_report;
    session.trace.record({
      traceType: "NORMALIZATION",
      initiatedAt: t0,
      completedAt: new Date(),
      inputHash: sha256String(notes),
      steps: [
        { action: "extract", detail: `Extractor returned ${outcome.rawPayload.length} characters` },
        { action: "validate", detail: "Payload coerced into the structured record" },
        { action: "classify", detail: `Primary issue category: ${classifyIssue(internal.primary_issue)}` },
      ],
      outputContent: { status: outcome.status, recordHash: contentHash(outcome.record) },
    });

    const t1 = new Date();
    if (outcome.customerDerived) {
      session.trace.record({
        traceType: "DERIVATION",
        initiatedAt: t1,
        completedAt: new Date(),
        steps: [{ action: "derive_customer", detail: "Customer report derived from the internal report" }],
        outputContent: { priority: outcome.record.customer_report.priority },
      });
    } else {
      session.trace.record({
        traceType: "CONSISTENCY_CHECK",
        initiatedAt: t1,
        completedAt: new Date(),
        steps: [{ action: "customer_gate", detail: `${outcome.warnings.length} violation(s)` }],
        validationResults: { pass: outcome.warnings.length === 0, messages: outcome.warnings },
      });
    }

    logStep("NORMALIZE", `Session ${session.id}: record replaced from extraction`);
    return outcome;
  }

  enterManual(session: ReportSession, input: ManualEntryInput): StructuredRecord {
    const t0 = new Date();
    const record = buildManualRecord(input);
    session.replace(record, "manual");

    const internal = record.internal_report;
    const inferred = [input.severity, input.urgency].some((v) => v === undefined || v === "Auto");
    session.trace.record({
      traceType: "MANUAL_ENTRY",
      initiatedAt: t0,
      completedAt: new Date(),
      inputHash: contentHash(input),
      steps: [
        { action: "normalize", detail: "Manual fields coerced into the internal report" },
        {
          action: inferred ? "infer_priority" : "keep_priority",
          detail: `Severity ${internal.severity}, urgency ${internal.urgency}`,
        },
        { action: "derive_customer", detail: "Customer report derived from the internal report" },
      ],
      outputContent: { recordHash: contentHash(record) },
    });

    // Recorded for parity with the extraction path.
    const gate = checkCustomerConsistency(record);
    session.trace.record({
      traceType: "CONSISTENCY_CHECK",
      initiatedAt: t0,
      completedAt: new Date(),
      steps: [{ action: "customer_gate", detail: `${gate.violations.length} violation(s)` }],
      validationResults: { pass: gate.passed, messages: gate.violations.map(describeViolation) },
    });

    logStep("MANUAL", `Session ${session.id}: record replaced from manual entry`);
    return record;
  }

  render(session: ReportSession): RenderedReportSet {
    const record = requireRecord(session);
    const t0 = new Date();
    const generatedAt = this.clock();
    const reports: RenderedReportSet = {
      internal: renderReport("internal", record),
      customer: renderReport("customer", record),
      field: renderReport("field", record, generatedAt),
    };

    session.trace.record({
      traceType: "REPORT_RENDER",
      initiatedAt: t0,
      completedAt: new Date(),
      inputHash: contentHash(record),
      steps: REPORT_KINDS.map((kind) => ({
        action: `render_${kind}`,
        detail: `${reports[kind].split("\n").length} lines`,
      })),
      outputContent: Object.fromEntries(REPORT_KINDS.map((kind) => [kind, sha256String(reports[kind])])),
    });
    return reports;
  }

  async exportOne(
    session: ReportSession,
    kind: ReportKind,
    format: ExportFormat,
  ): Promise<ExportResult> {
    const reports = this.render(session);
    const t0 = new Date();
    const result = await exportReport(REPORT_TITLES[kind], reports[kind], [format], this.exporters);

    session.trace.record({
      traceType: "EXPORT_GENERATION",
      initiatedAt: t0,
      completedAt: new Date(),
      steps: [{ action: `export_${format}`, detail: REPORT_TITLES[kind] }],
      outputContent: {
        files: result.files.map((file) => ({ filename: file.filename, bytes: file.content.length })),
      },
      validationResults: { pass: result.warnings.length === 0, messages: result.warnings },
    });
    return result;
  }

  /** Bundle every report in every format, plus record.json and the trace. */
  async bundle(session: ReportSession, formats: readonly ExportFormat[] = EXPORT_FORMATS): Promise<ReportBundle> {
    const record = requireRecord(session);
    const reports = this.render(session);
    const t0 = new Date();

    const { files, warnings } = await exportReports(
      REPORT_KINDS.map((kind) => ({ title: REPORT_TITLES[kind], text: reports[kind] })),
      formats,
      this.exporters,
    );
    const names = bundleEntries(record, files, []).map((entry) => entry.name);
    // Recorded before packing so the bundled trace includes this step.
    session.trace.record({
      traceType: "EXPORT_GENERATION",
      initiatedAt: t0,
      completedAt: new Date(),
      steps: [{ action: "bundle", detail: `${names.length} entries` }],
      outputContent: { entries: names },
      validationResults: { pass: warnings.length === 0, messages: warnings },
    });

    const entries = bundleEntries(record, files, session.trace.getChain());
    logStep("BUNDLE", `Session ${session.id}: ${entries.length} entries, ${warnings.length} warning(s)`);
    return {
      zip: await createZipBundle(entries),
      entries: entries.map((entry) => entry.name),
      files,
      warnings,
    };
  }
}

export function requireRecord(session: ReportSession): StructuredRecord {
  const record = session.record;
  if (!record) throw new PreconditionError(NO_RECORD_MESSAGE);
  return record;
}
