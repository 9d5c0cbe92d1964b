import archiver from "archiver";
import { Writable } from "stream";
import { exportJSONL } from "../trace/decision_trace.js";
import { serializeRecord } from "../record/validator.js";
import { exportReport, DEFAULT_EXPORTERS, EXPORT_FORMATS } from "./exporter.js";
import type { ExportFormat, ExportResult, ExportedFile, Exporters } from "./exporter.js";
import type { StructuredRecord } from "../record/schema.js";
import type { TraceRecord } from "../shared/types.js";

export interface BundleFile {
  name: string;
  content: Buffer | string;
}

/**
 * Create a zip bundle from files.
 * Returns the zip as a Buffer.
 */
export async function createZipBundle(files: readonly BundleFile[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const writableStream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    const archive = archiver("zip", { zlib: { level: 9 } });

    writableStream.on("finish", () => {
      resolve(Buffer.concat(chunks));
    });

    archive.on("error", (err) => reject(err));
    archive.pipe(writableStream);

    for (const file of files) {
      archive.append(
        typeof file.content === "string" ? Buffer.from(file.content, "utf-8") : file.content,
        { name: file.name },
      );
    }

    archive.finalize().catch(reject);
  });
}

export interface BundleReport {
  title: string;
  text: string;
}

export interface ReportBundle {
  zip: Buffer;
  /** Paths inside the archive, in insertion order. */
  entries: string[];
  files: ExportedFile[];
  warnings: string[];
}

/** Export every report in every requested format; failures become warnings. */
export async function exportReports(
  reports: readonly BundleReport[],
  formats: readonly ExportFormat[] = EXPORT_FORMATS,
  exporters: Exporters = DEFAULT_EXPORTERS,
): Promise<ExportResult> {
  const files: ExportedFile[] = [];
  const warnings: string[] = [];
  for (const report of reports) {
    const result = await exportReport(report.title, report.text, formats, exporters);
    files.push(...result.files);
    warnings.push(...result.warnings);
  }
  return { files, warnings };
}

/**
 * Bundle layout:
 *   reports/<report>.<format>   every format that exported
 *   record.json
 *   audit/trace.jsonl
 */
export function bundleEntries(
  record: StructuredRecord,
  files: readonly ExportedFile[],
  trace: readonly TraceRecord[],
): BundleFile[] {
  return [
    ...files.map((file) => ({ name: `reports/${file.filename}`, content: file.content })),
    { name: "record.json", content: serializeRecord(record) },
    { name: "audit/trace.jsonl", content: exportJSONL(trace) },
  ];
}
