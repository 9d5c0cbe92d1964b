/**
 * Report export: one report text in, one file per requested format out.
 * A format that throws is reported as a warning; the others are still
 * produced.
 */

import { errorMessage } from "../shared/errors.js";
import { warnStep } from "../shared/log.js";
import { toOfficeDocument } from "./docx.js";
import { toPdf } from "./pdf.js";
import { toPlainText } from "./text.js";

export const EXPORT_FORMATS = ["txt", "docx", "pdf"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const CONTENT_TYPES: Record<ExportFormat, string> = {
  txt: "text/plain; charset=utf-8",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  pdf: "application/pdf",
};

export type FormatExporter = (title: string, reportText: string) => Buffer | Promise<Buffer>;
export type Exporters = Record<ExportFormat, FormatExporter>;

export const DEFAULT_EXPORTERS: Exporters = {
  txt: (_title, reportText) => toPlainText(reportText),
  docx: toOfficeDocument,
  pdf: toPdf,
};

export interface ExportedFile {
  format: ExportFormat;
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface ExportResult {
  files: ExportedFile[];
  warnings: string[];
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/** "Internal Service Report" → "internal_service_report" */
export function fileStem(title: string): string {
  const stem = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return stem || "report";
}

export async function exportReport(
  title: string,
  reportText: string,
  formats: readonly ExportFormat[] = EXPORT_FORMATS,
  exporters: Exporters = DEFAULT_EXPORTERS,
): Promise<ExportResult> {
  const files: ExportedFile[] = [];
  const warnings: string[] = [];
  const stem = fileStem(title);

  for (const format of formats) {
    try {
      const content = await exporters[format](title, reportText);
      files.push({
        format,
        filename: `${stem}.${format}`,
        contentType: CONTENT_TYPES[format],
        content,
      });
    } catch (err) {
      const warning = `${format.toUpperCase()} export failed: ${errorMessage(err)}`;
      warnings.push(warning);
      warnStep("EXPORT", `${title}: ${warning}`);
    }
  }

  return { files, warnings };
}
