/**
 * Line classification for the report markup emitted by the renderer.
 * Shared by the DOCX and PDF exporters.
 */

export type LineKind = "heading1" | "heading2" | "bullet" | "paragraph" | "blank";

export interface ReportLine {
  kind: LineKind;
  text: string;
}

/** Bold: **text** or __text__ */
export function stripBold(text: string): string {
  return text.replace(/\*\*(.+?)\*\*/g, "$1").replace(/__(.+?)__/g, "$1");
}

export function classifyLine(raw: string): ReportLine {
  const line = raw.trimEnd();
  if (line.trim().length === 0) return { kind: "blank", text: "" };
  if (line.startsWith("## ")) return { kind: "heading2", text: stripBold(line.slice(3).trim()) };
  if (line.startsWith("# ")) return { kind: "heading1", text: stripBold(line.slice(2).trim()) };
  if (line.startsWith("- ")) return { kind: "bullet", text: stripBold(line.slice(2).trim()) };
  return { kind: "paragraph", text: stripBold(line.trim()) };
}

export function classifyLines(text: string): ReportLine[] {
  return text.split(/\r?\n/).map(classifyLine);
}

/**
 * Lines below the document title. The renderer opens every report with
 * "# <title>"; when that heading repeats `title` it is dropped along with
 * the blank lines after it.
 */
export function reportBodyLines(title: string, text: string): ReportLine[] {
  const lines = classifyLines(text);
  let start = 0;
  while (start < lines.length && lines[start].kind === "blank") start++;
  const first = start < lines.length ? lines[start] : null;
  if (first?.kind !== "heading1" || first.text !== stripBold(title).trim()) return lines;
  start++;
  while (start < lines.length && lines[start].kind === "blank") start++;
  return lines.slice(start);
}
