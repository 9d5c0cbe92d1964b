import { Document, HeadingLevel, Packer, Paragraph, TextRun } from "docx";
import { reportBodyLines } from "./markup.js";
import type { ReportLine } from "./markup.js";

const FONT = "Arial";
const FONT_SIZE_BODY = 22;
const FONT_SIZE_TITLE = 32;
const FONT_SIZE_H1 = 28;
const FONT_SIZE_H2 = 24;

function run(text: string, size: number, bold = false): TextRun {
  return new TextRun({ text, size, bold, font: FONT });
}

function toParagraph(line: ReportLine): Paragraph | null {
  switch (line.kind) {
    case "heading1":
      return new Paragraph({
        heading: HeadingLevel.HEADING_1,
        children: [run(line.text, FONT_SIZE_H1, true)],
      });
    case "heading2":
      return new Paragraph({
        heading: HeadingLevel.HEADING_2,
        spacing: { before: 200, after: 80 },
        children: [run(line.text, FONT_SIZE_H2, true)],
      });
    case "bullet":
      return new Paragraph({
        bullet: { level: 0 },
        children: [run(line.text, FONT_SIZE_BODY)],
      });
    case "paragraph":
      return new Paragraph({ children: [run(line.text, FONT_SIZE_BODY)] });
    case "blank":
      return null;
  }
}

/** Map report markup onto DOCX paragraphs, with `title` as the document title. */
export function buildReportParagraphs(title: string, reportText: string): Paragraph[] {
  const paragraphs = [
    new Paragraph({
      heading: HeadingLevel.TITLE,
      children: [run(title, FONT_SIZE_TITLE, true)],
    }),
  ];
  for (const line of reportBodyLines(title, reportText)) {
    const paragraph = toParagraph(line);
    if (paragraph) paragraphs.push(paragraph);
  }
  return paragraphs;
}

/**
 * Render a report as DOCX:
 * "# " → heading 1, "## " → heading 2, "- " → bullet, other text → paragraph.
 */
export async function toOfficeDocument(title: string, reportText: string): Promise<Buffer> {
  const doc = new Document({
    title,
    sections: [{ children: buildReportParagraphs(title, reportText) }],
  });
  return Packer.toBuffer(doc);
}
