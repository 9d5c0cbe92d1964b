import { PDFDocument, StandardFonts, rgb } from "pdf-lib";
import { reportBodyLines } from "./markup.js";

export const LINES_PER_PAGE = 48;
export const MAX_LINE_CHARS = 95;

const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 50;
const FONT_SIZE = 10;
const LINE_HEIGHT = 14;

/** Typographic characters that the standard fonts' encoding may not cover. */
const REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/[‘’]/g, "'"],
  [/[“”]/g, '"'],
  [/[–—]/g, "-"],
  [/…/g, "..."],
  [/•/g, "-"],
];

/** Keep printable Latin-1; anything else becomes "?". */
export function toPdfSafe(text: string): string {
  let out = text;
  for (const [pattern, replacement] of REPLACEMENTS) out = out.replace(pattern, replacement);
  return out.replace(/[^\x20-\x7E\xA0-\xFF]/g, "?");
}

export function truncateLine(line: string, width: number = MAX_LINE_CHARS): string {
  if (line.length <= width) return line;
  return line.slice(0, width - 3) + "...";
}

interface PdfLine {
  text: string;
  bold: boolean;
}

/** Flatten title + report markup into fixed-width lines. */
export function layoutPdfLines(title: string, reportText: string): PdfLine[] {
  const lines: PdfLine[] = [{ text: truncateLine(toPdfSafe(title)), bold: true }, { text: "", bold: false }];
  for (const line of reportBodyLines(title, reportText)) {
    const text = line.kind === "bullet" ? `- ${line.text}` : line.text;
    const bold = line.kind === "heading1" || line.kind === "heading2";
    lines.push({ text: truncateLine(toPdfSafe(text)), bold });
  }
  return lines;
}

export function paginate<T>(lines: readonly T[], perPage: number = LINES_PER_PAGE): T[][] {
  const pages: T[][] = [];
  for (let i = 0; i < lines.length; i += perPage) pages.push(lines.slice(i, i + perPage));
  return pages.length > 0 ? pages : [[]];
}

/** Render a report as a paginated Helvetica PDF. */
export async function toPdf(title: string, reportText: string): Promise<Buffer> {
  const pdfDoc = await PDFDocument.create();
  pdfDoc.setTitle(toPdfSafe(title));
  const font = await pdfDoc.embedFont(StandardFonts.Helvetica);
  const boldFont = await pdfDoc.embedFont(StandardFonts.HelveticaBold);

  for (const pageLines of paginate(layoutPdfLines(title, reportText))) {
    const page = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    let y = PAGE_HEIGHT - MARGIN;
    for (const line of pageLines) {
      if (line.text) {
        page.drawText(line.text, {
          x: MARGIN,
          y,
          size: FONT_SIZE,
          font: line.bold ? boldFont : font,
          color: rgb(0, 0, 0),
        });
      }
      y -= LINE_HEIGHT;
    }
  }

  return Buffer.from(await pdfDoc.save());
}
