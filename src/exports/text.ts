import { stripBold } from "./markup.js";

/** Plain-text export: the report as rendered, minus bold markers. */
export function toPlainText(reportText: string): Buffer {
  return Buffer.from(stripBold(reportText), "utf-8");
}
