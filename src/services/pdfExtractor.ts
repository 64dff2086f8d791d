import fs from "node:fs/promises";
import { fileExists } from "./uploadStorage";

export const NO_TEXT_EXTRACTED = "(No text extracted from PDF)";

export type ExtractionResult =
  | { kind: "text"; text: string }
  | { kind: "not_found"; path: string };

/** Returns the text of every page, in page order. */
export type PageTextLoader = (data: Uint8Array) => Promise<string[]>;

export async function loadPdfPages(data: Uint8Array): Promise<string[]> {
  const pdfjs = await import("pdfjs-dist");
  const doc = await pdfjs.getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;
  try {
    const pages: string[] = [];
    for (let i = 1; i <= doc.numPages; i += 1) {
      const page = await doc.getPage(i);
      const content = await page.getTextContent();
      let text = "";
      for (const item of content.items) {
        if ("str" in item) {
          text += item.str;
          if (item.hasEOL) {
            text += "\n";
          }
        }
      }
      pages.push(text);
    }
    return pages;
  } finally {
    await doc.destroy();
  }
}

/** Joins pages with a newline and collapses runs of blank lines. */
export function joinPageText(pages: string[]) {
  const joined = pages
    .map((page) => `${page}\n`)
    .join("")
    .replace(/\n{2,}/g, "\n");
  return joined.trim() || NO_TEXT_EXTRACTED;
}

export async function extractText(
  filePath: string,
  loadPages: PageTextLoader = loadPdfPages,
): Promise<ExtractionResult> {
  if (!filePath || !(await fileExists(filePath))) {
    return { kind: "not_found", path: filePath };
  }
  const data = await fs.readFile(filePath);
  const pages = await loadPages(new Uint8Array(data));
  return { kind: "text", text: joinPageText(pages) };
}
