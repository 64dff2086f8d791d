import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildTextPdf, makeTempDir, removeTempDir, writeFakePdf } from "../test/helpers";
import { NO_TEXT_EXTRACTED, extractText, joinPageText, loadPdfPages } from "./pdfExtractor";

describe("joinPageText", () => {
  it("collapses blank-line runs inside and across pages", () => {
    expect(joinPageText(["Revenue 10\n\n\nCosts 5", "", "Margin 50%\n"])).toBe(
      "Revenue 10\nCosts 5\nMargin 50%",
    );
  });

  it("returns the sentinel when nothing but whitespace was extracted", () => {
    expect(joinPageText([])).toBe(NO_TEXT_EXTRACTED);
    expect(joinPageText(["   ", "\n\n"])).toBe(NO_TEXT_EXTRACTED);
  });
});

function lines(text: string) {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

describe("loadPdfPages", () => {
  it("returns one entry per page, in order, with a newline between lines", async () => {
    const pdf = buildTextPdf([["Revenue 2023", "Net income"], ["Outlook stable"]]);

    const pages = await loadPdfPages(new Uint8Array(pdf));

    expect(pages).toHaveLength(2);
    expect(lines(pages[0])).toEqual(["Revenue 2023", "Net income"]);
    expect(lines(pages[1])).toEqual(["Outlook stable"]);
  });

  it("returns empty text for pages without text", async () => {
    const pages = await loadPdfPages(new Uint8Array(buildTextPdf([[], []])));

    expect(pages.map((page) => page.trim())).toEqual(["", ""]);
  });
});

describe("extractText", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("reports a missing file without loading anything", async () => {
    const loadPages = vi.fn(async () => ["unused"]);
    const missing = path.join(dir, "missing.pdf");
    await expect(extractText(missing, loadPages)).resolves.toEqual({ kind: "not_found", path: missing });
    expect(loadPages).not.toHaveBeenCalled();
  });

  it("treats a directory and an empty path as not found", async () => {
    await expect(extractText(dir)).resolves.toEqual({ kind: "not_found", path: dir });
    await expect(extractText("")).resolves.toEqual({ kind: "not_found", path: "" });
  });

  it("passes the file bytes to the page loader and normalizes the text", async () => {
    const filePath = await writeFakePdf(dir);
    const expected = await fs.readFile(filePath);
    const loadPages = vi.fn(async (data: Uint8Array) => {
      expect(Buffer.from(data).equals(expected)).toBe(true);
      return ["  Quarterly report\n\n\n", "Net income 4.2M  "];
    });

    await expect(extractText(filePath, loadPages)).resolves.toEqual({
      kind: "text",
      text: "Quarterly report\nNet income 4.2M",
    });
    expect(loadPages).toHaveBeenCalledTimes(1);
  });

  it("propagates loader errors for unreadable documents", async () => {
    const filePath = await writeFakePdf(dir);
    const loadPages = vi.fn(async (): Promise<string[]> => {
      throw new Error("Invalid PDF structure");
    });
    await expect(extractText(filePath, loadPages)).rejects.toThrow("Invalid PDF structure");
  });

  it("extracts the text of a real multi-page document", async () => {
    const filePath = path.join(dir, "report.pdf");
    await fs.writeFile(filePath, buildTextPdf([["Quarterly report", "Revenue 112"], [], ["Outlook stable"]]));

    const result = await extractText(filePath);

    expect(result.kind).toBe("text");
    expect(result.kind === "text" && lines(result.text)).toEqual(["Quarterly report", "Revenue 112", "Outlook stable"]);
  });

  it("returns the sentinel for a document with no text", async () => {
    const filePath = path.join(dir, "scanned.pdf");
    await fs.writeFile(filePath, buildTextPdf([[]]));

    await expect(extractText(filePath)).resolves.toEqual({ kind: "text", text: NO_TEXT_EXTRACTED });
  });
});
