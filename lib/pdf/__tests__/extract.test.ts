import { describe, it, expect } from "vitest";
import { PdfOpenError, extractPdf, type ExtractProgress } from "../extract";
import { CHAPTER_LINES, createTextPdf, encryptPdf } from "./create-test-pdf";

describe("extractPdf", () => {
  it("extracts page text in page order", async () => {
    const bytes = await createTextPdf([CHAPTER_LINES, ["Chapter 2: Deltas"]]);
    const result = await extractPdf(bytes);

    expect(result.totalPagesInPdf).toBe(2);
    expect(result.pages.map((p) => p.pageNumber)).toEqual([1, 2]);
    for (const line of CHAPTER_LINES) {
      expect(result.pages[0].text).toContain(line);
    }
    expect(result.pages[1].text.trim()).toBe("Chapter 2: Deltas");
  });

  it("reads document info", async () => {
    const bytes = await createTextPdf([["Body"]], { title: "River Futures", author: "Test Author" });
    const { pdfMetadata } = await extractPdf(bytes);
    expect(pdfMetadata.title).toBe("River Futures");
    expect(pdfMetadata.author).toBe("Test Author");
    expect(pdfMetadata.format).toMatch(/^PDF /);
  });

  it("reports progress once per page", async () => {
    const bytes = await createTextPdf([["One"], ["Two"], ["Three"]]);
    const events: ExtractProgress[] = [];
    await extractPdf(bytes, (p) => events.push(p));
    expect(events).toEqual([
      { page: 1, totalPages: 3 },
      { page: 2, totalPages: 3 },
      { page: 3, totalPages: 3 },
    ]);
  });

  it("returns empty text for a page without a text layer", async () => {
    const bytes = await createTextPdf([[]]);
    const result = await extractPdf(bytes);
    expect(result.pages).toEqual([{ pageNumber: 1, text: "" }]);
  });

  it("throws an unreadable PdfOpenError for garbage", async () => {
    const garbage = new TextEncoder().encode("this is not a pdf at all");
    const error = await extractPdf(garbage).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PdfOpenError);
    expect(error instanceof PdfOpenError && error.reason).toBe("unreadable");
  });

  it("throws a password PdfOpenError for an encrypted file", async () => {
    const bytes = encryptPdf(await createTextPdf([CHAPTER_LINES]), "test-secret");
    const error = await extractPdf(bytes).catch((e: unknown) => e);
    expect(error instanceof PdfOpenError && error.reason).toBe("password");
  });
});
