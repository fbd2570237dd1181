/**
 * PDF Extraction Step
 *
 * Turns uploaded bytes into a BookSource, or a typed ExtractionError.
 * Pure over the byte buffer: identical bytes give identical pages.
 */

import { createHash } from "node:crypto";
import {
  extractPdf,
  PdfOpenError,
  type ExtractProgress,
  type ExtractResult,
} from "../../pdf/extract";
import { ExtractionError, errorMessage } from "../core/errors";
import { err, ok, type BookSource, type PageText, type Result } from "../core/types";

export interface ExtractionLimits {
  maxBytes: number;
  warnBytes: number;
  minTextChars: number;
}

export const DEFAULT_EXTRACTION_LIMITS: ExtractionLimits = {
  maxBytes: 100 * 1024 * 1024,
  warnBytes: 50 * 1024 * 1024,
  minTextChars: 100,
};

export interface ExtractBookInput {
  fileName: string;
  bytes: Uint8Array;
  limits?: ExtractionLimits;
}

export function bookIdFromBytes(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex").slice(0, 16);
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export async function extractBook(
  input: ExtractBookInput,
  onProgress?: (progress: ExtractProgress) => void
): Promise<Result<BookSource, ExtractionError>> {
  const { fileName, bytes, limits = DEFAULT_EXTRACTION_LIMITS } = input;
  const warnings: string[] = [];

  if (bytes.byteLength === 0) {
    return err(new ExtractionError("Corrupted", `${fileName} is empty`, { byteLength: 0 }));
  }
  if (bytes.byteLength > limits.maxBytes) {
    return err(
      new ExtractionError(
        "TooLarge",
        `${fileName} is ${formatMegabytes(bytes.byteLength)}, above the ${formatMegabytes(limits.maxBytes)} limit`,
        { byteLength: bytes.byteLength, maxBytes: limits.maxBytes }
      )
    );
  }
  if (bytes.byteLength > limits.warnBytes) {
    warnings.push(
      `${fileName} is ${formatMegabytes(bytes.byteLength)}; files above ${formatMegabytes(limits.warnBytes)} take longer to process`
    );
  }

  let extracted: ExtractResult;
  try {
    extracted = await extractPdf(bytes, onProgress);
  } catch (e) {
    if (e instanceof PdfOpenError && e.reason === "password") {
      return err(new ExtractionError("PasswordProtected", `${fileName} is password protected`, undefined, e));
    }
    return err(
      new ExtractionError("Corrupted", `${fileName} could not be read: ${errorMessage(e)}`, undefined, e)
    );
  }

  const pages: PageText[] = extracted.pages.map((p) => ({
    pageNumber: p.pageNumber,
    text: p.text.trim(),
  }));

  const textChars = pages.reduce((sum, p) => sum + p.text.replace(/\s/g, "").length, 0);
  if (textChars < limits.minTextChars) {
    return err(
      new ExtractionError(
        "NoExtractableText",
        `${fileName} has only ${textChars} characters of text across ${pages.length} pages`,
        { textChars, pageCount: pages.length, minTextChars: limits.minTextChars }
      )
    );
  }

  return ok({
    id: bookIdFromBytes(bytes),
    fileName,
    pages,
    pageCount: pages.length,
    wordCount: pages.reduce((sum, p) => sum + countWords(p.text), 0),
    charCount: pages.reduce((sum, p) => sum + p.text.length, 0),
    pdfInfo: extracted.pdfMetadata,
    warnings,
  });
}
