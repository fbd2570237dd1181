/**
 * PDF Extraction Library
 *
 * Extracts ordered page text and document info from PDF files using mupdf.
 */

import * as mupdf from "mupdf";

// ============================================================================
// Types
// ============================================================================

export interface ExtractedPage {
  pageNumber: number;
  text: string;
}

export interface PdfMetadata {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
  creator?: string;
  producer?: string;
  format?: string;
}

export interface ExtractResult {
  pages: ExtractedPage[];
  pdfMetadata: PdfMetadata;
  totalPagesInPdf: number;
}

export interface ExtractProgress {
  page: number;
  totalPages: number;
}

export type PdfOpenFailure = "unreadable" | "password";

/**
 * Thrown when mupdf cannot give us the document's pages.
 */
export class PdfOpenError extends Error {
  constructor(
    public readonly reason: PdfOpenFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PdfOpenError";
  }
}

// ============================================================================
// Main extraction function
// ============================================================================

/**
 * Extract the text of every page of a PDF, in page order.
 * Throws PdfOpenError when the document cannot be opened or is locked.
 */
export async function extractPdf(
  pdfBuffer: Uint8Array,
  onProgress?: (progress: ExtractProgress) => void
): Promise<ExtractResult> {
  const doc = openPdfFromBuffer(pdfBuffer);

  if (doc.needsPassword()) {
    throw new PdfOpenError("password", "The PDF is encrypted and needs a password");
  }

  const pdfMetadata = extractPdfMetadata(doc);
  const totalPagesInPdf = readPageCount(doc);
  const pages: ExtractedPage[] = [];

  for (let i = 0; i < totalPagesInPdf; i++) {
    pages.push({ pageNumber: i + 1, text: extractPageText(doc, i) });
    onProgress?.({ page: i + 1, totalPages: totalPagesInPdf });

    // Yield to event loop so progress spinners keep turning
    await tick();
  }

  return { pages, pdfMetadata, totalPagesInPdf };
}

// ============================================================================
// Internal helpers
// ============================================================================

const tick = () => new Promise<void>((r) => setImmediate(r));

function openPdfFromBuffer(buffer: Uint8Array): mupdf.Document {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } catch (err) {
    throw new PdfOpenError("unreadable", "mupdf could not open the file as a PDF", { cause: err });
  } finally {
    process.stderr.write = origWrite;
  }
}

function readPageCount(doc: mupdf.Document): number {
  try {
    return doc.countPages();
  } catch (err) {
    throw new PdfOpenError("unreadable", "The PDF page tree is damaged", { cause: err });
  }
}

function extractPageText(doc: mupdf.Document, pageIndex: number): string {
  try {
    return doc.loadPage(pageIndex).toStructuredText("preserve-whitespace").asText();
  } catch (err) {
    throw new PdfOpenError("unreadable", `Page ${pageIndex + 1} could not be read`, { cause: err });
  }
}

const METADATA_KEYS: [keyof PdfMetadata, string][] = [
  ["title", "info:Title"],
  ["author", "info:Author"],
  ["subject", "info:Subject"],
  ["keywords", "info:Keywords"],
  ["creator", "info:Creator"],
  ["producer", "info:Producer"],
  ["format", "format"],
];

function extractPdfMetadata(doc: mupdf.Document): PdfMetadata {
  const metadata: PdfMetadata = {};
  for (const [key, mupdfKey] of METADATA_KEYS) {
    const value = doc.getMetaData(mupdfKey);
    if (value) {
      metadata[key] = value;
    }
  }
  return metadata;
}
