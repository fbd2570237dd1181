import type { GeneratedAppendix, Result } from "../core/types";
import { err, ok } from "../core/types";
import { ExportError, errorMessage } from "../core/errors";
import { renderMarkdown } from "./markdown";
import { renderDocx } from "./docx";
import { renderPdf } from "./pdf";
import {
  EXPORT_FORMATS,
  FILE_EXTENSIONS,
  MIME_TYPES,
  type ExportFormat,
  type ExportMetadata,
  type RenderInput,
  type RenderedFile,
} from "./types";

const FORMAT_ALIASES: Record<string, ExportFormat> = {
  md: "markdown",
  markdown: "markdown",
  docx: "docx",
  word: "docx",
  pdf: "pdf",
};

export function parseExportFormat(value: string): ExportFormat | undefined {
  return FORMAT_ALIASES[value.trim().toLowerCase()];
}

export function exportFileName(groupId: string, format: ExportFormat): string {
  const safe = groupId.trim().replace(/\s+/g, "_").replace(/[\\/:*?"<>|]/g, "_");
  return `appendix_${safe}.${FILE_EXTENSIONS[format]}`;
}

/**
 * Default export metadata for an appendix: its own title and timestamp.
 */
export function exportMetadataFor(
  appendix: GeneratedAppendix,
  sourceLabel: string,
  attribution: string
): ExportMetadata {
  return { title: appendix.title, timestamp: appendix.generatedAt, sourceLabel, attribution };
}

function validate(appendix: GeneratedAppendix, metadata: ExportMetadata): ExportError | null {
  if (!metadata.title.trim()) {
    return new ExportError("MalformedContent", "The export has no title", { field: "title" });
  }
  if (!appendix.content.trim()) {
    return new ExportError("MalformedContent", `${appendix.groupId} has no content`, { field: "content" });
  }
  if (!metadata.timestamp.trim() || Number.isNaN(Date.parse(metadata.timestamp))) {
    return new ExportError("MalformedContent", `"${metadata.timestamp}" is not a valid timestamp`, {
      field: "timestamp",
    });
  }
  return null;
}

async function renderBytes(input: RenderInput, format: ExportFormat): Promise<Uint8Array> {
  switch (format) {
    case "markdown":
      return new TextEncoder().encode(renderMarkdown(input));
    case "docx":
      return renderDocx(input);
    case "pdf":
      return renderPdf(input);
  }
}

/**
 * Render one appendix to a downloadable file. Invalid content is rejected
 * before anything is rendered; renderer failures come back as RenderFailed.
 */
export async function renderAppendix(
  appendix: GeneratedAppendix,
  format: ExportFormat,
  metadata: ExportMetadata
): Promise<Result<RenderedFile, ExportError>> {
  if (!EXPORT_FORMATS.includes(format)) {
    return err(new ExportError("MalformedContent", `Unknown export format "${format}"`, { format }));
  }
  const invalid = validate(appendix, metadata);
  if (invalid) return err(invalid);

  const input: RenderInput = {
    groupId: appendix.groupId,
    content: appendix.content,
    metadata,
    modelId: appendix.modelId,
  };

  let bytes: Uint8Array;
  try {
    bytes = await renderBytes(input, format);
  } catch (e) {
    return err(
      new ExportError("RenderFailed", `Could not render ${appendix.groupId} as ${format}: ${errorMessage(e)}`, {
        format,
      })
    );
  }

  return ok({
    format,
    fileName: exportFileName(appendix.groupId, format),
    mimeType: MIME_TYPES[format],
    bytes,
  });
}
