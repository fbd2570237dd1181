export type ExportFormat = "markdown" | "docx" | "pdf";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["markdown", "docx", "pdf"];

export const MIME_TYPES: Record<ExportFormat, string> = {
  markdown: "text/markdown",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  pdf: "application/pdf",
};

export const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  markdown: "md",
  docx: "docx",
  pdf: "pdf",
};

export interface ExportMetadata {
  title: string;
  /** ISO-8601 generation timestamp */
  timestamp: string;
  sourceLabel: string;
  attribution: string;
}

export interface RenderedFile {
  format: ExportFormat;
  fileName: string;
  mimeType: string;
  bytes: Uint8Array;
}

/** Everything a renderer needs, already validated. */
export interface RenderInput {
  groupId: string;
  content: string;
  metadata: ExportMetadata;
  modelId: string;
}

export function footerLine(metadata: ExportMetadata): string {
  return `${metadata.attribution} · ${metadata.sourceLabel} · Generated ${metadata.timestamp}`;
}
