export { renderAppendix, parseExportFormat, exportFileName, exportMetadataFor } from "./render";
export { parseMarkdownBlocks, parseInline, type Block, type InlineRun } from "./markdown-blocks";
export {
  EXPORT_FORMATS,
  MIME_TYPES,
  type ExportFormat,
  type ExportMetadata,
  type RenderedFile,
} from "./types";
