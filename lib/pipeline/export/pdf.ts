import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from "pdf-lib";
import { parseMarkdownBlocks, parseInline, type Block, type InlineRun } from "./markdown-blocks";
import { footerLine, type RenderInput } from "./types";

const PAGE_WIDTH = 595.28; // A4
const PAGE_HEIGHT = 841.89;
const MARGIN = 56;
const FOOTER_Y = 28;
const CONTENT_WIDTH = PAGE_WIDTH - 2 * MARGIN;
const LINE_SPACING = 1.35;
const BODY_SIZE = 11;
const TABLE_SIZE = 8.5;
const CELL_PADDING = 4;
const LIST_INDENT = 16;

const HEADING_SIZES = { 1: 18, 2: 15, 3: 12.5 } as const;
const TITLE_SIZE = 22;

// Common characters outside WinAnsi that the standard fonts cannot encode.
const SUBSTITUTES: Record<string, string> = {
  "\u2192": "->",
  "\u2190": "<-",
  "\u2194": "<->",
  "\u2191": "^",
  "\u2193": "v",
  "\u2265": ">=",
  "\u2264": "<=",
  "\u2260": "!=",
  "\u2248": "~",
  "\u2212": "-",
  "\u2011": "-",
  "\u2713": "v",
  "\u2714": "v",
  "\u2717": "x",
  "\u2605": "*",
  "\u00a0": " ",
  "\u200b": "",
  "\t": "    ",
};

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
  italic: PDFFont;
  boldItalic: PDFFont;
}

interface Word {
  text: string;
  font: PDFFont;
  width: number;
  spaceAfter: boolean;
}

/**
 * Word-wraps styled runs and draws them onto A4 pages, starting a new
 * page whenever the cursor would run into the bottom margin.
 */
class PdfWriter {
  private page: PDFPage;
  private y: number;
  private readonly supported: Set<number>;

  constructor(
    private readonly doc: PDFDocument,
    private readonly fonts: Fonts
  ) {
    this.page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.y = PAGE_HEIGHT - MARGIN;
    this.supported = new Set(fonts.regular.getCharacterSet());
  }

  sanitize(text: string): string {
    let out = "";
    for (const ch of text) {
      const substitute = SUBSTITUTES[ch];
      if (substitute !== undefined) out += substitute;
      else out += this.supported.has(ch.codePointAt(0) ?? 0) ? ch : "?";
    }
    return out;
  }

  private fontFor(run: InlineRun, forceBold: boolean): PDFFont {
    const bold = forceBold || run.bold;
    if (bold && run.italic) return this.fonts.boldItalic;
    if (bold) return this.fonts.bold;
    if (run.italic) return this.fonts.italic;
    return this.fonts.regular;
  }

  private ensureSpace(height: number): void {
    if (this.y - height < MARGIN) {
      this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      this.y = PAGE_HEIGHT - MARGIN;
    }
  }

  gap(points: number): void {
    this.y -= points;
  }

  /** Split runs into measured words, breaking words wider than a line. */
  private words(runs: InlineRun[], size: number, maxWidth: number, forceBold: boolean): Word[] {
    const words: Word[] = [];
    for (const run of runs) {
      const font = this.fontFor(run, forceBold);
      const parts = this.sanitize(run.text).split(/(\s+)/);
      for (const part of parts) {
        if (!part) continue;
        if (/^\s+$/.test(part)) {
          if (words.length > 0) words[words.length - 1].spaceAfter = true;
          continue;
        }
        for (const chunk of this.chunk(part, font, size, maxWidth)) {
          words.push({ text: chunk, font, width: font.widthOfTextAtSize(chunk, size), spaceAfter: false });
        }
      }
    }
    return words;
  }

  private chunk(word: string, font: PDFFont, size: number, maxWidth: number): string[] {
    if (font.widthOfTextAtSize(word, size) <= maxWidth) return [word];
    const chunks: string[] = [];
    let current = "";
    for (const ch of word) {
      if (current && font.widthOfTextAtSize(current + ch, size) > maxWidth) {
        chunks.push(current);
        current = "";
      }
      current += ch;
    }
    if (current) chunks.push(current);
    return chunks;
  }

  /** Lay words out into lines no wider than maxWidth. */
  private lines(words: Word[], size: number, maxWidth: number): Word[][] {
    const lines: Word[][] = [];
    let line: Word[] = [];
    let width = 0;
    for (const word of words) {
      const space = line.length > 0 && line[line.length - 1].spaceAfter ? line[line.length - 1].font.widthOfTextAtSize(" ", size) : 0;
      if (line.length > 0 && width + space + word.width > maxWidth) {
        lines.push(line);
        line = [];
        width = 0;
      }
      width += (line.length > 0 ? space : 0) + word.width;
      line.push(word);
    }
    if (line.length > 0) lines.push(line);
    return lines;
  }

  private drawLine(page: PDFPage, line: Word[], x: number, baseline: number, size: number): void {
    let cursor = x;
    for (const word of line) {
      page.drawText(word.text, { x: cursor, y: baseline, size, font: word.font, color: rgb(0.1, 0.1, 0.1) });
      cursor += word.width + (word.spaceAfter ? word.font.widthOfTextAtSize(" ", size) : 0);
    }
  }

  text(
    runs: InlineRun[],
    options: { size: number; indent?: number; bold?: boolean; marker?: string; center?: boolean }
  ): void {
    const indent = options.indent ?? 0;
    const maxWidth = CONTENT_WIDTH - indent;
    const lineHeight = options.size * LINE_SPACING;
    const lines = this.lines(this.words(runs, options.size, maxWidth, options.bold ?? false), options.size, maxWidth);

    lines.forEach((line, i) => {
      this.ensureSpace(lineHeight);
      this.y -= lineHeight;
      let x = MARGIN + indent;
      if (options.center) {
        const width = line.reduce(
          (sum, w, j) => sum + w.width + (w.spaceAfter && j < line.length - 1 ? w.font.widthOfTextAtSize(" ", options.size) : 0),
          0
        );
        x = MARGIN + (CONTENT_WIDTH - width) / 2;
      }
      if (i === 0 && options.marker) {
        this.page.drawText(this.sanitize(options.marker), {
          x: MARGIN + indent - LIST_INDENT + 2,
          y: this.y,
          size: options.size,
          font: this.fonts.regular,
        });
      }
      this.drawLine(this.page, line, x, this.y, options.size);
    });
  }

  rule(): void {
    this.ensureSpace(12);
    this.y -= 6;
    this.page.drawLine({
      start: { x: MARGIN, y: this.y },
      end: { x: PAGE_WIDTH - MARGIN, y: this.y },
      thickness: 0.5,
      color: rgb(0.6, 0.6, 0.6),
    });
    this.y -= 6;
  }

  table(rows: InlineRun[][][]): void {
    const columns = Math.max(1, rows[0]?.length ?? 1);
    const columnWidth = CONTENT_WIDTH / columns;
    const innerWidth = columnWidth - 2 * CELL_PADDING;
    const lineHeight = TABLE_SIZE * LINE_SPACING;

    rows.forEach((cells, rowIndex) => {
      const laidOut = cells.map((cell) =>
        this.lines(this.words(cell, TABLE_SIZE, innerWidth, rowIndex === 0), TABLE_SIZE, innerWidth)
      );
      const rowHeight = Math.max(1, ...laidOut.map((l) => l.length)) * lineHeight + 2 * CELL_PADDING;
      this.ensureSpace(rowHeight);
      const top = this.y;

      laidOut.forEach((lines, col) => {
        const x = MARGIN + col * columnWidth;
        this.page.drawRectangle({
          x,
          y: top - rowHeight,
          width: columnWidth,
          height: rowHeight,
          borderWidth: 0.5,
          borderColor: rgb(0.55, 0.55, 0.55),
          color: rowIndex === 0 ? rgb(0.92, 0.92, 0.92) : undefined,
        });
        lines.forEach((line, i) => {
          this.drawLine(this.page, line, x + CELL_PADDING, top - CELL_PADDING - (i + 1) * lineHeight + 2, TABLE_SIZE);
        });
      });

      this.y = top - rowHeight;
    });
  }

  block(block: Block): void {
    switch (block.type) {
      case "heading":
        this.gap(8);
        this.text(block.runs, { size: HEADING_SIZES[block.level], bold: true });
        this.gap(4);
        return;
      case "paragraph":
        this.text(block.runs, { size: BODY_SIZE });
        this.gap(6);
        return;
      case "bullet":
        this.text(block.runs, { size: BODY_SIZE, indent: LIST_INDENT, marker: "•" });
        this.gap(2);
        return;
      case "numbered":
        this.text(block.runs, { size: BODY_SIZE, indent: LIST_INDENT, marker: `${block.number}.` });
        this.gap(2);
        return;
      case "rule":
        this.rule();
        return;
      case "table":
        this.table(block.rows);
        this.gap(10);
        return;
    }
  }
}

/**
 * PDF export with the standard Helvetica faces. Characters the faces
 * cannot encode are replaced. Every page gets the attribution footer and
 * a page number.
 */
export async function renderPdf(input: RenderInput): Promise<Uint8Array> {
  const { metadata } = input;
  const doc = await PDFDocument.create();
  doc.setTitle(metadata.title);
  doc.setAuthor(metadata.attribution);
  doc.setCreator(metadata.attribution);
  doc.setSubject(`Generated from ${metadata.sourceLabel}`);
  doc.setCreationDate(new Date(metadata.timestamp));

  const fonts: Fonts = {
    regular: await doc.embedFont(StandardFonts.Helvetica),
    bold: await doc.embedFont(StandardFonts.HelveticaBold),
    italic: await doc.embedFont(StandardFonts.HelveticaOblique),
    boldItalic: await doc.embedFont(StandardFonts.HelveticaBoldOblique),
  };

  const writer = new PdfWriter(doc, fonts);
  writer.text(parseInline(metadata.title), { size: TITLE_SIZE, bold: true, center: true });
  writer.gap(4);
  writer.text([{ text: `${metadata.sourceLabel} · ${metadata.timestamp}`, bold: false, italic: true }], {
    size: 9,
    center: true,
  });
  writer.gap(14);

  for (const block of parseMarkdownBlocks(input.content)) {
    writer.block(block);
  }

  const footer = writer.sanitize(footerLine(metadata));
  const pages = doc.getPages();
  pages.forEach((page, i) => {
    const text = `${footer} · Page ${i + 1} of ${pages.length}`;
    const width = fonts.regular.widthOfTextAtSize(text, 7.5);
    page.drawText(text, {
      x: Math.max(MARGIN, (PAGE_WIDTH - width) / 2),
      y: FOOTER_Y,
      size: 7.5,
      font: fonts.regular,
      color: rgb(0.4, 0.4, 0.4),
    });
  });

  return doc.save();
}
