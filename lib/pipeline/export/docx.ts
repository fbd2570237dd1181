import {
  AlignmentType,
  Document,
  Footer,
  HeadingLevel,
  LevelFormat,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from "docx";
import { parseMarkdownBlocks, type Block, type InlineRun } from "./markdown-blocks";
import { footerLine, type RenderInput } from "./types";

const NUMBERING_REFERENCE = "appendix-numbered";

const HEADINGS = {
  1: HeadingLevel.HEADING_1,
  2: HeadingLevel.HEADING_2,
  3: HeadingLevel.HEADING_3,
} as const;

function textRuns(runs: InlineRun[], forceBold = false): TextRun[] {
  return runs.map(
    (run) => new TextRun({ text: run.text, bold: forceBold || run.bold, italics: run.italic })
  );
}

function blockToDocx(block: Block): Paragraph | Table {
  switch (block.type) {
    case "heading":
      return new Paragraph({ heading: HEADINGS[block.level], children: textRuns(block.runs) });
    case "paragraph":
      return new Paragraph({ children: textRuns(block.runs), spacing: { after: 120 } });
    case "bullet":
      return new Paragraph({ children: textRuns(block.runs), bullet: { level: 0 } });
    case "numbered":
      return new Paragraph({
        children: textRuns(block.runs),
        numbering: { reference: NUMBERING_REFERENCE, level: 0, instance: block.listIndex },
      });
    case "rule":
      return new Paragraph({ thematicBreak: true });
    case "table":
      return new Table({
        width: { size: 100, type: WidthType.PERCENTAGE },
        rows: block.rows.map(
          (cells, rowIndex) =>
            new TableRow({
              tableHeader: rowIndex === 0,
              children: cells.map(
                (cell) =>
                  new TableCell({
                    children: [new Paragraph({ children: textRuns(cell, rowIndex === 0) })],
                  })
              ),
            })
        ),
      });
  }
}

/**
 * Word export. Headings, lists, tables and bold/italic runs map to native
 * Word structures; every page carries the attribution footer.
 */
export async function renderDocx(input: RenderInput): Promise<Uint8Array> {
  const { metadata } = input;
  const body: (Paragraph | Table)[] = [];

  for (const block of parseMarkdownBlocks(input.content)) {
    body.push(blockToDocx(block));
    // keep consecutive tables apart
    if (block.type === "table") body.push(new Paragraph({ children: [] }));
  }

  const doc = new Document({
    creator: metadata.attribution,
    title: metadata.title,
    description: `Generated from ${metadata.sourceLabel}`,
    numbering: {
      config: [
        {
          reference: NUMBERING_REFERENCE,
          levels: [{ level: 0, format: LevelFormat.DECIMAL, text: "%1.", alignment: AlignmentType.START }],
        },
      ],
    },
    sections: [
      {
        footers: {
          default: new Footer({
            children: [
              new Paragraph({
                alignment: AlignmentType.CENTER,
                children: [new TextRun({ text: footerLine(metadata), size: 16 })],
              }),
            ],
          }),
        },
        children: [
          new Paragraph({
            heading: HeadingLevel.TITLE,
            alignment: AlignmentType.CENTER,
            children: [new TextRun({ text: metadata.title })],
          }),
          new Paragraph({
            alignment: AlignmentType.CENTER,
            children: [
              new TextRun({
                text: `${metadata.sourceLabel} · ${metadata.timestamp}`,
                italics: true,
                size: 18,
              }),
            ],
          }),
          ...body,
        ],
      },
    ],
  });

  const buffer = await Packer.toBuffer(doc);
  return new Uint8Array(buffer);
}
