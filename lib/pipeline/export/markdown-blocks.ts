/**
 * Minimal Markdown block parser for the appendix renderers.
 *
 * Covers what the generation prompt asks for: headings, bullet and
 * numbered lists, pipe tables, rules and paragraphs with bold/italic runs.
 */

export interface InlineRun {
  text: string;
  bold: boolean;
  italic: boolean;
}

export type Block =
  | { type: "heading"; level: 1 | 2 | 3; runs: InlineRun[] }
  | { type: "paragraph"; runs: InlineRun[] }
  | { type: "bullet"; runs: InlineRun[] }
  | { type: "numbered"; number: number; listIndex: number; runs: InlineRun[] }
  | { type: "table"; rows: InlineRun[][][] }
  | { type: "rule" };

const TABLE_SEPARATOR = /^\|?[\s\-:|]+\|?$/;
const HEADING = /^(#{1,6})\s+(.*)$/;
const BULLET = /^[-*+]\s+(.*)$/;
const NUMBERED = /^(\d+)[.)]\s+(.*)$/;
const RULE = /^(-{3,}|\*{3,}|_{3,})$/;

/**
 * Split text into bold/italic runs. `**x**` / `__x__` are bold,
 * `*x*` / `_x_` italic; inline code keeps its text.
 */
export function parseInline(text: string): InlineRun[] {
  const runs: InlineRun[] = [];
  const pattern = /(\*\*\*[^*]+?\*\*\*|\*\*[^*]+?\*\*|__[^_]+?__|\*[^*\s][^*]*?\*|\b_[^_\s][^_]*?_\b|`[^`]+`)/g;
  let last = 0;
  let match: RegExpExecArray | null;

  const push = (value: string, bold: boolean, italic: boolean) => {
    if (value) runs.push({ text: value, bold, italic });
  };

  while ((match = pattern.exec(text)) !== null) {
    push(text.slice(last, match.index), false, false);
    const token = match[0];
    if (token.startsWith("***")) push(token.slice(3, -3), true, true);
    else if (token.startsWith("**") || token.startsWith("__")) push(token.slice(2, -2), true, false);
    else if (token.startsWith("`")) push(token.slice(1, -1), false, false);
    else push(token.slice(1, -1), false, true);
    last = match.index + token.length;
  }
  push(text.slice(last), false, false);
  return runs;
}

function splitTableRow(line: string): string[] {
  let body = line.trim();
  if (body.startsWith("|")) body = body.slice(1);
  if (body.endsWith("|")) body = body.slice(0, -1);
  return body.split("|").map((cell) => cell.trim());
}

export function parseMarkdownBlocks(markdown: string): Block[] {
  const blocks: Block[] = [];
  let paragraph: string[] = [];
  let table: string[][] = [];
  let listIndex = 0;
  let inNumberedList = false;

  const flushParagraph = () => {
    if (paragraph.length > 0) {
      blocks.push({ type: "paragraph", runs: parseInline(paragraph.join(" ")) });
      paragraph = [];
    }
  };

  const flushTable = () => {
    if (table.length > 0) {
      const width = table[0].length;
      const rows = table.map((cells) =>
        Array.from({ length: width }, (_, i) => parseInline(cells[i] ?? ""))
      );
      blocks.push({ type: "table", rows });
      table = [];
    }
  };

  for (const rawLine of markdown.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (line.startsWith("|")) {
      flushParagraph();
      inNumberedList = false;
      if (!TABLE_SEPARATOR.test(line)) table.push(splitTableRow(line));
      continue;
    }
    flushTable();

    if (!line) {
      flushParagraph();
      continue;
    }

    const numbered = NUMBERED.exec(line);
    if (!numbered) inNumberedList = false;

    const heading = HEADING.exec(line);
    if (heading) {
      flushParagraph();
      const level = Math.min(heading[1].length, 3);
      blocks.push({
        type: "heading",
        level: level === 1 ? 1 : level === 2 ? 2 : 3,
        runs: parseInline(heading[2].trim()),
      });
      continue;
    }

    if (RULE.test(line)) {
      flushParagraph();
      blocks.push({ type: "rule" });
      continue;
    }

    const bullet = BULLET.exec(line);
    if (bullet) {
      flushParagraph();
      blocks.push({ type: "bullet", runs: parseInline(bullet[1]) });
      continue;
    }

    if (numbered) {
      flushParagraph();
      if (!inNumberedList) {
        listIndex++;
        inNumberedList = true;
      }
      blocks.push({
        type: "numbered",
        number: Number(numbered[1]),
        listIndex,
        runs: parseInline(numbered[2]),
      });
      continue;
    }

    paragraph.push(line.startsWith(">") ? line.replace(/^>\s?/, "") : line);
  }

  flushParagraph();
  flushTable();
  return blocks;
}
