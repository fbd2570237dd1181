import type { BoundedText, PageText } from "../core/types";

export interface TruncateOptions {
  headFraction?: number;
  tailFraction?: number;
}

const PARAGRAPH_BREAK = "\n\n";
// A break is only used when it lies this close to the cut.
const SNAP_WINDOW = 0.2;

export function truncationMarker(omittedChars: number): string {
  return `[... CONTENT TRUNCATED: ${omittedChars} characters omitted ...]`;
}

/**
 * Render pages as `[Page n]` blocks separated by blank lines.
 */
export function renderPages(pages: PageText[]): string {
  return pages.map((p) => `[Page ${p.pageNumber}]\n${p.text}`).join(PARAGRAPH_BREAK);
}

export function truncate(
  pages: PageText[],
  maxChars: number,
  options: TruncateOptions = {}
): BoundedText {
  return truncateText(renderPages(pages), maxChars, options);
}

/**
 * Bound a text to `maxChars` characters, keeping its beginning and end.
 *
 * The result is never longer than `maxChars`. Text that already fits is
 * returned unchanged, so applying the policy twice gives the same text.
 */
export function truncateText(
  full: string,
  maxChars: number,
  { headFraction = 0.4, tailFraction = 0.2 }: TruncateOptions = {}
): BoundedText {
  const originalChars = full.length;

  if (maxChars <= 0) {
    return { text: "", truncated: originalChars > 0, originalChars, omittedChars: originalChars, maxChars };
  }
  if (originalChars <= maxChars) {
    return { text: full, truncated: false, originalChars, omittedChars: 0, maxChars };
  }

  const head = snapHead(full.slice(0, Math.floor(maxChars * headFraction)));
  const tailLength = Math.floor(maxChars * tailFraction);
  const tail = snapTail(tailLength > 0 ? full.slice(originalChars - tailLength) : "");
  const omittedChars = originalChars - head.length - tail.length;
  const text = `${head}${PARAGRAPH_BREAK}${truncationMarker(omittedChars)}${PARAGRAPH_BREAK}${tail}`;

  if (text.length > maxChars) {
    // the marker does not fit the budget: plain cut
    return {
      text: full.slice(0, maxChars),
      truncated: true,
      originalChars,
      omittedChars: originalChars - maxChars,
      maxChars,
    };
  }

  return { text, truncated: true, originalChars, omittedChars, maxChars };
}

function snapHead(head: string): string {
  const idx = head.lastIndexOf(PARAGRAPH_BREAK);
  return idx >= 0 && idx >= head.length * (1 - SNAP_WINDOW) ? head.slice(0, idx) : head;
}

function snapTail(tail: string): string {
  const idx = tail.indexOf(PARAGRAPH_BREAK);
  return idx >= 0 && idx <= tail.length * SNAP_WINDOW ? tail.slice(idx + PARAGRAPH_BREAK.length) : tail;
}
