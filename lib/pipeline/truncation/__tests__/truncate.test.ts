import { describe, it, expect } from "vitest";
import { renderPages, truncate, truncateText, truncationMarker } from "../truncate";

describe("truncateText", () => {
  it("returns text within the budget unchanged", () => {
    expect(truncateText("short book", 100)).toEqual({
      text: "short book",
      truncated: false,
      originalChars: 10,
      omittedChars: 0,
      maxChars: 100,
    });
  });

  it("keeps the first 40% and last 20% of a long book with a marker between", () => {
    const full = "a".repeat(1_000_000);
    const result = truncateText(full, 100_000);
    const marker = truncationMarker(940_000);

    expect(marker).toBe("[... CONTENT TRUNCATED: 940000 characters omitted ...]");
    expect(result.truncated).toBe(true);
    expect(result.originalChars).toBe(1_000_000);
    expect(result.omittedChars).toBe(940_000);
    expect(result.text).toBe(`${"a".repeat(40_000)}\n\n${marker}\n\n${"a".repeat(20_000)}`);
    expect(result.text.length).toBeLessThanOrEqual(100_000);
  });

  it("snaps the cuts to nearby paragraph breaks", () => {
    const full = `${"A".repeat(350)}\n\n${"B".repeat(2000)}\n\n${"C".repeat(180)}`;
    const result = truncateText(full, 1000);

    expect(result.omittedChars).toBe(2004);
    expect(result.text).toBe(`${"A".repeat(350)}\n\n${truncationMarker(2004)}\n\n${"C".repeat(180)}`);
  });

  it("gives the same result for the same input", () => {
    const full = `${"A".repeat(3000)}\n\n${"B".repeat(3000)}`;
    expect(truncateText(full, 1000)).toEqual(truncateText(full, 1000));
  });

  it("leaves its own output unchanged", () => {
    const once = truncateText("x".repeat(5000), 1000);
    const twice = truncateText(once.text, 1000);
    expect(twice.text).toBe(once.text);
    expect(twice.truncated).toBe(false);
  });

  it("stays within every budget and split", () => {
    const full = Array.from({ length: 400 }, (_, i) => `Paragraph ${i} ${"word ".repeat(i % 17)}`).join("\n\n");
    const splits: Array<[number, number]> = [
      [0.4, 0.2],
      [0.5, 0.5],
      [0.3, 0.1],
      [0.9, 0],
    ];
    for (const maxChars of [30, 80, 200, 1000, 5000]) {
      for (const [headFraction, tailFraction] of splits) {
        const result = truncateText(full, maxChars, { headFraction, tailFraction });
        expect(result.text.length).toBeLessThanOrEqual(maxChars);
        expect(result.truncated).toBe(true);
        expect(result.originalChars).toBe(full.length);
      }
    }
  });

  it("falls back to a plain cut when the marker does not fit", () => {
    const result = truncateText("x".repeat(100), 20);
    expect(result).toEqual({
      text: "x".repeat(20),
      truncated: true,
      originalChars: 100,
      omittedChars: 80,
      maxChars: 20,
    });
  });

  it("returns empty text for a zero budget", () => {
    expect(truncateText("abc", 0)).toEqual({
      text: "",
      truncated: true,
      originalChars: 3,
      omittedChars: 3,
      maxChars: 0,
    });
    expect(truncateText("", 0).truncated).toBe(false);
  });

  it("honors custom head and tail fractions", () => {
    const result = truncateText("x".repeat(10_000), 1000, { headFraction: 0.5, tailFraction: 0.1 });
    expect(result.omittedChars).toBe(10_000 - 500 - 100);
    expect(result.text.startsWith(`${"x".repeat(500)}\n\n[...`)).toBe(true);
    expect(result.text.endsWith(`...]\n\n${"x".repeat(100)}`)).toBe(true);
  });
});

describe("truncate", () => {
  it("renders pages as labelled blocks", () => {
    const pages = [
      { pageNumber: 1, text: "Alpha" },
      { pageNumber: 2, text: "Beta" },
    ];
    expect(renderPages(pages)).toBe("[Page 1]\nAlpha\n\n[Page 2]\nBeta");
    expect(truncate(pages, 1000).text).toBe("[Page 1]\nAlpha\n\n[Page 2]\nBeta");
  });

  it("gives equal results for the same pages", () => {
    const pages = Array.from({ length: 30 }, (_, i) => ({ pageNumber: i + 1, text: `Page body ${i}. `.repeat(20) }));
    const first = truncate(pages, 2000, { headFraction: 0.5, tailFraction: 0.3 });
    const second = truncate(pages, 2000, { headFraction: 0.5, tailFraction: 0.3 });
    expect(second).toEqual(first);
    expect(first.truncated).toBe(true);
  });
});
