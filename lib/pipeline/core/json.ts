/**
 * Pull a JSON value out of free-form model text.
 *
 * Tries, in order: a ```json fenced block, the whole text, the outermost
 * `{...}` span. Each candidate is parsed as-is first and then with
 * trailing commas removed. Throws when nothing parses.
 */
export function parseJsonFromModelText(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("Model returned an empty response.");
  }

  const candidates = [
    extractFencedJson(trimmed),
    trimmed,
    extractDelimitedJson(trimmed, "{", "}"),
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    const parsed = tryParse(candidate) ?? tryParse(stripTrailingCommas(candidate));
    if (parsed) return parsed.value;
  }

  throw new Error("Model response did not contain valid JSON.");
}

function tryParse(text: string): { value: unknown } | null {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return null;
  }
}

export function stripTrailingCommas(text: string): string {
  return text.replace(/,(\s*[}\]])/g, "$1");
}

function extractFencedJson(text: string): string | null {
  const match = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return match?.[1]?.trim() || null;
}

function extractDelimitedJson(text: string, start: string, end: string): string | null {
  const startIndex = text.indexOf(start);
  const endIndex = text.lastIndexOf(end);
  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    return null;
  }
  return text.slice(startIndex, endIndex + 1);
}
