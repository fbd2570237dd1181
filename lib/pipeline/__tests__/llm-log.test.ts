import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { LlmLog, MAX_LOG_ENTRIES, MAX_LOGGED_TEXT, appendLogEntry, sanitizeMessages, type LlmLogEntry } from "../llm-log";

function entry(attempt: number): LlmLogEntry {
  return {
    timestamp: "2026-03-01T12:00:00.000Z",
    taskType: "analysis",
    promptName: "book_analysis",
    modelId: "gemini-2.5-pro",
    attempt,
    durationMs: 10,
    fallback: false,
    messages: [],
  };
}

describe("sanitizeMessages", () => {
  it("keeps short messages as they are", () => {
    expect(sanitizeMessages([{ role: "user", content: "hello" }])).toEqual([{ role: "user", text: "hello" }]);
  });

  it("clips long messages and records the original length", () => {
    const content = "x".repeat(MAX_LOGGED_TEXT + 500);
    const [logged] = sanitizeMessages([{ role: "user", content }]);

    expect(logged.text).toBe(`${"x".repeat(MAX_LOGGED_TEXT)}\n[... 500 characters not logged ...]`);
    expect(logged.originalLength).toBe(2500);
  });
});

describe("LlmLog", () => {
  it("drops the oldest entries past its capacity", () => {
    const log = new LlmLog(2);
    log.add(entry(1));
    log.add(entry(2));
    log.add(entry(3));
    expect(log.list().map((e) => e.attempt)).toEqual([2, 3]);

    log.clear();
    expect(log.list()).toEqual([]);
  });
});

describe("appendLogEntry", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "foresight-log-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends JSON lines, creating the directory", () => {
    const file = path.join(dir, "nested", "calls.jsonl");
    appendLogEntry(file, entry(1));
    appendLogEntry(file, entry(2));

    const lines = fs.readFileSync(file, "utf-8").trimEnd().split("\n");
    expect(lines.map((l) => JSON.parse(l).attempt)).toEqual([1, 2]);
  });

  it("keeps only the most recent entries", () => {
    const file = path.join(dir, "calls.jsonl");
    for (let i = 1; i <= MAX_LOG_ENTRIES + 3; i++) appendLogEntry(file, entry(i));

    const lines = fs.readFileSync(file, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(MAX_LOG_ENTRIES);
    expect(JSON.parse(lines[0]).attempt).toBe(4);
  });
});
