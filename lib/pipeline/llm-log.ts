import fs from "node:fs";
import path from "node:path";
import type { Message, TokenUsage } from "./core/types";
import type { GatewayErrorKind } from "./core/errors";

export interface LlmLogEntry {
  timestamp: string;
  taskType: string;
  promptName: string;
  modelId: string;
  attempt: number;
  durationMs: number;
  fallback: boolean;
  usage?: TokenUsage;
  finishReason?: string;
  errorKind?: GatewayErrorKind;
  errorMessage?: string;
  system?: string;
  messages: LlmLogMessage[];
}

export interface LlmLogMessage {
  role: string;
  text: string;
  /** Length of the original text when it was clipped for the log */
  originalLength?: number;
}

export const MAX_LOG_ENTRIES = 250;
export const MAX_LOGGED_TEXT = 2000;

/**
 * Clip message bodies so a whole book never lands in the log.
 */
export function sanitizeMessages(messages: Message[]): LlmLogMessage[] {
  return messages.map((m) => {
    if (m.content.length <= MAX_LOGGED_TEXT) {
      return { role: m.role, text: m.content };
    }
    const omitted = m.content.length - MAX_LOGGED_TEXT;
    return {
      role: m.role,
      text: `${m.content.slice(0, MAX_LOGGED_TEXT)}\n[... ${omitted} characters not logged ...]`,
      originalLength: m.content.length,
    };
  });
}

/**
 * In-memory log of recent calls, keeping at most `capacity` entries
 * (oldest are dropped).
 */
export class LlmLog {
  private entries: LlmLogEntry[] = [];

  constructor(private readonly capacity = MAX_LOG_ENTRIES) {}

  add(entry: LlmLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries = this.entries.slice(this.entries.length - this.capacity);
    }
  }

  list(): readonly LlmLogEntry[] {
    return this.entries;
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Append a log entry to a JSONL file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LlmLogEntry): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  const content = fs.readFileSync(filePath, "utf-8");
  const lines = content.split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}
