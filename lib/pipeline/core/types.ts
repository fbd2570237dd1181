/**
 * Core types for the foresight pipeline.
 *
 * These types define the data that flows between extraction, analysis,
 * generation and export. They are independent of the provider, the CLI
 * or any storage.
 */

import type { z } from "zod/v4";
import type { GatewayError } from "./errors";

// ============================================================================
// Result - expected failures are values, not exceptions
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// Book source - produced once per upload
// ============================================================================

export interface PageText {
  pageNumber: number; // 1-based
  text: string;
}

export interface PdfInfo {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
  creator?: string;
  producer?: string;
  format?: string;
}

export interface BookSource {
  id: string; // first 16 hex chars of sha256(bytes)
  fileName: string;
  pages: PageText[];
  pageCount: number;
  wordCount: number;
  charCount: number;
  pdfInfo: PdfInfo;
  warnings: string[];
}

export interface BoundedText {
  text: string;
  truncated: boolean;
  originalChars: number;
  omittedChars: number;
  maxChars: number;
}

// ============================================================================
// Planning table - domain shape (the provider speaks the snake_case wire
// shape in ./schemas)
// ============================================================================

export type GroupType = "GROUP" | "STANDALONE";

export interface BookOverview {
  title: string;
  scope: string;
  totalChapters: number;
  disciplines: string[];
  languages: string[];
}

export interface ChapterGroup {
  groupId: string;
  groupType: GroupType;
  chapterNumbers: number[];
  chapterTitles: string[];
  label: string;
  rationale: string;
  quadrants: string[];
}

export interface ForesightTask {
  groupId: string;
  brief: string;
}

export type CoverageWarning =
  | { kind: "duplicate-chapter"; chapter: number; groupIds: string[] }
  | { kind: "missing-chapter"; chapter: number }
  | { kind: "unknown-chapter"; chapter: number; groupId: string };

export interface PlanningTable {
  overview: BookOverview;
  groups: ChapterGroup[];
  quadrants: string[];
  tasks: ForesightTask[];
  implementationNotes: string | null;
  warnings: CoverageWarning[];
}

// ============================================================================
// Generation
// ============================================================================

export interface WordCountRange {
  min: number;
  max: number;
}

export interface GenerationRequest {
  groupId: string;
  timeHorizon: string;
  wordCount: WordCountRange;
  thematicFocus?: string;
}

export type AppendixStatus = { kind: "draft" } | { kind: "regenerated"; count: number };

export interface GeneratedAppendix {
  groupId: string;
  title: string;
  content: string;
  generatedAt: string; // ISO-8601
  wordCount: number;
  status: AppendixStatus;
  modelId: string;
  truncated: boolean;
}

// ============================================================================
// AI gateway - abstracted interface for provider calls
// ============================================================================

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface Message {
  role: "user" | "assistant";
  content: string;
}

export interface Prompt {
  system?: string;
  messages: Message[];
}

export interface CallOptions {
  maxOutputTokens: number;
  timeoutMs: number;
  temperature?: number;
  /** Logging context */
  log: {
    taskType: string;
    promptName: string;
  };
}

export interface GatewayResponse<T> {
  value: T;
  modelId: string;
  usage: TokenUsage;
  /** Provider stopped at the output token limit */
  truncated: boolean;
  attempts: number;
}

export interface AIGateway {
  generateStructured<T>(
    prompt: Prompt,
    schema: z.ZodType<T>,
    options: CallOptions
  ): Promise<Result<GatewayResponse<T>, GatewayError>>;
  generateText(
    prompt: Prompt,
    options: CallOptions
  ): Promise<Result<GatewayResponse<string>, GatewayError>>;
  /** One cheap call that succeeds only with a working credential */
  probe(prompt: Prompt, options: CallOptions): Promise<Result<string, GatewayError>>;
}
