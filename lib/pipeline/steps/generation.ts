/**
 * Appendix Generation Step
 *
 * Generates the long-form foresight appendix for one chapter group.
 */

import type {
  AIGateway,
  AppendixStatus,
  BoundedText,
  ChapterGroup,
  GeneratedAppendix,
  GenerationRequest,
  PlanningTable,
  Result,
} from "../core/types";
import { ok } from "../core/types";
import type { GatewayError } from "../core/errors";
import { loadPrompt } from "../core/llm";
import { chapterEntryToWire } from "../planning/planning-table";
import { countWords } from "./extract";

export const DEFAULT_TIME_HORIZON = "2040-2050";
export const DEFAULT_WORD_COUNT = { min: 2500, max: 3500 };

export interface GenerateAppendixInput {
  table: PlanningTable;
  group: ChapterGroup;
  request: GenerationRequest;
  corpus: BoundedText;
  /** Successful generations already done for this group */
  previousGenerations: number;
  gateway: AIGateway;
  promptName: string;
  maxOutputTokens: number;
  timeoutMs: number;
  now?: () => Date;
}

export function appendixTitle(groupId: string): string {
  return `Appendix - ${groupId}`;
}

export function appendixStatus(previousGenerations: number): AppendixStatus {
  return previousGenerations === 0
    ? { kind: "draft" }
    : { kind: "regenerated", count: previousGenerations };
}

export async function generateAppendix(
  input: GenerateAppendixInput
): Promise<Result<GeneratedAppendix, GatewayError>> {
  const { table, group, request, corpus, gateway, promptName } = input;
  const now = input.now ?? (() => new Date());

  const prompt = await loadPrompt(promptName, {
    group_id: group.groupId,
    chapter_info_json: JSON.stringify(chapterEntryToWire(table, group), null, 2),
    book_content: corpus.text,
    time_horizon: request.timeHorizon,
    word_count_min: request.wordCount.min,
    word_count_max: request.wordCount.max,
    thematic_focus: request.thematicFocus?.trim() || null,
  });

  const result = await gateway.generateText(prompt, {
    maxOutputTokens: input.maxOutputTokens,
    timeoutMs: input.timeoutMs,
    log: { taskType: "generation", promptName },
  });
  if (!result.ok) return result;

  const content = result.value.value;
  return ok({
    groupId: group.groupId,
    title: appendixTitle(group.groupId),
    content,
    generatedAt: now().toISOString(),
    wordCount: countWords(content),
    status: appendixStatus(input.previousGenerations),
    modelId: result.value.modelId,
    truncated: result.value.truncated,
  });
}
