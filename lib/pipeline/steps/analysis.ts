/**
 * Book Analysis Step
 *
 * Sends the bounded book text to the provider with the analysis prompt
 * and builds the planning table from its JSON answer.
 */

import type {
  AIGateway,
  BoundedText,
  PlanningTable,
  Result,
  TokenUsage,
  WordCountRange,
} from "../core/types";
import { err, ok } from "../core/types";
import { GatewayError } from "../core/errors";
import { planningTableWireSchema } from "../core/schemas";
import { loadPrompt } from "../core/llm";
import { planningTableFromWire } from "../planning/planning-table";

export interface AnalyzeBookInput {
  corpus: BoundedText;
  gateway: AIGateway;
  promptName: string;
  maxOutputTokens: number;
  timeoutMs: number;
  timeHorizon: string;
  wordCount: WordCountRange;
}

export interface PlanningOutput {
  table: PlanningTable;
  modelId: string;
  usage: TokenUsage;
}

export async function analyzeBook(
  input: AnalyzeBookInput
): Promise<Result<PlanningOutput, GatewayError>> {
  const { corpus, gateway, promptName } = input;

  if (!corpus.text.trim()) {
    return err(new GatewayError("InvalidRequest", "There is no book text to analyze"));
  }

  const prompt = await loadPrompt(promptName, {
    book_content: corpus.text,
    truncated: corpus.truncated,
    omitted_chars: corpus.omittedChars,
    time_horizon: input.timeHorizon,
    word_count: `${input.wordCount.min}-${input.wordCount.max}`,
  });

  const result = await gateway.generateStructured(prompt, planningTableWireSchema, {
    maxOutputTokens: input.maxOutputTokens,
    timeoutMs: input.timeoutMs,
    log: { taskType: "analysis", promptName },
  });
  if (!result.ok) return result;

  return ok({
    table: planningTableFromWire(result.value.value),
    modelId: result.value.modelId,
    usage: result.value.usage,
  });
}
