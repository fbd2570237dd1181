/**
 * Session Factory
 *
 * Creates a fully configured ForesightSession from the loaded config.
 * This is the main entry point for setting up the pipeline.
 */

import type { AIGateway } from "../core/types";
import { createAIGateway, createProviderBackend, type LLMBackend } from "../core/llm";
import { retryPolicyFromConfig } from "../core/retry-policy";
import { errorMessage } from "../core/errors";
import { LlmLog, type LlmLogEntry } from "../llm-log";
import { ForesightSession } from "./session";
import { nullProgress, type Progress, type SessionSettings, type StepName } from "./types";
import type { AppConfig } from "@/lib/config";

// ============================================================================
// Factory options
// ============================================================================

export interface CreateForesightSessionOptions {
  config: AppConfig;
  apiKey: string;
  progress?: Progress;
  /** Replaces the provider backend, e.g. with a fake in tests */
  backend?: LLMBackend;
  /** Extra sink for each logged call, e.g. a JSONL file appender */
  onLog?: (entry: LlmLogEntry) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface ForesightRuntime {
  session: ForesightSession;
  gateway: AIGateway;
  log: LlmLog;
}

// ============================================================================
// Factory functions
// ============================================================================

export function settingsFromConfig(config: AppConfig): SessionSettings {
  return {
    prompts: { ...config.prompts },
    maxOutputTokens: { ...config.max_output_tokens },
    timeoutsMs: {
      analysis: config.timeouts.analysis_ms,
      generation: config.timeouts.generation_ms,
      probe: config.timeouts.probe_ms,
    },
    extraction: {
      maxBytes: config.extraction.max_bytes,
      warnBytes: config.extraction.warn_bytes,
      minTextChars: config.extraction.min_text_chars,
    },
    truncation: {
      maxChars: config.truncation.max_chars,
      headFraction: config.truncation.head_fraction,
      tailFraction: config.truncation.tail_fraction,
    },
    generation: {
      timeHorizon: config.generation.time_horizon,
      wordCount: { ...config.generation.word_count },
    },
    attribution: config.export.attribution,
  };
}

/**
 * Create a session wired to the configured provider.
 *
 * Every provider call is kept in an in-memory LlmLog; retries and model
 * fallbacks are reported through `progress`.
 */
export function createForesightSession(options: CreateForesightSessionOptions): ForesightRuntime {
  const { config, apiKey, progress = nullProgress } = options;
  const log = new LlmLog();

  const gateway = createAIGateway({
    backend: options.backend ?? createProviderBackend(config.provider, apiKey),
    model: config.model,
    fallbackModel: config.fallback_model,
    temperature: config.temperature,
    retryPolicy: retryPolicyFromConfig(config.retry),
    sleep: options.sleep,
    onRetry: (event) => progress.emit({ type: "retry", ...event }),
    onLog: (entry) => {
      log.add(entry);
      if (!options.onLog) return;
      try {
        options.onLog(entry);
      } catch (e) {
        // Don't fail the pipeline on logging errors
        progress.emit({
          type: "warning",
          step: stepFor(entry.taskType),
          message: `Could not write LLM log: ${errorMessage(e)}`,
        });
      }
    },
  });

  const session = new ForesightSession({
    gateway,
    settings: settingsFromConfig(config),
    progress,
    now: options.now,
  });

  return { session, gateway, log };
}

function stepFor(taskType: string): StepName {
  switch (taskType) {
    case "probe":
      return "credential";
    case "edit":
      return "edit";
    case "generation":
      return "generate";
    default:
      return "analyze";
  }
}
