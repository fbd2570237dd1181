/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pipeline steps and
 * the infrastructure around them (progress emission, settings).
 */

import type { ExtractionLimits } from "../steps";
import type { WordCountRange } from "../core/types";
import type { GatewayErrorKind, ErrorKind } from "../core/errors";

// ============================================================================
// Progress Interface
// ============================================================================

export type StepName = "credential" | "extract" | "analyze" | "edit" | "generate" | "export";

export type ProgressEvent =
  | { type: "step-start"; step: StepName; groupId?: string }
  | { type: "step-progress"; step: StepName; message: string; page?: number; totalPages?: number }
  | { type: "step-complete"; step: StepName; groupId?: string }
  | { type: "step-error"; step: StepName; kind: ErrorKind; error: string; remediation: string }
  | {
      type: "retry";
      taskType: string;
      kind: GatewayErrorKind;
      retryNumber: number;
      delayMs: number;
      modelId: string;
      fallback: boolean;
    }
  | { type: "warning"; step: StepName; message: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, drive a spinner, update a UI, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

export type ProgressLevel = "info" | "warn" | "error";

/**
 * Callback-based progress emitter: one human-readable line per event.
 */
export function createCallbackProgress(
  callback: (message: string, level: ProgressLevel) => void
): Progress {
  return {
    emit(event) {
      callback(formatProgressEvent(event), levelOf(event));
    },
  };
}

function levelOf(event: ProgressEvent): ProgressLevel {
  switch (event.type) {
    case "step-error":
      return "error";
    case "retry":
    case "warning":
      return "warn";
    default:
      return "info";
  }
}

export function formatProgressEvent(event: ProgressEvent): string {
  switch (event.type) {
    case "step-start":
      return `Starting ${formatStepName(event.step)}${event.groupId ? ` for ${event.groupId}` : ""}...`;
    case "step-progress":
      return event.page !== undefined && event.totalPages !== undefined
        ? `${formatStepName(event.step)}: ${event.message} (${event.page}/${event.totalPages})`
        : `${formatStepName(event.step)}: ${event.message}`;
    case "step-complete":
      return `Completed ${formatStepName(event.step)}${event.groupId ? ` for ${event.groupId}` : ""}`;
    case "step-error":
      return `Error in ${formatStepName(event.step)} (${event.kind}): ${event.error}\n  ${event.remediation}`;
    case "retry":
      return event.fallback
        ? `${event.kind}: switching ${event.taskType} to fallback model ${event.modelId}`
        : `${event.kind}: retrying ${event.taskType} (retry ${event.retryNumber}) in ${(event.delayMs / 1000).toFixed(1)}s`;
    case "warning":
      return `Warning (${formatStepName(event.step)}): ${event.message}`;
  }
}

export function formatStepName(step: StepName): string {
  switch (step) {
    case "credential":
      return "credential check";
    case "extract":
      return "text extraction";
    case "analyze":
      return "book analysis";
    case "edit":
      return "planning edit";
    case "generate":
      return "appendix generation";
    case "export":
      return "export";
  }
}

// ============================================================================
// Session settings
// ============================================================================

/**
 * Prompt template names for each provider call.
 */
export interface PromptConfig {
  analysis: string;
  edit: string;
  generation: string;
  probe: string;
}

export interface CallBudget {
  analysis: number;
  generation: number;
  probe: number;
}

export interface SessionSettings {
  prompts: PromptConfig;
  maxOutputTokens: CallBudget;
  timeoutsMs: CallBudget;
  extraction: ExtractionLimits;
  truncation: { maxChars: number; headFraction: number; tailFraction: number };
  generation: { timeHorizon: string; wordCount: WordCountRange };
  attribution: string;
}
