/**
 * Pipeline Runner Module
 *
 * Provides the orchestration layer: the state machine, the session that
 * runs its effects, and progress tracking.
 */

export {
  type Progress,
  type ProgressEvent,
  type ProgressLevel,
  type PromptConfig,
  type SessionSettings,
  type StepName,
  nullProgress,
  createCallbackProgress,
  formatProgressEvent,
  formatStepName,
} from "./types";

export {
  initialState,
  stageLabel,
  transition,
  type Effect,
  type PipelineEvent,
  type PipelineState,
  type Stage,
  type StageName,
} from "./state";

export { ForesightSession, type ForesightSessionOptions, type GenerateOptions } from "./session";

export {
  createForesightSession,
  settingsFromConfig,
  type CreateForesightSessionOptions,
  type ForesightRuntime,
} from "./factory";
