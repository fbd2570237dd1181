/**
 * Pipeline step functions.
 *
 * Each step:
 * - Takes typed inputs
 * - Returns a Result instead of throwing for expected failures
 * - Has no side effects beyond the provider call
 * - Receives the AI gateway as a parameter (if needed)
 *
 * Exception: extractBook reads from a byte buffer through mupdf.
 */

export {
  extractBook,
  bookIdFromBytes,
  countWords,
  DEFAULT_EXTRACTION_LIMITS,
  type ExtractBookInput,
  type ExtractionLimits,
} from "./extract";

export { validateCredential, type ValidateCredentialInput } from "./credential";

export { analyzeBook, type AnalyzeBookInput, type PlanningOutput } from "./analysis";

export { requestPlanningEdit, type RequestPlanningEditInput } from "./planning-edit";

export {
  generateAppendix,
  appendixTitle,
  appendixStatus,
  DEFAULT_TIME_HORIZON,
  DEFAULT_WORD_COUNT,
  type GenerateAppendixInput,
} from "./generation";
