/**
 * AI gateway.
 *
 * Wraps the Vercel AI SDK behind the AIGateway interface:
 * - Classifies provider failures into GatewayError kinds
 * - Retries per the declarative policy table, budgeted per kind
 * - Falls back once to a second model when the first is unavailable
 * - Validates structured responses with zod
 * - Logs every attempt
 */

import {
  APICallError,
  LoadAPIKeyError,
  NoSuchModelError,
  RetryError,
  generateText,
  type LanguageModel,
  type ModelMessage,
} from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import type { z } from "zod/v4";
import type {
  AIGateway,
  CallOptions,
  GatewayResponse,
  Message,
  Prompt,
  Result,
  TokenUsage,
} from "./types";
import { err, ok } from "./types";
import { GatewayError, errorMessage, type GatewayErrorKind } from "./errors";
import { DEFAULT_RETRY_POLICY, RetryBudget, type RetryPolicy } from "./retry-policy";
import { parseJsonFromModelText } from "./json";
import { renderPrompt } from "../prompt";
import { sanitizeMessages, type LlmLogEntry } from "../llm-log";

// ============================================================================
// Provider backend
// ============================================================================

export type LLMProvider = "openai" | "anthropic" | "google";

export interface BackendRequest {
  modelId: string;
  system?: string;
  messages: Message[];
  temperature?: number;
  maxOutputTokens: number;
  abortSignal: AbortSignal;
}

export interface BackendResponse {
  text: string;
  finishReason: string;
  usage: TokenUsage;
}

/** A single provider round trip. Throws on failure; the gateway classifies. */
export type LLMBackend = (request: BackendRequest) => Promise<BackendResponse>;

const PROVIDER_FACTORIES: Record<LLMProvider, (apiKey: string) => (modelId: string) => LanguageModel> = {
  openai: (apiKey) => createOpenAI({ apiKey }),
  anthropic: (apiKey) => createAnthropic({ apiKey }),
  google: (apiKey) => createGoogleGenerativeAI({ apiKey }),
};

/**
 * Backend that talks to a real provider through `generateText`.
 * SDK-level retries are off: the gateway owns the retry policy.
 */
export function createProviderBackend(provider: LLMProvider, apiKey: string): LLMBackend {
  const resolve = PROVIDER_FACTORIES[provider](apiKey);
  return async (request) => {
    const result = await generateText({
      model: resolve(request.modelId),
      system: request.system,
      messages: toModelMessages(request.messages),
      temperature: request.temperature,
      maxOutputTokens: request.maxOutputTokens,
      maxRetries: 0,
      abortSignal: request.abortSignal,
    });
    return {
      text: result.text,
      finishReason: result.finishReason,
      usage: {
        inputTokens: result.usage.inputTokens ?? 0,
        outputTokens: result.usage.outputTokens ?? 0,
      },
    };
  };
}

function toModelMessages(messages: Message[]): ModelMessage[] {
  return messages.map(
    (m): ModelMessage =>
      m.role === "user" ? { role: "user", content: m.content } : { role: "assistant", content: m.content }
  );
}

// ============================================================================
// Error classification
// ============================================================================

const API_KEY_PATTERN = /api[ _-]?key|credential|unauthori[sz]ed|permission/i;
// Google reports every 429 as "Quota exceeded"; only daily or billing limits
// are exhausted quota, per-minute ones are rate limits.
const QUOTA_PATTERN = /per ?day|daily|billing|insufficient[_ ]quota|insufficient[_ ]funds|credit balance/i;
const NETWORK_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"]);

/**
 * Map anything thrown by a backend call onto a GatewayError kind.
 */
export function classifyProviderError(
  error: unknown,
  context: { modelId: string; timeoutMs?: number }
): GatewayError {
  if (error instanceof GatewayError) return error;

  if (RetryError.isInstance(error)) {
    return classifyProviderError(error.lastError, context);
  }

  if (APICallError.isInstance(error)) {
    const text = `${error.message} ${error.responseBody ?? ""}`;
    const details = { modelId: context.modelId, statusCode: error.statusCode };
    const make = (kind: GatewayErrorKind) =>
      new GatewayError(kind, `${context.modelId}: ${error.message}`, { details, cause: error });

    switch (error.statusCode) {
      case undefined:
        return make("TransientNetwork");
      case 400:
        return make(API_KEY_PATTERN.test(text) ? "InvalidCredential" : "InvalidRequest");
      case 401:
      case 403:
        return make("InvalidCredential");
      case 402:
        return make("QuotaExceeded");
      case 404:
        return make("ModelUnavailable");
      case 408:
        return make("TransientNetwork");
      case 429:
        return make(QUOTA_PATTERN.test(text) ? "QuotaExceeded" : "RateLimited");
      case 503:
        return make("ModelUnavailable");
      default:
        return make((error.statusCode ?? 0) >= 500 ? "TransientNetwork" : "InvalidRequest");
    }
  }

  if (LoadAPIKeyError.isInstance(error)) {
    return new GatewayError("InvalidCredential", error.message, { cause: error });
  }

  if (NoSuchModelError.isInstance(error)) {
    return new GatewayError("ModelUnavailable", error.message, {
      details: { modelId: context.modelId },
      cause: error,
    });
  }

  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new GatewayError(
      "TransientNetwork",
      `${context.modelId}: no response within ${context.timeoutMs ?? "?"} ms`,
      { details: { modelId: context.modelId, timeoutMs: context.timeoutMs, timeout: true }, cause: error }
    );
  }

  if (isNetworkError(error)) {
    return new GatewayError("TransientNetwork", `${context.modelId}: ${errorMessage(error)}`, {
      details: { modelId: context.modelId },
      cause: error,
    });
  }

  return new GatewayError("InvalidRequest", `${context.modelId}: ${errorMessage(error)}`, {
    details: { modelId: context.modelId, unclassified: true },
    cause: error,
  });
}

function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ("code" in error && typeof error.code === "string" && NETWORK_CODES.has(error.code)) return true;
  if (error instanceof TypeError && /fetch failed|network/i.test(error.message)) return true;
  return error.cause !== undefined && error.cause !== error && isNetworkError(error.cause);
}

// ============================================================================
// Gateway
// ============================================================================

export interface RetryEvent {
  taskType: string;
  kind: GatewayErrorKind;
  /** 1-based retry number within the kind's budget; 0 for a model fallback */
  retryNumber: number;
  delayMs: number;
  modelId: string;
  fallback: boolean;
}

export interface CreateAIGatewayOptions {
  backend: LLMBackend;
  model: string;
  fallbackModel?: string;
  temperature: number;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  onLog?: (entry: LlmLogEntry) => void;
  onRetry?: (event: RetryEvent) => void;
}

type ParseOutcome<T> = Result<{ value: T; truncated: boolean }, GatewayError>;

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Create the AIGateway used by every pipeline step.
 */
export function createAIGateway(options: CreateAIGatewayOptions): AIGateway {
  const policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const sleep = options.sleep ?? defaultSleep;

  async function call<T>(
    prompt: Prompt,
    callOptions: CallOptions,
    parse: (response: BackendResponse) => ParseOutcome<T>
  ): Promise<Result<GatewayResponse<T>, GatewayError>> {
    const budget = new RetryBudget(policy);
    const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    let modelId = options.model;
    let fallback = false;
    let attempt = 0;

    for (;;) {
      attempt++;
      const t0 = Date.now();
      let response: BackendResponse | undefined;
      let outcome: ParseOutcome<T>;

      try {
        response = await options.backend({
          modelId,
          system: prompt.system,
          messages: prompt.messages,
          temperature: callOptions.temperature ?? options.temperature,
          maxOutputTokens: callOptions.maxOutputTokens,
          abortSignal: AbortSignal.timeout(callOptions.timeoutMs),
        });
        usage.inputTokens += response.usage.inputTokens;
        usage.outputTokens += response.usage.outputTokens;
        outcome = parse(response);
      } catch (e) {
        outcome = err(classifyProviderError(e, { modelId, timeoutMs: callOptions.timeoutMs }));
      }

      options.onLog?.({
        timestamp: new Date().toISOString(),
        taskType: callOptions.log.taskType,
        promptName: callOptions.log.promptName,
        modelId,
        attempt,
        durationMs: Date.now() - t0,
        fallback,
        usage: response?.usage,
        finishReason: response?.finishReason,
        errorKind: outcome.ok ? undefined : outcome.error.kind,
        errorMessage: outcome.ok ? undefined : outcome.error.message,
        system: prompt.system,
        messages: sanitizeMessages(prompt.messages),
      });

      if (outcome.ok) {
        return ok({
          value: outcome.value.value,
          modelId,
          usage,
          truncated: outcome.value.truncated,
          attempts: attempt,
        });
      }

      const error = outcome.error;

      if (
        error.kind === "ModelUnavailable" &&
        !fallback &&
        options.fallbackModel &&
        options.fallbackModel !== modelId
      ) {
        fallback = true;
        modelId = options.fallbackModel;
        options.onRetry?.({
          taskType: callOptions.log.taskType,
          kind: error.kind,
          retryNumber: 0,
          delayMs: 0,
          modelId,
          fallback: true,
        });
        continue;
      }

      const decision = error.retryable ? budget.next(error.kind) : { retry: false as const };
      if (!decision.retry) {
        return err(error);
      }

      options.onRetry?.({
        taskType: callOptions.log.taskType,
        kind: error.kind,
        retryNumber: decision.retryNumber,
        delayMs: decision.delayMs,
        modelId,
        fallback,
      });
      if (decision.delayMs > 0) await sleep(decision.delayMs);
    }
  }

  return {
    generateStructured<T>(prompt: Prompt, schema: z.ZodType<T>, callOptions: CallOptions) {
      return call(prompt, callOptions, (response) => parseStructured(response, schema, callOptions));
    },

    generateText(prompt: Prompt, callOptions: CallOptions) {
      return call(prompt, callOptions, parseText);
    },

    probe(prompt: Prompt, callOptions: CallOptions) {
      return call(prompt, callOptions, (response) => ok({ value: response.text.trim(), truncated: false })).then(
        (result) => (result.ok ? ok(result.value.value) : result)
      );
    },
  };
}

function parseStructured<T>(
  response: BackendResponse,
  schema: z.ZodType<T>,
  callOptions: CallOptions
): ParseOutcome<T> {
  if (response.finishReason === "length") {
    return err(
      new GatewayError(
        "MalformedResponse",
        `Response was cut off at the output limit of ${callOptions.maxOutputTokens} tokens`,
        {
          details: { truncated: true, maxOutputTokens: callOptions.maxOutputTokens },
          remediation: `Raise max_output_tokens.${callOptions.log.taskType} in the config and try again.`,
          retryable: false,
        }
      )
    );
  }

  let raw: unknown;
  try {
    raw = parseJsonFromModelText(response.text);
  } catch (e) {
    return err(
      new GatewayError("MalformedResponse", errorMessage(e), {
        details: { preview: response.text.slice(0, 500) },
      })
    );
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`
    );
    return err(
      new GatewayError("MalformedResponse", `Response did not match the expected shape: ${issues[0]}`, {
        details: { issues },
      })
    );
  }
  return ok({ value: parsed.data, truncated: false });
}

function parseText(response: BackendResponse): ParseOutcome<string> {
  if (response.finishReason === "content-filter") {
    return err(
      new GatewayError("InvalidRequest", "The provider blocked the response with its content filter", {
        details: { finishReason: response.finishReason },
      })
    );
  }
  const text = response.text.trim();
  if (!text) {
    return err(
      new GatewayError("MalformedResponse", "Model returned an empty response.", {
        details: { finishReason: response.finishReason },
      })
    );
  }
  return ok({ value: text, truncated: response.finishReason === "length" });
}

// ============================================================================
// Prompt loading helper
// ============================================================================

/**
 * Load and render a Liquid prompt template into a gateway Prompt.
 */
export async function loadPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<Prompt> {
  const promptMessages = await renderPrompt(templateName, context);
  const system = promptMessages
    .filter((m) => m.role === "system")
    .map((m) => m.content)
    .join("\n\n");

  const messages: Message[] = [];
  for (const m of promptMessages) {
    if (m.role === "user" || m.role === "assistant") {
      messages.push({ role: m.role, content: m.content });
    }
  }

  return { system: system || undefined, messages };
}
