import { describe, it, expect, vi } from "vitest";
import { APICallError, LoadAPIKeyError, NoSuchModelError, RetryError } from "ai";
import { z } from "zod/v4";
import {
  classifyProviderError,
  createAIGateway,
  loadPrompt,
  type BackendRequest,
  type BackendResponse,
  type RetryEvent,
} from "../llm";
import type { CallOptions, Prompt } from "../types";
import type { GatewayErrorKind } from "../errors";
import type { LlmLogEntry } from "../../llm-log";

const PROMPT: Prompt = { system: "Answer in JSON.", messages: [{ role: "user", content: "What is the answer?" }] };

const OPTIONS: CallOptions = {
  maxOutputTokens: 100,
  timeoutMs: 1000,
  log: { taskType: "analysis", promptName: "book_analysis" },
};

const answerSchema = z.object({ answer: z.number() });

function response(text: string, finishReason = "stop"): BackendResponse {
  return { text, finishReason, usage: { inputTokens: 10, outputTokens: 5 } };
}

function apiError(statusCode: number | undefined, message = "request failed"): APICallError {
  return new APICallError({ message, url: "https://provider.test/v1", requestBodyValues: {}, statusCode });
}

function scriptedBackend(steps: Array<BackendResponse | Error>) {
  const queue = [...steps];
  return vi.fn(async (_request: BackendRequest): Promise<BackendResponse> => {
    const next = queue.shift();
    if (!next) throw new Error("backend called too many times");
    if (next instanceof Error) throw next;
    return next;
  });
}

function setup(steps: Array<BackendResponse | Error>, fallbackModel?: string) {
  const backend = scriptedBackend(steps);
  const sleep = vi.fn(async (_ms: number) => {});
  const retries: RetryEvent[] = [];
  const logs: LlmLogEntry[] = [];
  const gateway = createAIGateway({
    backend,
    model: "model-a",
    fallbackModel,
    temperature: 0.7,
    sleep,
    onRetry: (event) => retries.push(event),
    onLog: (entry) => logs.push(entry),
  });
  return { gateway, backend, sleep, retries, logs };
}

describe("createAIGateway", () => {
  describe("generateStructured", () => {
    it("parses and validates a JSON response", async () => {
      const { gateway, backend } = setup([response('```json\n{"answer": 42}\n```')]);
      const result = await gateway.generateStructured(PROMPT, answerSchema, OPTIONS);

      expect(result).toEqual({
        ok: true,
        value: {
          value: { answer: 42 },
          modelId: "model-a",
          usage: { inputTokens: 10, outputTokens: 5 },
          truncated: false,
          attempts: 1,
        },
      });
      const request = backend.mock.calls[0][0];
      expect(request.modelId).toBe("model-a");
      expect(request.system).toBe("Answer in JSON.");
      expect(request.messages).toEqual(PROMPT.messages);
      expect(request.temperature).toBe(0.7);
      expect(request.maxOutputTokens).toBe(100);
    });

    it("lets the call override the temperature", async () => {
      const { gateway, backend } = setup([response('{"answer": 1}')]);
      await gateway.generateStructured(PROMPT, answerSchema, { ...OPTIONS, temperature: 0 });
      expect(backend.mock.calls[0][0].temperature).toBe(0);
    });

    it("retries a malformed response once, then succeeds", async () => {
      const { gateway, backend, sleep } = setup([response("not json"), response('{"answer": 7}')]);
      const result = await gateway.generateStructured(PROMPT, answerSchema, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(2);
      expect(sleep).not.toHaveBeenCalled();
      expect(result.ok && result.value.value).toEqual({ answer: 7 });
      expect(result.ok && result.value.usage).toEqual({ inputTokens: 20, outputTokens: 10 });
      expect(result.ok && result.value.attempts).toBe(2);
    });

    it("surfaces MalformedResponse when the retry is malformed too", async () => {
      const { gateway, backend } = setup([response('{"answer": "x"}'), response('{"answer": "y"}')]);
      const result = await gateway.generateStructured(PROMPT, answerSchema, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(2);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("MalformedResponse");
      expect(result.error.message).toMatch(/^Response did not match the expected shape: answer: /);
    });

    it("does not retry a response cut off at the output limit", async () => {
      const { gateway, backend } = setup([response('{"answer": ', "length")]);
      const result = await gateway.generateStructured(PROMPT, answerSchema, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(1);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("MalformedResponse");
      expect(result.error.retryable).toBe(false);
      expect(result.error.details).toEqual({ truncated: true, maxOutputTokens: 100 });
      expect(result.error.remediation).toBe("Raise max_output_tokens.analysis in the config and try again.");
    });
  });

  describe("retries", () => {
    it("retries RateLimited three times with exponential backoff, then surfaces it", async () => {
      const { gateway, backend, sleep, retries } = setup([
        apiError(429),
        apiError(429),
        apiError(429),
        apiError(429),
      ]);
      const result = await gateway.generateText(PROMPT, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(4);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000, 8000]);
      expect(retries.map((r) => r.retryNumber)).toEqual([1, 2, 3]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("RateLimited");
      expect(result.error.message).toBe("model-a: request failed");
    });

    it("retries a per-minute quota 429 as a rate limit", async () => {
      const perMinute = apiError(
        429,
        "Quota exceeded for metric: generate_content_free_tier_requests, quotaId: GenerateRequestsPerMinutePerProjectPerModel-FreeTier. Please retry in 12s."
      );
      const { gateway, backend } = setup([perMinute, perMinute, response("Hello")]);
      const result = await gateway.generateText(PROMPT, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(3);
      expect(result.ok && result.value.value).toBe("Hello");
    });

    it("recovers when a retry succeeds", async () => {
      const { gateway, sleep } = setup([apiError(502), response("Hello")]);
      const result = await gateway.generateText(PROMPT, OPTIONS);

      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
      expect(result).toEqual({
        ok: true,
        value: {
          value: "Hello",
          modelId: "model-a",
          usage: { inputTokens: 10, outputTokens: 5 },
          truncated: false,
          attempts: 2,
        },
      });
    });

    it("does not retry an exhausted quota", async () => {
      const { gateway, backend, sleep } = setup([apiError(429, "You exceeded your current quota")]);
      const result = await gateway.generateText(PROMPT, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
      expect(!result.ok && result.error.kind).toBe("QuotaExceeded");
    });

    it("does not retry an invalid credential", async () => {
      const { gateway, backend } = setup([apiError(401, "Unauthorized")]);
      const result = await gateway.probe(PROMPT, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(1);
      expect(!result.ok && result.error.kind).toBe("InvalidCredential");
    });

    it("classifies a timeout as TransientNetwork and retries it", async () => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      const { gateway, backend, sleep } = setup([timeout, timeout, timeout, timeout]);
      const result = await gateway.generateText(PROMPT, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(4);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("TransientNetwork");
      expect(result.error.message).toBe("model-a: no response within 1000 ms");
      expect(result.error.details).toEqual({ modelId: "model-a", timeoutMs: 1000, timeout: true });
    });
  });

  describe("model fallback", () => {
    it("switches once to the fallback model when the model is unavailable", async () => {
      const { gateway, backend, sleep, retries } = setup([apiError(404), response("Hi")], "model-b");
      const result = await gateway.generateText(PROMPT, OPTIONS);

      expect(backend.mock.calls.map(([request]) => request.modelId)).toEqual(["model-a", "model-b"]);
      expect(sleep).not.toHaveBeenCalled();
      expect(retries).toEqual([
        { taskType: "analysis", kind: "ModelUnavailable", retryNumber: 0, delayMs: 0, modelId: "model-b", fallback: true },
      ]);
      expect(result.ok && result.value.modelId).toBe("model-b");
    });

    it("surfaces ModelUnavailable when the fallback is unavailable too", async () => {
      const { gateway, backend } = setup([apiError(404), apiError(503)], "model-b");
      const result = await gateway.generateText(PROMPT, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(2);
      expect(!result.ok && result.error.kind).toBe("ModelUnavailable");
    });

    it("surfaces ModelUnavailable without a fallback model", async () => {
      const { gateway, backend } = setup([apiError(404)]);
      const result = await gateway.generateText(PROMPT, OPTIONS);

      expect(backend).toHaveBeenCalledTimes(1);
      expect(!result.ok && result.error.kind).toBe("ModelUnavailable");
    });
  });

  describe("generateText", () => {
    it("flags text cut off at the output limit", async () => {
      const { gateway } = setup([response("  Partial appendix  ", "length")]);
      const result = await gateway.generateText(PROMPT, OPTIONS);
      expect(result.ok && result.value.value).toBe("Partial appendix");
      expect(result.ok && result.value.truncated).toBe(true);
    });

    it("treats a content-filter stop as an invalid request", async () => {
      const { gateway, backend } = setup([response("", "content-filter")]);
      const result = await gateway.generateText(PROMPT, OPTIONS);
      expect(backend).toHaveBeenCalledTimes(1);
      expect(!result.ok && result.error.kind).toBe("InvalidRequest");
    });

    it("treats an empty response as malformed", async () => {
      const { gateway, backend } = setup([response("  "), response("")]);
      const result = await gateway.generateText(PROMPT, OPTIONS);
      expect(backend).toHaveBeenCalledTimes(2);
      expect(!result.ok && result.error.message).toBe("Model returned an empty response.");
    });
  });

  describe("probe", () => {
    it("returns the trimmed reply", async () => {
      const { gateway } = setup([response(" API key valid\n")]);
      expect(await gateway.probe(PROMPT, OPTIONS)).toEqual({ ok: true, value: "API key valid" });
    });
  });

  describe("logging", () => {
    it("logs every attempt", async () => {
      const { gateway, logs } = setup([apiError(500, "upstream"), response("Done")]);
      await gateway.generateText(PROMPT, OPTIONS);

      expect(logs).toHaveLength(2);
      expect(logs[0]).toMatchObject({
        taskType: "analysis",
        promptName: "book_analysis",
        modelId: "model-a",
        attempt: 1,
        fallback: false,
        errorKind: "TransientNetwork",
        errorMessage: "model-a: upstream",
        system: "Answer in JSON.",
        messages: [{ role: "user", text: "What is the answer?" }],
      });
      expect(logs[0].usage).toBeUndefined();
      expect(logs[1]).toMatchObject({ attempt: 2, finishReason: "stop", usage: { inputTokens: 10, outputTokens: 5 } });
      expect(logs[1].errorKind).toBeUndefined();
    });
  });
});

describe("classifyProviderError", () => {
  const context = { modelId: "model-a", timeoutMs: 500 };

  const cases: Array<[number | undefined, string, GatewayErrorKind]> = [
    [undefined, "boom", "TransientNetwork"],
    [400, "API key not valid. Please pass a valid API key.", "InvalidCredential"],
    [400, "Invalid value for temperature", "InvalidRequest"],
    [403, "Forbidden", "InvalidCredential"],
    [402, "Payment required", "QuotaExceeded"],
    [408, "Request timeout", "TransientNetwork"],
    [429, "Too many requests", "RateLimited"],
    [429, "Resource exhausted: billing limit reached", "QuotaExceeded"],
    [
      429,
      "Quota exceeded for metric: generate_content_free_tier_requests, quotaId: GenerateRequestsPerMinutePerProjectPerModel-FreeTier. Please retry in 12s.",
      "RateLimited",
    ],
    [
      429,
      "Quota exceeded for metric: generate_content_free_tier_requests, quotaId: GenerateRequestsPerDayPerProjectPerModel-FreeTier.",
      "QuotaExceeded",
    ],
    [429, "You exceeded your current quota: insufficient_quota", "QuotaExceeded"],
    [500, "Internal error", "TransientNetwork"],
    [503, "Overloaded", "ModelUnavailable"],
    [422, "Unprocessable", "InvalidRequest"],
  ];

  it.each(cases)("maps status %s (%s) to %s", (statusCode, message, kind) => {
    expect(classifyProviderError(apiError(statusCode, message), context).kind).toBe(kind);
  });

  it("unwraps the last error of a RetryError", () => {
    const error = new RetryError({
      message: "Failed after 2 attempts",
      reason: "maxRetriesExceeded",
      errors: [apiError(500), apiError(401)],
    });
    expect(classifyProviderError(error, context).kind).toBe("InvalidCredential");
  });

  it("maps SDK setup errors", () => {
    expect(classifyProviderError(new LoadAPIKeyError({ message: "API key is missing" }), context).kind).toBe(
      "InvalidCredential"
    );
    expect(
      classifyProviderError(new NoSuchModelError({ modelId: "model-z", modelType: "languageModel" }), context).kind
    ).toBe("ModelUnavailable");
  });

  it("recognizes network failures by code or cause", () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    expect(classifyProviderError(refused, context).kind).toBe("TransientNetwork");
    const wrapped = new TypeError("fetch failed", { cause: refused });
    expect(classifyProviderError(wrapped, context).kind).toBe("TransientNetwork");
  });

  it("does not retry anything it cannot classify", () => {
    const error = classifyProviderError(new Error("something odd"), context);
    expect(error.kind).toBe("InvalidRequest");
    expect(error.retryable).toBe(false);
    expect(error.details).toEqual({ modelId: "model-a", unclassified: true });
  });
});

describe("loadPrompt", () => {
  it("joins system messages and keeps the conversation", async () => {
    const prompt = await loadPrompt("planning_edit", { planning_table_json: "{}", instruction: "Split GROUP_A" });
    expect(prompt.system).toMatch(/^You maintain a foresight planning table/);
    expect(prompt.messages).toHaveLength(1);
    expect(prompt.messages[0].role).toBe("user");
    expect(prompt.messages[0].content).toMatch(/Split GROUP_A$/);
  });

  it("leaves system undefined when the template has none", async () => {
    const prompt = await loadPrompt("credential_probe", {});
    expect(prompt.system).toBeUndefined();
  });
});
