import { describe, it, expect, vi } from "vitest";
import { APICallError } from "ai";
import { createForesightSession, settingsFromConfig } from "../factory";
import type { ProgressEvent } from "../types";
import type { BackendRequest, BackendResponse } from "../../core/llm";
import { loadConfig } from "@/lib/config";

function rateLimited(): APICallError {
  return new APICallError({
    message: "Too many requests, slow down",
    url: "https://provider.test/v1",
    requestBodyValues: {},
    statusCode: 429,
  });
}

function setup(steps: Array<BackendResponse | Error>, onLog?: () => void) {
  const queue = [...steps];
  const backend = vi.fn(async (_request: BackendRequest): Promise<BackendResponse> => {
    const next = queue.shift();
    if (!next) throw new Error("backend called too many times");
    if (next instanceof Error) throw next;
    return next;
  });
  const sleep = vi.fn(async (_ms: number) => {});
  const events: ProgressEvent[] = [];
  const runtime = createForesightSession({
    config: loadConfig(),
    apiKey: "test-secret",
    backend,
    sleep,
    onLog,
    progress: { emit: (event) => events.push(event) },
  });
  return { ...runtime, backend, sleep, events };
}

const OK: BackendResponse = { text: "API key valid", finishReason: "stop", usage: { inputTokens: 5, outputTokens: 3 } };

describe("settingsFromConfig", () => {
  it("maps the config file onto session settings", () => {
    expect(settingsFromConfig(loadConfig())).toEqual({
      prompts: {
        analysis: "book_analysis",
        edit: "planning_edit",
        generation: "appendix_generation",
        probe: "credential_probe",
      },
      maxOutputTokens: { analysis: 16384, generation: 8192, probe: 32 },
      timeoutsMs: { analysis: 60000, generation: 120000, probe: 30000 },
      extraction: { maxBytes: 104857600, warnBytes: 52428800, minTextChars: 100 },
      truncation: { maxChars: 500000, headFraction: 0.4, tailFraction: 0.2 },
      generation: { timeHorizon: "2040-2050", wordCount: { min: 2500, max: 3500 } },
      attribution: "Foresight Appendix Studio",
    });
  });
});

describe("createForesightSession", () => {
  it("reports retries as progress and logs every attempt", async () => {
    const { session, log, backend, sleep, events } = setup([rateLimited(), OK]);

    const result = await session.validateCredential();

    expect(result.ok).toBe(true);
    expect(backend).toHaveBeenCalledTimes(2);
    expect(backend.mock.calls[0][0].modelId).toBe("gemini-2.5-pro");
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(events).toContainEqual({
      type: "retry",
      taskType: "probe",
      kind: "RateLimited",
      retryNumber: 1,
      delayMs: 2000,
      modelId: "gemini-2.5-pro",
      fallback: false,
    });
    expect(log.list().map((e) => [e.attempt, e.errorKind])).toEqual([
      [1, "RateLimited"],
      [2, undefined],
    ]);
  });

  it("keeps going when the extra log sink throws", async () => {
    const { session, log, events } = setup([OK], () => {
      throw new Error("disk full");
    });

    const result = await session.validateCredential();

    expect(result.ok).toBe(true);
    expect(log.list()).toHaveLength(1);
    expect(events).toContainEqual({
      type: "warning",
      step: "credential",
      message: "Could not write LLM log: disk full",
    });
  });
});
