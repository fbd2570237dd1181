import type { AIGateway, Result } from "../core/types";
import { ok } from "../core/types";
import type { GatewayError } from "../core/errors";
import { loadPrompt } from "../core/llm";

export interface ValidateCredentialInput {
  gateway: AIGateway;
  promptName: string;
  maxOutputTokens: number;
  timeoutMs: number;
}

/**
 * One minimal provider call; any successful answer proves the credential.
 */
export async function validateCredential(
  input: ValidateCredentialInput
): Promise<Result<void, GatewayError>> {
  const prompt = await loadPrompt(input.promptName, {});
  const result = await input.gateway.probe(prompt, {
    maxOutputTokens: input.maxOutputTokens,
    timeoutMs: input.timeoutMs,
    log: { taskType: "probe", promptName: input.promptName },
  });
  return result.ok ? ok(undefined) : result;
}
