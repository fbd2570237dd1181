import type { GatewayErrorKind } from "./errors";
import type { RetryRuleConfig } from "../../config";

export interface RetryRule {
  retryable: boolean;
  maxRetries: number;
  backoff: { baseDelayMs: number; factor: number };
}

export type RetryPolicy = Record<GatewayErrorKind, RetryRule>;

const NO_RETRY: RetryRule = { retryable: false, maxRetries: 0, backoff: { baseDelayMs: 0, factor: 1 } };

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  RateLimited: { retryable: true, maxRetries: 3, backoff: { baseDelayMs: 2000, factor: 2 } },
  TransientNetwork: { retryable: true, maxRetries: 3, backoff: { baseDelayMs: 1000, factor: 2 } },
  MalformedResponse: { retryable: true, maxRetries: 1, backoff: { baseDelayMs: 0, factor: 1 } },
  InvalidCredential: NO_RETRY,
  QuotaExceeded: NO_RETRY,
  InvalidRequest: NO_RETRY,
  // handled by switching to the fallback model, never by retrying the same one
  ModelUnavailable: NO_RETRY,
};

export function isRetryableKind(kind: GatewayErrorKind): boolean {
  return DEFAULT_RETRY_POLICY[kind].retryable;
}

/**
 * Overlay the `retry` section of config.yaml on the default table.
 * Only the retryable kinds are configurable.
 */
export function retryPolicyFromConfig(retry?: {
  rate_limited?: RetryRuleConfig;
  transient_network?: RetryRuleConfig;
  malformed_response?: RetryRuleConfig;
}): RetryPolicy {
  const apply = (rule: RetryRule, override?: RetryRuleConfig): RetryRule =>
    override
      ? {
          ...rule,
          maxRetries: override.max_retries,
          backoff: { ...rule.backoff, baseDelayMs: override.base_delay_ms },
        }
      : rule;

  return {
    ...DEFAULT_RETRY_POLICY,
    RateLimited: apply(DEFAULT_RETRY_POLICY.RateLimited, retry?.rate_limited),
    TransientNetwork: apply(DEFAULT_RETRY_POLICY.TransientNetwork, retry?.transient_network),
    MalformedResponse: apply(DEFAULT_RETRY_POLICY.MalformedResponse, retry?.malformed_response),
  };
}

/** Delay before the n-th retry (1-based) of a kind. */
export function backoffDelay(rule: RetryRule, retryNumber: number): number {
  return rule.backoff.baseDelayMs * rule.backoff.factor ** (retryNumber - 1);
}

export type RetryDecision =
  | { retry: true; retryNumber: number; delayMs: number }
  | { retry: false };

/**
 * Tracks retries spent per error kind across the attempts of one call.
 */
export class RetryBudget {
  private readonly spent = new Map<GatewayErrorKind, number>();

  constructor(private readonly policy: RetryPolicy) {}

  next(kind: GatewayErrorKind): RetryDecision {
    const rule = this.policy[kind];
    const used = this.spent.get(kind) ?? 0;
    if (!rule.retryable || used >= rule.maxRetries) return { retry: false };
    const retryNumber = used + 1;
    this.spent.set(kind, retryNumber);
    return { retry: true, retryNumber, delayMs: backoffDelay(rule, retryNumber) };
  }

  used(kind: GatewayErrorKind): number {
    return this.spent.get(kind) ?? 0;
  }
}
