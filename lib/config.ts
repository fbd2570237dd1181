import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

const retryRuleSchema = z.object({
  max_retries: z.number().int().min(0),
  base_delay_ms: z.number().int().min(0),
});

const configSchema = z.object({
  provider: z.enum(["openai", "anthropic", "google"]),
  model: z.string().min(1),
  fallback_model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2),
  max_output_tokens: z.object({
    analysis: z.number().int().min(1),
    generation: z.number().int().min(1),
    probe: z.number().int().min(1),
  }),
  extraction: z.object({
    max_bytes: z.number().int().min(1),
    warn_bytes: z.number().int().min(1),
    min_text_chars: z.number().int().min(0),
  }),
  truncation: z.object({
    max_chars: z.number().int().min(1),
    head_fraction: z.number().min(0).max(1),
    tail_fraction: z.number().min(0).max(1),
  }),
  timeouts: z.object({
    analysis_ms: z.number().int().min(1),
    generation_ms: z.number().int().min(1),
    probe_ms: z.number().int().min(1),
  }),
  retry: z
    .object({
      rate_limited: retryRuleSchema.optional(),
      transient_network: retryRuleSchema.optional(),
      malformed_response: retryRuleSchema.optional(),
    })
    .optional(),
  generation: z.object({
    time_horizon: z.string().min(1),
    word_count: z.object({
      min: z.number().int().min(1),
      max: z.number().int().min(1),
    }),
  }),
  prompts: z.object({
    analysis: z.string(),
    edit: z.string(),
    generation: z.string(),
    probe: z.string(),
  }),
  export: z.object({
    attribution: z.string().min(1),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type RetryRuleConfig = z.infer<typeof retryRuleSchema>;

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): T {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result as T;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function parseConfig(raw: unknown): AppConfig {
  const config = configSchema.parse(raw);
  if (config.generation.word_count.min > config.generation.word_count.max) {
    throw new Error(
      `generation.word_count.min (${config.generation.word_count.min}) exceeds max (${config.generation.word_count.max})`
    );
  }
  if (config.truncation.head_fraction + config.truncation.tail_fraction > 1) {
    throw new Error("truncation.head_fraction + truncation.tail_fraction must not exceed 1");
  }
  return config;
}

export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  const raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  return parseConfig(raw);
}

/**
 * Load the base config and deep-merge a user override file over it.
 * A missing override file leaves the base untouched.
 */
export function loadConfigWithOverrides(
  overridePath: string | undefined,
  basePath?: string
): AppConfig {
  const base = loadConfig(basePath);
  if (!overridePath || !fs.existsSync(overridePath)) return base;
  const overrides = yaml.load(fs.readFileSync(overridePath, "utf-8"));
  if (!isPlainObject(overrides)) {
    throw new Error(`Config override ${overridePath} must be a YAML mapping`);
  }
  return parseConfig(deepMerge(base, overrides));
}

const API_KEY_ENV: Record<AppConfig["provider"], string> = {
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
};

export function apiKeyEnvName(cfg: AppConfig): string {
  return API_KEY_ENV[cfg.provider];
}

export function readApiKey(cfg: AppConfig): string | undefined {
  const value = process.env[apiKeyEnvName(cfg)]?.trim();
  return value ? value : undefined;
}
