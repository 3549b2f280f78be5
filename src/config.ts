import { z } from "zod";

import { ConfigurationError } from "./errors.js";
import type { ReasoningEffort } from "./services.js";
import type { EnvTarget } from "./utils/env.js";

export const DEFAULT_MODEL = "gpt-5.2";
export const DEFAULT_GRADER_MODEL = "gpt-5.2";
export const DEFAULT_MAX_OUTPUT_TOKENS = 2048;
export const DEFAULT_GRADER_MAX_OUTPUT_TOKENS = 512;
export const DEFAULT_OPENAI_TIMEOUT_MS = 15 * 60_000;

const REASONING_EFFORTS = ["minimal", "low", "medium", "high"] as const satisfies readonly ReasoningEffort[];

const BenchmarkConfigSchema = z
  .object({
    model: z.string().trim().min(1),
    graderModel: z.string().trim().min(1),
    maxOutputTokens: z.number().int().positive(),
    graderMaxOutputTokens: z.number().int().positive(),
    reasoningEffort: z.enum(REASONING_EFFORTS).optional(),
  })
  .strict();

export type BenchmarkConfig = Readonly<z.infer<typeof BenchmarkConfigSchema>>;

export type BenchmarkConfigOverrides = {
  readonly model?: string;
  readonly graderModel?: string;
  readonly maxOutputTokens?: number;
  readonly graderMaxOutputTokens?: number;
  readonly reasoningEffort?: string;
};

export type OpenAiSettings = {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly timeoutMs: number;
};

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Explicit overrides win over `TOKEN_DUEL_*` variables, which win over the
 * defaults.
 */
export function resolveBenchmarkConfig(
  overrides: BenchmarkConfigOverrides = {},
  env: EnvTarget = process.env,
): BenchmarkConfig {
  const candidate = {
    model: nonEmpty(overrides.model) ?? nonEmpty(env.TOKEN_DUEL_MODEL) ?? DEFAULT_MODEL,
    graderModel:
      nonEmpty(overrides.graderModel) ??
      nonEmpty(env.TOKEN_DUEL_GRADER_MODEL) ??
      DEFAULT_GRADER_MODEL,
    maxOutputTokens: overrides.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
    graderMaxOutputTokens: overrides.graderMaxOutputTokens ?? DEFAULT_GRADER_MAX_OUTPUT_TOKENS,
    ...(overrides.reasoningEffort !== undefined
      ? { reasoningEffort: overrides.reasoningEffort }
      : {}),
  };
  const parsed = BenchmarkConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid benchmark configuration",
      parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function resolveTimeoutMs(env: EnvTarget): number {
  const raw = env.OPENAI_TIMEOUT_MS;
  const parsed = raw ? Number(raw) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_OPENAI_TIMEOUT_MS;
}

export function resolveOpenAiSettings(env: EnvTarget = process.env): OpenAiSettings {
  const apiKey = nonEmpty(env.OPENAI_API_KEY);
  if (!apiKey) {
    throw new ConfigurationError(
      "OPENAI_API_KEY not found. Set it in the environment, .env.local, or the suite's .env file.",
    );
  }
  const baseUrl = nonEmpty(env.OPENAI_BASE_URL);
  return {
    apiKey,
    ...(baseUrl ? { baseUrl } : {}),
    timeoutMs: resolveTimeoutMs(env),
  };
}
