import { z } from "zod";

import { ConfigError } from "../errors";
import { type LogLevel } from "../logging/logger";
import { type LLMProvider, LLM_PROVIDERS, resolveModelForProvider } from "./llm_providers";

export const MAX_ANALYST_WORKERS = 6;
export const DEFAULT_ANALYST_TIMEOUT_MS = 120_000;
export const DEFAULT_BATCH_MAX_WORKERS = 3;
export const MAX_BATCH_WORKERS = 16;
export const DEFAULT_BATCH_TIMEOUT_MS = 300_000;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

const flag = z
  .string()
  .optional()
  .transform((value) => (value ? TRUE_VALUES.has(value.trim().toLowerCase()) : false));

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : undefined;
  });

const runtimeEnvSchema = z.object({
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default("DeepSeek"),
  LLM_MODEL: optionalText,
  ANALYST_MAX_WORKERS: z.coerce.number().int().min(1).max(MAX_ANALYST_WORKERS).default(MAX_ANALYST_WORKERS),
  ANALYST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_ANALYST_TIMEOUT_MS),
  BATCH_MAX_WORKERS: z.coerce.number().int().min(1).max(MAX_BATCH_WORKERS).default(DEFAULT_BATCH_MAX_WORKERS),
  BATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_BATCH_TIMEOUT_MS),
  ANALYSIS_SIMULATION_MODE: flag,
  POSTGRES_URL: optionalText,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export interface RuntimeConfig {
  llm: {
    provider: LLMProvider;
    model: string;
    simulation: boolean;
  };
  analysts: {
    maxWorkers: number;
    timeoutMs: number;
  };
  batch: {
    maxWorkers: number;
    timeoutMs: number;
  };
  postgresUrl?: string;
  logLevel: LogLevel;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim().length > 0,
  );
  return Object.fromEntries(entries);
}

/**
 * Validates runtime settings from the environment. Blank values fall back to defaults.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parseResult = runtimeEnvSchema.safeParse(blankToUndefined(env));

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n  - ${issues.join("\n  - ")}`, { issues });
  }

  const parsed = parseResult.data;

  return {
    llm: {
      provider: parsed.LLM_PROVIDER,
      model: resolveModelForProvider(parsed.LLM_PROVIDER, parsed.LLM_MODEL),
      simulation: parsed.ANALYSIS_SIMULATION_MODE,
    },
    analysts: {
      maxWorkers: parsed.ANALYST_MAX_WORKERS,
      timeoutMs: parsed.ANALYST_TIMEOUT_MS,
    },
    batch: {
      maxWorkers: parsed.BATCH_MAX_WORKERS,
      timeoutMs: parsed.BATCH_TIMEOUT_MS,
    },
    postgresUrl: parsed.POSTGRES_URL,
    logLevel: parsed.LOG_LEVEL,
  };
}
