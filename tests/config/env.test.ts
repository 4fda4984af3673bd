import { describe, expect, it } from "vitest";

import {
  DEFAULT_ANALYST_TIMEOUT_MS,
  DEFAULT_BATCH_MAX_WORKERS,
  DEFAULT_BATCH_TIMEOUT_MS,
  loadRuntimeConfig,
  MAX_ANALYST_WORKERS,
} from "../../src/config/env";
import { ConfigError } from "../../src/errors";

describe("loadRuntimeConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadRuntimeConfig({})).toEqual({
      llm: { provider: "DeepSeek", model: "deepseek-chat", simulation: false },
      analysts: { maxWorkers: MAX_ANALYST_WORKERS, timeoutMs: DEFAULT_ANALYST_TIMEOUT_MS },
      batch: { maxWorkers: DEFAULT_BATCH_MAX_WORKERS, timeoutMs: DEFAULT_BATCH_TIMEOUT_MS },
      postgresUrl: undefined,
      logLevel: "info",
    });
  });

  it("reads explicit values and treats blank ones as unset", () => {
    const config = loadRuntimeConfig({
      LLM_PROVIDER: "OpenAI",
      LLM_MODEL: "gpt-4o-mini",
      ANALYST_MAX_WORKERS: "2",
      ANALYST_TIMEOUT_MS: "5000",
      BATCH_MAX_WORKERS: "4",
      ANALYSIS_SIMULATION_MODE: "yes",
      POSTGRES_URL: "   ",
      LOG_LEVEL: "debug",
    });

    expect(config.llm).toEqual({ provider: "OpenAI", model: "gpt-4o-mini", simulation: true });
    expect(config.analysts).toEqual({ maxWorkers: 2, timeoutMs: 5000 });
    expect(config.batch.maxWorkers).toBe(4);
    expect(config.postgresUrl).toBeUndefined();
    expect(config.logLevel).toBe("debug");
  });

  it("falls back to the provider default for a model it does not serve", () => {
    expect(loadRuntimeConfig({ LLM_PROVIDER: "Anthropic", LLM_MODEL: "gpt-4o" }).llm.model).toBe(
      "claude-3-5-sonnet-latest",
    );
  });

  it("rejects out-of-range worker counts", () => {
    expect(() => loadRuntimeConfig({ ANALYST_MAX_WORKERS: "9" })).toThrow(ConfigError);
    expect(() => loadRuntimeConfig({ ANALYST_MAX_WORKERS: "9" })).toThrow("ANALYST_MAX_WORKERS");
  });

  it("rejects an unknown provider", () => {
    expect(() => loadRuntimeConfig({ LLM_PROVIDER: "Mystery" })).toThrow("LLM_PROVIDER");
  });
});
