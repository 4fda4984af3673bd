import { createAnalystAgents } from "../agents/analysts";
import type { RuntimeConfig } from "../config/env";
import { type LLMClient, ProviderClientRegistry, SimulatedLLMClient } from "../llm/client";
import { createLogger, type Logger } from "../logging/logger";
import type { MarketDataProvider, OptionalDataProvider } from "../market/types";
import { InMemoryAnalysisRepository } from "../store/memory";
import { PostgresAnalysisRepository } from "../store/postgres/analyses";
import type { AnalysisRepository } from "../store/types";
import { AnalysisOrchestrator } from "./orchestrator";

export interface WorkflowDataProviders {
  marketData: MarketDataProvider;
  optionalData: OptionalDataProvider;
}

/**
 * Everything a use case needs, built once per process and passed down.
 */
export interface WorkflowContext extends WorkflowDataProviders {
  config: RuntimeConfig;
  llmClient: LLMClient;
  orchestrator: AnalysisOrchestrator;
  repository: AnalysisRepository;
  logger: Logger;
}

export interface WorkflowContextOverrides {
  llmClient?: LLMClient;
  repository?: AnalysisRepository;
  logger?: Logger;
}

function buildLLMClient(config: RuntimeConfig, logger: Logger): LLMClient {
  if (config.llm.simulation) {
    return new SimulatedLLMClient();
  }
  return new ProviderClientRegistry(logger.child("llm")).getResilientClient(config.llm.provider);
}

function buildRepository(config: RuntimeConfig, logger: Logger): AnalysisRepository {
  if (config.postgresUrl) {
    return new PostgresAnalysisRepository(logger.child("store"));
  }
  logger.info("POSTGRES_URL not set; analyses are kept in memory");
  return new InMemoryAnalysisRepository(logger.child("store"));
}

export function buildWorkflowContext(
  config: RuntimeConfig,
  providers: WorkflowDataProviders,
  overrides: WorkflowContextOverrides = {},
): WorkflowContext {
  const logger = overrides.logger ?? createLogger("workflow", config.logLevel);
  const llmClient = overrides.llmClient ?? buildLLMClient(config, logger);
  const analysts = createAnalystAgents(llmClient, config.llm.model);
  const orchestrator = new AnalysisOrchestrator(analysts, llmClient, {
    modelName: config.llm.model,
    maxWorkers: config.analysts.maxWorkers,
    analystTimeoutMs: config.analysts.timeoutMs,
    logger: logger.child("orchestrator"),
  });

  return {
    config,
    llmClient,
    orchestrator,
    marketData: providers.marketData,
    optionalData: providers.optionalData,
    repository: overrides.repository ?? buildRepository(config, logger),
    logger,
  };
}
