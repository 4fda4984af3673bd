import { AnalysisError, errorMessage, UpstreamDataUnavailableError } from "../errors";
import type { MarketDataBundle, OptionalSignal, StockDataBundle } from "../market/types";
import type { AnalysisSummary } from "../store/types";
import type { WorkflowContext } from "./analysis_workflow_runtime";
import { runBounded, type TaskOutcome } from "./concurrency";
import type { DecisionParseOutcome } from "./decision_parser";
import type { MissingReview, OrchestratorHooks } from "./orchestrator";
import { DEFAULT_ENABLED_ROLES, parseAnalystRoles } from "./roles";
import { type AgentRole, type AnalysisPeriod, createStockInfo, isAnalysisPeriod } from "./states";
import { StockAnalysis } from "./stock_analysis";

export const DEFAULT_ANALYSIS_PERIOD: AnalysisPeriod = "1y";
export const BATCH_TIMEOUT_MESSAGE = "analysis timed out";

export interface StockAnalysisRequest {
  symbol: string;
  period?: string;
  /** Role keys or aliases; the default analyst set when empty. */
  roles?: readonly string[];
}

export type StockAnalysisResult =
  | {
      ok: true;
      recordId: number;
      analysis: StockAnalysis;
      missingRoles: MissingReview[];
      decisionOutcome: DecisionParseOutcome;
    }
  | {
      ok: false;
      recordId: number;
      analysis: StockAnalysis;
      missingRoles: MissingReview[];
      error: AnalysisError;
    };

export interface BatchAnalysisRequest {
  symbols: readonly string[];
  period?: string;
  roles?: readonly string[];
}

export type BatchItemStatus = "completed" | "failed" | "timed_out";

export interface BatchItemOutcome {
  symbol: string;
  status: BatchItemStatus;
  recordId?: number;
  missingRoles?: MissingReview[];
  error?: string;
  durationMs: number;
}

export interface BatchSummary {
  total: number;
  completed: number;
  failed: number;
  timedOut: number;
  durationMs: number;
  results: BatchItemOutcome[];
}

export interface BatchHooks {
  onProgress?: (completedCount: number, total: number, outcome: BatchItemOutcome) => void;
}

/**
 * Trims a symbol and upper-cases purely alphabetic tickers. Exchange-suffixed
 * or numeric codes keep their casing.
 */
export function normalizeSymbol(raw: string): string {
  const trimmed = raw.trim();
  return /^[A-Za-z]+$/.test(trimmed) ? trimmed.toUpperCase() : trimmed;
}

export function normalizeSymbols(raw: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const entry of raw) {
    const symbol = normalizeSymbol(entry);
    if (symbol.length > 0) {
      seen.add(symbol);
    }
  }
  return [...seen];
}

function resolvePeriod(period: string | undefined): AnalysisPeriod {
  const candidate = period?.trim() || DEFAULT_ANALYSIS_PERIOD;
  if (!isAnalysisPeriod(candidate)) {
    throw new AnalysisError(`Unsupported analysis period "${candidate}"`, "INVALID_REQUEST", {
      context: { period: candidate },
    });
  }
  return candidate;
}

function resolveRoles(roles: readonly string[] | undefined): AgentRole[] {
  return roles && roles.length > 0 ? parseAnalystRoles(roles) : [...DEFAULT_ENABLED_ROLES];
}

async function fetchOptional<T>(
  context: WorkflowContext,
  symbol: string,
  dataset: string,
  enabled: boolean,
  fetcher: () => Promise<T | null>,
): Promise<T | null> {
  if (!enabled) {
    return null;
  }

  try {
    return await fetcher();
  } catch (error) {
    context.logger.warn("Optional data unavailable", { symbol, dataset, error: errorMessage(error) });
    return null;
  }
}

async function loadStockData(
  context: WorkflowContext,
  symbol: string,
  period: AnalysisPeriod,
  roles: readonly AgentRole[],
): Promise<StockDataBundle> {
  let market: MarketDataBundle;
  try {
    market = await context.marketData.getDataBundle(symbol, period);
  } catch (error) {
    if (error instanceof UpstreamDataUnavailableError) {
      throw error;
    }
    throw new UpstreamDataUnavailableError("market_data", `Market data unavailable for ${symbol}: ${errorMessage(error)}`, {
      cause: error,
      context: { symbol },
    });
  }

  const enabled = new Set(roles);
  const { optionalData } = context;
  const priceSeries = market.priceSeries;

  const [financialData, quarterlyData, fundFlowData, sentimentData, newsData, riskData] = await Promise.all([
    fetchOptional(context, symbol, "financial", true, () => context.marketData.getFinancialData(symbol)),
    fetchOptional<OptionalSignal>(context, symbol, "quarterly", enabled.has("fundamental"), () =>
      optionalData.getQuarterlyData(symbol),
    ),
    fetchOptional<OptionalSignal>(context, symbol, "fund_flow", enabled.has("fund_flow"), () =>
      optionalData.getFundFlowData(symbol),
    ),
    fetchOptional<OptionalSignal>(context, symbol, "sentiment", enabled.has("market_sentiment"), () =>
      optionalData.getSentimentData(symbol, priceSeries),
    ),
    fetchOptional<OptionalSignal>(context, symbol, "news", enabled.has("news_analyst"), () =>
      optionalData.getNewsData(symbol),
    ),
    fetchOptional<OptionalSignal>(context, symbol, "risk", enabled.has("risk_management"), () =>
      optionalData.getRiskData(symbol),
    ),
  ]);

  const stockInfo = market.stockInfo.symbol ? market.stockInfo : createStockInfo({ ...market.stockInfo, symbol });

  return {
    ...market,
    stockInfo,
    financialData,
    quarterlyData,
    fundFlowData,
    sentimentData,
    newsData,
    riskData,
  };
}

/**
 * One full analysis for one symbol. The aggregate is saved whatever its
 * final status; only market data failures and bad requests throw.
 */
export async function runStockAnalysis(
  request: StockAnalysisRequest,
  context: WorkflowContext,
  hooks: OrchestratorHooks = {},
): Promise<StockAnalysisResult> {
  const symbol = normalizeSymbol(request.symbol);
  if (symbol.length === 0) {
    throw new AnalysisError("A stock symbol is required", "INVALID_REQUEST");
  }
  const period = resolvePeriod(request.period);
  const roles = resolveRoles(request.roles);

  context.logger.info("Starting analysis", { symbol, period, roles });
  const bundle = await loadStockData(context, symbol, period, roles);
  const analysis = new StockAnalysis({ stockInfo: bundle.stockInfo, period });

  const result = await context.orchestrator.perform(analysis, bundle, roles, hooks);
  const recordId = await context.repository.save(analysis);

  if (result.status === "COMPLETED") {
    context.logger.info("Analysis completed", {
      symbol,
      recordId,
      reviews: analysis.reviews.size,
      missing: result.missingRoles.length,
      decision: result.decisionOutcome,
    });
    return {
      ok: true,
      recordId,
      analysis,
      missingRoles: result.missingRoles,
      decisionOutcome: result.decisionOutcome,
    };
  }

  context.logger.warn("Analysis failed", { symbol, recordId, error: result.error.message });
  return { ok: false, recordId, analysis, missingRoles: result.missingRoles, error: result.error };
}

export function loadStockAnalysis(id: number, context: WorkflowContext): Promise<StockAnalysis | null> {
  return context.repository.findById(id);
}

export function listRecentAnalyses(context: WorkflowContext, limit?: number): Promise<AnalysisSummary[]> {
  return context.repository.listRecent(limit);
}

function toBatchItem(symbol: string, outcome: TaskOutcome<StockAnalysisResult>): BatchItemOutcome {
  const { durationMs } = outcome;

  if (outcome.status === "timed_out") {
    return { symbol, status: "timed_out", error: BATCH_TIMEOUT_MESSAGE, durationMs };
  }

  if (outcome.status === "rejected") {
    return { symbol, status: "failed", error: errorMessage(outcome.error), durationMs };
  }

  const result = outcome.value;
  if (result.ok) {
    return { symbol, status: "completed", recordId: result.recordId, missingRoles: result.missingRoles, durationMs };
  }
  return {
    symbol,
    status: "failed",
    recordId: result.recordId,
    missingRoles: result.missingRoles,
    error: result.error.message,
    durationMs,
  };
}

/**
 * Analyses many symbols on a bounded pool. A symbol that runs past the batch
 * timeout is reported as timed out and keeps running in the background.
 */
export async function runBatchStockAnalysis(
  request: BatchAnalysisRequest,
  context: WorkflowContext,
  hooks: BatchHooks = {},
): Promise<BatchSummary> {
  const symbols = normalizeSymbols(request.symbols);
  const period = resolvePeriod(request.period);
  const roles = resolveRoles(request.roles);
  const startedAt = Date.now();
  let settledCount = 0;

  const tasks = symbols.map((symbol) => () => runStockAnalysis({ symbol, period, roles }, context));
  const outcomes = await runBounded(tasks, {
    concurrency: context.config.batch.maxWorkers,
    timeoutMs: context.config.batch.timeoutMs,
    onSettled: (index, outcome) => {
      settledCount += 1;
      const item = toBatchItem(symbols[index] ?? "", outcome);
      context.logger.info("Batch progress", {
        done: settledCount,
        total: symbols.length,
        symbol: item.symbol,
        status: item.status,
      });
      hooks.onProgress?.(settledCount, symbols.length, item);
    },
  });

  const results = outcomes.map((outcome, index) => toBatchItem(symbols[index] ?? "", outcome));

  return {
    total: results.length,
    completed: results.filter((item) => item.status === "completed").length,
    failed: results.filter((item) => item.status === "failed").length,
    timedOut: results.filter((item) => item.status === "timed_out").length,
    durationMs: Date.now() - startedAt,
    results,
  };
}
