import type { LLMClient } from "../llm/client";
import type { StockDataBundle } from "../market/types";
import type { AgentRole, StockInfo } from "../workflow/states";
import { type AgentRuntimeOptions, type AnalystAgent, BaseAnalystAgent, type PromptVariables } from "./base";
import {
  formatFinancialRatios,
  formatRecentPrices,
  formatSignal,
  indicatorValue,
  isUsableSignal,
} from "./base_utils/formatting";

const NO_FUND_FLOW_NOTE =
  "No fund flow data is available for this stock. Infer capital movement from the volume ratio, turnover and recent price action, and state that the flow data is missing.";
const NO_SENTIMENT_NOTE =
  "No dedicated sentiment data is available. Judge sentiment from recent price behaviour and say that ARBR and market-wide readings are missing.";
const NO_RISK_NOTE = "No risk disclosures were retrieved. Base the assessment on volatility and price-range figures only.";

export class TechnicalAnalyst extends BaseAnalystAgent {
  constructor(llmClient: LLMClient, modelName: string, options?: AgentRuntimeOptions) {
    super("technical", llmClient, modelName, options);
  }

  protected buildPromptVariables(_stockInfo: StockInfo, bundle: StockDataBundle): PromptVariables {
    const { indicators } = bundle;
    return {
      period: bundle.period,
      price: indicatorValue(indicators, "price"),
      ma5: indicatorValue(indicators, "ma5"),
      ma10: indicatorValue(indicators, "ma10"),
      ma20: indicatorValue(indicators, "ma20"),
      ma60: indicatorValue(indicators, "ma60"),
      rsi: indicatorValue(indicators, "rsi"),
      macd: indicatorValue(indicators, "macd"),
      macd_signal: indicatorValue(indicators, "macd_signal"),
      bb_upper: indicatorValue(indicators, "bb_upper"),
      bb_lower: indicatorValue(indicators, "bb_lower"),
      k_value: indicatorValue(indicators, "k_value"),
      d_value: indicatorValue(indicators, "d_value"),
      volume_ratio: indicatorValue(indicators, "volume_ratio"),
      recent_prices: formatRecentPrices(bundle.priceSeries),
    };
  }
}

export class FundamentalAnalyst extends BaseAnalystAgent {
  constructor(llmClient: LLMClient, modelName: string, options?: AgentRuntimeOptions) {
    super("fundamental", llmClient, modelName, options);
  }

  protected buildPromptVariables(_stockInfo: StockInfo, bundle: StockDataBundle): PromptVariables {
    return {
      financial_ratios: formatFinancialRatios(bundle.financialData),
      quarterly_report: formatSignal(bundle.quarterlyData),
    };
  }
}

export class FundFlowAnalyst extends BaseAnalystAgent {
  constructor(llmClient: LLMClient, modelName: string, options?: AgentRuntimeOptions) {
    super("fund_flow", llmClient, modelName, options);
  }

  protected buildPromptVariables(_stockInfo: StockInfo, bundle: StockDataBundle): PromptVariables {
    return {
      volume_ratio: indicatorValue(bundle.indicators, "volume_ratio"),
      turnover_rate: indicatorValue(bundle.indicators, "turnover_rate"),
      fund_flow_data: formatSignal(bundle.fundFlowData) ?? NO_FUND_FLOW_NOTE,
    };
  }
}

export class RiskManagementAnalyst extends BaseAnalystAgent {
  constructor(llmClient: LLMClient, modelName: string, options?: AgentRuntimeOptions) {
    super("risk_management", llmClient, modelName, options);
  }

  protected buildPromptVariables(_stockInfo: StockInfo, bundle: StockDataBundle): PromptVariables {
    const { indicators } = bundle;
    return {
      beta: indicatorValue(indicators, "beta"),
      high_52w: indicatorValue(indicators, "high_52w"),
      low_52w: indicatorValue(indicators, "low_52w"),
      rsi: indicatorValue(indicators, "rsi"),
      volume_ratio: indicatorValue(indicators, "volume_ratio"),
      risk_data: formatSignal(bundle.riskData) ?? NO_RISK_NOTE,
    };
  }
}

export class MarketSentimentAnalyst extends BaseAnalystAgent {
  constructor(llmClient: LLMClient, modelName: string, options?: AgentRuntimeOptions) {
    super("market_sentiment", llmClient, modelName, options);
  }

  protected buildPromptVariables(_stockInfo: StockInfo, bundle: StockDataBundle): PromptVariables {
    return {
      sentiment_data: formatSignal(bundle.sentimentData) ?? NO_SENTIMENT_NOTE,
      recent_prices: formatRecentPrices(bundle.priceSeries),
    };
  }
}

/**
 * Has no fallback: without news there is nothing to review.
 */
export class NewsAnalyst extends BaseAnalystAgent {
  constructor(llmClient: LLMClient, modelName: string, options?: AgentRuntimeOptions) {
    super("news_analyst", llmClient, modelName, options);
  }

  protected buildPromptVariables(_stockInfo: StockInfo, bundle: StockDataBundle): PromptVariables | null {
    if (this.settings.requiresOptionalData && !isUsableSignal(bundle.newsData)) {
      return null;
    }

    return {
      news_data: formatSignal(bundle.newsData),
    };
  }
}

export type AnalystRegistry = Readonly<Record<AgentRole, AnalystAgent>>;

export function createAnalystAgents(
  llmClient: LLMClient,
  modelName: string,
  options?: Partial<Record<AgentRole, AgentRuntimeOptions>>,
): AnalystRegistry {
  return {
    technical: new TechnicalAnalyst(llmClient, modelName, options?.technical),
    fundamental: new FundamentalAnalyst(llmClient, modelName, options?.fundamental),
    fund_flow: new FundFlowAnalyst(llmClient, modelName, options?.fund_flow),
    risk_management: new RiskManagementAnalyst(llmClient, modelName, options?.risk_management),
    market_sentiment: new MarketSentimentAnalyst(llmClient, modelName, options?.market_sentiment),
    news_analyst: new NewsAnalyst(llmClient, modelName, options?.news_analyst),
  };
}
