import type { AgentRole } from "../workflow/states";

export const SUMMARY_CHAR_BUDGET = 200;

export interface AnalystSettings {
  displayName: string;
  temperature: number;
  maxTokens: number;
  focusAreas: readonly string[];
  /** When set, the analyst produces no review if its optional data is absent. */
  requiresOptionalData: boolean;
}

export interface CallBudget {
  temperature: number;
  maxTokens: number;
}

export const ANALYST_SETTINGS: Record<AgentRole, AnalystSettings> = {
  technical: {
    displayName: "Technical Analyst",
    temperature: 0.5,
    maxTokens: 2000,
    focusAreas: ["indicators", "trend", "support_resistance", "signals"],
    requiresOptionalData: false,
  },
  fundamental: {
    displayName: "Fundamental Analyst",
    temperature: 0.6,
    maxTokens: 2200,
    focusAreas: ["financial_metrics", "industry_position", "valuation", "growth", "quarterly_trend"],
    requiresOptionalData: false,
  },
  fund_flow: {
    displayName: "Fund Flow Analyst",
    temperature: 0.5,
    maxTokens: 1800,
    focusAreas: ["fund_flow", "main_force", "market_sentiment", "liquidity"],
    requiresOptionalData: false,
  },
  risk_management: {
    displayName: "Risk Management Analyst",
    temperature: 0.4,
    maxTokens: 2000,
    focusAreas: ["risk_identification", "risk_quantification", "risk_control", "position_sizing"],
    requiresOptionalData: false,
  },
  market_sentiment: {
    displayName: "Market Sentiment Analyst",
    temperature: 0.6,
    maxTokens: 1600,
    focusAreas: ["arbr", "market_sentiment", "investor_psychology"],
    requiresOptionalData: false,
  },
  news_analyst: {
    displayName: "News Analyst",
    temperature: 0.6,
    maxTokens: 1600,
    focusAreas: ["public_opinion", "news_events", "price_impact"],
    requiresOptionalData: true,
  },
};

export const DISCUSSION_BUDGET: CallBudget = { temperature: 0.7, maxTokens: 2500 };
export const DECISION_BUDGET: CallBudget = { temperature: 0.3, maxTokens: 1500 };
export const REPAIR_BUDGET: CallBudget = { temperature: 0.1, maxTokens: 1500 };
