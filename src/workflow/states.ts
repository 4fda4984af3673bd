import { asNumber, asString } from "../agents/base_utils/coercion";

/**
 * Canonical analyst order. Discussion prompts and read-back replay always follow it.
 */
export const ANALYST_ROLES = [
  "technical",
  "fundamental",
  "fund_flow",
  "risk_management",
  "market_sentiment",
  "news_analyst",
] as const;

export type AgentRole = (typeof ANALYST_ROLES)[number];

export const ANALYSIS_STATUSES = ["CREATED", "IN_PROGRESS", "COMPLETED", "FAILED"] as const;
export type AnalysisStatus = (typeof ANALYSIS_STATUSES)[number];

export const ANALYSIS_PERIODS = ["1y", "6mo", "3mo", "1mo"] as const;
export type AnalysisPeriod = (typeof ANALYSIS_PERIODS)[number];

export interface StockInfo {
  readonly symbol: string;
  readonly name: string;
  readonly sector: string;
  readonly industry: string;
  readonly currentPrice: number;
}

export interface AnalysisContent {
  readonly summary: string;
  readonly details: Readonly<Record<string, string>>;
  readonly focusAreas: readonly string[];
  readonly rawOutput: string;
}

export interface AgentReview {
  readonly role: AgentRole;
  readonly content: AnalysisContent;
  readonly agentName: string;
  readonly createdAt: Date;
}

/**
 * Structured final decision. Either the parsed decision object or the
 * `{ decision_text, error }` text fallback.
 */
export type FinalDecision = Readonly<Record<string, unknown>>;

export function isAgentRole(value: unknown): value is AgentRole {
  return typeof value === "string" && (ANALYST_ROLES as readonly string[]).includes(value);
}

export function isAnalysisStatus(value: unknown): value is AnalysisStatus {
  return typeof value === "string" && (ANALYSIS_STATUSES as readonly string[]).includes(value);
}

export function isAnalysisPeriod(value: unknown): value is AnalysisPeriod {
  return typeof value === "string" && (ANALYSIS_PERIODS as readonly string[]).includes(value);
}

export function createStockInfo(input: {
  symbol: string;
  name?: string;
  sector?: string;
  industry?: string;
  currentPrice?: number;
}): StockInfo {
  return Object.freeze({
    symbol: input.symbol,
    name: input.name ?? "",
    sector: input.sector ?? "",
    industry: input.industry ?? "",
    currentPrice: input.currentPrice ?? 0,
  });
}

/**
 * Builds stock info from a loosely typed upstream record. Missing text fields
 * become empty strings and a missing price becomes 0.
 */
export function stockInfoFromRecord(record: Record<string, unknown>): StockInfo {
  return createStockInfo({
    symbol: asString(record.symbol) ?? "",
    name: asString(record.name) ?? "",
    sector: asString(record.sector) ?? "",
    industry: asString(record.industry) ?? "",
    currentPrice: asNumber(record.current_price) ?? 0,
  });
}

export function buildAnalysisContent(rawOutput: string, focusAreas: readonly string[], summaryBudget: number): AnalysisContent {
  // Counted in code points so a surrogate pair is never split.
  const codePoints = Array.from(rawOutput);
  const summary =
    codePoints.length > summaryBudget ? `${codePoints.slice(0, summaryBudget).join("")}...` : rawOutput;

  return Object.freeze({
    summary,
    details: Object.freeze({ full_content: rawOutput }),
    focusAreas: Object.freeze([...focusAreas]),
    rawOutput,
  });
}

export function createAgentReview(input: {
  role: AgentRole;
  content: AnalysisContent;
  agentName: string;
  createdAt?: Date;
}): AgentReview {
  return Object.freeze({
    role: input.role,
    content: input.content,
    agentName: input.agentName,
    createdAt: new Date((input.createdAt ?? new Date()).getTime()),
  });
}
