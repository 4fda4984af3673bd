import { SUMMARY_CHAR_BUDGET } from "../config/analyst_config";
import type { Logger } from "../logging/logger";
import { sortByCanonicalOrder } from "../workflow/roles";
import { type AgentRole, type AnalysisContent, buildAnalysisContent, isAgentRole } from "../workflow/states";
import { StockAnalysis } from "../workflow/stock_analysis";
import type { AnalysisRecord, StoredReview } from "./types";

export function toAnalysisRecord(analysis: StockAnalysis): AnalysisRecord {
  return {
    analysisId: analysis.id,
    stockInfo: analysis.stockInfo,
    period: analysis.period,
    status: analysis.status,
    reviews: analysis.orderedReviews().map((review) => ({
      role: review.role,
      agentName: review.agentName,
      rawOutput: review.content.rawOutput,
      summary: review.content.summary,
      focusAreas: [...review.content.focusAreas],
      createdAt: review.createdAt.toISOString(),
    })),
    teamDiscussion: analysis.teamDiscussion,
    finalDecision: analysis.finalDecision,
    failureReason: analysis.failureReason,
    createdAt: analysis.createdAt.toISOString(),
    updatedAt: analysis.updatedAt.toISOString(),
  };
}

function restoreContent(review: StoredReview): AnalysisContent {
  const content = buildAnalysisContent(review.rawOutput, review.focusAreas, SUMMARY_CHAR_BUDGET);
  return review.summary.length > 0 ? Object.freeze({ ...content, summary: review.summary }) : content;
}

function parseDate(value: string, fallback: Date): Date {
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? fallback : parsed;
}

/**
 * Rebuilds an aggregate by replaying stored state through its public
 * operations, so a stored record that breaks an invariant throws here.
 */
export function restoreAnalysis(record: AnalysisRecord, logger?: Logger): StockAnalysis {
  const updatedAt = parseDate(record.updatedAt, new Date());
  const analysis = new StockAnalysis({
    id: record.analysisId,
    stockInfo: record.stockInfo,
    period: record.period,
    createdAt: parseDate(record.createdAt, updatedAt),
    clock: () => updatedAt,
  });

  if (record.status === "CREATED") {
    return analysis;
  }
  analysis.start();

  const byRole = new Map<AgentRole, StoredReview>();
  for (const review of record.reviews) {
    if (isAgentRole(review.role)) {
      byRole.set(review.role, review);
    } else {
      logger?.warn("Skipping stored review with unknown role", { analysisId: record.analysisId, role: review.role });
    }
  }

  for (const role of sortByCanonicalOrder(byRole.keys())) {
    const review = byRole.get(role);
    if (review) {
      analysis.addReview(role, restoreContent(review), review.agentName, {
        createdAt: parseDate(review.createdAt, updatedAt),
      });
    }
  }

  if (record.teamDiscussion !== null && record.teamDiscussion.length > 0) {
    analysis.conductDiscussion(record.teamDiscussion);
  }

  if (record.status === "COMPLETED" && record.finalDecision) {
    analysis.finalizeDecision(record.finalDecision);
  } else if (record.status === "FAILED") {
    analysis.fail(record.failureReason ?? "unknown failure");
  }

  return analysis;
}
