import type { QueryResultRow } from "pg";

import { AnalysisError } from "../../errors";
import { createLogger, type Logger } from "../../logging/logger";
import { isAnalysisStatus } from "../../workflow/states";
import type { StockAnalysis } from "../../workflow/stock_analysis";
import { restoreAnalysis, toAnalysisRecord } from "../records";
import type { AnalysisRecord, AnalysisRepository, AnalysisSummary, StoredReview } from "../types";
import { query, withTransaction } from "./client";
import { toIsoTimestamp, toJsonObject, toNumber, toStockInfo, toStringArray, toText } from "./serializers";

interface StockAnalysisRow extends QueryResultRow {
  id: string | number;
  analysis_id: string;
  symbol: string;
  stock_name: string;
  period: string;
  stock_info: unknown;
  status: string;
  team_discussion: string | null;
  final_decision: unknown;
  failure_reason: string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

interface StockAnalysisReviewRow extends QueryResultRow {
  role: string;
  agent_name: string;
  raw_output: string;
  summary: string;
  focus_areas: unknown;
  created_at: Date | string;
}

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 200;

export async function saveStockAnalysis(analysis: StockAnalysis): Promise<number> {
  const record = toAnalysisRecord(analysis);

  return withTransaction(async (tx) => {
    const inserted = await tx<{ id: string | number }>(
      `
        INSERT INTO stock_analyses (
          analysis_id,
          symbol,
          stock_name,
          period,
          stock_info,
          status,
          team_discussion,
          final_decision,
          failure_reason,
          created_at,
          updated_at
        )
        VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7, $8::jsonb, $9, $10, $11)
        ON CONFLICT (analysis_id) DO UPDATE SET
          status = EXCLUDED.status,
          team_discussion = EXCLUDED.team_discussion,
          final_decision = EXCLUDED.final_decision,
          failure_reason = EXCLUDED.failure_reason,
          updated_at = EXCLUDED.updated_at
        RETURNING id
      `,
      [
        record.analysisId,
        record.stockInfo.symbol,
        record.stockInfo.name,
        record.period,
        JSON.stringify(record.stockInfo),
        record.status,
        record.teamDiscussion,
        record.finalDecision ? JSON.stringify(record.finalDecision) : null,
        record.failureReason,
        record.createdAt,
        record.updatedAt,
      ],
    );

    const rowId = toNumber(inserted.rows[0]?.id);
    if (rowId === null) {
      throw new AnalysisError("Saving the analysis did not return a row id", "PERSISTENCE_FAILURE", {
        context: { analysisId: record.analysisId },
      });
    }

    await tx("DELETE FROM stock_analysis_reviews WHERE analysis_row_id = $1", [rowId]);
    for (const review of record.reviews) {
      await tx(
        `
          INSERT INTO stock_analysis_reviews (
            analysis_row_id,
            role,
            agent_name,
            raw_output,
            summary,
            focus_areas,
            created_at
          )
          VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7)
        `,
        [
          rowId,
          review.role,
          review.agentName,
          review.rawOutput,
          review.summary,
          JSON.stringify(review.focusAreas),
          review.createdAt,
        ],
      );
    }

    return rowId;
  });
}

function toStoredReview(row: StockAnalysisReviewRow): StoredReview {
  return {
    role: toText(row.role),
    agentName: toText(row.agent_name),
    rawOutput: toText(row.raw_output),
    summary: toText(row.summary),
    focusAreas: toStringArray(row.focus_areas),
    createdAt: toIsoTimestamp(row.created_at),
  };
}

export async function getStockAnalysisRecord(id: number): Promise<AnalysisRecord | null> {
  const result = await query<StockAnalysisRow>(
    `
      SELECT
        id,
        analysis_id,
        symbol,
        stock_name,
        period,
        stock_info,
        status,
        team_discussion,
        final_decision,
        failure_reason,
        created_at,
        updated_at
      FROM stock_analyses
      WHERE id = $1
    `,
    [id],
  );

  const row = result.rows[0];
  if (!row) {
    return null;
  }

  if (!isAnalysisStatus(row.status)) {
    throw new AnalysisError(`Stored analysis ${id} has an unknown status "${row.status}"`, "PERSISTENCE_FAILURE", {
      context: { id, status: row.status },
    });
  }

  const reviews = await query<StockAnalysisReviewRow>(
    `
      SELECT role, agent_name, raw_output, summary, focus_areas, created_at
      FROM stock_analysis_reviews
      WHERE analysis_row_id = $1
      ORDER BY created_at ASC
    `,
    [id],
  );

  return {
    analysisId: row.analysis_id,
    stockInfo: toStockInfo(row.stock_info, row.symbol, row.stock_name),
    period: row.period,
    status: row.status,
    reviews: reviews.rows.map(toStoredReview),
    teamDiscussion: row.team_discussion,
    finalDecision: toJsonObject(row.final_decision),
    failureReason: row.failure_reason,
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at),
  };
}

export async function listRecentStockAnalyses(limit = DEFAULT_LIST_LIMIT): Promise<AnalysisSummary[]> {
  const boundedLimit = Math.max(1, Math.min(MAX_LIST_LIMIT, Math.floor(limit)));
  const result = await query<StockAnalysisRow>(
    `
      SELECT id, analysis_id, symbol, stock_name, period, stock_info, status,
             team_discussion, final_decision, failure_reason, created_at, updated_at
      FROM stock_analyses
      ORDER BY created_at DESC, id DESC
      LIMIT $1
    `,
    [boundedLimit],
  );

  return result.rows.flatMap((row) => {
    const id = toNumber(row.id);
    if (id === null || !isAnalysisStatus(row.status)) {
      return [];
    }
    return [
      {
        id,
        analysisId: row.analysis_id,
        symbol: row.symbol,
        stockName: row.stock_name,
        period: row.period,
        status: row.status,
        createdAt: toIsoTimestamp(row.created_at),
      },
    ];
  });
}

export class PostgresAnalysisRepository implements AnalysisRepository {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger("store/postgres")) {
    this.logger = logger;
  }

  save(analysis: StockAnalysis): Promise<number> {
    return saveStockAnalysis(analysis);
  }

  async findById(id: number): Promise<StockAnalysis | null> {
    const record = await getStockAnalysisRecord(id);
    return record ? restoreAnalysis(record, this.logger) : null;
  }

  listRecent(limit?: number): Promise<AnalysisSummary[]> {
    return listRecentStockAnalyses(limit);
  }
}
