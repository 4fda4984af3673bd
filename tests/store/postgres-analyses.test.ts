import { beforeEach, describe, expect, it, vi } from "vitest";

import { StockAnalysis } from "../../src/workflow/stock_analysis";
import { content, fixedClock, TEST_STOCK } from "../helpers/fixtures";

const mocks = vi.hoisted(() => ({
  query: vi.fn(),
  tx: vi.fn(),
}));

vi.mock("../../src/store/postgres/client", () => ({
  query: mocks.query,
  withTransaction: async <T>(work: (tx: typeof mocks.tx) => Promise<T>): Promise<T> => work(mocks.tx),
}));

import { PostgresAnalysisRepository } from "../../src/store/postgres/analyses";

const CREATED_AT = "2026-03-01T09:30:00.000Z";

function completedAnalysis(): StockAnalysis {
  const analysis = new StockAnalysis({
    stockInfo: TEST_STOCK,
    period: "3mo",
    id: "analysis-42",
    clock: fixedClock(CREATED_AT),
  });
  analysis.addReview("risk_management", content("moderate risk"), "Risk Management Analyst");
  analysis.addReview("technical", content("uptrend intact"), "Technical Analyst");
  analysis.conductDiscussion("The team agrees.");
  analysis.finalizeDecision({ rating: "Buy" });
  return analysis;
}

function analysisRow(overrides: Record<string, unknown> = {}) {
  return {
    id: "7",
    analysis_id: "analysis-42",
    symbol: "TEST",
    stock_name: "Test Holdings",
    period: "3mo",
    stock_info: { symbol: "TEST", name: "Test Holdings", sector: "Utilities", industry: "Water", currentPrice: 12.5 },
    status: "COMPLETED",
    team_discussion: "The team agrees.",
    final_decision: { rating: "Buy" },
    failure_reason: null,
    created_at: new Date(CREATED_AT),
    updated_at: new Date(CREATED_AT),
    ...overrides,
  };
}

beforeEach(() => {
  mocks.query.mockReset();
  mocks.tx.mockReset();
});

describe("PostgresAnalysisRepository.save", () => {
  it("upserts the analysis and rewrites its reviews in one transaction", async () => {
    mocks.tx.mockImplementation(async (sql: string) =>
      sql.includes("INSERT INTO stock_analyses") ? { rows: [{ id: "7" }] } : { rows: [] },
    );

    const id = await new PostgresAnalysisRepository().save(completedAnalysis());

    expect(id).toBe(7);
    expect(mocks.tx).toHaveBeenCalledTimes(4);

    const [upsertSql, upsertValues] = mocks.tx.mock.calls[0] ?? [];
    expect(upsertSql).toContain("ON CONFLICT (analysis_id) DO UPDATE");
    expect(upsertValues).toEqual([
      "analysis-42",
      "TEST",
      "Test Holdings",
      "3mo",
      JSON.stringify(TEST_STOCK),
      "COMPLETED",
      "The team agrees.",
      JSON.stringify({ rating: "Buy" }),
      null,
      CREATED_AT,
      CREATED_AT,
    ]);

    expect(mocks.tx.mock.calls[1]).toEqual(["DELETE FROM stock_analysis_reviews WHERE analysis_row_id = $1", [7]]);
    expect(mocks.tx.mock.calls[2]?.[1]).toEqual([
      7,
      "technical",
      "Technical Analyst",
      "uptrend intact",
      "uptrend intact",
      JSON.stringify(["focus"]),
      CREATED_AT,
    ]);
    expect(mocks.tx.mock.calls[3]?.[1]?.[1]).toBe("risk_management");
  });

  it("throws when the upsert returns no id", async () => {
    mocks.tx.mockResolvedValue({ rows: [] });

    await expect(new PostgresAnalysisRepository().save(completedAnalysis())).rejects.toMatchObject({
      code: "PERSISTENCE_FAILURE",
    });
  });
});

describe("PostgresAnalysisRepository.findById", () => {
  it("replays the stored row and its reviews", async () => {
    mocks.query.mockImplementation(async (sql: string) => {
      if (sql.includes("FROM stock_analysis_reviews")) {
        return {
          rows: [
            {
              role: "risk_management",
              agent_name: "Risk Management Analyst",
              raw_output: "moderate risk",
              summary: "moderate risk",
              focus_areas: ["risk_control"],
              created_at: new Date(CREATED_AT),
            },
            {
              role: "technical",
              agent_name: "Technical Analyst",
              raw_output: "uptrend intact",
              summary: "uptrend intact",
              focus_areas: '["trend"]',
              created_at: CREATED_AT,
            },
          ],
        };
      }
      return { rows: [analysisRow()] };
    });

    const analysis = await new PostgresAnalysisRepository().findById(7);

    expect(analysis?.id).toBe("analysis-42");
    expect(analysis?.status).toBe("COMPLETED");
    expect(analysis?.stockInfo).toEqual(TEST_STOCK);
    expect(analysis?.orderedReviews().map((review) => review.role)).toEqual(["technical", "risk_management"]);
    expect(analysis?.reviews.get("technical")?.content.focusAreas).toEqual(["trend"]);
    expect(analysis?.finalDecision).toEqual({ rating: "Buy" });
    expect(analysis?.updatedAt.toISOString()).toBe(CREATED_AT);
    expect(mocks.query).toHaveBeenCalledTimes(2);
  });

  it("returns null when the row does not exist", async () => {
    mocks.query.mockResolvedValue({ rows: [] });

    await expect(new PostgresAnalysisRepository().findById(404)).resolves.toBeNull();
    expect(mocks.query).toHaveBeenCalledTimes(1);
  });

  it("rejects a row with an unknown status", async () => {
    mocks.query.mockResolvedValue({ rows: [analysisRow({ status: "ARCHIVED" })] });

    await expect(new PostgresAnalysisRepository().findById(7)).rejects.toMatchObject({ code: "PERSISTENCE_FAILURE" });
  });
});

describe("PostgresAnalysisRepository.listRecent", () => {
  it("maps rows to summaries and clamps the limit", async () => {
    mocks.query.mockResolvedValue({ rows: [analysisRow()] });

    const summaries = await new PostgresAnalysisRepository().listRecent(1000);

    expect(mocks.query.mock.calls[0]?.[1]).toEqual([200]);
    expect(summaries).toEqual([
      {
        id: 7,
        analysisId: "analysis-42",
        symbol: "TEST",
        stockName: "Test Holdings",
        period: "3mo",
        status: "COMPLETED",
        createdAt: CREATED_AT,
      },
    ]);
  });
});
