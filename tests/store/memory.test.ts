import { describe, expect, it, vi } from "vitest";

import type { Logger } from "../../src/logging/logger";
import { InMemoryAnalysisRepository } from "../../src/store/memory";
import { restoreAnalysis, toAnalysisRecord } from "../../src/store/records";
import { StockAnalysis } from "../../src/workflow/stock_analysis";
import { content, fixedClock, TEST_STOCK } from "../helpers/fixtures";

function completedAnalysis(): StockAnalysis {
  const analysis = new StockAnalysis({
    stockInfo: TEST_STOCK,
    period: "3mo",
    id: "analysis-42",
    clock: fixedClock("2026-03-01T09:30:00.000Z"),
  });
  analysis.start();
  analysis.addReview("risk_management", content("moderate risk"), "Risk Management Analyst");
  analysis.addReview("technical", content("uptrend intact"), "Technical Analyst");
  analysis.conductDiscussion("The team agrees on a cautious buy.");
  analysis.finalizeDecision({ rating: "Buy", target_price: "14.00" });
  return analysis;
}

function silentLogger() {
  const warn = vi.fn();
  const logger: Logger = {
    scope: "test",
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    child: () => logger,
  };
  return { logger, warn };
}

describe("InMemoryAnalysisRepository", () => {
  it("round-trips a completed analysis", async () => {
    const repository = new InMemoryAnalysisRepository();
    const original = completedAnalysis();

    const id = await repository.save(original);
    const loaded = await repository.findById(id);

    expect(id).toBe(1);
    expect(loaded).not.toBeNull();
    expect(loaded ? toAnalysisRecord(loaded) : null).toEqual(toAnalysisRecord(original));
  });

  it("reuses the id when the same analysis is saved again", async () => {
    const repository = new InMemoryAnalysisRepository();
    const analysis = new StockAnalysis({ stockInfo: TEST_STOCK, period: "1y" });

    const first = await repository.save(analysis);
    analysis.addReview("technical", content("trend"), "Technical Analyst");
    const second = await repository.save(analysis);

    expect(second).toBe(first);
    expect((await repository.findById(first))?.reviews.size).toBe(1);
  });

  it("returns null for an unknown id", async () => {
    await expect(new InMemoryAnalysisRepository().findById(99)).resolves.toBeNull();
  });

  it("lists the most recent analyses first", async () => {
    const repository = new InMemoryAnalysisRepository();
    await repository.save(new StockAnalysis({ stockInfo: TEST_STOCK, period: "1y" }));
    await repository.save(completedAnalysis());

    const recent = await repository.listRecent(1);

    expect(recent).toEqual([
      {
        id: 2,
        analysisId: "analysis-42",
        symbol: "TEST",
        stockName: "Test Holdings",
        period: "3mo",
        status: "COMPLETED",
        createdAt: "2026-03-01T09:30:00.000Z",
      },
    ]);
  });
});

describe("restoreAnalysis", () => {
  it("skips stored reviews with unknown roles and logs a warning", () => {
    const record = toAnalysisRecord(completedAnalysis());
    record.reviews.push({
      role: "astrologer",
      agentName: "Astrologer",
      rawOutput: "stars align",
      summary: "stars align",
      focusAreas: [],
      createdAt: "2026-03-01T09:30:00.000Z",
    });
    const { logger, warn } = silentLogger();

    const restored = restoreAnalysis(record, logger);

    expect(restored.orderedReviews().map((review) => review.role)).toEqual(["technical", "risk_management"]);
    expect(warn).toHaveBeenCalledWith("Skipping stored review with unknown role", {
      analysisId: "analysis-42",
      role: "astrologer",
    });
  });

  it("restores a failed analysis with its reason", () => {
    const analysis = new StockAnalysis({ stockInfo: TEST_STOCK, period: "1y" });
    analysis.start();
    analysis.fail("no analyst produced a review");

    const restored = restoreAnalysis(toAnalysisRecord(analysis));

    expect(restored.status).toBe("FAILED");
    expect(restored.failureReason).toBe("no analyst produced a review");
    expect(restored.updatedAt.toISOString()).toBe(analysis.updatedAt.toISOString());
  });

  it("keeps the stored summary text", () => {
    const record = toAnalysisRecord(completedAnalysis());
    const [first] = record.reviews;
    if (first) {
      first.summary = "short stored summary";
    }

    const restored = restoreAnalysis(record);

    expect(restored.reviews.get("technical")?.content.summary).toBe("short stored summary");
  });
});
