import { describe, expect, it } from "vitest";

import {
  createAnalystAgents,
  FundamentalAnalyst,
  FundFlowAnalyst,
  NewsAnalyst,
  TechnicalAnalyst,
} from "../../src/agents/analysts";
import { createStockInfo } from "../../src/workflow/states";
import { fixedTextClient, QueueLLMClient, systemMessageOf, userMessageOf } from "../helpers/fake_llm";
import { fixedClock, makeBundle, signal, TEST_STOCK } from "../helpers/fixtures";

describe("TechnicalAnalyst", () => {
  it("renders N/A for every missing indicator", () => {
    const agent = new TechnicalAnalyst(fixedTextClient("unused"), "test-model");

    const message = agent.renderUserMessage(TEST_STOCK, makeBundle({ indicators: null, priceSeries: [] }));

    expect(message).toContain("- MA5: N/A | MA10: N/A | MA20: N/A | MA60: N/A");
    expect(message).toContain("- RSI: N/A");
    expect(message).toContain("Recent closes:\nN/A");
    expect(message).not.toMatch(/\{[a-z0-9_]+\}/);
  });

  it("wraps the gateway text into a review with its focus tags", async () => {
    const client = fixedTextClient("Uptrend with rising volume.");
    const agent = new TechnicalAnalyst(client, "test-model", { clock: fixedClock("2026-04-01T00:00:00.000Z") });

    const review = await agent.analyze(TEST_STOCK, makeBundle());

    expect(review).toEqual({
      role: "technical",
      agentName: "Technical Analyst",
      createdAt: new Date("2026-04-01T00:00:00.000Z"),
      content: {
        summary: "Uptrend with rising volume.",
        details: { full_content: "Uptrend with rising volume." },
        focusAreas: ["indicators", "trend", "support_resistance", "signals"],
        rawOutput: "Uptrend with rising volume.",
      },
    });
    const [request] = client.requests;
    expect(request?.model).toBe("test-model");
    expect(request?.temperature).toBe(0.5);
    expect(request?.maxTokens).toBe(2000);
    expect(request ? systemMessageOf(request) : "").toContain("ROLE: Technical Analyst.");
  });

  it("caps the summary at 200 characters plus an ellipsis", async () => {
    const longText = "a".repeat(250);
    const agent = new TechnicalAnalyst(fixedTextClient(longText), "test-model");

    const review = await agent.analyze(TEST_STOCK, makeBundle());

    expect(review?.content.summary).toBe(`${"a".repeat(200)}...`);
    expect(review?.content.details).toEqual({ full_content: longText });
  });

  it("keeps a 200 character text whole", async () => {
    const text = "b".repeat(200);
    const agent = new TechnicalAnalyst(fixedTextClient(text), "test-model");

    const review = await agent.analyze(TEST_STOCK, makeBundle());

    expect(review?.content.summary).toBe(text);
  });

  it("renders the price and the latest closes", () => {
    const agent = new TechnicalAnalyst(fixedTextClient("unused"), "test-model");

    const message = agent.renderUserMessage(TEST_STOCK, makeBundle());

    expect(message).toContain("Current price: 12.50");
    expect(message).toContain("over the 1y window");
    expect(message).toContain("2026-01-03: close 12.50, volume 3000");
  });

  it("lets gateway errors propagate", async () => {
    const agent = new TechnicalAnalyst(new QueueLLMClient([new Error("rate limited")]), "test-model");

    await expect(agent.analyze(TEST_STOCK, makeBundle())).rejects.toThrow("rate limited");
  });
});

describe("FundamentalAnalyst", () => {
  it("groups financial ratios and shows N/A without a quarterly report", () => {
    const agent = new FundamentalAnalyst(fixedTextClient("unused"), "test-model");

    const message = agent.renderUserMessage(TEST_STOCK, makeBundle());

    expect(message).toContain("Financial ratios:\nValuation:\n- P/E: 15\n\nProfitability:\n- ROE: 12.34\n");
    expect(message).toContain("Latest quarterly reports:\nN/A");
    expect(message).toContain("Sector: Utilities | Industry: Water");
  });

  it("renders N/A for the price when it is unknown", () => {
    const agent = new FundamentalAnalyst(fixedTextClient("unused"), "test-model");
    const stock = createStockInfo({ symbol: "ZERO" });

    const message = agent.renderUserMessage(stock, makeBundle({ stockInfo: stock, financialData: null }));

    expect(message).toContain("Current price: N/A");
    expect(message).toContain("Financial ratios:\nN/A");
    expect(message).toContain("Sector: N/A | Industry: N/A");
  });
});

describe("FundFlowAnalyst", () => {
  it("falls back to a note when flow data reports no success", () => {
    const agent = new FundFlowAnalyst(fixedTextClient("unused"), "test-model");

    const message = agent.renderUserMessage(TEST_STOCK, makeBundle({ fundFlowData: signal({ data_success: false }) }));

    expect(message).toContain("No fund flow data is available for this stock.");
  });

  it("passes usable flow data through with its source", () => {
    const agent = new FundFlowAnalyst(fixedTextClient("unused"), "test-model");

    const message = agent.renderUserMessage(TEST_STOCK, makeBundle({ fundFlowData: signal("net inflow 5m") }));

    expect(message).toContain("Fund flow data:\nSource: test-source\nnet inflow 5m");
  });
});

describe("NewsAnalyst", () => {
  it("produces no review and makes no call without news", async () => {
    const client = fixedTextClient("unused");
    const agent = new NewsAnalyst(client, "test-model");

    await expect(agent.analyze(TEST_STOCK, makeBundle())).resolves.toBeNull();
    await expect(agent.analyze(TEST_STOCK, makeBundle({ newsData: signal({ data_success: false }) }))).resolves.toBeNull();
    await expect(agent.analyze(TEST_STOCK, makeBundle({ newsData: signal([]) }))).resolves.toBeNull();
    expect(client.requests).toHaveLength(0);
  });

  it("reviews usable news", async () => {
    const client = fixedTextClient("Contract win is positive.");
    const agent = new NewsAnalyst(client, "test-model");

    const review = await agent.analyze(TEST_STOCK, makeBundle({ newsData: signal("New supply contract signed") }));

    expect(review?.agentName).toBe("News Analyst");
    expect(review?.content.focusAreas).toEqual(["public_opinion", "news_events", "price_impact"]);
    const [request] = client.requests;
    expect(request ? userMessageOf(request) : "").toContain("Source: test-source\nNew supply contract signed");
  });

  it("falls back to a plain prompt when optional data is not required", async () => {
    const client = fixedTextClient("Quiet news week.");
    const agent = new NewsAnalyst(client, "test-model", { settings: { requiresOptionalData: false } });

    const review = await agent.analyze(TEST_STOCK, makeBundle());

    expect(review?.content.rawOutput).toBe("Quiet news week.");
    const [request] = client.requests;
    expect(request ? userMessageOf(request) : "").toContain("News items:\nN/A");
  });
});

describe("createAnalystAgents", () => {
  it("builds one agent per role with its display name", () => {
    const agents = createAnalystAgents(fixedTextClient("unused"), "test-model");

    expect(Object.fromEntries(Object.entries(agents).map(([role, agent]) => [role, agent.displayName]))).toEqual({
      technical: "Technical Analyst",
      fundamental: "Fundamental Analyst",
      fund_flow: "Fund Flow Analyst",
      risk_management: "Risk Management Analyst",
      market_sentiment: "Market Sentiment Analyst",
      news_analyst: "News Analyst",
    });
  });
});
