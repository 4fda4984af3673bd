import { describe, expect, it } from "vitest";

import { createAnalystAgents } from "../../src/agents/analysts";
import { AggregateInvariantViolation, AnalystExecutionError, NoReviewsProducedError } from "../../src/errors";
import { AnalysisOrchestrator, type OrchestratorOptions } from "../../src/workflow/orchestrator";
import type { AgentRole } from "../../src/workflow/states";
import { type ScriptHandler, ScriptedLLMClient, userMessageOf } from "../helpers/fake_llm";
import { content, makeBundle, newAnalysis } from "../helpers/fixtures";

const FOUR_ROLES: AgentRole[] = ["technical", "fundamental", "fund_flow", "risk_management"];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const defaultHandler: ScriptHandler = (call) => {
  switch (call.kind) {
    case "analyst":
      return `${call.analyst} sees a steady picture.`;
    case "discussion":
      return "The team broadly agrees.";
    case "decision":
      return '{"rating": "Hold", "target_price": "13.00"}';
    case "repair":
      return "{}";
  }
};

function setup(handler: ScriptHandler = defaultHandler, options: Partial<OrchestratorOptions> = {}) {
  const client = new ScriptedLLMClient(handler);
  const orchestrator = new AnalysisOrchestrator(createAnalystAgents(client, "test-model"), client, {
    modelName: "test-model",
    ...options,
  });
  return { client, orchestrator };
}

describe("AnalysisOrchestrator", () => {
  it("collects one review per enabled role and completes", async () => {
    const { client, orchestrator } = setup();
    const analysis = newAnalysis();

    const result = await orchestrator.perform(analysis, makeBundle(), FOUR_ROLES);

    expect(result.status).toBe("COMPLETED");
    expect([...analysis.reviews.keys()].sort()).toEqual([...FOUR_ROLES].sort());
    expect(analysis.teamDiscussion).toBe("The team broadly agrees.");
    expect(analysis.finalDecision).toEqual({ rating: "Hold", target_price: "13.00" });
    expect(result.missingRoles).toEqual([]);
    expect(client.callsOf("analyst")).toHaveLength(4);
    expect(client.callsOf("discussion")).toHaveLength(1);
    expect(client.callsOf("decision")).toHaveLength(1);
    expect(client.callsOf("repair")).toHaveLength(0);
  });

  it("completes with N-1 reviews when one analyst throws", async () => {
    const { orchestrator } = setup((call, request) => {
      if (call.analyst === "Fundamental Analyst") {
        throw new Error("boom");
      }
      return defaultHandler(call, request);
    });
    const analysis = newAnalysis();

    const result = await orchestrator.perform(analysis, makeBundle(), FOUR_ROLES);

    expect(result.status).toBe("COMPLETED");
    expect(analysis.status).toBe("COMPLETED");
    expect(analysis.reviews.size).toBe(3);
    expect(analysis.reviews.has("fundamental")).toBe(false);
    expect(result.missingRoles).toEqual([{ role: "fundamental", reason: "failed", error: "boom" }]);
    expect(result.tasks.find((task) => task.role === "fundamental")?.status).toBe("failed");
  });

  it("fails the analysis when every analyst throws", async () => {
    const { client, orchestrator } = setup((call) => {
      if (call.kind === "analyst") {
        throw new Error("provider offline");
      }
      return "unused";
    });
    const analysis = newAnalysis();

    const result = await orchestrator.perform(analysis, makeBundle(), ["technical", "fundamental"]);

    expect(result.status).toBe("FAILED");
    expect(analysis.status).toBe("FAILED");
    expect(analysis.failureReason).toBe("no analyst produced a review");
    expect(result.status === "FAILED" ? result.error : null).toBeInstanceOf(NoReviewsProducedError);
    expect(client.callsOf("discussion")).toHaveLength(0);
    expect(client.callsOf("decision")).toHaveLength(0);
  });

  it("builds the discussion input in canonical order whatever the completion order", async () => {
    const delays: Record<string, number> = {
      "Technical Analyst": 40,
      "Fundamental Analyst": 25,
      "Fund Flow Analyst": 10,
      "Risk Management Analyst": 0,
    };
    const { client, orchestrator } = setup(async (call, request) => {
      if (call.kind === "analyst") {
        await sleep(delays[call.analyst] ?? 0);
        return `${call.analyst} summary`;
      }
      return defaultHandler(call, request);
    });

    await orchestrator.perform(newAnalysis(), makeBundle(), FOUR_ROLES);

    const [discussionCall] = client.callsOf("discussion");
    const message = discussionCall ? userMessageOf(discussionCall) : "";
    const positions = ["Technical Analyst", "Fundamental Analyst", "Fund Flow Analyst", "Risk Management Analyst"].map(
      (name) => message.indexOf(`[${name}]:`),
    );
    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((left, right) => left - right)).toEqual(positions);
  });

  it("treats a slow analyst as timed out without blocking the others", async () => {
    const { orchestrator } = setup(
      async (call, request) => {
        if (call.analyst === "Technical Analyst") {
          await sleep(200);
        }
        return defaultHandler(call, request);
      },
      { analystTimeoutMs: 20 },
    );
    const analysis = newAnalysis();

    const result = await orchestrator.perform(analysis, makeBundle(), ["technical", "fundamental"]);

    expect(result.status).toBe("COMPLETED");
    expect(analysis.reviews.has("technical")).toBe(false);
    expect(analysis.reviews.has("fundamental")).toBe(true);
    expect(result.missingRoles).toEqual([
      { role: "technical", reason: "timed_out", error: "technical analyst timed out" },
    ]);
  });

  it("reports a news analyst without news as no_data", async () => {
    const { client, orchestrator } = setup();
    const analysis = newAnalysis();

    const result = await orchestrator.perform(analysis, makeBundle(), ["technical", "news_analyst"]);

    expect(result.status).toBe("COMPLETED");
    expect(result.missingRoles).toEqual([{ role: "news_analyst", reason: "no_data" }]);
    expect(client.callsOf("analyst")).toHaveLength(1);
  });

  it("never runs more analysts at once than maxWorkers", async () => {
    let active = 0;
    let peak = 0;
    const { orchestrator } = setup(
      async (call, request) => {
        if (call.kind === "analyst") {
          active += 1;
          peak = Math.max(peak, active);
          await sleep(10);
          active -= 1;
        }
        return defaultHandler(call, request);
      },
      { maxWorkers: 2 },
    );

    const result = await orchestrator.perform(newAnalysis(), makeBundle(), FOUR_ROLES);

    expect(result.status).toBe("COMPLETED");
    expect(peak).toBe(2);
  });

  it("fails the analysis when the discussion call throws", async () => {
    const { orchestrator } = setup((call, request) => {
      if (call.kind === "discussion") {
        throw new Error("discussion down");
      }
      return defaultHandler(call, request);
    });
    const analysis = newAnalysis();

    const result = await orchestrator.perform(analysis, makeBundle(), ["technical"]);

    expect(result.status).toBe("FAILED");
    expect(analysis.failureReason).toBe("team discussion failed: discussion down");
    expect(result.status === "FAILED" ? result.error : null).toBeInstanceOf(AnalystExecutionError);
  });

  it("fails the analysis when the discussion text is blank", async () => {
    const { client, orchestrator } = setup((call, request) =>
      call.kind === "discussion" ? "   " : defaultHandler(call, request),
    );
    const analysis = newAnalysis();

    const result = await orchestrator.perform(analysis, makeBundle(), ["technical"]);

    expect(result.status).toBe("FAILED");
    expect(analysis.status).toBe("FAILED");
    expect(analysis.teamDiscussion).toBeNull();
    expect(analysis.failureReason).toBe("team discussion failed: The team discussion text must not be empty");
    expect(result.status === "FAILED" ? result.error : null).toBeInstanceOf(AggregateInvariantViolation);
    expect(client.callsOf("decision")).toHaveLength(0);
  });

  it("finalizes a fallback decision when the decision call throws", async () => {
    const { orchestrator } = setup((call, request) => {
      if (call.kind === "decision") {
        throw new Error("decision down");
      }
      return defaultHandler(call, request);
    });
    const analysis = newAnalysis();

    const result = await orchestrator.perform(analysis, makeBundle(), ["technical"]);

    expect(result.status === "COMPLETED" ? result.decisionOutcome : null).toBe("fallback");
    expect(analysis.finalDecision).toEqual({
      decision_text: "",
      error: "decision generation failed: decision down",
    });
  });

  it("seeds the decision prompt with the discussion and indicator values", async () => {
    const { client, orchestrator } = setup();

    await orchestrator.perform(newAnalysis(), makeBundle(), ["technical"]);

    const [decisionCall] = client.callsOf("decision");
    const message = decisionCall ? userMessageOf(decisionCall) : "";
    expect(message).toContain("Current price: 12.50");
    expect(message).toContain("MA20: 12\n");
    expect(message).toContain("Bollinger upper: 13.25 | Bollinger lower: 11");
    expect(message).toContain("The team broadly agrees.");
    expect(decisionCall?.temperature).toBe(0.3);
    expect(decisionCall?.maxTokens).toBe(1500);
  });

  it("reports start and finish for every analyst", async () => {
    const started: AgentRole[] = [];
    const finished: string[] = [];
    const { orchestrator } = setup();

    await orchestrator.perform(newAnalysis(), makeBundle(), ["technical", "news_analyst"], {
      onAnalystStart: (role) => started.push(role),
      onAnalystFinish: (report) => finished.push(`${report.role}:${report.status}`),
    });

    expect(started.sort()).toEqual(["news_analyst", "technical"]);
    expect(finished.sort()).toEqual(["news_analyst:no_data", "technical:reviewed"]);
  });

  it("formats discussion input as bracketed agent blocks", () => {
    const { orchestrator } = setup();
    const analysis = newAnalysis();
    analysis.addReview("fundamental", content("cheap on earnings"), "Fundamental Analyst");
    analysis.addReview("technical", content("uptrend"), "Technical Analyst");

    expect(orchestrator.buildDiscussionInput(analysis.orderedReviews())).toBe(
      "\n[Technical Analyst]:\nuptrend\n\n[Fundamental Analyst]:\ncheap on earnings\n",
    );
  });
});
