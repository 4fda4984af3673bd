import type { AnalystRegistry } from "../agents/analysts";
import { formatNumber, indicatorValue } from "../agents/base_utils/formatting";
import { loadPrompts, renderTemplate } from "../agents/base_utils/prompts";
import { type CallBudget, DECISION_BUDGET, DISCUSSION_BUDGET } from "../config/analyst_config";
import { DEFAULT_ANALYST_TIMEOUT_MS, MAX_ANALYST_WORKERS } from "../config/env";
import {
  AnalysisError,
  AnalystExecutionError,
  AnalysisTimeoutError,
  errorMessage,
  NoReviewsProducedError,
} from "../errors";
import type { LLMClient } from "../llm/client";
import { createLogger, type Logger } from "../logging/logger";
import type { StockDataBundle } from "../market/types";
import { runBounded, type TaskOutcome } from "./concurrency";
import { DecisionParser, type DecisionParseOutcome, fallbackDecision } from "./decision_parser";
import { sortByCanonicalOrder } from "./roles";
import type { AgentReview, AgentRole, FinalDecision } from "./states";
import type { StockAnalysis } from "./stock_analysis";

export type MissingReviewReason = "no_data" | "failed" | "timed_out";

export interface MissingReview {
  role: AgentRole;
  reason: MissingReviewReason;
  error?: string;
}

export interface AnalystTaskReport {
  role: AgentRole;
  status: "reviewed" | MissingReviewReason;
  durationMs: number;
}

export type OrchestrationResult =
  | {
      status: "COMPLETED";
      analysis: StockAnalysis;
      missingRoles: MissingReview[];
      tasks: AnalystTaskReport[];
      decisionOutcome: DecisionParseOutcome;
    }
  | {
      status: "FAILED";
      analysis: StockAnalysis;
      missingRoles: MissingReview[];
      tasks: AnalystTaskReport[];
      error: AnalysisError;
    };

export interface OrchestratorOptions {
  modelName: string;
  maxWorkers?: number;
  analystTimeoutMs?: number;
  discussionBudget?: CallBudget;
  decisionBudget?: CallBudget;
  decisionParser?: DecisionParser;
  logger?: Logger;
}

export interface OrchestratorHooks {
  onAnalystStart?: (role: AgentRole) => void;
  onAnalystFinish?: (report: AnalystTaskReport) => void;
}

type AnalystTaskResult = { role: AgentRole; review: AgentReview | null };

/**
 * Drives one analysis: concurrent analyst fan-out, serial merge into the
 * aggregate, team discussion, final decision.
 */
export class AnalysisOrchestrator {
  private readonly analysts: AnalystRegistry;
  private readonly llmClient: LLMClient;
  private readonly modelName: string;
  private readonly maxWorkers: number;
  private readonly analystTimeoutMs: number;
  private readonly discussionBudget: CallBudget;
  private readonly decisionBudget: CallBudget;
  private readonly decisionParser: DecisionParser;
  private readonly logger: Logger;

  constructor(analysts: AnalystRegistry, llmClient: LLMClient, options: OrchestratorOptions) {
    this.analysts = analysts;
    this.llmClient = llmClient;
    this.modelName = options.modelName;
    this.maxWorkers = Math.max(1, Math.min(MAX_ANALYST_WORKERS, options.maxWorkers ?? MAX_ANALYST_WORKERS));
    this.analystTimeoutMs = options.analystTimeoutMs ?? DEFAULT_ANALYST_TIMEOUT_MS;
    this.discussionBudget = options.discussionBudget ?? DISCUSSION_BUDGET;
    this.decisionBudget = options.decisionBudget ?? DECISION_BUDGET;
    this.logger = options.logger ?? createLogger("orchestrator");
    this.decisionParser =
      options.decisionParser ??
      new DecisionParser(llmClient, { modelName: options.modelName, logger: this.logger.child("decision") });
  }

  async perform(
    analysis: StockAnalysis,
    bundle: StockDataBundle,
    enabledRoles: readonly AgentRole[],
    hooks: OrchestratorHooks = {},
  ): Promise<OrchestrationResult> {
    analysis.start();

    const roles = sortByCanonicalOrder(enabledRoles);
    const outcomes = await this.runAnalysts(analysis, bundle, roles, hooks);

    const missingRoles: MissingReview[] = [];
    const tasks: AnalystTaskReport[] = [];
    outcomes.forEach((outcome, index) => {
      const role = roles[index];
      if (!role) {
        return;
      }
      const report = this.applyOutcome(analysis, role, outcome, missingRoles);
      tasks.push(report);
    });

    if (analysis.reviews.size === 0) {
      const error = new NoReviewsProducedError("no analyst produced a review", {
        analysisId: analysis.id,
        requestedRoles: roles,
      });
      analysis.fail(error.message);
      this.logger.error("Analysis failed: no reviews", { analysisId: analysis.id, symbol: analysis.stockInfo.symbol });
      return { status: "FAILED", analysis, missingRoles, tasks, error };
    }

    let discussion: string;
    try {
      discussion = await this.generateDiscussion(analysis);
      analysis.conductDiscussion(discussion);
    } catch (error) {
      const failure =
        error instanceof AnalysisError
          ? error
          : new AnalystExecutionError("team_discussion", errorMessage(error), { cause: error });
      analysis.fail(`team discussion failed: ${failure.message}`);
      this.logger.error("Team discussion failed", { analysisId: analysis.id, error: failure.message });
      return { status: "FAILED", analysis, missingRoles, tasks, error: failure };
    }

    const { decision, outcome } = await this.generateDecision(analysis, bundle, discussion);
    analysis.finalizeDecision(decision);

    return { status: "COMPLETED", analysis, missingRoles, tasks, decisionOutcome: outcome };
  }

  private async runAnalysts(
    analysis: StockAnalysis,
    bundle: StockDataBundle,
    roles: readonly AgentRole[],
    hooks: OrchestratorHooks,
  ): Promise<TaskOutcome<AnalystTaskResult>[]> {
    const stockInfo = analysis.stockInfo;
    const taskList = roles.map((role) => async (): Promise<AnalystTaskResult> => {
      hooks.onAnalystStart?.(role);
      const review = await this.analysts[role].analyze(stockInfo, bundle);
      return { role, review };
    });

    return runBounded(taskList, {
      concurrency: Math.min(roles.length, this.maxWorkers),
      timeoutMs: this.analystTimeoutMs,
      onSettled: (index, outcome) => {
        const role = roles[index];
        if (role) {
          hooks.onAnalystFinish?.({ role, status: reportStatus(outcome), durationMs: outcome.durationMs });
        }
      },
    });
  }

  private applyOutcome(
    analysis: StockAnalysis,
    role: AgentRole,
    outcome: TaskOutcome<AnalystTaskResult>,
    missingRoles: MissingReview[],
  ): AnalystTaskReport {
    const report: AnalystTaskReport = { role, status: reportStatus(outcome), durationMs: outcome.durationMs };

    if (outcome.status === "fulfilled") {
      const { review } = outcome.value;
      if (review) {
        analysis.addReview(role, review.content, review.agentName, { createdAt: review.createdAt });
      } else {
        this.logger.info("Analyst produced no review", { role, symbol: analysis.stockInfo.symbol });
        missingRoles.push({ role, reason: "no_data" });
      }
      return report;
    }

    if (outcome.status === "timed_out") {
      const error = new AnalysisTimeoutError(`${role} analyst timed out`, outcome.timeoutMs, { role });
      this.logger.warn("Analyst timed out", { role, timeoutMs: outcome.timeoutMs });
      missingRoles.push({ role, reason: "timed_out", error: error.message });
      return report;
    }

    const error = new AnalystExecutionError(role, errorMessage(outcome.error), { cause: outcome.error });
    this.logger.error("Analyst failed", { role, error: error.message });
    missingRoles.push({ role, reason: "failed", error: error.message });
    return report;
  }

  buildDiscussionInput(reviews: readonly AgentReview[]): string {
    return reviews.map((review) => `\n[${review.agentName}]:\n${review.content.summary}\n`).join("");
  }

  private async generateDiscussion(analysis: StockAnalysis): Promise<string> {
    const prompts = loadPrompts("team_discussion");
    const userMessage = renderTemplate(prompts.userTemplate, {
      symbol: analysis.stockInfo.symbol,
      name: analysis.stockInfo.name,
      agent_analyses: this.buildDiscussionInput(analysis.orderedReviews()),
    });

    return this.llmClient.complete({
      model: this.modelName,
      messages: [
        { role: "system", content: prompts.systemMessage },
        { role: "user", content: userMessage },
      ],
      temperature: this.discussionBudget.temperature,
      maxTokens: this.discussionBudget.maxTokens,
    });
  }

  private async generateDecision(
    analysis: StockAnalysis,
    bundle: StockDataBundle,
    discussion: string,
  ): Promise<{ decision: FinalDecision; outcome: DecisionParseOutcome }> {
    const prompts = loadPrompts("final_decision");
    const { stockInfo } = analysis;
    const userMessage = renderTemplate(prompts.userTemplate, {
      symbol: stockInfo.symbol,
      name: stockInfo.name,
      current_price: stockInfo.currentPrice > 0 ? formatNumber(stockInfo.currentPrice) : null,
      team_discussion: discussion,
      ma20: indicatorValue(bundle.indicators, "ma20"),
      bb_upper: indicatorValue(bundle.indicators, "bb_upper"),
      bb_lower: indicatorValue(bundle.indicators, "bb_lower"),
    });

    let rawDecision: string;
    try {
      rawDecision = await this.llmClient.complete({
        model: this.modelName,
        messages: [
          { role: "system", content: prompts.systemMessage },
          { role: "user", content: userMessage },
        ],
        temperature: this.decisionBudget.temperature,
        maxTokens: this.decisionBudget.maxTokens,
      });
    } catch (error) {
      const message = `decision generation failed: ${errorMessage(error)}`;
      this.logger.error("Decision generation failed", { analysisId: analysis.id, error: message });
      return { decision: fallbackDecision("", message), outcome: "fallback" };
    }

    const parsed = await this.decisionParser.parse(rawDecision);
    return { decision: parsed.decision, outcome: parsed.outcome };
  }
}

function reportStatus(outcome: TaskOutcome<AnalystTaskResult>): AnalystTaskReport["status"] {
  switch (outcome.status) {
    case "fulfilled":
      return outcome.value.review ? "reviewed" : "no_data";
    case "timed_out":
      return "timed_out";
    case "rejected":
      return "failed";
  }
}
