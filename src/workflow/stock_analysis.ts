import { randomUUID } from "node:crypto";

import { AggregateInvariantViolation } from "../errors";
import {
  type AgentReview,
  type AgentRole,
  type AnalysisContent,
  type AnalysisStatus,
  type FinalDecision,
  type StockInfo,
  ANALYST_ROLES,
  createAgentReview,
} from "./states";

export interface StockAnalysisInit {
  stockInfo: StockInfo;
  period: string;
  id?: string;
  createdAt?: Date;
  clock?: () => Date;
}

/**
 * Aggregate root for one stock analysis. All state changes go through the
 * methods below; status only moves forward.
 */
export class StockAnalysis {
  readonly id: string;
  readonly stockInfo: StockInfo;
  readonly period: string;
  readonly createdAt: Date;

  private readonly clock: () => Date;
  private readonly reviewMap = new Map<AgentRole, AgentReview>();
  private statusValue: AnalysisStatus = "CREATED";
  private updatedAtValue: Date;
  private discussion: string | null = null;
  private decision: FinalDecision | null = null;
  private failure: string | null = null;

  constructor(init: StockAnalysisInit) {
    this.id = init.id ?? randomUUID();
    this.stockInfo = init.stockInfo;
    this.period = init.period;
    this.clock = init.clock ?? (() => new Date());
    this.createdAt = init.createdAt ?? this.clock();
    this.updatedAtValue = this.createdAt;
  }

  get status(): AnalysisStatus {
    return this.statusValue;
  }

  get updatedAt(): Date {
    return this.updatedAtValue;
  }

  get teamDiscussion(): string | null {
    return this.discussion;
  }

  get finalDecision(): FinalDecision | null {
    return this.decision;
  }

  get failureReason(): string | null {
    return this.failure;
  }

  get isTerminal(): boolean {
    return this.statusValue === "COMPLETED" || this.statusValue === "FAILED";
  }

  /**
   * Snapshot of the current reviews. Later mutations are not visible through it.
   */
  get reviews(): ReadonlyMap<AgentRole, AgentReview> {
    return new Map(this.reviewMap);
  }

  /**
   * Reviews in canonical role order.
   */
  orderedReviews(): AgentReview[] {
    return ANALYST_ROLES.flatMap((role) => {
      const review = this.reviewMap.get(role);
      return review ? [review] : [];
    });
  }

  start(): void {
    if (this.statusValue === "IN_PROGRESS") {
      return;
    }
    this.assertNotTerminal("start");
    this.statusValue = "IN_PROGRESS";
    this.touch();
  }

  addReview(role: AgentRole, content: AnalysisContent, agentName: string, options?: { createdAt?: Date }): AgentReview {
    this.assertNotTerminal("addReview");
    if (this.reviewMap.has(role)) {
      throw new AggregateInvariantViolation(`A review for role "${role}" already exists`, {
        analysisId: this.id,
        role,
      });
    }

    const review = createAgentReview({
      role,
      content,
      agentName,
      createdAt: options?.createdAt ?? this.clock(),
    });
    this.reviewMap.set(role, review);
    this.statusValue = "IN_PROGRESS";
    this.touch();
    return review;
  }

  conductDiscussion(text: string): void {
    this.assertNotTerminal("conductDiscussion");
    if (this.reviewMap.size === 0) {
      throw new AggregateInvariantViolation("Cannot conduct a discussion without any reviews", {
        analysisId: this.id,
      });
    }
    if (this.discussion !== null) {
      throw new AggregateInvariantViolation("The team discussion has already been recorded", {
        analysisId: this.id,
      });
    }
    if (text.trim().length === 0) {
      throw new AggregateInvariantViolation("The team discussion text must not be empty", {
        analysisId: this.id,
      });
    }

    this.discussion = text;
    this.touch();
  }

  finalizeDecision(decision: FinalDecision): void {
    this.assertNotTerminal("finalizeDecision");
    if (this.discussion === null) {
      throw new AggregateInvariantViolation("Cannot finalize a decision before the team discussion", {
        analysisId: this.id,
      });
    }

    this.decision = Object.freeze({ ...decision });
    this.statusValue = "COMPLETED";
    this.touch();
  }

  fail(reason: string): void {
    this.assertNotTerminal("fail");
    this.failure = reason;
    this.statusValue = "FAILED";
    this.touch();
  }

  private assertNotTerminal(operation: string): void {
    if (this.isTerminal) {
      throw new AggregateInvariantViolation(`Cannot ${operation} on an analysis in status ${this.statusValue}`, {
        analysisId: this.id,
        status: this.statusValue,
        operation,
      });
    }
  }

  private touch(): void {
    this.updatedAtValue = this.clock();
  }
}
