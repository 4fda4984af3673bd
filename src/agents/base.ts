import { ANALYST_SETTINGS, type AnalystSettings, SUMMARY_CHAR_BUDGET } from "../config/analyst_config";
import type { LLMClient } from "../llm/client";
import type { StockDataBundle } from "../market/types";
import {
  type AgentReview,
  type AgentRole,
  type StockInfo,
  buildAnalysisContent,
  createAgentReview,
} from "../workflow/states";
import { formatNumber } from "./base_utils/formatting";
import { loadPrompts, type PromptPayload, renderTemplate } from "./base_utils/prompts";

export type PromptVariables = Record<string, string | null>;

export interface AgentRuntimeOptions {
  settings?: Partial<AnalystSettings>;
  promptOverride?: PromptPayload;
  summaryBudget?: number;
  clock?: () => Date;
}

export interface AnalystAgent {
  readonly role: AgentRole;
  readonly displayName: string;
  analyze(stockInfo: StockInfo, bundle: StockDataBundle): Promise<AgentReview | null>;
}

/**
 * Shared flow for every analyst: select data, render the role prompt,
 * make one gateway call, wrap the text. Gateway errors propagate to the caller.
 */
export abstract class BaseAnalystAgent implements AnalystAgent {
  readonly role: AgentRole;
  readonly displayName: string;

  protected readonly llmClient: LLMClient;
  protected readonly modelName: string;
  protected readonly settings: AnalystSettings;

  private readonly prompts: PromptPayload;
  private readonly summaryBudget: number;
  private readonly clock: () => Date;

  protected constructor(role: AgentRole, llmClient: LLMClient, modelName: string, options?: AgentRuntimeOptions) {
    this.role = role;
    this.llmClient = llmClient;
    this.modelName = modelName;
    this.settings = { ...ANALYST_SETTINGS[role], ...options?.settings };
    this.displayName = this.settings.displayName;
    this.prompts = options?.promptOverride ?? loadPrompts(role);
    this.summaryBudget = options?.summaryBudget ?? SUMMARY_CHAR_BUDGET;
    this.clock = options?.clock ?? (() => new Date());
  }

  /**
   * Prompt variables for this role, or null when the role has nothing to analyse.
   */
  protected abstract buildPromptVariables(stockInfo: StockInfo, bundle: StockDataBundle): PromptVariables | null;

  protected baseVariables(stockInfo: StockInfo): PromptVariables {
    return {
      symbol: stockInfo.symbol,
      name: stockInfo.name,
      sector: stockInfo.sector,
      industry: stockInfo.industry,
      current_price: stockInfo.currentPrice > 0 ? formatNumber(stockInfo.currentPrice) : null,
    };
  }

  renderUserMessage(stockInfo: StockInfo, bundle: StockDataBundle): string | null {
    const variables = this.buildPromptVariables(stockInfo, bundle);
    if (!variables) {
      return null;
    }
    return renderTemplate(this.prompts.userTemplate, { ...this.baseVariables(stockInfo), ...variables });
  }

  async analyze(stockInfo: StockInfo, bundle: StockDataBundle): Promise<AgentReview | null> {
    const userMessage = this.renderUserMessage(stockInfo, bundle);
    if (userMessage === null) {
      return null;
    }

    const text = await this.llmClient.complete({
      model: this.modelName,
      messages: [
        { role: "system", content: this.prompts.systemMessage },
        { role: "user", content: userMessage },
      ],
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
    });

    return createAgentReview({
      role: this.role,
      agentName: this.displayName,
      content: buildAnalysisContent(text, this.settings.focusAreas, this.summaryBudget),
      createdAt: this.clock(),
    });
  }
}
