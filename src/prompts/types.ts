export type PromptId =
  | "technical"
  | "fundamental"
  | "fund_flow"
  | "risk_management"
  | "market_sentiment"
  | "news_analyst"
  | "team_discussion"
  | "final_decision"
  | "json_repair";

export interface PromptDefinition {
  id: PromptId;
  version: string;
  systemMessage: string;
  userTemplate: string;
}

export type PromptRegistry = Record<PromptId, PromptDefinition>;
