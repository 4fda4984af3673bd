import { parseJsonObject } from "../agents/base_utils/parse";
import { loadPrompts, renderTemplate } from "../agents/base_utils/prompts";
import { type CallBudget, REPAIR_BUDGET } from "../config/analyst_config";
import { DecisionParseError, errorMessage } from "../errors";
import type { LLMClient } from "../llm/client";
import { createLogger, type Logger } from "../logging/logger";
import type { FinalDecision } from "./states";

export type DecisionParseOutcome = "parsed" | "cleaned" | "repaired" | "fallback";

export interface ParsedDecision {
  decision: FinalDecision;
  outcome: DecisionParseOutcome;
  repairCalls: number;
}

export interface DecisionParserOptions {
  modelName: string;
  repairBudget?: CallBudget;
  logger?: Logger;
}

export function fallbackDecision(rawText: string, error: string): FinalDecision {
  return { decision_text: rawText, error };
}

/**
 * Turns raw decision text into a structured decision. Local parsing and cleanup
 * come first; at most one repair call goes to the gateway; anything still
 * unparseable degrades to the text fallback.
 */
export class DecisionParser {
  private readonly llmClient: LLMClient;
  private readonly modelName: string;
  private readonly repairBudget: CallBudget;
  private readonly logger: Logger;

  constructor(llmClient: LLMClient, options: DecisionParserOptions) {
    this.llmClient = llmClient;
    this.modelName = options.modelName;
    this.repairBudget = options.repairBudget ?? REPAIR_BUDGET;
    this.logger = options.logger ?? createLogger("decision-parser");
  }

  async parse(rawText: string): Promise<ParsedDecision> {
    const local = parseJsonObject(rawText);
    if (local.ok) {
      return { decision: local.value, outcome: local.cleaned ? "cleaned" : "parsed", repairCalls: 0 };
    }

    this.logger.info("Decision text is not valid JSON, requesting one repair", { error: local.error });

    let repairedText: string;
    try {
      repairedText = await this.requestRepair(rawText, local.error);
    } catch (error) {
      const failure = new DecisionParseError(`JSON repair call failed: ${errorMessage(error)}`, {
        cause: error,
        context: { parseError: local.error },
      });
      this.logger.warn("Falling back to text decision", { error: failure.message });
      return { decision: fallbackDecision(rawText, failure.message), outcome: "fallback", repairCalls: 1 };
    }

    const repaired = parseJsonObject(repairedText);
    if (repaired.ok) {
      return { decision: repaired.value, outcome: "repaired", repairCalls: 1 };
    }

    const failure = new DecisionParseError(`Decision JSON could not be parsed after repair: ${repaired.error}`, {
      context: { parseError: local.error },
    });
    this.logger.warn("Falling back to text decision", { error: failure.message });
    return { decision: fallbackDecision(rawText, failure.message), outcome: "fallback", repairCalls: 1 };
  }

  private async requestRepair(rawText: string, parseError: string): Promise<string> {
    const prompts = loadPrompts("json_repair");

    return this.llmClient.complete({
      model: this.modelName,
      messages: [
        { role: "system", content: prompts.systemMessage },
        { role: "user", content: renderTemplate(prompts.userTemplate, { error: parseError, raw_output: rawText }) },
      ],
      temperature: this.repairBudget.temperature,
      maxTokens: this.repairBudget.maxTokens,
      requireJsonObject: true,
    });
  }
}
