import type { LLMProvider } from "../../config/llm_providers";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LLMCompletionRequest {
  model: string;
  messages: readonly ChatMessage[];
  temperature: number;
  maxTokens: number;
  requireJsonObject?: boolean;
}

/**
 * Generation gateway. Implementations throw GenerationError instead of
 * returning empty text.
 */
export interface LLMClient {
  readonly provider: LLMProvider | "Simulation";
  complete(request: LLMCompletionRequest): Promise<string>;
}
