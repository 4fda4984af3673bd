import OpenAI from "openai";
import { z } from "zod";

import { type LLMProvider } from "../../config/llm_providers";
import { errorMessage, GenerationError } from "../../errors";
import { requireProviderApiKey, requireProviderBaseUrl, withJsonInstruction } from "./config";
import type { ChatMessage, LLMClient, LLMCompletionRequest } from "./types";

const REASONER_MIN_MAX_TOKENS = 8_000;

const openAICompatibleResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      }),
    )
    .optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

function requireText(provider: LLMProvider, text: string | null | undefined): string {
  if (typeof text === "string" && text.trim().length > 0) {
    return text;
  }

  throw new GenerationError(provider, `${provider} returned an empty completion`);
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

class OpenAIProviderClient implements LLMClient {
  readonly provider: LLMProvider = "OpenAI";
  private readonly client: OpenAI;

  constructor() {
    this.client = new OpenAI({
      apiKey: requireProviderApiKey("OpenAI"),
      baseURL: requireProviderBaseUrl("OpenAI"),
    });
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toOpenAIMessage),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        response_format: request.requireJsonObject ? { type: "json_object" } : undefined,
      });

      return requireText(this.provider, response.choices[0]?.message?.content);
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError(this.provider, `OpenAI completion failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

abstract class OpenAICompatibleProviderClient implements LLMClient {
  abstract readonly provider: LLMProvider;

  private readonly apiKey: string;
  private readonly baseUrl: string;

  protected constructor(provider: LLMProvider) {
    this.apiKey = requireProviderApiKey(provider);
    this.baseUrl = requireProviderBaseUrl(provider);
  }

  protected resolveMaxTokens(request: LLMCompletionRequest): number {
    return request.maxTokens;
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: request.model,
          messages: withJsonInstruction(request.messages, Boolean(request.requireJsonObject)),
          temperature: request.temperature,
          max_tokens: this.resolveMaxTokens(request),
          response_format: request.requireJsonObject ? { type: "json_object" } : undefined,
        }),
      });
    } catch (error) {
      throw new GenerationError(this.provider, `${this.provider} request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = openAICompatibleResponseSchema.safeParse(await response.json().catch(() => ({})));
    const payload: z.infer<typeof openAICompatibleResponseSchema> = parsed.success ? parsed.data : {};
    if (!response.ok) {
      const message = payload.error?.message ?? response.statusText;
      throw new GenerationError(this.provider, `${this.provider} completion failed: ${message}`, {
        context: { status: response.status },
      });
    }

    return requireText(this.provider, payload.choices?.[0]?.message?.content);
  }
}

class DeepSeekProviderClient extends OpenAICompatibleProviderClient {
  readonly provider: LLMProvider = "DeepSeek";

  constructor() {
    super("DeepSeek");
  }

  protected override resolveMaxTokens(request: LLMCompletionRequest): number {
    if (request.model.includes("reasoner")) {
      return Math.max(REASONER_MIN_MAX_TOKENS, request.maxTokens);
    }
    return request.maxTokens;
  }
}

class AnthropicProviderClient implements LLMClient {
  readonly provider: LLMProvider = "Anthropic";

  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor() {
    this.apiKey = requireProviderApiKey("Anthropic");
    this.baseUrl = requireProviderBaseUrl("Anthropic");
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    const messages = withJsonInstruction(request.messages, Boolean(request.requireJsonObject));
    const system = messages
      .filter((message) => message.role === "system")
      .map((message) => message.content)
      .join("\n\n");

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1/messages`, {
        method: "POST",
        headers: {
          "x-api-key": this.apiKey,
          "anthropic-version": "2023-06-01",
          "content-type": "application/json",
        },
        body: JSON.stringify({
          model: request.model,
          system: system.length > 0 ? system : undefined,
          messages: messages.filter((message) => message.role !== "system"),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        }),
      });
    } catch (error) {
      throw new GenerationError(this.provider, `Anthropic request failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = anthropicResponseSchema.safeParse(await response.json().catch(() => ({})));
    const payload: z.infer<typeof anthropicResponseSchema> = parsed.success ? parsed.data : {};
    if (!response.ok) {
      const message = payload.error?.message ?? response.statusText;
      throw new GenerationError(this.provider, `Anthropic completion failed: ${message}`, {
        context: { status: response.status },
      });
    }

    const textChunk = payload.content?.find((entry) => entry.type === "text");
    return requireText(this.provider, textChunk?.text);
  }
}

export function createProviderClient(provider: LLMProvider): LLMClient {
  switch (provider) {
    case "OpenAI":
      return new OpenAIProviderClient();
    case "Anthropic":
      return new AnthropicProviderClient();
    case "DeepSeek":
      return new DeepSeekProviderClient();
  }
}
