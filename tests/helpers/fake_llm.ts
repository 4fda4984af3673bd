import type { LLMClient, LLMCompletionRequest } from "../../src/llm/client";

export type CallKind = "analyst" | "discussion" | "decision" | "repair";

export interface ClassifiedCall {
  kind: CallKind;
  /** Analyst display name, e.g. "Technical Analyst". Empty for non-analyst calls. */
  analyst: string;
}

export function systemMessageOf(request: LLMCompletionRequest): string {
  return request.messages.find((message) => message.role === "system")?.content ?? "";
}

export function userMessageOf(request: LLMCompletionRequest): string {
  return request.messages.find((message) => message.role === "user")?.content ?? "";
}

export function classifyCall(request: LLMCompletionRequest): ClassifiedCall {
  const system = systemMessageOf(request);
  const role = system.match(/ROLE:\s*([^.\n]+)/)?.[1]?.trim();
  if (role) {
    return { kind: "analyst", analyst: role };
  }
  if (system.includes("JSON repair specialist")) {
    return { kind: "repair", analyst: "" };
  }
  if (system.includes("moderator")) {
    return { kind: "discussion", analyst: "" };
  }
  return { kind: "decision", analyst: "" };
}

export type ScriptHandler = (call: ClassifiedCall, request: LLMCompletionRequest) => string | Promise<string>;

/**
 * In-process gateway that answers through a handler and records every request.
 */
export class ScriptedLLMClient implements LLMClient {
  readonly provider = "Simulation";
  readonly requests: LLMCompletionRequest[] = [];

  private readonly handler: ScriptHandler;

  constructor(handler: ScriptHandler) {
    this.handler = handler;
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.handler(classifyCall(request), request);
  }

  callsOf(kind: CallKind): LLMCompletionRequest[] {
    return this.requests.filter((request) => classifyCall(request).kind === kind);
  }
}

/**
 * Answers every call with the same text.
 */
export function fixedTextClient(text: string): ScriptedLLMClient {
  return new ScriptedLLMClient(() => text);
}

/**
 * Returns queued responses in order; an Error entry is thrown instead.
 */
export class QueueLLMClient implements LLMClient {
  readonly provider = "Simulation";
  readonly requests: LLMCompletionRequest[] = [];

  private readonly queue: Array<string | Error>;

  constructor(responses: Array<string | Error>) {
    this.queue = [...responses];
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error("no queued response");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
