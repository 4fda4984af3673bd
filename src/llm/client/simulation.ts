import type { ChatMessage, LLMClient, LLMCompletionRequest } from "./types";

const DEFAULT_DELAY_MIN_MS = 120;
const DEFAULT_DELAY_MAX_MS = 480;
const MAX_DELAY_MS = 10_000;
const RATINGS = ["Buy", "Hold", "Sell"] as const;

export interface SimulationDelayWindow {
  minMs: number;
  maxMs: number;
}

export function hashString(value: string): number {
  let hash = 0;
  for (let index = 0; index < value.length; index += 1) {
    hash = (hash * 31 + value.charCodeAt(index)) >>> 0;
  }
  return hash;
}

function envNumber(value: string | undefined): number | null {
  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function resolveSimulationDelayWindow(env: NodeJS.ProcessEnv = process.env): SimulationDelayWindow {
  const min = Math.max(0, Math.min(MAX_DELAY_MS, Math.round(envNumber(env.ANALYSIS_SIMULATION_MIN_DELAY_MS) ?? DEFAULT_DELAY_MIN_MS)));
  const max = Math.max(min, Math.min(MAX_DELAY_MS, Math.round(envNumber(env.ANALYSIS_SIMULATION_MAX_DELAY_MS) ?? DEFAULT_DELAY_MAX_MS)));
  return { minMs: min, maxMs: max };
}

async function sleepMs(delayMs: number): Promise<void> {
  if (delayMs <= 0) {
    return;
  }

  await new Promise((resolve) => {
    setTimeout(resolve, delayMs);
  });
}

function messageText(messages: readonly ChatMessage[], role: ChatMessage["role"]): string {
  return messages
    .filter((message) => message.role === role)
    .map((message) => message.content)
    .join("\n");
}

function extractRole(systemMessage: string): string {
  return systemMessage.match(/ROLE:\s*([^.\n]+)/)?.[1]?.trim() ?? "Analyst";
}

function extractPrice(userMessage: string): number | null {
  const match = userMessage.match(/Current price:\s*(\d+(?:\.\d+)?)/);
  if (!match?.[1]) {
    return null;
  }

  const parsed = Number(match[1]);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function simulatedDecision(seed: number, userMessage: string): string {
  const rating = RATINGS[seed % RATINGS.length] ?? "Hold";
  const price = extractPrice(userMessage);
  const drift = rating === "Buy" ? 1.12 : rating === "Sell" ? 0.9 : 1.03;
  const money = (value: number): string => (price === null ? "N/A" : (price * value).toFixed(2));

  return JSON.stringify({
    rating,
    target_price: money(drift),
    operation_advice: `Simulated ${rating.toLowerCase()} plan generated offline.`,
    entry_range: price === null ? "N/A" : `${money(0.97)}-${money(1.0)}`,
    take_profit: money(drift + 0.05),
    stop_loss: money(0.92),
    holding_period: "1-3 months",
    position_size: rating === "Buy" ? "20%" : "10%",
    risk_warning: "Simulation output; not investment advice.",
    confidence_level: String(5 + (seed % 4)),
  });
}

/**
 * Offline gateway returning deterministic text per request content.
 */
export class SimulatedLLMClient implements LLMClient {
  readonly provider = "Simulation";

  private readonly delay: SimulationDelayWindow;

  constructor(delay: SimulationDelayWindow = resolveSimulationDelayWindow()) {
    this.delay = delay;
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    const systemMessage = messageText(request.messages, "system");
    const userMessage = messageText(request.messages, "user");
    const seed = hashString(`${request.model}:${systemMessage.slice(0, 200)}:${userMessage}`);
    const span = this.delay.maxMs - this.delay.minMs + 1;
    await sleepMs(this.delay.minMs + (seed % Math.max(1, span)));

    if (/json repair/i.test(systemMessage) || request.requireJsonObject) {
      return simulatedDecision(seed, userMessage);
    }

    if (/"rating"/.test(userMessage)) {
      return simulatedDecision(seed, userMessage);
    }

    if (!/ROLE:/.test(systemMessage) && /moderator/i.test(systemMessage)) {
      return [
        "[SIMULATED] Team discussion record.",
        "Agreement: the analysts see a stable trend with moderate valuation support.",
        "Disagreement: flow data and risk metrics point in different directions in the short term.",
        "Balance of evidence: a measured position with a defined stop-loss.",
      ].join("\n");
    }

    const role = extractRole(systemMessage);
    const tone = ["constructive", "neutral", "cautious"][seed % 3] ?? "neutral";
    return `[SIMULATED] ${role} review (${request.model}). The available figures support a ${tone} view. Missing inputs are treated as gaps rather than estimated.`;
  }
}
