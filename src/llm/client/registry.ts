import {
  getProviderApiKey,
  getProviderApiKeyEnv,
  type LLMProvider,
  providerFailoverOrder,
  resolveModelForProvider,
} from "../../config/llm_providers";
import { errorMessage, GenerationError } from "../../errors";
import { createLogger, type Logger } from "../../logging/logger";
import { resolveProviderCooldownMs, shouldMarkProviderCooldown } from "./config";
import { createProviderClient } from "./providers";
import type { LLMClient, LLMCompletionRequest } from "./types";

class ResilientProviderClient implements LLMClient {
  readonly provider: LLMProvider;

  private readonly registry: ProviderClientRegistry;

  constructor(provider: LLMProvider, registry: ProviderClientRegistry) {
    this.provider = provider;
    this.registry = registry;
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    return this.registry.completeWithFallback(this.provider, request);
  }
}

export class ProviderClientRegistry {
  private readonly clients = new Map<LLMProvider, LLMClient>();
  private readonly resilientClients = new Map<LLMProvider, LLMClient>();
  private readonly providerCooldownUntil = new Map<LLMProvider, number>();
  private readonly providerCooldownMs = resolveProviderCooldownMs();
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger("llm")) {
    this.logger = logger;
  }

  getClient(provider: LLMProvider): LLMClient {
    const existing = this.clients.get(provider);
    if (existing) {
      return existing;
    }

    const created = createProviderClient(provider);
    this.clients.set(provider, created);
    return created;
  }

  getResilientClient(provider: LLMProvider): LLMClient {
    const existing = this.resilientClients.get(provider);
    if (existing) {
      return existing;
    }

    const created = new ResilientProviderClient(provider, this);
    this.resilientClients.set(provider, created);
    return created;
  }

  /**
   * Tries the preferred provider first, then every other provider with a key.
   * Providers on cooldown move to the end of the attempt order.
   */
  async completeWithFallback(preferredProvider: LLMProvider, request: LLMCompletionRequest): Promise<string> {
    const failures: string[] = [];

    for (const provider of this.buildAttemptOrder(preferredProvider)) {
      if (getProviderApiKey(provider).length === 0) {
        failures.push(`${provider}: missing ${getProviderApiKeyEnv(provider)}`);
        continue;
      }

      try {
        const client = this.getClient(provider);
        const result = await client.complete({
          ...request,
          model: provider === preferredProvider ? request.model : resolveModelForProvider(provider, request.model),
        });
        this.clearProviderCooldown(provider);
        return result;
      } catch (error) {
        const message = errorMessage(error);
        failures.push(`${provider}: ${message}`);
        this.logger.warn("Provider completion failed", { provider, error: message });
        if (shouldMarkProviderCooldown(error)) {
          this.markProviderCooldown(provider);
        }
      }
    }

    throw new GenerationError(preferredProvider, `All providers failed. Attempts: ${failures.join(" | ")}`, {
      context: { attempts: failures },
    });
  }

  private buildAttemptOrder(preferredProvider: LLMProvider): LLMProvider[] {
    const ordered = providerFailoverOrder(preferredProvider);
    const ready = ordered.filter((provider) => !this.isProviderOnCooldown(provider));

    if (ready.length === ordered.length || ready.length === 0) {
      return ordered;
    }

    const cooldown = ordered.filter((provider) => this.isProviderOnCooldown(provider));
    return [...ready, ...cooldown];
  }

  private isProviderOnCooldown(provider: LLMProvider): boolean {
    const until = this.providerCooldownUntil.get(provider);
    return typeof until === "number" && until > Date.now();
  }

  private markProviderCooldown(provider: LLMProvider): void {
    this.providerCooldownUntil.set(provider, Date.now() + this.providerCooldownMs);
  }

  private clearProviderCooldown(provider: LLMProvider): void {
    this.providerCooldownUntil.delete(provider);
  }
}
