export type LLMProvider = "DeepSeek" | "OpenAI" | "Anthropic";

interface ProviderSettings {
  models: readonly string[];
  apiKeyEnv: string;
  baseUrlEnv: string;
  defaultBaseUrl: string;
}

export const PROVIDER_SETTINGS: Record<LLMProvider, ProviderSettings> = {
  DeepSeek: {
    models: ["deepseek-chat", "deepseek-reasoner"],
    apiKeyEnv: "DEEPSEEK_API_KEY",
    baseUrlEnv: "DEEPSEEK_BASE_URL",
    defaultBaseUrl: "https://api.deepseek.com/v1",
  },
  OpenAI: {
    models: ["gpt-4o", "gpt-4o-mini"],
    apiKeyEnv: "OPENAI_API_KEY",
    baseUrlEnv: "OPENAI_BASE_URL",
    defaultBaseUrl: "https://api.openai.com/v1",
  },
  Anthropic: {
    models: ["claude-3-5-sonnet-latest", "claude-3-5-haiku-latest"],
    apiKeyEnv: "ANTHROPIC_API_KEY",
    baseUrlEnv: "ANTHROPIC_BASE_URL",
    defaultBaseUrl: "https://api.anthropic.com",
  },
};

export const LLM_PROVIDERS = ["DeepSeek", "OpenAI", "Anthropic"] as const satisfies readonly LLMProvider[];
const FAILOVER_PRIORITY: readonly LLMProvider[] = LLM_PROVIDERS;

export function providerFailoverOrder(preferredProvider: LLMProvider): LLMProvider[] {
  return [preferredProvider, ...FAILOVER_PRIORITY.filter((provider) => provider !== preferredProvider)];
}

export function resolveProvider(value: unknown): LLMProvider {
  if (typeof value !== "string") {
    return "DeepSeek";
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "openai") {
    return "OpenAI";
  }
  if (normalized === "anthropic") {
    return "Anthropic";
  }
  return "DeepSeek";
}

export function defaultModelForProvider(provider: LLMProvider): string {
  return PROVIDER_SETTINGS[provider].models[0] ?? "";
}

export function resolveModelForProvider(provider: LLMProvider, candidate?: string): string {
  const options = PROVIDER_SETTINGS[provider].models;
  if (typeof candidate === "string" && options.includes(candidate)) {
    return candidate;
  }
  return defaultModelForProvider(provider);
}

export function getProviderApiKey(provider: LLMProvider, env: NodeJS.ProcessEnv = process.env): string {
  return (env[PROVIDER_SETTINGS[provider].apiKeyEnv] ?? "").trim();
}

export function getProviderApiKeyEnv(provider: LLMProvider): string {
  return PROVIDER_SETTINGS[provider].apiKeyEnv;
}

export function getProviderBaseUrl(provider: LLMProvider, env: NodeJS.ProcessEnv = process.env): string {
  const settings = PROVIDER_SETTINGS[provider];
  const fromEnv = (env[settings.baseUrlEnv] ?? "").trim();
  return fromEnv.length > 0 ? fromEnv : settings.defaultBaseUrl;
}

export function providerEnabled(provider: LLMProvider, env: NodeJS.ProcessEnv = process.env): boolean {
  return getProviderApiKey(provider, env).length > 0;
}
