export { ProviderClientRegistry } from "./client/registry";
export { createProviderClient } from "./client/providers";
export { SimulatedLLMClient } from "./client/simulation";
export type { ChatMessage, ChatRole, LLMClient, LLMCompletionRequest } from "./client/types";
