import { PROMPT_REGISTRY } from "./registry";
import type { PromptDefinition, PromptId } from "./types";

export { PROMPT_REGISTRY } from "./registry";
export type { PromptDefinition, PromptId, PromptRegistry } from "./types";

export function getPromptDefinition(id: PromptId): PromptDefinition {
  return PROMPT_REGISTRY[id];
}
