import { getPromptDefinition, type PromptId } from "../../prompts";

export const MISSING_VALUE = "N/A";

export interface PromptPayload {
  systemMessage: string;
  userTemplate: string;
}

export function loadPrompts(id: PromptId): PromptPayload {
  const prompt = getPromptDefinition(id);

  return {
    systemMessage: prompt.systemMessage,
    userTemplate: prompt.userTemplate,
  };
}

/**
 * Replaces `{name}` placeholders. A placeholder without a usable value renders
 * as "N/A" so an incomplete bundle never breaks a prompt.
 */
export function renderTemplate(template: string, variables: Readonly<Record<string, string | null | undefined>>): string {
  return template.replace(/\{([a-z0-9_]+)\}/g, (_match, key: string) => {
    const value = variables[key];
    if (typeof value !== "string" || value.trim().length === 0) {
      return MISSING_VALUE;
    }
    return value;
  });
}
