import { UnknownAnalystRoleError } from "../errors";
import { type AgentRole, ANALYST_ROLES } from "./states";

export const DEFAULT_ENABLED_ROLES: readonly AgentRole[] = ["technical", "fundamental", "fund_flow", "risk_management"];

const ROLE_KEYS: Readonly<Record<string, AgentRole>> = {
  technical: "technical",
  fundamental: "fundamental",
  fund_flow: "fund_flow",
  risk_management: "risk_management",
  risk: "risk_management",
  market_sentiment: "market_sentiment",
  sentiment: "market_sentiment",
  news_analyst: "news_analyst",
  news: "news_analyst",
};

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

export function sortByCanonicalOrder(roles: Iterable<AgentRole>): AgentRole[] {
  const selected = new Set(roles);
  return ANALYST_ROLES.filter((role) => selected.has(role));
}

/**
 * Maps request keys to analyst roles. Unknown keys are rejected as a whole.
 */
export function parseAnalystRoles(keys: readonly string[]): AgentRole[] {
  const roles: AgentRole[] = [];
  const unknown: string[] = [];

  for (const key of keys) {
    const role = ROLE_KEYS[normalizeKey(key)];
    if (role) {
      roles.push(role);
    } else {
      unknown.push(key);
    }
  }

  if (unknown.length > 0) {
    throw new UnknownAnalystRoleError(unknown);
  }

  return sortByCanonicalOrder(roles);
}

/**
 * Same as parseAnalystRoles for `{ key: enabled }` flag maps.
 */
export function parseEnabledAnalysts(flags: Readonly<Record<string, boolean>>): AgentRole[] {
  const unknown = Object.keys(flags).filter((key) => !ROLE_KEYS[normalizeKey(key)]);
  if (unknown.length > 0) {
    throw new UnknownAnalystRoleError(unknown);
  }

  return parseAnalystRoles(Object.entries(flags).filter(([, enabled]) => enabled).map(([key]) => key));
}
