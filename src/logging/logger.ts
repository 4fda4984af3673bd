export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export function resolveLogLevel(value: unknown): LogLevel {
  if (typeof value !== "string") {
    return "info";
  }

  const normalized = value.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }

  return "info";
}

function formatLine(scope: string, level: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): string {
  const prefix = `[${scope}:${level.toUpperCase()}] ${message}`;
  if (!data || Object.keys(data).length === 0) {
    return prefix;
  }

  try {
    return `${prefix} ${JSON.stringify(data)}`;
  } catch {
    return `${prefix} [unserializable data]`;
  }
}

/**
 * Scoped stderr logger. Stdout stays reserved for the CLI's JSON output.
 */
export function createLogger(scope: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (entryLevel: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_RANK[entryLevel] < threshold) {
      return;
    }

    const line = formatLine(scope, entryLevel, message, data);
    if (entryLevel === "warn") {
      console.warn(line);
      return;
    }
    console.error(line);
  };

  return {
    scope,
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
    child: (childScope) => createLogger(`${scope}/${childScope}`, level),
  };
}
