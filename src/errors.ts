/**
 * Structured error types shared by the analysis pipeline.
 */

export interface AnalysisErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
  retryable?: boolean;
}

export class AnalysisError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(message: string, code: string, options?: AnalysisErrorOptions) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
    };
  }
}

/**
 * An external data source returned nothing for the subject.
 */
export class UpstreamDataUnavailableError extends AnalysisError {
  public readonly source: string;

  constructor(source: string, message: string, options?: AnalysisErrorOptions) {
    super(message, "UPSTREAM_DATA_UNAVAILABLE", { ...options, context: { source, ...options?.context } });
    this.name = "UpstreamDataUnavailableError";
    this.source = source;
  }
}

export class AnalystExecutionError extends AnalysisError {
  public readonly role: string;

  constructor(role: string, message: string, options?: AnalysisErrorOptions) {
    super(message, "ANALYST_EXECUTION_FAILURE", { ...options, context: { role, ...options?.context } });
    this.name = "AnalystExecutionError";
    this.role = role;
  }
}

export class DecisionParseError extends AnalysisError {
  constructor(message: string, options?: AnalysisErrorOptions) {
    super(message, "DECISION_PARSE_FAILURE", options);
    this.name = "DecisionParseError";
  }
}

/**
 * An out-of-order operation on the analysis aggregate. Never retried.
 */
export class AggregateInvariantViolation extends AnalysisError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "AGGREGATE_INVARIANT_VIOLATION", { context, retryable: false });
    this.name = "AggregateInvariantViolation";
  }
}

export class NoReviewsProducedError extends AnalysisError {
  constructor(message = "no analyst produced a review", context?: Record<string, unknown>) {
    super(message, "NO_REVIEWS_PRODUCED", { context });
    this.name = "NoReviewsProducedError";
  }
}

export class GenerationError extends AnalysisError {
  public readonly provider: string;

  constructor(provider: string, message: string, options?: AnalysisErrorOptions) {
    super(message, "GENERATION_FAILURE", {
      ...options,
      context: { provider, ...options?.context },
      retryable: options?.retryable ?? true,
    });
    this.name = "GenerationError";
    this.provider = provider;
  }
}

export class AnalysisTimeoutError extends AnalysisError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(message, "ANALYSIS_TIMEOUT", { context: { timeoutMs, ...context }, retryable: true });
    this.name = "AnalysisTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class UnknownAnalystRoleError extends AnalysisError {
  public readonly keys: string[];

  constructor(keys: string[]) {
    super(`Unknown analyst role key(s): ${keys.join(", ")}`, "UNKNOWN_ANALYST_ROLE", { context: { keys } });
    this.name = "UnknownAnalystRoleError";
    this.keys = keys;
  }
}

export class ConfigError extends AnalysisError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }

  return "unknown error";
}
