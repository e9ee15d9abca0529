/**
 * Custom Error Types
 * Structured errors for the query engine and its collaborators
 */

/**
 * Base error class for every engine error
 */
export class MobilityError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "MobilityError";
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
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends MobilityError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Validation errors (inputs, CLI arguments)
 */
export class ValidationError extends MobilityError {
  public readonly field?: string;
  public readonly expected?: string;
  public readonly received?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      expected?: string;
      received?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
    this.expected = options?.expected;
    this.received = options?.received;
  }
}

/**
 * A source file no longer matches the record schema.
 * Raised at load time only; never once a store exists.
 */
export class SchemaDriftError extends MobilityError {
  public readonly dataset: string;
  public readonly issues: string[];

  constructor(dataset: string, issues: string[], cause?: unknown) {
    super(
      `Dataset "${dataset}" does not match its schema (${issues.length} issue(s))`,
      "SCHEMA_DRIFT",
      { cause, context: { dataset, issues: issues.slice(0, 10) }, retryable: false }
    );
    this.name = "SchemaDriftError";
    this.dataset = dataset;
    this.issues = issues;
  }
}

/**
 * Text generation provider errors
 */
export class GenerationError extends MobilityError {
  public readonly provider: string;
  public readonly statusCode?: number;

  constructor(
    message: string,
    provider: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      context?: Record<string, unknown>;
    }
  ) {
    // Rate limits and server-side failures are retryable
    const status = options?.statusCode;
    const retryable = status === 429 || (status !== undefined && status >= 500);

    super(message, "GENERATION_ERROR", { ...options, retryable });
    this.name = "GenerationError";
    this.provider = provider;
    this.statusCode = status;
  }
}

/**
 * Text generation exceeded its time budget
 */
export class GenerationTimeoutError extends MobilityError {
  public readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super(`${provider} did not answer within ${timeoutMs}ms`, "GENERATION_TIMEOUT", {
      context: { provider, timeoutMs },
      retryable: true,
    });
    this.name = "GenerationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function isMobilityError(error: unknown): error is MobilityError {
  return error instanceof MobilityError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isMobilityError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a MobilityError
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): MobilityError {
  if (isMobilityError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new MobilityError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new MobilityError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}
