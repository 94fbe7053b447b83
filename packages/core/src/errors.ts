/**
 * Custom Error Types
 * Structured errors shared by the forecasting packages
 */

/**
 * Base error class for all Foresight errors
 */
export class ForesightError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "ForesightError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
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
 * Configuration errors (bad env, inconsistent pipeline config)
 */
export class ConfigError extends ForesightError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Model provider call failed
 */
export class ProviderError extends ForesightError {
  public readonly provider: string;
  public readonly model?: string;
  public readonly statusCode?: number;

  constructor(
    message: string,
    provider: string,
    options?: {
      cause?: Error;
      model?: string;
      statusCode?: number;
      context?: Record<string, unknown>;
    }
  ) {
    const status = options?.statusCode;
    const retryable =
      status === undefined || status === 408 || status === 429 || status >= 500;
    super(message, "PROVIDER_ERROR", {
      cause: options?.cause,
      context: { ...options?.context, provider, model: options?.model, statusCode: status },
      retryable,
    });
    this.name = "ProviderError";
    this.provider = provider;
    this.model = options?.model;
    this.statusCode = status;
  }
}

/**
 * Model name has no known provider
 */
export class UnknownModelError extends ForesightError {
  public readonly model: string;

  constructor(model: string) {
    super(`Unknown model: ${model}`, "UNKNOWN_MODEL", {
      context: { model },
      retryable: false,
    });
    this.name = "UnknownModelError";
    this.model = model;
  }
}

/**
 * Document source errors
 */
export class RetrievalError extends ForesightError {
  public readonly source: string;
  public readonly statusCode?: number;

  constructor(
    message: string,
    source: string,
    options?: {
      cause?: Error;
      statusCode?: number;
      query?: string;
      context?: Record<string, unknown>;
    }
  ) {
    const retryable = options?.statusCode === 429 || (options?.statusCode ?? 0) >= 500;
    super(message, "RETRIEVAL_ERROR", {
      cause: options?.cause,
      context: { ...options?.context, source, query: options?.query },
      retryable,
    });
    this.name = "RetrievalError";
    this.source = source;
    this.statusCode = options?.statusCode;
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends ForesightError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", { cause, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * Validation errors (schemas, inputs, templates)
 */
export class ValidationError extends ForesightError {
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
 * Type guard to check if error is a Foresight error
 */
export function isForesightError(error: unknown): error is ForesightError {
  return error instanceof ForesightError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isForesightError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit") ||
      message.includes("overloaded")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a Foresight error
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): ForesightError {
  if (isForesightError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ForesightError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new ForesightError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}
