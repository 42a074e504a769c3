/**
 * Typed error classes for pagegrab
 *
 * Errors raised before a fetch is attempted (configuration, request
 * validation, target safety) and the terminal errors the orchestrator
 * reports on failed results. Fetch-level errors live in fetchers/errors.ts.
 */

/**
 * Error codes for categorization
 */
export enum PagegrabErrorCode {
  // Startup
  INVALID_CONFIG = "INVALID_CONFIG",

  // Pre-flight
  INVALID_URL = "INVALID_URL",
  INVALID_OPTIONS = "INVALID_OPTIONS",
  BATCH_TOO_LARGE = "BATCH_TOO_LARGE",
  UNSAFE_TARGET = "UNSAFE_TARGET",
  DOMAIN_NOT_ALLOWED = "DOMAIN_NOT_ALLOWED",

  // Fetching
  TIMEOUT = "TIMEOUT",
  CONNECTION_RESET = "CONNECTION_RESET",
  SESSION_CLOSED = "SESSION_CLOSED",
  SERVER_ERROR = "SERVER_ERROR",
  BLOCKED = "BLOCKED",
  CHALLENGE = "CHALLENGE",
  INSUFFICIENT_CONTENT = "INSUFFICIENT_CONTENT",
  HTTP_ERROR = "HTTP_ERROR",
  NETWORK_ERROR = "NETWORK_ERROR",
  UNPARSEABLE_MARKUP = "UNPARSEABLE_MARKUP",
  FETCHER_UNAVAILABLE = "FETCHER_UNAVAILABLE",

  // Terminal
  STRATEGIES_EXHAUSTED = "STRATEGIES_EXHAUSTED",
  ABORTED = "ABORTED",

  UNKNOWN = "UNKNOWN",
}

/**
 * Base error class for all pagegrab errors
 */
export class PagegrabError extends Error {
  readonly code: PagegrabErrorCode;
  readonly url?: string;
  readonly cause?: Error;
  readonly timestamp: string;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: PagegrabErrorCode,
    options?: {
      url?: string;
      cause?: Error;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "PagegrabError";
    this.code = code;
    this.url = options?.url;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.retryable = options?.retryable ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      url: this.url,
      timestamp: this.timestamp,
      retryable: this.retryable,
      cause: this.cause?.message,
    };
  }
}

/**
 * Invalid configuration values, raised once at startup
 */
export class ConfigurationError extends PagegrabError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.join("\n")}`, PagegrabErrorCode.INVALID_CONFIG);
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }
}

/**
 * Validation errors (malformed URLs, options outside their contract, oversized batches)
 */
export class ValidationError extends PagegrabError {
  readonly field?: string;

  constructor(
    message: string,
    options?: { field?: string; url?: string; code?: PagegrabErrorCode }
  ) {
    super(message, options?.code ?? PagegrabErrorCode.INVALID_OPTIONS, {
      url: options?.url,
      retryable: false,
    });
    this.name = "ValidationError";
    this.field = options?.field;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

/**
 * Target failed the host/scheme safety check. Never retried, never escalated.
 */
export class SafetyRejectionError extends PagegrabError {
  readonly reason: string;

  constructor(url: string, reason: string, code: PagegrabErrorCode = PagegrabErrorCode.UNSAFE_TARGET) {
    super(`Target rejected: ${reason}`, code, { url, retryable: false });
    this.name = "SafetyRejectionError";
    this.reason = reason;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
    };
  }
}

/**
 * Every fetcher kind in the strategy ran out of attempts
 */
export class ExhaustedStrategiesError extends PagegrabError {
  readonly attempts: number;

  constructor(url: string, attempts: number, lastError: Error) {
    super(
      `All strategies failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${lastError.message}`,
      PagegrabErrorCode.STRATEGIES_EXHAUSTED,
      { url, cause: lastError, retryable: false }
    );
    this.name = "ExhaustedStrategiesError";
    this.attempts = attempts;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts,
    };
  }
}

/**
 * Request was cancelled by its caller or ran past its deadline
 */
export class RequestAbortedError extends PagegrabError {
  constructor(url: string, reason?: string) {
    super(reason ? `Request aborted: ${reason}` : "Request aborted", PagegrabErrorCode.ABORTED, {
      url,
      retryable: false,
    });
    this.name = "RequestAbortedError";
  }
}

/**
 * Helper to wrap unknown errors in PagegrabError
 */
export function wrapError(error: unknown, url?: string): PagegrabError {
  if (error instanceof PagegrabError) {
    return error;
  }

  if (error instanceof Error) {
    return new PagegrabError(error.message, PagegrabErrorCode.UNKNOWN, {
      url,
      cause: error,
      retryable: false,
    });
  }

  return new PagegrabError(String(error), PagegrabErrorCode.UNKNOWN, {
    url,
    retryable: false,
  });
}
