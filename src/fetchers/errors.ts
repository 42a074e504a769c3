/**
 * Fetch-level error classes
 *
 * Raised by fetchers and by the attempt wrapper around them. The
 * retry/fallback controller reads the class to decide what happens next:
 *   - TransientFetchError: retry the same fetcher kind
 *   - CategoricalFetchError: skip remaining retries, escalate to next kind
 *   - SafetyRejectionError (../errors.ts): abort the whole request
 */

import { PagegrabError, PagegrabErrorCode } from "../errors.js";
import type { FetcherKind } from "./types.js";

/**
 * Base error for all fetch failures
 */
export class FetchError extends PagegrabError {
  readonly kind: FetcherKind;

  constructor(
    kind: FetcherKind,
    message: string,
    code: PagegrabErrorCode,
    options?: { cause?: Error; retryable?: boolean; url?: string }
  ) {
    super(`[${kind}] ${message}`, code, options);
    this.name = "FetchError";
    this.kind = kind;
  }
}

/**
 * Failure worth retrying with the same fetcher kind
 */
export class TransientFetchError extends FetchError {
  constructor(
    kind: FetcherKind,
    message: string,
    code: PagegrabErrorCode,
    options?: { cause?: Error; url?: string }
  ) {
    super(kind, message, code, { ...options, retryable: true });
    this.name = "TransientFetchError";
  }
}

/**
 * Attempt timed out
 */
export class FetchTimeoutError extends TransientFetchError {
  readonly timeoutMs: number;

  constructor(kind: FetcherKind, timeoutMs: number, options?: { cause?: Error; url?: string }) {
    super(kind, `Timeout after ${timeoutMs}ms`, PagegrabErrorCode.TIMEOUT, options);
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Failure that retrying the same kind will not fix
 */
export class CategoricalFetchError extends FetchError {
  constructor(
    kind: FetcherKind,
    message: string,
    code: PagegrabErrorCode,
    options?: { cause?: Error; url?: string }
  ) {
    super(kind, message, code, { ...options, retryable: false });
    this.name = "CategoricalFetchError";
  }
}

/**
 * Target answered with a status that signals it blocked us
 */
export class BlockedResponseError extends CategoricalFetchError {
  readonly statusCode: number;

  constructor(kind: FetcherKind, statusCode: number, statusText?: string) {
    super(kind, `Blocked with HTTP ${statusCode}${statusText ? `: ${statusText}` : ""}`, PagegrabErrorCode.BLOCKED);
    this.name = "BlockedResponseError";
    this.statusCode = statusCode;
  }
}

/**
 * HTTP error status that is neither a block nor a transient server failure
 */
export class HttpStatusError extends CategoricalFetchError {
  readonly statusCode: number;

  constructor(kind: FetcherKind, statusCode: number, statusText?: string) {
    super(kind, `HTTP ${statusCode}${statusText ? `: ${statusText}` : ""}`, PagegrabErrorCode.HTTP_ERROR);
    this.name = "HttpStatusError";
    this.statusCode = statusCode;
  }
}

/**
 * Challenge or bot wall served in place of the page
 */
export class ChallengeDetectedError extends CategoricalFetchError {
  readonly challengeType: string;

  constructor(kind: FetcherKind, challengeType?: string) {
    super(kind, `Challenge detected: ${challengeType || "unknown"}`, PagegrabErrorCode.CHALLENGE);
    this.name = "ChallengeDetectedError";
    this.challengeType = challengeType || "unknown";
  }
}

/**
 * Content too short or empty. Usually a client-rendered shell.
 */
export class InsufficientContentError extends CategoricalFetchError {
  readonly contentLength: number;
  readonly threshold: number;

  constructor(kind: FetcherKind, contentLength: number, threshold: number = 100) {
    super(
      kind,
      `Insufficient content: ${contentLength} chars (threshold: ${threshold})`,
      PagegrabErrorCode.INSUFFICIENT_CONTENT
    );
    this.name = "InsufficientContentError";
    this.contentLength = contentLength;
    this.threshold = threshold;
  }
}

/**
 * Markup could not be parsed as HTML
 */
export class MarkupParseError extends CategoricalFetchError {
  constructor(kind: FetcherKind, reason: string) {
    super(kind, `Unparseable markup: ${reason}`, PagegrabErrorCode.UNPARSEABLE_MARKUP);
    this.name = "MarkupParseError";
  }
}

/**
 * Fetcher cannot run at all (missing browser, not configured)
 */
export class FetcherUnavailableError extends CategoricalFetchError {
  constructor(kind: FetcherKind, reason?: string) {
    super(kind, reason || "Fetcher not available", PagegrabErrorCode.FETCHER_UNAVAILABLE);
    this.name = "FetcherUnavailableError";
  }
}

const RESET_CODES = new Set(["ECONNRESET", "EPIPE", "ECONNABORTED", "ERR_STREAM_PREMATURE_CLOSE"]);
const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT", "UND_ERR_CONNECT_TIMEOUT"]);
const SESSION_CLOSED_PATTERNS = [
  "target closed",
  "target page, context or browser has been closed",
  "browser has been closed",
  "browser has disconnected",
  "session closed",
  "context closed",
];

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Classify a raw error thrown by an underlying client into a fetch error
 */
export function classifyFetchFailure(kind: FetcherKind, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new CategoricalFetchError(kind, String(error), PagegrabErrorCode.UNKNOWN);
  }

  const code = errorCode(error);
  const message = error.message.toLowerCase();

  if (error.name === "TimeoutError" || (code && TIMEOUT_CODES.has(code)) || message.includes("timeout")) {
    return new TransientFetchError(kind, error.message, PagegrabErrorCode.TIMEOUT, { cause: error });
  }

  if ((code && RESET_CODES.has(code)) || message.includes("socket hang up")) {
    return new TransientFetchError(kind, error.message, PagegrabErrorCode.CONNECTION_RESET, { cause: error });
  }

  if (SESSION_CLOSED_PATTERNS.some((pattern) => message.includes(pattern))) {
    return new TransientFetchError(kind, error.message, PagegrabErrorCode.SESSION_CLOSED, { cause: error });
  }

  if (code === "ENOTFOUND" || code === "EAI_AGAIN" || code === "ECONNREFUSED") {
    return new CategoricalFetchError(kind, error.message, PagegrabErrorCode.NETWORK_ERROR, { cause: error });
  }

  return new CategoricalFetchError(kind, error.message, PagegrabErrorCode.UNKNOWN, { cause: error });
}
