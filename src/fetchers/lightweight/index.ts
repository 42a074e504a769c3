/**
 * Lightweight Fetcher - got-scraping
 *
 * Single request/response with browser-like headers and TLS fingerprint.
 * No script execution. Reports blocks and challenge pages so the
 * controller can escalate to the rendering fetcher.
 */

import { gotScraping } from "got-scraping";
import type { Fetcher, FetchMeta, FetchedPage, FetcherKind } from "../types.js";
import {
  BlockedResponseError,
  ChallengeDetectedError,
  FetchTimeoutError,
  HttpStatusError,
  InsufficientContentError,
  TransientFetchError,
  classifyFetchFailure,
} from "../errors.js";
import { BLOCKING_STATUS_CODES, MIN_CONTENT_LENGTH, detectChallenge, extractText } from "../detection.js";
import { PagegrabErrorCode } from "../../errors.js";

/**
 * Headers sent on top of the ones got-scraping generates
 */
const DEFAULT_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
};

export interface LightweightFetcherOptions {
  /** Fixed user agent; got-scraping generates one when omitted */
  userAgent?: string;
  headers?: Record<string, string>;
}

/**
 * Lightweight fetcher implementation using got-scraping
 */
export class LightweightFetcher implements Fetcher {
  readonly kind: FetcherKind = "lightweight";
  private headers: Record<string, string>;

  constructor(options: LightweightFetcherOptions = {}) {
    this.headers = {
      ...DEFAULT_HEADERS,
      ...(options.userAgent ? { "User-Agent": options.userAgent } : {}),
      ...(options.headers || {}),
    };
  }

  async fetch(meta: FetchMeta): Promise<FetchedPage> {
    const startTime = Date.now();
    const { target, timeoutMs, logger, abortSignal } = meta;

    if (abortSignal.aborted) {
      throw new FetchTimeoutError(this.kind, 0);
    }

    try {
      logger?.debug(`[lightweight] Fetching ${target.url}`);

      const response = await gotScraping({
        url: target.url,
        headers: this.headers,
        timeout: {
          request: timeoutMs,
        },
        followRedirect: true,
        throwHttpErrors: false,
        signal: abortSignal,
      });

      const duration = Date.now() - startTime;
      const html = response.body;

      logger?.debug(
        `[lightweight] Got response: ${response.statusCode} (${html.length} chars) in ${duration}ms`
      );

      if (BLOCKING_STATUS_CODES.has(response.statusCode)) {
        throw new BlockedResponseError(this.kind, response.statusCode, response.statusMessage);
      }

      if (response.statusCode >= 500) {
        throw new TransientFetchError(
          this.kind,
          `HTTP ${response.statusCode}${response.statusMessage ? `: ${response.statusMessage}` : ""}`,
          PagegrabErrorCode.SERVER_ERROR
        );
      }

      if (response.statusCode >= 400) {
        throw new HttpStatusError(this.kind, response.statusCode, response.statusMessage);
      }

      const challengeType = detectChallenge(html);
      if (challengeType) {
        logger?.debug(`[lightweight] Challenge detected: ${challengeType}`);
        throw new ChallengeDetectedError(this.kind, challengeType);
      }

      const textContent = extractText(html);
      if (textContent.length < MIN_CONTENT_LENGTH) {
        logger?.debug(`[lightweight] Insufficient content: ${textContent.length} chars`);
        throw new InsufficientContentError(this.kind, textContent.length, MIN_CONTENT_LENGTH);
      }

      const contentType = response.headers["content-type"];

      return {
        html,
        finalUrl: response.url,
        statusCode: response.statusCode,
        contentType: typeof contentType === "string" ? contentType : null,
        kind: this.kind,
        duration,
      };
    } catch (error: unknown) {
      if (abortSignal.aborted) {
        throw new FetchTimeoutError(this.kind, timeoutMs, {
          cause: error instanceof Error ? error : undefined,
        });
      }
      throw classifyFetchFailure(this.kind, error);
    }
  }

  isAvailable(): boolean {
    return true;
  }
}
