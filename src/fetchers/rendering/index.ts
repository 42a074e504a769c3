/**
 * Rendering Fetcher - pooled playwright-core browsers
 *
 * Every attempt runs in a fresh browser context, executes page scripts and
 * waits for a readiness condition before capturing markup. Slowest kind,
 * used when the lightweight fetcher is blocked or the host needs scripts.
 */

import type { Fetcher, FetcherHealth, FetchMeta, FetchedPage, FetcherKind } from "../types.js";
import {
  ChallengeDetectedError,
  FetchTimeoutError,
  HttpStatusError,
  InsufficientContentError,
  TransientFetchError,
  classifyFetchFailure,
} from "../errors.js";
import { MIN_CONTENT_LENGTH, detectChallenge, extractText } from "../detection.js";
import { PagegrabErrorCode } from "../../errors.js";
import type { ISessionPool, SessionPage } from "../../browser/types.js";

/**
 * Upper bound on the network-idle wait when no ready condition is given
 */
const NETWORK_IDLE_TIMEOUT_MS = 10000;

/**
 * Scroll the page in viewport steps so lazy content loads
 */
const SCROLL_TO_BOTTOM_SCRIPT = `(async () => {
  const step = Math.max(window.innerHeight, 200);
  for (let y = 0; y < document.body.scrollHeight; y += step) {
    window.scrollTo(0, y);
    await new Promise((resolve) => setTimeout(resolve, 100));
  }
  window.scrollTo(0, document.body.scrollHeight);
})()`;

/**
 * Resolve once every image has loaded or failed, or after 5 seconds
 */
const WAIT_FOR_IMAGES_SCRIPT = `Promise.race([
  Promise.all(
    Array.from(document.images)
      .filter((img) => !img.complete)
      .map((img) => new Promise((resolve) => { img.addEventListener("load", resolve); img.addEventListener("error", resolve); }))
  ),
  new Promise((resolve) => setTimeout(resolve, 5000)),
])`;

export interface RenderingFetcherOptions {
  /** Cap on the network-idle wait (default: 10s) */
  networkIdleTimeoutMs?: number;
}

/**
 * Rendering fetcher implementation over a session pool
 */
export class RenderingFetcher implements Fetcher {
  readonly kind: FetcherKind = "rendering";
  private pool: ISessionPool;
  private networkIdleTimeoutMs: number;
  private closed = false;

  constructor(pool: ISessionPool, options: RenderingFetcherOptions = {}) {
    this.pool = pool;
    this.networkIdleTimeoutMs = options.networkIdleTimeoutMs ?? NETWORK_IDLE_TIMEOUT_MS;
  }

  async fetch(meta: FetchMeta): Promise<FetchedPage> {
    const startTime = Date.now();
    const { target, timeoutMs, readyCondition, attemptOptions, logger, abortSignal } = meta;

    if (abortSignal.aborted) {
      throw new FetchTimeoutError(this.kind, 0);
    }

    logger?.debug(`[rendering] Starting browser fetch of ${target.url}`);

    try {
      return await this.pool.withSession(async (session) => {
        const page = await session.newPage();
        const response = await page.goto(target.url, { timeout: timeoutMs, waitUntil: "domcontentloaded" });

        await this.waitUntilReady(page, timeoutMs, readyCondition, meta);

        if (attemptOptions.scrollToBottom) {
          await page.evaluate(SCROLL_TO_BOTTOM_SCRIPT);
        }
        if (attemptOptions.waitForImages) {
          await page.evaluate(WAIT_FOR_IMAGES_SCRIPT);
        }

        const html = await page.content();
        const finalUrl = page.url();
        const statusCode = response ? response.status() : null;

        if (statusCode !== null && statusCode >= 500) {
          throw new TransientFetchError(this.kind, `HTTP ${statusCode}`, PagegrabErrorCode.SERVER_ERROR);
        }
        if (statusCode !== null && statusCode >= 400) {
          throw new HttpStatusError(this.kind, statusCode);
        }

        const challengeType = detectChallenge(html);
        if (challengeType) {
          logger?.debug(`[rendering] Challenge detected: ${challengeType}`);
          throw new ChallengeDetectedError(this.kind, challengeType);
        }

        const textContent = extractText(html);
        if (textContent.length < MIN_CONTENT_LENGTH) {
          logger?.debug(`[rendering] Insufficient content: ${textContent.length} chars`);
          throw new InsufficientContentError(this.kind, textContent.length, MIN_CONTENT_LENGTH);
        }

        const duration = Date.now() - startTime;
        logger?.debug(`[rendering] Success: ${html.length} chars in ${duration}ms`);

        return {
          html,
          finalUrl,
          statusCode,
          contentType: response?.headers()["content-type"] ?? null,
          kind: this.kind,
          duration,
        };
      }, abortSignal);
    } catch (error: unknown) {
      if (abortSignal.aborted) {
        throw new FetchTimeoutError(this.kind, timeoutMs, {
          cause: error instanceof Error ? error : undefined,
        });
      }
      throw classifyFetchFailure(this.kind, error);
    }
  }

  /**
   * Wait for the ready condition, or for the network to settle when none is set
   */
  private async waitUntilReady(
    page: SessionPage,
    timeoutMs: number,
    readyCondition: string | undefined,
    meta: FetchMeta
  ): Promise<void> {
    if (readyCondition) {
      try {
        await page.waitForSelector(readyCondition, { timeout: timeoutMs });
      } catch (error: unknown) {
        throw new TransientFetchError(
          this.kind,
          `Ready condition "${readyCondition}" not met within ${timeoutMs}ms`,
          PagegrabErrorCode.TIMEOUT,
          { cause: error instanceof Error ? error : undefined }
        );
      }
      return;
    }

    try {
      await page.waitForLoadState("networkidle", { timeout: Math.min(timeoutMs, this.networkIdleTimeoutMs) });
    } catch (error: unknown) {
      // Pages with long-polling never go idle; capture what rendered so far
      meta.logger?.debug({ err: error }, `[rendering] Network did not settle for ${meta.target.url}`);
    }
  }

  isAvailable(): boolean {
    return !this.closed;
  }

  /**
   * Pool health: disconnected browsers, queue pressure, shutdown
   */
  async healthCheck(): Promise<FetcherHealth> {
    if (this.closed) {
      return { healthy: false, issues: ["Fetcher is closed"] };
    }
    const { healthy, issues } = await this.pool.healthCheck();
    return { healthy, issues };
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.pool.shutdown();
  }
}
