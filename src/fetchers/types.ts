/**
 * Fetcher types
 *
 * Two interchangeable acquisition capabilities:
 * 1. lightweight - single request/response via got-scraping, no scripts
 * 2. rendering - isolated browser context, executes scripts, waits for readiness
 */

import type { Logger } from "../utils/logger.js";
import type { AttemptOptions } from "../types.js";
import type { Target } from "../target.js";

/**
 * Available fetcher kinds
 */
export type FetcherKind = "lightweight" | "rendering";

export const FETCHER_KINDS: readonly FetcherKind[] = ["lightweight", "rendering"];

/**
 * Page returned by a fetcher
 */
export interface FetchedPage {
  /** Raw markup */
  html: string;
  /** Final URL after redirects */
  finalUrl: string;
  /** HTTP status code, when the fetcher can observe it */
  statusCode: number | null;
  /** Content-Type header */
  contentType: string | null;
  /** Fetcher that produced this page */
  kind: FetcherKind;
  /** Time taken in milliseconds */
  duration: number;
}

/**
 * Input to a single fetch
 */
export interface FetchMeta {
  target: Target;
  /** Per-attempt time bound, enforced by the caller through abortSignal */
  timeoutMs: number;
  /** Selector the rendering fetcher waits for */
  readyCondition?: string;
  attemptOptions: AttemptOptions;
  logger?: Logger;
  /** Fires on attempt timeout or request cancellation */
  abortSignal: AbortSignal;
}

/**
 * Health of a fetcher's long-lived resources
 */
export interface FetcherHealth {
  healthy: boolean;
  issues: string[];
}

/**
 * Fetcher interface - both kinds implement this
 */
export interface Fetcher {
  readonly kind: FetcherKind;

  /**
   * Fetch a target
   * @throws FetchError on failure
   */
  fetch(meta: FetchMeta): Promise<FetchedPage>;

  /**
   * Whether the fetcher can run in this process
   */
  isAvailable(): boolean;

  /** Check long-lived resources such as a browser pool */
  healthCheck?(): Promise<FetcherHealth>;

  /** Release long-lived resources */
  close?(): Promise<void>;
}

/**
 * Fetchers keyed by kind
 */
export type FetcherRegistry = Record<FetcherKind, Fetcher>;
