/**
 * Retry/Fallback Controller
 *
 * Runs the ordered fetcher kinds for one request:
 *   - each kind gets up to maxRetries attempts, every attempt under its own timer
 *   - transient failures retry the same kind after a linear backoff
 *   - categorical failures skip straight to the next kind
 *   - safety rejections end the request, no further kinds
 *
 * The resolved-address check runs before each attempt and is not counted as
 * one. Every attempt holds a governor slot for exactly its own duration.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Fetcher, FetchedPage, FetcherKind, FetcherRegistry } from "../fetchers/types.js";
import {
  CategoricalFetchError,
  FetcherUnavailableError,
  TransientFetchError,
  classifyFetchFailure,
} from "../fetchers/errors.js";
import {
  ExhaustedStrategiesError,
  PagegrabError,
  RequestAbortedError,
  SafetyRejectionError,
} from "../errors.js";
import type { ConcurrencyGovernor } from "../governor/governor.js";
import { assertPublicAddress, assertSafeRedirect, type HostResolver, type Target, type TargetPolicy } from "../target.js";
import type { FetchAttempt, RequestOptions } from "../types.js";
import type { Logger } from "../utils/logger.js";

/**
 * Per-request input
 */
export interface FallbackContext {
  target: Target;
  /** Ordered kinds from the strategy selector */
  kinds: readonly FetcherKind[];
  options: RequestOptions;
  /** Request signal: caller cancellation or request deadline */
  signal: AbortSignal;
  logger?: Logger;
}

/**
 * Runs on each fetched page inside the attempt. A CategoricalFetchError
 * thrown here fails the attempt like a fetch failure would.
 */
export type PageHandler<T> = (page: FetchedPage) => T | Promise<T>;

export type FallbackOutcome<T> =
  | { status: "success"; page: FetchedPage; value: T; attempts: FetchAttempt[] }
  | { status: "failed"; error: ExhaustedStrategiesError; attempts: FetchAttempt[] }
  | { status: "rejected"; error: SafetyRejectionError; attempts: FetchAttempt[] }
  | { status: "aborted"; error: RequestAbortedError; attempts: FetchAttempt[] };

export interface FallbackControllerOptions {
  fetchers: FetcherRegistry;
  governor: ConcurrencyGovernor;
  resolver: HostResolver;
  policy: TargetPolicy;
  maxRetries: number;
  retryDelayMs: number;
  logger?: Logger;
}

/**
 * Total backoff a request can spend waiting between retries of one kind
 */
export function backoffBudgetMs(maxRetries: number, retryDelayMs: number): number {
  let total = 0;
  for (let attempt = 1; attempt < maxRetries; attempt++) {
    total += retryDelayMs * attempt;
  }
  return total;
}

/**
 * Retry/Fallback Controller
 *
 * @example
 * const controller = new FallbackController({ fetchers, governor, resolver: dnsResolver, policy: {}, maxRetries: 3, retryDelayMs: 2000 });
 * const outcome = await controller.run({ target, kinds: ["lightweight", "rendering"], options, signal }, (page) => extract(page));
 */
export class FallbackController {
  private fetchers: FetcherRegistry;
  private governor: ConcurrencyGovernor;
  private resolver: HostResolver;
  private policy: TargetPolicy;
  private maxRetries: number;
  private retryDelayMs: number;
  private logger?: Logger;

  constructor(options: FallbackControllerOptions) {
    this.fetchers = options.fetchers;
    this.governor = options.governor;
    this.resolver = options.resolver;
    this.policy = options.policy;
    this.maxRetries = options.maxRetries;
    this.retryDelayMs = options.retryDelayMs;
    this.logger = options.logger;
  }

  async run<T>(context: FallbackContext, handle: PageHandler<T>): Promise<FallbackOutcome<T>> {
    const { target, kinds, signal } = context;
    const logger = context.logger ?? this.logger;
    const attempts: FetchAttempt[] = [];
    let lastError: Error | undefined;

    const aborted = (): FallbackOutcome<T> => ({
      status: "aborted",
      error: new RequestAbortedError(target.originalUrl, abortReason(signal)),
      attempts,
    });

    logger?.debug(`[controller] ${target.url} with kinds: ${kinds.join(" → ")}`);

    for (const kind of kinds) {
      const fetcher = this.fetchers[kind];

      for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
        if (signal.aborted) {
          return aborted();
        }

        try {
          await assertPublicAddress(target, this.resolver);
        } catch (error: unknown) {
          if (error instanceof SafetyRejectionError) {
            logger?.warn({ url: target.originalUrl, kind, attempt }, `[controller] ${error.message}`);
            return { status: "rejected", error, attempts };
          }
          throw error;
        }

        const startedAt = Date.now();
        try {
          const { page, value } = await this.attempt(fetcher, context, handle);
          attempts.push({
            kind,
            attempt,
            startedAt,
            endedAt: Date.now(),
            outcome: "success",
            markupLength: page.html.length,
          });
          logger?.debug(`[controller] ✓ ${kind} succeeded on attempt ${attempt} in ${page.duration}ms`);
          return { status: "success", page, value, attempts };
        } catch (error: unknown) {
          const failure = this.classify(kind, error);
          attempts.push({
            kind,
            attempt,
            startedAt,
            endedAt: Date.now(),
            outcome: "failure",
            error: failure.message,
          });

          if (signal.aborted || failure instanceof RequestAbortedError) {
            return aborted();
          }

          if (failure instanceof SafetyRejectionError) {
            logger?.warn({ url: target.originalUrl, kind, attempt }, `[controller] ${failure.message}`);
            return { status: "rejected", error: failure, attempts };
          }

          lastError = failure;

          if (!(failure instanceof TransientFetchError)) {
            logger?.warn(
              { url: target.originalUrl, kind, attempt },
              `[controller] ${kind} failed (${failure.message}), falling back`
            );
            break;
          }

          if (attempt < this.maxRetries) {
            const delay = this.retryDelayMs * attempt;
            logger?.warn(
              { url: target.originalUrl, kind, attempt },
              `[controller] ${kind} failed (${failure.message}), retrying in ${delay}ms`
            );
            try {
              await sleep(delay, undefined, { signal });
            } catch (sleepError: unknown) {
              if (signal.aborted) {
                return aborted();
              }
              throw sleepError;
            }
          }
        }
      }
    }

    return {
      status: "failed",
      error: new ExhaustedStrategiesError(
        target.originalUrl,
        attempts.length,
        lastError ?? new Error("No fetcher kinds to try")
      ),
      attempts,
    };
  }

  /**
   * One attempt: slot, pacing, fetch, redirect check, handler
   */
  private attempt<T>(
    fetcher: Fetcher,
    context: FallbackContext,
    handle: PageHandler<T>
  ): Promise<{ page: FetchedPage; value: T }> {
    const { target, options, signal } = context;

    if (!fetcher.isAvailable()) {
      return Promise.reject(new FetcherUnavailableError(fetcher.kind));
    }

    return this.governor.withSlot(target.host, signal, async () => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
      const onAbort = () => controller.abort();
      signal.addEventListener("abort", onAbort, { once: true });

      try {
        const page = await fetcher.fetch({
          target,
          timeoutMs: options.timeoutMs,
          readyCondition: options.readyCondition,
          attemptOptions: options.attemptOptions,
          logger: context.logger ?? this.logger,
          abortSignal: controller.signal,
        });

        assertSafeRedirect(target, page.finalUrl, this.policy);

        const value = await handle(page);
        return { page, value };
      } finally {
        clearTimeout(timeoutId);
        signal.removeEventListener("abort", onAbort);
      }
    });
  }

  private classify(kind: FetcherKind, error: unknown): PagegrabError {
    if (error instanceof SafetyRejectionError || error instanceof RequestAbortedError) {
      return error;
    }
    if (error instanceof TransientFetchError || error instanceof CategoricalFetchError) {
      return error;
    }
    return classifyFetchFailure(kind, error);
  }
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.message) {
    return reason.message;
  }
  if (typeof reason === "string" && reason) {
    return reason;
  }
  return "cancelled";
}
