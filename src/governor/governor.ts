import pLimit from "p-limit";
import { setTimeout as sleep } from "node:timers/promises";
import { RequestAbortedError } from "../errors.js";
import type { Logger } from "../utils/logger.js";

/**
 * Held slot. release() is idempotent.
 */
export interface AdmissionToken {
  readonly admittedAt: number;
  release(): void;
}

/**
 * Concurrency Governor
 *
 * Bounds in-flight fetch attempts process-wide and spaces attempt starts
 * against the same host. Admission is FIFO through p-limit; a waiter that is
 * cancelled before its turn rejects at once and hands its slot straight back
 * when the turn arrives. An admitted attempt whose host is still inside its
 * delay gives the slot back while it waits.
 *
 * @example
 * const governor = new ConcurrencyGovernor({ maxConcurrent: 5, hostDelayMs: 1000 });
 * const page = await governor.withSlot("example.com", signal, () => fetcher.fetch(meta));
 */
export class ConcurrencyGovernor {
  private limit: ReturnType<typeof pLimit>;
  private hostDelayMs: number;
  private nextStartByHost = new Map<string, number>();
  private logger?: Logger;

  constructor(options: { maxConcurrent: number; hostDelayMs: number; logger?: Logger }) {
    this.limit = pLimit(options.maxConcurrent);
    this.hostDelayMs = options.hostDelayMs;
    this.logger = options.logger;
  }

  /**
   * Wait for a free slot
   *
   * @throws RequestAbortedError if the signal fires before admission
   */
  admit(signal?: AbortSignal): Promise<AdmissionToken> {
    if (signal?.aborted) {
      return Promise.reject(new RequestAbortedError("", "cancelled while waiting for a slot"));
    }

    return new Promise<AdmissionToken>((resolve, reject) => {
      let settled = false;

      const onAbort = () => {
        if (settled) return;
        settled = true;
        reject(new RequestAbortedError("", "cancelled while waiting for a slot"));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.limit(
        () =>
          new Promise<void>((done) => {
            signal?.removeEventListener("abort", onAbort);
            if (settled) {
              // Waiter gave up; free the slot for the next in line
              done();
              return;
            }
            settled = true;

            let released = false;
            resolve({
              admittedAt: Date.now(),
              release: () => {
                if (released) return;
                released = true;
                done();
              },
            });
          })
      ).catch((error: unknown) => {
        this.logger?.error({ err: error }, "[governor] admission task failed");
      });
    });
  }

  /**
   * Wait until the host may start another attempt, then claim that start
   *
   * Claims are taken synchronously, so concurrent callers for the same host
   * start one delay apart.
   *
   * @throws RequestAbortedError if the signal fires while waiting
   */
  async pace(host: string, signal?: AbortSignal): Promise<void> {
    for (let wait = this.claimStart(host); wait > 0; wait = this.claimStart(host)) {
      this.logger?.debug(`[governor] pacing ${host} for ${wait}ms`);
      await this.waitFor(wait, signal);
    }
  }

  /**
   * Run fn holding a slot. The host's start is claimed once admitted; while
   * the host is still inside its delay the slot goes back to the queue.
   * The slot is released on every exit path.
   */
  async withSlot<T>(host: string, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    for (;;) {
      const token = await this.admit(signal);
      const wait = this.claimStart(host);
      if (wait <= 0) {
        try {
          return await fn();
        } finally {
          token.release();
        }
      }

      token.release();
      this.logger?.debug(`[governor] pacing ${host} for ${wait}ms outside its slot`);
      await this.waitFor(wait, signal);
    }
  }

  /**
   * Milliseconds until host may start; 0 means the start was claimed.
   * Hosts whose delay has run out are dropped.
   */
  private claimStart(host: string): number {
    const now = Date.now();
    for (const [key, nextStart] of this.nextStartByHost) {
      if (nextStart <= now) {
        this.nextStartByHost.delete(key);
      }
    }

    const nextStart = this.nextStartByHost.get(host);
    if (nextStart !== undefined) {
      return nextStart - now;
    }
    if (this.hostDelayMs > 0) {
      this.nextStartByHost.set(host, now + this.hostDelayMs);
    }
    return 0;
  }

  private async waitFor(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await sleep(ms, undefined, { signal });
    } catch (error: unknown) {
      if (signal?.aborted) {
        throw new RequestAbortedError("", "cancelled while pacing");
      }
      throw error;
    }
  }

  /** Attempts currently holding a slot */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /** Attempts waiting for a slot */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  /** Hosts still inside their pacing delay */
  get pacedHostCount(): number {
    return this.nextStartByHost.size;
  }
}
