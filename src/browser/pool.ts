import type {
  BrowserInstance,
  BrowserLauncher,
  HealthStatus,
  ISessionPool,
  PoolConfig,
  PoolStats,
  QueueItem,
  SessionContext,
  SessionContextOptions,
} from "./types.js";
import { PagegrabError, PagegrabErrorCode, RequestAbortedError } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";

/**
 * Default pool configuration
 */
const DEFAULT_POOL_CONFIG: PoolConfig = {
  size: 2,
  retireAfterPageCount: 100,
  retireAfterAgeMs: 30 * 60 * 1000, // 30 minutes
  maxQueueSize: 100,
  queueTimeout: 60 * 1000, // 1 minute
};

/**
 * Generate unique ID
 */
function generateId(): string {
  return `browser_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * Session Pool
 *
 * Keeps a small set of browser processes and hands out one fresh, isolated
 * session (browser context) per attempt:
 * - Browsers launch lazily and retire after a session count or age
 * - Requests queue when every browser is busy
 * - A session is closed on every exit path; aborting closes it at once
 *
 * @example
 * const pool = new SessionPool(createChromiumLauncher(), { size: 2 });
 * const html = await pool.withSession(async (session) => {
 *   const page = await session.newPage();
 *   await page.goto("https://example.com");
 *   return page.content();
 * }, signal);
 * await pool.shutdown();
 */
export class SessionPool implements ISessionPool {
  private instances: BrowserInstance[] = [];
  private available: BrowserInstance[] = [];
  private inUse: Set<BrowserInstance> = new Set();
  private queue: QueueItem[] = [];
  private config: PoolConfig;
  private launcher: BrowserLauncher;
  private sessionOptions: SessionContextOptions;
  private launching = 0;
  private closed = false;
  private totalRequests = 0;
  private totalRequestDuration = 0;
  private logger: Logger;

  constructor(
    launcher: BrowserLauncher,
    config: Partial<PoolConfig> = {},
    sessionOptions: SessionContextOptions = {},
    logger: Logger = createLogger("pool")
  ) {
    this.launcher = launcher;
    this.config = { ...DEFAULT_POOL_CONFIG, ...config };
    this.sessionOptions = sessionOptions;
    this.logger = logger;
  }

  /**
   * Shutdown the pool and close all browsers
   */
  async shutdown(): Promise<void> {
    const stats = this.getStats();
    this.logger.debug(
      `Shutting down pool: ${stats.totalRequests} sessions served, ` +
        `${Math.round(stats.avgRequestDuration)}ms avg duration`
    );

    this.closed = true;

    const pending = this.queue;
    this.queue = [];
    for (const item of pending) {
      item.reject(new PagegrabError("Session pool shutting down", PagegrabErrorCode.SESSION_CLOSED));
    }

    await Promise.all(this.instances.map((instance) => this.closeBrowser(instance)));

    this.instances = [];
    this.available = [];
    this.inUse.clear();
  }

  /**
   * Run callback inside a fresh session
   */
  async withSession<T>(callback: (session: SessionContext) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const startTime = Date.now();
    const instance = await this.acquire(signal);

    let session: SessionContext | undefined;
    const teardown = () => {
      if (session) {
        void this.closeSession(instance, session);
      }
    };

    try {
      session = await instance.browser.newContext(this.sessionOptions);
      if (signal?.aborted) {
        throw new RequestAbortedError("", "cancelled before the session started");
      }
      signal?.addEventListener("abort", teardown, { once: true });

      const result = await callback(session);

      this.totalRequests++;
      this.totalRequestDuration += Date.now() - startTime;

      return result;
    } finally {
      signal?.removeEventListener("abort", teardown);
      if (session) {
        await this.closeSession(instance, session);
      }
      this.release(instance);
    }
  }

  /**
   * Get pool statistics
   */
  getStats(): PoolStats {
    const recycling = this.instances.filter((i) => i.status === "recycling").length;
    const unhealthy = this.instances.filter((i) => i.status === "unhealthy").length;

    return {
      total: this.instances.length,
      available: this.available.length,
      busy: this.inUse.size,
      recycling,
      unhealthy,
      queueLength: this.queue.length,
      totalRequests: this.totalRequests,
      avgRequestDuration: this.totalRequests > 0 ? this.totalRequestDuration / this.totalRequests : 0,
    };
  }

  /**
   * Run health check
   */
  async healthCheck(): Promise<HealthStatus> {
    const issues: string[] = [];

    for (const instance of this.instances) {
      if (instance.status !== "recycling" && !instance.browser.isConnected()) {
        instance.status = "unhealthy";
      }
    }

    const stats = this.getStats();

    if (this.closed) {
      issues.push("Pool is shut down");
    }

    if (stats.unhealthy > 0) {
      issues.push(`${stats.unhealthy} unhealthy instances`);
    }

    if (stats.queueLength > this.config.maxQueueSize * 0.8) {
      issues.push(`Queue near capacity: ${stats.queueLength}/${this.config.maxQueueSize}`);
    }

    if (stats.available === 0 && stats.queueLength > 0) {
      issues.push("Pool saturated - all browsers busy with pending requests");
    }

    return {
      healthy: issues.length === 0,
      issues,
      stats,
    };
  }

  // =========================================================================
  // Private methods
  // =========================================================================

  /**
   * Acquire a browser, launching one when the pool is not full yet
   */
  private async acquire(signal?: AbortSignal): Promise<BrowserInstance> {
    if (this.closed) {
      throw new PagegrabError("Session pool has been shut down", PagegrabErrorCode.SESSION_CLOSED);
    }
    if (signal?.aborted) {
      throw new RequestAbortedError("", "cancelled before a browser was acquired");
    }

    let instance = this.takeAvailable();
    if (!instance && this.instances.length + this.launching < this.config.size) {
      instance = await this.createInstance();
    }
    if (!instance) {
      this.logger.debug(`No browsers available, queuing request (queue: ${this.queue.length + 1})`);
      instance = await this.queueRequest(signal);
    }

    instance.status = "busy";
    instance.lastUsed = Date.now();
    this.inUse.add(instance);

    this.logger.debug(
      `Acquired browser ${instance.id} (available: ${this.available.length}, busy: ${this.inUse.size})`
    );

    return instance;
  }

  /**
   * Next idle, connected browser; disconnected ones are dropped
   */
  private takeAvailable(): BrowserInstance | undefined {
    let instance = this.available.shift();
    while (instance && !instance.browser.isConnected()) {
      this.logger.warn(`Browser ${instance.id} disconnected, discarding`);
      this.discard(instance);
      instance = this.available.shift();
    }
    return instance;
  }

  /**
   * Return a browser to the pool
   */
  private release(instance: BrowserInstance): void {
    if (!this.inUse.delete(instance)) return;

    instance.status = "idle";
    instance.requestCount++;

    if (this.closed) {
      return;
    }

    if (!instance.browser.isConnected()) {
      this.discard(instance);
      this.processQueue();
      return;
    }

    if (this.shouldRecycle(instance)) {
      this.logger.debug(`Recycling browser ${instance.id} (age or session limit reached)`);
      this.recycleInstance(instance).catch((error: unknown) => {
        this.logger.warn({ err: error }, `Failed to recycle browser ${instance.id}`);
      });
    } else {
      this.available.push(instance);
      this.processQueue();
    }
  }

  /**
   * Launch a browser and register it
   */
  private async createInstance(): Promise<BrowserInstance> {
    this.launching++;
    try {
      const browser = await this.launcher();
      const instance: BrowserInstance = {
        browser,
        id: generateId(),
        createdAt: Date.now(),
        lastUsed: Date.now(),
        requestCount: 0,
        status: "idle",
      };
      this.instances.push(instance);
      return instance;
    } finally {
      this.launching--;
    }
  }

  /**
   * Check if instance should be recycled
   */
  private shouldRecycle(instance: BrowserInstance): boolean {
    const age = Date.now() - instance.createdAt;
    return instance.requestCount >= this.config.retireAfterPageCount || age >= this.config.retireAfterAgeMs;
  }

  /**
   * Close an old browser and launch its replacement
   */
  private async recycleInstance(instance: BrowserInstance): Promise<void> {
    instance.status = "recycling";
    this.discard(instance);
    await this.closeBrowser(instance);

    try {
      const replacement = await this.createInstance();
      this.available.push(replacement);
      this.logger.debug(`Recycled browser: ${instance.id} -> ${replacement.id}`);
    } finally {
      this.processQueue();
    }
  }

  private discard(instance: BrowserInstance): void {
    const index = this.instances.indexOf(instance);
    if (index !== -1) {
      this.instances.splice(index, 1);
    }
    const availableIndex = this.available.indexOf(instance);
    if (availableIndex !== -1) {
      this.available.splice(availableIndex, 1);
    }
  }

  private async closeBrowser(instance: BrowserInstance): Promise<void> {
    try {
      await instance.browser.close();
    } catch (error: unknown) {
      this.logger.debug({ err: error }, `Closing browser ${instance.id} failed`);
    }
  }

  private async closeSession(instance: BrowserInstance, session: SessionContext): Promise<void> {
    try {
      await session.close();
    } catch (error: unknown) {
      this.logger.debug({ err: error }, `Closing session on ${instance.id} failed`);
    }
  }

  /**
   * Queue a request when no browsers available
   */
  private queueRequest(signal?: AbortSignal): Promise<BrowserInstance> {
    return new Promise<BrowserInstance>((resolve, reject) => {
      if (this.queue.length >= this.config.maxQueueSize) {
        reject(new PagegrabError("Session queue full", PagegrabErrorCode.SESSION_CLOSED, { retryable: true }));
        return;
      }

      const remove = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        const index = this.queue.indexOf(item);
        if (index !== -1) {
          this.queue.splice(index, 1);
          return true;
        }
        return false;
      };

      const onAbort = () => {
        if (remove()) {
          reject(new RequestAbortedError("", "cancelled while waiting for a browser"));
        }
      };

      const item: QueueItem = {
        resolve: (instance) => {
          remove();
          resolve(instance);
        },
        reject: (error) => {
          remove();
          reject(error);
        },
        queuedAt: Date.now(),
      };
      this.queue.push(item);

      const timer = setTimeout(() => {
        if (remove()) {
          reject(new PagegrabError("Session queue timeout", PagegrabErrorCode.TIMEOUT, { retryable: true }));
        }
      }, this.config.queueTimeout);
      timer.unref();

      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Hand idle browsers to queued requests
   */
  private processQueue(): void {
    while (this.queue.length > 0) {
      const item = this.queue[0];
      const instance = this.takeAvailable();
      if (!item || !instance) {
        if (item && !instance && this.instances.length + this.launching < this.config.size) {
          this.createInstance().then(
            (launched) => {
              this.available.push(launched);
              this.processQueue();
            },
            (error: unknown) => {
              item.reject(error instanceof Error ? error : new Error(String(error)));
            }
          );
        }
        return;
      }
      item.resolve(instance);
    }
  }
}
