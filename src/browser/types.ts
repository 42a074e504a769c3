/**
 * Narrow views of the browser automation surface the rendering fetcher
 * drives. playwright-core's Browser/BrowserContext/Page satisfy these.
 */

/**
 * Navigation response
 */
export interface NavigationResponse {
  status(): number;
  headers(): Record<string, string>;
}

/**
 * A page inside an isolated session
 */
export interface SessionPage {
  goto(
    url: string,
    options?: { timeout?: number; waitUntil?: "load" | "domcontentloaded" }
  ): Promise<NavigationResponse | null>;
  waitForSelector(selector: string, options?: { timeout?: number }): Promise<unknown>;
  waitForLoadState(
    state?: "load" | "domcontentloaded" | "networkidle",
    options?: { timeout?: number }
  ): Promise<void>;
  evaluate(expression: string): Promise<unknown>;
  content(): Promise<string>;
  url(): string;
}

/**
 * An isolated session (cookies, storage and cache scoped to one attempt)
 */
export interface SessionContext {
  newPage(): Promise<SessionPage>;
  close(): Promise<void>;
}

/**
 * Options applied to every new session
 */
export interface SessionContextOptions {
  userAgent?: string;
  viewport?: { width: number; height: number };
  ignoreHTTPSErrors?: boolean;
  javaScriptEnabled?: boolean;
}

/**
 * A launched browser process
 */
export interface BrowserHandle {
  newContext(options?: SessionContextOptions): Promise<SessionContext>;
  close(): Promise<void>;
  isConnected(): boolean;
}

/**
 * Launches a browser process
 */
export type BrowserLauncher = () => Promise<BrowserHandle>;

/**
 * Browser instance in the pool
 */
export interface BrowserInstance {
  browser: BrowserHandle;

  /** Unique identifier */
  id: string;

  /** When the instance was created */
  createdAt: number;

  /** When the instance was last used */
  lastUsed: number;

  /** Number of sessions handled */
  requestCount: number;

  status: "idle" | "busy" | "recycling" | "unhealthy";
}

/**
 * Queue item for pending requests
 */
export interface QueueItem {
  resolve: (instance: BrowserInstance) => void;
  reject: (error: Error) => void;
  queuedAt: number;
}

/**
 * Pool configuration
 */
export interface PoolConfig {
  /** Pool size (number of browser processes) */
  size: number;

  /** Retire browser after this many sessions */
  retireAfterPageCount: number;

  /** Retire browser after this age in milliseconds */
  retireAfterAgeMs: number;

  /** Maximum queue size */
  maxQueueSize: number;

  /** Queue timeout in milliseconds */
  queueTimeout: number;
}

/**
 * Pool statistics
 */
export interface PoolStats {
  total: number;
  available: number;
  busy: number;
  recycling: number;
  unhealthy: number;
  queueLength: number;
  totalRequests: number;
  avgRequestDuration: number;
}

/**
 * Health status
 */
export interface HealthStatus {
  healthy: boolean;
  issues: string[];
  stats: PoolStats;
}

/**
 * Session pool interface
 */
export interface ISessionPool {
  shutdown(): Promise<void>;

  /**
   * Run callback inside a fresh session. The session is closed and the
   * browser returned on every exit path; aborting the signal closes the
   * session immediately.
   */
  withSession<T>(callback: (session: SessionContext) => Promise<T>, signal?: AbortSignal): Promise<T>;

  getStats(): PoolStats;

  healthCheck(): Promise<HealthStatus>;
}
