/**
 * In-process stand-ins for fetchers and browsers
 */

import type { Fetcher, FetcherHealth, FetchMeta, FetchedPage, FetcherKind } from "../../fetchers/types.js";
import { FetchTimeoutError } from "../../fetchers/errors.js";
import type {
  BrowserHandle,
  NavigationResponse,
  SessionContext,
  SessionContextOptions,
  SessionPage,
} from "../../browser/types.js";
import type { RequestOptions } from "../../types.js";

export const PRODUCT_HTML = `<!DOCTYPE html>
<html>
<head>
  <title>Oak Dining Table | Northwood</title>
  <meta name="description" content="Solid oak dining table.">
  <meta property="og:title" content="Oak Dining Table">
  <meta property="og:image" content="https://cdn.shop.example/og.jpg">
</head>
<body>
  <h1>Oak Dining Table</h1>
  <div class="product-description">A solid oak table that seats six people.</div>
  <div class="product-images">
    <img src="/img/oak-table-1.jpg">
    <img data-src="/img/oak-table-2.jpg">
    <img src="/img/oak-table-1.jpg">
    <img src="/img/icons/zoom.png">
    <img src="/img/oak-thumb.jpg" width="40" height="40">
    <img src="data:image/png;base64,AAAA">
  </div>
  <span class="price">$999.00</span>
  <span class="brand">Northwood</span>
  <span class="sku">NW-OAK-6</span>
  <div class="specifications">
    <table>
      <tr><th>Material</th><td>Oak</td></tr>
      <tr><td>Seats</td><td>6</td></tr>
    </table>
  </div>
</body>
</html>`;

export function makePage(kind: FetcherKind, overrides: Partial<FetchedPage> = {}): FetchedPage {
  return {
    html: PRODUCT_HTML,
    finalUrl: "https://shop.example/p/oak-table",
    statusCode: 200,
    contentType: "text/html; charset=utf-8",
    kind,
    duration: 5,
    ...overrides,
  };
}

export function makeOptions(overrides: Partial<RequestOptions> = {}): RequestOptions {
  return {
    strategy: "auto",
    timeoutMs: 1000,
    extractFields: new Set(["title", "price"]),
    attemptOptions: {},
    ...overrides,
  };
}

export type FetchStep = (meta: FetchMeta) => FetchedPage | Promise<FetchedPage>;

/**
 * Fetcher that plays a script of steps; the last step repeats
 */
export class FakeFetcher implements Fetcher {
  readonly kind: FetcherKind;
  calls = 0;
  closed = false;
  available = true;
  health: FetcherHealth = { healthy: true, issues: [] };
  readonly metas: FetchMeta[] = [];
  private steps: FetchStep[];

  constructor(kind: FetcherKind, steps: FetchStep[] = []) {
    this.kind = kind;
    this.steps = steps.length > 0 ? steps : [() => makePage(kind)];
  }

  async fetch(meta: FetchMeta): Promise<FetchedPage> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    this.metas.push(meta);
    if (!step) {
      throw new Error("no step");
    }
    return step(meta);
  }

  isAvailable(): boolean {
    return this.available;
  }

  async healthCheck(): Promise<FetcherHealth> {
    return this.health;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function succeed(kind: FetcherKind, overrides: Partial<FetchedPage> = {}): FetchStep {
  return () => makePage(kind, overrides);
}

export function fail(error: Error): FetchStep {
  return () => {
    throw error;
  };
}

/**
 * Never settles on its own; rejects with a timeout once the attempt signal fires
 */
export function hang(kind: FetcherKind): FetchStep {
  return (meta) =>
    new Promise<FetchedPage>((_, reject) => {
      meta.abortSignal.addEventListener(
        "abort",
        () => reject(new FetchTimeoutError(kind, meta.timeoutMs)),
        { once: true }
      );
    });
}

export const publicResolver = async (): Promise<string[]> => ["93.184.216.34"];

// =============================================================================
// Browser fakes
// =============================================================================

export interface FakePageSetup {
  html?: string;
  finalUrl?: string;
  status?: number | null;
  contentType?: string;
  selectorFails?: boolean;
}

export class FakePage implements SessionPage {
  readonly evaluated: string[] = [];
  readonly gotoUrls: string[] = [];
  waitedFor: string[] = [];

  constructor(private setup: FakePageSetup) {}

  async goto(url: string): Promise<NavigationResponse | null> {
    this.gotoUrls.push(url);
    const status = this.setup.status === undefined ? 200 : this.setup.status;
    if (status === null) {
      return null;
    }
    return {
      status: () => status,
      headers: () => ({ "content-type": this.setup.contentType ?? "text/html" }),
    };
  }

  async waitForSelector(selector: string): Promise<unknown> {
    this.waitedFor.push(selector);
    if (this.setup.selectorFails) {
      throw new Error(`waiting for locator('${selector}') exceeded timeout`);
    }
    return {};
  }

  async waitForLoadState(state?: "load" | "domcontentloaded" | "networkidle"): Promise<void> {
    this.waitedFor.push(state ?? "load");
  }

  async evaluate(expression: string): Promise<unknown> {
    this.evaluated.push(expression);
    return undefined;
  }

  async content(): Promise<string> {
    return this.setup.html ?? PRODUCT_HTML;
  }

  url(): string {
    return this.setup.finalUrl ?? "https://shop.example/p/oak-table";
  }
}

export class FakeContext implements SessionContext {
  closed = false;
  readonly pages: FakePage[] = [];

  constructor(private setup: FakePageSetup) {}

  async newPage(): Promise<SessionPage> {
    const page = new FakePage(this.setup);
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeBrowser implements BrowserHandle {
  readonly contexts: FakeContext[] = [];
  readonly contextOptions: Array<SessionContextOptions | undefined> = [];
  connected = true;
  closed = false;
  pageSetup: FakePageSetup = {};

  async newContext(options?: SessionContextOptions): Promise<SessionContext> {
    const context = new FakeContext(this.pageSetup);
    this.contexts.push(context);
    this.contextOptions.push(options);
    return context;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }
}

/**
 * Promise with its resolver exposed
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const tick = (ms = 0) => new Promise<void>((resolve) => setTimeout(resolve, ms));
