import { describe, it, expect } from "vitest";
import { Orchestrator, summarizeBatch, type RequestState } from "../orchestrator.js";
import { DEFAULT_CONFIG, type OrchestratorConfig } from "../config.js";
import { ConfigurationError, PagegrabErrorCode, ValidationError } from "../errors.js";
import { BlockedResponseError, TransientFetchError } from "../fetchers/errors.js";
import type { FetcherKind } from "../fetchers/types.js";
import { RuleSetStore, compileRuleSet, loadRuleSet } from "../extraction/rules.js";
import { Target, type HostResolver } from "../target.js";
import type { AcquisitionResult, FieldName } from "../types.js";
import { FakeFetcher, fail, hang, publicResolver, succeed, tick } from "./helpers/fakes.js";

const config: OrchestratorConfig = {
  ...DEFAULT_CONFIG,
  hostDelayMs: 0,
  retryDelayMs: 1,
  maxRetries: 2,
  logLevel: "silent",
};

const PRODUCT_URL = "https://shop.example/p/oak-table";

function build(
  lightweight = new FakeFetcher("lightweight"),
  rendering = new FakeFetcher("rendering"),
  overrides: Partial<OrchestratorConfig> = {},
  resolver: HostResolver = publicResolver
): Orchestrator {
  return new Orchestrator({
    config: { ...config, ...overrides },
    fetchers: { lightweight, rendering },
    rules: new RuleSetStore(loadRuleSet()),
    resolver,
  });
}

function serverError(kind: FetcherKind): TransientFetchError {
  return new TransientFetchError(kind, "Server error 503", PagegrabErrorCode.SERVER_ERROR);
}

function expectExclusive(result: AcquisitionResult): void {
  if (result.success) {
    expect(result.error).toBeNull();
    expect(result.data).not.toBeNull();
  } else {
    expect(result.error).toEqual(expect.any(String));
    expect(result.data).toBeNull();
  }
}

describe("Orchestrator", () => {
  describe("constructor", () => {
    it.each([
      [{ maxRetries: 0 }, "maxRetries: must be greater than 0"],
      [{ retryDelayMs: -5 }, "retryDelayMs: must be greater than 0"],
      [{ minTimeoutMs: 60000, maxTimeoutMs: 30000 }, "minTimeoutMs: must not exceed maxTimeoutMs"],
    ])("should refuse configuration %o", (overrides, issue) => {
      try {
        build(undefined, undefined, overrides);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toMatchObject({ issues: [issue] });
      }
    });
  });

  describe("acquire", () => {
    it("should acquire and extract the requested fields", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const rendering = new FakeFetcher("rendering");
      const orchestrator = build(lightweight, rendering);
      const states: RequestState[] = [];

      const result = await orchestrator.acquire(
        PRODUCT_URL,
        { extractFields: ["title", "price"] },
        { onStateChange: (state) => states.push(state) }
      );

      expectExclusive(result);
      expect(result.success).toBe(true);
      expect(result.outcome).toBe("completed");
      expect(result.strategyUsed).toBe("lightweight");
      expect(result.statusCode).toBe(200);
      expect(result.finalUrl).toBe(PRODUCT_URL);
      expect(result.attempts).toBe(1);
      expect(result.data).toEqual({
        title: "Oak Dining Table",
        description: null,
        images: null,
        price: { amount: "999.00", currency: "USD" },
        brand: null,
        model: null,
        specifications: null,
        metaTags: null,
      });
      expect(states).toEqual(["selecting", "fetching", "extracting", "completed"]);
      expect(rendering.calls).toBe(0);
    });

    it("should extract the default fields when none are requested", async () => {
      const result = await build().acquire(PRODUCT_URL);

      expect(result.data).toEqual({
        title: "Oak Dining Table",
        description: "A solid oak table that seats six people.",
        images: ["https://shop.example/img/oak-table-1.jpg", "https://shop.example/img/oak-table-2.jpg"],
        price: { amount: "999.00", currency: "USD" },
        brand: null,
        model: null,
        specifications: null,
        metaTags: null,
      });
    });

    it("should reject unsafe targets without fetching", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const rendering = new FakeFetcher("rendering");
      const orchestrator = build(lightweight, rendering);

      const states: RequestState[] = [];

      const result = await orchestrator.acquire(
        "http://127.0.0.1/admin",
        {},
        { onStateChange: (state) => states.push(state) }
      );

      expectExclusive(result);
      expect(result.success).toBe(false);
      expect(result.outcome).toBe("aborted");
      expect(states).toEqual(["aborted"]);
      expect(result.error).toBe("Target rejected: address 127.0.0.1 is in a loopback range");
      expect(result.strategyUsed).toBe("auto");
      expect(result.attempts).toBe(0);
      expect(lightweight.calls + rendering.calls).toBe(0);
    });

    it("should abort without a fetch attempt when the host resolves to a private address", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const rendering = new FakeFetcher("rendering");
      const orchestrator = build(lightweight, rendering, {}, async () => ["10.1.2.3"]);
      const states: RequestState[] = [];

      const result = await orchestrator.acquire(PRODUCT_URL, {}, { onStateChange: (state) => states.push(state) });

      expectExclusive(result);
      expect(result.outcome).toBe("aborted");
      expect(result.error).toBe('Target rejected: hostname "shop.example" resolves to 10.1.2.3 (private (10.x))');
      expect(result.attempts).toBe(0);
      expect(states).toEqual(["selecting", "fetching", "aborted"]);
      expect(lightweight.calls + rendering.calls).toBe(0);
    });

    it("should reject IPv4-mapped private literals without fetching", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const orchestrator = build(lightweight);

      const result = await orchestrator.acquire("http://[::ffff:10.0.0.1]/admin");

      expect(result.success).toBe(false);
      expect(result.outcome).toBe("aborted");
      expect(result.error).toBe("Target rejected: address ::ffff:a00:1 is in a private (10.x) range");
      expect(lightweight.calls).toBe(0);
    });

    it("should send rendering-required hosts straight to rendering with their site profile", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const rendering = new FakeFetcher("rendering");
      const orchestrator = build(lightweight, rendering);

      const result = await orchestrator.acquire("https://www.walmart.com/ip/123");

      expect(result.success).toBe(true);
      expect(result.strategyUsed).toBe("rendering");
      expect(lightweight.calls).toBe(0);
      expect(rendering.metas[0]?.readyCondition).toBe('[data-testid="product-title"]');
    });

    it("should fall back to rendering when the lightweight page cannot be parsed", async () => {
      const lightweight = new FakeFetcher("lightweight", [succeed("lightweight", { html: "   " })]);
      const rendering = new FakeFetcher("rendering");
      const orchestrator = build(lightweight, rendering);

      const result = await orchestrator.acquire(PRODUCT_URL, { extractFields: ["title"] });

      expect(result.success).toBe(true);
      expect(result.strategyUsed).toBe("rendering");
      expect(result.attempts).toBe(2);
      expect(result.data?.title).toBe("Oak Dining Table");
    });

    it("should never exceed the retry limit per kind", async () => {
      const lightweight = new FakeFetcher("lightweight", [fail(serverError("lightweight"))]);
      const rendering = new FakeFetcher("rendering", [fail(serverError("rendering"))]);
      const orchestrator = build(lightweight, rendering);

      const result = await orchestrator.acquire(PRODUCT_URL);

      expectExclusive(result);
      expect(lightweight.calls).toBe(2);
      expect(rendering.calls).toBe(2);
      expect(result.attempts).toBe(4);
      expect(result.error).toBe("All strategies failed after 4 attempts: [rendering] Server error 503");
    });

    it("should not fall back from an explicit lightweight strategy", async () => {
      const lightweight = new FakeFetcher("lightweight", [fail(new BlockedResponseError("lightweight", 403))]);
      const rendering = new FakeFetcher("rendering");
      const orchestrator = build(lightweight, rendering);

      const result = await orchestrator.acquire(PRODUCT_URL, { strategy: "lightweight" });

      expect(result.success).toBe(false);
      expect(result.strategyUsed).toBe("lightweight");
      expect(result.error).toBe("All strategies failed after 1 attempt: [lightweight] Blocked with HTTP 403");
      expect(rendering.calls).toBe(0);
    });

    it("should give the same data for the same page", async () => {
      const orchestrator = build();
      const extractFields: FieldName[] = ["title", "description", "images", "price", "specifications"];

      const first = await orchestrator.acquire(PRODUCT_URL, { extractFields });
      const second = await orchestrator.acquire(PRODUCT_URL, { extractFields });

      expect(first.data).toEqual(second.data);
    });

    it("should reject invalid options before fetching", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const orchestrator = build(lightweight);

      const result = await orchestrator.acquire(PRODUCT_URL, { timeoutSeconds: Number.NaN });

      expect(result.success).toBe(false);
      expect(result.outcome).toBe("aborted");
      expect(result.error).toContain("Invalid request options: timeoutSeconds");
      expect(lightweight.calls).toBe(0);
    });

    it("should abort an in-flight request and free its slot", async () => {
      const lightweight = new FakeFetcher("lightweight", [hang("lightweight")]);
      const rendering = new FakeFetcher("rendering");
      const orchestrator = build(lightweight, rendering);
      const abort = new AbortController();
      const states: RequestState[] = [];

      const running = orchestrator.acquire(
        PRODUCT_URL,
        {},
        { signal: abort.signal, onStateChange: (state) => states.push(state) }
      );
      await tick(20);
      expect((await orchestrator.health()).activeAttempts).toBe(1);

      abort.abort(new Error("caller went away"));
      const result = await running;

      expectExclusive(result);
      expect(result.outcome).toBe("aborted");
      expect(result.error).toBe("Request aborted: caller went away");
      expect(states).toEqual(["selecting", "fetching", "aborted"]);
      expect(rendering.calls).toBe(0);

      await tick(0);
      expect((await orchestrator.health()).activeAttempts).toBe(0);
    });

    it("should not start a request whose signal already fired", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const orchestrator = build(lightweight);
      const abort = new AbortController();
      abort.abort();
      const states: RequestState[] = [];

      const result = await orchestrator.acquire(
        PRODUCT_URL,
        {},
        { signal: abort.signal, onStateChange: (state) => states.push(state) }
      );

      expect(result.outcome).toBe("aborted");
      expect(result.error).toBe("Request aborted: cancelled before start");
      expect(states).toEqual(["aborted"]);
      expect(lightweight.calls).toBe(0);
    });

    it("should read rules swapped in after construction", async () => {
      const orchestrator = build();
      orchestrator.ruleStore.swap(
        compileRuleSet({
          version: 2,
          defaults: { title: [{ selector: ".brand" }] },
          pricePatterns: [{ pattern: "(\\d+)", currency: null }],
        })
      );

      const result = await orchestrator.acquire(PRODUCT_URL, { extractFields: ["title", "price"] });

      expect(result.data?.title).toBe("Northwood");
      expect(result.data?.price).toBeNull();
      expect((await orchestrator.health()).rulesVersion).toBe(2);
    });
  });

  describe("acquireMany", () => {
    it("should keep input order and isolate failures", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const orchestrator = build(lightweight);

      const results = await orchestrator.acquireMany([PRODUCT_URL, "not a url", "https://shop.example/p/chair"]);

      expect(results.map((result) => result.url)).toEqual([
        PRODUCT_URL,
        "not a url",
        "https://shop.example/p/chair",
      ]);
      expect(results.map((result) => result.success)).toEqual([true, false, true]);
      expect(results[1]?.error).toBe("Invalid URL: not a url");
      expect(results.map((result) => result.outcome)).toEqual(["completed", "aborted", "completed"]);
      expect(lightweight.calls).toBe(2);
      results.forEach(expectExclusive);

      const summary = summarizeBatch(results, 42);
      expect(summary).toEqual({
        totalUrls: 3,
        successful: 2,
        failed: 1,
        totalDurationMs: 42,
        errors: [{ url: "not a url", error: "Invalid URL: not a url" }],
      });
    });

    it("should reject batches above the size limit", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const orchestrator = build(lightweight);
      const urls = Array.from({ length: 11 }, (_, index) => `https://shop.example/p/${index}`);

      const attempt = orchestrator.acquireMany(urls);

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({
        code: PagegrabErrorCode.BATCH_TOO_LARGE,
        message: "Batch of 11 targets exceeds the limit of 10",
      });
      expect(lightweight.calls).toBe(0);
    });
  });

  describe("normalizeOptions", () => {
    const orchestrator = build();

    it("should clamp the timeout into the configured range", () => {
      expect(orchestrator.normalizeOptions({ timeoutSeconds: 1 }).timeoutMs).toBe(5000);
      expect(orchestrator.normalizeOptions({ timeoutSeconds: 500 }).timeoutMs).toBe(120000);
      expect(orchestrator.normalizeOptions({}).timeoutMs).toBe(30000);
    });

    it("should reject a timeout that is not a number", () => {
      expect(() => orchestrator.normalizeOptions({ timeoutSeconds: Number.NaN })).toThrow(
        "Invalid request options: timeoutSeconds"
      );
    });

    it("should default fields and strategy", () => {
      const options = orchestrator.normalizeOptions({});

      expect(options.strategy).toBe("auto");
      expect([...options.extractFields]).toEqual(["title", "description", "images", "price"]);
      expect(Object.isFrozen(options)).toBe(true);
    });

    it("should fill unset hints from the site profile", () => {
      const target = Target.parse("https://www.cb2.com/oak-table");

      const profiled = orchestrator.normalizeOptions({}, target);
      expect(profiled.readyCondition).toBe(".product-details");
      expect(profiled.attemptOptions.scrollToBottom).toBe(true);
      expect(profiled.attemptOptions.waitForImages).toBe(true);

      const overridden = orchestrator.normalizeOptions(
        { readyCondition: "#pdp", attemptOptions: { scrollToBottom: false } },
        target
      );
      expect(overridden.readyCondition).toBe("#pdp");
      expect(overridden.attemptOptions.scrollToBottom).toBe(false);
    });
  });

  describe("health and close", () => {
    it("should mark a fetcher down when its resources report problems", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const rendering = new FakeFetcher("rendering");
      rendering.health = { healthy: false, issues: ["1 unhealthy instances"] };
      const orchestrator = build(lightweight, rendering);

      const health = await orchestrator.health();

      expect(health.healthy).toBe(true);
      expect(health.fetchers).toEqual({ lightweight: true, rendering: false });
      expect(health.issues).toEqual(["[rendering] 1 unhealthy instances"]);
    });

    it("should report fetchers and stop accepting work once closed", async () => {
      const lightweight = new FakeFetcher("lightweight");
      const rendering = new FakeFetcher("rendering");
      const orchestrator = build(lightweight, rendering);

      expect(await orchestrator.health()).toEqual({
        healthy: true,
        fetchers: { lightweight: true, rendering: true },
        issues: [],
        activeAttempts: 0,
        pendingAttempts: 0,
        rulesVersion: 1,
        closed: false,
      });

      await orchestrator.close();
      await orchestrator.close();

      expect(lightweight.closed).toBe(true);
      expect(rendering.closed).toBe(true);
      expect((await orchestrator.health()).healthy).toBe(false);

      const result = await orchestrator.acquire(PRODUCT_URL);
      expect(result.error).toBe("Orchestrator is closed");
      expect(result.outcome).toBe("aborted");
      expect(lightweight.calls).toBe(0);
    });
  });
});
