/**
 * Adaptive Fetch Orchestrator
 *
 * Entry point for single and bulk acquisition. Each request walks
 *   validating → selecting → fetching → extracting → completed
 * with `aborted` reachable while validating (bad target or options) or
 * fetching (safety rejection, cancellation, deadline), and always ends in
 * exactly one AcquisitionResult. Single and bulk calls share one
 * governor, one controller and one per-target pipeline.
 */

import { z } from "zod";
import { assertValidConfig, type OrchestratorConfig } from "./config.js";
import {
  PagegrabError,
  PagegrabErrorCode,
  RequestAbortedError,
  ValidationError,
  wrapError,
} from "./errors.js";
import type { FetcherKind, FetcherRegistry } from "./fetchers/types.js";
import { FETCHER_KINDS } from "./fetchers/types.js";
import { ConcurrencyGovernor } from "./governor/governor.js";
import { FallbackController, backoffBudgetMs } from "./retry/controller.js";
import { StrategySelector, createClassification } from "./strategy/selector.js";
import { Target, dnsResolver, type HostResolver, type TargetPolicy } from "./target.js";
import { ExtractionPipeline } from "./extraction/pipeline.js";
import type { RuleSetStore } from "./extraction/rules.js";
import {
  DEFAULT_FIELDS,
  STRATEGY_NAMES,
  type AcquisitionResult,
  type BatchSummary,
  type FieldName,
  type RequestOptions,
  type RequestOptionsInput,
  type StrategyName,
} from "./types.js";
import { createLogger, type Logger } from "./utils/logger.js";

/**
 * Request lifecycle states
 */
export type RequestState = "validating" | "selecting" | "fetching" | "extracting" | "completed" | "aborted";

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  validating: ["selecting", "aborted"],
  selecting: ["fetching"],
  fetching: ["extracting", "completed", "aborted"],
  extracting: ["completed"],
  completed: [],
  aborted: [],
};

const requestOptionsSchema = z
  .object({
    strategy: z.enum(["auto", "lightweight", "rendering", "hybrid"]).default("auto"),
    timeoutSeconds: z.number().finite().optional(),
    extractFields: z
      .array(z.enum(["title", "description", "images", "price", "brand", "model", "specifications", "metaTags"]))
      .optional(),
    readyCondition: z.string().trim().min(1).optional(),
    attemptOptions: z
      .object({
        scrollToBottom: z.boolean().optional(),
        waitForImages: z.boolean().optional(),
      })
      .passthrough()
      .default({}),
  })
  .strict();

/**
 * Per-call options for acquire/acquireMany
 */
export interface AcquireOptions {
  /** Cancels the request (or every request of a batch) */
  signal?: AbortSignal;
  /** Observe lifecycle transitions */
  onStateChange?: (state: RequestState, url: string) => void;
}

/**
 * Health report
 */
export interface OrchestratorHealth {
  healthy: boolean;
  fetchers: Record<FetcherKind, boolean>;
  /** Problems reported by fetcher resources, prefixed with the kind */
  issues: string[];
  activeAttempts: number;
  pendingAttempts: number;
  rulesVersion: number;
  closed: boolean;
}

/**
 * Collaborators. Only config, fetchers and rules are required; the rest
 * default from config.
 */
export interface OrchestratorDependencies {
  config: OrchestratorConfig;
  fetchers: FetcherRegistry;
  rules: RuleSetStore;
  selector?: StrategySelector;
  governor?: ConcurrencyGovernor;
  resolver?: HostResolver;
  logger?: Logger;
}

function isStrategyName(value: unknown): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

/**
 * Summarize a batch of results
 */
export function summarizeBatch(results: readonly AcquisitionResult[], totalDurationMs: number): BatchSummary {
  const errors: Array<{ url: string; error: string }> = [];
  for (const result of results) {
    if (!result.success) {
      errors.push({ url: result.url, error: result.error ?? "Unknown error" });
    }
  }

  return {
    totalUrls: results.length,
    successful: results.length - errors.length,
    failed: errors.length,
    totalDurationMs,
    errors,
  };
}

/**
 * Tracks one request's lifecycle
 */
class RequestLifecycle {
  private current: RequestState = "validating";

  constructor(
    private readonly url: string,
    private readonly logger: Logger,
    private readonly onStateChange?: (state: RequestState, url: string) => void
  ) {}

  get state(): RequestState {
    return this.current;
  }

  to(next: RequestState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new PagegrabError(
        `Illegal request transition ${this.current} → ${next}`,
        PagegrabErrorCode.UNKNOWN,
        { url: this.url }
      );
    }
    this.logger.debug(`[orchestrator] ${this.url}: ${this.current} → ${next}`);
    this.current = next;
    this.onStateChange?.(next, this.url);
  }
}

/**
 * Adaptive Fetch Orchestrator
 *
 * @example
 * const orchestrator = new Orchestrator({ config, fetchers, rules });
 * const result = await orchestrator.acquire("https://shop.example/p/1", { extractFields: ["title", "price"] });
 * if (result.success) console.log(result.data?.price);
 */
export class Orchestrator {
  private config: OrchestratorConfig;
  private fetchers: FetcherRegistry;
  private selector: StrategySelector;
  private governor: ConcurrencyGovernor;
  private controller: FallbackController;
  private pipeline: ExtractionPipeline;
  private rules: RuleSetStore;
  private policy: TargetPolicy;
  private logger: Logger;
  private closed = false;

  /**
   * @throws ConfigurationError when the configuration is out of bounds
   */
  constructor(deps: OrchestratorDependencies) {
    this.config = assertValidConfig(deps.config);
    this.fetchers = deps.fetchers;
    this.rules = deps.rules;
    this.logger = deps.logger ?? createLogger("orchestrator", deps.config.logLevel);
    this.policy = { allowedDomains: deps.config.allowedDomains };

    this.selector =
      deps.selector ?? new StrategySelector(createClassification(deps.config.renderingRequiredDomains));
    this.governor =
      deps.governor ??
      new ConcurrencyGovernor({
        maxConcurrent: deps.config.maxConcurrentAttempts,
        hostDelayMs: deps.config.hostDelayMs,
        logger: this.logger,
      });
    this.controller = new FallbackController({
      fetchers: deps.fetchers,
      governor: this.governor,
      resolver: deps.resolver ?? dnsResolver,
      policy: this.policy,
      maxRetries: deps.config.maxRetries,
      retryDelayMs: deps.config.retryDelayMs,
      logger: this.logger,
    });
    this.pipeline = new ExtractionPipeline(deps.rules, this.logger);
  }

  /**
   * Validate and normalize request options for a target
   *
   * The timeout is clamped to the configured range; a matching site profile
   * fills in ready condition and attempt hints the caller left unset.
   *
   * @throws ValidationError
   */
  normalizeOptions(input: RequestOptionsInput, target?: Target): RequestOptions {
    const result = requestOptionsSchema.safeParse(input);
    if (!result.success) {
      const issue = result.error.errors[0];
      const field = issue?.path.join(".") || undefined;
      throw new ValidationError(
        `Invalid request options: ${field ? `${field}: ` : ""}${issue?.message ?? "invalid"}`,
        { field, url: target?.originalUrl }
      );
    }

    const parsed = result.data;
    const { minTimeoutMs, maxTimeoutMs, defaultTimeoutMs } = this.config;
    const requestedMs =
      parsed.timeoutSeconds === undefined ? defaultTimeoutMs : Math.round(parsed.timeoutSeconds * 1000);
    const timeoutMs = Math.min(maxTimeoutMs, Math.max(minTimeoutMs, requestedMs));

    const profile = target ? this.selector.profileFor(target) : undefined;
    const attemptOptions = Object.freeze({
      ...parsed.attemptOptions,
      scrollToBottom: parsed.attemptOptions.scrollToBottom ?? profile?.scrollToBottom,
      waitForImages: parsed.attemptOptions.waitForImages ?? profile?.waitForImages,
    });
    const fields: readonly FieldName[] = parsed.extractFields ?? DEFAULT_FIELDS;

    return Object.freeze({
      strategy: parsed.strategy,
      timeoutMs,
      extractFields: new Set<FieldName>(fields),
      readyCondition: parsed.readyCondition ?? profile?.readyCondition,
      attemptOptions,
    });
  }

  /**
   * Acquire one target. Never throws for per-target failures.
   */
  async acquire(
    input: string | Target,
    options: RequestOptionsInput = {},
    acquireOptions: AcquireOptions = {}
  ): Promise<AcquisitionResult> {
    const startTime = Date.now();
    const url = typeof input === "string" ? input : input.originalUrl;
    const requested: StrategyName = isStrategyName(options.strategy) ? options.strategy : "auto";
    const lifecycle = new RequestLifecycle(url, this.logger, acquireOptions.onStateChange);
    const { signal } = acquireOptions;

    const finish = (
      fields: Partial<AcquisitionResult> & Pick<AcquisitionResult, "success" | "outcome">
    ): AcquisitionResult => {
      lifecycle.to(fields.outcome === "aborted" ? "aborted" : "completed");
      return {
        url,
        data: null,
        error: null,
        strategyUsed: requested,
        elapsedMs: Date.now() - startTime,
        timestamp: new Date().toISOString(),
        statusCode: null,
        contentType: null,
        finalUrl: null,
        attempts: 0,
        ...fields,
      };
    };

    if (signal?.aborted) {
      return finish({
        success: false,
        outcome: "aborted",
        error: new RequestAbortedError(url, "cancelled before start").message,
      });
    }

    if (this.closed) {
      return finish({ success: false, outcome: "aborted", error: "Orchestrator is closed" });
    }

    // validating
    let target: Target;
    let normalized: RequestOptions;
    try {
      target = Target.parse(url, this.policy);
      normalized = this.normalizeOptions(options, target);
    } catch (error: unknown) {
      const failure = wrapError(error, url);
      this.logger.warn({ url, code: failure.code }, `[orchestrator] Rejected ${url}: ${failure.message}`);
      return finish({ success: false, outcome: "aborted", error: failure.message });
    }

    // selecting
    lifecycle.to("selecting");
    const kinds = this.selector.select(target, normalized.strategy);

    // fetching
    lifecycle.to("fetching");
    const deadlineMs =
      normalized.timeoutMs * kinds.length * this.config.maxRetries +
      kinds.length * backoffBudgetMs(this.config.maxRetries, this.config.retryDelayMs);
    const requestController = new AbortController();
    const deadline = setTimeout(
      () => requestController.abort(new Error(`deadline of ${deadlineMs}ms exceeded`)),
      deadlineMs
    );
    const onCallerAbort = () => requestController.abort(signal?.reason);
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    // Rules are read once per request
    const ruleSet = this.pipeline.snapshot();

    try {
      const outcome = await this.controller.run(
        { target, kinds, options: normalized, signal: requestController.signal, logger: this.logger },
        (page) => this.pipeline.parse(page)
      );

      if (outcome.status === "aborted" || outcome.status === "rejected") {
        this.logger.warn({ url, code: outcome.error.code }, `[orchestrator] ${outcome.error.message}`);
        return finish({
          success: false,
          outcome: "aborted",
          error: outcome.error.message,
          attempts: outcome.attempts.length,
        });
      }

      if (outcome.status === "failed") {
        this.logger.error(
          { url, code: outcome.error.code, attempts: outcome.attempts.length },
          `[orchestrator] Failed ${url}: ${outcome.error.message}`
        );
        return finish({
          success: false,
          outcome: "completed",
          error: outcome.error.message,
          attempts: outcome.attempts.length,
        });
      }

      // extracting
      lifecycle.to("extracting");
      const { page, value: document } = outcome;
      const data = this.pipeline.extract(page, target, normalized.extractFields, ruleSet, document);

      this.logger.info(
        { url, kind: page.kind, attempts: outcome.attempts.length },
        `[orchestrator] Acquired ${url} with ${page.kind} in ${Date.now() - startTime}ms`
      );

      return finish({
        success: true,
        outcome: "completed",
        data,
        strategyUsed: page.kind,
        statusCode: page.statusCode,
        contentType: page.contentType,
        finalUrl: page.finalUrl,
        attempts: outcome.attempts.length,
      });
    } catch (error: unknown) {
      const failure = wrapError(error, url);
      this.logger.error({ url, err: failure }, `[orchestrator] Unexpected failure for ${url}`);
      return finish({ success: false, outcome: "completed", error: failure.message });
    } finally {
      clearTimeout(deadline);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /**
   * Acquire several targets; results come back in input order
   *
   * @throws ValidationError when the batch exceeds maxBatchSize
   */
  async acquireMany(
    targets: ReadonlyArray<string | Target>,
    options: RequestOptionsInput = {},
    acquireOptions: AcquireOptions = {}
  ): Promise<AcquisitionResult[]> {
    if (targets.length > this.config.maxBatchSize) {
      throw new ValidationError(
        `Batch of ${targets.length} targets exceeds the limit of ${this.config.maxBatchSize}`,
        { field: "targets", code: PagegrabErrorCode.BATCH_TOO_LARGE }
      );
    }

    this.logger.debug(`[orchestrator] Batch of ${targets.length} targets`);
    return Promise.all(targets.map((target) => this.acquire(target, options, acquireOptions)));
  }

  /**
   * Fetcher availability, resource health and governor load
   */
  async health(): Promise<OrchestratorHealth> {
    const fetchers: Record<FetcherKind, boolean> = { lightweight: false, rendering: false };
    const issues: string[] = [];

    for (const kind of FETCHER_KINDS) {
      const fetcher = this.fetchers[kind];
      let available = !this.closed && fetcher.isAvailable();
      if (available && fetcher.healthCheck) {
        const report = await fetcher.healthCheck();
        issues.push(...report.issues.map((issue) => `[${kind}] ${issue}`));
        available = report.healthy;
      }
      fetchers[kind] = available;
    }

    return {
      healthy: !this.closed && FETCHER_KINDS.some((kind) => fetchers[kind]),
      fetchers,
      issues,
      activeAttempts: this.governor.activeCount,
      pendingAttempts: this.governor.pendingCount,
      rulesVersion: this.rules.current().version,
      closed: this.closed,
    };
  }

  /** Host classification in use */
  get strategySelector(): StrategySelector {
    return this.selector;
  }

  /** Rule store in use */
  get ruleStore(): RuleSetStore {
    return this.rules;
  }

  /**
   * Release fetcher resources (rendering sessions). Idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const results = await Promise.allSettled(
      FETCHER_KINDS.map((kind) => this.fetchers[kind].close?.() ?? Promise.resolve())
    );
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.warn({ err: result.reason }, "[orchestrator] Fetcher failed to close");
      }
    }
  }
}
