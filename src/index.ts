/**
 * pagegrab
 *
 * Adaptive fetch orchestrator: picks a lightweight or rendering fetch per
 * request, runs it under concurrency and per-host limits, retries and falls
 * back on failure, and extracts normalized product data from the markup.
 */

// =============================================================================
// Main API exports
// =============================================================================
export { Orchestrator, summarizeBatch } from "./orchestrator.js";
export type {
  AcquireOptions,
  OrchestratorDependencies,
  OrchestratorHealth,
  RequestState,
} from "./orchestrator.js";
export { createOrchestrator } from "./client.js";
export type { CreateOrchestratorOptions } from "./client.js";

// =============================================================================
// Configuration
// =============================================================================
export {
  loadConfig,
  assertValidConfig,
  DEFAULT_CONFIG,
  DEFAULT_RENDERING_REQUIRED_DOMAINS,
  DEFAULT_USER_AGENT,
} from "./config.js";
export type { OrchestratorConfig } from "./config.js";

// =============================================================================
// Type exports
// =============================================================================
export type {
  StrategyName,
  FieldName,
  AttemptOptions,
  RequestOptionsInput,
  RequestOptions,
  Price,
  ProductData,
  FetchAttempt,
  RequestOutcome,
  AcquisitionResult,
  BatchSummary,
} from "./types.js";
export { STRATEGY_NAMES, FIELD_NAMES, DEFAULT_FIELDS } from "./types.js";

// =============================================================================
// Targets, strategy selection, governor, retry
// =============================================================================
export { Target, dnsResolver, assertPublicAddress, assertSafeRedirect, hostMatches } from "./target.js";
export type { HostResolver, TargetPolicy } from "./target.js";
export { StrategySelector, createClassification, DEFAULT_SITE_PROFILES } from "./strategy/selector.js";
export type { HostClassification, SiteProfile } from "./strategy/selector.js";
export { ConcurrencyGovernor } from "./governor/governor.js";
export type { AdmissionToken } from "./governor/governor.js";
export { FallbackController, backoffBudgetMs } from "./retry/controller.js";
export type { FallbackContext, FallbackOutcome, PageHandler } from "./retry/controller.js";

// =============================================================================
// Fetchers and browser pool (for custom wiring)
// =============================================================================
export * from "./fetchers/index.js";
export { SessionPool } from "./browser/pool.js";
export { createChromiumLauncher, createSessionOptions } from "./browser/launch-config.js";
export type {
  ISessionPool,
  PoolConfig,
  PoolStats,
  HealthStatus,
  BrowserLauncher,
  BrowserHandle,
  SessionContext,
  SessionPage,
} from "./browser/types.js";

// =============================================================================
// Extraction
// =============================================================================
export * from "./extraction/index.js";

// =============================================================================
// Error exports
// =============================================================================
export {
  PagegrabError,
  PagegrabErrorCode,
  ConfigurationError,
  ValidationError,
  SafetyRejectionError,
  ExhaustedStrategiesError,
  RequestAbortedError,
  wrapError,
} from "./errors.js";

// =============================================================================
// Logger
// =============================================================================
export { createLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
