/**
 * Environment configuration
 *
 * Parsed and validated once at startup. Any invalid value is a
 * ConfigurationError; nothing here is re-checked at request time.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/**
 * Hosts known to need script execution or to serve bot walls to plain requests
 */
export const DEFAULT_RENDERING_REQUIRED_DOMAINS = [
  "cb2.com",
  "walmart.com",
  "wayfair.com",
  "overstock.com",
  "homedepot.com",
  "lowes.com",
  "target.com",
  "bestbuy.com",
  "macys.com",
  "nordstrom.com",
];

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? fallback : Number(value)))
    .pipe(z.number().int());

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? fallback : Number(value)))
    .pipe(z.number().finite());

const listFromEnv = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? undefined
      : value
          .split(",")
          .map((entry) => entry.trim().toLowerCase())
          .filter((entry) => entry.length > 0)
  );

const boolFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? fallback : value.toLowerCase() === "true"));

export const envSchema = z
  .object({
    MAX_CONCURRENT_ATTEMPTS: intFromEnv(5).pipe(z.number().positive("must be greater than 0")),
    HOST_DELAY_MS: intFromEnv(1000).pipe(z.number().min(0, "must not be negative")),
    MAX_RETRIES: intFromEnv(3).pipe(z.number().positive("must be greater than 0")),
    RETRY_DELAY_SECONDS: numberFromEnv(2.0).pipe(z.number().positive("must be greater than 0")),
    DEFAULT_TIMEOUT_SECONDS: numberFromEnv(30).pipe(z.number().positive("must be greater than 0")),
    MIN_TIMEOUT_SECONDS: numberFromEnv(5).pipe(z.number().positive("must be greater than 0")),
    MAX_TIMEOUT_SECONDS: numberFromEnv(120).pipe(z.number().positive("must be greater than 0")),
    MAX_BATCH_SIZE: intFromEnv(10).pipe(z.number().positive("must be greater than 0")),
    ALLOWED_DOMAINS: listFromEnv,
    RENDERING_REQUIRED_DOMAINS: listFromEnv,
    BROWSER_POOL_SIZE: intFromEnv(2).pipe(z.number().positive("must be greater than 0")),
    BROWSER_EXECUTABLE_PATH: z.string().optional(),
    BROWSER_HEADLESS: boolFromEnv(true),
    USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
    EXTRACTION_RULES_PATH: z.string().optional(),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  })
  .refine((env) => env.MIN_TIMEOUT_SECONDS <= env.MAX_TIMEOUT_SECONDS, {
    message: "must not exceed MAX_TIMEOUT_SECONDS",
    path: ["MIN_TIMEOUT_SECONDS"],
  });

/**
 * Orchestrator configuration, in milliseconds where a duration is involved
 */
export interface OrchestratorConfig {
  maxConcurrentAttempts: number;
  hostDelayMs: number;
  maxRetries: number;
  retryDelayMs: number;
  defaultTimeoutMs: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
  maxBatchSize: number;
  /** Host allowlist applied by the target safety check; undefined allows all public hosts */
  allowedDomains?: string[];
  renderingRequiredDomains: string[];
  browser: {
    poolSize: number;
    executablePath?: string;
    headless: boolean;
    userAgent: string;
  };
  extractionRulesPath?: string;
  logLevel: string;
}

export const DEFAULT_CONFIG: OrchestratorConfig = {
  maxConcurrentAttempts: 5,
  hostDelayMs: 1000,
  maxRetries: 3,
  retryDelayMs: 2000,
  defaultTimeoutMs: 30000,
  minTimeoutMs: 5000,
  maxTimeoutMs: 120000,
  maxBatchSize: 10,
  renderingRequiredDomains: DEFAULT_RENDERING_REQUIRED_DOMAINS,
  browser: {
    poolSize: 2,
    headless: true,
    userAgent: DEFAULT_USER_AGENT,
  },
  logLevel: "info",
};

/**
 * Load configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): OrchestratorConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((err) => `${err.path.join(".")}: ${err.message}`)
    );
  }

  const parsed = result.data;

  return {
    maxConcurrentAttempts: parsed.MAX_CONCURRENT_ATTEMPTS,
    hostDelayMs: parsed.HOST_DELAY_MS,
    maxRetries: parsed.MAX_RETRIES,
    retryDelayMs: Math.round(parsed.RETRY_DELAY_SECONDS * 1000),
    defaultTimeoutMs: Math.round(parsed.DEFAULT_TIMEOUT_SECONDS * 1000),
    minTimeoutMs: Math.round(parsed.MIN_TIMEOUT_SECONDS * 1000),
    maxTimeoutMs: Math.round(parsed.MAX_TIMEOUT_SECONDS * 1000),
    maxBatchSize: parsed.MAX_BATCH_SIZE,
    allowedDomains: parsed.ALLOWED_DOMAINS,
    renderingRequiredDomains: parsed.RENDERING_REQUIRED_DOMAINS ?? DEFAULT_RENDERING_REQUIRED_DOMAINS,
    browser: {
      poolSize: parsed.BROWSER_POOL_SIZE,
      executablePath: parsed.BROWSER_EXECUTABLE_PATH,
      headless: parsed.BROWSER_HEADLESS,
      userAgent: parsed.USER_AGENT,
    },
    extractionRulesPath: parsed.EXTRACTION_RULES_PATH,
    logLevel: parsed.LOG_LEVEL,
  };
}

/**
 * Check a programmatically built configuration against the same bounds as loadConfig
 *
 * @throws ConfigurationError
 */
export function assertValidConfig(config: OrchestratorConfig): OrchestratorConfig {
  const issues: string[] = [];
  const positive: Array<[string, number]> = [
    ["maxConcurrentAttempts", config.maxConcurrentAttempts],
    ["maxRetries", config.maxRetries],
    ["retryDelayMs", config.retryDelayMs],
    ["defaultTimeoutMs", config.defaultTimeoutMs],
    ["minTimeoutMs", config.minTimeoutMs],
    ["maxTimeoutMs", config.maxTimeoutMs],
    ["maxBatchSize", config.maxBatchSize],
  ];

  for (const [name, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      issues.push(`${name}: must be greater than 0`);
    }
  }
  if (!Number.isInteger(config.maxConcurrentAttempts) || !Number.isInteger(config.maxRetries)) {
    issues.push("maxConcurrentAttempts/maxRetries: must be integers");
  }
  if (!Number.isFinite(config.hostDelayMs) || config.hostDelayMs < 0) {
    issues.push("hostDelayMs: must not be negative");
  }
  if (config.minTimeoutMs > config.maxTimeoutMs) {
    issues.push("minTimeoutMs: must not exceed maxTimeoutMs");
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return config;
}
