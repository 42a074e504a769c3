/**
 * Orchestrator factory
 *
 * Wires the shipped fetchers (got-scraping and a playwright-core session
 * pool), the extraction rules and the shared governor from one
 * configuration, and shuts the browsers down on process exit.
 *
 * @example
 * const orchestrator = createOrchestrator();
 * const result = await orchestrator.acquire("https://shop.example/p/1");
 * await orchestrator.close();
 */

import { createChromiumLauncher, createSessionOptions } from "./browser/launch-config.js";
import { SessionPool } from "./browser/pool.js";
import type { BrowserLauncher } from "./browser/types.js";
import { assertValidConfig, loadConfig, type OrchestratorConfig } from "./config.js";
import { RuleSetStore, loadRuleSet } from "./extraction/rules.js";
import { LightweightFetcher } from "./fetchers/lightweight/index.js";
import { RenderingFetcher } from "./fetchers/rendering/index.js";
import type { FetcherRegistry } from "./fetchers/types.js";
import { Orchestrator } from "./orchestrator.js";
import type { HostResolver } from "./target.js";
import { createLogger } from "./utils/logger.js";

/**
 * Factory options
 */
export interface CreateOrchestratorOptions {
  /** Full configuration; read from the environment when omitted */
  config?: OrchestratorConfig;
  /** Replace one or both fetchers */
  fetchers?: Partial<FetcherRegistry>;
  /** Browser launcher for the rendering pool */
  launcher?: BrowserLauncher;
  /** Address resolver for the pre-attempt safety check */
  resolver?: HostResolver;
  /** Close browsers on SIGINT/SIGTERM/beforeExit (default: false) */
  registerCleanup?: boolean;
}

/**
 * Build an orchestrator with the shipped fetchers
 *
 * @throws ConfigurationError when the environment or rule file is invalid
 */
export function createOrchestrator(options: CreateOrchestratorOptions = {}): Orchestrator {
  const config = options.config ? assertValidConfig(options.config) : loadConfig();
  const logger = createLogger("pagegrab", config.logLevel);
  const rules = new RuleSetStore(loadRuleSet(config.extractionRulesPath));

  const launchOptions = {
    headless: config.browser.headless,
    executablePath: config.browser.executablePath,
    userAgent: config.browser.userAgent,
  };

  const fetchers: FetcherRegistry = {
    lightweight: options.fetchers?.lightweight ?? new LightweightFetcher({ userAgent: config.browser.userAgent }),
    rendering:
      options.fetchers?.rendering ??
      new RenderingFetcher(
        new SessionPool(
          options.launcher ?? createChromiumLauncher(launchOptions),
          { size: config.browser.poolSize },
          createSessionOptions(launchOptions),
          logger.child({ component: "pool" })
        )
      ),
  };

  const orchestrator = new Orchestrator({
    config,
    fetchers,
    rules,
    resolver: options.resolver,
    logger,
  });

  if (options.registerCleanup) {
    registerCleanup(orchestrator);
  }

  return orchestrator;
}

/**
 * Close the orchestrator when the process is asked to stop
 */
function registerCleanup(orchestrator: Orchestrator): void {
  const logger = createLogger("client");
  const cleanup = async () => {
    try {
      await orchestrator.close();
    } catch (error: unknown) {
      logger.warn({ err: error }, "Cleanup failed");
    }
  };

  process.once("beforeExit", () => {
    void cleanup();
  });
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      void cleanup().finally(() => process.exit(0));
    });
  }
}
