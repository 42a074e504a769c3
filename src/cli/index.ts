#!/usr/bin/env node
/**
 * pagegrab CLI
 *
 * Command-line front end for the orchestrator.
 *
 * @example
 * # Acquire one product page
 * npx pagegrab acquire https://shop.example/p/1
 *
 * # Several pages, rendering only, with specifications
 * npx pagegrab acquire https://a.example/p/1 https://b.example/p/2 -s rendering -f title,price,specifications
 *
 * # List strategies
 * npx pagegrab strategies
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import { createOrchestrator } from "../client.js";
import type { Orchestrator } from "../orchestrator.js";
import { summarizeBatch } from "../orchestrator.js";
import { FIELD_NAMES, STRATEGY_NAMES, type FieldName, type RequestOptionsInput, type StrategyName } from "../types.js";

// Version from package.json, two levels up from both src/cli and dist/cli
const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8")));

const STRATEGY_DESCRIPTIONS: Record<StrategyName, string> = {
  auto: "Lightweight first, rendering on block or empty page; rendering only for known script-heavy hosts",
  lightweight: "Single request/response with browser-like headers, no script execution",
  rendering: "Isolated browser session per attempt, waits for the page to be ready",
  hybrid: "Reserved; currently behaves exactly like auto",
};

interface AcquireCliOptions {
  strategy: StrategyName;
  timeout?: number;
  fields?: FieldName[];
  ready?: string;
  scroll?: boolean;
  waitImages?: boolean;
  output?: string;
  verbose?: boolean;
}

function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of seconds.");
  }
  return seconds;
}

function parseFields(value: string): FieldName[] {
  const fields: FieldName[] = [];
  for (const raw of value.split(",")) {
    const name = raw.trim();
    const field = FIELD_NAMES.find((candidate) => candidate === name);
    if (!field) {
      throw new InvalidArgumentError(`Unknown field "${name}". Valid fields: ${FIELD_NAMES.join(", ")}`);
    }
    fields.push(field);
  }
  return fields;
}

const program = new Command();

program
  .name("pagegrab")
  .description("Fetch product pages that resist naive fetching and return normalized product data.")
  .version(pkg.version);

// =============================================================================
// Acquire Command
// =============================================================================

program
  .command("acquire <urls...>")
  .description("Acquire one or more product pages")
  .addOption(
    new Option("-s, --strategy <name>", "Acquisition strategy").choices([...STRATEGY_NAMES]).default("auto")
  )
  .option("-t, --timeout <seconds>", "Per-attempt timeout in seconds (clamped to the configured range)", parseTimeout)
  .option("-f, --fields <fields>", `Fields to extract (comma-separated: ${FIELD_NAMES.join(",")})`, parseFields)
  .option("--ready <selector>", "CSS selector the rendering fetcher waits for")
  .option("--scroll", "Scroll to the bottom before capturing (rendering)")
  .option("--wait-images", "Wait for images to finish loading (rendering)")
  .option("-o, --output <file>", "Output file (stdout if omitted)")
  .option("-v, --verbose", "Enable debug logging")
  .action(async (urls: string[], options: AcquireCliOptions) => {
    if (options.verbose) {
      process.env.LOG_LEVEL = "debug";
    }

    let orchestrator: Orchestrator | undefined;
    let exitCode = 0;

    try {
      orchestrator = createOrchestrator({ registerCleanup: true });

      const requestOptions: RequestOptionsInput = {
        strategy: options.strategy,
        timeoutSeconds: options.timeout,
        extractFields: options.fields,
        readyCondition: options.ready,
        attemptOptions: {
          scrollToBottom: options.scroll,
          waitForImages: options.waitImages,
        },
      };

      if (options.verbose) {
        console.error(`Acquiring ${urls.length} URL(s) with strategy ${options.strategy}...`);
      }

      const startTime = Date.now();
      const results = await orchestrator.acquireMany(urls, requestOptions);
      const summary = summarizeBatch(results, Date.now() - startTime);

      // Always output JSON
      const output = JSON.stringify({ summary, results }, null, 2);

      if (options.output) {
        writeFileSync(options.output, output);
        console.error(`Output written to ${options.output}`);
      } else {
        console.log(output);
      }

      // Summary to stderr
      console.error(`\nSummary:`);
      console.error(`  Total: ${summary.totalUrls}`);
      console.error(`  Successful: ${summary.successful}`);
      console.error(`  Failed: ${summary.failed}`);
      console.error(`  Duration: ${summary.totalDurationMs}ms`);

      // Exit with error code if any URLs failed
      if (summary.failed > 0) {
        exitCode = 1;
      }
    } catch (error: unknown) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      exitCode = 1;
    } finally {
      await orchestrator?.close();
      process.exit(exitCode);
    }
  });

// =============================================================================
// Strategies Command
// =============================================================================

program
  .command("strategies")
  .description("List acquisition strategies")
  .action(() => {
    for (const name of STRATEGY_NAMES) {
      console.log(`${name.padEnd(12)} ${STRATEGY_DESCRIPTIONS[name]}`);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
