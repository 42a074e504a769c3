/**
 * Extraction rule sets
 *
 * Rules are data: a JSON document validated with zod, compiled once
 * (selectors checked, price patterns compiled) and deep-frozen.
 * Reloading swaps the whole snapshot; readers keep the snapshot they took.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseHTML } from "linkedom";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { FieldName } from "../types.js";

/**
 * Bundled rules, resolved from both src/extraction and dist/extraction
 */
export const DEFAULT_RULES_PATH = fileURLToPath(new URL("../../rules/extraction-rules.json", import.meta.url));

/**
 * Fields driven by selector rules. Meta tags are read directly.
 */
export type RuleField = Exclude<FieldName, "metaTags">;

export const RULE_FIELDS: readonly RuleField[] = [
  "title",
  "description",
  "images",
  "price",
  "brand",
  "model",
  "specifications",
];

const fieldRuleSchema = z
  .object({
    selector: z.string().min(1),
    attribute: z.string().min(1).optional(),
    attributes: z.array(z.string().min(1)).min(1).optional(),
    minLength: z.number().int().nonnegative().optional(),
  })
  .strict();

const fieldRulesSchema = z
  .object({
    title: z.array(fieldRuleSchema).optional(),
    description: z.array(fieldRuleSchema).optional(),
    images: z.array(fieldRuleSchema).optional(),
    price: z.array(fieldRuleSchema).optional(),
    brand: z.array(fieldRuleSchema).optional(),
    model: z.array(fieldRuleSchema).optional(),
    specifications: z.array(fieldRuleSchema).optional(),
  })
  .strict();

export const ruleSetSchema = z.object({
  version: z.number().int().positive(),
  maxImages: z.number().int().positive().default(10),
  defaults: fieldRulesSchema,
  hosts: z
    .array(
      z.object({
        host: z
          .string()
          .min(1)
          .transform((host) => host.toLowerCase()),
        fields: fieldRulesSchema,
      })
    )
    .default([]),
  pricePatterns: z
    .array(
      z.object({
        pattern: z.string().min(1),
        currency: z.string().length(3).nullable(),
        decimalSeparator: z.enum([".", ","]).default("."),
      })
    )
    .min(1),
});

export type RuleSetDocument = z.input<typeof ruleSetSchema>;

/**
 * One selector rule
 */
export interface FieldRule {
  selector: string;
  /** Read this attribute instead of the element text */
  attribute?: string;
  /** First non-empty of several attributes (lazy images) */
  attributes?: string[];
  /** Shorter values do not count as content */
  minLength?: number;
}

export type FieldRules = Partial<Record<RuleField, readonly FieldRule[]>>;

export interface HostRules {
  /** Host suffix, matched after stripping www. */
  host: string;
  fields: FieldRules;
}

export interface PricePattern {
  source: string;
  regex: RegExp;
  /** ISO 4217 code, null when the pattern carries no currency */
  currency: string | null;
  decimalSeparator: "." | ",";
}

/**
 * Compiled, frozen rule set
 */
export interface ExtractionRuleSet {
  readonly version: number;
  readonly maxImages: number;
  readonly defaults: Readonly<FieldRules>;
  readonly hosts: readonly HostRules[];
  readonly pricePatterns: readonly PricePattern[];
}

/**
 * Freeze plain objects and arrays recursively. Compiled patterns keep
 * their own state and are left alone.
 */
function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (!Array.isArray(value) && Object.getPrototypeOf(value) !== Object.prototype) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/**
 * Validate and compile a rule document
 *
 * @throws ConfigurationError listing every invalid entry
 */
export function compileRuleSet(document: unknown): ExtractionRuleSet {
  const result = ruleSetSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((err) => `extraction rules ${err.path.join(".")}: ${err.message}`)
    );
  }

  const parsed = result.data;
  const issues: string[] = [];

  // Probe every selector once so a bad rule fails at load, not per request
  const probe = parseHTML("<html><body></body></html>").document;
  const checkSelectors = (rules: FieldRules, where: string) => {
    for (const field of RULE_FIELDS) {
      for (const rule of rules[field] ?? []) {
        try {
          probe.querySelector(rule.selector);
        } catch (error: unknown) {
          const reason = error instanceof Error ? error.message : String(error);
          issues.push(`extraction rules ${where}.${field}: invalid selector "${rule.selector}" (${reason})`);
        }
      }
    }
  };
  checkSelectors(parsed.defaults, "defaults");
  parsed.hosts.forEach((entry, index) => checkSelectors(entry.fields, `hosts.${index}`));

  const pricePatterns: PricePattern[] = [];
  parsed.pricePatterns.forEach((entry, index) => {
    try {
      pricePatterns.push({
        source: entry.pattern,
        regex: new RegExp(entry.pattern),
        currency: entry.currency ? entry.currency.toUpperCase() : null,
        decimalSeparator: entry.decimalSeparator,
      });
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      issues.push(`extraction rules pricePatterns.${index}: ${reason}`);
    }
  });

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return deepFreeze({
    version: parsed.version,
    maxImages: parsed.maxImages,
    defaults: parsed.defaults,
    hosts: parsed.hosts,
    pricePatterns,
  });
}

/**
 * Read and compile a rule file
 *
 * @throws ConfigurationError when the file is missing, not JSON or invalid
 */
export function loadRuleSet(path: string = DEFAULT_RULES_PATH): ExtractionRuleSet {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`extraction rules ${path}: ${reason}`]);
  }
  return compileRuleSet(document);
}

/**
 * Holder for the current rule set snapshot
 */
export class RuleSetStore {
  private ruleSet: ExtractionRuleSet;

  constructor(ruleSet: ExtractionRuleSet) {
    this.ruleSet = ruleSet;
  }

  /** Snapshot in effect right now */
  current(): ExtractionRuleSet {
    return this.ruleSet;
  }

  /** Replace the snapshot in one step */
  swap(next: ExtractionRuleSet): void {
    this.ruleSet = next;
  }

  /**
   * Reload from a file; the old snapshot stays in place when loading fails
   */
  reload(path?: string): ExtractionRuleSet {
    const next = loadRuleSet(path);
    this.swap(next);
    return next;
  }
}
