/**
 * Extraction Pipeline
 *
 * Turns fetched markup into ProductData. Every field walks its ordered rule
 * list (host entry first, defaults otherwise) and the first rule producing
 * content wins. A failure inside one field leaves only that field null.
 */

import { parseHTML } from "linkedom";
import type { FetchedPage } from "../fetchers/types.js";
import { MarkupParseError } from "../fetchers/errors.js";
import { hostMatches, type Target } from "../target.js";
import type { FieldName, Price, ProductData } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { extractMetaTags } from "./metadata.js";
import { parsePrice } from "./price.js";
import type { ExtractionRuleSet, FieldRule, RuleField, RuleSetStore } from "./rules.js";
import { parseSpecifications } from "./specifications.js";

/**
 * Content types the pipeline parses
 */
const HTML_CONTENT_TYPES = ["text/html", "application/xhtml+xml"];

/**
 * URL tokens that mark decorative images
 */
const ICON_TOKENS = new Set([
  "icon",
  "icons",
  "favicon",
  "logo",
  "button",
  "arrow",
  "star",
  "stars",
  "rating",
  "social",
  "badge",
  "banner",
  "ad",
  "ads",
  "placeholder",
  "sprite",
  "spinner",
]);

/**
 * Declared dimensions below this are treated as icons
 */
const MIN_IMAGE_DIMENSION = 50;

/**
 * Empty result with every key present
 */
export function emptyProductData(): ProductData {
  return {
    title: null,
    description: null,
    images: null,
    price: null,
    brand: null,
    model: null,
    specifications: null,
    metaTags: null,
  };
}

function collapse(text: string | null | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Rule list for a field: the first matching host entry's list when it
 * defines the field, else the defaults
 */
export function rulesFor(ruleSet: ExtractionRuleSet, host: string, field: RuleField): readonly FieldRule[] {
  const entry = ruleSet.hosts.find((candidate) => hostMatches(host, candidate.host));
  return entry?.fields[field] ?? ruleSet.defaults[field] ?? [];
}

/**
 * Value a rule reads from one element
 */
function readValue(element: Element, rule: FieldRule): string {
  if (rule.attributes) {
    for (const attribute of rule.attributes) {
      const value = collapse(element.getAttribute(attribute));
      if (value) return value;
    }
    return "";
  }
  if (rule.attribute) {
    return collapse(element.getAttribute(rule.attribute));
  }
  return collapse(element.textContent);
}

function firstText(document: Document, rules: readonly FieldRule[]): string | null {
  for (const rule of rules) {
    const element = document.querySelector(rule.selector);
    if (!element) continue;

    const value = readValue(element, rule);
    if (value && value.length >= (rule.minLength ?? 1)) {
      return value;
    }
  }
  return null;
}

function firstPrice(document: Document, rules: readonly FieldRule[], ruleSet: ExtractionRuleSet): Price | null {
  for (const rule of rules) {
    const element = document.querySelector(rule.selector);
    if (!element) continue;

    const price = parsePrice(readValue(element, rule), ruleSet.pricePatterns);
    if (price) {
      return price;
    }
  }
  return null;
}

function isDecorative(url: URL): boolean {
  const tokens = url.pathname.toLowerCase().split(/[^a-z0-9]+/);
  return tokens.some((token) => ICON_TOKENS.has(token));
}

function declaredTooSmall(element: Element): boolean {
  const width = Number.parseInt(element.getAttribute("width") ?? "", 10);
  const height = Number.parseInt(element.getAttribute("height") ?? "", 10);
  if (Number.isNaN(width) || Number.isNaN(height)) {
    return false;
  }
  return width < MIN_IMAGE_DIMENSION || height < MIN_IMAGE_DIMENSION;
}

function resolveImage(raw: string, baseUrl: string): URL | null {
  try {
    const url = new URL(raw, baseUrl);
    return url.protocol === "http:" || url.protocol === "https:" ? url : null;
  } catch {
    return null;
  }
}

function firstImages(
  document: Document,
  rules: readonly FieldRule[],
  baseUrl: string,
  maxImages: number
): string[] | null {
  for (const rule of rules) {
    const seen = new Set<string>();
    const images: string[] = [];

    for (const element of Array.from(document.querySelectorAll(rule.selector))) {
      const raw = readValue(element, rule);
      if (!raw || declaredTooSmall(element)) continue;

      const url = resolveImage(raw, baseUrl);
      if (!url || isDecorative(url)) continue;

      const href = url.toString();
      if (seen.has(href)) continue;
      seen.add(href);
      images.push(href);
    }

    if (images.length > 0) {
      return images.slice(0, maxImages);
    }
  }
  return null;
}

function firstSpecifications(document: Document, rules: readonly FieldRule[]): Record<string, string> | null {
  for (const rule of rules) {
    const element = document.querySelector(rule.selector);
    if (!element) continue;

    const specs = parseSpecifications(element);
    if (specs) {
      return specs;
    }
  }
  return null;
}

/**
 * Parse markup into a document
 *
 * @throws MarkupParseError when the markup is empty, not HTML, or parses to nothing
 */
export function parseMarkup(page: FetchedPage): Document {
  if (!page.html.trim()) {
    throw new MarkupParseError(page.kind, "empty markup");
  }

  const contentType = page.contentType?.split(";")[0]?.trim().toLowerCase();
  if (contentType && !HTML_CONTENT_TYPES.includes(contentType)) {
    throw new MarkupParseError(page.kind, `content type ${contentType} is not HTML`);
  }

  if (!/<[a-z!][^>]*>/i.test(page.html)) {
    throw new MarkupParseError(page.kind, "no markup tags found");
  }

  const { document } = parseHTML(page.html);
  if (!document.documentElement) {
    throw new MarkupParseError(page.kind, "document has no root element");
  }
  return document;
}

/**
 * Extract requested fields from an already parsed page
 */
export function extractFromDocument(
  document: Document,
  page: FetchedPage,
  target: Target,
  fields: ReadonlySet<FieldName>,
  ruleSet: ExtractionRuleSet,
  logger?: Logger
): ProductData {
  const data = emptyProductData();
  const baseUrl = page.finalUrl || target.url;
  const rules = (field: RuleField) => rulesFor(ruleSet, target.host, field);

  const attempt = <K extends FieldName>(field: K, run: () => ProductData[K]) => {
    if (!fields.has(field)) return;
    try {
      data[field] = run();
    } catch (error: unknown) {
      logger?.debug({ err: error, url: target.url }, `[extraction] ${field} failed, leaving it null`);
    }
  };

  attempt("title", () => firstText(document, rules("title")));
  attempt("description", () => firstText(document, rules("description")));
  attempt("images", () => firstImages(document, rules("images"), baseUrl, ruleSet.maxImages));
  attempt("price", () => firstPrice(document, rules("price"), ruleSet));
  attempt("brand", () => firstText(document, rules("brand")));
  attempt("model", () => firstText(document, rules("model")));
  attempt("specifications", () => firstSpecifications(document, rules("specifications")));
  attempt("metaTags", () => extractMetaTags(document));

  return data;
}

/**
 * Extract requested fields from a fetched page
 *
 * Pure: same page, target, fields and rule set always give the same data.
 *
 * @throws MarkupParseError
 */
export function extractProductData(
  page: FetchedPage,
  target: Target,
  fields: ReadonlySet<FieldName>,
  ruleSet: ExtractionRuleSet,
  logger?: Logger
): ProductData {
  return extractFromDocument(parseMarkup(page), page, target, fields, ruleSet, logger);
}

/**
 * Pipeline bound to a rule store. Callers take one snapshot per request
 * and pass it to every extract call of that request.
 */
export class ExtractionPipeline {
  private store: RuleSetStore;
  private logger?: Logger;

  constructor(store: RuleSetStore, logger?: Logger) {
    this.store = store;
    this.logger = logger;
  }

  snapshot(): ExtractionRuleSet {
    return this.store.current();
  }

  /**
   * Parse only; raises MarkupParseError inside the fetch attempt
   */
  parse(page: FetchedPage): Document {
    return parseMarkup(page);
  }

  extract(
    page: FetchedPage,
    target: Target,
    fields: ReadonlySet<FieldName>,
    ruleSet: ExtractionRuleSet = this.store.current(),
    document?: Document
  ): ProductData {
    if (document) {
      return extractFromDocument(document, page, target, fields, ruleSet, this.logger);
    }
    return extractProductData(page, target, fields, ruleSet, this.logger);
  }
}
