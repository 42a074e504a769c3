/**
 * Strategy Selector
 *
 * Turns a requested strategy into the ordered list of fetcher kinds to try.
 * Host classification is an immutable snapshot; reload replaces the whole
 * snapshot rather than editing it.
 */

import type { FetcherKind } from "../fetchers/types.js";
import type { StrategyName } from "../types.js";
import type { Target } from "../target.js";
import { hostMatches } from "../target.js";

/**
 * Defaults applied to requests against a classified host
 */
export interface SiteProfile {
  /** Host suffix the profile applies to */
  domain: string;
  readyCondition?: string;
  scrollToBottom?: boolean;
  waitForImages?: boolean;
}

/**
 * Host classification snapshot
 */
export interface HostClassification {
  /** Hosts that go straight to rendering under 'auto' */
  readonly renderingRequired: readonly string[];
  /** Per-site defaults for rendering attempts */
  readonly profiles: readonly SiteProfile[];
}

/**
 * Site profiles carried over from the per-site tuning of known rendering hosts
 */
export const DEFAULT_SITE_PROFILES: SiteProfile[] = [
  { domain: "cb2.com", readyCondition: ".product-details", scrollToBottom: true, waitForImages: true },
  { domain: "walmart.com", readyCondition: '[data-testid="product-title"]' },
  { domain: "wayfair.com", readyCondition: ".ProductDetailInfoBlock", scrollToBottom: true },
];

/**
 * Build a frozen classification snapshot
 */
export function createClassification(
  renderingRequired: readonly string[],
  profiles: readonly SiteProfile[] = DEFAULT_SITE_PROFILES
): HostClassification {
  return Object.freeze({
    renderingRequired: Object.freeze(renderingRequired.map((domain) => domain.toLowerCase())),
    profiles: Object.freeze(profiles.map((profile) => Object.freeze({ ...profile }))),
  });
}

/**
 * Strategy Selector
 *
 * @example
 * const selector = new StrategySelector(createClassification(["walmart.com"]));
 * selector.select(Target.parse("https://www.walmart.com/ip/1"), "auto"); // ["rendering"]
 */
export class StrategySelector {
  private classification: HostClassification;

  constructor(classification: HostClassification) {
    this.classification = classification;
  }

  /**
   * Ordered fetcher kinds for a request
   */
  select(target: Target, requested: StrategyName): FetcherKind[] {
    switch (requested) {
      case "lightweight":
        return ["lightweight"];
      case "rendering":
        return ["rendering"];
      case "hybrid":
      case "auto":
        return this.requiresRendering(target) ? ["rendering"] : ["lightweight", "rendering"];
    }
  }

  /**
   * Whether the host is classified as rendering-required
   */
  requiresRendering(target: Target): boolean {
    return this.classification.renderingRequired.some((domain) => hostMatches(target.host, domain));
  }

  /**
   * Site profile for a target, if one is configured
   */
  profileFor(target: Target): SiteProfile | undefined {
    return this.classification.profiles.find((profile) => hostMatches(target.host, profile.domain));
  }

  /**
   * Atomically replace the classification snapshot
   */
  swap(classification: HostClassification): void {
    this.classification = classification;
  }

  /**
   * Current snapshot
   */
  snapshot(): HostClassification {
    return this.classification;
  }
}
