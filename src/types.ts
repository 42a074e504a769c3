import type { FetcherKind } from "./fetchers/types.js";

/**
 * Strategy hint accepted on a request.
 * `hybrid` is reserved and currently resolves exactly like `auto`.
 */
export type StrategyName = "auto" | "lightweight" | "rendering" | "hybrid";

export const STRATEGY_NAMES: readonly StrategyName[] = ["auto", "lightweight", "rendering", "hybrid"];

/**
 * Fields the extraction pipeline can produce
 */
export type FieldName =
  | "title"
  | "description"
  | "images"
  | "price"
  | "brand"
  | "model"
  | "specifications"
  | "metaTags";

export const FIELD_NAMES: readonly FieldName[] = [
  "title",
  "description",
  "images",
  "price",
  "brand",
  "model",
  "specifications",
  "metaTags",
];

export const DEFAULT_FIELDS: readonly FieldName[] = ["title", "description", "images", "price"];

/**
 * Per-attempt hints for the rendering fetcher
 */
export interface AttemptOptions {
  /** Scroll to the bottom before capturing markup (lazy content) */
  scrollToBottom?: boolean;
  /** Wait until every <img> reports complete */
  waitForImages?: boolean;
  [key: string]: unknown;
}

/**
 * Request options as a caller supplies them
 */
export interface RequestOptionsInput {
  /** Strategy hint (default: 'auto') */
  strategy?: StrategyName;
  /** Per-attempt timeout in seconds, clamped to the configured range (default: 30) */
  timeoutSeconds?: number;
  /** Fields to extract (default: title, description, images, price) */
  extractFields?: FieldName[];
  /** CSS selector the rendering fetcher must observe before capturing */
  readyCondition?: string;
  /** Free-form per-attempt hints */
  attemptOptions?: AttemptOptions;
}

/**
 * Validated, normalized, read-only request options
 */
export interface RequestOptions {
  readonly strategy: StrategyName;
  readonly timeoutMs: number;
  readonly extractFields: ReadonlySet<FieldName>;
  readonly readyCondition?: string;
  readonly attemptOptions: Readonly<AttemptOptions>;
}

/**
 * Normalized price
 */
export interface Price {
  /** Decimal string, '.' as decimal point, no thousands separators */
  amount: string;
  /** ISO 4217 code, null when the text carries no recognizable currency */
  currency: string | null;
}

/**
 * Normalized product data. Every key is always present.
 */
export interface ProductData {
  title: string | null;
  description: string | null;
  images: string[] | null;
  price: Price | null;
  brand: string | null;
  model: string | null;
  specifications: Record<string, string> | null;
  metaTags: Record<string, string> | null;
}

/**
 * One execution of one fetcher kind against one target
 */
export interface FetchAttempt {
  kind: FetcherKind;
  /** 1-based attempt number within its kind */
  attempt: number;
  startedAt: number;
  endedAt: number;
  outcome: "success" | "failure";
  /** Length of the markup on success */
  markupLength?: number;
  /** Failure reason on failure */
  error?: string;
}

/**
 * Terminal state a request reached
 */
export type RequestOutcome = "completed" | "aborted";

/**
 * Result of acquiring one target
 */
export interface AcquisitionResult {
  /** URL as the caller supplied it */
  url: string;
  success: boolean;
  /** Extracted data, null when no page was acquired */
  data: ProductData | null;
  /** Set iff success is false */
  error: string | null;
  /** Fetcher kind that produced the page, or the requested strategy when none did */
  strategyUsed: FetcherKind | StrategyName;
  elapsedMs: number;
  timestamp: string;
  statusCode: number | null;
  contentType: string | null;
  finalUrl: string | null;
  outcome: RequestOutcome;
  /** Number of fetch attempts made */
  attempts: number;
}

/**
 * Summary of a batch of results
 */
export interface BatchSummary {
  totalUrls: number;
  successful: number;
  failed: number;
  totalDurationMs: number;
  errors: Array<{ url: string; error: string }>;
}
