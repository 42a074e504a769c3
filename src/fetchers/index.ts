/**
 * Fetchers - public exports
 */

export type { Fetcher, FetcherHealth, FetcherKind, FetcherRegistry, FetchMeta, FetchedPage } from "./types.js";
export { FETCHER_KINDS } from "./types.js";

export {
  FetchError,
  TransientFetchError,
  FetchTimeoutError,
  CategoricalFetchError,
  BlockedResponseError,
  HttpStatusError,
  ChallengeDetectedError,
  InsufficientContentError,
  MarkupParseError,
  FetcherUnavailableError,
  classifyFetchFailure,
} from "./errors.js";

export { detectChallenge, BLOCKING_STATUS_CODES, MIN_CONTENT_LENGTH } from "./detection.js";

export { LightweightFetcher, type LightweightFetcherOptions } from "./lightweight/index.js";
export { RenderingFetcher, type RenderingFetcherOptions } from "./rendering/index.js";
