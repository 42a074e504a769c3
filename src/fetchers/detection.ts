/**
 * Challenge and block detection on fetched markup
 */

/**
 * Indicators that the page is an interstitial rather than content
 */
const CHALLENGE_PATTERNS = [
  // Cloudflare
  "cf-browser-verification",
  "cf_chl_opt",
  "challenge-platform",
  "cf-spinner",
  "Just a moment",
  "Checking your browser",
  "checking if the site connection is secure",
  "Enable JavaScript and cookies",
  "_cf_chl_tk",
  "Verifying you are human",
  "cf-turnstile",
  "/cdn-cgi/challenge-platform/",

  // Generic bot walls
  "DDoS protection by",
  "are you a robot",
  "complete the security check",
  "px-captcha",
  "Robot or human?",
];

/**
 * Blocked/denied patterns
 */
const BLOCKED_PATTERNS = [
  "Sorry, you have been blocked",
  "Access to this page has been denied",
  "bot detected",
  "suspicious activity",
];

/**
 * Patterns indicating Cloudflare infrastructure
 */
const CLOUDFLARE_INFRA_PATTERNS = ["/cdn-cgi/", "cloudflare", "__cf_bm", "cf-ray"];

/**
 * Statuses the lightweight fetcher treats as an active block
 */
export const BLOCKING_STATUS_CODES: ReadonlySet<number> = new Set([401, 403, 429, 503]);

/**
 * Minimum visible text for a page to count as content
 */
export const MIN_CONTENT_LENGTH = 100;

/**
 * Detect an interstitial in markup
 * @returns Challenge type or null if none detected
 */
export function detectChallenge(html: string): string | null {
  const htmlLower = html.toLowerCase();

  const hasCloudflare = CLOUDFLARE_INFRA_PATTERNS.some((p) => htmlLower.includes(p.toLowerCase()));

  for (const pattern of CHALLENGE_PATTERNS) {
    if (htmlLower.includes(pattern.toLowerCase())) {
      if (hasCloudflare || pattern.includes("cf")) {
        return "cloudflare";
      }
      return "bot-detection";
    }
  }

  for (const pattern of BLOCKED_PATTERNS) {
    if (htmlLower.includes(pattern.toLowerCase())) {
      return `blocked: ${pattern}`;
    }
  }

  return null;
}

/**
 * Extract visible text from HTML (rough extraction)
 */
export function extractText(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
    .replace(/<[^>]+>/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}
