import { chromium } from "playwright-core";
import type { BrowserLauncher, SessionContextOptions } from "./types.js";

/**
 * Browser launch options
 */
export interface LaunchConfigOptions {
  /** Run without a window (default: true) */
  headless?: boolean;
  /** Chromium binary; playwright-core ships none */
  executablePath?: string;
  /** User agent for every session */
  userAgent?: string;
}

/**
 * Chromium flags for containerized, low-footprint runs
 */
const CHROMIUM_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-accelerated-2d-canvas",
  "--no-first-run",
  "--no-zygote",
  "--disable-gpu",
];

/**
 * Create a launcher for pooled Chromium processes
 */
export function createChromiumLauncher(options: LaunchConfigOptions = {}): BrowserLauncher {
  return () =>
    chromium.launch({
      headless: options.headless ?? true,
      executablePath: options.executablePath,
      args: CHROMIUM_ARGS,
    });
}

/**
 * Options for each per-attempt session
 */
export function createSessionOptions(options: LaunchConfigOptions = {}): SessionContextOptions {
  return {
    userAgent: options.userAgent,
    viewport: { width: 1920, height: 1080 },
    ignoreHTTPSErrors: true,
    javaScriptEnabled: true,
  };
}
