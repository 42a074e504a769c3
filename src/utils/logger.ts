import { createRequire } from "node:module";
import { pino } from "pino";

const require = createRequire(import.meta.url);

/**
 * Logger type
 */
export type Logger = ReturnType<typeof createLogger>;

/**
 * Check if pino-pretty is available
 */
function hasPinoPretty(): boolean {
  try {
    require.resolve("pino-pretty");
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a logger instance
 *
 * @param name - Logger name
 * @param level - Log level (default: from env or 'info')
 * @returns Pino logger instance
 */
export function createLogger(
  name: string = "pagegrab",
  level: string = process.env.LOG_LEVEL || "info"
) {
  const usePretty =
    process.env.NODE_ENV !== "production" &&
    process.env.NODE_ENV !== "test" &&
    level !== "silent" &&
    hasPinoPretty();

  return pino({
    name,
    level,
    transport: usePretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  });
}
