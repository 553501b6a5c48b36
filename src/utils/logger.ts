import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

/**
 * Create the root logger. Writes JSON lines to stderr so that CLI output on
 * stdout stays machine-readable.
 */
function createLogger(): Logger {
  const parsed = LogLevel.safeParse(process.env.LOG_LEVEL?.toLowerCase());
  const level = parsed.success ? parsed.data : "info";
  return pino(
    {
      level,
      base: { service: "page-sections" },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export const logger = createLogger();

/** Create a child logger with additional context */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
