import pino from "pino";
import type { Logger } from "pino";

/**
 * Package logger. Only debug-level tracing is emitted by the document model;
 * set LOG_LEVEL=debug to see it.
 */
export const logger: Logger = pino({
  name: "akn-model",
  level: process.env.LOG_LEVEL || "warn",
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
