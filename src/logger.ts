import pino from "pino";

/**
 * Creates the process-wide pino logger.
 *
 * Output is JSON on stdout with string level labels and ISO timestamps.
 * The level comes from the argument, then `LOG_LEVEL`, then `info`.
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    name: "feedrelay",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
