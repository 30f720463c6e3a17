import pino from "pino";

/**
 * Creates the service logger: structured JSON, level labels instead of
 * numbers, ISO 8601 timestamps. `LOG_LEVEL` sets the level unless one is
 * passed in; the default is `info`. Writes to stdout unless a destination is
 * given.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: "program-feed" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
