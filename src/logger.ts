import pino from "pino";
import { ConfigError } from "./errors";

/**
 * Creates the run's pino logger: JSON lines on stdout, string level labels,
 * ISO 8601 timestamps.
 *
 * The level comes from the argument (the `--log-level` option), then
 * `LOG_LEVEL`, then `info`, and is matched case-insensitively.
 */
export function createLogger(level?: string): pino.Logger {
  const resolved = (level ?? process.env["LOG_LEVEL"] ?? "info").trim().toLowerCase();
  if (!(resolved in pino.levels.values) && resolved !== "silent") {
    throw new ConfigError(`unknown log level: ${resolved}`);
  }

  return pino({
    name: "feed-engagement",
    level: resolved,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
