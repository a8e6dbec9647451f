// pattern: Imperative Shell
import type { Logger } from "pino";
import { createLogger } from "./logger";

export type ExitFn = (code: number) => void;

/**
 * Builds the logger for one command and turns any error escaping it into a
 * fatal log line and a non-zero exit. A level the logger rejects is reported
 * through an info-level fallback logger.
 */
export async function runCommand(
  logLevel: string | undefined,
  fn: (logger: Logger) => Promise<void>,
  exit: ExitFn = (code) => process.exit(code),
  makeLogger: (level?: string) => Logger = createLogger,
): Promise<void> {
  let logger: Logger | undefined;
  try {
    logger = makeLogger(logLevel);
    await fn(logger);
  } catch (err) {
    (logger ?? makeLogger("info")).fatal(
      {
        error: err instanceof Error ? err.message : String(err),
        errorType: err instanceof Error ? err.name : typeof err,
      },
      "run aborted",
    );
    exit(1);
  }
}
