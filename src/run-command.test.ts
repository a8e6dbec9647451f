import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import { runCommand } from "./run-command";
import { createLogger } from "./logger";

function capturingLogger(): { lines: Array<string>; makeLogger: (level?: string) => Logger } {
  const lines: Array<string> = [];
  const makeLogger = (level?: string): Logger => {
    createLogger(level);
    return pino({ level: "info" }, { write: (msg: string) => lines.push(msg) });
  };
  return { lines, makeLogger };
}

describe("runCommand", () => {
  it("should log an unknown log level at fatal and exit with code 1", async () => {
    const { lines, makeLogger } = capturingLogger();
    const exit = vi.fn();
    const fn = vi.fn(async () => {});

    await runCommand("loud", fn, exit, makeLogger);

    expect(fn).not.toHaveBeenCalled();
    expect(exit).toHaveBeenCalledWith(1);
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      expect.objectContaining({
        level: 60,
        msg: "run aborted",
        error: "unknown log level: loud",
        errorType: "ConfigError",
      }),
    ]);
  });

  it("should log an error thrown by the command at fatal and exit with code 1", async () => {
    const { lines, makeLogger } = capturingLogger();
    const exit = vi.fn();

    await runCommand(
      "info",
      async () => {
        throw new Error("getFeed failed");
      },
      exit,
      makeLogger,
    );

    expect(exit).toHaveBeenCalledWith(1);
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      expect.objectContaining({ level: 60, error: "getFeed failed", errorType: "Error" }),
    ]);
  });

  it("should not exit when the command succeeds", async () => {
    const { lines, makeLogger } = capturingLogger();
    const exit = vi.fn();

    await runCommand("info", async (logger) => logger.info("done"), exit, makeLogger);

    expect(exit).not.toHaveBeenCalled();
    expect(lines).toHaveLength(1);
  });
});
