#!/usr/bin/env node
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { runCommand } from "./run-command";
import { loadConfig, loadCredentials } from "./config";
import { createSession } from "./bluesky/client";
import { createProgram, resolveAggregationOptions } from "./cli";
import { runFeedLikesBatch, runReactedUsersBatch, runUserDataBatch } from "./batch";

function configPath(flag: string | undefined): string | undefined {
  const path = flag ?? process.env["CONFIG_PATH"];
  return path ? resolve(path) : undefined;
}

async function main(): Promise<void> {
  loadDotenv();

  const program = createProgram({
    reactedUsers: (request) =>
      runCommand(request.logLevel, async (logger) => {
        const config = loadConfig(configPath(request.config));
        const credentials = loadCredentials(process.env);
        const aggregation = resolveAggregationOptions(config, request);
        logger.info({ ...aggregation, input: request.input }, "reacted users batch starting");

        await runReactedUsersBatch(
          () => createSession(credentials, logger),
          { inputPath: request.input, outputPath: request.output, aggregation },
          logger,
        );
      }),

    feedLikes: (request) =>
      runCommand(request.logLevel, async (logger) => {
        const config = loadConfig(configPath(request.config));
        const credentials = loadCredentials(process.env);
        logger.info({ input: request.input }, "feed likes batch starting");

        await runFeedLikesBatch(
          () => createSession(credentials, logger),
          {
            inputPath: request.input,
            outputPath: request.output,
            pageSize: config.scan.engagementPageSize,
          },
          logger,
        );
      }),

    userData: (request) =>
      runCommand(request.logLevel, async (logger) => {
        const config = loadConfig(configPath(request.config));
        const credentials = loadCredentials(process.env);
        logger.info({ input: request.input }, "user data batch starting");

        await runUserDataBatch(
          () => createSession(credentials, logger),
          {
            inputPath: request.input,
            outputPath: request.output,
            postLimit: request.limit ?? config.profiles.postLimit,
          },
          logger,
        );
      }),
  });

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
