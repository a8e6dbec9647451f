import { Command } from "commander";
import { z } from "zod";
import type { AppConfig } from "./config";
import type { AggregationOptions } from "./engagement";
import { ConfigError } from "./errors";
import {
  DEFAULT_FEED_LIKES_INPUT,
  DEFAULT_FEED_LIKES_OUTPUT,
  DEFAULT_REACTED_USERS_OUTPUT,
} from "./batch";

const commonOptionsSchema = z.object({
  config: z.string().optional(),
  logLevel: z.string().optional(),
});

const reactedUsersOptionsSchema = commonOptionsSchema.extend({
  input: z.string().min(1),
  output: z.string().min(1),
  days: z.coerce.number().int().positive().optional(),
  replyDepth: z.coerce.number().int().nonnegative().optional(),
  includeReposts: z.boolean().optional(),
});

const feedLikesOptionsSchema = commonOptionsSchema.extend({
  input: z.string().min(1),
  output: z.string().min(1),
});

const userDataOptionsSchema = commonOptionsSchema.extend({
  input: z.string().min(1),
  output: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export type ReactedUsersRequest = z.infer<typeof reactedUsersOptionsSchema>;
export type FeedLikesRequest = z.infer<typeof feedLikesOptionsSchema>;
export type UserDataRequest = z.infer<typeof userDataOptionsSchema>;

export type CommandHandlers = {
  readonly reactedUsers: (request: ReactedUsersRequest) => Promise<void>;
  readonly feedLikes: (request: FeedLikesRequest) => Promise<void>;
  readonly userData: (request: UserDataRequest) => Promise<void>;
};

function parseOptions<T>(
  command: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: unknown,
): T {
  const result = schema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `--${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid options for ${command}: ${issues}`);
  }
  return result.data;
}

/**
 * Flags given on the command line win over the config file.
 */
export function resolveAggregationOptions(
  config: AppConfig,
  request: ReactedUsersRequest,
): AggregationOptions {
  return {
    days: request.days ?? config.scan.days,
    replyDepth: request.replyDepth ?? config.scan.replyDepth,
    includeReposts: request.includeReposts ?? config.scan.includeReposts,
    postPageSize: config.scan.postPageSize,
    engagementPageSize: config.scan.engagementPageSize,
  };
}

export function createProgram(handlers: CommandHandlers): Command {
  const program = new Command();

  program
    .name("feed-engagement")
    .description("Collect the accounts engaging with Bluesky feeds")
    .version("0.1.0");

  program
    .command("reacted-users")
    .description("Accounts that liked, replied to or reposted recent posts of each feed")
    .requiredOption("--input <path>", "Input CSV with feed_at_uri and feed_display_name columns")
    .option("--output <path>", "Output CSV path", DEFAULT_REACTED_USERS_OUTPUT)
    .option("--days <n>", "Look back N days for posts")
    .option("--reply-depth <n>", "Reply thread depth to scan")
    .option("--include-reposts", "Include accounts that reposted posts")
    .option("--config <path>", "YAML file with scan settings")
    .option("--log-level <level>", "Log level (trace, debug, info, warn, error)")
    .action(async (options: unknown) => {
      await handlers.reactedUsers(
        parseOptions("reacted-users", reactedUsersOptionsSchema, options),
      );
    });

  program
    .command("feed-likes")
    .description("Accounts that liked each feed generator")
    .option("--input <path>", "Input CSV with feed_at_uri and feed_display_name columns", DEFAULT_FEED_LIKES_INPUT)
    .option("--output <path>", "Output CSV path", DEFAULT_FEED_LIKES_OUTPUT)
    .option("--config <path>", "YAML file with scan settings")
    .option("--log-level <level>", "Log level (trace, debug, info, warn, error)")
    .action(async (options: unknown) => {
      await handlers.feedLikes(
        parseOptions("feed-likes", feedLikesOptionsSchema, options),
      );
    });

  program
    .command("user-data")
    .description("Profile and recent posts of each feed creator")
    .requiredOption("--input <path>", "Input CSV with creator_did and feed_display_name columns")
    .requiredOption("--output <path>", "Output CSV path")
    .option("--limit <n>", "Number of recent posts to fetch per creator")
    .option("--config <path>", "YAML file with scan settings")
    .option("--log-level <level>", "Log level (trace, debug, info, warn, error)")
    .action(async (options: unknown) => {
      await handlers.userData(parseOptions("user-data", userDataOptionsSchema, options));
    });

  return program;
}
