// pattern: Imperative Shell
import type { Logger } from "pino";
import type { BlueskyClient } from "../bluesky/types";
import type { BatchSummary, ConnectFn } from "./types";
import { paginate } from "../engagement";
import { ConfigError } from "../errors";
import { createCsvAppender, readCsvRows } from "./csv";
import type { CsvColumn } from "./csv";
import { feedRowShape } from "./reacted-users";

export const DEFAULT_FEED_LIKES_INPUT = "data/feeds.csv";
export const DEFAULT_FEED_LIKES_OUTPUT = "data/Feed-Users Likes.csv";

const AT_URI_PREFIX = "at://";

export type FeedLikesRecord = {
  readonly feedUri: string;
  readonly feedDisplayName: string;
  readonly userLikeCount: number;
  readonly users: string;
};

export const FEED_LIKES_COLUMNS: ReadonlyArray<CsvColumn<FeedLikesRecord>> = [
  { key: "feedUri", header: "Feed At URI" },
  { key: "feedDisplayName", header: "Feed Display Name" },
  { key: "userLikeCount", header: "User like count" },
  { key: "users", header: "Users" },
];

export type FeedLikesBatchOptions = {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly pageSize?: number;
};

export function assertAtUri(feedUri: string): string {
  if (!feedUri.startsWith(AT_URI_PREFIX)) {
    throw new ConfigError(`feed uri must start with '${AT_URI_PREFIX}': ${feedUri}`);
  }
  return feedUri;
}

/**
 * Lists every account that liked the feed generator record itself. Likes are
 * kept in arrival order, duplicates included.
 */
export async function fetchFeedLikers(
  client: BlueskyClient,
  feedUri: string,
  logger: Logger,
  pageSize?: number,
): Promise<Array<string>> {
  const subject = await client.getFeedGenerator(assertAtUri(feedUri));
  logger.info({ uri: subject.uri, cid: subject.cid }, "resolved feed subject");

  const likers: Array<string> = [];
  const pages = paginate(
    (cursor, limit) => client.listLikers(subject.uri, subject.cid, cursor, limit),
    pageSize,
  );
  for await (const did of pages) {
    likers.push(did);
  }

  logger.debug({ feedUri, likeCount: likers.length }, "fetched feed likes");
  return likers;
}

/**
 * For each feed row, appends the accounts that liked the feed itself (not its
 * posts) to the output CSV.
 */
export async function runFeedLikesBatch(
  connect: ConnectFn,
  options: FeedLikesBatchOptions,
  logger: Logger,
): Promise<BatchSummary> {
  logger.info({ input: options.inputPath }, "reading input csv");
  const rows = readCsvRows(options.inputPath, feedRowShape);
  const output = createCsvAppender<FeedLikesRecord>(options.outputPath, FEED_LIKES_COLUMNS);

  const client = await connect();

  let processed = 0;
  let skipped = 0;

  for (const row of rows) {
    if (!row.feed_at_uri) {
      skipped += 1;
      continue;
    }

    logger.info({ feedUri: row.feed_at_uri }, "fetching likers for feed");
    const likers = await fetchFeedLikers(client, row.feed_at_uri, logger, options.pageSize);

    output.append({
      feedUri: row.feed_at_uri,
      feedDisplayName: row.feed_display_name,
      userLikeCount: likers.length,
      users: likers.join(";"),
    });
    processed += 1;
  }

  logger.info(
    { processed, skipped, output: output.path },
    "feed likes batch complete",
  );
  return { processed, skipped };
}
