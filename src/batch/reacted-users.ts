// pattern: Imperative Shell
import type { Logger } from "pino";
import { z } from "zod";
import type { BatchSummary, ConnectFn } from "./types";
import {
  aggregateFeedEngagement,
  toReactedUsersRecord,
} from "../engagement";
import type { AggregationOptions, ReactedUsersRecord } from "../engagement";
import { createCsvAppender, readCsvRows } from "./csv";
import type { CsvColumn } from "./csv";

export const DEFAULT_REACTED_USERS_OUTPUT = "data/Feed-Reacted Users.csv";

export const feedRowShape = {
  feed_at_uri: z.string(),
  feed_display_name: z.string(),
};

export const REACTED_USERS_COLUMNS: ReadonlyArray<CsvColumn<ReactedUsersRecord>> = [
  { key: "feedUri", header: "Feed At URI" },
  { key: "feedDisplayName", header: "Feed Display Name" },
  { key: "reactedUserCount", header: "Reacted user count" },
  { key: "reactedUsers", header: "Reacted users" },
];

export type ReactedUsersBatchOptions = {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly aggregation: AggregationOptions;
};

/**
 * For each feed row in the input CSV, collects the accounts that engaged with
 * the feed's recent posts and appends one record to the output CSV.
 *
 * The input is validated and the output reset before `connect` is called, so
 * configuration problems surface without any remote call. Records are appended
 * as each feed finishes; an error aborts the run and keeps what was written.
 */
export async function runReactedUsersBatch(
  connect: ConnectFn,
  options: ReactedUsersBatchOptions,
  logger: Logger,
): Promise<BatchSummary> {
  const rows = readCsvRows(options.inputPath, feedRowShape);
  const output = createCsvAppender<ReactedUsersRecord>(options.outputPath, REACTED_USERS_COLUMNS);

  const client = await connect();

  let processed = 0;
  let skipped = 0;

  for (const row of rows) {
    const feed = { uri: row.feed_at_uri, displayName: row.feed_display_name };
    if (!feed.uri) {
      skipped += 1;
      continue;
    }

    logger.info({ feedUri: feed.uri, displayName: feed.displayName }, "selected feed");

    const engagement = await aggregateFeedEngagement(
      client,
      feed.uri,
      logger,
      options.aggregation,
    );
    const record = toReactedUsersRecord(feed, engagement.actors);
    output.append(record);
    processed += 1;

    logger.info(
      {
        feedUri: feed.uri,
        displayName: feed.displayName,
        postCount: engagement.postCount,
        reactedUserCount: record.reactedUserCount,
      },
      "added feed data to csv",
    );
  }

  logger.info(
    { processed, skipped, output: output.path },
    "reacted users batch complete",
  );
  return { processed, skipped };
}
