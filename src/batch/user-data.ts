// pattern: Imperative Shell
import type { Logger } from "pino";
import { z } from "zod";
import type { BlueskyClient } from "../bluesky/types";
import type { BatchSummary, ConnectFn } from "./types";
import { createCsvAppender, readCsvRows } from "./csv";
import type { CsvColumn } from "./csv";

export const DEFAULT_POST_LIMIT = 15;

const LAST_POSTS_DELIMITER = "|";

const creatorRowShape = {
  creator_did: z.string(),
  feed_display_name: z.string(),
};

export type CreatorRecord = {
  readonly feedName: string;
  readonly creatorDid: string;
  readonly accountName: string | null;
  readonly accountDescription: string | null;
  readonly accountHandle: string | null;
  readonly lastPosts: string;
};

export const CREATOR_COLUMNS: ReadonlyArray<CsvColumn<CreatorRecord>> = [
  { key: "feedName", header: "Feed Name" },
  { key: "creatorDid", header: "Creator DID" },
  { key: "accountName", header: "Account Name" },
  { key: "accountDescription", header: "Account Description" },
  { key: "accountHandle", header: "Account Handle" },
  { key: "lastPosts", header: "Last Posts" },
];

export type UserDataBatchOptions = {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly postLimit?: number;
};

/**
 * Maps each creator DID to the display name of the first feed row that names
 * it. Rows with an empty DID are ignored.
 */
export function groupCreators(
  rows: ReadonlyArray<{ readonly creator_did: string; readonly feed_display_name: string }>,
): Map<string, string> {
  const creators = new Map<string, string>();
  for (const row of rows) {
    if (row.creator_did && !creators.has(row.creator_did)) {
      creators.set(row.creator_did, row.feed_display_name);
    }
  }
  return creators;
}

export async function fetchCreatorRecord(
  client: BlueskyClient,
  creatorDid: string,
  feedName: string,
  postLimit: number,
): Promise<CreatorRecord> {
  const profile = await client.getProfile(creatorDid);
  const texts = await client.listAuthorPostTexts(creatorDid, postLimit);

  return {
    feedName,
    creatorDid,
    accountName: profile.displayName,
    accountDescription: profile.description,
    accountHandle: profile.handle,
    lastPosts: texts.join(LAST_POSTS_DELIMITER),
  };
}

/**
 * Looks up the profile and recent posts of every distinct feed creator in the
 * input CSV, in DID order, appending one record per creator.
 */
export async function runUserDataBatch(
  connect: ConnectFn,
  options: UserDataBatchOptions,
  logger: Logger,
): Promise<BatchSummary> {
  const rows = readCsvRows(options.inputPath, creatorRowShape);
  const creators = groupCreators(rows);
  const creatorDids = [...creators.keys()].sort();
  logger.info({ creatorCount: creatorDids.length }, "unique creators");

  const output = createCsvAppender<CreatorRecord>(options.outputPath, CREATOR_COLUMNS);
  const client = await connect();

  for (const creatorDid of creatorDids) {
    logger.info({ creatorDid }, "extracting user data for creator");
    const record = await fetchCreatorRecord(
      client,
      creatorDid,
      creators.get(creatorDid) ?? "",
      options.postLimit ?? DEFAULT_POST_LIMIT,
    );
    output.append(record);
  }

  logger.info(
    { processed: creatorDids.length, output: output.path },
    "user data batch complete",
  );
  return { processed: creatorDids.length, skipped: rows.length - creatorDids.length };
}
