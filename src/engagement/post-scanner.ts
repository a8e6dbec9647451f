import type { Logger } from "pino";
import { z } from "zod";
import type { BlueskyClient, FeedPost } from "../bluesky/types";
import { paginatePages } from "./pager";

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_LOOKBACK_DAYS = 7;
export const DEFAULT_POST_PAGE_SIZE = 50;

export type ScannedPost = {
  readonly uri: string;
  readonly cid: string;
};

export type ScanOptions = {
  readonly days?: number;
  readonly pageSize?: number;
  readonly now?: Date;
};

// Date.parse alone accepts loose forms ("1", "Tuesday 5") and reads
// zone-less times in host-local time.
const isoTimestampSchema = z.string().trim().datetime({ offset: true });

/**
 * Parses an ISO 8601 timestamp carrying `Z` or a UTC offset. Returns null for
 * empty, zone-less or otherwise unparseable input.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = isoTimestampSchema.safeParse(value);
  if (!parsed.success) return null;

  const ms = Date.parse(parsed.data);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * The post's authored time, falling back to when it was indexed. Null when
 * neither can be read.
 */
export function resolvePostTime(post: FeedPost): Date | null {
  return parseTimestamp(post.createdAt) ?? parseTimestamp(post.indexedAt);
}

/**
 * Walks a feed newest-first and returns the posts created within the last
 * `days` days.
 *
 * The scan relies on the feed serving posts in non-increasing time order: the
 * first post older than the cutoff ends it, and nothing after that post (on
 * the same page or later pages) is looked at. Pinned or boosted posts that
 * break the ordering cause silent under-collection. Posts without a readable
 * timestamp are kept and never end the scan. An empty page also ends it.
 */
export async function scanRecentPosts(
  client: BlueskyClient,
  feedUri: string,
  logger: Logger,
  options: ScanOptions = {},
): Promise<Array<ScannedPost>> {
  const days = options.days ?? DEFAULT_LOOKBACK_DAYS;
  const pageSize = options.pageSize ?? DEFAULT_POST_PAGE_SIZE;
  const cutoff = (options.now ?? new Date()).getTime() - days * DAY_MS;

  const posts: Array<ScannedPost> = [];
  const pages = paginatePages(
    (cursor, limit) => client.listFeedPosts(feedUri, cursor, limit),
    pageSize,
  );

  for await (const page of pages) {
    if (page.items.length === 0) break;

    for (const post of page.items) {
      const postTime = resolvePostTime(post);
      if (postTime !== null && postTime.getTime() < cutoff) {
        logger.debug(
          { feedUri, postUri: post.uri, postCount: posts.length },
          "reached post older than cutoff",
        );
        return posts;
      }
      posts.push({ uri: post.uri, cid: post.cid });
    }
  }

  return posts;
}
