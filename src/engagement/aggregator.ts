// pattern: Imperative Shell
import type { Logger } from "pino";
import type { BlueskyClient } from "../bluesky/types";
import { DEFAULT_PAGE_SIZE, paginate } from "./pager";
import {
  DEFAULT_LOOKBACK_DAYS,
  DEFAULT_POST_PAGE_SIZE,
  scanRecentPosts,
} from "./post-scanner";
import { DEFAULT_REPLY_DEPTH, fetchReplyAuthors } from "./reply-tree";

export const REACTED_USERS_DELIMITER = ";";

export type AggregationOptions = {
  readonly days?: number;
  readonly replyDepth?: number;
  readonly includeReposts?: boolean;
  readonly postPageSize?: number;
  readonly engagementPageSize?: number;
  readonly now?: Date;
};

export type FeedEngagement = {
  readonly feedUri: string;
  readonly postCount: number;
  readonly actors: ReadonlySet<string>;
};

export type Feed = {
  readonly uri: string;
  readonly displayName: string;
};

export type ReactedUsersRecord = {
  readonly feedUri: string;
  readonly feedDisplayName: string;
  readonly reactedUserCount: number;
  readonly reactedUsers: string;
};

/**
 * Builds the set of accounts that liked, replied to or (optionally) reposted
 * any post the feed served within the lookback window.
 *
 * Posts and pages are processed one at a time. A failing remote call aborts the
 * whole feed; there is no per-post isolation.
 */
export async function aggregateFeedEngagement(
  client: BlueskyClient,
  feedUri: string,
  logger: Logger,
  options: AggregationOptions = {},
): Promise<FeedEngagement> {
  const pageSize = options.engagementPageSize ?? DEFAULT_PAGE_SIZE;
  const replyDepth = options.replyDepth ?? DEFAULT_REPLY_DEPTH;

  const posts = await scanRecentPosts(client, feedUri, logger, {
    days: options.days ?? DEFAULT_LOOKBACK_DAYS,
    pageSize: options.postPageSize ?? DEFAULT_POST_PAGE_SIZE,
    now: options.now,
  });
  logger.info({ feedUri, postCount: posts.length }, "feed posts in window");

  const actors = new Set<string>();

  for (const post of posts) {
    const likers = paginate(
      (cursor, limit) =>
        client.listLikers(post.uri, post.cid || undefined, cursor, limit),
      pageSize,
    );
    for await (const did of likers) {
      actors.add(did);
    }
    logger.info({ postUri: post.uri }, "extracted liked users for post");

    if (options.includeReposts) {
      const reposters = paginate(
        (cursor, limit) => client.listReposters(post.uri, cursor, limit),
        pageSize,
      );
      for await (const did of reposters) {
        actors.add(did);
      }
      logger.info({ postUri: post.uri }, "extracted reposted users for post");
    }

    for (const did of await fetchReplyAuthors(client, post.uri, replyDepth)) {
      actors.add(did);
    }
    logger.info({ postUri: post.uri }, "extracted replied users for post");
  }

  return { feedUri, postCount: posts.length, actors };
}

/**
 * Renders a feed's engagement set as an output record. Members are sorted so
 * the same set always renders the same way.
 */
export function toReactedUsersRecord(
  feed: Feed,
  actors: ReadonlySet<string>,
): ReactedUsersRecord {
  const sorted = [...actors].sort();
  return {
    feedUri: feed.uri,
    feedDisplayName: feed.displayName,
    reactedUserCount: sorted.length,
    reactedUsers: sorted.join(REACTED_USERS_DELIMITER),
  };
}
