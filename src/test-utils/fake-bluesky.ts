import type {
  ActorProfile,
  BlueskyClient,
  FeedPost,
  FeedSubject,
  Page,
} from "../bluesky/types";

export type FakeCall = {
  readonly method: keyof BlueskyClient;
  readonly args: ReadonlyArray<unknown>;
};

/**
 * In-memory data behind a fake client. Feed posts are given page by page;
 * likers and reposters are given as flat lists and paged by the requested
 * limit, with the offset as the cursor.
 */
export type FakeBlueskyData = {
  readonly feedPages?: Readonly<Record<string, ReadonlyArray<ReadonlyArray<FeedPost>>>>;
  readonly likers?: Readonly<Record<string, ReadonlyArray<string>>>;
  readonly reposters?: Readonly<Record<string, ReadonlyArray<string>>>;
  readonly threads?: Readonly<Record<string, unknown>>;
  readonly generators?: Readonly<Record<string, FeedSubject>>;
  readonly profiles?: Readonly<Record<string, ActorProfile>>;
  readonly authorPosts?: Readonly<Record<string, ReadonlyArray<string>>>;
};

export type FakeBluesky = {
  readonly client: BlueskyClient;
  readonly calls: Array<FakeCall>;
};

function pageList<T>(
  items: ReadonlyArray<T>,
  cursor: string | undefined,
  limit: number,
): Page<T> {
  const offset = cursor ? Number(cursor) : 0;
  const end = offset + limit;
  return {
    items: items.slice(offset, end),
    cursor: end < items.length ? String(end) : undefined,
  };
}

function lookup<T>(
  table: Readonly<Record<string, T>> | undefined,
  key: string,
  what: string,
): T {
  const value = table?.[key];
  if (value === undefined) {
    throw new Error(`no ${what} for ${key}`);
  }
  return value;
}

/**
 * Creates an in-process {@link BlueskyClient} over fixed data, recording every
 * call. Unknown keys make the call reject, like a failing remote request.
 */
export function createFakeBluesky(data: FakeBlueskyData): FakeBluesky {
  const calls: Array<FakeCall> = [];

  const client: BlueskyClient = {
    async listFeedPosts(feedUri, cursor, limit) {
      calls.push({ method: "listFeedPosts", args: [feedUri, cursor, limit] });
      const pages = lookup(data.feedPages, feedUri, "feed");
      const index = cursor ? Number(cursor) : 0;
      return {
        items: pages[index] ?? [],
        cursor: index + 1 < pages.length ? String(index + 1) : undefined,
      };
    },

    async listLikers(postUri, cid, cursor, limit) {
      calls.push({ method: "listLikers", args: [postUri, cid, cursor, limit] });
      return pageList(data.likers?.[postUri] ?? [], cursor, limit);
    },

    async listReposters(postUri, cursor, limit) {
      calls.push({ method: "listReposters", args: [postUri, cursor, limit] });
      return pageList(data.reposters?.[postUri] ?? [], cursor, limit);
    },

    async getThread(postUri, depth) {
      calls.push({ method: "getThread", args: [postUri, depth] });
      return data.threads?.[postUri] ?? { post: { uri: postUri }, replies: [] };
    },

    async getFeedGenerator(feedUri) {
      calls.push({ method: "getFeedGenerator", args: [feedUri] });
      return lookup(data.generators, feedUri, "feed generator");
    },

    async getProfile(actor) {
      calls.push({ method: "getProfile", args: [actor] });
      return lookup(data.profiles, actor, "profile");
    },

    async listAuthorPostTexts(actor, limit) {
      calls.push({ method: "listAuthorPostTexts", args: [actor, limit] });
      return (data.authorPosts?.[actor] ?? []).slice(0, limit);
    },
  };

  return { client, calls };
}

/**
 * A feed post created `hoursAgo` hours before `now`.
 */
export function postAt(
  uri: string,
  now: Date,
  hoursAgo: number,
  overrides?: Partial<FeedPost>,
): FeedPost {
  const createdAt = new Date(now.getTime() - hoursAgo * 60 * 60 * 1000).toISOString();
  return { uri, cid: `cid-${uri}`, createdAt, indexedAt: createdAt, ...overrides };
}

/**
 * A thread node whose post was written by `did`.
 */
export function replyNode(did: string, replies: ReadonlyArray<unknown> = []): unknown {
  return { post: { uri: `at://${did}/app.bsky.feed.post/1`, author: { did } }, replies };
}
