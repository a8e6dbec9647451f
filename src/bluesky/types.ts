/**
 * One page of a cursor-paginated listing. An absent or empty cursor means the
 * listing is exhausted. Cursors are opaque and never compared or parsed.
 */
export type Page<T> = {
  readonly items: ReadonlyArray<T>;
  readonly cursor?: string;
};

export type FeedPost = {
  readonly uri: string;
  readonly cid: string;
  /** `createdAt` of the post record, as authored. */
  readonly createdAt: string | null;
  readonly indexedAt: string | null;
};

export type FeedSubject = {
  readonly uri: string;
  readonly cid: string;
};

export type ActorProfile = {
  readonly handle: string | null;
  readonly displayName: string | null;
  readonly description: string | null;
};

/**
 * Remote operations the batches depend on. The production implementation wraps
 * an authenticated `AtpAgent`; tests use an in-process fake.
 */
export interface BlueskyClient {
  /** Feed pages, assumed newest first. */
  listFeedPosts(
    feedUri: string,
    cursor: string | undefined,
    limit: number,
  ): Promise<Page<FeedPost>>;
  /** DIDs of the accounts that liked a post. */
  listLikers(
    postUri: string,
    cid: string | undefined,
    cursor: string | undefined,
    limit: number,
  ): Promise<Page<string>>;
  /** DIDs of the accounts that reposted a post. */
  listReposters(
    postUri: string,
    cursor: string | undefined,
    limit: number,
  ): Promise<Page<string>>;
  /**
   * The post's thread, nested down to `depth` levels of replies by the server.
   * Returned as-is; the shape is checked node by node while walking it.
   */
  getThread(postUri: string, depth: number): Promise<unknown>;
  getFeedGenerator(feedUri: string): Promise<FeedSubject>;
  getProfile(actor: string): Promise<ActorProfile>;
  /** Texts of the actor's most recent posts, a single page of at most `limit`. */
  listAuthorPostTexts(actor: string, limit: number): Promise<ReadonlyArray<string>>;
}
