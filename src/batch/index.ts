export { runReactedUsersBatch, DEFAULT_REACTED_USERS_OUTPUT } from "./reacted-users";
export {
  runFeedLikesBatch,
  fetchFeedLikers,
  DEFAULT_FEED_LIKES_INPUT,
  DEFAULT_FEED_LIKES_OUTPUT,
} from "./feed-likes";
export { runUserDataBatch, DEFAULT_POST_LIMIT } from "./user-data";
export type { BatchSummary, ConnectFn } from "./types";
export type { ReactedUsersBatchOptions } from "./reacted-users";
export type { FeedLikesBatchOptions } from "./feed-likes";
export type { UserDataBatchOptions } from "./user-data";
