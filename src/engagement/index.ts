export { paginate, paginatePages, DEFAULT_PAGE_SIZE } from "./pager";
export {
  scanRecentPosts,
  parseTimestamp,
  resolvePostTime,
  DEFAULT_LOOKBACK_DAYS,
  DEFAULT_POST_PAGE_SIZE,
} from "./post-scanner";
export { collectReplyAuthors, fetchReplyAuthors, DEFAULT_REPLY_DEPTH } from "./reply-tree";
export {
  aggregateFeedEngagement,
  toReactedUsersRecord,
  REACTED_USERS_DELIMITER,
} from "./aggregator";
export type { FetchPage } from "./pager";
export type { ScannedPost, ScanOptions } from "./post-scanner";
export type {
  AggregationOptions,
  Feed,
  FeedEngagement,
  ReactedUsersRecord,
} from "./aggregator";
