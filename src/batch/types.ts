import type { BlueskyClient } from "../bluesky/types";

/**
 * Opens the authenticated session. Batches call it once, after their input
 * has been validated.
 */
export type ConnectFn = () => Promise<BlueskyClient>;

export type BatchSummary = {
  readonly processed: number;
  readonly skipped: number;
};
