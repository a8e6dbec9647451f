// pattern: Imperative Shell
import { AtpAgent } from "@atproto/api";
import type { Logger } from "pino";
import { z } from "zod";
import type { Credentials } from "../config";
import type { BlueskyClient, FeedPost } from "./types";

/**
 * The slice of the XRPC namespace the client calls. `agent.app.bsky` satisfies it.
 */
export type BlueskyXrpc = {
  readonly feed: Pick<
    AtpAgent["app"]["bsky"]["feed"],
    | "getFeed"
    | "getLikes"
    | "getRepostedBy"
    | "getPostThread"
    | "getFeedGenerator"
    | "getAuthorFeed"
  >;
  readonly actor: Pick<AtpAgent["app"]["bsky"]["actor"], "getProfile">;
};

const createdAtSchema = z.object({ createdAt: z.string() });
const textSchema = z.object({ text: z.string() });

function toFeedPost(post: {
  readonly uri: string;
  readonly cid: string;
  readonly record: unknown;
  readonly indexedAt?: string;
}): FeedPost {
  const record = createdAtSchema.safeParse(post.record);
  return {
    uri: post.uri,
    cid: post.cid,
    createdAt: record.success ? record.data.createdAt : null,
    indexedAt: post.indexedAt ?? null,
  };
}

/**
 * Adapts the `app.bsky` XRPC methods to the {@link BlueskyClient} port.
 * Errors from the transport are not caught here.
 */
export function createBlueskyClient(xrpc: BlueskyXrpc): BlueskyClient {
  return {
    async listFeedPosts(feedUri, cursor, limit) {
      const res = await xrpc.feed.getFeed({ feed: feedUri, limit, cursor });
      return {
        items: res.data.feed.map((item) => toFeedPost(item.post)),
        cursor: res.data.cursor,
      };
    },

    async listLikers(postUri, cid, cursor, limit) {
      const res = await xrpc.feed.getLikes({ uri: postUri, cid, limit, cursor });
      return {
        items: res.data.likes.map((like) => like.actor.did),
        cursor: res.data.cursor,
      };
    },

    async listReposters(postUri, cursor, limit) {
      const res = await xrpc.feed.getRepostedBy({ uri: postUri, limit, cursor });
      return {
        items: res.data.repostedBy.map((profile) => profile.did),
        cursor: res.data.cursor,
      };
    },

    async getThread(postUri, depth) {
      const res = await xrpc.feed.getPostThread({ uri: postUri, depth });
      return res.data.thread;
    },

    async getFeedGenerator(feedUri) {
      const res = await xrpc.feed.getFeedGenerator({ feed: feedUri });
      return { uri: res.data.view.uri, cid: res.data.view.cid };
    },

    async getProfile(actor) {
      const res = await xrpc.actor.getProfile({ actor });
      return {
        handle: res.data.handle,
        displayName: res.data.displayName ?? null,
        description: res.data.description ?? null,
      };
    },

    async listAuthorPostTexts(actor, limit) {
      const res = await xrpc.feed.getAuthorFeed({ actor, limit });
      return res.data.feed.map((item) => {
        const record = textSchema.safeParse(item.post.record);
        return record.success ? record.data.text : "";
      });
    },
  };
}

/**
 * Logs in once with an app password. The session is reused for the whole run
 * and never refreshed explicitly.
 */
export async function createSession(
  credentials: Credentials,
  logger: Logger,
): Promise<BlueskyClient> {
  const agent = new AtpAgent({ service: credentials.service });
  await agent.login({
    identifier: credentials.identifier,
    password: credentials.password,
  });
  logger.info(
    { handle: credentials.identifier, service: credentials.service },
    "bluesky session created",
  );
  return createBlueskyClient(agent.app.bsky);
}
