import { describe, it, expect, vi } from "vitest";
import { createBlueskyClient } from "./client";
import type { BlueskyXrpc } from "./client";

const author = { did: "did:plc:author", handle: "author.example.com" };

function createStubXrpc() {
  return {
    feed: {
      getFeed: vi.fn(),
      getLikes: vi.fn(),
      getRepostedBy: vi.fn(),
      getPostThread: vi.fn(),
      getFeedGenerator: vi.fn(),
      getAuthorFeed: vi.fn(),
    },
    actor: {
      getProfile: vi.fn(),
    },
  };
}

function respond<T>(data: T) {
  return { success: true, headers: {}, data };
}

describe("createBlueskyClient", () => {
  it("should map feed items to posts with their authored and indexed times", async () => {
    const xrpc = createStubXrpc();
    xrpc.feed.getFeed.mockResolvedValue(
      respond({
        cursor: "next-page",
        feed: [
          {
            post: {
              uri: "at://did:plc:author/app.bsky.feed.post/1",
              cid: "cid-1",
              author,
              record: { $type: "app.bsky.feed.post", text: "hi", createdAt: "2026-03-09T10:00:00.000Z" },
              indexedAt: "2026-03-09T10:00:01.000Z",
            },
          },
          {
            post: {
              uri: "at://did:plc:author/app.bsky.feed.post/2",
              cid: "cid-2",
              author,
              record: { $type: "app.bsky.feed.post", text: "no date" },
              indexedAt: "2026-03-08T00:00:00.000Z",
            },
          },
        ],
      }),
    );
    const stub: BlueskyXrpc = xrpc;
    const client = createBlueskyClient(stub);

    const page = await client.listFeedPosts("at://feed", "cursor-1", 50);

    expect(xrpc.feed.getFeed).toHaveBeenCalledWith({
      feed: "at://feed",
      limit: 50,
      cursor: "cursor-1",
    });
    expect(page).toEqual({
      cursor: "next-page",
      items: [
        {
          uri: "at://did:plc:author/app.bsky.feed.post/1",
          cid: "cid-1",
          createdAt: "2026-03-09T10:00:00.000Z",
          indexedAt: "2026-03-09T10:00:01.000Z",
        },
        {
          uri: "at://did:plc:author/app.bsky.feed.post/2",
          cid: "cid-2",
          createdAt: null,
          indexedAt: "2026-03-08T00:00:00.000Z",
        },
      ],
    });
  });

  it("should return liker and reposter DIDs with the next cursor", async () => {
    const xrpc = createStubXrpc();
    xrpc.feed.getLikes.mockResolvedValue(
      respond({
        uri: "at://post",
        cursor: "more",
        likes: [
          { actor: { did: "did:plc:a", handle: "a.test" }, createdAt: "x", indexedAt: "x" },
          { actor: { did: "did:plc:b", handle: "b.test" }, createdAt: "x", indexedAt: "x" },
        ],
      }),
    );
    xrpc.feed.getRepostedBy.mockResolvedValue(
      respond({ uri: "at://post", repostedBy: [{ did: "did:plc:c", handle: "c.test" }] }),
    );
    const client = createBlueskyClient(xrpc);

    const likes = await client.listLikers("at://post", "cid", undefined, 100);
    const reposts = await client.listReposters("at://post", "r1", 100);

    expect(likes).toEqual({ items: ["did:plc:a", "did:plc:b"], cursor: "more" });
    expect(reposts).toEqual({ items: ["did:plc:c"], cursor: undefined });
    expect(xrpc.feed.getLikes).toHaveBeenCalledWith({
      uri: "at://post",
      cid: "cid",
      limit: 100,
      cursor: undefined,
    });
    expect(xrpc.feed.getRepostedBy).toHaveBeenCalledWith({
      uri: "at://post",
      limit: 100,
      cursor: "r1",
    });
  });

  it("should return the raw thread at the requested depth", async () => {
    const xrpc = createStubXrpc();
    const thread = { $type: "app.bsky.feed.defs#threadViewPost", post: { author }, replies: [] };
    xrpc.feed.getPostThread.mockResolvedValue(respond({ thread }));
    const client = createBlueskyClient(xrpc);

    await expect(client.getThread("at://post", 6)).resolves.toBe(thread);
    expect(xrpc.feed.getPostThread).toHaveBeenCalledWith({ uri: "at://post", depth: 6 });
  });

  it("should resolve feed generators, profiles and author post texts", async () => {
    const xrpc = createStubXrpc();
    xrpc.feed.getFeedGenerator.mockResolvedValue(
      respond({ view: { uri: "at://gen", cid: "gen-cid" }, isOnline: true, isValid: true }),
    );
    xrpc.actor.getProfile.mockResolvedValue(
      respond({ did: "did:plc:a", handle: "a.test", displayName: "A" }),
    );
    xrpc.feed.getAuthorFeed.mockResolvedValue(
      respond({
        feed: [
          { post: { record: { text: "first" } } },
          { post: { record: { embed: {} } } },
        ],
      }),
    );
    const client = createBlueskyClient(xrpc);

    expect(await client.getFeedGenerator("at://gen")).toEqual({ uri: "at://gen", cid: "gen-cid" });
    expect(await client.getProfile("did:plc:a")).toEqual({
      handle: "a.test",
      displayName: "A",
      description: null,
    });
    expect(await client.listAuthorPostTexts("did:plc:a", 15)).toEqual(["first", ""]);
    expect(xrpc.feed.getAuthorFeed).toHaveBeenCalledWith({ actor: "did:plc:a", limit: 15 });
  });

  it("should let transport errors propagate", async () => {
    const xrpc = createStubXrpc();
    xrpc.feed.getLikes.mockRejectedValue(new Error("ExpiredToken"));
    const client = createBlueskyClient(xrpc);

    await expect(client.listLikers("at://post", undefined, undefined, 100)).rejects.toThrow(
      "ExpiredToken",
    );
  });
});
