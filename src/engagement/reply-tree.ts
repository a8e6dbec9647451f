import { z } from "zod";
import type { BlueskyClient } from "../bluesky/types";

export const DEFAULT_REPLY_DEPTH = 6;

// Fields that fail to parse are dropped rather than failing the node, so a
// reply without a readable author still has its own replies walked.
const threadNodeSchema = z.object({
  post: z
    .object({ author: z.object({ did: z.string().min(1) }) })
    .optional()
    .catch(undefined),
  replies: z.array(z.unknown()).optional().catch(undefined),
});

// Spreading a wide reply list into push() overflows the argument limit.
function pushAll(stack: Array<unknown>, replies: ReadonlyArray<unknown> | undefined): void {
  if (!replies) return;
  for (const reply of replies) {
    stack.push(reply);
  }
}

/**
 * Collects the author DIDs of every reply below the root of a thread. The
 * root post's own author is not included unless they also replied.
 *
 * Walks with an explicit stack rather than recursion.
 * Nodes that are not objects, and blocked or missing posts, contribute no
 * author. The thread is assumed to be a finite tree.
 */
export function collectReplyAuthors(thread: unknown): Set<string> {
  const authors = new Set<string>();

  const root = threadNodeSchema.safeParse(thread);
  if (!root.success) return authors;

  const stack: Array<unknown> = [];
  pushAll(stack, root.data.replies);

  while (stack.length > 0) {
    const parsed = threadNodeSchema.safeParse(stack.pop());
    if (!parsed.success) continue;

    if (parsed.data.post) {
      authors.add(parsed.data.post.author.did);
    }
    pushAll(stack, parsed.data.replies);
  }

  return authors;
}

/**
 * Fetches a post's thread once, nested to `depth` levels by the server, and
 * returns the DIDs of everyone who replied within it.
 */
export async function fetchReplyAuthors(
  client: BlueskyClient,
  postUri: string,
  depth: number = DEFAULT_REPLY_DEPTH,
): Promise<Set<string>> {
  const thread = await client.getThread(postUri, depth);
  return collectReplyAuthors(thread);
}
