import type { Page } from "../bluesky/types";

export const DEFAULT_PAGE_SIZE = 100;

export type FetchPage<T> = (
  cursor: string | undefined,
  limit: number,
) => Promise<Page<T>>;

/**
 * Yields pages until one arrives without a cursor. Item counts are never used
 * to detect the end; an empty page that still carries a cursor is followed.
 *
 * Fetch errors propagate to the consumer and end the iteration. Breaking out
 * of a `for await` stops further fetches.
 */
export async function* paginatePages<T>(
  fetchPage: FetchPage<T>,
  limit: number = DEFAULT_PAGE_SIZE,
): AsyncGenerator<Page<T>, void, undefined> {
  let cursor: string | undefined;

  for (;;) {
    const page = await fetchPage(cursor, limit);
    yield page;

    if (!page.cursor) {
      return;
    }
    cursor = page.cursor;
  }
}

/**
 * Flattens {@link paginatePages} into the items of every page, in arrival
 * order. Duplicates across pages are passed through.
 */
export async function* paginate<T>(
  fetchPage: FetchPage<T>,
  limit: number = DEFAULT_PAGE_SIZE,
): AsyncGenerator<T, void, undefined> {
  for await (const page of paginatePages(fetchPage, limit)) {
    yield* page.items;
  }
}
