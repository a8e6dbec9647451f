import { describe, it, expect, vi } from "vitest";
import { paginate, paginatePages } from "./pager";
import type { Page } from "../bluesky/types";

async function collect<T>(source: AsyncIterable<T>): Promise<Array<T>> {
  const items: Array<T> = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

function pagedSource(pages: ReadonlyArray<Page<string>>) {
  let index = 0;
  return vi.fn(async (_cursor: string | undefined, _limit: number) => {
    const page = pages[index];
    index += 1;
    if (!page) throw new Error("fetched past the last page");
    return page;
  });
}

describe("paginate", () => {
  it("should yield the items of every page in order and stop at a missing cursor", async () => {
    const fetchPage = pagedSource([
      { items: ["a", "b"], cursor: "c1" },
      { items: ["c"], cursor: "c2" },
      { items: ["d", "e"] },
    ]);

    const items = await collect(paginate(fetchPage, 2));

    expect(items).toEqual(["a", "b", "c", "d", "e"]);
    expect(fetchPage).toHaveBeenCalledTimes(3);
  });

  it("should pass the previous cursor and the unchanged limit on every request", async () => {
    const fetchPage = pagedSource([
      { items: ["a"], cursor: "first" },
      { items: ["b"], cursor: "second" },
      { items: [] },
    ]);

    await collect(paginate(fetchPage, 25));

    expect(fetchPage.mock.calls).toEqual([
      [undefined, 25],
      ["first", 25],
      ["second", 25],
    ]);
  });

  it("should default the page size to 100", async () => {
    const fetchPage = pagedSource([{ items: ["a"] }]);

    await collect(paginate(fetchPage));

    expect(fetchPage).toHaveBeenCalledWith(undefined, 100);
  });

  it("should treat an empty cursor as the end of the listing", async () => {
    const fetchPage = pagedSource([{ items: ["a"], cursor: "" }]);

    const items = await collect(paginate(fetchPage));

    expect(items).toEqual(["a"]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("should follow a cursor even when its page is empty", async () => {
    const fetchPage = pagedSource([
      { items: [], cursor: "more" },
      { items: ["a"] },
    ]);

    const items = await collect(paginate(fetchPage));

    expect(items).toEqual(["a"]);
  });

  it("should pass duplicates across pages through", async () => {
    const fetchPage = pagedSource([
      { items: ["a", "b"], cursor: "next" },
      { items: ["b", "a"] },
    ]);

    const items = await collect(paginate(fetchPage));

    expect(items).toEqual(["a", "b", "b", "a"]);
  });

  it("should reject with the fetch error and request no further pages", async () => {
    const fetchPage = vi
      .fn<(cursor: string | undefined, limit: number) => Promise<Page<string>>>()
      .mockResolvedValueOnce({ items: ["a"], cursor: "next" })
      .mockRejectedValueOnce(new Error("upstream unavailable"));

    const seen: Array<string> = [];
    const consume = async () => {
      for await (const item of paginate(fetchPage)) {
        seen.push(item);
      }
    };

    await expect(consume()).rejects.toThrow("upstream unavailable");

    expect(seen).toEqual(["a"]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("should stop fetching when the consumer breaks early", async () => {
    const fetchPage = pagedSource([
      { items: ["a", "b"], cursor: "next" },
      { items: ["c"] },
    ]);

    for await (const item of paginate(fetchPage)) {
      if (item === "a") break;
    }

    expect(fetchPage).toHaveBeenCalledTimes(1);
  });
});

describe("paginatePages", () => {
  it("should yield whole pages including empty ones", async () => {
    const fetchPage = pagedSource([
      { items: ["a"], cursor: "next" },
      { items: [] },
    ]);

    const pages = await collect(paginatePages(fetchPage, 10));

    expect(pages).toEqual([{ items: ["a"], cursor: "next" }, { items: [] }]);
  });
});
