import { describe, it, expect, vi, beforeEach } from "vitest";
import { PageFetchError } from "./errors.js";
import { HttpClient, type FetchFn } from "./http.js";
import { historyPageUrl, scrapeHistory, type ScrapeState } from "./scrape.js";
import { entryHtml, pageHtml } from "./__fixtures__/history.js";
import type { SessionHandle } from "./auth.js";

const BASE_URL = "https://archive.example.org";

type Reply = string | number | Error;

/** Serves each URL's replies in turn; the last reply repeats. */
function fakeArchive(replies: Record<string, Reply[]>) {
  const requested: string[] = [];
  const fetch: FetchFn = async (url) => {
    requested.push(url);
    const queue = replies[url];
    if (!queue) return new Response("not found", { status: 404 });
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply instanceof Error) throw reply;
    if (typeof reply === "number") return new Response("", { status: reply });
    return new Response(reply ?? "", { status: 200 });
  };
  return { fetch, requested };
}

function session(fetch: FetchFn): SessionHandle {
  return { client: new HttpClient({ userAgent: "test-agent", fetch }), username: "reader" };
}

const page = (n: number) => historyPageUrl(BASE_URL, "reader", "readings", n);

describe("scrapeHistory", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("builds history URLs", () => {
    expect(historyPageUrl(BASE_URL, "reader", "readings", 2)).toBe(
      "https://archive.example.org/users/reader/readings?page=2"
    );
  });

  it("stops after the first page without the target year", async () => {
    const archive = fakeArchive({
      [page(1)]: [pageHtml([entryHtml({ id: 1, lastVisited: "20 Dec 2024" }), entryHtml({ id: 2, lastVisited: "11 Nov 2024" })])],
      [page(2)]: [pageHtml([entryHtml({ id: 3, lastVisited: "02 Feb 2024" }), entryHtml({ id: 4, lastVisited: "30 Dec 2023" })])],
      [page(3)]: [pageHtml([entryHtml({ id: 5, lastVisited: "15 Dec 2023" })])],
      [page(4)]: [pageHtml([entryHtml({ id: 6, lastVisited: "01 Jun 2024" })])],
    });
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await scrapeHistory(session(archive.fetch), {
      baseUrl: BASE_URL,
      year: "2024",
      delayMs: 6000,
      sleep,
    });

    expect(archive.requested).toEqual([page(1), page(2), page(3)]);
    expect(result.pagesFetched).toBe(3);
    expect(result.rows).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[6000], [6000]]);
  });

  it("keeps going past a page whose only in-year entry is malformed", async () => {
    const archive = fakeArchive({
      [page(1)]: [pageHtml([entryHtml({ id: 1, requiredTags: ["Mature"] })])],
      [page(2)]: [pageHtml([entryHtml({ id: 2 })])],
      [page(3)]: [pageHtml([])],
    });

    const result = await scrapeHistory(session(archive.fetch), {
      baseUrl: BASE_URL,
      year: "2024",
      delayMs: 0,
      sleep: async () => {},
    });

    expect(archive.requested).toEqual([page(1), page(2), page(3)]);
    expect(result.rows).toHaveLength(1);
  });

  it("retries the same page after error statuses and thrown errors", async () => {
    const archive = fakeArchive({
      [page(1)]: [503, new TypeError("fetch failed"), pageHtml([entryHtml({ id: 1 })])],
      [page(2)]: [pageHtml([])],
    });
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await scrapeHistory(session(archive.fetch), {
      baseUrl: BASE_URL,
      year: "2024",
      delayMs: 500,
      retry: { maxRetries: 5, backoffMs: (attempt) => attempt * 10 },
      sleep,
    });

    expect(archive.requested).toEqual([page(1), page(1), page(1), page(2)]);
    expect(sleep.mock.calls).toEqual([[10], [20], [500]]);
    expect(result.rows).toHaveLength(1);
  });

  it("does not retry an empty page", async () => {
    const archive = fakeArchive({ [page(1)]: [""] });

    const result = await scrapeHistory(session(archive.fetch), {
      baseUrl: BASE_URL,
      year: "2024",
      delayMs: 0,
      sleep: async () => {},
    });

    expect(archive.requested).toEqual([page(1)]);
    expect(result.pagesFetched).toBe(1);
    expect(result.rows).toHaveLength(0);
  });

  it("gives up once a capped retry policy runs out", async () => {
    const archive = fakeArchive({ [page(1)]: [500] });

    const run = scrapeHistory(session(archive.fetch), {
      baseUrl: BASE_URL,
      year: "2024",
      delayMs: 0,
      retry: { maxRetries: 2, backoffMs: () => 0 },
      sleep: async () => {},
    });

    await expect(run).rejects.toBeInstanceOf(PageFetchError);
    await expect(run).rejects.toThrow("Giving up on page 1 after 3 attempts");
    expect(archive.requested).toHaveLength(3);
  });

  it("walks fetching, parsing, waiting and done in order", async () => {
    const archive = fakeArchive({
      [page(1)]: [pageHtml([entryHtml({ id: 1 })])],
      [page(2)]: [pageHtml([entryHtml({ id: 2, lastVisited: "01 Jan 2023" })])],
    });
    const states: ScrapeState[] = [];

    await scrapeHistory(session(archive.fetch), {
      baseUrl: BASE_URL,
      year: "2024",
      delayMs: 100,
      sleep: async () => {},
      onTransition: (state) => states.push(state),
    });

    expect(states).toEqual([
      { kind: "fetching", page: 1, attempt: 1 },
      { kind: "parsing", page: 1 },
      { kind: "waiting", page: 1, delayMs: 100 },
      { kind: "fetching", page: 2, attempt: 1 },
      { kind: "parsing", page: 2 },
      { kind: "done", pagesFetched: 2 },
    ]);
  });

  it("fetches another listing when asked", async () => {
    const other = historyPageUrl(BASE_URL, "reader", "bookmarks", 1);
    const archive = fakeArchive({ [other]: [pageHtml([])] });

    await scrapeHistory(session(archive.fetch), {
      baseUrl: BASE_URL,
      year: "2024",
      listing: "bookmarks",
      delayMs: 0,
      sleep: async () => {},
    });

    expect(archive.requested).toEqual([other]);
  });
});
