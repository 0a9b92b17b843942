import { describeError, PageFetchError } from "./errors.js";
import { extractPage, pageHasYear } from "./history.js";
import { sleep } from "./http.js";
import { StatsAggregator } from "./stats.js";
import type { SessionHandle } from "./auth.js";
import type { ScrapeResult } from "./types.js";

export interface RetryPolicy {
  /** Retries per page after the first attempt; Infinity never gives up. */
  maxRetries: number;
  backoffMs: (attempt: number) => number;
}

export type ScrapeState =
  | { kind: "fetching"; page: number; attempt: number }
  | { kind: "parsing"; page: number }
  | { kind: "waiting"; page: number; delayMs: number }
  | { kind: "done"; pagesFetched: number };

export interface ScrapeOptions {
  baseUrl: string;
  year: string;
  listing?: string;
  delayMs: number;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  onTransition?: (state: ScrapeState) => void;
}

export function constantBackoff(ms: number): RetryPolicy["backoffMs"] {
  return () => ms;
}

export function historyPageUrl(
  baseUrl: string,
  username: string,
  listing: string,
  page: number
): string {
  return `${baseUrl}/users/${encodeURIComponent(username)}/${listing}?page=${page}`;
}

/**
 * Walks the history newest-first and stops at the first page without a single
 * visit in the target year. A listing that isn't ordered by last visit would
 * end the walk early and under-count.
 */
export async function scrapeHistory(
  session: SessionHandle,
  options: ScrapeOptions
): Promise<ScrapeResult> {
  const listing = options.listing ?? "readings";
  const wait = options.sleep ?? sleep;
  const retry: RetryPolicy = options.retry ?? {
    maxRetries: Infinity,
    backoffMs: constantBackoff(options.delayMs),
  };
  const emit = options.onTransition ?? (() => {});
  const aggregator = new StatsAggregator();

  let state: ScrapeState = { kind: "fetching", page: 1, attempt: 1 };
  let html = "";

  for (;;) {
    emit(state);

    switch (state.kind) {
      case "fetching": {
        const { page, attempt }: { page: number; attempt: number } = state;
        const url = historyPageUrl(options.baseUrl, session.username, listing, page);
        console.log(`Fetching page ${page}...`);
        try {
          html = await session.client.getText(url);
          state = { kind: "parsing", page };
        } catch (error) {
          console.error(`Failed to fetch page ${page}: ${describeError(error)}`);
          if (attempt > retry.maxRetries) {
            throw new PageFetchError(page, attempt, error);
          }
          await wait(retry.backoffMs(attempt));
          state = { kind: "fetching", page, attempt: attempt + 1 };
        }
        break;
      }

      case "parsing": {
        console.log("Processing page...");
        const results = extractPage(html, options.year);
        for (const result of results) {
          if (result.kind === "matched") aggregator.absorb(result.record);
        }
        state = pageHasYear(results)
          ? { kind: "waiting", page: state.page, delayMs: options.delayMs }
          : { kind: "done", pagesFetched: state.page };
        break;
      }

      case "waiting": {
        console.log(`Waiting ${state.delayMs} ms...`);
        await wait(state.delayMs);
        state = { kind: "fetching", page: state.page + 1, attempt: 1 };
        break;
      }

      case "done": {
        const { stats, rows } = aggregator.freeze();
        console.log(`Found ${rows.length} works over ${state.pagesFetched} pages`);
        return { stats, rows, pagesFetched: state.pagesFetched };
      }
    }
  }
}
