import { parseArgs } from "util";

export const USAGE = `Usage:
  wrapped scrape [listing] [--year YYYY] [--delay MS]
  wrapped stats-only <year>`;

export interface ScrapeArgs {
  year: string;
  listing: string;
  delayMs: number;
}

/** `--delay 0` turns the pause between pages off. */
export function parseScrapeArgs(
  args: string[],
  defaults: { delayMs: number; now?: Date }
): ScrapeArgs {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      year: { type: "string", short: "y" },
      delay: { type: "string", short: "d" },
    },
  });

  let delayMs = defaults.delayMs;
  if (values.delay !== undefined) {
    if (!/^\d+$/.test(values.delay)) {
      throw new Error(`--delay expects a whole number of milliseconds, got "${values.delay}"`);
    }
    delayMs = parseInt(values.delay, 10);
  }

  return {
    year: values.year || String((defaults.now ?? new Date()).getFullYear()),
    listing: positionals[0] || "readings",
    delayMs,
  };
}
