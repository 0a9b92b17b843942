#!/usr/bin/env node
import "dotenv/config";
import { saveArtifacts, loadArtifacts, statsPath, worksPath } from "./artifacts.js";
import { acquireSession } from "./auth.js";
import { USAGE, parseScrapeArgs } from "./cli.js";
import { loadConfig, type WrappedConfig } from "./config.js";
import { envOrPromptCredentials } from "./credentials.js";
import { describeError } from "./errors.js";
import { HttpClient } from "./http.js";
import { printReport } from "./report.js";
import { constantBackoff, scrapeHistory } from "./scrape.js";
import type { WrappedData } from "./types.js";

async function scrape(config: WrappedConfig, args: string[]): Promise<WrappedData> {
  const { year, listing, delayMs } = parseScrapeArgs(args, { delayMs: config.delayMs });

  const client = new HttpClient({ userAgent: config.userAgent });
  const session = await acquireSession(
    client,
    envOrPromptCredentials({ username: config.username, password: config.password }),
    { baseUrl: config.baseUrl, loginDelayMs: config.loginDelayMs }
  );

  const result = await scrapeHistory(session, {
    baseUrl: config.baseUrl,
    year,
    listing,
    delayMs,
    retry: { maxRetries: config.maxPageRetries, backoffMs: constantBackoff(delayMs) },
  });

  saveArtifacts(config.outputDir, year, result);
  console.log(`Saved ${statsPath(config.outputDir, year)} and ${worksPath(config.outputDir, year)}`);
  return result;
}

async function main() {
  const config = loadConfig();
  const [command, ...rest] = process.argv.slice(2);

  let data: WrappedData;
  if (command === "scrape") {
    data = await scrape(config, rest);
  } else if (command === "stats-only" && rest[0]) {
    data = loadArtifacts(config.outputDir, rest[0]);
  } else {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  console.log();
  printReport(data.stats, data.rows);
}

main().catch((error) => {
  console.error(`Error: ${describeError(error)}`);
  process.exitCode = 1;
});
