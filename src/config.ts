export interface WrappedConfig {
  baseUrl: string;
  userAgent: string;
  delayMs: number;
  loginDelayMs: number;
  /** Unset means keep retrying a failing page forever. */
  maxPageRetries: number;
  outputDir: string;
  username?: string;
  password?: string;
}

function intOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WrappedConfig {
  return {
    baseUrl: (env.ARCHIVE_BASE_URL || "https://archiveofourown.org").replace(/\/+$/, ""),
    userAgent: env.USER_AGENT || "Wrapped/1.0.0",
    delayMs: intOr(env.SCRAPE_DELAY_MS, 6000),
    loginDelayMs: intOr(env.LOGIN_DELAY_MS, 2000),
    maxPageRetries: intOr(env.MAX_PAGE_RETRIES, Infinity),
    outputDir: env.OUTPUT_DIR || ".",
    username: env.AO3_USERNAME || undefined,
    password: env.AO3_PASSWORD || undefined,
  };
}
