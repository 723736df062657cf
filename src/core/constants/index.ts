/**
 * Application constants
 */

// Sharding constants
export const SHARD_CONSTANTS = {
  MANIFEST_FILENAME: "manifest.json",
  SHARD_FILE_PATTERN: /^shard_(\d+)\.json$/,
} as const;

// Execution constants
export const EXECUTION_CONSTANTS = {
  MAX_CONCURRENCY: 8, // hard cap whatever MAX_CONCURRENCY says
  PROGRESS_EVERY: 5,
  MAX_TIMER_MS: 2_147_483_647, // setTimeout fires at once above this
} as const;

// HTTP constants
export const HTTP_CONSTANTS = {
  ACCEPT_HEADER: "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
  ACCEPT_LANGUAGE: "en-CA,en;q=0.9,fr-CA;q=0.8",
  BLOCKED_BACKOFF_MS: 10_000,
  MAX_BACKOFF_MS: 30_000,
} as const;

export const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
] as const;
