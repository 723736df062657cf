/**
 * Shard runner: scrape every store of one shard and persist the results
 */

import pLimit from "p-limit";
import { performance } from "node:perf_hooks";
import { EXECUTION_CONSTANTS } from "../constants/index";
import { StoreDeadlineExceededError, errorMessage } from "../errors";
import type { StoreScraper } from "../types/config";
import type { ShardResult, ShardRunReport } from "../types/shard";
import type { Store } from "../types/store";
import { formatDuration, nowIso } from "../utils/date";
import { Logger } from "../utils/logger";
import type { ShardCatalog } from "./catalog";
import { persistShardResults } from "./results";

/**
 * Configuration options for running a shard
 */
export interface RunShardOptions<TData extends object> {
  catalog: ShardCatalog;
  scraper: StoreScraper<TData>;
  resultsDir: string;
  /** Stores scraped at the same time (default 1) */
  concurrency?: number;
  /** Per-store deadline, 0 disables it */
  storeTimeoutMs?: number;
  progressEvery?: number;
}

/**
 * Runs the scraper for one store and turns the outcome into a result.
 * Never rejects.
 */
export async function scrapeStoreSafely<TData extends object>(
  scraper: StoreScraper<TData>,
  store: Store,
  timeoutMs = 0,
): Promise<ShardResult<TData>> {
  const startedAt = nowIso();
  const t0 = performance.now();
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline =
    timeoutMs > 0
      ? new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            const err = new StoreDeadlineExceededError(
              store.storeId,
              timeoutMs,
            );
            controller.abort(err);
            reject(err);
          }, Math.min(timeoutMs, EXECUTION_CONSTANTS.MAX_TIMER_MS));
        })
      : null;

  try {
    const work = scraper.scrapeStore(store, { signal: controller.signal });
    const data = await (deadline ? Promise.race([work, deadline]) : work);
    return {
      store,
      success: true,
      data,
      error: null,
      startedAt,
      durationMs: performance.now() - t0,
    };
  } catch (e) {
    return {
      store,
      success: false,
      data: null,
      error: errorMessage(e),
      startedAt,
      durationMs: performance.now() - t0,
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Resolves the shard, scrapes its stores in order and writes the results.
 * Per-store failures are recorded, not thrown.
 * @throws ShardNotFoundError before any scraping when the ID is unknown
 * @throws PersistenceError when the results cannot be written
 */
export async function runShard<TData extends object>(
  shardId: number,
  options: RunShardOptions<TData>,
): Promise<ShardRunReport<TData>> {
  const {
    catalog,
    scraper,
    resultsDir,
    storeTimeoutMs = 0,
    progressEvery = EXECUTION_CONSTANTS.PROGRESS_EVERY,
  } = options;
  const t0 = performance.now();

  const stores = await catalog.resolve(shardId);
  const concurrency = Math.max(
    1,
    Math.min(options.concurrency ?? 1, EXECUTION_CONSTANTS.MAX_CONCURRENCY),
  );

  Logger.info(`Running shard ${shardId}`, {
    shardId,
    site: scraper.key,
    count: stores.length,
    concurrency,
  });

  const limit = pLimit(concurrency);
  let done = 0;

  const results = await Promise.all(
    stores.map((store) =>
      limit(async () => {
        const result = await scrapeStoreSafely(scraper, store, storeTimeoutMs);
        done++;
        if (!result.success) {
          Logger.storeFailed(shardId, store.storeId, result.error ?? "");
        }
        if (progressEvery > 0 && done % progressEvery === 0) {
          const elapsed = (performance.now() - t0) / 1000;
          Logger.shardProgress(shardId, done, stores.length, done / elapsed);
        }
        return result;
      }),
    ),
  );

  const paths = await persistShardResults(resultsDir, shardId, results);
  const succeeded = results.filter((r) => r.success).length;
  const durationMs = performance.now() - t0;

  Logger.info(
    `Shard ${shardId} done: ${succeeded} ok, ${results.length - succeeded} failed in ${formatDuration(durationMs)}`,
    { shardId, json: paths.json, csv: paths.csv },
  );

  return {
    shardId,
    results,
    succeeded,
    failed: results.length - succeeded,
    jsonPath: paths.json,
    csvPath: paths.csv,
    durationMs,
  };
}
