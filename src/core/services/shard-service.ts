/**
 * Shard Service - the actions behind the CLI
 * Can be imported and used from the CLI, a CI job or any other context
 */

import { AppConfig } from "../config/app-config";
import { HTTP_CONSTANTS } from "../constants/index";
import { InvalidConfigurationError } from "../errors";
import { ShardCatalog } from "../shards/catalog";
import { createShards, type CreateShardsResult } from "../shards/planner";
import { runShard } from "../shards/runner";
import { enrichStores, type EnrichSummary } from "../stores/enrich";
import { loadStores, saveStores } from "../stores/loader";
import type { PacingConfig, StoreScraper } from "../types/config";
import type { Manifest, ShardListing, ShardRunReport } from "../types/shard";
import { Logger } from "../utils/logger";
import { registry, getSiteKeys } from "../../sites/registry";
import type { SiteAdapter } from "../../sites/types";

export interface ShardServiceOptions {
  storesFile: string;
  shardsDir: string;
  resultsDir: string;
  baseUrl: string;
  storesPerShard: number;
  site: string;
  concurrency: number;
  storeTimeoutMs: number;
  pacing: PacingConfig;
}

export function serviceOptionsFromConfig(): ShardServiceOptions {
  return {
    storesFile: AppConfig.STORES_FILE,
    shardsDir: AppConfig.SHARDS_DIR,
    resultsDir: AppConfig.RESULTS_DIR,
    baseUrl: AppConfig.BASE_URL,
    storesPerShard: AppConfig.STORES_PER_SHARD,
    site: AppConfig.SITE,
    concurrency: AppConfig.MAX_CONCURRENCY,
    storeTimeoutMs: AppConfig.MAX_MINUTES_PER_STORE * 60_000,
    pacing: {
      timeoutMs: AppConfig.REQUEST_TIMEOUT_MS,
      retries: AppConfig.REQUEST_ATTEMPTS,
      retryBaseMs: 1000,
      blockedBackoffMs: AppConfig.CI ? 0 : HTTP_CONSTANTS.BLOCKED_BACKOFF_MS,
      minDelayMs: AppConfig.MIN_DELAY_MS,
      maxDelayMs: AppConfig.MAX_DELAY_MS,
    },
  };
}

function catalogFor(options: ShardServiceOptions): ShardCatalog {
  return new ShardCatalog({
    shardsDir: options.shardsDir,
    baseUrl: options.baseUrl,
    expectedStoresPerShard: options.storesPerShard,
  });
}

/**
 * Builds the site adapter named by `options.site`
 * @throws InvalidConfigurationError for an unknown site key
 */
export function createSiteAdapter(options: ShardServiceOptions): SiteAdapter {
  const factory = registry.get(options.site);
  if (!factory) {
    throw new InvalidConfigurationError(
      `Unknown site: ${options.site}. Available: ${getSiteKeys().join(", ")}`,
      "site",
    );
  }
  return factory({ baseUrl: options.baseUrl, pacing: options.pacing });
}

export async function createShardsAction(
  options: ShardServiceOptions,
): Promise<CreateShardsResult> {
  const stores = await loadStores(options);
  Logger.info(`Loaded ${stores.length} stores`, {
    storesFile: options.storesFile,
  });
  return createShards(stores, {
    shardsDir: options.shardsDir,
    storesPerShard: options.storesPerShard,
  });
}

export async function listShardsAction(
  options: ShardServiceOptions,
): Promise<ShardListing> {
  const listing = await catalogFor(options).list();
  for (const reason of listing.staleReasons) {
    Logger.warn(`Shards may be stale: ${reason}`, {
      shardsDir: options.shardsDir,
    });
  }
  return listing;
}

export async function runShardAction(
  shardId: number,
  options: ShardServiceOptions,
  scraper?: StoreScraper<object>,
): Promise<ShardRunReport<object>> {
  return runShard(shardId, {
    catalog: catalogFor(options),
    scraper: scraper ?? createSiteAdapter(options),
    resultsDir: options.resultsDir,
    concurrency: options.concurrency,
    storeTimeoutMs: options.storeTimeoutMs,
  });
}

export async function rebuildManifestAction(
  options: ShardServiceOptions,
): Promise<Manifest> {
  const manifest = await catalogFor(options).rebuildManifest();
  Logger.info(`✅ Manifest rebuilt with ${manifest.total_shards} shard(s)`, {
    shardsDir: options.shardsDir,
  });
  return manifest;
}

export interface EnrichActionOptions {
  maxStores: number;
  dryRun: boolean;
  skipTimeouts: boolean;
}

export async function enrichStoresAction(
  options: ShardServiceOptions,
  enrich: EnrichActionOptions,
  source?: SiteAdapter,
): Promise<EnrichSummary> {
  const stores = await loadStores(options);
  const adapter = source ?? createSiteAdapter(options);

  const summary = await enrichStores(stores, {
    fetchDetails: (store) => adapter.fetchStoreDetails(store),
    maxStores: enrich.maxStores,
    skipTimeouts: enrich.skipTimeouts,
  });

  if (enrich.dryRun) {
    Logger.info("DRY_RUN enabled - no changes written");
  } else {
    await saveStores(options.storesFile, summary.stores);
    Logger.info(`Saved updates to ${options.storesFile}`);
  }

  Logger.info(
    `Enrichment done: ${summary.succeeded} success / ${summary.timedOut} timeout / ${summary.errored} error`,
    { enriched: summary.enriched, processed: summary.processed },
  );
  return summary;
}

/** Human-readable summary printed by `list-shards` */
export function formatShardListing(listing: ShardListing): string {
  if (listing.source === "none") {
    return "No shards found. Create them with: create-shards";
  }

  const lines = [
    `Total stores: ${listing.totalStores}`,
    `Stores per shard: ${listing.storesPerShard ?? "unknown"}`,
    `Total shards: ${listing.shards.length}`,
  ];
  if (listing.createdAt) lines.push(`Created at: ${listing.createdAt}`);
  lines.push("", "Shards:");
  for (const s of listing.shards) {
    lines.push(`  • Shard ${s.shardId}: ${s.storeCount} stores (${s.filename})`);
  }
  for (const reason of listing.staleReasons) {
    lines.push(`⚠️  ${reason}`);
  }
  return lines.join("\n");
}
