/**
 * Shard planning: split the store list into fixed-size shards and publish
 * them together with their manifest.
 */

import { promises as fs } from "node:fs";
import { InvalidConfigurationError } from "../errors";
import { replaceDirectory, toJson } from "../storage";
import type { Manifest, Shard } from "../types/shard";
import type { Store } from "../types/store";
import { chunk, duplicates } from "../utils/array";
import { nowIso } from "../utils/date";
import { Logger } from "../utils/logger";
import { manifestPath, shardFilename, shardPath } from "./layout";

export function assertStoresPerShard(storesPerShard: number): void {
  if (!Number.isSafeInteger(storesPerShard) || storesPerShard <= 0) {
    throw new InvalidConfigurationError(
      `stores per shard must be a positive integer, got ${storesPerShard}`,
      "storesPerShard",
    );
  }
}

/**
 * Splits stores into consecutive windows of `storesPerShard`, numbered from 1
 * @throws InvalidConfigurationError on a non-positive size or duplicate IDs
 */
export function planShards(stores: Store[], storesPerShard: number): Shard[] {
  assertStoresPerShard(storesPerShard);

  const dupes = duplicates(stores.map((s) => s.storeId));
  if (dupes.length > 0) {
    throw new InvalidConfigurationError(
      `Store list contains duplicate IDs: ${dupes.join(", ")}`,
      "stores",
    );
  }

  return chunk(stores, storesPerShard).map((group, i) => ({
    shardId: i + 1,
    stores: group,
  }));
}

export function buildManifest(
  shards: Shard[],
  storesPerShard: number,
  createdAt: string | null = nowIso(),
): Manifest {
  return {
    total_stores: shards.reduce((n, s) => n + s.stores.length, 0),
    stores_per_shard: storesPerShard,
    total_shards: shards.length,
    shard_ids: shards.map((s) => s.shardId),
    created_at: createdAt,
    shards: shards.map((s) => ({
      shard_id: s.shardId,
      stores_count: s.stores.length,
      filename: shardFilename(s.shardId),
    })),
  };
}

export interface CreateShardsOptions {
  shardsDir: string;
  storesPerShard: number;
}

export interface CreateShardsResult {
  shards: Shard[];
  manifest: Manifest;
}

/**
 * Plans the shards and replaces the whole shards directory with the new set.
 * Any shard files from an earlier plan disappear in the same step.
 */
export async function createShards(
  stores: Store[],
  options: CreateShardsOptions,
): Promise<CreateShardsResult> {
  const { shardsDir, storesPerShard } = options;
  const shards = planShards(stores, storesPerShard);
  const manifest = buildManifest(shards, storesPerShard);

  Logger.info("Creating shards", {
    totalStores: stores.length,
    storesPerShard,
    totalShards: shards.length,
  });

  await replaceDirectory(shardsDir, async (staging) => {
    for (const shard of shards) {
      await fs.writeFile(
        shardPath(staging, shard.shardId),
        toJson(shard.stores),
        "utf8",
      );
      Logger.debug(`Shard ${shard.shardId} staged`, {
        shardId: shard.shardId,
        count: shard.stores.length,
      });
    }
    await fs.writeFile(manifestPath(staging), toJson(manifest), "utf8");
  });

  Logger.info(`✅ ${shards.length} shard(s) written to ${shardsDir}`);
  return { shards, manifest };
}
