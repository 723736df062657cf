/**
 * Shard, manifest and result types
 */

import type { Store } from "./store";

export interface Shard {
  shardId: number;
  stores: Store[];
}

export interface ManifestShardEntry {
  shard_id: number;
  stores_count: number;
  filename: string;
}

/** On-disk manifest, snake_case like the rest of the persisted layout */
export interface Manifest {
  total_stores: number;
  stores_per_shard: number;
  total_shards: number;
  shard_ids: number[];
  created_at: string | null;
  shards: ManifestShardEntry[];
}

export interface ShardSummary {
  shardId: number;
  storeCount: number;
  filename: string;
}

export type ListingSource = "manifest" | "scan" | "none";

export interface ShardListing {
  source: ListingSource;
  totalStores: number;
  storesPerShard: number | null;
  createdAt: string | null;
  shards: ShardSummary[];
  staleReasons: string[];
}

export interface ShardResult<TData = unknown> {
  store: Store;
  success: boolean;
  data: TData | null;
  error: string | null;
  startedAt: string; // ISO
  durationMs: number;
}

export interface ShardRunReport<TData = unknown> {
  shardId: number;
  results: ShardResult<TData>[];
  succeeded: number;
  failed: number;
  jsonPath: string;
  csvPath: string;
  durationMs: number;
}
