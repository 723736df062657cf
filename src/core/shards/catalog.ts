/**
 * Read side of the shard layout: listing, lookup and manifest rebuild.
 * The manifest is a cache of the shard files and can always be regenerated.
 */

import { promises as fs } from "node:fs";
import { PersistenceError, ShardNotFoundError } from "../errors";
import { isNotFound, readJsonFile, writeJsonAtomic } from "../storage";
import { normalizeStoreList } from "../stores/loader";
import type {
  Manifest,
  ManifestShardEntry,
  Shard,
  ShardListing,
  ShardSummary,
} from "../types/shard";
import type { Store } from "../types/store";
import { Logger } from "../utils/logger";
import {
  manifestPath,
  parseShardFilename,
  shardFilename,
  shardPath,
} from "./layout";
import { buildManifest } from "./planner";

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

const isCount = (v: unknown): v is number =>
  typeof v === "number" && Number.isSafeInteger(v) && v >= 0;

const isContiguous = (ids: number[]): boolean =>
  ids.every((id, i) => id === i + 1);

/**
 * Validates a parsed manifest. Only `total_stores`, `stores_per_shard`
 * and `shard_ids` are required.
 * @throws PersistenceError when the file does not look like a manifest
 */
export function parseManifest(raw: unknown, file: string): Manifest {
  const invalid = (what: string) =>
    new PersistenceError(`Manifest ${what}`, file);

  if (!isRecord(raw)) throw invalid("must be a JSON object");
  const { total_stores, stores_per_shard, shard_ids } = raw;
  if (!isCount(total_stores)) throw invalid("has no valid total_stores");
  if (!isCount(stores_per_shard)) {
    throw invalid("has no valid stores_per_shard");
  }
  if (!Array.isArray(shard_ids) || !shard_ids.every(isCount)) {
    throw invalid("has no valid shard_ids");
  }

  const shards: ManifestShardEntry[] = Array.isArray(raw.shards)
    ? raw.shards.filter(isRecord).flatMap((e) =>
        isCount(e.shard_id) && isCount(e.stores_count)
          ? [
              {
                shard_id: e.shard_id,
                stores_count: e.stores_count,
                filename:
                  typeof e.filename === "string"
                    ? e.filename
                    : shardFilename(e.shard_id),
              },
            ]
          : [],
      )
    : [];

  const ids = [...shard_ids].sort((a, b) => a - b);
  return {
    total_stores,
    stores_per_shard,
    total_shards: isCount(raw.total_shards) ? raw.total_shards : ids.length,
    shard_ids: ids,
    created_at: typeof raw.created_at === "string" ? raw.created_at : null,
    shards,
  };
}

export interface ShardCatalogOptions {
  shardsDir: string;
  baseUrl: string;
  /** Currently configured size, used to flag a manifest built with another */
  expectedStoresPerShard?: number;
}

export class ShardCatalog {
  constructor(private readonly options: ShardCatalogOptions) {}

  get shardsDir(): string {
    return this.options.shardsDir;
  }

  async readManifest(): Promise<Manifest | null> {
    const file = manifestPath(this.shardsDir);
    const raw = await readJsonFile(file);
    return raw === null ? null : parseManifest(raw, file);
  }

  /** Shard IDs that have a file on disk, ascending */
  async scanShardIds(): Promise<number[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.shardsDir);
    } catch (e) {
      if (isNotFound(e)) return [];
      throw new PersistenceError("Could not read directory", this.shardsDir, e);
    }
    return names
      .map(parseShardFilename)
      .filter((id): id is number => id !== null)
      .sort((a, b) => a - b);
  }

  async list(): Promise<ShardListing> {
    const [manifest, onDisk] = await Promise.all([
      this.readManifestOrNull(),
      this.scanShardIds(),
    ]);

    if (manifest.value) return this.listFromManifest(manifest.value, onDisk);

    if (onDisk.length === 0) {
      return {
        source: "none",
        totalStores: 0,
        storesPerShard: null,
        createdAt: null,
        shards: [],
        staleReasons: manifest.unreadable
          ? ["manifest unreadable, no shard files found"]
          : [],
      };
    }

    const shards = await this.readShards(onDisk);
    const summaries = shards.map((s) => summarize(s.shardId, s.stores.length));
    return {
      source: "scan",
      totalStores: summaries.reduce((n, s) => n + s.storeCount, 0),
      storesPerShard:
        summaries.length > 0
          ? Math.max(...summaries.map((s) => s.storeCount))
          : null,
      createdAt: null,
      shards: summaries,
      staleReasons: [
        manifest.unreadable
          ? "manifest unreadable, listing derived from shard files"
          : "manifest missing, listing derived from shard files",
      ],
    };
  }

  /** The manifest is a cache: an unreadable one is reported, not fatal */
  private async readManifestOrNull(): Promise<{
    value: Manifest | null;
    unreadable: boolean;
  }> {
    try {
      return { value: await this.readManifest(), unreadable: false };
    } catch (e) {
      if (!(e instanceof PersistenceError)) throw e;
      Logger.warn(`Ignoring manifest: ${e.message}`, {
        shardsDir: this.shardsDir,
      });
      return { value: null, unreadable: true };
    }
  }

  /**
   * Ordered store list of one shard
   * @throws ShardNotFoundError when the ID is not one of 1..N
   */
  async resolve(shardId: number): Promise<Store[]> {
    const listing = await this.list();
    const ids = listing.shards.map((s) => s.shardId);

    if (!Number.isSafeInteger(shardId) || !ids.includes(shardId)) {
      throw new ShardNotFoundError(shardId, ids);
    }

    const raw = await readJsonFile(shardPath(this.shardsDir, shardId));
    if (raw === null) throw new ShardNotFoundError(shardId, ids);
    return normalizeStoreList(raw, this.options.baseUrl);
  }

  /**
   * Regenerates manifest.json from the shard files on disk
   * @throws PersistenceError when the shard IDs have gaps
   */
  async rebuildManifest(): Promise<Manifest> {
    const ids = await this.scanShardIds();
    if (!isContiguous(ids)) {
      throw new PersistenceError(
        `Shard IDs on disk are not contiguous (${ids.join(", ")})`,
        this.shardsDir,
      );
    }

    const shards = await this.readShards(ids);
    const storesPerShard =
      shards.length > 0
        ? Math.max(...shards.map((s) => s.stores.length))
        : (this.options.expectedStoresPerShard ?? 0);
    const manifest = buildManifest(shards, storesPerShard);
    await writeJsonAtomic(manifestPath(this.shardsDir), manifest);
    return manifest;
  }

  private async readShards(ids: number[]): Promise<Shard[]> {
    const shards: Shard[] = [];
    for (const shardId of ids) {
      const raw = await readJsonFile(shardPath(this.shardsDir, shardId));
      if (raw === null) continue;
      shards.push({
        shardId,
        stores: normalizeStoreList(raw, this.options.baseUrl),
      });
    }
    return shards;
  }

  private async listFromManifest(
    manifest: Manifest,
    onDisk: number[],
  ): Promise<ShardListing> {
    const staleReasons: string[] = [];
    const expected = this.options.expectedStoresPerShard;

    if (expected !== undefined && manifest.stores_per_shard !== expected) {
      staleReasons.push(
        `manifest was built with stores_per_shard=${manifest.stores_per_shard}, configured value is ${expected}`,
      );
    }
    if (!isContiguous(manifest.shard_ids)) {
      staleReasons.push(
        `manifest shard IDs are not contiguous (${manifest.shard_ids.join(", ")})`,
      );
    }
    if (manifest.shard_ids.join(",") !== onDisk.join(",")) {
      staleReasons.push(
        `shard files on disk [${onDisk.join(", ")}] do not match manifest [${manifest.shard_ids.join(", ")}]`,
      );
    }

    const counts = new Map(
      manifest.shards.map((e) => [e.shard_id, e.stores_count]),
    );
    const missing = manifest.shard_ids.filter((id) => !counts.has(id));
    for (const shard of await this.readShards(missing)) {
      counts.set(shard.shardId, shard.stores.length);
    }

    return {
      source: "manifest",
      totalStores: manifest.total_stores,
      storesPerShard: manifest.stores_per_shard,
      createdAt: manifest.created_at,
      shards: manifest.shard_ids.map((id) => summarize(id, counts.get(id) ?? 0)),
      staleReasons,
    };
  }
}

function summarize(shardId: number, storeCount: number): ShardSummary {
  return { shardId, storeCount, filename: shardFilename(shardId) };
}
