/**
 * Store list loading and normalisation
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { SHARD_CONSTANTS } from "../constants/index";
import {
  InvalidConfigurationError,
  PersistenceError,
  StoreListNotFoundError,
} from "../errors";
import { isNotFound, readJsonFile, writeJsonAtomic } from "../storage";
import type { EnrichStatus, Store } from "../types/store";
import { buildStoreSlug } from "../utils/slug";

const ENRICH_STATUSES: readonly EnrichStatus[] = ["ok", "error", "timeout"];

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

const text = (v: unknown): string =>
  typeof v === "string" ? v.trim() : typeof v === "number" ? String(v) : "";

/**
 * Validates one raw store record and fills derived fields.
 * Accepts `store_number` in place of `storeId`.
 * @throws InvalidConfigurationError when the record has no store ID
 */
export function normalizeStore(raw: unknown, baseUrl: string): Store {
  if (!isRecord(raw)) {
    throw new InvalidConfigurationError("Store record must be an object");
  }

  const storeId = text(raw.storeId) || text(raw.store_number);
  if (!storeId) {
    throw new InvalidConfigurationError(
      "Store record is missing storeId/store_number",
      "storeId",
    );
  }

  const city = text(raw.city);
  const province = text(raw.province).toUpperCase();
  const status = text(raw.enrichStatus) || text(raw.enrich_status);

  return {
    storeId,
    name: text(raw.name) || `Store ${storeId}`,
    city,
    province,
    postalCode: text(raw.postalCode),
    slug: buildStoreSlug(storeId, city, province, text(raw.slug) || null),
    url:
      text(raw.url) ||
      `${baseUrl.replace(/\/+$/, "")}/store-details/${storeId}`,
    enrichStatus: ENRICH_STATUSES.find((s) => s === status) ?? "ok",
  };
}

export function normalizeStoreList(raw: unknown, baseUrl: string): Store[] {
  const list = isRecord(raw) && Array.isArray(raw.stores) ? raw.stores : raw;
  if (!Array.isArray(list)) {
    throw new InvalidConfigurationError("Store list must be a JSON array");
  }
  return list.map((s: unknown) => normalizeStore(s, baseUrl));
}

/** Stores recorded in existing shard files, first occurrence of an ID wins */
export async function collectStoresFromShards(
  shardsDir: string,
  baseUrl: string,
): Promise<Store[]> {
  let names: string[];
  try {
    names = await fs.readdir(shardsDir);
  } catch (e) {
    if (isNotFound(e)) return [];
    throw new PersistenceError("Could not read directory", shardsDir, e);
  }

  const shardFiles = names
    .map((name) => ({ name, m: SHARD_CONSTANTS.SHARD_FILE_PATTERN.exec(name) }))
    .filter((f) => f.m !== null)
    .sort((a, b) => Number(a.m?.[1]) - Number(b.m?.[1]));

  const byId = new Map<string, Store>();
  for (const { name } of shardFiles) {
    const raw = await readJsonFile(path.join(shardsDir, name));
    if (raw === null) continue;
    for (const store of normalizeStoreList(raw, baseUrl)) {
      if (!byId.has(store.storeId)) byId.set(store.storeId, store);
    }
  }
  return Array.from(byId.values());
}

export interface LoadStoresOptions {
  storesFile: string;
  shardsDir: string;
  baseUrl: string;
}

/**
 * Loads the store list file, falling back to the stores already sharded
 * @throws StoreListNotFoundError when neither source has stores
 */
export async function loadStores(options: LoadStoresOptions): Promise<Store[]> {
  const { storesFile, shardsDir, baseUrl } = options;

  const raw = await readJsonFile(storesFile);
  if (raw !== null) return normalizeStoreList(raw, baseUrl);

  const fallback = await collectStoresFromShards(shardsDir, baseUrl);
  if (fallback.length > 0) return fallback;

  throw new StoreListNotFoundError(storesFile, shardsDir);
}

export async function saveStores(
  storesFile: string,
  stores: Store[],
): Promise<void> {
  await writeJsonAtomic(storesFile, stores);
}
