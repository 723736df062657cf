/**
 * Store enrichment: fill in missing address fields from store pages
 */

import { errorMessage } from "../errors";
import { HttpStatusError, isTimeout, rootError } from "../http/fetcher";
import type { Store, StoreDetails } from "../types/store";
import { Logger } from "../utils/logger";
import { buildStoreSlug } from "../utils/slug";

export const needsEnrichment = (store: Store): boolean =>
  !(store.city && store.province && store.postalCode);

/**
 * Merges scraped details into a store and rebuilds its slug
 * @returns the new store and whether anything changed
 */
export function applyStoreDetails(
  store: Store,
  details: StoreDetails,
): { store: Store; updated: boolean } {
  const next: Store = { ...store };
  let updated = false;

  if (details.name && details.name !== next.name) {
    next.name = details.name;
    updated = true;
  }
  for (const field of ["city", "province", "postalCode"] as const) {
    const value = details[field];
    if (value && value !== next[field]) {
      next[field] = value;
      updated = true;
    }
  }

  const slug = buildStoreSlug(next.storeId, next.city, next.province);
  if (slug !== next.slug) {
    next.slug = slug;
    updated = true;
  }
  return { store: next, updated };
}

export interface EnrichOptions {
  fetchDetails: (store: Store) => Promise<StoreDetails>;
  /** 0 means no limit */
  maxStores: number;
  /** One attempt per store instead of retrying once on timeout/HTTP errors */
  skipTimeouts: boolean;
}

export interface EnrichSummary {
  stores: Store[];
  targets: number;
  processed: number;
  enriched: number;
  succeeded: number;
  timedOut: number;
  errored: number;
}

type Outcome =
  | { kind: "ok"; store: Store; updated: boolean }
  | { kind: "timeout" | "error"; store: Store; reason: string };

async function enrichOne(
  store: Store,
  options: EnrichOptions,
): Promise<Outcome> {
  const attempts = options.skipTimeouts ? 1 : 2;

  for (let attempt = 1; ; attempt++) {
    try {
      const details = await options.fetchDetails(store);
      if (Object.keys(details).length === 0) {
        return { kind: "error", store, reason: "no data returned" };
      }
      const applied = applyStoreDetails(store, details);
      return { kind: "ok", ...applied };
    } catch (e) {
      const retryable = isTimeout(e) || rootError(e) instanceof HttpStatusError;
      if (retryable && attempt < attempts) {
        Logger.info(`Retrying store ${store.storeId}`, {
          storeId: store.storeId,
          attempt,
          attempts,
        });
        continue;
      }
      return {
        kind: isTimeout(e) ? "timeout" : "error",
        store,
        reason: errorMessage(e),
      };
    }
  }
}

/**
 * Enriches up to `maxStores` stores that miss address fields, sequentially.
 * Store order in the returned list is unchanged.
 */
export async function enrichStores(
  stores: Store[],
  options: EnrichOptions,
): Promise<EnrichSummary> {
  const targets = stores.filter(needsEnrichment);
  const limit =
    options.maxStores > 0
      ? Math.min(targets.length, options.maxStores)
      : targets.length;
  const selected = new Set(targets.slice(0, limit).map((s) => s.storeId));

  Logger.info(
    `🔎 Stores to enrich: ${targets.length}/${stores.length} (processing ${limit})`,
  );

  const summary: EnrichSummary = {
    stores: [],
    targets: targets.length,
    processed: limit,
    enriched: 0,
    succeeded: 0,
    timedOut: 0,
    errored: 0,
  };

  let index = 0;
  for (const store of stores) {
    if (!selected.has(store.storeId)) {
      summary.stores.push(store);
      continue;
    }

    index++;
    Logger.info(`Processing store ${index}/${limit}`, {
      storeId: store.storeId,
      name: store.name,
    });

    const outcome = await enrichOne(store, options);
    if (outcome.kind === "ok") {
      summary.succeeded++;
      if (outcome.updated) summary.enriched++;
      summary.stores.push({ ...outcome.store, enrichStatus: "ok" });
      continue;
    }

    if (outcome.kind === "timeout") summary.timedOut++;
    else summary.errored++;
    Logger.warn(`Skipping store ${store.storeId}: ${outcome.reason}`, {
      storeId: store.storeId,
      status: outcome.kind,
    });
    summary.stores.push({ ...store, enrichStatus: outcome.kind });
  }

  return summary;
}
