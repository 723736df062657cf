/**
 * Configuration-related types
 */

import type { Store, StoreDetails } from "./store";

export interface ScrapeContext {
  /** Aborted when the store's deadline passes */
  signal: AbortSignal;
}

/** StoreScraper – contract for every site adapter */
export interface StoreScraper<TData extends object = Record<string, unknown>> {
  key: string;
  displayName: string;
  baseUrl: string;

  /** Scrape one store. Throwing records the store as failed. */
  scrapeStore(store: Store, ctx: ScrapeContext): Promise<TData>;
}

/** HTTP behaviour of a site adapter */
export interface PacingConfig {
  timeoutMs: number;
  retries: number; // total attempts per request
  retryBaseMs: number;
  blockedBackoffMs: number; // extra wait after a 403/captcha or 429
  minDelayMs: number;
  maxDelayMs: number;
}

/** Source of store address details, used by enrichment */
export interface StoreDetailsSource {
  fetchStoreDetails(store: Store, signal?: AbortSignal): Promise<StoreDetails>;
}

export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;
