/**
 * Store-related types
 */

export type EnrichStatus = "ok" | "error" | "timeout";

/** A retail store as listed in the store file and in shard files */
export interface Store {
  storeId: string;
  name: string;
  city: string;
  province: string; // two-letter code, upper case
  postalCode: string;
  slug: string; // "<id>-<city>-<province>"
  url: string; // public store page
  enrichStatus: EnrichStatus;
}

/** Address details scraped from a store page */
export interface StoreDetails {
  name?: string;
  city?: string;
  province?: string;
  postalCode?: string;
}
