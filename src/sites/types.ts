import type {
  FetchLike,
  PacingConfig,
  StoreDetailsSource,
  StoreScraper,
} from "../core/types/config";

/** SiteAdapter – a store scraper that can also look up store addresses */
export type SiteAdapter<TData extends object = object> = StoreScraper<TData> &
  StoreDetailsSource;

export interface AdapterOptions {
  baseUrl: string;
  pacing: PacingConfig;
  fetchImpl?: FetchLike;
  now?: () => Date;
}

export type AdapterFactory = (options: AdapterOptions) => SiteAdapter;
