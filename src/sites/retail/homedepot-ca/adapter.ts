import { ScrapeError } from "../../../core/errors";
import {
  extractClearanceProducts,
  extractStoreHeading,
} from "../../../core/extraction/clearance";
import { extractStoreDetails } from "../../../core/extraction/store-details";
import { PageFetcher } from "../../../core/http/fetcher";
import type {
  ClearanceProduct,
  ClearanceScrape,
} from "../../../core/types/product";
import type { Store } from "../../../core/types/store";
import type { AdapterOptions, SiteAdapter } from "../../types";
import { Logger } from "../../../core/utils/logger";

const KEY = "homedepot-ca";

/** Search pages that list a store's clearance items, tried in order */
export function clearanceUrls(baseUrl: string, storeId: string): string[] {
  const base = baseUrl.replace(/\/+$/, "");
  const id = encodeURIComponent(storeId);
  return [
    `${base}/en/search?q=clearance&storeId=${id}`,
    `${base}/fr/recherche?q=liquidation&storeId=${id}`,
    `${base}/en/deals/clearance?storeId=${id}`,
  ];
}

export function createAdapter(
  options: AdapterOptions,
): SiteAdapter<ClearanceScrape> {
  const { baseUrl, pacing, fetchImpl, now = () => new Date() } = options;
  const fetcher = new PageFetcher({
    ...pacing,
    fetchImpl,
    referer: `${baseUrl.replace(/\/+$/, "")}/`,
  });

  // Store page heading; a failed request only means "not verified"
  async function verifyStore(store: Store, signal: AbortSignal) {
    try {
      const html = await fetcher.fetchText(store.url, signal);
      return extractStoreHeading(html);
    } catch (e) {
      signal.throwIfAborted();
      Logger.warn(`Store page unavailable: ${store.url}`, {
        site: KEY,
        storeId: store.storeId,
        error: e instanceof Error ? e.message : String(e),
      });
      return null;
    }
  }

  return {
    key: KEY,
    displayName: "Home Depot Canada",
    baseUrl,

    async scrapeStore(store, { signal }) {
      const heading = await verifyStore(store, signal);
      const storeName = heading ?? store.name;

      let products: ClearanceProduct[] = [];
      let reached = 0;
      let lastError: unknown;

      for (const url of clearanceUrls(baseUrl, store.storeId)) {
        let html: string;
        try {
          html = await fetcher.fetchText(url, signal);
        } catch (e) {
          signal.throwIfAborted();
          lastError = e;
          Logger.warn(`Clearance page failed: ${url}`, {
            site: KEY,
            storeId: store.storeId,
            error: e instanceof Error ? e.message : String(e),
          });
          continue;
        }

        reached++;
        const found = extractClearanceProducts(
          html,
          { storeId: store.storeId, name: storeName },
          baseUrl,
          now().toISOString(),
        );
        products = found.products;
        if (found.cardCount > 0) break;
      }

      if (reached === 0) {
        throw new ScrapeError(
          `No clearance page could be fetched for store ${store.storeId}`,
          store.storeId,
          lastError,
        );
      }

      Logger.info(`✓ ${products.length} clearance products`, {
        site: KEY,
        storeId: store.storeId,
        count: products.length,
      });

      return {
        verified: heading !== null,
        storeName,
        productCount: products.length,
        products,
      };
    },

    async fetchStoreDetails(store, signal) {
      const html = await fetcher.fetchText(store.url, signal);
      return extractStoreDetails(html);
    },
  };
}
