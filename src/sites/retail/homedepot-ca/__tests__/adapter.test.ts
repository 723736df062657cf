import { describe, expect, it } from "vitest";
import { ScrapeError } from "../../../../core/errors";
import type { FetchLike, PacingConfig } from "../../../../core/types/config";
import { makeStore } from "../../../../core/__tests__/fixtures";
import { clearanceUrls, createAdapter } from "../adapter";

const BASE_URL = "https://shop.test";
const NOW = new Date("2026-05-06T07:08:09.000Z");

const pacing: PacingConfig = {
  timeoutMs: 1000,
  retries: 1,
  retryBaseMs: 0,
  blockedBackoffMs: 0,
  minDelayMs: 0,
  maxDelayMs: 0,
};

const STORE_PAGE = `<html><head>
  <script type="application/ld+json">
    {"@type":"HardwareStore","name":"Guelph Store","address":{"addressLocality":"Guelph","addressRegion":"ON","postalCode":"N1H 1A1"}}
  </script>
</head><body><h1 class="store-title">Guelph Store</h1></body></html>`;

const RESULTS_PAGE = `<html><body><section>
  <div class="product-pod"><h3 class="product-title">Shop Vac</h3><span class="price">$59.00</span></div>
  <div class="product-pod"><h3 class="product-title">Ladder</h3></div>
</section></body></html>`;

/** Serves fixed pages by URL, 404 for everything else */
function siteFetch(pages: Record<string, string>): FetchLike & { urls: string[] } {
  const urls: string[] = [];
  const impl = async (url: string) => {
    urls.push(url);
    const body = pages[url];
    return body === undefined
      ? new Response("not found", { status: 404 })
      : new Response(body);
  };
  return Object.assign(impl, { urls });
}

const store = makeStore(1);
const [searchUrl, frenchUrl, dealsUrl] = clearanceUrls(BASE_URL, store.storeId);

describe("clearanceUrls", () => {
  it("lists the search pages for a store", () => {
    expect(clearanceUrls("https://shop.test/", "70 01")).toEqual([
      "https://shop.test/en/search?q=clearance&storeId=70%2001",
      "https://shop.test/fr/recherche?q=liquidation&storeId=70%2001",
      "https://shop.test/en/deals/clearance?storeId=70%2001",
    ]);
  });
});

describe("homedepot-ca adapter", () => {
  it("tries the clearance pages until one lists products", async () => {
    const fetchImpl = siteFetch({
      [store.url]: STORE_PAGE,
      [searchUrl]: "<p>No results</p>",
      [dealsUrl]: RESULTS_PAGE,
    });
    const adapter = createAdapter({
      baseUrl: BASE_URL,
      pacing,
      fetchImpl,
      now: () => NOW,
    });

    const result = await adapter.scrapeStore(store, {
      signal: new AbortController().signal,
    });

    expect(fetchImpl.urls).toEqual([store.url, searchUrl, frenchUrl, dealsUrl]);
    expect(result.verified).toBe(true);
    expect(result.storeName).toBe("Guelph Store");
    expect(result.productCount).toBe(2);
    expect(result.products.map((p) => [p.name, p.price])).toEqual([
      ["Shop Vac", "$59.00"],
      ["Ladder", null],
    ]);
    expect(result.products[0]).toMatchObject({
      storeId: "S1",
      storeName: "Guelph Store",
      scrapedAt: "2026-05-06T07:08:09.000Z",
    });
  });

  it("stops at the first page with products", async () => {
    const fetchImpl = siteFetch({
      [store.url]: STORE_PAGE,
      [searchUrl]: RESULTS_PAGE,
    });
    const adapter = createAdapter({ baseUrl: BASE_URL, pacing, fetchImpl });

    await adapter.scrapeStore(store, { signal: new AbortController().signal });

    expect(fetchImpl.urls).toEqual([store.url, searchUrl]);
  });

  it("returns an unverified empty result when pages load without products", async () => {
    const fetchImpl = siteFetch({
      [searchUrl]: "<p>No results</p>",
    });
    const adapter = createAdapter({ baseUrl: BASE_URL, pacing, fetchImpl });

    const result = await adapter.scrapeStore(store, {
      signal: new AbortController().signal,
    });

    expect(result).toEqual({
      verified: false,
      storeName: "Store 1",
      productCount: 0,
      products: [],
    });
  });

  it("fails the store when no clearance page can be fetched", async () => {
    const adapter = createAdapter({
      baseUrl: BASE_URL,
      pacing,
      fetchImpl: siteFetch({ [store.url]: STORE_PAGE }),
    });

    const error = await adapter
      .scrapeStore(store, { signal: new AbortController().signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScrapeError);
    expect(error).toMatchObject({
      message: "No clearance page could be fetched for store S1",
      storeId: "S1",
    });
  });

  it("reads store details from the store page", async () => {
    const adapter = createAdapter({
      baseUrl: BASE_URL,
      pacing,
      fetchImpl: siteFetch({ [store.url]: STORE_PAGE }),
    });

    expect(await adapter.fetchStoreDetails(store)).toEqual({
      name: "Guelph Store",
      city: "Guelph",
      province: "ON",
      postalCode: "N1H 1A1",
    });
  });
});
