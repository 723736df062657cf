import { describe, expect, it, vi } from "vitest";
import { HttpStatusError, RequestTimeoutError } from "../../http/fetcher";
import type { Store, StoreDetails } from "../../types/store";
import { makeStore } from "../../__tests__/fixtures";
import { applyStoreDetails, enrichStores, needsEnrichment } from "../enrich";

/** A store with no address fields yet */
const bare = (n: number): Store => ({
  ...makeStore(n),
  city: "",
  province: "",
  postalCode: "",
  slug: `S${n}`,
});

const KINGSTON: StoreDetails = {
  city: "Kingston",
  province: "ON",
  postalCode: "K7L 2B5",
};

describe("needsEnrichment", () => {
  it("flags stores missing any address field", () => {
    expect(needsEnrichment(makeStore(1))).toBe(false);
    expect(needsEnrichment(bare(1))).toBe(true);
    expect(needsEnrichment({ ...makeStore(1), postalCode: "" })).toBe(true);
  });
});

describe("applyStoreDetails", () => {
  it("fills fields and rebuilds the slug", () => {
    expect(applyStoreDetails(bare(2), KINGSTON)).toEqual({
      store: {
        ...bare(2),
        ...KINGSTON,
        slug: "S2-kingston-on",
      },
      updated: true,
    });
  });

  it("reports no change when the details are already known", () => {
    const store = makeStore(1);
    expect(
      applyStoreDetails(store, { city: "Guelph", province: "ON" }),
    ).toEqual({ store, updated: false });
  });
});

describe("enrichStores", () => {
  const stores = [makeStore(1), bare(2), bare(3), bare(4)];

  function fakeDetails() {
    return vi.fn(async (store: Store): Promise<StoreDetails> => {
      switch (store.storeId) {
        case "S2":
          return KINGSTON;
        case "S3":
          throw new RequestTimeoutError(store.url, 1000);
        default:
          return {};
      }
    });
  }

  it("enriches every incomplete store and marks the outcome", async () => {
    const fetchDetails = fakeDetails();

    const summary = await enrichStores(stores, {
      fetchDetails,
      maxStores: 0,
      skipTimeouts: false,
    });

    expect(fetchDetails.mock.calls.map(([s]) => s.storeId)).toEqual([
      "S2",
      "S3",
      "S3",
      "S4",
    ]);
    expect(summary).toMatchObject({
      targets: 3,
      processed: 3,
      enriched: 1,
      succeeded: 1,
      timedOut: 1,
      errored: 1,
    });
    expect(summary.stores).toEqual([
      makeStore(1),
      { ...bare(2), ...KINGSTON, slug: "S2-kingston-on", enrichStatus: "ok" },
      { ...bare(3), enrichStatus: "timeout" },
      { ...bare(4), enrichStatus: "error" },
    ]);
  });

  it("tries a timed-out store only once when timeouts are skipped", async () => {
    const fetchDetails = fakeDetails();

    await enrichStores(stores, {
      fetchDetails,
      maxStores: 0,
      skipTimeouts: true,
    });

    expect(fetchDetails.mock.calls.map(([s]) => s.storeId)).toEqual([
      "S2",
      "S3",
      "S4",
    ]);
  });

  it("stops after the store limit and leaves the rest untouched", async () => {
    const fetchDetails = fakeDetails();

    const summary = await enrichStores(stores, {
      fetchDetails,
      maxStores: 1,
      skipTimeouts: false,
    });

    expect(fetchDetails).toHaveBeenCalledTimes(1);
    expect(summary.processed).toBe(1);
    expect(summary.stores.slice(2)).toEqual([bare(3), bare(4)]);
  });

  it("retries an HTTP error once and gives up on other errors", async () => {
    const fetchDetails = vi.fn(async (store: Store): Promise<StoreDetails> => {
      if (store.storeId === "S2") throw new HttpStatusError(502, store.url);
      throw new Error("unexpected markup");
    });

    const summary = await enrichStores([bare(2), bare(3)], {
      fetchDetails,
      maxStores: 0,
      skipTimeouts: false,
    });

    expect(fetchDetails.mock.calls.map(([s]) => s.storeId)).toEqual([
      "S2",
      "S2",
      "S3",
    ]);
    expect(summary.errored).toBe(2);
    expect(summary.stores.map((s) => s.enrichStatus)).toEqual([
      "error",
      "error",
    ]);
  });
});
