import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseArgs, runCli } from "../commands";
import type { SiteAdapter } from "../sites/types";
import type { ClearanceProduct, ClearanceScrape } from "../core/types/product";
import type { Store } from "../core/types/store";
import { saveStores } from "../core/stores/loader";
import {
  BASE_URL,
  makeStore,
  makeStores,
  makeTempDir,
  readJson,
  removeDir,
} from "../core/__tests__/fixtures";

function fakeAdapter(
  scrape: (store: Store) => Promise<{ ok: boolean }> = async () => ({
    ok: true,
  }),
): SiteAdapter<{ ok: boolean }> {
  return {
    key: "fake",
    displayName: "Fake",
    baseUrl: BASE_URL,
    scrapeStore: (store) => scrape(store),
    fetchStoreDetails: async () => ({
      city: "Kingston",
      province: "ON",
      postalCode: "K7L 2B5",
    }),
  };
}

const saw = (store: Store): ClearanceProduct => ({
  storeId: store.storeId,
  storeName: store.name,
  name: "Saw",
  sku: null,
  price: "$10.00",
  originalPrice: null,
  savings: null,
  url: null,
  image: null,
  clearanceBadge: null,
  availability: null,
  scrapedAt: "2026-01-02T03:04:05.000Z",
});

describe("parseArgs", () => {
  it("reads the command and its positionals", () => {
    const args = parseArgs(["run_shard", "2", "--shards-dir", "out"]);
    expect(args.command).toBe("run-shard");
    expect(args.positional).toEqual(["2"]);
    expect(args.getArg("--shards-dir")).toBe("out");
  });

  it("accepts the flag form of the commands", () => {
    const args = parseArgs(["--run-shard", "3"]);
    expect(args.command).toBe("run-shard");
    expect(args.positional).toEqual([]);
    expect(args.getArg("--run-shard")).toBe("3");
    expect(parseArgs(["--list-shards"]).command).toBe("list-shards");
  });

  it("leaves the command empty for unknown input", () => {
    expect(parseArgs(["deploy"]).command).toBeNull();
  });
});

describe("runCli", () => {
  let tmp: string;
  let dirs: string[];
  let output: string[];
  const print = (text: string) => {
    output.push(text);
  };

  const cli = (args: string[], adapter?: SiteAdapter) =>
    runCli([...args, ...dirs], { print, adapter });

  beforeEach(async () => {
    tmp = await makeTempDir();
    output = [];
    dirs = [
      "--stores-file",
      path.join(tmp, "stores.json"),
      "--shards-dir",
      path.join(tmp, "shards"),
      "--results-dir",
      path.join(tmp, "results"),
    ];
    await saveStores(path.join(tmp, "stores.json"), makeStores(5));
  });

  afterEach(async () => {
    await removeDir(tmp);
  });

  it("prints usage without a command", async () => {
    expect(await runCli([], { print })).toBe(0);
    expect(output[0]).toMatch(/^Usage:/);
  });

  it("creates shards", async () => {
    expect(await cli(["create-shards", "--stores-per-shard", "2"])).toBe(0);
    expect(output).toEqual([
      `✅ 3 shard(s) created for 5 stores (2 per shard) in ${path.join(tmp, "shards")}`,
    ]);
  });

  it.each(["0", "two"])(
    "exits non-zero for --stores-per-shard %s",
    async (size) => {
      expect(await cli(["create-shards", "--stores-per-shard", size])).toBe(1);
      await expect(fs.readdir(path.join(tmp, "shards"))).rejects.toThrow();
    },
  );

  it("lists zero shards without failing", async () => {
    expect(await cli(["list-shards"])).toBe(0);
    expect(output).toEqual([
      "No shards found. Create them with: create-shards",
    ]);
  });

  it("lists the created shards", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);
    output = [];

    expect(await cli(["list-shards", "--stores-per-shard", "2"])).toBe(0);

    const lines = output[0].split("\n");
    expect(lines.slice(0, 3)).toEqual([
      "Total stores: 5",
      "Stores per shard: 2",
      "Total shards: 3",
    ]);
    expect(lines[3]).toMatch(/^Created at: \d{4}-\d{2}-\d{2}T/);
    expect(lines.slice(4)).toEqual([
      "",
      "Shards:",
      "  • Shard 1: 2 stores (shard_1.json)",
      "  • Shard 2: 2 stores (shard_2.json)",
      "  • Shard 3: 1 stores (shard_3.json)",
    ]);
  });

  it("warns when the shards were built with another size", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);
    output = [];

    expect(await cli(["list-shards", "--stores-per-shard", "4"])).toBe(0);
    expect(output[0].split("\n").at(-1)).toBe(
      "⚠️  manifest was built with stores_per_shard=2, configured value is 4",
    );
  });

  it("runs a shard and exits 0 even when stores fail", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);
    output = [];
    const adapter = fakeAdapter(async (store) => {
      if (store.storeId === "S4") throw new Error("blocked");
      return { ok: true };
    });

    expect(await cli(["run-shard", "2"], adapter)).toBe(0);
    expect(output).toEqual([
      `✅ Shard 2 finished: 1 succeeded, 1 failed\n   ${path.join(tmp, "results", "shard_2_results.json")}\n   ${path.join(tmp, "results", "shard_2_results.csv")}`,
      "📦 0 products found\n🏪 0 stores verified\n❌ No clearance products found",
    ]);
  });

  it("prints the clearance report after a run", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);
    output = [];
    const adapter: SiteAdapter<ClearanceScrape> = {
      ...fakeAdapter(),
      scrapeStore: async (store) => {
        const products = store.storeId === "S2" ? [saw(store), saw(store)] : [];
        return {
          verified: store.storeId === "S1",
          storeName: store.name,
          productCount: products.length,
          products,
        };
      },
    };

    expect(await cli(["run-shard", "1"], adapter)).toBe(0);
    expect(output[1].split("\n").slice(0, 6)).toEqual([
      "📦 2 products found",
      "🏪 1 stores verified",
      "",
      "🏆 Top 1 stores by clearance count:",
      " 1. Store 2 (#S2): 2 products",
      "",
    ]);
  });

  it("lists and runs shards when the manifest is corrupt", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);
    await fs.writeFile(path.join(tmp, "shards", "manifest.json"), "{ truncated");
    output = [];

    expect(await cli(["list-shards", "--stores-per-shard", "2"])).toBe(0);
    expect(output[0].split("\n").slice(0, 3)).toEqual([
      "Total stores: 5",
      "Stores per shard: 2",
      "Total shards: 3",
    ]);
    expect(output[0].split("\n").at(-1)).toBe(
      "⚠️  manifest unreadable, listing derived from shard files",
    );

    expect(await cli(["run-shard", "1"], fakeAdapter())).toBe(0);
    expect(
      await readJson(path.join(tmp, "results", "shard_1_results.json")),
    ).toHaveLength(2);
  });

  it("accepts --shard for the shard ID", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);

    expect(await cli(["run-shard", "--shard", "3"], fakeAdapter())).toBe(0);
    expect(
      await readJson(path.join(tmp, "results", "shard_3_results.json")),
    ).toHaveLength(1);
  });

  it("exits non-zero for an unknown shard without scraping", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);
    const scrape = vi.fn(async () => ({ ok: true }));

    expect(await cli(["run-shard", "9"], fakeAdapter(scrape))).toBe(1);
    expect(await cli(["run-shard"], fakeAdapter(scrape))).toBe(1);
    expect(scrape).not.toHaveBeenCalled();
  });

  it("exits non-zero for an unknown site", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);

    expect(await cli(["run-shard", "1", "--site", "nowhere"])).toBe(1);
  });

  it("rebuilds the manifest", async () => {
    await cli(["create-shards", "--stores-per-shard", "2"]);
    await fs.rm(path.join(tmp, "shards", "manifest.json"));
    output = [];

    expect(await cli(["rebuild-manifest"])).toBe(0);
    expect(output).toEqual(["✅ Manifest rebuilt: 3 shard(s)"]);
  });

  describe("enrich-stores", () => {
    const bare: Store = {
      ...makeStore(9),
      city: "",
      province: "",
      postalCode: "",
      slug: "S9",
    };

    beforeEach(async () => {
      await saveStores(path.join(tmp, "stores.json"), [makeStore(1), bare]);
    });

    it("writes the enriched store list", async () => {
      expect(
        await cli(["enrich-stores", "--max-stores", "0"], fakeAdapter()),
      ).toBe(0);
      expect(output).toEqual([
        "✅ Enrichment complete: enriched 1/1 processed stores",
      ]);
      expect(await readJson(path.join(tmp, "stores.json"))).toEqual([
        makeStore(1),
        {
          ...bare,
          city: "Kingston",
          province: "ON",
          postalCode: "K7L 2B5",
          slug: "S9-kingston-on",
        },
      ]);
    });

    it("leaves the store list alone on a dry run", async () => {
      expect(
        await cli(
          ["enrich-stores", "--max-stores", "0", "--dry-run"],
          fakeAdapter(),
        ),
      ).toBe(0);
      expect(await readJson(path.join(tmp, "stores.json"))).toEqual([
        makeStore(1),
        bare,
      ]);
    });
  });
});
