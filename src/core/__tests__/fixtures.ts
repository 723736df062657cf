import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Store } from "../types/store";

export const BASE_URL = "https://shop.test";

export function makeStore(n: number): Store {
  return {
    storeId: `S${n}`,
    name: `Store ${n}`,
    city: "Guelph",
    province: "ON",
    postalCode: "N1H 1A1",
    slug: `S${n}-guelph-on`,
    url: `${BASE_URL}/store-details/S${n}`,
    enrichStatus: "ok",
  };
}

/** Stores S1..Sn */
export const makeStores = (n: number): Store[] =>
  Array.from({ length: n }, (_, i) => makeStore(i + 1));

export const makeTempDir = (): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), "store-shards-"));

export const removeDir = (dir: string): Promise<void> =>
  fs.rm(dir, { recursive: true, force: true });

export async function readJson(file: string): Promise<unknown> {
  const parsed: unknown = JSON.parse(await fs.readFile(file, "utf8"));
  return parsed;
}
