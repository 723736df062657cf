/**
 * End-of-shard clearance report: totals, stores with the most clearance
 * items and a few sample products
 */

import type { ClearanceProduct, ClearanceScrape } from "../types/product";
import type { ShardResult } from "../types/shard";

export const SUMMARY_LIMITS = {
  TOP_STORES: 10,
  SAMPLE_PRODUCTS: 5,
} as const;

export interface StoreClearanceCount {
  storeId: string;
  storeName: string;
  count: number;
}

export interface ClearanceSummary {
  productCount: number;
  verifiedStores: number;
  topStores: StoreClearanceCount[];
  sampleProducts: ClearanceProduct[];
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

const optionalText = (v: unknown): boolean =>
  v === null || typeof v === "string";

function isClearanceProduct(v: unknown): v is ClearanceProduct {
  return (
    isRecord(v) &&
    typeof v.storeId === "string" &&
    typeof v.storeName === "string" &&
    typeof v.name === "string" &&
    optionalText(v.price) &&
    optionalText(v.originalPrice) &&
    optionalText(v.savings)
  );
}

/** Result data written by a clearance scraper; anything else is skipped */
export function isClearanceScrape(v: unknown): v is ClearanceScrape {
  return (
    isRecord(v) &&
    typeof v.verified === "boolean" &&
    typeof v.storeName === "string" &&
    Array.isArray(v.products) &&
    v.products.every(isClearanceProduct)
  );
}

export function summarizeClearance(results: ShardResult[]): ClearanceSummary {
  const products: ClearanceProduct[] = [];
  const perStore: StoreClearanceCount[] = [];
  let verifiedStores = 0;

  for (const { store, data } of results) {
    if (!isClearanceScrape(data)) continue;
    if (data.verified) verifiedStores++;
    products.push(...data.products);
    if (data.products.length > 0) {
      perStore.push({
        storeId: store.storeId,
        storeName: data.storeName,
        count: data.products.length,
      });
    }
  }

  // stable sort keeps shard order among equal counts
  const topStores = perStore
    .sort((a, b) => b.count - a.count)
    .slice(0, SUMMARY_LIMITS.TOP_STORES);

  return {
    productCount: products.length,
    verifiedStores,
    topStores,
    sampleProducts: products.slice(0, SUMMARY_LIMITS.SAMPLE_PRODUCTS),
  };
}

export function formatClearanceSummary(summary: ClearanceSummary): string {
  const lines = [
    `📦 ${summary.productCount} products found`,
    `🏪 ${summary.verifiedStores} stores verified`,
  ];
  if (summary.productCount === 0) {
    lines.push("❌ No clearance products found");
    return lines.join("\n");
  }

  lines.push("", `🏆 Top ${summary.topStores.length} stores by clearance count:`);
  summary.topStores.forEach((s, i) => {
    const rank = String(i + 1).padStart(2, " ");
    lines.push(`${rank}. ${s.storeName} (#${s.storeId}): ${s.count} products`);
  });

  lines.push("", "📦 Sample clearance products:");
  summary.sampleProducts.forEach((p, i) => {
    lines.push("", `${i + 1}. ${p.name}`);
    lines.push(`   🏪 Store: ${p.storeName} (#${p.storeId})`);
    lines.push(`   💰 Price: ${p.price ?? "N/A"}`);
    if (p.originalPrice) lines.push(`   💵 Original price: ${p.originalPrice}`);
    if (p.savings) lines.push(`   💸 Savings: ${p.savings}`);
  });
  return lines.join("\n");
}
