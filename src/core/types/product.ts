/**
 * Product-related types
 */

/** A clearance listing found for one store */
export interface ClearanceProduct {
  storeId: string;
  storeName: string;
  name: string;
  sku: string | null;
  price: string | null; // as displayed, e.g. "$12.98"
  originalPrice: string | null;
  savings: string | null;
  url: string | null;
  image: string | null;
  clearanceBadge: string | null;
  availability: string | null;
  scrapedAt: string; // ISO
}

/** What the clearance scraper records for a store */
export interface ClearanceScrape {
  verified: boolean;
  storeName: string;
  productCount: number;
  products: ClearanceProduct[];
}
