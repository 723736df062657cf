/**
 * Slug helpers for store records
 */

export function slugify(text: string | null | undefined): string {
  return (text || "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

/**
 * Builds "<id>-<city>-<province>", skipping empty parts.
 * Falls back to the given slug, then "store-<id>".
 */
export function buildStoreSlug(
  storeId: string,
  city?: string | null,
  province?: string | null,
  fallbackSlug?: string | null,
): string {
  const parts = [storeId.trim(), slugify(city), slugify(province)].filter(
    Boolean,
  );
  const computed = parts.join("-");
  if (computed.replace(/-/g, "")) return computed;
  if (fallbackSlug) return fallbackSlug;
  return `store-${storeId}`;
}
