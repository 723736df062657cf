/**
 * Store address extraction from a store-details page
 */

import { load as loadHtml } from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { StoreDetails } from "../types/store";
import { Logger } from "../utils/logger";

const STORE_TYPES = new Set(["Store", "LocalBusiness", "HardwareStore"]);

/** Canadian postal code, normalised to "A1A 1A1" */
export function parsePostalCode(text: string): string | null {
  const m = /([A-Za-z]\d[A-Za-z])\s?-?\s?(\d[A-Za-z]\d)/.exec(text);
  return m ? `${m[1]} ${m[2]}`.toUpperCase() : null;
}

/** "City, PR" anywhere in the text */
export function parseCityProvince(
  text: string,
): Pick<StoreDetails, "city" | "province"> {
  const m = /([A-Za-z\-.\s']+),\s*([A-Za-z]{2})/.exec(text);
  if (!m) return {};
  const city = m[1].trim();
  return city ? { city, province: m[2].toUpperCase() } : {};
}

const str = (v: unknown): string | undefined =>
  typeof v === "string" && v.trim() ? v.trim() : undefined;

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

function isStoreNode(node: Record<string, unknown>): boolean {
  const type = node["@type"];
  const types = Array.isArray(type) ? type : [type];
  return types.some((t) => typeof t === "string" && STORE_TYPES.has(t));
}

/** Walks schema.org JSON-LD blocks; the first value seen for a field wins */
export function extractFromLdJson($: CheerioAPI): StoreDetails {
  const details: StoreDetails = {};
  const setDefault = (key: keyof StoreDetails, value: string | undefined) => {
    if (value && details[key] === undefined) details[key] = value;
  };

  const walk = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(walk);
      return;
    }
    if (!isRecord(node)) return;
    if (isStoreNode(node)) {
      const address = isRecord(node.address) ? node.address : {};
      setDefault("name", str(node.name));
      setDefault("city", str(address.addressLocality));
      setDefault("province", str(address.addressRegion)?.toUpperCase());
      setDefault("postalCode", str(address.postalCode));
    }
    Object.values(node).forEach(walk);
  };

  $('script[type="application/ld+json"]').each((_, el) => {
    try {
      walk(JSON.parse($(el).text()));
    } catch (e) {
      Logger.debug("Skipping malformed JSON-LD block", {
        error: e instanceof Error ? e.message : String(e),
      });
    }
  });
  return details;
}

/** Address markup, itemprop fields, then free text of the page */
export function extractFromHtml($: CheerioAPI): StoreDetails {
  const details: StoreDetails = {};
  const clean = (t: string) => t.replace(/\s+/g, " ").trim();

  for (const node of [$('[itemprop="address"]').first(), $("address").first()]) {
    if (node.length === 0) continue;
    const text = clean(node.text());
    if (!text) continue;
    const postal = parsePostalCode(text);
    if (postal && !details.postalCode) details.postalCode = postal;
    Object.assign(details, parseCityProvince(text));
  }

  if (!details.city) {
    details.city = str(clean($('[itemprop="addressLocality"]').first().text()));
  }
  if (!details.province) {
    details.province = str(
      clean($('[itemprop="addressRegion"]').first().text()),
    )?.toUpperCase();
  }
  if (!details.postalCode) {
    details.postalCode = str(
      clean($('[itemprop="postalCode"]').first().text()),
    )?.toUpperCase();
  }
  if (!details.name) {
    details.name = str(clean($("h1").first().text()));
  }

  const pageText = clean($("body").text() || $.root().text());
  if (pageText) {
    if (!details.postalCode) {
      details.postalCode = parsePostalCode(pageText) ?? undefined;
    }
    if (!details.city || !details.province) {
      const found = parseCityProvince(pageText);
      details.city = details.city || found.city;
      details.province = details.province || found.province;
    }
  }

  return withoutEmpty(details);
}

function withoutEmpty(details: StoreDetails): StoreDetails {
  const out: StoreDetails = {};
  for (const key of ["name", "city", "province", "postalCode"] as const) {
    const v = details[key];
    if (v) out[key] = v;
  }
  return out;
}

/** JSON-LD values take precedence over HTML ones */
export function extractStoreDetails(html: string): StoreDetails {
  const $ = loadHtml(html);
  return { ...extractFromHtml($), ...withoutEmpty(extractFromLdJson($)) };
}
