/**
 * Clearance listing extraction from search result pages
 */

import { load as loadHtml } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import type { ClearanceProduct } from "../types/product";
import type { Store } from "../types/store";

type Root = CheerioAPI;
type Selection = Cheerio<AnyNode>;

const classHas = (cls: string | undefined, words: readonly string[]) => {
  const lower = (cls || "").toLowerCase();
  return lower !== "" && words.some((w) => lower.includes(w));
};

/** First element under `scope` matching `tags` whose class contains a word */
function firstByClass(
  $: Root,
  scope: Selection,
  tags: string,
  words: readonly string[],
  exclude: readonly string[] = [],
): Selection | null {
  const hit = scope
    .find(tags)
    .toArray()
    .find((el) => {
      const cls = $(el).attr("class");
      return classHas(cls, words) && !classHas(cls, exclude);
    });
  return hit ? $(hit) : null;
}

/** First leaf element under `scope` whose own text matches `re` */
function firstLeafByText(
  $: Root,
  scope: Selection,
  tags: string,
  re: RegExp,
): Selection | null {
  const hit = scope
    .find(tags)
    .toArray()
    .find((el) => $(el).children().length === 0 && re.test($(el).text()));
  return hit ? $(hit) : null;
}

const textOf = (sel: Selection | null): string | null => {
  const t = sel?.text().replace(/\s+/g, " ").trim();
  return t ? t : null;
};

/** Heading that names the store on a store-details page */
export function extractStoreHeading(html: string): string | null {
  const $ = loadHtml(html);
  return textOf(firstByClass($, $.root(), "h1, h2", ["store"]));
}

/**
 * Product cards on a clearance search page. Only the outermost element of
 * nested "product"/"pod" containers counts as a card.
 */
export function findProductCards(html: string): {
  $: Root;
  cards: Selection[];
} {
  const $ = loadHtml(html);
  const isCard = (cls: string | undefined) => classHas(cls, ["product", "pod"]);
  const cards = $("div, article")
    .toArray()
    .filter((el) => isCard($(el).attr("class")))
    .filter(
      (el) =>
        $(el)
          .parents("div, article")
          .toArray()
          .find((p) => isCard($(p).attr("class"))) === undefined,
    )
    .map((el) => $(el));
  return { $, cards };
}

/**
 * Reads one product card. Returns null when the card has no name.
 */
export function extractProduct(
  $: Root,
  card: Selection,
  store: Pick<Store, "storeId" | "name">,
  baseUrl: string,
  scrapedAt: string,
): ClearanceProduct | null {
  const nameEl =
    firstByClass($, card, "h3, h2, span, a", ["title", "name"]) ??
    firstByClass($, card, "a", ["product"]);
  const name = textOf(nameEl);
  if (!name) return null;

  const skuText = textOf(
    firstLeafByText($, card, "span, div", /(SKU|Model):/i),
  );
  const skuMatch = skuText ? /(?:SKU|Model):\s*(\S+)/i.exec(skuText) : null;

  const href = card.find("a[href]").first().attr("href");
  let url: string | null = null;
  if (href) {
    try {
      url = new URL(href, baseUrl).toString();
    } catch {
      url = null;
    }
  }

  const img = card.find("img").first();
  const image = img.attr("src") || img.attr("data-src") || null;

  return {
    storeId: store.storeId,
    storeName: store.name,
    name,
    sku: skuMatch?.[1] ?? null,
    price: textOf(
      firstByClass($, card, "span, div", ["price"], ["was", "original"]),
    ),
    originalPrice: textOf(
      firstByClass($, card, "span, div", ["was", "original"]),
    ),
    savings: textOf(firstByClass($, card, "span, div", ["save"])),
    url,
    image,
    clearanceBadge: textOf(
      firstByClass($, card, "span, div", ["clearance", "liquidation"]),
    ),
    availability: textOf(
      firstLeafByText($, card, "span, div", /(in stock|en stock|available)/i),
    ),
    scrapedAt,
  };
}

export function extractClearanceProducts(
  html: string,
  store: Pick<Store, "storeId" | "name">,
  baseUrl: string,
  scrapedAt: string,
): { cardCount: number; products: ClearanceProduct[] } {
  const { $, cards } = findProductCards(html);
  const products = cards
    .map((card) => extractProduct($, card, store, baseUrl, scrapedAt))
    .filter((p): p is ClearanceProduct => p !== null);
  return { cardCount: cards.length, products };
}
