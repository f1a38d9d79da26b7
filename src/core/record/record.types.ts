/** A validated product record extracted from a shop page. */
export type ScrapedRecord = {
  shopName: string;
  sku?: string;
  name: string;
  priceRegular: number;
  pricePromo?: number;
  scrapedAt: string; // ISO-8601
  url: string;
};

/** What a parser hands back before validation. */
export type RawRecord = Record<string, unknown>;

/** Field order used by tabular outputs. */
export const recordFields = [
  "shopName",
  "sku",
  "name",
  "priceRegular",
  "pricePromo",
  "scrapedAt",
  "url"
] as const satisfies ReadonlyArray<keyof ScrapedRecord>;
