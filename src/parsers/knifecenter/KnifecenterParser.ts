import * as cheerio from "cheerio";
import { z } from "zod";
import type { RawRecord } from "../../core/record/record.types";
import type { PageParser } from "../../ports/PageParser";
import { ConfigError } from "../../shared/config/config.errors";
import { cleanText, extractPrice, resolveUrl } from "../html.utils";
import type { ParserDefinition } from "../parser.registry";

const SELECTORS = {
  item: "div.listing_item",
  sku: ".purchase-row a[data-sku]",
  price: "span.our_price",
  productLink: "a.product_name",
  categoryLink: "a.all",
  productTile: "div.grid-style1__item > a",
  nextPage: "a.next"
} as const;

export const knifecenterOptionsSchema = z.object({
  baseUrl: z.string().url().default("https://www.knifecenter.com")
});

export type KnifecenterOptions = z.output<typeof knifecenterOptionsSchema>;

const hrefs = ($: cheerio.CheerioAPI, selector: string, base: string): string[] =>
  $(selector)
    .toArray()
    .flatMap((el) => {
      const href = $(el).attr("href");
      const resolved = href ? resolveUrl(href, base) : undefined;
      return resolved ? [resolved] : [];
    });

export class KnifecenterParser implements PageParser {
  constructor(private readonly options: KnifecenterOptions) {}

  parsePage(html: string): RawRecord[] {
    const $ = cheerio.load(html);
    return $(SELECTORS.item)
      .toArray()
      .map((node) => {
        const item = $(node);
        const link = item.children(SELECTORS.productLink).first();
        const href = link.attr("href");
        return {
          sku: item.find(SELECTORS.sku).first().attr("data-sku"),
          name: cleanText(link.children("div").not(".image-container").first().text()),
          priceRegular: extractPrice(item.find(SELECTORS.price).first().text()),
          url: href ? resolveUrl(href, this.options.baseUrl) : undefined
        };
      });
  }

  /**
   * Catalog and category pages link to sub-categories only; listing pages
   * yield product tiles plus the next page.
   */
  discoverLinks(html: string, url: string): string[] {
    const $ = cheerio.load(html);
    const categories = hrefs($, SELECTORS.categoryLink, url);
    if (categories.length > 0) return categories;

    const links = hrefs($, SELECTORS.productTile, url);
    const next = $(SELECTORS.nextPage).first().attr("href");
    const nextUrl = next ? resolveUrl(next, url) : undefined;
    if (nextUrl) links.push(nextUrl);
    return links;
  }
}

export const knifecenterParser: ParserDefinition = {
  name: "knifecenter",
  description: "knifecenter.com parser",
  create: (options) => {
    const parsed = knifecenterOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new ConfigError(`Invalid parser options: ${issues}`, { key: "parsers.knifecenter" });
    }
    return new KnifecenterParser(parsed.data);
  }
};
