import type { RawRecord } from "../core/record/record.types";

export interface PageParser {
  parsePage(html: string, url: string): RawRecord[] | Promise<RawRecord[]>;
  /** Further pages to crawl from this one (pagination, categories). */
  discoverLinks?(html: string, url: string): string[] | Promise<string[]>;
}
