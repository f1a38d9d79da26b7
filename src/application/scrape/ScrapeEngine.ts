import { dedupeRecords } from "../../core/record/dedupeRecords";
import type { ScrapedRecord } from "../../core/record/record.types";
import { validateRecord } from "../../core/record/validateRecord";
import { safeUrl } from "../../infrastructure/http/http.errors";
import { HttpClient } from "../../infrastructure/http/HttpClient";
import { mergeMetrics } from "../../infrastructure/http/middlewares/MetricsMiddleware";
import { ProxyManager } from "../../infrastructure/proxy/ProxyManager";
import type { MetricsSnapshot, PageFetcher } from "../../ports/PageFetcher";
import type { PageParser } from "../../ports/PageParser";
import type { RecordStorage, SaveResult } from "../../ports/RecordStorage";
import { createGate } from "../../shared/concurrency/gate";
import type { Settings } from "../../shared/config/settings";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import { sleep as defaultSleep, type Sleep } from "../../shared/time/sleep";
import {
  classifyItemFailure,
  createScrapeRunSummaryTracker,
  describeUrlFailure,
  type ScrapeRunSummary
} from "./scrape.error-handler";

/** Above this many start URLs, work is split into `settings.batch` sized batches. */
export const batchingThreshold = 50;

export type FetcherFactory = (context: {
  index: number;
  settings: Settings;
  proxyManager: ProxyManager;
  logger: Logger;
}) => PageFetcher;

export type ScrapeEngineOptions = {
  settings: Settings;
  shopName: string;
  parser: PageParser;
  storage: RecordStorage;
  fetcherFactory?: FetcherFactory;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => Date;
};

export type SaveSummary = SaveResult & {
  duplicatesRemoved: number;
  removedPercent: number;
};

export class EngineNotOpenError extends Error {
  constructor() {
    super("ScrapeEngine is not open; call open() first");
    this.name = "EngineNotOpenError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const defaultFetcherFactory: FetcherFactory = ({ settings, proxyManager, logger }) =>
  new HttpClient({ settings, proxyManager, logger });

/** Drops the fragment; the WHATWG parser already lower-cases scheme and host. */
export const normalizeUrl = (url: string): string => {
  try {
    const parsed = new URL(url);
    parsed.hash = "";
    return parsed.toString();
  } catch {
    return url.trim();
  }
};

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
};

/**
 * Crawls pages through a round-robin pool of fetchers under a concurrency
 * gate, validates what the parser extracts and buffers it until
 * `saveResults`.
 *
 * Shared state (visited set, result buffer, pool cursor) is only touched in
 * synchronous sections, so concurrent branches never interleave inside an
 * update.
 */
export class ScrapeEngine {
  private readonly settings: Settings;
  private readonly shopName: string;
  private readonly parser: PageParser;
  private readonly storage: RecordStorage;
  private readonly fetcherFactory: FetcherFactory;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  private fetchers: PageFetcher[] = [];
  private cursor = 0;
  private opened = false;
  private readonly visited = new Set<string>();
  private readonly buffer: ScrapedRecord[] = [];
  private readonly tracker = createScrapeRunSummaryTracker();

  constructor(options: ScrapeEngineOptions) {
    this.settings = options.settings;
    this.shopName = options.shopName;
    this.parser = options.parser;
    this.storage = options.storage;
    this.fetcherFactory = options.fetcherFactory ?? defaultFetcherFactory;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  get results(): readonly ScrapedRecord[] {
    return this.buffer;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  open(): void {
    if (this.opened) return;

    const proxyManager = ProxyManager.fromSettings(this.settings.proxy, { logger: this.logger });
    this.fetchers = Array.from({ length: this.settings.sessionsCount }, (_, index) =>
      this.fetcherFactory({
        index,
        settings: this.settings,
        proxyManager,
        logger: this.logger.child({ session: index })
      })
    );
    this.cursor = 0;
    this.opened = true;
    this.logger.debug("scrape.engine_opened", { sessions: this.fetchers.length, proxies: proxyManager.size });
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    this.opened = false;

    const results = await Promise.allSettled([...this.fetchers.map((fetcher) => fetcher.close()), this.storage.close()]);
    for (const result of results) {
      if (result.status === "rejected") throw result.reason;
    }
  }

  getClient(): PageFetcher {
    if (!this.opened || this.fetchers.length === 0) throw new EngineNotOpenError();
    const fetcher = this.fetchers[this.cursor];
    this.cursor = (this.cursor + 1) % this.fetchers.length;
    return fetcher;
  }

  async scrapeUrls(urls: readonly string[]): Promise<void> {
    if (!this.opened) throw new EngineNotOpenError();

    if (urls.length > batchingThreshold) {
      await this.processBatches(urls);
    } else {
      await this.runGated(urls);
    }

    this.logger.info("scrape.finished", { itemsFound: this.buffer.length, urlsFailed: this.summary().urlsFailed });
  }

  private async runGated(urls: readonly string[]): Promise<void> {
    const gate = createGate(this.settings.concurrency);
    await Promise.all(urls.map((url) => gate(() => this.processUrl(url))));
  }

  private async processBatches(urls: readonly string[]): Promise<void> {
    const batches = chunk(urls, this.settings.batch.size);
    for (const [index, batch] of batches.entries()) {
      this.logger.info("scrape.batch_started", { batch: index + 1, batches: batches.length, size: batch.length });
      await this.runGated(batch);
      if (index < batches.length - 1 && this.settings.batch.delayMs > 0) {
        await this.sleep(this.settings.batch.delayMs);
      }
    }
  }

  /** Test-and-set on the visited set; false when the URL was already dispatched. */
  private markVisited(url: string): boolean {
    const key = normalizeUrl(url);
    if (this.visited.has(key)) return false;
    this.visited.add(key);
    this.tracker.addVisited();
    return true;
  }

  async processUrl(url: string): Promise<void> {
    if (!this.markVisited(url)) {
      this.logger.debug("scrape.url_skipped", { url: safeUrl(url) });
      return;
    }

    try {
      const html = await this.getClient().get(url);
      this.tracker.addPageFetched();
      if (html.trim() === "") {
        this.tracker.addFailedUrl("empty_content");
        this.logger.warn("scrape.empty_content", { url: safeUrl(url) });
        return;
      }

      const items = await this.parser.parsePage(html, url);
      await this.processItems(items, url);

      const links = this.parser.discoverLinks ? await this.parser.discoverLinks(html, url) : [];
      if (links.length > 0) this.logger.debug("scrape.links_found", { url: safeUrl(url), count: links.length });
      for (const link of links) {
        await this.processUrl(link);
      }
    } catch (err) {
      const failure = describeUrlFailure(err);
      const failedCount = this.tracker.addFailedUrl(failure.code);
      this.logger.error("scrape.url_failed", {
        url: safeUrl(url),
        code: failure.code,
        status: failure.status,
        error: err,
        failedCount
      });
    }
  }

  /** Validates concurrently; survivors are appended in one step. Returns how many were kept. */
  async processItems(items: readonly unknown[], sourceUrl?: string): Promise<number> {
    const settled = await Promise.allSettled(
      items.map((item) => validateRecord(item, { shopName: this.shopName, now: this.now }))
    );

    const valid = settled.flatMap((result, index) => {
      if (result.status === "fulfilled") return [result.value];

      const decision = classifyItemFailure(result.reason, { url: sourceUrl, index });
      const skippedCount = this.tracker.addSkipped(decision.code);
      const { event, ...fields } = decision.log;
      this.logger.warn(event, { ...fields, skippedCount });
      return [];
    });

    this.appendResults(valid);
    return valid.length;
  }

  private appendResults(records: readonly ScrapedRecord[]): void {
    this.buffer.push(...records);
    this.tracker.addItems(records.length);
  }

  /** Deduplicates the whole buffer on every call, then hands it to storage. */
  async saveResults(destination: string): Promise<SaveSummary> {
    const { items, removed, removedPercent } = dedupeRecords(this.buffer, this.settings.deduplication.primaryKeys);
    this.logger.info("scrape.duplicates_removed", { removed, removedPercent });

    this.logger.info("scrape.saving", { destination, count: items.length });
    const result = await this.storage.save(items, destination);
    return { ...result, duplicatesRemoved: removed, removedPercent };
  }

  summary(): ScrapeRunSummary {
    return this.tracker.summary();
  }

  metrics(): MetricsSnapshot {
    return mergeMetrics(this.fetchers.map((fetcher) => fetcher.getMetrics()));
  }
}

/** Opens the engine, runs `fn` and closes the engine whatever happens. */
export const withScrapeEngine = async <T>(engine: ScrapeEngine, fn: (engine: ScrapeEngine) => Promise<T>): Promise<T> => {
  engine.open();
  try {
    return await fn(engine);
  } finally {
    await engine.close();
  }
};
