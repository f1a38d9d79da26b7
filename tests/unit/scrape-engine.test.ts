import {
  EngineNotOpenError,
  ScrapeEngine,
  normalizeUrl,
  withScrapeEngine,
  type FetcherFactory
} from "../../src/application/scrape/ScrapeEngine";
import type { RawRecord, ScrapedRecord } from "../../src/core/record/record.types";
import { HttpStatusError } from "../../src/infrastructure/http/http.errors";
import type { MetricsSnapshot, PageFetcher } from "../../src/ports/PageFetcher";
import type { PageParser } from "../../src/ports/PageParser";
import type { RecordStorage, SaveResult } from "../../src/ports/RecordStorage";
import { defaultSettings, type Settings } from "../../src/shared/config/settings";
import { recordingLogger } from "../helpers/recordingLogger";

type FakePage = { items?: RawRecord[]; links?: string[] };
type Site = Record<string, FakePage | Error | string>;

const item = (url: string, extra: RawRecord = {}): RawRecord => ({ name: `Item ${url}`, priceRegular: 10, url, ...extra });

/** Pages are served as JSON so the fake parser can read them back. */
const jsonParser: PageParser = {
  parsePage: (html) => {
    const page: FakePage = JSON.parse(html);
    return page.items ?? [];
  },
  discoverLinks: (html) => {
    const page: FakePage = JSON.parse(html);
    return page.links ?? [];
  }
};

class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];
  closed = false;

  constructor(
    private readonly site: Site,
    private readonly hooks: { before?: () => Promise<void>; metrics?: MetricsSnapshot } = {}
  ) {}

  async get(url: string): Promise<string> {
    this.requested.push(url);
    await this.hooks.before?.();
    const page = this.site[url];
    if (page === undefined) throw new HttpStatusError(404, { method: "GET", url });
    if (page instanceof Error) throw page;
    if (typeof page === "string") return page;
    return JSON.stringify(page);
  }

  getMetrics(): MetricsSnapshot {
    return this.hooks.metrics ?? {};
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FakeStorage implements RecordStorage {
  readonly kind = "fake";
  saved: ScrapedRecord[] = [];
  closed = false;

  constructor(private readonly closeError?: Error) {}

  async save(items: readonly ScrapedRecord[], destination: string): Promise<SaveResult> {
    this.saved = [...items];
    return { destination, written: items.length };
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.closeError) throw this.closeError;
  }
}

const testSettings = (overrides: Partial<Settings> = {}): Settings => ({ ...defaultSettings, ...overrides });

const buildEngine = (
  site: Site,
  options: {
    settings?: Partial<Settings>;
    storage?: FakeStorage;
    fetchers?: FakeFetcher[];
    sleep?: (ms: number) => Promise<void>;
  } = {}
) => {
  const fetchers = options.fetchers ?? [];
  const fetcherFactory: FetcherFactory = ({ index }) => {
    const fetcher = fetchers[index] ?? new FakeFetcher(site);
    fetchers[index] = fetcher;
    return fetcher;
  };
  const log = recordingLogger();
  const storage = options.storage ?? new FakeStorage();
  const engine = new ScrapeEngine({
    settings: testSettings(options.settings),
    shopName: "testshop",
    parser: jsonParser,
    storage,
    fetcherFactory,
    logger: log.logger,
    sleep: options.sleep ?? (async () => undefined),
    now: () => new Date("2026-03-01T10:00:00.000Z")
  });
  return { engine, fetchers, storage, log };
};

describe("ScrapeEngine", () => {
  it("refuses to work before open()", async () => {
    const { engine } = buildEngine({});

    await expect(engine.scrapeUrls(["https://shop.test/a"])).rejects.toBeInstanceOf(EngineNotOpenError);
    expect(() => engine.getClient()).toThrow("ScrapeEngine is not open; call open() first");
  });

  it("hands out fetchers round-robin", () => {
    const { engine, fetchers } = buildEngine({}, { settings: { sessionsCount: 3 } });
    engine.open();

    const picked = [engine.getClient(), engine.getClient(), engine.getClient(), engine.getClient()];

    expect(picked).toEqual([fetchers[0], fetchers[1], fetchers[2], fetchers[0]]);
    expect(picked[0]).toBe(fetchers[0]);
    expect(picked[3]).toBe(fetchers[0]);
  });

  it("never runs more than `concurrency` pages at once", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const before = async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
    };
    const urls = Array.from({ length: 6 }, (_, i) => `https://shop.test/p${i}`);
    const site: Site = Object.fromEntries(urls.map((url) => [url, { items: [item(url)] }]));
    const { engine } = buildEngine(site, {
      settings: { concurrency: 2, sessionsCount: 2 },
      fetchers: [new FakeFetcher(site, { before }), new FakeFetcher(site, { before })]
    });

    await withScrapeEngine(engine, (running) => running.scrapeUrls(urls));

    expect(maxInFlight).toBe(2);
    expect(engine.results).toHaveLength(6);
  });

  it("keeps items from good pages and counts the failed one", async () => {
    const site: Site = {
      "https://shop.test/a": { items: [item("https://shop.test/a/1")] },
      "https://shop.test/c": { items: [item("https://shop.test/c/1")] }
    };
    const { engine, log } = buildEngine(site, { settings: { concurrency: 2 } });

    await withScrapeEngine(engine, (running) =>
      running.scrapeUrls(["https://shop.test/a", "https://shop.test/b", "https://shop.test/c"])
    );

    expect(engine.results.map((record) => record.url).sort()).toEqual(["https://shop.test/a/1", "https://shop.test/c/1"]);
    expect(engine.summary()).toEqual({
      urlsVisited: 3,
      pagesFetched: 2,
      urlsFailed: 1,
      failedByCode: { http_status: 1 },
      itemsFound: 2,
      itemsSkipped: 0,
      skippedByCode: {}
    });
    const failed = log.entries.find((entry) => entry.event === "scrape.url_failed");
    expect(failed?.level).toBe("error");
    expect(failed?.fields).toMatchObject({ url: "https://shop.test/b", code: "http_status", status: 404, failedCount: 1 });
  });

  it("fetches each URL once, ignoring fragments", async () => {
    const fetcher = new FakeFetcher({ "https://shop.test/a": { items: [] } });
    const { engine } = buildEngine({}, { fetchers: [fetcher] });
    engine.open();

    await Promise.all([engine.processUrl("https://shop.test/a"), engine.processUrl("https://shop.test/a#reviews")]);
    await engine.processUrl("https://shop.test/a");

    expect(fetcher.requested).toEqual(["https://shop.test/a"]);
    expect(engine.summary().urlsVisited).toBe(1);
    await engine.close();
  });

  it("follows discovered links without revisiting pages", async () => {
    const site: Site = {
      "https://shop.test/catalog": { links: ["https://shop.test/cat/1", "https://shop.test/cat/2"] },
      "https://shop.test/cat/1": { items: [item("https://shop.test/p/1")], links: ["https://shop.test/cat/2"] },
      "https://shop.test/cat/2": { items: [item("https://shop.test/p/2")], links: ["https://shop.test/catalog"] }
    };
    const { engine } = buildEngine(site);

    await withScrapeEngine(engine, (running) => running.scrapeUrls(["https://shop.test/catalog"]));

    expect(engine.results.map((record) => record.url)).toEqual(["https://shop.test/p/1", "https://shop.test/p/2"]);
    expect(engine.summary().urlsVisited).toBe(3);
  });

  it("counts blank pages as failures", async () => {
    const { engine } = buildEngine({ "https://shop.test/blank": "  \n " });

    await withScrapeEngine(engine, (running) => running.scrapeUrls(["https://shop.test/blank"]));

    expect(engine.summary()).toMatchObject({ pagesFetched: 1, urlsFailed: 1, failedByCode: { empty_content: 1 } });
  });

  it("skips invalid items and fills record defaults", async () => {
    const site: Site = {
      "https://shop.test/a": {
        items: [item("https://shop.test/p/1", { name: "" }), item("https://shop.test/p/2", { sku: 77 })]
      }
    };
    const { engine, log } = buildEngine(site);

    await withScrapeEngine(engine, (running) => running.scrapeUrls(["https://shop.test/a"]));

    expect(engine.results).toEqual([
      {
        shopName: "testshop",
        sku: "77",
        name: "Item https://shop.test/p/2",
        priceRegular: 10,
        scrapedAt: "2026-03-01T10:00:00.000Z",
        url: "https://shop.test/p/2"
      }
    ]);
    expect(engine.summary()).toMatchObject({ itemsFound: 1, itemsSkipped: 1, skippedByCode: { invalid_record: 1 } });
    const skipped = log.entries.find((entry) => entry.event === "scrape.item_skipped");
    expect(skipped?.fields).toMatchObject({ index: 0, url: "https://shop.test/a", skippedCount: 1 });
  });

  it("keeps the valid items when others are not objects at all", async () => {
    const { engine, log } = buildEngine({});

    const kept = await engine.processItems([item("https://shop.test/p/1"), null, 42], "https://shop.test/a");

    expect(kept).toBe(1);
    expect(engine.results.map((record) => record.url)).toEqual(["https://shop.test/p/1"]);
    expect(engine.summary()).toMatchObject({ itemsFound: 1, itemsSkipped: 2, skippedByCode: { invalid_record: 2 } });
    const reasons = log.entries.filter((entry) => entry.event === "scrape.item_skipped").map((entry) => entry.fields.reason);
    expect(reasons).toEqual([
      "Invalid record: (root): Expected object, received null",
      "Invalid record: (root): Expected object, received number"
    ]);
  });

  it("splits large URL lists into batches and pauses between them only", async () => {
    const urls = Array.from({ length: 120 }, (_, i) => `https://shop.test/p${i}`);
    const site: Site = Object.fromEntries(urls.map((url) => [url, { items: [] }]));
    const sleep = jest.fn(async (_ms: number) => undefined);
    const { engine, log } = buildEngine(site, { settings: { batch: { size: 50, delayMs: 7 } }, sleep });

    await withScrapeEngine(engine, (running) => running.scrapeUrls(urls));

    expect(sleep.mock.calls).toEqual([[7], [7]]);
    expect(log.entries.filter((entry) => entry.event === "scrape.batch_started").map((entry) => entry.fields.size)).toEqual([
      50, 50, 20
    ]);
    expect(engine.summary().urlsVisited).toBe(120);
  });

  it("does not batch lists at the threshold", async () => {
    const urls = Array.from({ length: 50 }, (_, i) => `https://shop.test/p${i}`);
    const sleep = jest.fn(async (_ms: number) => undefined);
    const { engine } = buildEngine(Object.fromEntries(urls.map((url) => [url, { items: [] }])), {
      settings: { batch: { size: 10, delayMs: 7 } },
      sleep
    });

    await withScrapeEngine(engine, (running) => running.scrapeUrls(urls));

    expect(sleep).not.toHaveBeenCalled();
  });

  it("deduplicates the buffer when saving", async () => {
    const site: Site = {
      "https://shop.test/a": { items: [item("https://shop.test/p/1", { sku: "A" }), item("https://shop.test/p/2", { sku: "B" })] },
      "https://shop.test/b": { items: [item("https://shop.test/p/1", { sku: "A" })] }
    };
    const { engine, storage } = buildEngine(site);

    const saved = await withScrapeEngine(engine, async (running) => {
      await running.scrapeUrls(["https://shop.test/a", "https://shop.test/b"]);
      return running.saveResults("out.json");
    });

    expect(saved).toEqual({ destination: "out.json", written: 2, duplicatesRemoved: 1, removedPercent: 50 });
    expect(storage.saved.map((record) => record.sku)).toEqual(["A", "B"]);
  });

  it("merges metrics from every fetcher", () => {
    const metrics = (attempts: number): MetricsSnapshot => ({
      "shop.test": { attempts, successes: attempts, failures: 0, totalLatencyMs: 1, errors: {} }
    });
    const { engine } = buildEngine({}, {
      settings: { sessionsCount: 2 },
      fetchers: [new FakeFetcher({}, { metrics: metrics(2) }), new FakeFetcher({}, { metrics: metrics(3) })]
    });
    engine.open();

    expect(engine.metrics()["shop.test"]).toEqual({ attempts: 5, successes: 5, failures: 0, totalLatencyMs: 2, errors: {} });
  });

  it("closes fetchers and storage even when the work fails", async () => {
    const { engine, fetchers, storage } = buildEngine({}, { settings: { sessionsCount: 2 } });

    await expect(
      withScrapeEngine(engine, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(engine.isOpen).toBe(false);
    expect(fetchers.map((fetcher) => fetcher.closed)).toEqual([true, true]);
    expect(storage.closed).toBe(true);
  });

  it("closes every fetcher before reporting a storage close failure", async () => {
    const { engine, fetchers } = buildEngine({}, { storage: new FakeStorage(new Error("close failed")) });
    engine.open();

    await expect(engine.close()).rejects.toThrow("close failed");
    expect(fetchers[0].closed).toBe(true);
  });
});

describe("normalizeUrl", () => {
  it("drops fragments and lower-cases the host", () => {
    expect(normalizeUrl("HTTPS://Shop.Test/A?x=1#top")).toBe("https://shop.test/A?x=1");
  });

  it("trims values that are not URLs", () => {
    expect(normalizeUrl("  not a url ")).toBe("not a url");
  });
});
