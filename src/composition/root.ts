import path from "path";
import { ScrapeEngine, withScrapeEngine, type SaveSummary } from "../application/scrape/ScrapeEngine";
import type { ScrapeRunSummary } from "../application/scrape/scrape.error-handler";
import { createStorageRegistry, type StorageDescriptor } from "../infrastructure/storage/storage.registry";
import { builtInParsers } from "../parsers";
import { createParserRegistry } from "../parsers/parser.registry";
import type { MetricsSnapshot } from "../ports/PageFetcher";
import { ConfigError } from "../shared/config/config.errors";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeOverridesFromEnv } from "../shared/config/runtime.config";
import { loadScraperConfig } from "../shared/config/settings.loader";
import type { SettingsInput } from "../shared/config/settings";
import { createLogger } from "../shared/logging/logger";

export type ScrapeRequest = {
  parserName: string;
  urls: readonly string[];
  outputType?: string;
  concurrency?: number;
};

export type ScrapeReport = {
  parser: string;
  destination: string;
  summary: ScrapeRunSummary;
  saved: SaveSummary;
  metrics: MetricsSnapshot;
};

/** `YYYY-MM-DD` in UTC. */
export const formatRunDate = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * File storages write `<outputDir>/<parser>_<date>.<kind>` unless an output
 * file is configured; collection storages use `<parser>_records`.
 */
export const resolveDestination = (args: {
  parserName: string;
  kind: string;
  descriptor: StorageDescriptor;
  outputDir: string;
  outputFile?: string;
  date: Date;
}): string => {
  if (args.outputFile) return args.outputFile;
  if (args.descriptor.destination === "collection") return `${args.parserName}_records`;
  return path.join(args.outputDir, `${args.parserName}_${formatRunDate(args.date)}.${args.kind}`);
};

export const listParsers = () => createParserRegistry(builtInParsers).listParsers();

export const runScrape = async (
  request: ScrapeRequest,
  processEnv: NodeJS.ProcessEnv = process.env,
  now: () => Date = () => new Date()
): Promise<ScrapeReport> => {
  const env = loadEnv(processEnv);
  const logger = createLogger({ level: env.LOG_LEVEL, bindings: { parser: request.parserName } });

  const parserRegistry = createParserRegistry(builtInParsers);
  parserRegistry.get(request.parserName);

  if (request.urls.length === 0) {
    throw new ConfigError("No URLs to scrape", { key: "urls" });
  }

  const cliOverrides: SettingsInput = {
    concurrency: request.concurrency,
    storage: request.outputType ? { kind: request.outputType } : undefined
  };
  const { settings, parserOptions } = await loadScraperConfig({
    parserName: request.parserName,
    configDir: env.CONFIG_DIR,
    envOverrides: loadRuntimeOverridesFromEnv(processEnv),
    cliOverrides,
    logger
  });

  // Configuration problems surface here, before any request goes out.
  const descriptor = createStorageRegistry().get(settings.storage.kind);
  const parser = parserRegistry.create(request.parserName, parserOptions);
  const destination = resolveDestination({
    parserName: request.parserName,
    kind: settings.storage.kind,
    descriptor,
    outputDir: env.OUTPUT_DIR,
    outputFile: settings.storage.outputFile,
    date: now()
  });
  const storage = descriptor.create({
    mongoUri: env.MONGO_URI,
    primaryKeys: settings.deduplication.primaryKeys,
    logger
  });

  const engine = new ScrapeEngine({ settings, shopName: request.parserName, parser, storage, logger });
  logger.info("scrape.started", {
    urls: request.urls.length,
    concurrency: settings.concurrency,
    sessions: settings.sessionsCount,
    storage: settings.storage.kind
  });

  return withScrapeEngine(engine, async (running) => {
    await running.scrapeUrls(request.urls);
    const saved = await running.saveResults(destination);
    const summary = running.summary();
    const metrics = running.metrics();

    logger.info("scrape.completed", {
      ...summary,
      itemsSaved: saved.written,
      duplicatesRemoved: saved.duplicatesRemoved,
      destination
    });
    logger.info("scrape.metrics", { metrics });

    return { parser: request.parserName, destination, summary, saved, metrics };
  });
};
