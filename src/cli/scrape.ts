import "dotenv/config";
import { readFile } from "fs/promises";
import { listParsers, runScrape, type ScrapeReport } from "../composition/root";
import { readListLines } from "../shared/config/settings.loader";
import { CliUsageError, flagInt, flagList, flagString, parseFlags } from "./parse-flags";

type ErrorContext = Partial<{
  key: string;
  source: string;
  parserName: string;
  available: string[];
}>;

type CliErrorEnvelope = {
  event: "scrape.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

export const usage = [
  "Usage:",
  "  scrape --parser <name> [--urls <url...>] [--urls-file <path>] [--output-type csv|json|mongo] [--concurrency <n>]",
  "  list-parsers"
].join("\n");

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: Record<string, unknown>): ErrorContext | undefined => {
  const context: ErrorContext = {};
  if (typeof value.key === "string") context.key = value.key;
  if (typeof value.source === "string") context.source = value.source;
  if (typeof value.parserName === "string") context.parserName = value.parserName;
  if (Array.isArray(value.available)) {
    context.available = value.available.filter((entry): entry is string => typeof entry === "string");
  }
  return Object.keys(context).length > 0 ? context : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "scrape.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const readUrlsFile = async (filePath: string): Promise<string[]> => {
  try {
    return readListLines(await readFile(filePath, "utf-8"));
  } catch (err) {
    throw new CliUsageError(`Cannot read --urls-file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
};

export const runScrapeCommand = async (argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<ScrapeReport> => {
  const { flags } = parseFlags(argv);
  const parserName = flagString(flags, "parser");
  if (!parserName) throw new CliUsageError(`--parser is required\n${usage}`);

  const urlsFile = flagString(flags, "urls-file");
  const urls = [...flagList(flags, "urls"), ...(urlsFile ? await readUrlsFile(urlsFile) : [])];
  if (urls.length === 0) throw new CliUsageError("No URLs provided. Use --urls or --urls-file");

  return runScrape(
    {
      parserName,
      urls,
      outputType: flagString(flags, "output-type"),
      concurrency: flagInt(flags, "concurrency")
    },
    env
  );
};

export const executeScrapeCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const { command } = parseFlags(argv);
    switch (command) {
      case "scrape": {
        const report = await runScrapeCommand(argv.slice(1));
        // eslint-disable-next-line no-console
        console.log(
          JSON.stringify({
            event: "scrape.summary",
            destination: report.destination,
            ...report.summary,
            itemsSaved: report.saved.written,
            duplicatesRemoved: report.saved.duplicatesRemoved
          })
        );
        break;
      }
      case "list-parsers":
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ event: "parsers.list", parsers: listParsers() }));
        break;
      default:
        throw new CliUsageError(command ? `Unknown command '${command}'\n${usage}` : usage);
    }
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeScrapeCli();
}
