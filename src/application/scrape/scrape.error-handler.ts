import { InvalidRecordError } from "../../core/record/validateRecord";
import {
  HttpConnectionError,
  HttpDecodeError,
  HttpStatusError,
  HttpTimeoutError,
  safeUrl
} from "../../infrastructure/http/http.errors";

export type ScrapeSkipCode = "invalid_record" | "item_failed";
export type UrlFailureCode = "http_status" | "timeout" | "connection" | "decode" | "empty_content" | "unexpected";

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

type ItemSkippedLog = {
  event: "scrape.item_skipped";
  reason: string;
  index: number;
  url?: string;
};

export type ItemFailureDecision = {
  code: ScrapeSkipCode;
  log: ItemSkippedLog;
};

/** A single item never fails its page: invalid records and unexpected errors are both skipped. */
export const classifyItemFailure = (reason: unknown, context: { url?: string; index: number }): ItemFailureDecision => {
  const log: ItemSkippedLog = {
    event: "scrape.item_skipped",
    reason:
      reason instanceof InvalidRecordError
        ? reason.message
        : `Unexpected item failure at index=${context.index}: ${toErrorMessage(reason)}`,
    index: context.index
  };
  if (context.url != null) {
    log.url = safeUrl(context.url);
  }
  return { code: reason instanceof InvalidRecordError ? "invalid_record" : "item_failed", log };
};

export type UrlFailure = {
  code: UrlFailureCode;
  status?: number;
  message: string;
};

export const describeUrlFailure = (reason: unknown): UrlFailure => {
  const message = toErrorMessage(reason);
  if (reason instanceof HttpStatusError) return { code: "http_status", status: reason.status, message };
  if (reason instanceof HttpTimeoutError) return { code: "timeout", message };
  if (reason instanceof HttpConnectionError) return { code: "connection", message };
  if (reason instanceof HttpDecodeError) return { code: "decode", message };
  return { code: "unexpected", message };
};

export type ScrapeRunSummary = {
  urlsVisited: number;
  pagesFetched: number;
  urlsFailed: number;
  failedByCode: Partial<Record<UrlFailureCode, number>>;
  itemsFound: number;
  itemsSkipped: number;
  skippedByCode: Partial<Record<ScrapeSkipCode, number>>;
};

export const createScrapeRunSummaryTracker = () => {
  let urlsVisited = 0;
  let pagesFetched = 0;
  let itemsFound = 0;
  const failedByCode: Partial<Record<UrlFailureCode, number>> = {};
  const skippedByCode: Partial<Record<ScrapeSkipCode, number>> = {};

  const sum = (counts: Partial<Record<string, number>>) =>
    Object.values(counts).reduce<number>((total, count) => total + (count ?? 0), 0);

  return {
    addVisited: () => {
      urlsVisited += 1;
    },
    addPageFetched: () => {
      pagesFetched += 1;
    },
    addItems: (count: number) => {
      itemsFound += count;
    },
    addFailedUrl: (code: UrlFailureCode) => {
      failedByCode[code] = (failedByCode[code] ?? 0) + 1;
      return failedByCode[code] ?? 0;
    },
    addSkipped: (code: ScrapeSkipCode) => {
      skippedByCode[code] = (skippedByCode[code] ?? 0) + 1;
      return skippedByCode[code] ?? 0;
    },
    summary: (): ScrapeRunSummary => ({
      urlsVisited,
      pagesFetched,
      urlsFailed: sum(failedByCode),
      failedByCode: { ...failedByCode },
      itemsFound,
      itemsSkipped: sum(skippedByCode),
      skippedByCode: { ...skippedByCode }
    })
  };
};

export type ScrapeRunSummaryTracker = ReturnType<typeof createScrapeRunSummaryTracker>;
