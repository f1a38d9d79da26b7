import { performance } from "perf_hooks";
import type { DomainMetrics, MetricsSnapshot } from "../../../ports/PageFetcher";
import type { HttpResponse, Middleware, RequestAttempt, RequestHandler } from "../http.types";

export const hostOf = (url: string): string => {
  try {
    return new URL(url).host || "unknown_host";
  } catch {
    return "invalid_url_host";
  }
};

const emptyMetrics = (): DomainMetrics => ({ attempts: 0, successes: 0, failures: 0, totalLatencyMs: 0, errors: {} });

const copyMetrics = (metrics: DomainMetrics): DomainMetrics => ({ ...metrics, errors: { ...metrics.errors } });

/** Sums per-domain metrics from several clients. */
export const mergeMetrics = (snapshots: readonly MetricsSnapshot[]): MetricsSnapshot => {
  const merged: MetricsSnapshot = {};
  for (const snapshot of snapshots) {
    for (const [host, metrics] of Object.entries(snapshot)) {
      const target = merged[host] ?? (merged[host] = emptyMetrics());
      target.attempts += metrics.attempts;
      target.successes += metrics.successes;
      target.failures += metrics.failures;
      target.totalLatencyMs += metrics.totalLatencyMs;
      for (const [name, count] of Object.entries(metrics.errors)) {
        target.errors[name] = (target.errors[name] ?? 0) + count;
      }
    }
  }
  return merged;
};

/**
 * Outermost middleware: one outcome per logical call, whatever the retry
 * layer below did.
 */
export class MetricsMiddleware implements Middleware {
  readonly name = "metrics";
  private readonly metrics = new Map<string, DomainMetrics>();

  constructor(private readonly now: () => number = () => performance.now()) {}

  async handle(request: RequestAttempt, next: RequestHandler): Promise<HttpResponse> {
    const host = hostOf(request.url);
    const startedAt = this.now();
    try {
      const response = await next(request);
      this.record(host, this.now() - startedAt);
      return response;
    } catch (err) {
      this.record(host, this.now() - startedAt, err);
      throw err;
    }
  }

  private record(host: string, elapsedMs: number, error?: unknown): void {
    let metrics = this.metrics.get(host);
    if (!metrics) {
      metrics = emptyMetrics();
      this.metrics.set(host, metrics);
    }

    metrics.attempts += 1;
    metrics.totalLatencyMs += elapsedMs;
    if (error === undefined) {
      metrics.successes += 1;
      return;
    }
    metrics.failures += 1;
    const name = error instanceof Error ? error.name : "NonError";
    metrics.errors[name] = (metrics.errors[name] ?? 0) + 1;
  }

  getMetrics(): MetricsSnapshot {
    const snapshot: MetricsSnapshot = {};
    for (const [host, metrics] of this.metrics) snapshot[host] = copyMetrics(metrics);
    return snapshot;
  }
}
