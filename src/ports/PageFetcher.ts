export type DomainMetrics = {
  attempts: number;
  successes: number;
  failures: number;
  totalLatencyMs: number;
  /** Error name -> occurrences. */
  errors: Record<string, number>;
};

/** Keyed by request host. */
export type MetricsSnapshot = Record<string, DomainMetrics>;

export type GetOptions = {
  params?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
  useProxy?: boolean;
  timeoutMs?: number;
};

export interface PageFetcher {
  get(url: string, options?: GetOptions): Promise<string>;
  getMetrics(): MetricsSnapshot;
  close(): Promise<void>;
}
