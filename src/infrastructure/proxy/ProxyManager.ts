import { silentLogger, type Logger } from "../../shared/logging/logger";
import type { ProxySettings } from "../../shared/config/settings";
import type { ProxyEndpoint } from "../http/http.types";
import { parseProxyList } from "./proxyList";

export type ProxyRecord = ProxyEndpoint & {
  /** Selections since this proxy last became current. */
  requestCount: number;
  errorCount: number;
};

export const proxyErrorThreshold = 3;

export type ProxyManagerOptions = {
  maxRequestsPerProxy: number;
  logger?: Logger;
  randomFn?: () => number;
};

export const proxyLabel = (proxy: ProxyEndpoint): string => `${proxy.host}:${proxy.port}`;

/**
 * Pool of proxies with a single "current" proxy. The current proxy is kept
 * until it has served `maxRequestsPerProxy` selections or collected
 * `proxyErrorThreshold` failures, then a random eligible one replaces it.
 */
export class ProxyManager {
  private readonly pool: ProxyRecord[];
  private readonly logger: Logger;
  private readonly randomFn: () => number;
  private readonly maxRequestsPerProxy: number;
  private currentProxy?: ProxyRecord;

  constructor(endpoints: readonly ProxyEndpoint[], options: ProxyManagerOptions) {
    if (!Number.isInteger(options.maxRequestsPerProxy) || options.maxRequestsPerProxy < 1) {
      throw new Error("maxRequestsPerProxy must be an integer >= 1");
    }
    this.pool = endpoints.map((endpoint) => ({ ...endpoint, requestCount: 0, errorCount: 0 }));
    this.maxRequestsPerProxy = options.maxRequestsPerProxy;
    this.logger = options.logger ?? silentLogger;
    this.randomFn = options.randomFn ?? Math.random;
  }

  static fromSettings(settings: ProxySettings, options: Omit<ProxyManagerOptions, "maxRequestsPerProxy"> = {}): ProxyManager {
    const endpoints = parseProxyList(settings.list, options.logger);
    return new ProxyManager(endpoints, { ...options, maxRequestsPerProxy: settings.maxRequestsPerProxy });
  }

  get size(): number {
    return this.pool.length;
  }

  get current(): Readonly<ProxyRecord> | undefined {
    return this.currentProxy;
  }

  private isStale(proxy: ProxyRecord): boolean {
    return proxy.requestCount >= this.maxRequestsPerProxy || proxy.errorCount >= proxyErrorThreshold;
  }

  selectProxy(): Readonly<ProxyRecord> | undefined {
    if (this.pool.length === 0) return undefined;

    const current = this.currentProxy;
    if (current && !this.isStale(current)) {
      current.requestCount += 1;
      return current;
    }

    const eligible = this.pool.filter((proxy) => proxy.errorCount < proxyErrorThreshold);
    if (eligible.length === 0) {
      // Every proxy is retired: this request goes direct and the pool starts over.
      for (const proxy of this.pool) proxy.errorCount = 0;
      this.currentProxy = undefined;
      this.logger.warn("proxy.pool_exhausted", { size: this.pool.length });
      return undefined;
    }

    const candidates = eligible.length > 1 && current ? eligible.filter((proxy) => proxy !== current) : eligible;
    const index = Math.min(candidates.length - 1, Math.floor(this.randomFn() * candidates.length));
    const picked = candidates[index];
    picked.requestCount = 1;
    this.currentProxy = picked;
    this.logger.debug("proxy.rotated", { proxy: proxyLabel(picked) });
    return picked;
  }

  reportFailure(proxy: Readonly<ProxyRecord>, context?: string): void {
    const record = this.pool.find((candidate) => candidate === proxy);
    if (!record) return;

    record.errorCount += 1;
    this.logger.warn("proxy.failure", { proxy: proxyLabel(record), errorCount: record.errorCount, context });
    if (record.errorCount >= proxyErrorThreshold && this.currentProxy === record) {
      this.currentProxy = undefined;
    }
  }

  reset(): void {
    this.currentProxy = undefined;
    for (const proxy of this.pool) {
      proxy.requestCount = 0;
      proxy.errorCount = 0;
    }
  }
}
