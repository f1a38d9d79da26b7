import type { GetOptions, MetricsSnapshot, PageFetcher } from "../../ports/PageFetcher";
import type { Settings } from "../../shared/config/settings";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import { sleep as defaultSleep, type Sleep } from "../../shared/time/sleep";
import { ProxyManager } from "../proxy/ProxyManager";
import { composeMiddleware } from "./composeMiddleware";
import { FetchSession } from "./FetchSession";
import { HttpDecodeError } from "./http.errors";
import type {
  HttpMethod,
  HttpResponse,
  HttpTransport,
  Middleware,
  RequestAttempt,
  RequestHandler,
  ResponseKind
} from "./http.types";
import { MetricsMiddleware } from "./middlewares/MetricsMiddleware";
import { ProxyMiddleware } from "./middlewares/ProxyMiddleware";
import { RetryMiddleware } from "./middlewares/RetryMiddleware";

export const defaultAccept = "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8";
export const defaultAcceptLanguage = "en-US,en;q=0.9";

type CommonRequestOptions = {
  headers?: Record<string, string>;
  useProxy?: boolean;
  timeoutMs?: number;
};

export type PostOptions = CommonRequestOptions & {
  json?: unknown;
  form?: Record<string, string>;
  responseKind?: ResponseKind;
};

export type HttpClientOptions = {
  settings: Settings;
  /** Shared across a client pool; built from `settings.proxy` when omitted. */
  proxyManager?: ProxyManager;
  /** Run after the proxy layer, right before the transport. */
  middlewares?: readonly Middleware[];
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
  transportFactory?: () => HttpTransport;
};

const appendParams = (url: string, params?: Record<string, string | number | boolean>): string => {
  if (!params || Object.keys(params).length === 0) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) target.searchParams.set(key, String(value));
  return target.toString();
};

/**
 * HTTP client with a fixed middleware chain
 * (metrics -> retry -> proxy -> extra middlewares -> transport) and a minimum
 * delay between outgoing attempts. The transport is opened lazily.
 */
export class HttpClient implements PageFetcher {
  private readonly settings: Settings;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly transportFactory: () => HttpTransport;
  private readonly metricsMiddleware = new MetricsMiddleware();
  private readonly handler: RequestHandler;
  private transport?: HttpTransport;
  private lastRequestAt?: number;

  constructor(options: HttpClientOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.transportFactory =
      options.transportFactory ?? (() => new FetchSession({ connectTimeoutMs: this.settings.connectTimeoutMs }));

    const proxyManager =
      options.proxyManager ?? ProxyManager.fromSettings(this.settings.proxy, { logger: this.logger });

    this.handler = composeMiddleware(
      [
        this.metricsMiddleware,
        new RetryMiddleware({ policy: this.settings.retry, logger: this.logger, sleep: this.sleep }),
        new ProxyMiddleware(proxyManager, this.settings.useProxy, this.logger),
        ...(options.middlewares ?? [])
      ],
      (request) => this.send(request)
    );
  }

  private getTransport(): HttpTransport {
    if (!this.transport) this.transport = this.transportFactory();
    return this.transport;
  }

  /** Reserves the next free send slot and waits for it. */
  private async waitForSlot(): Promise<void> {
    const delayMs = this.settings.delayMs;
    if (delayMs <= 0) return;

    const now = this.now();
    const slot = this.lastRequestAt === undefined ? now : Math.max(now, this.lastRequestAt + delayMs);
    this.lastRequestAt = slot;
    await this.sleep(slot - now);
  }

  private async send(request: RequestAttempt): Promise<HttpResponse> {
    const transport = this.getTransport();
    await this.waitForSlot();
    return transport.send(request);
  }

  private buildHeaders(extra?: Record<string, string>): Record<string, string> {
    return {
      "User-Agent": this.settings.userAgent,
      Accept: defaultAccept,
      "Accept-Language": defaultAcceptLanguage,
      ...extra
    };
  }

  private request(
    method: HttpMethod,
    url: string,
    responseKind: ResponseKind,
    options: CommonRequestOptions & { body?: string; contentType?: string }
  ): Promise<HttpResponse> {
    const headers = this.buildHeaders(options.contentType ? { "Content-Type": options.contentType } : undefined);
    return this.handler({
      method,
      url,
      headers: { ...headers, ...options.headers },
      body: options.body,
      useProxy: options.useProxy,
      responseKind,
      timeoutMs: options.timeoutMs ?? this.settings.timeoutMs
    });
  }

  async get(url: string, options: GetOptions = {}): Promise<string> {
    const response = await this.request("GET", appendParams(url, options.params), "text", options);
    return this.expectText(response, "GET", url);
  }

  post(url: string, options?: PostOptions & { responseKind?: "text" }): Promise<string>;
  post(url: string, options: PostOptions & { responseKind: "json" }): Promise<unknown>;
  post(url: string, options: PostOptions & { responseKind: "bytes" }): Promise<Uint8Array>;
  post(url: string, options: PostOptions): Promise<unknown>;
  async post(url: string, options: PostOptions = {}): Promise<string | unknown | Uint8Array> {
    let body: string | undefined;
    let contentType: string | undefined;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      contentType = "application/json";
    } else if (options.form) {
      body = new URLSearchParams(options.form).toString();
      contentType = "application/x-www-form-urlencoded";
    }

    const response = await this.request("POST", url, options.responseKind ?? "text", { ...options, body, contentType });
    return response.body.data;
  }

  private expectText(response: HttpResponse, method: HttpMethod, url: string): string {
    if (response.body.kind !== "text") {
      throw new HttpDecodeError(`Expected a text body, got ${response.body.kind}`, { method, url });
    }
    return response.body.data;
  }

  getMetrics(): MetricsSnapshot {
    return this.metricsMiddleware.getMetrics();
  }

  async close(): Promise<void> {
    const transport = this.transport;
    this.transport = undefined;
    await transport?.close();
  }
}
