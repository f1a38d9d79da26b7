import { Agent, ProxyAgent, fetch, type Dispatcher, type Response } from "undici";
import {
  HttpConnectionError,
  HttpDecodeError,
  HttpRequestError,
  HttpStatusError,
  HttpTimeoutError
} from "./http.errors";
import type { HttpResponse, HttpTransport, ProxyEndpoint, RequestAttempt, ResponseBody } from "./http.types";

export type FetchSessionOptions = {
  connectTimeoutMs: number;
  keepAliveTimeoutMs?: number;
};

const connectTimeoutCodes = new Set(["UND_ERR_CONNECT_TIMEOUT"]);
const responseTimeoutCodes = new Set(["UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);

const errorCode = (err: unknown): string | undefined =>
  err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const proxyKey = (proxy: ProxyEndpoint): string => `${proxy.username ?? ""}@${proxy.host}:${proxy.port}`;

/**
 * undici-backed transport: one keep-alive `Agent` with a connect timeout for
 * direct requests and one cached `ProxyAgent` per proxy endpoint.
 */
export class FetchSession implements HttpTransport {
  private readonly agent: Agent;
  private readonly proxyAgents = new Map<string, ProxyAgent>();
  private closed = false;

  constructor(private readonly options: FetchSessionOptions) {
    this.agent = new Agent({
      connect: { timeout: options.connectTimeoutMs },
      keepAliveTimeout: options.keepAliveTimeoutMs ?? 15000
    });
  }

  private dispatcherFor(proxy?: ProxyEndpoint): Dispatcher {
    if (!proxy) return this.agent;

    const key = proxyKey(proxy);
    const cached = this.proxyAgents.get(key);
    if (cached) return cached;

    const token =
      proxy.username !== undefined
        ? `Basic ${Buffer.from(`${proxy.username}:${proxy.password ?? ""}`).toString("base64")}`
        : undefined;
    const proxyAgent = new ProxyAgent({
      uri: `http://${proxy.host}:${proxy.port}`,
      token,
      connect: { timeout: this.options.connectTimeoutMs }
    });
    this.proxyAgents.set(key, proxyAgent);
    return proxyAgent;
  }

  private classifyFailure(err: unknown, request: RequestAttempt, aborted: boolean): HttpRequestError {
    const details = { method: request.method, url: request.url, cause: err };
    if (aborted) return new HttpTimeoutError("total", request.timeoutMs, details);

    // fetch wraps socket-level failures in a TypeError whose `cause` carries the code.
    const cause = err instanceof Error && err.cause !== undefined ? err.cause : err;
    const code = errorCode(cause) ?? errorCode(err);
    if (code && connectTimeoutCodes.has(code)) {
      return new HttpTimeoutError("connect", this.options.connectTimeoutMs, details);
    }
    if (code && responseTimeoutCodes.has(code)) {
      return new HttpTimeoutError("total", request.timeoutMs, details);
    }
    return new HttpConnectionError(`Connection error: ${errorMessage(cause)}`, details);
  }

  private async decode(res: Response, request: RequestAttempt): Promise<ResponseBody> {
    switch (request.responseKind) {
      case "bytes":
        return { kind: "bytes", data: new Uint8Array(await res.arrayBuffer()) };
      case "json": {
        const text = await res.text();
        try {
          return { kind: "json", data: JSON.parse(text) };
        } catch (err) {
          throw new HttpDecodeError(`Response is not valid JSON: ${errorMessage(err)}`, {
            method: request.method,
            url: request.url,
            cause: err
          });
        }
      }
      case "text":
        return { kind: "text", data: await res.text() };
    }
  }

  async send(request: RequestAttempt): Promise<HttpResponse> {
    if (this.closed) {
      throw new HttpConnectionError("Session is closed", { method: request.method, url: request.url });
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        dispatcher: this.dispatcherFor(request.proxy)
      });

      if (!res.ok) {
        await res.text().catch(() => "");
        throw new HttpStatusError(res.status, { method: request.method, url: request.url });
      }

      const body = await this.decode(res, request);
      return {
        status: res.status,
        url: res.url || request.url,
        headers: Object.fromEntries(res.headers.entries()),
        body
      };
    } catch (err) {
      if (err instanceof HttpRequestError) throw err;
      throw this.classifyFailure(err, request, controller.signal.aborted);
    } finally {
      clearTimeout(timeout);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const proxyAgents = Array.from(this.proxyAgents.values());
    this.proxyAgents.clear();
    await Promise.all([this.agent.close(), ...proxyAgents.map((proxyAgent) => proxyAgent.close())]);
  }
}
