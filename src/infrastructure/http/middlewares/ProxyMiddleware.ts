import { silentLogger, type Logger } from "../../../shared/logging/logger";
import { proxyLabel, type ProxyManager } from "../../proxy/ProxyManager";
import { safeUrl } from "../http.errors";
import type { HttpResponse, Middleware, RequestAttempt, RequestHandler } from "../http.types";

const withoutHeader = (headers: Record<string, string>, name: string): Record<string, string> =>
  Object.fromEntries(Object.entries(headers).filter(([key]) => key.toLowerCase() !== name));

/**
 * Innermost middleware: picks a proxy per attempt, so a retried request may go
 * out through a different one.
 */
export class ProxyMiddleware implements Middleware {
  readonly name = "proxy";

  constructor(
    private readonly proxyManager: ProxyManager,
    private readonly useProxyDefault: boolean,
    private readonly logger: Logger = silentLogger
  ) {}

  async handle(request: RequestAttempt, next: RequestHandler): Promise<HttpResponse> {
    const useProxy = request.useProxy ?? this.useProxyDefault;
    if (!useProxy) return next(request);

    const proxy = this.proxyManager.selectProxy();
    if (!proxy) return next(request);

    const label = proxyLabel(proxy);
    this.logger.debug("proxy.selected", { proxy: label, url: safeUrl(request.url) });
    // The transport authenticates against the proxy itself.
    const attempt: RequestAttempt = {
      ...request,
      headers: withoutHeader(request.headers, "proxy-authorization"),
      proxy: { host: proxy.host, port: proxy.port, username: proxy.username, password: proxy.password }
    };

    try {
      return await next(attempt);
    } catch (err) {
      this.logger.warn("proxy.request_failed", { proxy: label, url: safeUrl(request.url), error: err });
      this.proxyManager.reportFailure(proxy, `error on ${label}`);
      throw err;
    }
  }
}
