import { silentLogger, type Logger } from "../../shared/logging/logger";
import type { ProxyEndpoint } from "../http/http.types";

export class InvalidProxyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidProxyError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const explicitPort = /:(\d{1,5})\/?$/;

/**
 * Parses `user:pass@host:port`, `host:port` or the same with an `http://` prefix.
 */
export const parseProxyLine = (line: string): ProxyEndpoint => {
  const trimmed = line.trim();
  const portMatch = explicitPort.exec(trimmed);
  if (!portMatch) throw new InvalidProxyError("Proxy entry must end with :<port>");

  const port = Number(portMatch[1]);
  if (port < 1 || port > 65535) throw new InvalidProxyError(`Proxy port out of range: ${port}`);

  let url: URL;
  try {
    url = new URL(trimmed.includes("://") ? trimmed : `http://${trimmed}`);
  } catch {
    throw new InvalidProxyError("Proxy entry is not a valid address");
  }
  if (url.protocol !== "http:") throw new InvalidProxyError(`Unsupported proxy scheme: ${url.protocol}`);
  if (!url.hostname) throw new InvalidProxyError("Proxy entry has no host");

  const endpoint: ProxyEndpoint = { host: url.hostname, port };
  if (url.username) {
    endpoint.username = decodeURIComponent(url.username);
    endpoint.password = decodeURIComponent(url.password);
  }
  return endpoint;
};

/** Invalid entries are logged (without credentials) and skipped. */
export const parseProxyList = (entries: readonly string[], logger: Logger = silentLogger): ProxyEndpoint[] => {
  const endpoints: ProxyEndpoint[] = [];
  entries.forEach((entry, index) => {
    try {
      endpoints.push(parseProxyLine(entry));
    } catch (err) {
      if (!(err instanceof InvalidProxyError)) throw err;
      logger.warn("proxy.invalid_entry", { index, reason: err.message });
    }
  });
  return endpoints;
};
