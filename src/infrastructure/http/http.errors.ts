import type { HttpMethod } from "./http.types";

/** Drops credentials and fragments so URLs can be logged. */
export const safeUrl = (raw: string): string => {
  try {
    const url = new URL(raw);
    return `${url.origin}${url.pathname}${url.search}`;
  } catch {
    return raw;
  }
};

type RequestErrorDetails = {
  method: HttpMethod;
  url: string;
  cause?: unknown;
};

export class HttpRequestError extends Error {
  readonly method: HttpMethod;
  readonly url: string;
  readonly cause?: unknown;

  constructor(message: string, details: RequestErrorDetails) {
    super(message);
    this.name = "HttpRequestError";
    this.method = details.method;
    this.url = safeUrl(details.url);
    this.cause = details.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class HttpStatusError extends HttpRequestError {
  readonly status: number;

  constructor(status: number, details: RequestErrorDetails) {
    super(`Request failed: ${status} for url ${safeUrl(details.url)}`, details);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export class HttpConnectionError extends HttpRequestError {
  constructor(message: string, details: RequestErrorDetails) {
    super(message, details);
    this.name = "HttpConnectionError";
  }
}

export type TimeoutPhase = "connect" | "total";

export class HttpTimeoutError extends HttpRequestError {
  readonly phase: TimeoutPhase;
  readonly timeoutMs: number;

  constructor(phase: TimeoutPhase, timeoutMs: number, details: RequestErrorDetails) {
    super(`Request ${phase === "connect" ? "connect " : ""}timeout after ${timeoutMs}ms for url ${safeUrl(details.url)}`, details);
    this.name = "HttpTimeoutError";
    this.phase = phase;
    this.timeoutMs = timeoutMs;
  }
}

export class HttpDecodeError extends HttpRequestError {
  constructor(message: string, details: RequestErrorDetails) {
    super(message, details);
    this.name = "HttpDecodeError";
  }
}
