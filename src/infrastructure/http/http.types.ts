export type HttpMethod = "GET" | "POST";

export type ResponseKind = "text" | "json" | "bytes";

export type ProxyEndpoint = {
  host: string;
  port: number;
  username?: string;
  password?: string;
};

/** One outgoing attempt. Middlewares derive copies instead of mutating. */
export type RequestAttempt = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  proxy?: ProxyEndpoint;
  useProxy?: boolean;
  responseKind: ResponseKind;
  timeoutMs: number;
};

export type ResponseBody =
  | { kind: "text"; data: string }
  | { kind: "json"; data: unknown }
  | { kind: "bytes"; data: Uint8Array };

export type HttpResponse = {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: ResponseBody;
};

export type RequestHandler = (request: RequestAttempt) => Promise<HttpResponse>;

export interface Middleware {
  readonly name: string;
  handle(request: RequestAttempt, next: RequestHandler): Promise<HttpResponse>;
}

/** What actually puts bytes on the wire. */
export interface HttpTransport {
  send(request: RequestAttempt): Promise<HttpResponse>;
  close(): Promise<void>;
}
