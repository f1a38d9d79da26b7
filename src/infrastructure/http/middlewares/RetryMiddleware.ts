import { silentLogger, type Logger } from "../../../shared/logging/logger";
import type { RetrySettings } from "../../../shared/config/settings";
import { retry } from "../../../shared/retry/retry";
import type { Sleep } from "../../../shared/time/sleep";
import { HttpConnectionError, HttpStatusError, HttpTimeoutError, safeUrl } from "../http.errors";
import type { HttpResponse, Middleware, RequestAttempt, RequestHandler } from "../http.types";

export type ErrorClass = abstract new (...args: never[]) => Error;

export const defaultTransientErrors: readonly ErrorClass[] = [HttpConnectionError, HttpTimeoutError];

export type RetryMiddlewareOptions = {
  policy: RetrySettings;
  transientErrors?: readonly ErrorClass[];
  logger?: Logger;
  sleep?: Sleep;
  randomFn?: () => number;
};

const statusOf = (err: unknown): number | null => (err instanceof HttpStatusError ? err.status : null);

export class RetryMiddleware implements Middleware {
  readonly name = "retry";
  private readonly policy: RetrySettings;
  private readonly transientErrors: readonly ErrorClass[];
  private readonly logger: Logger;

  constructor(private readonly options: RetryMiddlewareOptions) {
    this.policy = options.policy;
    this.transientErrors = options.transientErrors ?? defaultTransientErrors;
    this.logger = options.logger ?? silentLogger;
  }

  /** Retryable: a transient error class, or a status listed in the policy. */
  classify(err: unknown): boolean {
    if (err instanceof HttpStatusError) {
      return this.policy.statusCodes.includes(err.status);
    }
    return this.transientErrors.some((errorClass) => err instanceof errorClass);
  }

  handle(request: RequestAttempt, next: RequestHandler): Promise<HttpResponse> {
    const url = safeUrl(request.url);
    return retry(() => next(request), {
      retries: this.policy.count,
      minDelayMs: this.policy.delayMs,
      maxDelayMs: this.policy.maxDelayMs,
      backoffFactor: this.policy.backoffFactor,
      jitterRatio: this.policy.jitterRatio,
      randomFn: this.options.randomFn,
      sleep: this.options.sleep,
      shouldRetry: (err) => this.classify(err),
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        this.logger.warn("http.retry", {
          method: request.method,
          url,
          status: statusOf(error),
          attempt,
          maxAttempts,
          delayMs,
          error
        });
      },
      onGiveUp: ({ attempt, maxAttempts, reason, error }) => {
        const fields = { method: request.method, url, status: statusOf(error), attempt, maxAttempts, reason };
        if (reason === "exhausted") this.logger.warn("http.give_up", fields);
        else this.logger.debug("http.give_up", fields);
      }
    });
  }
}
