import { sleep as defaultSleep, type Sleep } from "../time/sleep";

export type RetryGiveUpReason = "non_retryable" | "exhausted";

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  backoffFactor?: number;   // delay multiplier per attempt, defaults to 2
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; reason: RetryGiveUpReason; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleep?: Sleep;
};

/**
 * Backoff before the retry that follows failed attempt `attempt` (1-based):
 * `min(minDelayMs * backoffFactor^(attempt-1), maxDelayMs)`.
 */
export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "backoffFactor">
): number => {
  const factor = opts.backoffFactor ?? 2;
  return Math.min(opts.maxDelayMs, opts.minDelayMs * Math.pow(factor, attempt - 1));
};

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0,
    sleep = defaultSleep
  } = opts;

  const maxAttempts = retries + 1;
  let attempt = 1;
  while (true) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!shouldRetry(err)) {
        onGiveUp?.({ attempt, maxAttempts, reason: "non_retryable", error: err });
        throw err;
      }
      if (attempt >= maxAttempts) {
        onGiveUp?.({ attempt, maxAttempts, reason: "exhausted", error: err });
        throw err;
      }

      const backoff = computeBackoffMs(attempt, opts);
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = backoff + jitter;
      onRetry?.({ attempt, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
      attempt += 1;
    }
  }
};
