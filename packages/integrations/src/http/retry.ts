import pRetry, { AbortError } from "p-retry";
import { RoomFetchError, type Logger } from "@roomwatch/shared";

export type RetryOptions = {
  retries?: number;
  minTimeoutMs?: number;
  maxTimeoutMs?: number;
  context?: string;
  signal?: AbortSignal;
  logger?: Logger;
};

export const RETRY_DEFAULTS = { retries: 2, minTimeoutMs: 500, maxTimeoutMs: 5_000, factor: 2 } as const;

/**
 * Longest time a retried call can take: every attempt running to its timeout
 * plus each backoff delay (`minTimeoutMs * factor^n`, capped at `maxTimeoutMs`).
 */
export function retryBudgetMs(options: {
  attemptTimeoutMs: number;
  retries?: number;
  minTimeoutMs?: number;
  maxTimeoutMs?: number;
}): number {
  const {
    attemptTimeoutMs,
    retries = RETRY_DEFAULTS.retries,
    minTimeoutMs = RETRY_DEFAULTS.minTimeoutMs,
    maxTimeoutMs = RETRY_DEFAULTS.maxTimeoutMs
  } = options;

  let backoff = 0;
  for (let attempt = 0; attempt < retries; attempt++) {
    backoff += Math.min(minTimeoutMs * RETRY_DEFAULTS.factor ** attempt, maxTimeoutMs);
  }
  return attemptTimeoutMs * (retries + 1) + backoff;
}

/**
 * Retries transient room-fetch failures with exponential backoff. Authorization
 * and other rejected requests abort on the first attempt, as does everything
 * once `signal` has aborted.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    retries = RETRY_DEFAULTS.retries,
    minTimeoutMs = RETRY_DEFAULTS.minTimeoutMs,
    maxTimeoutMs = RETRY_DEFAULTS.maxTimeoutMs,
    context = "fetch",
    signal
  } = options;

  return pRetry(
    async () => {
      try {
        return await fn();
      } catch (error) {
        if (signal?.aborted) throw new AbortError(error instanceof Error ? error : String(error));
        if (error instanceof RoomFetchError && error.kind !== "transient") {
          throw new AbortError(error);
        }
        throw error;
      }
    },
    {
      retries,
      minTimeout: minTimeoutMs,
      maxTimeout: maxTimeoutMs,
      factor: RETRY_DEFAULTS.factor,
      ...(signal ? { signal } : {}),
      onFailedAttempt: (error) => {
        options.logger?.warn(
          { context, attempt: error.attemptNumber, retriesLeft: error.retriesLeft, err: error.message },
          "retrying failed request"
        );
      }
    }
  );
}
