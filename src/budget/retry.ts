import { setTimeout as sleep } from "node:timers/promises";

import { CallAbortedError, CallTimeoutError } from "./call_timeout";

export type RetryInfo = {
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
};

const DEFAULT_MAX_DELAY_MS = 30_000;

export function isRetryableError(error: unknown): boolean {
  if (error instanceof CallAbortedError) return false;
  if (error instanceof CallTimeoutError) return true;
  if (error instanceof Error && "retryable" in error && typeof error.retryable === "boolean") {
    return error.retryable;
  }
  return false;
}

function retryAfterOf(error: unknown): number {
  if (error instanceof Error && "retryAfterMs" in error && typeof error.retryAfterMs === "number") {
    return error.retryAfterMs;
  }
  return 0;
}

/**
 * Linear backoff: baseDelay × attempt, raised to the provider's retry-after
 * hint when it asks for longer.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  error: unknown,
  maxDelayMs = DEFAULT_MAX_DELAY_MS
): number {
  return Math.min(maxDelayMs, Math.max(baseDelayMs * attempt, retryAfterOf(error)));
}

export async function withRetry<T>(
  run: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await run(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || options.signal?.aborted || !isRetryable(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options.baseDelayMs, error, options.maxDelayMs);
      options.onRetry?.({ attempt, delayMs, error });
      if (delayMs > 0) {
        try {
          await sleep(delayMs, undefined, { signal: options.signal });
        } catch {
          // stage aborted mid-backoff; surface the call's own failure
          throw error;
        }
      }
    }
  }
}
