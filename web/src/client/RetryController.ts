/**
 * RetryController
 * Bounded, sequential retries with capped exponential backoff.
 */

import { DomainError, ErrorKind, RequestCancelledError, type Classifier } from './errors';

export const MAX_RETRY_DELAY_MS = 10_000;

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set([
  ErrorKind.NETWORK_ERROR,
  ErrorKind.NETWORK_OFFLINE,
  ErrorKind.TIMEOUT,
  ErrorKind.SERVER_ERROR,
  ErrorKind.RATE_LIMITED,
]);

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  baseDelayMs?: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: DomainError) => void;
  sleep?: Sleep;
}

export function isRetryable(error: DomainError): boolean {
  if (error.kind === ErrorKind.CANCELLED) return false;
  if (RETRYABLE_KINDS.has(error.kind)) return true;
  return error.httpStatus !== undefined && RETRYABLE_STATUSES.has(error.httpStatus);
}

/**
 * Delay before retry `n` (1-indexed): `base * 2^(n-1)`, capped at 10s.
 * A server retry-after hint wins for rate limiting.
 */
export function computeDelay(retry: number, baseDelayMs: number, error?: DomainError): number {
  if (error?.kind === ErrorKind.RATE_LIMITED && error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }
  return Math.min(baseDelayMs * 2 ** (retry - 1), MAX_RETRY_DELAY_MS);
}

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Runs `operation` up to `maxAttempts` times. Non-retryable failures
 * surface at once; exhausting a budget above one attempt raises
 * MAX_RETRIES_EXCEEDED wrapping the last failure.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  classify: Classifier,
  maxAttempts: number,
  options: RetryOptions = {},
): Promise<T> {
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const sleep = options.sleep ?? abortableSleep;
  const attempts = Math.max(1, Math.floor(maxAttempts));

  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (raw) {
      const error = classify(raw);

      if (!isRetryable(error) || options.signal?.aborted) {
        throw options.signal?.aborted && error.kind !== ErrorKind.CANCELLED
          ? classify(new RequestCancelledError())
          : error;
      }

      if (attempt >= attempts) {
        if (attempts === 1) throw error;
        throw new DomainError({
          kind: ErrorKind.MAX_RETRIES_EXCEEDED,
          httpStatus: error.httpStatus,
          code: ErrorKind.MAX_RETRIES_EXCEEDED,
          details: { attempts, lastKind: error.kind, lastMessage: error.message },
          correlationId: error.correlationId,
          cause: error,
        });
      }

      const delay = computeDelay(attempt, baseDelayMs, error);
      options.onRetry?.(attempt, delay, error);
      await sleep(delay, options.signal);
      attempt += 1;
    }
  }
}
