/**
 * Retry policy
 * Pure classification and backoff, plus a single-attempt timeout wrapper.
 */

import { NetworkError, OperationTimeoutError, RateLimitError } from './errors.js';

export type ErrorClass = 'retryable' | 'fatal';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after ms; rejects with the abort reason if the signal fires first
 */
export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Network, rate-limit and timeout failures are worth another attempt
 */
export function classifyError(error: unknown): ErrorClass {
  if (error instanceof NetworkError || error instanceof RateLimitError || error instanceof OperationTimeoutError) {
    return 'retryable';
  }
  return 'fatal';
}

/**
 * 2^attempt seconds (attempt is 0-based), never shorter than a rate-limit hint
 */
export function computeBackoffMs(attempt: number, error?: unknown): number {
  const exponential = 2 ** attempt * 1000;
  if (error instanceof RateLimitError && error.retryAfter !== undefined && error.retryAfter > 0) {
    return Math.max(exponential, error.retryAfter * 1000);
  }
  return exponential;
}

/**
 * Run one attempt; on expiry the signal is aborted and the attempt rejects
 * with OperationTimeoutError. A non-positive timeout disables the limit.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  platform?: string
): Promise<T> {
  const controller = new AbortController();

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return run(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new OperationTimeoutError(`Operation timed out after ${timeoutMs}ms`, { platform, timeoutMs });
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
