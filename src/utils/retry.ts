/**
 * Retry helper for API calls: exponential backoff on transient errors only
 */

import { RequestCancelledError, TransientApiError } from '../errors.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: TransientApiError) => void;
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
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
}

/**
 * Run `fn` until it succeeds, a non-transient error is thrown, or
 * `maxRetries` retries have been spent. The last transient error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let retries = 0;

  while (true) {
    if (options.signal?.aborted) {
      throw new RequestCancelledError();
    }
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof TransientApiError) || retries >= options.maxRetries) {
        throw error;
      }
      retries++;
      const delayMs = backoffDelay(retries, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(retries, delayMs, error);
      await sleep(delayMs, options.signal);
    }
  }
}
