/**
 * Retry and timeout helpers for the two suspension points of the agent:
 * reasoning calls and dataset source calls.
 */

import { TimeoutError, getRetryDelay, isRetryable } from './errors.js';
import type { Logger } from './types.js';

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  label: string;
  logger?: Logger;
  signal?: AbortSignal;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run an operation, retrying retryable failures with exponential backoff.
 * Non-retryable errors and the last retryable error are rethrown as-is.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error) || attempt > options.maxRetries || options.signal?.aborted) {
        throw error;
      }

      const delay = getRetryDelay(error, attempt, {
        baseDelayMs: options.baseDelayMs,
        maxDelayMs: options.maxDelayMs,
      });
      options.logger?.warn('retry_scheduled', {
        label: options.label,
        attempt,
        delay_ms: Math.round(delay),
        error: { code: error.code, message: error.message },
      });
      await wait(delay);
    }
  }
}

/**
 * Bound an operation by a timeout. The operation receives an AbortSignal that
 * fires on timeout or when the parent signal aborts.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Wait for a promise that other callers may share. Aborting the signal
 * rejects this caller's wait with the abort reason; the shared promise keeps
 * running for everyone else.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('aborted');
}
