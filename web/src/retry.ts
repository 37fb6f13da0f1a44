/**
 * Retry with exponential backoff for idempotent reads
 */

import { APIError, NetworkError, TimeoutError } from './errors.js';

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry in milliseconds */
  initialDelay: number;
  maxDelay: number;
  exponentialBase: number;
  /** Randomize each delay between 50% and 100% */
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelay: 500,
  maxDelay: 8000,
  exponentialBase: 2,
  jitter: true,
};

export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(config.initialDelay * Math.pow(config.exponentialBase, attempt), config.maxDelay);
  if (config.jitter) {
    delay = delay * (0.5 + Math.random() * 0.5);
  }
  return delay;
}

/** Network failures, timeouts and 5xx are retried; 4xx never is. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof NetworkError || error instanceof TimeoutError) return true;
  if (error instanceof APIError && error.statusCode !== undefined) {
    return error.statusCode >= 500;
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(fn: () => Promise<T>, config: RetryConfig = DEFAULT_RETRY_CONFIG): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= config.maxRetries || !isRetryable(error)) throw error;
      await sleep(calculateDelay(attempt, config));
    }
  }
}
