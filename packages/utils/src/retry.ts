/**
 * Retry Logic
 * 
 * Configurable retry wrapper with exponential backoff.
 */

import { sleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  /** Awaited before the next attempt; a rejection here aborts the retry. */
  onRetry?: (error: unknown, attempt: number) => void | Promise<void>;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Execute a function with automatic retry on failure
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  
  let lastError: unknown;
  let delay = opts.initialDelay;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      
      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      
      if (attempt === opts.maxAttempts) {
        throw error;
      }
      
      await opts.onRetry?.(error, attempt);
      
      if (delay > 0) {
        await sleep(delay);
      }
      
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelay);
    }
  }

  throw lastError;
}
