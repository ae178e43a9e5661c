import { logger as defaultLogger, type Logger } from './logger.js';

export interface RetryOptions {
  maxRetries?: number;
  delay?: number;
  backoff?: number;
  /** Return false to rethrow immediately instead of retrying. */
  shouldRetry?: (err: unknown) => boolean;
  logger?: Logger;
}

/**
 * Retry an async function with exponential backoff.
 * Defaults: 3 retries, 1s initial delay, 2x backoff.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxRetries = opts?.maxRetries ?? 3;
  const delay = opts?.delay ?? 1000;
  const backoff = opts?.backoff ?? 2;
  const log = opts?.logger ?? defaultLogger;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (opts?.shouldRetry && !opts.shouldRetry(err)) break;
      if (attempt < maxRetries) {
        const waitMs = delay * Math.pow(backoff, attempt);
        log.warn(
          { attempt: attempt + 1, maxRetries, waitMs, err },
          'Retry attempt failed, waiting before next try',
        );
        await new Promise((resolve) => setTimeout(resolve, waitMs));
      }
    }
  }

  throw lastError;
}
