import { getLogger } from '../core/logger.js';
import { CancelledError, toError } from '../core/errors.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffFactor: number;
  /** Upper bound of random jitter added to each delay (ms) */
  jitter: number;
  /** Explicit per-retry delays; overrides the exponential schedule and maxRetries */
  delays?: readonly number[];
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (attempt: number, error: Error, delay: number) => void;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
  jitter: 0,
};

/**
 * Delay before retry number `attempt` (0-based) under exponential backoff.
 */
export function backoffDelay(
  attempt: number,
  opts: Pick<RetryOptions, 'baseDelay' | 'backoffFactor' | 'maxDelay'>,
): number {
  return Math.min(opts.baseDelay * Math.pow(opts.backoffFactor, attempt), opts.maxDelay);
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const maxRetries = opts.delays ? opts.delays.length : opts.maxRetries;
  const logger = getLogger();
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (opts.signal?.aborted) throw new CancelledError();

    try {
      return await fn(attempt + 1);
    } catch (err) {
      lastError = toError(err);

      if (lastError instanceof CancelledError || opts.signal?.aborted) {
        throw lastError;
      }
      if (attempt === maxRetries) {
        break;
      }
      if (opts.shouldRetry && !opts.shouldRetry(lastError, attempt + 1)) {
        break;
      }

      const base = opts.delays?.[attempt] ?? backoffDelay(attempt, opts);
      const delay = base + (opts.jitter > 0 ? Math.random() * opts.jitter : 0);

      logger.debug({ attempt: attempt + 1, delay, error: lastError.message }, 'Retrying after error');

      if (opts.onRetry) {
        opts.onRetry(attempt + 1, lastError, delay);
      }

      await sleep(delay, opts.signal);
    }
  }

  throw lastError ?? new Error('retry: no attempts were made');
}

/**
 * Sleep for a given number of milliseconds. Rejects with CancelledError on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new CancelledError());

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
