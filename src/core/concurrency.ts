/**
 * Timing Utilities
 *
 * Backoff schedules, retry with backoff and an end-to-end deadline shared by
 * the chat and embedding layers. Sleep and clock are injectable so tests
 * never wait.
 */

import { DEFAULTS } from '../config/defaults.js';

export type SleepFn = (ms: number) => Promise<void>;
export type NowFn = () => number;

/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * `base * 2^attempt` (attempt is zero-based).
 */
export function exponentialDelay(baseMs: number, attempt: number): number {
  return baseMs * 2 ** attempt;
}

/**
 * `base * (attempt + 1)` (attempt is zero-based).
 */
export function linearDelay(baseMs: number, attempt: number): number {
  return baseMs * (attempt + 1);
}

/**
 * Wall-clock budget shared by every step of one translation.
 */
export class Deadline {
  private readonly expiresAt: number;

  constructor(
    budgetMs: number,
    private readonly now: NowFn = Date.now
  ) {
    this.expiresAt = now() + budgetMs;
  }

  /** Milliseconds left, never negative */
  remaining(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.remaining() <= 0;
  }

  /** Shrink a timeout or delay so it ends before the deadline */
  clip(ms: number): number {
    return Math.min(ms, this.remaining());
  }
}

/**
 * Settle with `work`, or with `onTimeout()` once `ms` elapse first.
 * `work` keeps running in the background when it loses.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => T): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(onTimeout()), ms);
  });
  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Options for retry with backoff
 */
export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  attempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  delayMs?: number;
  /** Function to determine if error is retryable (default: always retry) */
  shouldRetry?: (error: Error) => boolean;
  /** Delay override derived from the error (e.g. a Retry-After header) */
  delayFor?: (error: Error, attempt: number) => number | undefined;
  /** Callback when a retry occurs */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  sleep?: SleepFn;
}

/**
 * Wraps an async function with exponential backoff retry logic.
 *
 * @example
 * const vectors = await retryWithBackoff(
 *   () => client.embeddings.create({ model, input }),
 *   { attempts: 5, shouldRetry: (err) => err instanceof RateLimitError }
 * );
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    attempts = DEFAULTS.CHAT_MAX_RETRIES,
    delayMs = DEFAULTS.RETRY_BASE_DELAY_MS,
    shouldRetry = () => true,
    delayFor,
    onRetry,
    sleep: wait = sleep,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === attempts - 1 || !shouldRetry(lastError)) {
        throw lastError;
      }

      const delay = delayFor?.(lastError, attempt) ?? exponentialDelay(delayMs, attempt);
      onRetry?.(lastError, attempt + 1, delay);
      await wait(delay);
    }
  }

  // Unreachable with attempts >= 1
  throw lastError ?? new Error('retryWithBackoff called with no attempts');
}
