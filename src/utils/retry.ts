import { createLogger } from './logger.js';

const logger = createLogger('retry');

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryOn?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

type BackoffOptions = Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>;

/** `base * multiplier^attempt` plus up to 10% jitter, capped at `maxDelayMs`. */
export function backoffDelay(attempt: number, opts: BackoffOptions, random: () => number = Math.random): number {
  const exponential = opts.baseDelayMs * opts.backoffMultiplier ** attempt;
  return Math.min(exponential * (1 + random() * 0.1), opts.maxDelayMs);
}

/**
 * Runs `fn` up to `maxRetries + 1` times. An error refused by `retryOn`, or
 * the error of the last attempt, is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const wait = opts.sleep ?? sleep;
  const canRetry = (error: Error, attempt: number): boolean =>
    attempt < opts.maxRetries && (opts.retryOn?.(error) ?? true);

  let attempt = 0;
  while (true) {
    try {
      return await fn(attempt);
    } catch (caught) {
      const error = toError(caught);
      if (!canRetry(error, attempt)) {
        throw error;
      }

      const delay = backoffDelay(attempt, opts);
      attempt++;
      logger.warn(`Attempt ${attempt} failed, retrying in ${Math.round(delay)}ms`, {
        error: error.message,
        maxRetries: opts.maxRetries,
      });
      opts.onRetry?.(error, attempt);
      await wait(delay);
    }
  }
}

export interface TimeoutOptions {
  timeoutMs: number;
  message?: string;
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(fn: () => Promise<T>, options: TimeoutOptions): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(options.message ?? `Operation timed out after ${options.timeoutMs}ms`)),
      options.timeoutMs,
    );
  });

  try {
    return await Promise.race([fn(), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  reset(): void;
}

/** Sliding-window limiter for outbound provider calls; callers wait for a free slot. */
export class SlidingWindowLimiter implements RateLimiter {
  private readonly grants: number[] = [];
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
    this.wait = options.sleep ?? sleep;
  }

  private evictExpired(at: number): void {
    const cutoff = at - this.options.windowMs;
    while (this.grants.length > 0 && this.grants[0] < cutoff) {
      this.grants.shift();
    }
  }

  async acquire(): Promise<void> {
    for (;;) {
      const at = this.now();
      this.evictExpired(at);
      if (this.grants.length < this.options.maxRequests) {
        this.grants.push(at);
        return;
      }

      const waitMs = this.grants[0] + this.options.windowMs - at + 1;
      logger.debug(`Rate limiter: waiting ${waitMs}ms`, { inWindow: this.grants.length, maxRequests: this.options.maxRequests });
      await this.wait(waitMs);
    }
  }

  reset(): void {
    this.grants.length = 0;
  }
}

export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  return new SlidingWindowLimiter(options);
}
