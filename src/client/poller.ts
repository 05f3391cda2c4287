// Client-side generation status polling. An explicit loop: one fetch per
// tick, bounded attempts, bounded consecutive transport failures.

import type { JobStatusDto } from '../types/api.js';
import { ApiRequestError } from './api-client.js';

export type PollOutcome =
  | { outcome: 'completed'; blogPostId: number; job: JobStatusDto }
  | { outcome: 'failed'; errorMessage: string; job: JobStatusDto }
  | { outcome: 'cancelled' };

export const POST_GONE_MESSAGE = 'Post no longer exists';

export interface PollOptions {
  intervalMs?: number;
  maxAttempts?: number;
  /** Consecutive transport failures tolerated before giving up. */
  maxFetchFailures?: number;
  signal?: AbortSignal;
  onProgress?: (job: JobStatusDto) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class PollTimeoutError extends Error {
  readonly jobId: number;
  readonly attempts: number;

  constructor(jobId: number, attempts: number) {
    super(`Job ${jobId} did not finish after ${attempts} status checks`);
    this.name = 'PollTimeoutError';
    this.jobId = jobId;
    this.attempts = attempts;
  }
}

export class PollFetchError extends Error {
  readonly jobId: number;
  readonly failures: number;

  constructor(jobId: number, failures: number, cause: unknown) {
    super(`Status checks for job ${jobId} failed ${failures} times in a row`, { cause });
    this.name = 'PollFetchError';
    this.jobId = jobId;
    this.failures = failures;
  }
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Answers from the server (4xx) are not transport failures and end polling. */
function isTransportFailure(error: unknown): boolean {
  return !(error instanceof ApiRequestError) || error.status >= 500;
}

export async function pollGenerationJob(
  fetchStatus: (jobId: number) => Promise<JobStatusDto>,
  jobId: number,
  options: PollOptions = {},
): Promise<PollOutcome> {
  const intervalMs = options.intervalMs ?? 1000;
  const maxAttempts = options.maxAttempts ?? 120;
  const maxFetchFailures = options.maxFetchFailures ?? 5;
  const sleep = options.sleep ?? abortableSleep;
  const { signal } = options;

  let consecutiveFailures = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) return { outcome: 'cancelled' };

    let job: JobStatusDto | null = null;
    try {
      job = await fetchStatus(jobId);
      consecutiveFailures = 0;
    } catch (error) {
      if (!isTransportFailure(error)) throw error;
      consecutiveFailures++;
      if (consecutiveFailures > maxFetchFailures) {
        throw new PollFetchError(jobId, consecutiveFailures, error);
      }
    }

    if (signal?.aborted) return { outcome: 'cancelled' };

    if (job) {
      options.onProgress?.(job);
      if (job.status === 'completed') {
        // A deleted post clears the job's reference; the job itself stays completed.
        return job.blog_post_id === null
          ? { outcome: 'failed', errorMessage: POST_GONE_MESSAGE, job }
          : { outcome: 'completed', blogPostId: job.blog_post_id, job };
      }
      if (job.status === 'failed') {
        return { outcome: 'failed', errorMessage: job.error_message ?? 'Generation failed', job };
      }
    }

    if (attempt < maxAttempts) {
      await sleep(intervalMs, signal);
    }
  }

  if (signal?.aborted) return { outcome: 'cancelled' };
  throw new PollTimeoutError(jobId, maxAttempts);
}
