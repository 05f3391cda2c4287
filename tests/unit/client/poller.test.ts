import { describe, it, expect, vi } from 'vitest';
import { ApiRequestError } from '../../../src/client/api-client.js';
import { PollFetchError, PollTimeoutError, pollGenerationJob } from '../../../src/client/poller.js';
import type { JobStatusDto } from '../../../src/types/api.js';

function job(overrides: Partial<JobStatusDto> = {}): JobStatusDto {
  return {
    id: 1,
    status: 'queued',
    progress: 0,
    blog_post_id: null,
    error_message: null,
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

const noSleep = () => vi.fn(async (_ms: number) => {});

describe('pollGenerationJob', () => {
  it('resolves with the post id once the job completes', async () => {
    const fetchStatus = vi.fn<(id: number) => Promise<JobStatusDto>>()
      .mockResolvedValueOnce(job())
      .mockResolvedValueOnce(job({ status: 'running', progress: 30 }))
      .mockResolvedValueOnce(job({ status: 'completed', progress: 100, blog_post_id: 5 }));
    const sleep = noSleep();
    const seen: number[] = [];

    const result = await pollGenerationJob(fetchStatus, 1, { sleep, onProgress: (j) => seen.push(j.progress) });

    expect(result).toMatchObject({ outcome: 'completed', blogPostId: 5 });
    expect(seen).toEqual([0, 30, 100]);
    expect(fetchStatus).toHaveBeenCalledWith(1);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000, undefined);
  });

  it('reports the error message of a failed job', async () => {
    const fetchStatus = vi.fn(async () => job({ status: 'failed', progress: 30, error_message: 'provider down' }));
    const result = await pollGenerationJob(fetchStatus, 1, { sleep: noSleep() });
    expect(result).toMatchObject({ outcome: 'failed', errorMessage: 'provider down' });
  });

  it('falls back to a generic message when the job carries none', async () => {
    const fetchStatus = vi.fn(async () => job({ status: 'failed' }));
    const result = await pollGenerationJob(fetchStatus, 1, { sleep: noSleep() });
    expect(result).toMatchObject({ outcome: 'failed', errorMessage: 'Generation failed' });
  });

  it('stops at a completed job whose post was deleted', async () => {
    const fetchStatus = vi.fn(async () => job({ status: 'completed', progress: 100, blog_post_id: null }));
    const sleep = noSleep();

    const result = await pollGenerationJob(fetchStatus, 1, { sleep, maxAttempts: 3 });

    expect(result).toMatchObject({ outcome: 'failed', errorMessage: 'Post no longer exists' });
    expect(fetchStatus).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not fetch when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchStatus = vi.fn(async () => job());

    expect(await pollGenerationJob(fetchStatus, 1, { signal: controller.signal })).toEqual({ outcome: 'cancelled' });
    expect(fetchStatus).not.toHaveBeenCalled();
  });

  it('stops when aborted between checks', async () => {
    const controller = new AbortController();
    const fetchStatus = vi.fn(async () => job());

    const result = await pollGenerationJob(fetchStatus, 1, {
      intervalMs: 60_000,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    });

    expect(result).toEqual({ outcome: 'cancelled' });
    expect(fetchStatus).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured number of checks', async () => {
    const fetchStatus = vi.fn(async () => job({ status: 'running', progress: 30 }));
    const sleep = noSleep();

    const error = await pollGenerationJob(fetchStatus, 9, { maxAttempts: 3, sleep }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PollTimeoutError);
    expect(error).toMatchObject({ jobId: 9, attempts: 3 });
    expect(fetchStatus).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('tolerates transient transport failures', async () => {
    const fetchStatus = vi.fn<(id: number) => Promise<JobStatusDto>>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(new ApiRequestError('HTTP_ERROR', 503, 'HTTP 503'))
      .mockResolvedValueOnce(job({ status: 'completed', progress: 100, blog_post_id: 2 }));

    const result = await pollGenerationJob(fetchStatus, 1, { sleep: noSleep() });

    expect(result).toMatchObject({ outcome: 'completed', blogPostId: 2 });
  });

  it('fails after too many consecutive transport failures', async () => {
    const cause = new TypeError('fetch failed');
    const fetchStatus = vi.fn(async (): Promise<JobStatusDto> => {
      throw cause;
    });

    const error = await pollGenerationJob(fetchStatus, 4, { maxFetchFailures: 5, sleep: noSleep() }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PollFetchError);
    expect(error).toMatchObject({ jobId: 4, failures: 6, cause });
    expect(fetchStatus).toHaveBeenCalledTimes(6);
  });

  it('rethrows client errors immediately', async () => {
    const notFound = new ApiRequestError('JOB_NOT_FOUND', 404, 'Generation job 3 not found');
    const fetchStatus = vi.fn(async (): Promise<JobStatusDto> => {
      throw notFound;
    });

    await expect(pollGenerationJob(fetchStatus, 3, { sleep: noSleep() })).rejects.toBe(notFound);
    expect(fetchStatus).toHaveBeenCalledTimes(1);
  });
});
