import type { GenerateRequestBody, JobStatusDto, PostDetailDto } from '../types/api.js';
import type { BlogApiClient } from './api-client.js';
import type { SessionIdentity } from './session.js';
import { pollGenerationJob, type PollOptions } from './poller.js';

export type GenerateAndWaitResult =
  | { outcome: 'completed'; jobId: number; post: PostDetailDto }
  | { outcome: 'failed'; jobId: number; errorMessage: string; job?: JobStatusDto }
  | { outcome: 'cancelled'; jobId: number };

export interface GenerateAndWaitOptions extends PollOptions {
  sync?: boolean;
}

/**
 * Submits a generation request for the session and resolves once the post
 * exists. A completed synchronous response skips polling.
 */
export async function generateAndWait(
  client: BlogApiClient,
  identity: SessionIdentity,
  request: Omit<GenerateRequestBody, 'session_id'>,
  options: GenerateAndWaitOptions = {},
): Promise<GenerateAndWaitResult> {
  const { sync, ...pollOptions } = options;
  const submitted = await client.generate({ ...request, session_id: identity.sessionId }, { sync });

  if (submitted.status === 'completed') {
    const post = await client.getPost(submitted.blog_post_id);
    return { outcome: 'completed', jobId: submitted.job_id, post };
  }

  const jobId = submitted.job_id;
  const result = await pollGenerationJob((id) => client.getJobStatus(id), jobId, pollOptions);

  switch (result.outcome) {
    case 'completed':
      return { outcome: 'completed', jobId, post: await client.getPost(result.blogPostId) };
    case 'failed':
      return { outcome: 'failed', jobId, errorMessage: result.errorMessage, job: result.job };
    case 'cancelled':
      return { outcome: 'cancelled', jobId };
  }
}
