// POST /api/generate and GET /api/generation-status/:jobId

import { Hono } from 'hono';
import { config } from '../../config.js';
import { createLogger } from '../../utils/logger.js';
import { AppError, GenerationFailedError, QueueUnavailableError, ValidationError } from '../../utils/errors.js';
import { createGenerationJob, getGenerationJob } from '../../services/generation/jobs.js';
import { runGenerationJob } from '../../services/generation/orchestrator.js';
import { enqueueGenerationJob, isAcceptingJobs } from '../../jobs/generate.js';
import { GenerateRequestSchema, validateBody } from '../validation.js';
import { serializeCitation, serializeJob } from '../serializers.js';
import { adminAuth } from '../middleware/auth.js';
import type { GenerateCompletedResponse, GenerateQueuedResponse } from '../../types/api.js';
import type { AppEnv } from '../types.js';

const logger = createLogger('api:generate');

const app = new Hono<AppEnv>();

app.post('/generate', adminAuth(), async (c) => {
  const body = await validateBody(c, GenerateRequestSchema);

  const syncRequested = c.req.query('sync') === 'true' || config.generation.mode === 'inline';
  const queueUp = isAcceptingJobs();
  if (!syncRequested && !queueUp && !config.generation.syncFallback) {
    throw new QueueUnavailableError();
  }

  const job = await createGenerationJob({
    topic: body.topic,
    personaSlug: body.persona,
    sessionId: body.session_id,
    speed: body.speed,
    additionalContext: body.additional_context,
  });

  if (!syncRequested && queueUp) {
    enqueueGenerationJob(job.id);
    const queued: GenerateQueuedResponse = { success: true, job_id: job.id, status: 'queued' };
    return c.json(queued, 202);
  }

  if (!syncRequested) {
    logger.warn('Queue unavailable, generating inline', { jobId: job.id });
  }

  const outcome = await runGenerationJob(job.id);
  if (!outcome.result) {
    if (outcome.error instanceof AppError) throw outcome.error;
    throw new GenerationFailedError(outcome.job.errorMessage ?? 'Generation failed', { jobId: job.id });
  }

  const completed: GenerateCompletedResponse = {
    success: true,
    status: 'completed',
    job_id: outcome.job.id,
    blog_post_id: outcome.result.post.id,
    content: outcome.result.content,
    sources: outcome.result.sources.map(serializeCitation),
    metadata: outcome.result.metadata,
  };
  return c.json(completed, 201);
});

app.get('/generation-status/:jobId', adminAuth(), async (c) => {
  const raw = c.req.param('jobId');
  const jobId = Number(raw);
  if (!Number.isInteger(jobId) || jobId < 1) {
    throw new ValidationError('jobId must be a positive integer', { jobId: raw });
  }
  const job = await getGenerationJob(jobId);
  return c.json(serializeJob(job));
});

export default app;
