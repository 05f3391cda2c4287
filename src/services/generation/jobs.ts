// Job/Status Tracker persistence. Every state change goes through
// applyJobEvent inside an immediate transaction on the job row.

import { asc, eq } from 'drizzle-orm';
import { getDatabase } from '../../db/index.js';
import { blogPosts, generationJobs, type GenerationJob } from '../../db/schema.js';
import { JobNotFoundError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { getActivePersona } from '../personas.js';
import { validateTopic } from './prompts.js';
import { applyJobEvent, isTerminal, type JobEvent } from './job-state.js';
import type { GenerationSpeed } from '../../types/index.js';

const logger = createLogger('generation:jobs');

export interface CreateJobInput {
  topic: string;
  personaSlug: string;
  sessionId?: string | null;
  speed?: GenerationSpeed;
  additionalContext?: Record<string, string>;
}

/**
 * Validates the request and stores a `queued` job. Invalid topics and
 * unknown personas throw before anything is written.
 */
export async function createGenerationJob(input: CreateJobInput): Promise<GenerationJob> {
  const topic = validateTopic(input.topic);
  await getActivePersona(input.personaSlug);

  const job = getDatabase().insert(generationJobs).values({
    topic,
    personaSlug: input.personaSlug,
    sessionId: input.sessionId ?? null,
    speed: input.speed ?? 'normal',
    additionalContext: input.additionalContext ?? {},
    status: 'queued',
    progress: 0,
  }).returning().get();

  logger.info('Generation job created', { jobId: job.id, persona: input.personaSlug, speed: job.speed });
  return job;
}

export async function getGenerationJob(jobId: number): Promise<GenerationJob> {
  const job = await getDatabase().query.generationJobs.findFirst({
    where: eq(generationJobs.id, jobId),
  });
  if (!job) {
    throw new JobNotFoundError(jobId);
  }
  return job;
}

export function transitionJob(jobId: number, event: JobEvent): GenerationJob {
  const db = getDatabase();

  return db.transaction((tx) => {
    const job = tx.select().from(generationJobs).where(eq(generationJobs.id, jobId)).get();
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    const next = applyJobEvent(job, event);
    const now = new Date().toISOString();

    const updated = tx.update(generationJobs)
      .set({
        status: next.status,
        progress: next.progress,
        blogPostId: next.blogPostId,
        errorMessage: next.errorMessage,
        updatedAt: now,
        ...(event.type === 'start' ? { startedAt: now } : {}),
        ...(isTerminal(next.status) ? { completedAt: now } : {}),
      })
      .where(eq(generationJobs.id, jobId))
      .returning()
      .get();

    if (job.status !== updated.status) {
      logger.debug('Job transitioned', { jobId, from: job.status, to: updated.status, progress: updated.progress });
    }
    return updated;
  }, { behavior: 'immediate' });
}

export async function listQueuedJobIds(limit: number): Promise<number[]> {
  const rows = await getDatabase().query.generationJobs.findMany({
    where: eq(generationJobs.status, 'queued'),
    orderBy: [asc(generationJobs.createdAt), asc(generationJobs.id)],
    columns: { id: true },
    limit,
  });
  return rows.map((row) => row.id);
}

/**
 * Fails jobs (and their posts) left mid-generation by a process that died.
 * Only safe at startup, before this process has started any job.
 */
export function failInterruptedJobs(): number {
  const db = getDatabase();
  const now = new Date().toISOString();

  const interrupted = db.update(generationJobs)
    .set({
      status: 'failed',
      errorMessage: 'Generation was interrupted by a server restart',
      updatedAt: now,
      completedAt: now,
    })
    .where(eq(generationJobs.status, 'running'))
    .returning({ id: generationJobs.id })
    .all();

  const orphanedPosts = db.update(blogPosts)
    .set({ status: 'failed', updatedAt: now })
    .where(eq(blogPosts.status, 'generating'))
    .returning({ id: blogPosts.id })
    .all();

  if (interrupted.length > 0 || orphanedPosts.length > 0) {
    logger.warn('Marked interrupted jobs as failed', {
      jobIds: interrupted.map((row) => row.id),
      postIds: orphanedPosts.map((row) => row.id),
    });
  }
  return interrupted.length;
}
