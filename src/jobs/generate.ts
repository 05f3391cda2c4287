// In-process generation worker. Jobs are queued in memory and run with at
// most `maxConcurrentJobs` in flight; the scheduler sweep re-enqueues any
// `queued` rows the worker isn't holding (e.g. after a restart).

import { config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { QueueUnavailableError } from '../utils/errors.js';
import { runGenerationJob } from '../services/generation/orchestrator.js';
import { listQueuedJobIds } from '../services/generation/jobs.js';

const logger = createLogger('jobs:generate');

const pendingJobs: number[] = [];
const runningJobs = new Map<number, Promise<void>>();
let accepting = true;
let maxConcurrent = Math.max(1, config.generation.maxConcurrentJobs);

export function isAcceptingJobs(): boolean {
  return accepting;
}

export function enqueueGenerationJob(jobId: number): void {
  if (!accepting) {
    throw new QueueUnavailableError();
  }
  if (runningJobs.has(jobId) || pendingJobs.includes(jobId)) {
    return;
  }
  pendingJobs.push(jobId);
  drain();
}

function drain(): void {
  while (runningJobs.size < maxConcurrent && pendingJobs.length > 0) {
    const jobId = pendingJobs.shift();
    if (jobId === undefined) break;
    startJob(jobId);
  }
}

function startJob(jobId: number): void {
  const task = runGenerationJob(jobId)
    .then(({ job }) => {
      logger.debug(`Job ${jobId} finished`, { status: job.status });
    })
    .catch((error: unknown) => {
      logger.error(`Job ${jobId} could not be processed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    })
    .finally(() => {
      runningJobs.delete(jobId);
      drain();
    });

  runningJobs.set(jobId, task);
}

/** Picks up queued rows nobody is working on. */
export async function runGenerationProcessor(): Promise<{ jobsEnqueued: number }> {
  if (!accepting) return { jobsEnqueued: 0 };

  const queued = await listQueuedJobIds(maxConcurrent * 10);
  const fresh = queued.filter((id) => !runningJobs.has(id) && !pendingJobs.includes(id));
  for (const jobId of fresh) {
    enqueueGenerationJob(jobId);
  }

  if (fresh.length > 0) {
    logger.info(`Found ${queued.length} queued jobs, enqueued ${fresh.length}`);
  }
  return { jobsEnqueued: fresh.length };
}

/** Resolves once nothing is pending or running. */
export async function waitForIdle(): Promise<void> {
  while (runningJobs.size > 0 || pendingJobs.length > 0) {
    await Promise.allSettled(Array.from(runningJobs.values()));
  }
}

export function getWorkerStats(): { running: number; pending: number; accepting: boolean; maxConcurrent: number } {
  return { running: runningJobs.size, pending: pendingJobs.length, accepting, maxConcurrent };
}

/** Stops accepting work and waits for in-flight jobs. Queued rows stay queued. */
export async function stopGenerationWorker(): Promise<void> {
  accepting = false;
  pendingJobs.length = 0;
  await waitForIdle();
  logger.info('Generation worker stopped');
}

export function startGenerationWorker(options: { maxConcurrentJobs?: number } = {}): void {
  maxConcurrent = Math.max(1, options.maxConcurrentJobs ?? config.generation.maxConcurrentJobs);
  accepting = true;
  logger.info('Generation worker started', { maxConcurrent });
}
