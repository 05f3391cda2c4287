import { InvalidJobTransitionError } from '../../utils/errors.js';
import type { JobStatus } from '../../types/index.js';

export interface JobSnapshot {
  status: JobStatus;
  progress: number;
  blogPostId: number | null;
  errorMessage: string | null;
}

export type JobEvent =
  | { type: 'start' }
  | { type: 'progress'; progress: number }
  | { type: 'attach-post'; blogPostId: number }
  | { type: 'complete'; blogPostId: number }
  | { type: 'fail'; errorMessage: string };

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['completed', 'failed']);

/** Highest progress a job can report before it completes. */
export const MAX_RUNNING_PROGRESS = 99;

export const PROGRESS = {
  started: 10,
  promptsBuilt: 20,
  postCreated: 25,
  providerCall: 30,
  responseReceived: 80,
  parsed: 90,
  completed: 100,
} as const;

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(MAX_RUNNING_PROGRESS, Math.max(0, Math.round(value)));
}

/**
 * queued -> running -> completed | failed. Terminal states accept no events;
 * progress only moves forward and reaches 100 only on completion.
 */
export function applyJobEvent(job: JobSnapshot, event: JobEvent): JobSnapshot {
  if (isTerminal(job.status)) {
    throw new InvalidJobTransitionError(job.status, event.type);
  }

  switch (event.type) {
    case 'start':
      if (job.status !== 'queued') throw new InvalidJobTransitionError(job.status, event.type);
      return { ...job, status: 'running', progress: Math.max(job.progress, PROGRESS.started) };

    case 'progress':
      return { ...job, progress: Math.max(job.progress, clampProgress(event.progress)) };

    case 'attach-post':
      if (job.status !== 'running') throw new InvalidJobTransitionError(job.status, event.type);
      return { ...job, blogPostId: event.blogPostId };

    case 'complete':
      if (job.status !== 'running') throw new InvalidJobTransitionError(job.status, event.type);
      return { ...job, status: 'completed', progress: PROGRESS.completed, blogPostId: event.blogPostId };

    case 'fail':
      if (job.status !== 'running') throw new InvalidJobTransitionError(job.status, event.type);
      return { ...job, status: 'failed', errorMessage: event.errorMessage };
  }
}
