// Blog Generation Orchestrator
// persona -> prompts -> post (generating) -> LLM -> parse -> post (completed|failed)

import { createLogger } from '../../utils/logger.js';
import { AppError, GenerationFailedError } from '../../utils/errors.js';
import { withLLMContext } from '../ai/call-context.js';
import { getActivePersona } from '../personas.js';
import { completePost, createGeneratingPost, failPost } from '../posts.js';
import { buildGenerationPrompt } from './prompts.js';
import { parseGeneratedContent } from './parser.js';
import { getGenerationClient, type TextGenerator } from './generation-client.js';
import { getGenerationJob, transitionJob } from './jobs.js';
import { PROGRESS } from './job-state.js';
import type { BlogPost, GenerationJob } from '../../db/schema.js';
import type { Citation, GenerationSpeed, JsonObject } from '../../types/index.js';

const logger = createLogger('generation:orchestrator');

export interface GeneratePostRequest {
  topic: string;
  personaSlug: string;
  additionalContext?: Record<string, string>;
  speed?: GenerationSpeed;
}

export interface GeneratePostHooks {
  client?: TextGenerator;
  onProgress?: (progress: number) => void;
  onPostCreated?: (post: BlogPost) => void;
}

export interface GeneratedPost {
  post: BlogPost;
  content: string;
  sources: Citation[];
  metadata: JsonObject;
}

function errorDetails(error: unknown): { message: string; code: string; details?: JsonObject } {
  if (error instanceof AppError) {
    const details: JsonObject = {};
    for (const [key, value] of Object.entries(error.details)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value === null) {
        details[key] = value;
      }
    }
    return { message: error.message, code: error.code, details };
  }
  return { message: error instanceof Error ? error.message : String(error), code: 'INTERNAL_ERROR' };
}

/**
 * Runs the pipeline for one post. Validation failures (topic, persona) throw
 * before a post exists; anything after the post is created marks it failed
 * and rethrows.
 */
export async function generateBlogPost(
  request: GeneratePostRequest,
  hooks: GeneratePostHooks = {},
): Promise<GeneratedPost> {
  const client = hooks.client ?? getGenerationClient();
  const speed = request.speed ?? 'normal';
  const report = (progress: number) => hooks.onProgress?.(progress);

  const persona = await getActivePersona(request.personaSlug);
  const { systemPrompt, userPrompt } = buildGenerationPrompt({
    topic: request.topic,
    persona,
    additionalContext: request.additionalContext,
    speed,
  });
  report(PROGRESS.promptsBuilt);

  const post = createGeneratingPost({
    topic: request.topic.trim(),
    personaId: persona.id,
    rawPrompt: userPrompt,
    metadata: { speed, persona: persona.slug },
  });
  const log = logger.withData({ postId: post.id, persona: persona.slug, speed });

  try {
    hooks.onPostCreated?.(post);
    report(PROGRESS.postCreated);
    report(PROGRESS.providerCall);
    const endTimer = log.time('LLM generation');
    const result = await client.generate({
      systemPrompt,
      userPrompt,
      temperature: persona.temperature,
      maxTokens: persona.maxTokens,
      topP: persona.topP,
      speed,
    });
    endTimer();
    report(PROGRESS.responseReceived);

    const parsed = parseGeneratedContent(result.text);
    if (parsed.bodyMarkdown.trim() === '') {
      throw new GenerationFailedError('Model returned an empty response', { provider: result.usage.provider });
    }
    report(PROGRESS.parsed);

    const completed = completePost(post.id, parsed, result.usage);
    log.info('Blog post generated', {
      title: completed.title,
      wordCount: parsed.structure.wordCount,
      retries: result.usage.retryCount,
    });

    return {
      post: completed,
      content: parsed.bodyMarkdown,
      sources: parsed.sources,
      metadata: completed.metadata,
    };
  } catch (error) {
    failPost(post.id, errorDetails(error));
    throw error;
  }
}

export interface JobOutcome {
  job: GenerationJob;
  result: GeneratedPost | null;
  /** The pipeline error when the job failed. */
  error: unknown;
}

/**
 * Drives one queued job to a terminal state. Pipeline failures are recorded
 * on the job and returned, not thrown; only bookkeeping failures (unknown
 * job, illegal transition) propagate.
 */
export async function runGenerationJob(jobId: number, client?: TextGenerator): Promise<JobOutcome> {
  const job = await getGenerationJob(jobId);
  transitionJob(jobId, { type: 'start' });

  const log = logger.withData({ jobId });
  log.info('Generation job started', { topic: job.topic, persona: job.personaSlug });

  let result: GeneratedPost;
  try {
    result = await withLLMContext({ purpose: 'blog-generation', jobId }, () =>
      generateBlogPost(
        {
          topic: job.topic,
          personaSlug: job.personaSlug,
          additionalContext: job.additionalContext,
          speed: job.speed,
        },
        {
          client,
          onProgress: (progress) => {
            transitionJob(jobId, { type: 'progress', progress });
          },
          onPostCreated: (post) => {
            transitionJob(jobId, { type: 'attach-post', blogPostId: post.id });
          },
        },
      ),
    );
  } catch (error) {
    const { message, code } = errorDetails(error);
    const failed = transitionJob(jobId, { type: 'fail', errorMessage: message });
    log.error('Generation job failed', { code, error: message, progress: failed.progress });
    return { job: failed, result: null, error };
  }

  const completed = transitionJob(jobId, { type: 'complete', blogPostId: result.post.id });
  log.info('Generation job completed', { blogPostId: result.post.id });
  return { job: completed, result, error: null };
}
