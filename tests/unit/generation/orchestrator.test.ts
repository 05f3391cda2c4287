import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { createGenerationJob } from '../../../src/services/generation/jobs.js';
import { generateBlogPost, runGenerationJob } from '../../../src/services/generation/orchestrator.js';
import { getPost } from '../../../src/services/posts.js';
import { GenerationFailedError, InvalidTopicError } from '../../../src/utils/errors.js';
import { FakeGenerator, closeDatabase, setupTestDatabase } from '../../helpers/fakes.js';

beforeEach(async () => {
  await setupTestDatabase();
});

afterAll(() => {
  closeDatabase();
});

describe('runGenerationJob', () => {
  it('drives a job to completion and stores the post', async () => {
    const generator = new FakeGenerator();
    const job = await createGenerationJob({ topic: 'The future of renewable energy', personaSlug: 'technical' });

    const outcome = await runGenerationJob(job.id, generator);

    expect(outcome.error).toBeNull();
    expect(outcome.job).toMatchObject({ status: 'completed', progress: 100, errorMessage: null });
    expect(outcome.job.blogPostId).toBe(outcome.result?.post.id);

    const post = await getPost(outcome.job.blogPostId ?? 0);
    expect(post.status).toBe('completed');
    expect(post.sentimentScore).toBe(0);
    expect(post.contentStructure?.wordCount).toBeGreaterThan(0);
    expect(post.topicInput).toBe('The future of renewable energy');
    expect(post.metadata).toMatchObject({ speed: 'normal', persona: 'technical', model: 'fake-model' });
  });

  it('passes persona sampling settings to the generator', async () => {
    const generator = new FakeGenerator();
    const job = await createGenerationJob({ topic: 'Solar basics', personaSlug: 'narrative', speed: 'fast' });

    await runGenerationJob(job.id, generator);

    expect(generator.requests[0]).toMatchObject({ temperature: 0.8, maxTokens: 4000, topP: 0.9, speed: 'fast' });
    expect(generator.requests[0].userPrompt).toContain('- Length: 180-260 words');
  });

  it('records generation failures on the job and the post', async () => {
    const error = new GenerationFailedError('Failed to generate content after 3 attempts: down');
    const job = await createGenerationJob({ topic: 'Solar basics', personaSlug: 'technical' });

    const outcome = await runGenerationJob(job.id, new FakeGenerator(error));

    expect(outcome.result).toBeNull();
    expect(outcome.error).toBe(error);
    expect(outcome.job).toMatchObject({
      status: 'failed',
      progress: 30,
      errorMessage: 'Failed to generate content after 3 attempts: down',
    });

    const post = await getPost(outcome.job.blogPostId ?? 0);
    expect(post.status).toBe('failed');
    expect(post.metadata).toMatchObject({
      error: 'Failed to generate content after 3 attempts: down',
      error_code: 'GENERATION_FAILED',
    });
  });

  it('treats an empty response as a failure', async () => {
    const job = await createGenerationJob({ topic: 'Solar basics', personaSlug: 'technical' });

    const outcome = await runGenerationJob(job.id, new FakeGenerator('   '));

    expect(outcome.job).toMatchObject({ status: 'failed', progress: 80, errorMessage: 'Model returned an empty response' });
  });
});

describe('generateBlogPost', () => {
  it('reports progress in pipeline order', async () => {
    const progress: number[] = [];
    await generateBlogPost(
      { topic: 'Solar basics', personaSlug: 'technical' },
      { client: new FakeGenerator(), onProgress: (value) => progress.push(value) },
    );
    expect(progress).toEqual([20, 25, 30, 80, 90]);
  });

  it('marks the post failed when the post-created hook throws', async () => {
    let createdId = 0;
    const attach = (post: { id: number }) => {
      createdId = post.id;
      throw new Error('attach failed');
    };

    await expect(
      generateBlogPost({ topic: 'Solar basics', personaSlug: 'technical' }, { client: new FakeGenerator(), onPostCreated: attach }),
    ).rejects.toThrow('attach failed');

    const post = await getPost(createdId);
    expect(post.status).toBe('failed');
    expect(post.metadata).toMatchObject({ error: 'attach failed', error_code: 'INTERNAL_ERROR' });
  });

  it('throws InvalidTopicError before creating a post', async () => {
    await expect(generateBlogPost({ topic: 'abc', personaSlug: 'technical' }, { client: new FakeGenerator() }))
      .rejects.toThrow(InvalidTopicError);
  });
});
