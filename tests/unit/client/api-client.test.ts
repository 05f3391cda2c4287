import { describe, it, expect, beforeEach, afterEach, afterAll } from 'vitest';
import { createApi } from '../../../src/api/index.js';
import { resetRateLimits } from '../../../src/api/middleware/rate-limit.js';
import { setGenerationClient } from '../../../src/services/generation/generation-client.js';
import { startGenerationWorker, stopGenerationWorker, waitForIdle } from '../../../src/jobs/generate.js';
import {
  ApiRequestError,
  SessionIdentity,
  createBlogApiClient,
  createMemoryStore,
  generateAndWait,
  type FetchFn,
} from '../../../src/client/index.js';
import { FakeGenerator, closeDatabase, setupTestDatabase } from '../../helpers/fakes.js';
import { createCompleted } from '../../helpers/posts.js';

const SESSION = 'a3bb189e-8bf9-4888-9912-ace4e6543002';

const app = createApi();
const inProcessFetch: FetchFn = async (input, init) => app.request(input, init);
const client = createBlogApiClient({ baseUrl: 'http://localhost/', fetch: inProcessFetch });
const identity = new SessionIdentity(createMemoryStore(), () => SESSION);

beforeEach(async () => {
  await setupTestDatabase();
  resetRateLimits();
  setGenerationClient(new FakeGenerator());
  startGenerationWorker({ maxConcurrentJobs: 2 });
});

afterEach(async () => {
  await stopGenerationWorker();
  setGenerationClient(null);
});

afterAll(() => {
  closeDatabase();
});

describe('createBlogApiClient against the API', () => {
  it('lists personas', async () => {
    const personas = await client.listPersonas();
    expect(personas.map((p) => p.slug)).toEqual(['technical', 'narrative', 'analyst', 'educator']);
    expect((await client.getPersona('analyst')).persona_type).toBe('analyst');
  });

  it('maps error bodies to ApiRequestError', async () => {
    const error = await client.getPost(999).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({ code: 'POST_NOT_FOUND', status: 404, message: 'Blog post 999 not found' });
  });

  it('reacts and reads back the session reaction', async () => {
    const post = createCompleted('Solar basics');

    const result = await client.engage({ blog_id: post.id, action: 'dislike', session_id: SESSION });
    expect(result).toMatchObject({ new_score: -1, was_toggle: false, dislikes_count: 1 });

    const summary = await client.getEngagement(post.id, SESSION);
    expect(summary).toMatchObject({ dislikes: 1, user_action: 'dislike' });
  });

  it('filters the post list and deletes', async () => {
    const post = createCompleted('Solar basics');

    const list = await client.listPosts({ status: 'completed', persona: 'technical' });
    expect(list.results.map((p) => p.id)).toEqual([post.id]);

    await client.deletePost(post.id);
    expect((await client.listPosts()).count).toBe(0);
  });

  it('reads analytics', async () => {
    createCompleted('Solar basics');
    expect(await client.getAnalytics({ sort: 'likes' })).toMatchObject({ total_posts: 1, total_likes: 0 });
  });
});

describe('generateAndWait', () => {
  it('polls a queued job until the post exists', async () => {
    const progress: string[] = [];
    const result = await generateAndWait(
      client,
      identity,
      { topic: 'The future of renewable energy', persona: 'technical' },
      { sleep: () => waitForIdle(), onProgress: (job) => progress.push(job.status) },
    );

    if (result.outcome !== 'completed') throw new Error(`expected completion, got ${result.outcome}`);
    expect(result.post.title).toBe('The Future of Renewable Energy');
    expect(progress[progress.length - 1]).toBe('completed');
  });

  it('returns the post straight away for a synchronous request', async () => {
    const result = await generateAndWait(
      client,
      identity,
      { topic: 'The future of renewable energy', persona: 'narrative' },
      { sync: true },
    );

    expect(result).toMatchObject({ outcome: 'completed', jobId: 1, post: { persona: { slug: 'narrative' } } });
  });

  it('reports a failed job', async () => {
    setGenerationClient(new FakeGenerator(new Error('socket hang up')));

    const result = await generateAndWait(
      client,
      identity,
      { topic: 'Solar basics', persona: 'technical' },
      { sleep: () => waitForIdle() },
    );

    expect(result).toMatchObject({ outcome: 'failed', jobId: 1, errorMessage: 'socket hang up' });
  });
});

describe('createBlogApiClient transport', () => {
  function recordingFetch(response: () => Response) {
    const calls: Array<{ url: string; headers: Headers; method: string | undefined }> = [];
    const fetchFn: FetchFn = async (input, init) => {
      calls.push({ url: input, headers: new Headers(init?.headers), method: init?.method });
      return response();
    };
    return { calls, fetchFn };
  }

  const json = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

  it('sends the bearer token and JSON headers', async () => {
    const { calls, fetchFn } = recordingFetch(() => json({ success: true, job_id: 3, status: 'queued' }, 202));
    const api = createBlogApiClient({ baseUrl: 'http://api.test', fetch: fetchFn, token: 'test-token' });

    expect(await api.generate({ topic: 'Solar basics', persona: 'technical' }, { sync: true })).toEqual({
      success: true,
      job_id: 3,
      status: 'queued',
    });

    expect(calls[0].url).toBe('http://api.test/api/generate?sync=true');
    expect(calls[0].method).toBe('POST');
    expect(calls[0].headers.get('Authorization')).toBe('Bearer test-token');
    expect(calls[0].headers.get('Content-Type')).toBe('application/json');
    expect(calls[0].headers.get('X-Request-ID')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('stores the token from login', async () => {
    const { calls, fetchFn } = recordingFetch(() => json({ token: 'test-token', expires_in: '7d' }));
    const api = createBlogApiClient({ baseUrl: 'http://api.test', fetch: fetchFn });

    await api.login('admin', 'test-password');
    await api.login('admin', 'test-password');

    expect(calls[0].headers.get('Authorization')).toBeNull();
    expect(calls[1].headers.get('Authorization')).toBe('Bearer test-token');
  });

  it('reports non-JSON failures by status', async () => {
    const { fetchFn } = recordingFetch(() => new Response('upstream exploded', { status: 502 }));
    const api = createBlogApiClient({ baseUrl: 'http://api.test', fetch: fetchFn });

    await expect(api.listPersonas()).rejects.toMatchObject({
      code: 'HTTP_ERROR',
      status: 502,
      message: 'HTTP 502',
      details: 'upstream exploded',
    });
  });

  it('rejects bodies that do not match the expected shape', async () => {
    const { fetchFn } = recordingFetch(() => json({ unexpected: true }));
    const api = createBlogApiClient({ baseUrl: 'http://api.test', fetch: fetchFn });

    await expect(api.getJobStatus(1)).rejects.toMatchObject({ code: 'INVALID_RESPONSE', status: 200 });
  });
});
