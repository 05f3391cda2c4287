import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';

const create = vi.hoisted(() => vi.fn());

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create };
  },
}));

import { AnthropicProvider, ProviderRequestError, UsageTracker, usageTracker } from '../../../src/services/ai/clients.js';
import { withLLMContext } from '../../../src/services/ai/call-context.js';
import { llmCalls } from '../../../src/db/schema.js';
import { closeDatabase, setupTestDatabase } from '../../helpers/fakes.js';
import type { AppDatabase } from '../../../src/db/index.js';
import type { CompletionRequest } from '../../../src/services/ai/types.js';

const request: CompletionRequest = {
  model: 'claude-test',
  systemPrompt: 'sys',
  userPrompt: 'hi',
  temperature: 0.5,
  maxTokens: 100,
  timeoutMs: 1000,
};

const models = { model: 'claude-test', fastModel: 'claude-test-fast' };

let db: AppDatabase;

beforeEach(async () => {
  db = await setupTestDatabase();
  create.mockReset();
  usageTracker.reset();
});

afterAll(() => {
  closeDatabase();
});

describe('AnthropicProvider', () => {
  it('picks the model by speed', () => {
    const provider = new AnthropicProvider('test-key', models);
    expect(provider.modelFor('fast')).toBe('claude-test-fast');
    expect(provider.modelFor('normal')).toBe('claude-test');
  });

  it('joins text blocks and reports usage', async () => {
    create.mockResolvedValue({
      content: [
        { type: 'text', text: 'Hello ' },
        { type: 'tool_use', id: 'tool-1', name: 'noop', input: {} },
        { type: 'text', text: 'world' },
      ],
      usage: { input_tokens: 10, output_tokens: 5 },
      stop_reason: 'end_turn',
    });
    const provider = new AnthropicProvider('test-key', models);

    const response = await withLLMContext({ purpose: 'blog-generation', jobId: 7 }, () => provider.complete(request));

    expect(response).toMatchObject({
      text: 'Hello world',
      model: 'claude-test',
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      finishReason: 'end_turn',
    });
    expect(create).toHaveBeenCalledWith(
      {
        model: 'claude-test',
        max_tokens: 100,
        temperature: 0.5,
        system: 'sys',
        messages: [{ role: 'user', content: 'hi' }],
      },
      { timeout: 1000 },
    );
    expect(usageTracker.getStats()).toMatchObject({ requestCount: 1, totalTokens: 15, errorCount: 0 });

    const [logged] = db.select().from(llmCalls).all();
    expect(logged).toMatchObject({ jobId: 7, purpose: 'blog-generation', provider: 'anthropic', success: true, response: 'Hello world' });
  });

  it('wraps SDK errors with their HTTP status', async () => {
    create.mockRejectedValue(Object.assign(new Error('rate limited'), { status: 429 }));
    const provider = new AnthropicProvider('test-key', models);

    const error = await provider.complete(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error).toMatchObject({ provider: 'anthropic', status: 429, retryable: true });
    expect(usageTracker.getStats().errorCount).toBe(1);

    const [logged] = db.select().from(llmCalls).all();
    expect(logged).toMatchObject({ success: false, errorMessage: 'rate limited', purpose: 'unknown' });
  });

  it('fails without an API key', async () => {
    const provider = new AnthropicProvider('', models);
    await expect(provider.complete(request)).rejects.toThrow('ANTHROPIC_API_KEY is not configured');
    expect(create).not.toHaveBeenCalled();
  });
});

describe('ProviderRequestError', () => {
  it('retries timeouts, rate limits and server errors only', () => {
    const retryable = (status?: number) => new ProviderRequestError('anthropic', 'x', status).retryable;
    expect([undefined, 408, 429, 500, 529].map(retryable)).toEqual([true, true, true, true, true]);
    expect([400, 401, 404].map(retryable)).toEqual([false, false, false]);
  });

  it('recognises billing failures', () => {
    expect(new ProviderRequestError('anthropic', 'Your credit balance is too low', 400).isBillingError).toBe(true);
  });
});

describe('UsageTracker', () => {
  it('sums per-model counters', () => {
    const tracker = new UsageTracker();
    tracker.track('a', { inputTokens: 10, outputTokens: 5, totalTokens: 15 }, 100);
    tracker.track('b', { inputTokens: 20, outputTokens: 10, totalTokens: 30 }, 301);
    tracker.trackError('b');

    expect(tracker.getStats()).toEqual({
      totalInputTokens: 30,
      totalOutputTokens: 15,
      totalTokens: 45,
      requestCount: 2,
      errorCount: 1,
      totalLatencyMs: 401,
      avgLatencyMs: 201,
      byModel: {
        a: { inputTokens: 10, outputTokens: 5, totalTokens: 15, requestCount: 1, errorCount: 0, totalLatencyMs: 100 },
        b: { inputTokens: 20, outputTokens: 10, totalTokens: 30, requestCount: 1, errorCount: 1, totalLatencyMs: 301 },
      },
    });
  });
});
