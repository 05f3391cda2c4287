import { describe, it, expect, vi } from 'vitest';
import { GenerationClient, type GenerateRequest } from '../../../src/services/generation/generation-client.js';
import { ProviderRequestError } from '../../../src/services/ai/clients.js';
import { GenerationFailedError, ProviderUnavailableError } from '../../../src/utils/errors.js';
import { ScriptedProvider, completion } from '../../helpers/fakes.js';

const noSleep = async (_ms: number) => {};

const request: GenerateRequest = {
  systemPrompt: 'system',
  userPrompt: 'user',
  temperature: 0.7,
  maxTokens: 4000,
  topP: 0.9,
};

const baseOptions = {
  maxRetries: 2,
  baseDelayMs: 1,
  timeoutMs: 60_000,
  fastTimeoutMs: 30_000,
  fastMaxTokens: 650,
  circuitFailureThreshold: 3,
  circuitCoolOffMs: 30_000,
  sleep: noSleep,
};

const fail = (message: string, status?: number) => () =>
  Promise.reject(new ProviderRequestError('fake', message, status));

describe('GenerationClient', () => {
  it('retries transient failures and reports the retry count', async () => {
    const provider = new ScriptedProvider([
      fail('overloaded', 529),
      () => Promise.reject(new Error('socket hang up')),
      () => Promise.resolve(completion('# Title\n\nBody')),
    ]);
    const client = new GenerationClient(provider, baseOptions);

    const result = await client.generate(request);

    expect(result.text).toBe('# Title\n\nBody');
    expect(result.usage).toMatchObject({
      model: 'fake-model',
      provider: 'fake',
      inputTokens: 100,
      outputTokens: 50,
      totalTokens: 150,
      retryCount: 2,
    });
    expect(provider.requests).toHaveLength(3);
  });

  it('gives up after maxRetries + 1 attempts', async () => {
    const provider = new ScriptedProvider([fail('down', 500), fail('down', 500), fail('down', 500)]);
    const client = new GenerationClient(provider, baseOptions);

    await expect(client.generate(request)).rejects.toThrow('Failed to generate content after 3 attempts: down');
    expect(provider.requests).toHaveLength(3);
  });

  it('does not retry a rejected request', async () => {
    const provider = new ScriptedProvider([fail('invalid request', 400)]);
    const client = new GenerationClient(provider, baseOptions);

    const error = await client.generate(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFailedError);
    expect(error).toHaveProperty('message', 'fake request failed: invalid request');
    expect(provider.requests).toHaveLength(1);
    expect(client.breaker.check()).toEqual({ state: 'closed', failures: 0 });
  });

  it('reports billing problems distinctly', async () => {
    const provider = new ScriptedProvider([fail('Your credit balance is too low to access the API', 400)]);
    const client = new GenerationClient(provider, baseOptions);

    await expect(client.generate(request)).rejects.toThrow('fake billing issue: insufficient API credits');
  });

  it('caps tokens, shortens the timeout and picks the fast model at fast speed', async () => {
    const provider = new ScriptedProvider([() => Promise.resolve(completion('ok', 'fake-fast'))]);
    const client = new GenerationClient(provider, baseOptions);

    await client.generate({ ...request, speed: 'fast' });

    expect(provider.requests[0]).toMatchObject({ model: 'fake-fast', maxTokens: 650, timeoutMs: 30_000 });
  });

  it('keeps the persona token limit at normal speed', async () => {
    const provider = new ScriptedProvider([() => Promise.resolve(completion('ok'))]);
    const client = new GenerationClient(provider, baseOptions);

    await client.generate(request);

    expect(provider.requests[0]).toMatchObject({ model: 'fake-model', maxTokens: 4000, timeoutMs: 60_000 });
  });

  it('opens the circuit after consecutive failures and closes it after the cool-off', async () => {
    let clock = 1_000_000;
    const now = vi.fn(() => clock);
    const provider = new ScriptedProvider([
      fail('unavailable', 503),
      fail('unavailable', 503),
      () => Promise.resolve(completion('recovered')),
    ]);
    const client = new GenerationClient(provider, {
      ...baseOptions,
      maxRetries: 0,
      circuitFailureThreshold: 2,
      now,
    });

    await expect(client.generate(request)).rejects.toThrow(GenerationFailedError);
    await expect(client.generate(request)).rejects.toThrow(GenerationFailedError);

    const blocked = await client.generate(request).catch((e: unknown) => e);
    expect(blocked).toBeInstanceOf(ProviderUnavailableError);
    expect(blocked).toHaveProperty('retryAfterSeconds', 30);
    expect(provider.requests).toHaveLength(2);

    clock += 30_001;
    await expect(client.generate(request)).resolves.toMatchObject({ text: 'recovered' });
    expect(client.breaker.check()).toEqual({ state: 'closed', failures: 0 });
  });
});
