import { initializeDatabase, closeDatabase, type AppDatabase } from '../../src/db/index.js';
import type { CompletionRequest, CompletionResponse, LLMProvider } from '../../src/services/ai/types.js';
import type { GenerateRequest, GenerateResult, TextGenerator } from '../../src/services/generation/generation-client.js';
import type { GenerationSpeed } from '../../src/types/index.js';

export const SAMPLE_ARTICLE = [
  '# The Future of Renewable Energy',
  '',
  'Solar and wind keep getting cheaper every year.',
  '',
  '## Storage Is the Bottleneck',
  '',
  'Batteries smooth out supply when the sun sets.',
  '',
  '## Sources',
  '',
  '- [Energy Outlook](https://www.example.org/outlook)',
  '- [Grid Study](https://grid.example.com/study)',
].join('\n');

export function completion(text: string, model = 'fake-model'): CompletionResponse {
  return {
    text,
    model,
    usage: { inputTokens: 100, outputTokens: 50, totalTokens: 150 },
    latencyMs: 5,
  };
}

/** Provider whose responses are scripted per call. */
export class ScriptedProvider implements LLMProvider {
  readonly name = 'fake';
  readonly requests: CompletionRequest[] = [];
  private readonly script: Array<() => Promise<CompletionResponse>>;

  constructor(script: Array<() => Promise<CompletionResponse>>) {
    this.script = [...script];
  }

  modelFor(speed: GenerationSpeed): string {
    return speed === 'fast' ? 'fake-fast' : 'fake-model';
  }

  complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const next = this.script.shift();
    if (!next) return Promise.reject(new Error('script exhausted'));
    return next();
  }
}

/** Generator that returns fixed text, or throws the given error. */
export class FakeGenerator implements TextGenerator {
  readonly providerName = 'fake';
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly outcome: string | Error = SAMPLE_ARTICLE) {}

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    this.requests.push(request);
    if (this.outcome instanceof Error) throw this.outcome;
    return { text: this.outcome, usage: { ...FAKE_USAGE } };
  }
}

export async function setupTestDatabase(): Promise<AppDatabase> {
  closeDatabase();
  return initializeDatabase(':memory:');
}

export { closeDatabase };

export const FAKE_USAGE = {
  model: 'fake-model',
  provider: 'fake',
  inputTokens: 100,
  outputTokens: 50,
  totalTokens: 150,
  generationTimeSeconds: 0.5,
  retryCount: 0,
};
