import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenAI } from '@google/genai';
import { config, type LLMProviderName } from '../../config.js';
import { createLogger } from '../../utils/logger.js';
import { withTimeout, createRateLimiter, type RateLimiter } from '../../utils/retry.js';
import { logCall } from './call-logger.js';
import type { GenerationSpeed } from '../../types/index.js';
import type {
  TokenUsage,
  CompletionRequest,
  CompletionResponse,
  LLMProvider,
  UsageStats,
} from './types.js';

const logger = createLogger('ai-clients');

// ---------------------------------------------------------------------------
// Provider errors
// ---------------------------------------------------------------------------

/** Upstream failure with the HTTP status when the SDK exposed one. */
export class ProviderRequestError extends Error {
  readonly provider: string;
  readonly status: number | undefined;

  constructor(provider: string, message: string, status?: number) {
    super(message);
    this.name = 'ProviderRequestError';
    this.provider = provider;
    this.status = status;
  }

  /** 4xx other than timeout/rate-limit won't succeed on retry. */
  get retryable(): boolean {
    if (this.status === undefined) return true;
    if (this.status === 408 || this.status === 429) return true;
    return this.status >= 500;
  }

  get isBillingError(): boolean {
    return this.message.toLowerCase().includes('credit balance is too low');
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function toProviderError(provider: string, error: unknown): ProviderRequestError {
  if (error instanceof ProviderRequestError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderRequestError(provider, message, statusOf(error));
}

// ---------------------------------------------------------------------------
// Usage tracker
// ---------------------------------------------------------------------------
type ModelUsage = UsageStats['byModel'][string];

const zeroUsage = (): ModelUsage => ({
  inputTokens: 0,
  outputTokens: 0,
  totalTokens: 0,
  requestCount: 0,
  errorCount: 0,
  totalLatencyMs: 0,
});

/** In-process counters per model; totals are summed on read. */
export class UsageTracker {
  private readonly models = new Map<string, ModelUsage>();

  private entry(model: string): ModelUsage {
    let usage = this.models.get(model);
    if (!usage) {
      usage = zeroUsage();
      this.models.set(model, usage);
    }
    return usage;
  }

  track(model: string, usage: TokenUsage, latencyMs: number): void {
    const entry = this.entry(model);
    entry.inputTokens += usage.inputTokens;
    entry.outputTokens += usage.outputTokens;
    entry.totalTokens += usage.totalTokens;
    entry.requestCount += 1;
    entry.totalLatencyMs += latencyMs;
  }

  trackError(model: string): void {
    this.entry(model).errorCount += 1;
  }

  getStats(): UsageStats {
    const byModel: UsageStats['byModel'] = {};
    const total = zeroUsage();
    for (const [model, usage] of this.models) {
      byModel[model] = { ...usage };
      total.inputTokens += usage.inputTokens;
      total.outputTokens += usage.outputTokens;
      total.totalTokens += usage.totalTokens;
      total.requestCount += usage.requestCount;
      total.errorCount += usage.errorCount;
      total.totalLatencyMs += usage.totalLatencyMs;
    }
    return {
      totalInputTokens: total.inputTokens,
      totalOutputTokens: total.outputTokens,
      totalTokens: total.totalTokens,
      requestCount: total.requestCount,
      errorCount: total.errorCount,
      totalLatencyMs: total.totalLatencyMs,
      avgLatencyMs: total.requestCount > 0 ? Math.round(total.totalLatencyMs / total.requestCount) : 0,
      byModel,
    };
  }

  reset(): void {
    this.models.clear();
  }
}

export const usageTracker = new UsageTracker();

// ---------------------------------------------------------------------------
// Shared call wrapper: rate limit, timeout, usage tracking, call logging
// ---------------------------------------------------------------------------
interface RawCompletion {
  text: string;
  usage: TokenUsage;
  finishReason?: string;
}

async function trackedCall(
  provider: string,
  limiter: RateLimiter,
  request: CompletionRequest,
  call: () => Promise<RawCompletion>,
): Promise<CompletionResponse> {
  await limiter.acquire();

  logger.info(`${provider} call`, { model: request.model, promptLength: request.userPrompt.length });
  const startTime = performance.now();

  try {
    const raw = await withTimeout(call, {
      timeoutMs: request.timeoutMs,
      message: `${provider} request timed out after ${request.timeoutMs}ms`,
    });
    const latencyMs = Math.round(performance.now() - startTime);

    usageTracker.track(request.model, raw.usage, latencyMs);
    logger.debug(`${provider} response received`, {
      model: request.model,
      inputTokens: raw.usage.inputTokens,
      outputTokens: raw.usage.outputTokens,
      latencyMs,
    });
    logCall({
      provider,
      model: request.model,
      systemPrompt: request.systemPrompt,
      userPrompt: request.userPrompt,
      response: raw.text,
      inputTokens: raw.usage.inputTokens,
      outputTokens: raw.usage.outputTokens,
      totalTokens: raw.usage.totalTokens,
      latencyMs,
      success: true,
      finishReason: raw.finishReason,
    });

    return { ...raw, model: request.model, latencyMs };
  } catch (error) {
    const providerError = toProviderError(provider, error);
    usageTracker.trackError(request.model);
    logger.error(`${provider} generation failed`, {
      model: request.model,
      status: providerError.status,
      error: providerError.message,
    });
    logCall({
      provider,
      model: request.model,
      systemPrompt: request.systemPrompt,
      userPrompt: request.userPrompt,
      latencyMs: Math.round(performance.now() - startTime),
      success: false,
      errorMessage: providerError.message,
    });
    throw providerError;
  }
}

// ---------------------------------------------------------------------------
// Anthropic
// ---------------------------------------------------------------------------
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;
  private readonly limiter = createRateLimiter({ maxRequests: config.ai.requestsPerMinute, windowMs: 60_000 });

  constructor(
    private readonly apiKey: string = config.apiKeys.anthropic,
    private readonly models = config.ai.claude,
  ) {}

  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.apiKey) {
        throw new ProviderRequestError(this.name, 'ANTHROPIC_API_KEY is not configured');
      }
      this.client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  modelFor(speed: GenerationSpeed): string {
    return speed === 'fast' ? this.models.fastModel : this.models.model;
  }

  complete(request: CompletionRequest): Promise<CompletionResponse> {
    return trackedCall(this.name, this.limiter, request, async () => {
      const response = await this.getClient().messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          ...(request.topP !== undefined ? { top_p: request.topP } : {}),
          system: request.systemPrompt,
          messages: [{ role: 'user', content: request.userPrompt }],
        },
        { timeout: request.timeoutMs },
      );

      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');

      return {
        text,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        },
        finishReason: response.stop_reason ?? undefined,
      };
    });
  }
}

// ---------------------------------------------------------------------------
// Gemini
// ---------------------------------------------------------------------------
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini';
  private client: GoogleGenAI | null = null;
  private readonly limiter = createRateLimiter({ maxRequests: config.ai.requestsPerMinute, windowMs: 60_000 });

  constructor(
    private readonly apiKey: string = config.apiKeys.gemini,
    private readonly models = config.ai.gemini,
  ) {}

  private getClient(): GoogleGenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new ProviderRequestError(this.name, 'GEMINI_API_KEY is not configured');
      }
      this.client = new GoogleGenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }

  modelFor(speed: GenerationSpeed): string {
    return speed === 'fast' ? this.models.fastModel : this.models.model;
  }

  complete(request: CompletionRequest): Promise<CompletionResponse> {
    return trackedCall(this.name, this.limiter, request, async () => {
      const response = await this.getClient().models.generateContent({
        model: request.model,
        contents: [{ role: 'user', parts: [{ text: request.userPrompt }] }],
        config: {
          systemInstruction: request.systemPrompt,
          maxOutputTokens: request.maxTokens,
          temperature: request.temperature,
          topP: request.topP,
        },
      });

      const usageMeta = response.usageMetadata;
      const inputTokens = usageMeta?.promptTokenCount ?? 0;
      const outputTokens = usageMeta?.candidatesTokenCount ?? 0;

      return {
        text: response.text ?? '',
        usage: {
          inputTokens,
          outputTokens,
          totalTokens: usageMeta?.totalTokenCount ?? inputTokens + outputTokens,
        },
        finishReason: response.candidates?.[0]?.finishReason ?? undefined,
      };
    });
  }
}

export function createProvider(name: LLMProviderName = config.ai.provider): LLMProvider {
  switch (name) {
    case 'anthropic':
      return new AnthropicProvider();
    case 'gemini':
      return new GeminiProvider();
  }
}
