// Generation Client: one provider behind bounded retry, exponential backoff,
// per-attempt timeout and a per-provider circuit breaker.

import { config } from '../../config.js';
import { createLogger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { GenerationFailedError, ProviderUnavailableError } from '../../utils/errors.js';
import { CircuitBreaker } from '../ai/circuit-breaker.js';
import { createProvider, ProviderRequestError } from '../ai/clients.js';
import type { LLMProvider } from '../ai/types.js';
import type { GenerationSpeed, GenerationUsage } from '../../types/index.js';

const logger = createLogger('generation:client');

export interface GenerateRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
  topP?: number;
  speed?: GenerationSpeed;
}

export interface GenerateResult {
  text: string;
  usage: GenerationUsage;
}

export interface TextGenerator {
  readonly providerName: string;
  generate(request: GenerateRequest): Promise<GenerateResult>;
}

export interface GenerationClientOptions {
  maxRetries: number;
  baseDelayMs: number;
  timeoutMs: number;
  fastTimeoutMs: number;
  fastMaxTokens: number;
  circuitFailureThreshold: number;
  circuitCoolOffMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const DEFAULT_CLIENT_OPTIONS: GenerationClientOptions = {
  maxRetries: config.ai.maxRetries,
  baseDelayMs: config.ai.retryBaseDelayMs,
  timeoutMs: config.ai.timeoutMs,
  fastTimeoutMs: config.ai.fastTimeoutMs,
  fastMaxTokens: config.ai.fastMaxTokens,
  circuitFailureThreshold: config.ai.circuitFailureThreshold,
  circuitCoolOffMs: config.ai.circuitCoolOffSeconds * 1000,
};

export class GenerationClient implements TextGenerator {
  private readonly options: GenerationClientOptions;
  readonly breaker: CircuitBreaker;

  constructor(
    private readonly provider: LLMProvider,
    options: Partial<GenerationClientOptions> = {},
  ) {
    this.options = { ...DEFAULT_CLIENT_OPTIONS, ...options };
    this.breaker = new CircuitBreaker(provider.name, {
      failureThreshold: this.options.circuitFailureThreshold,
      coolOffMs: this.options.circuitCoolOffMs,
      now: this.options.now,
    });
  }

  get providerName(): string {
    return this.provider.name;
  }

  resolveMaxTokens(maxTokens: number, speed: GenerationSpeed): number {
    return speed === 'fast' ? Math.min(maxTokens, this.options.fastMaxTokens) : maxTokens;
  }

  resolveTimeoutMs(speed: GenerationSpeed): number {
    return speed === 'fast'
      ? Math.min(this.options.timeoutMs, this.options.fastTimeoutMs)
      : this.options.timeoutMs;
  }

  /**
   * Makes up to `maxRetries + 1` attempts. Intermediate failures are logged
   * and swallowed; the last one (or the first non-retryable one) surfaces as
   * `GenerationFailedError`. An open circuit fails immediately with
   * `ProviderUnavailableError`.
   */
  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const circuit = this.breaker.check();
    if (circuit.state === 'open') {
      throw new ProviderUnavailableError(this.provider.name, circuit.retryAfterSeconds);
    }

    const speed = request.speed ?? 'normal';
    const model = this.provider.modelFor(speed);
    const maxTokens = this.resolveMaxTokens(request.maxTokens, speed);
    const timeoutMs = this.resolveTimeoutMs(speed);
    const startTime = performance.now();
    let retryCount = 0;

    try {
      const response = await withRetry(
        () => this.provider.complete({
          model,
          systemPrompt: request.systemPrompt,
          userPrompt: request.userPrompt,
          temperature: request.temperature,
          maxTokens,
          topP: request.topP,
          timeoutMs,
        }),
        {
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.baseDelayMs,
          backoffMultiplier: 2,
          retryOn: (error) => !(error instanceof ProviderRequestError) || error.retryable,
          onRetry: (_error, attempt) => {
            retryCount = attempt;
          },
          sleep: this.options.sleep,
        },
      );

      this.breaker.recordSuccess();

      return {
        text: response.text,
        usage: {
          model: response.model,
          provider: this.provider.name,
          inputTokens: response.usage.inputTokens,
          outputTokens: response.usage.outputTokens,
          totalTokens: response.usage.totalTokens,
          generationTimeSeconds: Math.round((performance.now() - startTime) / 10) / 100,
          retryCount,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const status = error instanceof ProviderRequestError ? error.status : undefined;
      const retryable = !(error instanceof ProviderRequestError) || error.retryable;

      // a rejected request says nothing about provider health
      if (retryable) {
        this.breaker.recordFailure();
      }

      logger.error('Generation failed', { provider: this.provider.name, model, status, attempts: retryCount + 1, error: message });

      if (error instanceof ProviderRequestError && error.isBillingError) {
        throw new GenerationFailedError(
          `${this.provider.name} billing issue: insufficient API credits`,
          { provider: this.provider.name, status, upstream: message },
        );
      }
      if (!retryable) {
        throw new GenerationFailedError(`${this.provider.name} request failed: ${message}`, {
          provider: this.provider.name,
          status,
          upstream: message,
        });
      }
      throw new GenerationFailedError(
        `Failed to generate content after ${retryCount + 1} attempts: ${message}`,
        { provider: this.provider.name, status, upstream: message, attempts: retryCount + 1 },
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Process-wide client (swappable for tests and alternate providers)
// ---------------------------------------------------------------------------
let activeClient: TextGenerator | null = null;

export function getGenerationClient(): TextGenerator {
  if (!activeClient) {
    activeClient = new GenerationClient(createProvider());
  }
  return activeClient;
}

export function setGenerationClient(client: TextGenerator | null): void {
  activeClient = client;
}
