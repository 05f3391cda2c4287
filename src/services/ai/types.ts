import type { GenerationSpeed } from '../../types/index.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
  topP?: number;
  timeoutMs: number;
}

export interface CompletionResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  finishReason?: string;
  latencyMs: number;
}

/**
 * One hosted LLM. Implementations make a single attempt per call; retry,
 * backoff and circuit breaking are the generation client's job.
 */
export interface LLMProvider {
  readonly name: string;
  modelFor(speed: GenerationSpeed): string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface UsageStats {
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  requestCount: number;
  errorCount: number;
  totalLatencyMs: number;
  avgLatencyMs: number;
  byModel: Record<string, {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
    requestCount: number;
    errorCount: number;
    totalLatencyMs: number;
  }>;
}
