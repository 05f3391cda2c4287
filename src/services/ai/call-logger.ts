import { getDatabase } from '../../db/index.js';
import { llmCalls, type LLMCall } from '../../db/schema.js';
import { generateId } from '../../utils/hash.js';
import { createLogger } from '../../utils/logger.js';
import { currentLLMContext, type LLMCallContext } from './call-context.js';

const logger = createLogger('ai:call-logger');

export interface LogCallData {
  provider: string;
  model: string;
  purpose?: string;
  jobId?: number;
  systemPrompt?: string;
  userPrompt: string;
  response?: string;
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
  latencyMs?: number;
  success?: boolean;
  errorMessage?: string;
  finishReason?: string;
}

/** Explicit values win over the surrounding call context. */
export function buildCallRow(data: LogCallData, ctx: LLMCallContext | undefined, at: string): LLMCall {
  return {
    id: generateId(),
    jobId: data.jobId ?? ctx?.jobId ?? null,
    timestamp: at,
    provider: data.provider,
    model: data.model,
    purpose: data.purpose ?? ctx?.purpose ?? 'unknown',
    systemPrompt: data.systemPrompt ?? null,
    userPrompt: data.userPrompt,
    response: data.response ?? null,
    inputTokens: data.inputTokens ?? 0,
    outputTokens: data.outputTokens ?? 0,
    totalTokens: data.totalTokens ?? 0,
    latencyMs: data.latencyMs ?? 0,
    success: data.success ?? true,
    errorMessage: data.errorMessage ?? null,
    finishReason: data.finishReason ?? null,
    createdAt: at,
  };
}

/** Writes one llm_calls row. A failed insert is logged, never thrown. */
export function logCall(data: LogCallData): void {
  const row = buildCallRow(data, currentLLMContext(), new Date().toISOString());
  try {
    getDatabase().insert(llmCalls).values(row).run();
  } catch (err) {
    logger.warn('Failed to log LLM call', {
      model: row.model,
      purpose: row.purpose,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
