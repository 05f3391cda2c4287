// Job and purpose for provider calls, carried through async call chains so
// the call logger can tag rows without threading arguments.

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LLMCallContext {
  purpose: string;
  jobId?: number;
}

const storage = new AsyncLocalStorage<LLMCallContext>();

export function withLLMContext<T>(ctx: LLMCallContext, fn: () => Promise<T>): Promise<T> {
  return storage.run(ctx, fn);
}

export function currentLLMContext(): LLMCallContext | undefined {
  return storage.getStore();
}
