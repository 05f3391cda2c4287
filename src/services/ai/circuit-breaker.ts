import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ai:circuit-breaker');

export interface CircuitBreakerOptions {
  failureThreshold: number;
  coolOffMs: number;
  now?: () => number;
}

export type CircuitState =
  | { state: 'closed'; failures: number }
  | { state: 'open'; failures: number; retryAfterSeconds: number };

/**
 * Consecutive-failure breaker. After `failureThreshold` recorded failures the
 * circuit opens for `coolOffMs`; any success resets it.
 */
export class CircuitBreaker {
  private failures = 0;
  private openUntil = 0;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    private readonly options: CircuitBreakerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  check(): CircuitState {
    const remainingMs = this.openUntil - this.now();
    if (remainingMs > 0) {
      return {
        state: 'open',
        failures: this.failures,
        retryAfterSeconds: Math.max(1, Math.ceil(remainingMs / 1000)),
      };
    }
    return { state: 'closed', failures: this.failures };
  }

  recordSuccess(): void {
    this.failures = 0;
    this.openUntil = 0;
  }

  recordFailure(): void {
    this.failures++;
    if (this.failures >= this.options.failureThreshold) {
      this.openUntil = this.now() + this.options.coolOffMs;
      logger.warn('Circuit opened', {
        provider: this.name,
        failures: this.failures,
        coolOffMs: this.options.coolOffMs,
      });
    }
  }

  reset(): void {
    this.recordSuccess();
  }
}
