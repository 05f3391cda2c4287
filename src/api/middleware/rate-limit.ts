import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { errorBody } from './error-handler.js';
import type { AppEnv } from '../types.js';

export interface WindowDecision {
  allowed: boolean;
  remaining: number;
  resetAt: number;
  retryAfterSeconds: number;
}

/** Per-key request counters over fixed windows. */
export class FixedWindowCounter {
  private readonly windows = new Map<string, { count: number; resetAt: number }>();

  hit(key: string, limit: number, windowMs: number, now: number = Date.now()): WindowDecision {
    let window = this.windows.get(key);
    if (!window || window.resetAt <= now) {
      window = { count: 0, resetAt: now + windowMs };
      this.windows.set(key, window);
    }
    window.count++;

    return {
      allowed: window.count <= limit,
      remaining: Math.max(0, limit - window.count),
      resetAt: window.resetAt,
      retryAfterSeconds: Math.ceil((window.resetAt - now) / 1000),
    };
  }

  prune(now: number = Date.now()): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) this.windows.delete(key);
    }
  }

  clear(): void {
    this.windows.clear();
  }
}

const counter = new FixedWindowCounter();

const pruneTimer = setInterval(() => counter.prune(), 5 * 60 * 1000);
pruneTimer.unref();

export function clientIp(c: Context): string {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim()
    || c.req.header('x-real-ip')
    || 'unknown';
}

/** Fixed-window limit per client IP, method and path. */
export function rateLimit(maxRequests: number, windowMs: number = 60_000) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const decision = counter.hit(`${clientIp(c)}:${c.req.method}:${c.req.path}`, maxRequests, windowMs);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(decision.remaining));
    c.header('X-RateLimit-Reset', String(Math.ceil(decision.resetAt / 1000)));

    if (!decision.allowed) {
      c.header('Retry-After', String(decision.retryAfterSeconds));
      return c.json(errorBody('RATE_LIMITED', 'Too many requests', { retryAfter: decision.retryAfterSeconds }), 429);
    }

    await next();
  });
}

export function resetRateLimits(): void {
  counter.clear();
}
