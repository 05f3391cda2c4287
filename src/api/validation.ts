import { z } from 'zod';
import type { Context } from 'hono';
import { ValidationError } from '../utils/errors.js';
import { GENERATION_SPEEDS, POST_STATUSES } from '../types/index.js';
import { ANALYTICS_SORTS } from '../services/analytics.js';

const SessionIdSchema = z.string().trim().min(1, 'session_id is required').max(100, 'session_id is too long');

const isoDate = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO date or date-time');

// POST /api/generate
export const GenerateRequestSchema = z.object({
  topic: z.string({ required_error: 'topic is required' }),
  persona: z.string({ required_error: 'persona is required' }).trim().min(1, 'persona is required'),
  session_id: SessionIdSchema.optional(),
  speed: z.enum(GENERATION_SPEEDS).optional(),
  additional_context: z
    .record(z.union([z.string(), z.number(), z.boolean()]).transform(String))
    .refine((ctx) => Object.keys(ctx).length <= 20, 'additional_context accepts at most 20 entries')
    .optional(),
});

// POST /api/engage
export const EngageRequestSchema = z.object({
  blog_id: z.union([z.number().int().positive(), z.string().trim().min(1)]),
  action: z.string({ required_error: 'action is required' }),
  session_id: SessionIdSchema,
});

// POST /api/auth/token
export const TokenRequestSchema = z.object({
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
});

// GET /api/posts
export const ListPostsQuerySchema = z.object({
  status: z.enum(POST_STATUSES).optional(),
  persona: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

// GET /api/analytics: out-of-range values fall back rather than fail
export const AnalyticsQuerySchema = z.object({
  sort: z.enum(ANALYTICS_SORTS).catch('sentiment'),
  order: z.enum(['asc', 'desc']).catch('desc'),
  limit: z.coerce.number().int().catch(20).transform((n) => Math.max(1, Math.min(n, 100))),
  from: isoDate.optional(),
  to: isoDate.optional(),
});

// GET /api/posts/:id/engagement
export const EngagementQuerySchema = z.object({
  session_id: SessionIdSchema.optional(),
});

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;
export type EngageRequest = z.infer<typeof EngageRequestSchema>;
export type TokenRequest = z.infer<typeof TokenRequestSchema>;
export type ListPostsQuery = z.infer<typeof ListPostsQuerySchema>;
export type AnalyticsQueryParams = z.infer<typeof AnalyticsQuerySchema>;

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function issuesToDetails(error: z.ZodError): { fields: Array<{ path: string; message: string }> } {
  return {
    fields: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

export function parseWith<T>(schema: Schema<T>, input: unknown, message = 'Validation failed'): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, issuesToDetails(result.error));
  }
  return result.data;
}

/**
 * Parses the JSON body against `schema`. Malformed JSON and schema failures
 * both throw `ValidationError`, which the error handler turns into a 400.
 */
export async function validateBody<T>(c: Context, schema: Schema<T>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    throw new ValidationError('Invalid JSON body', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return parseWith(schema, body);
}

export function validateQuery<T>(c: Context, schema: Schema<T>): T {
  return parseWith(schema, c.req.query(), 'Invalid query parameters');
}
