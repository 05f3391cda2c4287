// Typed HTTP client for the blog API. Works with any fetch implementation;
// tests pass an in-process one.

import { z } from 'zod';
import type { EngageRequestBody, GenerateRequestBody, TokenResponse } from '../types/api.js';
import type { PostStatus } from '../types/index.js';
import {
  AnalyticsSchema,
  ApiErrorBodySchema,
  EngageResponseSchema,
  EngagementSchema,
  GenerateResponseSchema,
  JobStatusSchema,
  PersonaSchema,
  PostDetailSchema,
  PostListSchema,
  TokenResponseSchema,
} from './schemas.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface BlogApiClientOptions {
  baseUrl: string;
  fetch?: FetchFn;
  token?: string;
}

export class ApiRequestError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details: unknown;

  constructor(code: string, status: number, message: string, details?: unknown) {
    super(message);
    this.name = 'ApiRequestError';
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

async function toApiError(response: Response): Promise<ApiRequestError> {
  const text = await response.text();
  let body: unknown = null;
  try {
    body = text ? JSON.parse(text) : null;
  } catch {
    body = null;
  }
  const parsed = ApiErrorBodySchema.safeParse(body);
  if (parsed.success) {
    const { code, message, details } = parsed.data.error;
    return new ApiRequestError(code, response.status, message, details);
  }
  return new ApiRequestError('HTTP_ERROR', response.status, `HTTP ${response.status}`, text || undefined);
}

export interface ListPostsParams {
  status?: PostStatus;
  persona?: string;
  limit?: number;
  offset?: number;
}

export interface AnalyticsParams {
  sort?: 'likes' | 'dislikes' | 'reactions' | 'sentiment';
  order?: 'asc' | 'desc';
  limit?: number;
  from?: string;
  to?: string;
}

function queryString(params: Record<string, string | number | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const encoded = search.toString();
  return encoded ? `?${encoded}` : '';
}

export function createBlogApiClient(options: BlogApiClientOptions) {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  let token = options.token;

  async function send(path: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set('X-Request-ID', globalThis.crypto.randomUUID());
    if (init.body !== undefined) headers.set('Content-Type', 'application/json');
    if (token) headers.set('Authorization', `Bearer ${token}`);

    const response = await fetchFn(`${baseUrl}${path}`, { ...init, headers });
    if (!response.ok) {
      throw await toApiError(response);
    }
    return response;
  }

  async function request<T>(schema: z.ZodType<T>, path: string, init: RequestInit = {}): Promise<T> {
    const response = await send(path, init);
    const body: unknown = await response.json();
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ApiRequestError('INVALID_RESPONSE', response.status, `Unexpected response from ${path}`, parsed.error.issues);
    }
    return parsed.data;
  }

  return {
    setToken(next: string | undefined): void {
      token = next;
    },

    async login(username: string, password: string): Promise<TokenResponse> {
      const result = await request(TokenResponseSchema, '/api/auth/token', {
        method: 'POST',
        body: JSON.stringify({ username, password }),
      });
      token = result.token;
      return result;
    },

    generate: (body: GenerateRequestBody, opts: { sync?: boolean } = {}) =>
      request(GenerateResponseSchema, `/api/generate${opts.sync ? '?sync=true' : ''}`, {
        method: 'POST',
        body: JSON.stringify(body),
      }),

    getJobStatus: (jobId: number) => request(JobStatusSchema, `/api/generation-status/${jobId}`),

    listPersonas: () => request(z.array(PersonaSchema), '/api/personas'),
    getPersona: (slug: string) => request(PersonaSchema, `/api/personas/${encodeURIComponent(slug)}`),

    listPosts: (params: ListPostsParams = {}) =>
      request(PostListSchema, `/api/posts${queryString({ ...params })}`),
    getPost: (id: number | string) => request(PostDetailSchema, `/api/posts/${encodeURIComponent(String(id))}`),

    async deletePost(id: number | string): Promise<void> {
      await send(`/api/posts/${encodeURIComponent(String(id))}`, { method: 'DELETE' });
    },

    engage: (body: EngageRequestBody) =>
      request(EngageResponseSchema, '/api/engage', { method: 'POST', body: JSON.stringify(body) }),

    getEngagement: (postId: number | string, sessionId?: string) =>
      request(
        EngagementSchema,
        `/api/posts/${encodeURIComponent(String(postId))}/engagement${queryString({ session_id: sessionId })}`,
      ),

    getAnalytics: (params: AnalyticsParams = {}) =>
      request(AnalyticsSchema, `/api/analytics${queryString({ ...params })}`),
  };
}

export type BlogApiClient = ReturnType<typeof createBlogApiClient>;
