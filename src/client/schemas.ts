// Response schemas for the API client. Each is pinned to its DTO type so the
// wire contract and the server's serializers cannot drift apart silently.

import { z } from 'zod';
import { ENGAGEMENT_ACTIONS, JOB_STATUSES, PERSONA_TYPES, POST_STATUSES } from '../types/index.js';
import type { JsonObject, JsonValue } from '../types/index.js';
import type {
  AnalyticsDto,
  CitationDto,
  ContentStructureDto,
  EngageResponse,
  EngagementDto,
  GenerateResponse,
  JobStatusDto,
  PersonaDto,
  PersonaSummaryDto,
  PostDetailDto,
  PostListDto,
  PostListItemDto,
  TokenResponse,
} from '../types/api.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);
const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

export const ApiErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

export const CitationSchema: z.ZodType<CitationDto> = z.object({
  title: z.string(),
  url: z.string(),
  domain: z.string(),
  is_verified: z.boolean(),
  relevance_score: z.number().nullable(),
});

const ContentStructureSchema: z.ZodType<ContentStructureDto> = z.object({
  word_count: z.number(),
  heading_count: z.number(),
  reading_time_minutes: z.number(),
  headings: z.array(z.object({ level: z.number(), text: z.string() })),
});

export const PersonaSchema: z.ZodType<PersonaDto> = z.object({
  id: z.number(),
  name: z.string(),
  slug: z.string(),
  persona_type: z.enum(PERSONA_TYPES),
  description: z.string(),
  temperature: z.number(),
  max_tokens: z.number(),
  top_p: z.number(),
  display_order: z.number(),
});

const PersonaSummarySchema: z.ZodType<PersonaSummaryDto> = z.object({
  name: z.string(),
  slug: z.string(),
  persona_type: z.enum(PERSONA_TYPES),
});

export const GenerateResponseSchema: z.ZodType<GenerateResponse> = z.union([
  z.object({
    success: z.literal(true),
    job_id: z.number(),
    status: z.literal('queued'),
  }),
  z.object({
    success: z.literal(true),
    status: z.literal('completed'),
    job_id: z.number(),
    blog_post_id: z.number(),
    content: z.string(),
    sources: z.array(CitationSchema),
    metadata: JsonObjectSchema,
  }),
]);

export const JobStatusSchema: z.ZodType<JobStatusDto> = z.object({
  id: z.number(),
  status: z.enum(JOB_STATUSES),
  progress: z.number(),
  blog_post_id: z.number().nullable(),
  error_message: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const postListItemShape = {
  id: z.number(),
  public_id: z.string(),
  title: z.string(),
  slug: z.string(),
  topic_input: z.string(),
  status: z.enum(POST_STATUSES),
  sentiment_score: z.number(),
  persona: PersonaSummarySchema.nullable(),
  word_count: z.number(),
  reading_time_minutes: z.number(),
  created_at: z.string(),
  published_at: z.string().nullable(),
};

const PostListItemSchema: z.ZodType<PostListItemDto> = z.object(postListItemShape);

export const PostListSchema: z.ZodType<PostListDto> = z.object({
  count: z.number(),
  results: z.array(PostListItemSchema),
});

export const PostDetailSchema: z.ZodType<PostDetailDto> = z.object({
  ...postListItemShape,
  generated_content: z.string(),
  content_structure: ContentStructureSchema.nullable(),
  sources: z.array(CitationSchema),
  metadata: JsonObjectSchema,
  is_featured: z.boolean(),
  seo_title: z.string().nullable(),
  meta_description: z.string().nullable(),
  keywords: z.array(z.string()),
  views: z.number(),
  updated_at: z.string(),
});

export const EngageResponseSchema: z.ZodType<EngageResponse> = z.object({
  success: z.literal(true),
  action: z.enum(ENGAGEMENT_ACTIONS),
  new_score: z.number(),
  was_toggle: z.boolean(),
  likes_count: z.number(),
  dislikes_count: z.number(),
});

export const EngagementSchema: z.ZodType<EngagementDto> = z.object({
  post_id: z.number(),
  title: z.string(),
  sentiment_score: z.number(),
  likes: z.number(),
  dislikes: z.number(),
  total_engagements: z.number(),
  views: z.number(),
  engagement_rate: z.number(),
  user_action: z.enum(ENGAGEMENT_ACTIONS).nullable(),
});

export const AnalyticsSchema: z.ZodType<AnalyticsDto> = z.object({
  total_posts: z.number(),
  total_engagements: z.number(),
  total_likes: z.number(),
  total_dislikes: z.number(),
  reaction_rate: z.number(),
  avg_sentiment_score: z.number(),
  top_posts: z.array(z.object({
    id: z.number(),
    title: z.string(),
    slug: z.string(),
    sentiment_score: z.number(),
    likes: z.number(),
    dislikes: z.number(),
    total_reactions: z.number(),
    persona: z.string().nullable(),
    created_at: z.string(),
  })),
});

export const TokenResponseSchema: z.ZodType<TokenResponse> = z.object({
  token: z.string(),
  expires_in: z.string(),
});
