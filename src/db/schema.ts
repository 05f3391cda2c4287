import { sqliteTable, text, integer, real, uniqueIndex, index } from 'drizzle-orm/sqlite-core';
import type {
  Citation,
  ContentStructure,
  EngagementAction,
  GenerationSpeed,
  JobStatus,
  JsonObject,
  PersonaType,
  PostStatus,
} from '../types/index.js';

const now = () => new Date().toISOString();

// ============================================================================
// personas
// ============================================================================
export const personas = sqliteTable('personas', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  slug: text('slug').notNull().unique(),
  personaType: text('persona_type').$type<PersonaType>().notNull(),
  systemPrompt: text('system_prompt').notNull().default(''), // operator custom instructions
  description: text('description').notNull().default(''),
  temperature: real('temperature').notNull().default(0.7),
  maxTokens: integer('max_tokens').notNull().default(4000),
  topP: real('top_p').notNull().default(0.9),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  displayOrder: integer('display_order').notNull().default(0),
  createdAt: text('created_at').notNull().$defaultFn(now),
  updatedAt: text('updated_at').notNull().$defaultFn(now),
});

// ============================================================================
// blog_posts
// ============================================================================
export const blogPosts = sqliteTable('blog_posts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  slug: text('slug').notNull().unique(),
  topicInput: text('topic_input').notNull(),
  rawPrompt: text('raw_prompt').notNull().default(''),
  generatedContent: text('generated_content').notNull().default(''),
  contentStructure: text('content_structure', { mode: 'json' }).$type<ContentStructure | null>(),
  personaId: integer('persona_id').references(() => personas.id, { onDelete: 'set null' }),
  sources: text('sources', { mode: 'json' }).$type<Citation[]>().notNull().$defaultFn(() => []),
  status: text('status').$type<PostStatus>().notNull().default('draft'),
  sentimentScore: integer('sentiment_score').notNull().default(0),
  metadata: text('metadata', { mode: 'json' }).$type<JsonObject>().notNull().$defaultFn(() => ({})),
  isFeatured: integer('is_featured', { mode: 'boolean' }).notNull().default(false),
  seoTitle: text('seo_title'),
  metaDescription: text('meta_description'),
  keywords: text('keywords', { mode: 'json' }).$type<string[]>().notNull().$defaultFn(() => []),
  publishedAt: text('published_at'),
  createdAt: text('created_at').notNull().$defaultFn(now),
  updatedAt: text('updated_at').notNull().$defaultFn(now),
}, (table) => [
  index('blog_posts_status_created_idx').on(table.status, table.createdAt),
  index('blog_posts_sentiment_idx').on(table.sentimentScore),
]);

// ============================================================================
// generation_jobs
// ============================================================================
export const generationJobs = sqliteTable('generation_jobs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  topic: text('topic').notNull(),
  personaSlug: text('persona_slug').notNull(),
  sessionId: text('session_id'),
  speed: text('speed').$type<GenerationSpeed>().notNull().default('normal'),
  additionalContext: text('additional_context', { mode: 'json' }).$type<Record<string, string>>().notNull().$defaultFn(() => ({})),
  status: text('status').$type<JobStatus>().notNull().default('queued'),
  progress: integer('progress').notNull().default(0),
  blogPostId: integer('blog_post_id').references(() => blogPosts.id, { onDelete: 'set null' }),
  errorMessage: text('error_message'),
  startedAt: text('started_at'),
  completedAt: text('completed_at'),
  createdAt: text('created_at').notNull().$defaultFn(now),
  updatedAt: text('updated_at').notNull().$defaultFn(now),
}, (table) => [
  index('generation_jobs_status_idx').on(table.status, table.createdAt),
]);

// ============================================================================
// source_references
// ============================================================================
export const sourceReferences = sqliteTable('source_references', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  blogPostId: integer('blog_post_id').notNull().references(() => blogPosts.id, { onDelete: 'cascade' }),
  url: text('url').notNull(),
  domain: text('domain').notNull(),
  title: text('title').notNull(),
  author: text('author'),
  isVerified: integer('is_verified', { mode: 'boolean' }).notNull().default(false),
  relevanceScore: real('relevance_score'),
  usageCount: integer('usage_count').notNull().default(1),
  createdAt: text('created_at').notNull().$defaultFn(now),
  updatedAt: text('updated_at').notNull().$defaultFn(now),
}, (table) => [
  uniqueIndex('source_references_post_url_idx').on(table.blogPostId, table.url),
]);

// ============================================================================
// engagements (current reaction per post/session)
// ============================================================================
export const engagements = sqliteTable('engagements', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  blogPostId: integer('blog_post_id').notNull().references(() => blogPosts.id, { onDelete: 'cascade' }),
  sessionId: text('session_id').notNull(),
  action: text('action').$type<EngagementAction>().notNull(),
  actionValue: integer('action_value').notNull().default(1),
  metadata: text('metadata', { mode: 'json' }).$type<JsonObject>().notNull().$defaultFn(() => ({})),
  createdAt: text('created_at').notNull().$defaultFn(now),
  updatedAt: text('updated_at').notNull().$defaultFn(now),
}, (table) => [
  uniqueIndex('engagements_post_session_idx').on(table.blogPostId, table.sessionId),
]);

// ============================================================================
// post_metrics
// ============================================================================
export const postMetrics = sqliteTable('post_metrics', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  blogPostId: integer('blog_post_id').notNull().unique().references(() => blogPosts.id, { onDelete: 'cascade' }),
  viewsCount: integer('views_count').notNull().default(0),
  likesCount: integer('likes_count').notNull().default(0),
  dislikesCount: integer('dislikes_count').notNull().default(0),
  sharesCount: integer('shares_count').notNull().default(0),
  engagementRate: real('engagement_rate').notNull().default(0),
  createdAt: text('created_at').notNull().$defaultFn(now),
  updatedAt: text('updated_at').notNull().$defaultFn(now),
});

// ============================================================================
// llm_calls
// ============================================================================
export const llmCalls = sqliteTable('llm_calls', {
  id: text('id').primaryKey(),
  jobId: integer('job_id'),
  timestamp: text('timestamp').notNull(),
  provider: text('provider').notNull(),
  model: text('model').notNull(),
  purpose: text('purpose').notNull(),
  systemPrompt: text('system_prompt'),
  userPrompt: text('user_prompt').notNull(),
  response: text('response'),
  inputTokens: integer('input_tokens').notNull().default(0),
  outputTokens: integer('output_tokens').notNull().default(0),
  totalTokens: integer('total_tokens').notNull().default(0),
  latencyMs: integer('latency_ms').notNull().default(0),
  success: integer('success', { mode: 'boolean' }).notNull().default(true),
  errorMessage: text('error_message'),
  finishReason: text('finish_reason'),
  createdAt: text('created_at').notNull().$defaultFn(now),
});

export type Persona = typeof personas.$inferSelect;
export type InsertPersona = typeof personas.$inferInsert;

export type BlogPost = typeof blogPosts.$inferSelect;
export type InsertBlogPost = typeof blogPosts.$inferInsert;

export type GenerationJob = typeof generationJobs.$inferSelect;
export type InsertGenerationJob = typeof generationJobs.$inferInsert;

export type SourceReference = typeof sourceReferences.$inferSelect;
export type InsertSourceReference = typeof sourceReferences.$inferInsert;

export type Engagement = typeof engagements.$inferSelect;
export type InsertEngagement = typeof engagements.$inferInsert;

export type PostMetric = typeof postMetrics.$inferSelect;
export type InsertPostMetric = typeof postMetrics.$inferInsert;

export type LLMCall = typeof llmCalls.$inferSelect;
export type InsertLLMCall = typeof llmCalls.$inferInsert;
