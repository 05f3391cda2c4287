import { and, count, desc, eq, sql, type SQL } from 'drizzle-orm';
import { getDatabase } from '../db/index.js';
import {
  blogPosts,
  personas,
  postMetrics,
  sourceReferences,
  type BlogPost,
  type Persona,
  type PostMetric,
} from '../db/schema.js';
import { PostNotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { slugify, uniqueSlug } from '../utils/slug.js';
import type { ParsedContent } from './generation/parser.js';
import type { GenerationUsage, JsonObject, PostStatus } from '../types/index.js';

const logger = createLogger('posts');

const SLUG_SOURCE_LENGTH = 50;

export interface PostWithPersona {
  post: BlogPost;
  persona: Persona | null;
}

export interface PostDetail extends PostWithPersona {
  metrics: PostMetric | null;
}

export function draftTitle(topic: string): string {
  return topic.length > SLUG_SOURCE_LENGTH ? `Draft: ${topic.slice(0, SLUG_SOURCE_LENGTH)}...` : `Draft: ${topic}`;
}

export function usageMetadata(usage: GenerationUsage): JsonObject {
  return {
    model: usage.model,
    provider: usage.provider,
    input_tokens: usage.inputTokens,
    output_tokens: usage.outputTokens,
    total_tokens: usage.totalTokens,
    generation_time_seconds: usage.generationTimeSeconds,
    retry_count: usage.retryCount,
  };
}

/** Creates the post in `generating` with a unique slug derived from the topic. */
export function createGeneratingPost(input: {
  topic: string;
  personaId: number;
  rawPrompt: string;
  metadata?: JsonObject;
}): BlogPost {
  const db = getDatabase();

  return db.transaction((tx) => {
    const slug = uniqueSlug(slugify(input.topic.slice(0, SLUG_SOURCE_LENGTH)), (candidate) =>
      tx.select({ id: blogPosts.id }).from(blogPosts).where(eq(blogPosts.slug, candidate)).get() !== undefined,
    );

    const post = tx.insert(blogPosts).values({
      title: draftTitle(input.topic),
      slug,
      topicInput: input.topic,
      rawPrompt: input.rawPrompt,
      personaId: input.personaId,
      status: 'generating',
      metadata: input.metadata ?? {},
    }).returning().get();

    tx.insert(postMetrics).values({ blogPostId: post.id }).run();
    return post;
  }, { behavior: 'immediate' });
}

/**
 * Stores the parsed generation on the post, marks it `completed` and writes
 * one source reference row per citation.
 */
export function completePost(postId: number, parsed: ParsedContent, usage: GenerationUsage): BlogPost {
  const db = getDatabase();
  const now = new Date().toISOString();

  const post = db.transaction((tx) => {
    const existing = tx.select().from(blogPosts).where(eq(blogPosts.id, postId)).get();
    if (!existing) {
      throw new PostNotFoundError(postId);
    }

    const updated = tx.update(blogPosts)
      .set({
        title: parsed.title ?? existing.topicInput,
        generatedContent: parsed.bodyMarkdown,
        contentStructure: parsed.structure,
        sources: parsed.sources,
        status: 'completed',
        metadata: { ...existing.metadata, ...usageMetadata(usage) },
        publishedAt: now,
        updatedAt: now,
      })
      .where(eq(blogPosts.id, postId))
      .returning()
      .get();

    for (const source of parsed.sources) {
      tx.insert(sourceReferences)
        .values({
          blogPostId: postId,
          url: source.url,
          domain: source.domain,
          title: source.title,
          isVerified: source.isVerified,
          relevanceScore: source.relevanceScore,
        })
        .onConflictDoNothing()
        .run();
    }

    return updated;
  }, { behavior: 'immediate' });

  logger.info('Post completed', {
    postId,
    wordCount: parsed.structure.wordCount,
    sources: parsed.sources.length,
  });
  return post;
}

export function failPost(postId: number, error: { message: string; code: string; details?: JsonObject }): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.transaction((tx) => {
    const existing = tx.select().from(blogPosts).where(eq(blogPosts.id, postId)).get();
    if (!existing) return;

    tx.update(blogPosts)
      .set({
        status: 'failed',
        metadata: {
          ...existing.metadata,
          error: error.message,
          error_code: error.code,
          ...(error.details ? { error_details: error.details } : {}),
        },
        updatedAt: now,
      })
      .where(eq(blogPosts.id, postId))
      .run();
  }, { behavior: 'immediate' });

  logger.warn('Post marked failed', { postId, code: error.code, error: error.message });
}

export async function getPost(postId: number): Promise<BlogPost> {
  const post = await getDatabase().query.blogPosts.findFirst({ where: eq(blogPosts.id, postId) });
  if (!post) {
    throw new PostNotFoundError(postId);
  }
  return post;
}

export async function getPostDetail(postId: number): Promise<PostDetail> {
  const db = getDatabase();
  const post = await getPost(postId);
  const persona = post.personaId === null
    ? null
    : (await db.query.personas.findFirst({ where: eq(personas.id, post.personaId) })) ?? null;
  const metrics = (await db.query.postMetrics.findFirst({ where: eq(postMetrics.blogPostId, postId) })) ?? null;
  return { post, persona, metrics };
}

export interface ListPostsOptions {
  status?: PostStatus;
  personaSlug?: string;
  limit: number;
  offset: number;
}

export async function listPosts(options: ListPostsOptions): Promise<{ count: number; results: PostWithPersona[] }> {
  const db = getDatabase();
  const conditions: SQL[] = [];
  if (options.status) conditions.push(eq(blogPosts.status, options.status));
  if (options.personaSlug) conditions.push(eq(personas.slug, options.personaSlug));
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const total = db.select({ value: count() })
    .from(blogPosts)
    .leftJoin(personas, eq(blogPosts.personaId, personas.id))
    .where(where)
    .get();

  const rows = db.select({ post: blogPosts, persona: personas })
    .from(blogPosts)
    .leftJoin(personas, eq(blogPosts.personaId, personas.id))
    .where(where)
    .orderBy(desc(blogPosts.createdAt), desc(blogPosts.id))
    .limit(options.limit)
    .offset(options.offset)
    .all();

  return { count: total?.value ?? 0, results: rows };
}

/** Deletes the post; engagements, metrics and source references cascade. */
export function deletePost(postId: number): void {
  const deleted = getDatabase().delete(blogPosts)
    .where(eq(blogPosts.id, postId))
    .returning({ id: blogPosts.id })
    .all();
  if (deleted.length === 0) {
    throw new PostNotFoundError(postId);
  }
  logger.info('Post deleted', { postId });
}

export function recordView(postId: number): void {
  const now = new Date().toISOString();
  getDatabase().insert(postMetrics)
    .values({ blogPostId: postId, viewsCount: 1 })
    .onConflictDoUpdate({
      target: postMetrics.blogPostId,
      set: {
        viewsCount: sql`${postMetrics.viewsCount} + 1`,
        engagementRate: sql`CAST(${postMetrics.likesCount} AS REAL) / (${postMetrics.viewsCount} + 1)`,
        updatedAt: now,
      },
    })
    .run();
}
