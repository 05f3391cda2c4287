// Engagement Aggregator. A session holds at most one reaction per post;
// the sentiment score on the post is always likes minus dislikes.

import { and, eq, sql } from 'drizzle-orm';
import { getDatabase, type AppDatabase } from '../db/index.js';
import { blogPosts, engagements, postMetrics } from '../db/schema.js';
import { InvalidActionError, PostNotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { isEngagementAction, type EngagementAction } from '../types/index.js';

const logger = createLogger('engagement');

export interface EngagementResult {
  success: true;
  action: EngagementAction;
  newScore: number;
  wasToggle: boolean;
  likesCount: number;
  dislikesCount: number;
}

export interface EngagementSummary {
  postId: number;
  title: string;
  sentimentScore: number;
  likes: number;
  dislikes: number;
  totalEngagements: number;
  views: number;
  engagementRate: number;
  userAction: EngagementAction | null;
}

type Tx = Parameters<Parameters<AppDatabase['transaction']>[0]>[0];

function countReactions(tx: Tx, postId: number): { likes: number; dislikes: number } {
  const row = tx.select({
    likes: sql<number>`coalesce(sum(case when ${engagements.action} = 'like' then 1 else 0 end), 0)`,
    dislikes: sql<number>`coalesce(sum(case when ${engagements.action} = 'dislike' then 1 else 0 end), 0)`,
  })
    .from(engagements)
    .where(eq(engagements.blogPostId, postId))
    .get();
  return { likes: row?.likes ?? 0, dislikes: row?.dislikes ?? 0 };
}

/**
 * Applies a like/dislike for a session:
 * - no current reaction: recorded
 * - same reaction again: removed (`wasToggle`)
 * - opposite reaction: switched
 * The recount and score update commit with the mutation.
 */
export function recordAction(postId: number, sessionId: string, action: string): EngagementResult {
  const db = getDatabase();

  const result = db.transaction((tx) => {
    const post = tx.select({ id: blogPosts.id }).from(blogPosts).where(eq(blogPosts.id, postId)).get();
    if (!post) {
      throw new PostNotFoundError(postId);
    }
    if (!isEngagementAction(action)) {
      throw new InvalidActionError(action);
    }

    const now = new Date().toISOString();
    const existing = tx.select()
      .from(engagements)
      .where(and(eq(engagements.blogPostId, postId), eq(engagements.sessionId, sessionId)))
      .get();

    let wasToggle = false;
    if (!existing) {
      tx.insert(engagements).values({ blogPostId: postId, sessionId, action }).run();
    } else if (existing.action === action) {
      tx.delete(engagements).where(eq(engagements.id, existing.id)).run();
      wasToggle = true;
    } else {
      tx.update(engagements).set({ action, updatedAt: now }).where(eq(engagements.id, existing.id)).run();
    }

    const { likes, dislikes } = countReactions(tx, postId);
    const newScore = likes - dislikes;

    tx.update(blogPosts).set({ sentimentScore: newScore, updatedAt: now }).where(eq(blogPosts.id, postId)).run();
    tx.insert(postMetrics)
      .values({ blogPostId: postId, likesCount: likes, dislikesCount: dislikes })
      .onConflictDoUpdate({
        target: postMetrics.blogPostId,
        set: {
          likesCount: likes,
          dislikesCount: dislikes,
          engagementRate: sql`case when ${postMetrics.viewsCount} > 0 then ${likes} * 1.0 / ${postMetrics.viewsCount} else 0 end`,
          updatedAt: now,
        },
      })
      .run();

    return { success: true as const, action, newScore, wasToggle, likesCount: likes, dislikesCount: dislikes };
  }, { behavior: 'immediate' });

  logger.debug('Engagement recorded', { postId, action, wasToggle: result.wasToggle, score: result.newScore });
  return result;
}

export async function getEngagementSummary(postId: number, sessionId?: string): Promise<EngagementSummary> {
  const db = getDatabase();

  const post = await db.query.blogPosts.findFirst({
    where: eq(blogPosts.id, postId),
    columns: { id: true, title: true, sentimentScore: true },
  });
  if (!post) {
    throw new PostNotFoundError(postId);
  }

  const metrics = await db.query.postMetrics.findFirst({ where: eq(postMetrics.blogPostId, postId) });
  const likes = metrics?.likesCount ?? 0;
  const dislikes = metrics?.dislikesCount ?? 0;

  let userAction: EngagementAction | null = null;
  if (sessionId) {
    const current = await db.query.engagements.findFirst({
      where: and(eq(engagements.blogPostId, postId), eq(engagements.sessionId, sessionId)),
      columns: { action: true },
    });
    userAction = current?.action ?? null;
  }

  return {
    postId: post.id,
    title: post.title,
    sentimentScore: post.sentimentScore,
    likes,
    dislikes,
    totalEngagements: likes + dislikes,
    views: metrics?.viewsCount ?? 0,
    engagementRate: metrics?.engagementRate ?? 0,
    userAction,
  };
}
