import { and, asc, desc, eq, gte, lte, sql, type SQL } from 'drizzle-orm';
import { getDatabase } from '../db/index.js';
import { blogPosts, engagements, personas } from '../db/schema.js';

export const ANALYTICS_SORTS = ['likes', 'dislikes', 'reactions', 'sentiment'] as const;
export type AnalyticsSort = (typeof ANALYTICS_SORTS)[number];

export interface AnalyticsQuery {
  sort: AnalyticsSort;
  order: 'asc' | 'desc';
  limit: number;
  /** ISO date (YYYY-MM-DD) or date-time; inclusive. */
  from?: string;
  to?: string;
}

export interface TopPost {
  id: number;
  title: string;
  slug: string;
  sentimentScore: number;
  likes: number;
  dislikes: number;
  totalReactions: number;
  persona: string | null;
  createdAt: string;
}

export interface AnalyticsReport {
  totalPosts: number;
  totalEngagements: number;
  totalLikes: number;
  totalDislikes: number;
  reactionRate: number;
  avgSentimentScore: number;
  topPosts: TopPost[];
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Bare dates widen to the start/end of that UTC day. */
export function normalizeBound(value: string, edge: 'start' | 'end'): string {
  if (DATE_ONLY.test(value)) {
    return edge === 'start' ? `${value}T00:00:00.000Z` : `${value}T23:59:59.999Z`;
  }
  return new Date(value).toISOString();
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

const likesExpr = sql<number>`coalesce(sum(case when ${engagements.action} = 'like' then 1 else 0 end), 0)`;
const dislikesExpr = sql<number>`coalesce(sum(case when ${engagements.action} = 'dislike' then 1 else 0 end), 0)`;
const reactionsExpr = sql<number>`count(${engagements.id})`;

const SORT_COLUMNS: Record<AnalyticsSort, SQL> = {
  likes: likesExpr,
  dislikes: dislikesExpr,
  reactions: reactionsExpr,
  sentiment: sql`${blogPosts.sentimentScore}`,
};

/** Rollup over completed posts, optionally bounded by creation date. */
export function getAnalytics(query: AnalyticsQuery): AnalyticsReport {
  const db = getDatabase();

  const conditions: SQL[] = [eq(blogPosts.status, 'completed')];
  if (query.from) conditions.push(gte(blogPosts.createdAt, normalizeBound(query.from, 'start')));
  if (query.to) conditions.push(lte(blogPosts.createdAt, normalizeBound(query.to, 'end')));
  const where = and(...conditions);

  const perPost = db.select({
    id: blogPosts.id,
    title: blogPosts.title,
    slug: blogPosts.slug,
    sentimentScore: blogPosts.sentimentScore,
    createdAt: blogPosts.createdAt,
    persona: personas.name,
    likes: likesExpr,
    dislikes: dislikesExpr,
    totalReactions: reactionsExpr,
  })
    .from(blogPosts)
    .leftJoin(engagements, eq(engagements.blogPostId, blogPosts.id))
    .leftJoin(personas, eq(blogPosts.personaId, personas.id))
    .where(where)
    .groupBy(blogPosts.id);

  const sortColumn = SORT_COLUMNS[query.sort];
  const topPosts = perPost
    .orderBy(query.order === 'asc' ? asc(sortColumn) : desc(sortColumn), desc(blogPosts.createdAt), desc(blogPosts.id))
    .limit(query.limit)
    .all();

  const totals = db.select({
    totalPosts: sql<number>`count(distinct ${blogPosts.id})`,
    totalLikes: likesExpr,
    totalDislikes: dislikesExpr,
  })
    .from(blogPosts)
    .leftJoin(engagements, eq(engagements.blogPostId, blogPosts.id))
    .where(where)
    .get();

  const sentiment = db.select({ total: sql<number>`coalesce(sum(${blogPosts.sentimentScore}), 0)` })
    .from(blogPosts)
    .where(where)
    .get();

  const totalPosts = totals?.totalPosts ?? 0;
  const totalLikes = totals?.totalLikes ?? 0;
  const totalDislikes = totals?.totalDislikes ?? 0;
  const totalEngagements = totalLikes + totalDislikes;

  return {
    totalPosts,
    totalEngagements,
    totalLikes,
    totalDislikes,
    reactionRate: totalPosts > 0 ? round2(totalEngagements / totalPosts) : 0,
    avgSentimentScore: totalPosts > 0 ? round2((sentiment?.total ?? 0) / totalPosts) : 0,
    topPosts: topPosts.map((row) => ({
      id: row.id,
      title: row.title,
      slug: row.slug,
      sentimentScore: row.sentimentScore,
      likes: row.likes,
      dislikes: row.dislikes,
      totalReactions: row.totalReactions,
      persona: row.persona,
      createdAt: row.createdAt,
    })),
  };
}

export function getTopPosts(limit = 10): TopPost[] {
  return getAnalytics({ sort: 'sentiment', order: 'desc', limit }).topPosts;
}
