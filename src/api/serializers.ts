import { config } from '../config.js';
import { encodePublicId } from '../utils/public-id.js';
import type { BlogPost, GenerationJob, Persona, PostMetric } from '../db/schema.js';
import type { EngagementResult, EngagementSummary } from '../services/engagement.js';
import type { AnalyticsReport } from '../services/analytics.js';
import type { Citation, ContentStructure } from '../types/index.js';
import type {
  AnalyticsDto,
  CitationDto,
  ContentStructureDto,
  EngageResponse,
  EngagementDto,
  JobStatusDto,
  PersonaDto,
  PersonaSummaryDto,
  PostDetailDto,
  PostListItemDto,
} from '../types/api.js';

export function serializeCitation(citation: Citation): CitationDto {
  return {
    title: citation.title,
    url: citation.url,
    domain: citation.domain,
    is_verified: citation.isVerified,
    relevance_score: citation.relevanceScore,
  };
}

export function serializeStructure(structure: ContentStructure | null): ContentStructureDto | null {
  if (!structure) return null;
  return {
    word_count: structure.wordCount,
    heading_count: structure.headingCount,
    reading_time_minutes: structure.readingTimeMinutes,
    headings: structure.headings.map((h) => ({ level: h.level, text: h.text })),
  };
}

export function serializePersona(persona: Persona): PersonaDto {
  return {
    id: persona.id,
    name: persona.name,
    slug: persona.slug,
    persona_type: persona.personaType,
    description: persona.description,
    temperature: persona.temperature,
    max_tokens: persona.maxTokens,
    top_p: persona.topP,
    display_order: persona.displayOrder,
  };
}

function personaSummary(persona: Persona | null): PersonaSummaryDto | null {
  return persona ? { name: persona.name, slug: persona.slug, persona_type: persona.personaType } : null;
}

export function serializeJob(job: GenerationJob): JobStatusDto {
  return {
    id: job.id,
    status: job.status,
    progress: job.progress,
    blog_post_id: job.blogPostId,
    error_message: job.errorMessage,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
  };
}

export function serializePostListItem(post: BlogPost, persona: Persona | null): PostListItemDto {
  return {
    id: post.id,
    public_id: encodePublicId(post.id, config.publicIds.secret),
    title: post.title,
    slug: post.slug,
    topic_input: post.topicInput,
    status: post.status,
    sentiment_score: post.sentimentScore,
    persona: personaSummary(persona),
    word_count: post.contentStructure?.wordCount ?? 0,
    reading_time_minutes: post.contentStructure?.readingTimeMinutes ?? 0,
    created_at: post.createdAt,
    published_at: post.publishedAt,
  };
}

export function serializePostDetail(post: BlogPost, persona: Persona | null, metrics: PostMetric | null): PostDetailDto {
  return {
    ...serializePostListItem(post, persona),
    generated_content: post.generatedContent,
    content_structure: serializeStructure(post.contentStructure),
    sources: post.sources.map(serializeCitation),
    metadata: post.metadata,
    is_featured: post.isFeatured,
    seo_title: post.seoTitle,
    meta_description: post.metaDescription,
    keywords: post.keywords,
    views: metrics?.viewsCount ?? 0,
    updated_at: post.updatedAt,
  };
}

export function serializeEngageResult(result: EngagementResult): EngageResponse {
  return {
    success: true,
    action: result.action,
    new_score: result.newScore,
    was_toggle: result.wasToggle,
    likes_count: result.likesCount,
    dislikes_count: result.dislikesCount,
  };
}

export function serializeEngagementSummary(summary: EngagementSummary): EngagementDto {
  return {
    post_id: summary.postId,
    title: summary.title,
    sentiment_score: summary.sentimentScore,
    likes: summary.likes,
    dislikes: summary.dislikes,
    total_engagements: summary.totalEngagements,
    views: summary.views,
    engagement_rate: summary.engagementRate,
    user_action: summary.userAction,
  };
}

export function serializeAnalytics(report: AnalyticsReport): AnalyticsDto {
  return {
    total_posts: report.totalPosts,
    total_engagements: report.totalEngagements,
    total_likes: report.totalLikes,
    total_dislikes: report.totalDislikes,
    reaction_rate: report.reactionRate,
    avg_sentiment_score: report.avgSentimentScore,
    top_posts: report.topPosts.map((post) => ({
      id: post.id,
      title: post.title,
      slug: post.slug,
      sentiment_score: post.sentimentScore,
      likes: post.likes,
      dislikes: post.dislikes,
      total_reactions: post.totalReactions,
      persona: post.persona,
      created_at: post.createdAt,
    })),
  };
}
