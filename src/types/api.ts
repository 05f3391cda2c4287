// JSON shapes of the HTTP API (snake_case on the wire). Shared by the
// server's serializers and the typed client.

import type { EngagementAction, GenerationSpeed, JobStatus, JsonObject, PersonaType, PostStatus } from './index.js';

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface CitationDto {
  title: string;
  url: string;
  domain: string;
  is_verified: boolean;
  relevance_score: number | null;
}

export interface ContentStructureDto {
  word_count: number;
  heading_count: number;
  reading_time_minutes: number;
  headings: Array<{ level: number; text: string }>;
}

export interface PersonaDto {
  id: number;
  name: string;
  slug: string;
  persona_type: PersonaType;
  description: string;
  temperature: number;
  max_tokens: number;
  top_p: number;
  display_order: number;
}

export interface PersonaSummaryDto {
  name: string;
  slug: string;
  persona_type: PersonaType;
}

export interface GenerateRequestBody {
  topic: string;
  persona: string;
  session_id?: string;
  speed?: GenerationSpeed;
  additional_context?: Record<string, string>;
}

export interface GenerateQueuedResponse {
  success: true;
  job_id: number;
  status: 'queued';
}

export interface GenerateCompletedResponse {
  success: true;
  status: 'completed';
  job_id: number;
  blog_post_id: number;
  content: string;
  sources: CitationDto[];
  metadata: JsonObject;
}

export type GenerateResponse = GenerateQueuedResponse | GenerateCompletedResponse;

export interface JobStatusDto {
  id: number;
  status: JobStatus;
  progress: number;
  blog_post_id: number | null;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

export interface PostListItemDto {
  id: number;
  public_id: string;
  title: string;
  slug: string;
  topic_input: string;
  status: PostStatus;
  sentiment_score: number;
  persona: PersonaSummaryDto | null;
  word_count: number;
  reading_time_minutes: number;
  created_at: string;
  published_at: string | null;
}

export interface PostListDto {
  count: number;
  results: PostListItemDto[];
}

export interface PostDetailDto extends PostListItemDto {
  generated_content: string;
  content_structure: ContentStructureDto | null;
  sources: CitationDto[];
  metadata: JsonObject;
  is_featured: boolean;
  seo_title: string | null;
  meta_description: string | null;
  keywords: string[];
  views: number;
  updated_at: string;
}

export interface EngageRequestBody {
  blog_id: number | string;
  action: EngagementAction;
  session_id: string;
}

export interface EngageResponse {
  success: true;
  action: EngagementAction;
  new_score: number;
  was_toggle: boolean;
  likes_count: number;
  dislikes_count: number;
}

export interface EngagementDto {
  post_id: number;
  title: string;
  sentiment_score: number;
  likes: number;
  dislikes: number;
  total_engagements: number;
  views: number;
  engagement_rate: number;
  user_action: EngagementAction | null;
}

export interface TopPostDto {
  id: number;
  title: string;
  slug: string;
  sentiment_score: number;
  likes: number;
  dislikes: number;
  total_reactions: number;
  persona: string | null;
  created_at: string;
}

export interface AnalyticsDto {
  total_posts: number;
  total_engagements: number;
  total_likes: number;
  total_dislikes: number;
  reaction_rate: number;
  avg_sentiment_score: number;
  top_posts: TopPostDto[];
}

export interface TokenResponse {
  token: string;
  expires_in: string;
}
