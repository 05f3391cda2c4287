// Domain types shared by the database layer, services and the HTTP surface.

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const PERSONA_TYPES = ['technical', 'narrative', 'analyst', 'educator', 'creative'] as const;
export type PersonaType = (typeof PERSONA_TYPES)[number];

export const POST_STATUSES = ['draft', 'generating', 'completed', 'failed'] as const;
export type PostStatus = (typeof POST_STATUSES)[number];

export const JOB_STATUSES = ['queued', 'running', 'completed', 'failed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const ENGAGEMENT_ACTIONS = ['like', 'dislike'] as const;
export type EngagementAction = (typeof ENGAGEMENT_ACTIONS)[number];

export const GENERATION_SPEEDS = ['fast', 'normal'] as const;
export type GenerationSpeed = (typeof GENERATION_SPEEDS)[number];

export function isEngagementAction(value: string): value is EngagementAction {
  return ENGAGEMENT_ACTIONS.some((action) => action === value);
}

export interface Citation {
  title: string;
  url: string;
  domain: string;
  isVerified: boolean;
  relevanceScore: number | null;
}

export interface HeadingEntry {
  level: number;
  text: string;
}

export interface ContentStructure {
  wordCount: number;
  headingCount: number;
  readingTimeMinutes: number;
  headings: HeadingEntry[];
}

export interface GenerationUsage {
  model: string;
  provider: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  generationTimeSeconds: number;
  retryCount: number;
}

export type {
  Persona,
  BlogPost,
  GenerationJob,
  SourceReference,
  Engagement,
  PostMetric,
  LLMCall,
} from '../db/schema.js';
