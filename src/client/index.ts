export { createBlogApiClient, ApiRequestError } from './api-client.js';
export type { BlogApiClient, BlogApiClientOptions, FetchFn, ListPostsParams, AnalyticsParams } from './api-client.js';
export { pollGenerationJob, PollTimeoutError, PollFetchError, POST_GONE_MESSAGE } from './poller.js';
export type { PollOptions, PollOutcome } from './poller.js';
export { generateAndWait } from './generation.js';
export type { GenerateAndWaitOptions, GenerateAndWaitResult } from './generation.js';
export { SessionIdentity, createMemoryStore, isValidSessionId, SESSION_STORAGE_KEY } from './session.js';
export type { KeyValueStore } from './session.js';
export { applyOptimisticToggle, reconcileEngagement, engagementStateFrom, sentimentScore } from './engagement.js';
export type { EngagementState } from './engagement.js';
