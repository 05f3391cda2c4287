export type ErrorDetails = Record<string, unknown>;

/**
 * Base for every error the service reports to callers. `code` is the stable
 * wire identifier, `status` the HTTP status the API layer responds with.
 */
export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details: ErrorDetails;

  constructor(code: string, status: number, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('VALIDATION_ERROR', 400, message, details);
  }
}

export class InvalidTopicError extends AppError {
  constructor(message = 'Topic must be at least 5 characters', details: ErrorDetails = {}) {
    super('INVALID_TOPIC', 400, message, details);
  }
}

export class PersonaNotFoundError extends AppError {
  constructor(slug: string) {
    super('PERSONA_NOT_FOUND', 404, `Persona "${slug}" not found or inactive`, { persona: slug });
  }
}

export class PostNotFoundError extends AppError {
  constructor(postId: number | string) {
    super('POST_NOT_FOUND', 404, `Blog post ${postId} not found`, { postId });
  }
}

export class JobNotFoundError extends AppError {
  constructor(jobId: number | string) {
    super('JOB_NOT_FOUND', 404, `Generation job ${jobId} not found`, { jobId });
  }
}

export class InvalidActionError extends AppError {
  constructor(action: string) {
    super('INVALID_ACTION', 400, `Invalid action "${action}". Must be "like" or "dislike"`, { action });
  }
}

export class InvalidJobTransitionError extends AppError {
  constructor(from: string, event: string) {
    super('INVALID_JOB_TRANSITION', 409, `Cannot apply "${event}" to a job in status "${from}"`, { from, event });
  }
}

export class GenerationFailedError extends AppError {
  constructor(message: string, details: ErrorDetails = {}, code = 'GENERATION_FAILED', status = 502) {
    super(code, status, message, details);
  }
}

export class ProviderUnavailableError extends GenerationFailedError {
  readonly retryAfterSeconds: number;

  constructor(provider: string, retryAfterSeconds: number) {
    super(
      `LLM provider "${provider}" is temporarily unavailable. Try again in ${retryAfterSeconds}s`,
      { provider, retryAfterSeconds },
      'PROVIDER_UNAVAILABLE',
      503,
    );
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHENTICATED', 401, message);
  }
}

export class QueueUnavailableError extends AppError {
  constructor() {
    super('QUEUE_UNAVAILABLE', 503, 'Generation queue is not accepting jobs');
  }
}
