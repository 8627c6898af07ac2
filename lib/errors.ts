/**
 * Error taxonomy for story creation
 */

export type StoryErrorCode =
  | 'VALIDATION'
  | 'CONTENT_INTEGRITY'
  | 'CONTENT_MISMATCH'
  | 'NO_CONTENT'
  | 'EXTERNAL_SERVICE'
  | 'STAGE_FAILED'
  | 'DEADLINE_EXCEEDED'
  | 'NOT_FOUND';

export class StoryError extends Error {
  public code: StoryErrorCode;
  public stage?: string;
  public details?: Record<string, unknown>;

  constructor(
    message: string,
    code: StoryErrorCode,
    options: { stage?: string; cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'StoryError';
    this.code = code;
    this.stage = options.stage;
    this.details = options.details;
  }
}

/** Malformed request or unusable language result. */
export class ValidationError extends StoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION', { details });
    this.name = 'ValidationError';
  }
}

export class ContentIntegrityError extends StoryError {
  constructor(message: string, code: 'CONTENT_INTEGRITY' | 'CONTENT_MISMATCH' | 'NO_CONTENT' = 'CONTENT_INTEGRITY', details?: Record<string, unknown>) {
    super(message, code, { details });
    this.name = 'ContentIntegrityError';
  }
}

/** Extracted article does not match the topic its URL implies. */
export class ContentMismatchError extends ContentIntegrityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONTENT_MISMATCH', details);
    this.name = 'ContentMismatchError';
  }
}

export class NoContentError extends ContentIntegrityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NO_CONTENT', details);
    this.name = 'NoContentError';
  }
}

export class ExternalServiceError extends StoryError {
  public service: string;
  public status?: number;
  public isRetryable: boolean;

  constructor(service: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${service}: ${message}`, 'EXTERNAL_SERVICE', { cause: options.cause });
    this.name = 'ExternalServiceError';
    this.service = service;
    this.status = options.status;
    this.isRetryable = options.status === 429 || (options.status !== undefined && options.status >= 500);
  }
}

export class StageFailedError extends StoryError {
  constructor(stage: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Stage "${stage}" failed: ${reason}`, 'STAGE_FAILED', { stage, cause });
    this.name = 'StageFailedError';
  }
}

export class DeadlineExceededError extends StoryError {
  constructor(stage: string, deadlineMs: number) {
    super(`Story deadline of ${deadlineMs}ms exceeded before stage "${stage}"`, 'DEADLINE_EXCEEDED', { stage });
    this.name = 'DeadlineExceededError';
  }
}

export class NotFoundError extends StoryError {
  constructor(what: string) {
    super(`Not found: ${what}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export function httpStatusFor(error: unknown): number {
  if (!(error instanceof StoryError)) {
    return 500;
  }
  switch (error.code) {
    case 'VALIDATION':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'CONTENT_INTEGRITY':
    case 'CONTENT_MISMATCH':
    case 'NO_CONTENT':
      return 422;
    case 'EXTERNAL_SERVICE':
      return 502;
    case 'DEADLINE_EXCEEDED':
      return 504;
    case 'STAGE_FAILED':
      return error.cause instanceof StoryError ? httpStatusFor(error.cause) : 500;
  }
}

export interface ErrorResponseBody {
  error: string;
  code: StoryErrorCode | 'INTERNAL';
  stage?: string;
}

export function errorResponseBody(error: unknown): ErrorResponseBody {
  if (error instanceof StoryError) {
    return { error: error.message, code: error.code, stage: error.stage };
  }
  return { error: error instanceof Error ? error.message : 'Internal server error', code: 'INTERNAL' };
}
