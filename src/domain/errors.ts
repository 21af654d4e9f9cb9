export type ErrorCode =
  | 'storage_error'
  | 'not_found'
  | 'embedding_error'
  | 'completion_error'
  | 'no_content'
  | 'invalid_input'
  | 'invalid_ai_output'
  | 'moodle_error';

export interface AppErrorOptions {
  cause?: unknown;
  retryable?: boolean;
}

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;
  readonly retryable: boolean;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
  }
}

// Vector store unavailable, collection missing, dimension mismatch
export class StorageError extends AppError {
  readonly code = 'storage_error';
  readonly statusCode = 503;
}

export class NotFoundError extends AppError {
  readonly code = 'not_found';
  readonly statusCode = 404;
}

export class EmbeddingError extends AppError {
  readonly code = 'embedding_error';
  readonly statusCode = 503;
}

export class CompletionError extends AppError {
  readonly code = 'completion_error';
  readonly statusCode = 503;
}

export class NoContentError extends AppError {
  readonly code = 'no_content';
  readonly statusCode = 422;
}

export class InvalidInputError extends AppError {
  readonly code = 'invalid_input';
  readonly statusCode = 400;
}

export class MoodleError extends AppError {
  readonly code = 'moodle_error';
  readonly statusCode = 503;
}

const RAW_OUTPUT_LIMIT = 500;

/**
 * The completion could not be turned into schema-valid quiz questions.
 * Carries the head of the raw output so prompt drift can be diagnosed.
 */
export class InvalidAIOutputError extends AppError {
  readonly code = 'invalid_ai_output';
  readonly statusCode = 502;
  readonly rawOutput: string;

  constructor(message: string, rawOutput: string, options: AppErrorOptions = {}) {
    super(message, options);
    this.rawOutput = rawOutput.length > RAW_OUTPUT_LIMIT ? `${rawOutput.slice(0, RAW_OUTPUT_LIMIT)}...` : rawOutput;
  }
}
