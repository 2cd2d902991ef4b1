/**
 * Application error types
 * Each error type maps to an HTTP status code and tells the caller whether a retry makes sense
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed submission or field values (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Missing or invalid bearer token, or no authenticated session (401 Unauthorized)
 */
export class UnauthorizedError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'UNAUTHORIZED', 401, details);
  }
}

/**
 * Resource not found (404 Not Found)
 * Also used for resources owned by someone else, with the same message.
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Job was persisted but the task message could not be published (503 Service Unavailable)
 */
export class PublishError extends AppError {
  readonly retriable = true;

  constructor(
    message: string,
    public readonly jobId: string,
    details?: unknown
  ) {
    super(message, 'PUBLISH_ERROR', 503, details === undefined ? { jobId } : { jobId, cause: details });
  }
}

/**
 * Job store, session store or queue table unavailable (500 Internal Server Error)
 */
export class StorageError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', 500, details);
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Failure raised while executing a job on the toolkit (502 Bad Gateway)
 */
export class ToolkitError extends AppError {
  constructor(
    message: string,
    code: string,
    public readonly retriable: boolean,
    details?: unknown
  ) {
    super(message, code, 502, details);
  }
}

/**
 * Transient failure: expired credential, toolkit or token endpoint unavailable
 */
export class RetriableExecutionError extends ToolkitError {
  constructor(message: string, code = 'TOOLKIT_UNAVAILABLE', details?: unknown) {
    super(message, code, true, details);
  }
}

/**
 * Permanent failure: the toolkit rejected the input, the session is gone
 */
export class FatalExecutionError extends ToolkitError {
  constructor(message: string, code = 'TOOLKIT_REJECTED', details?: unknown) {
    super(message, code, false, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isToolkitError(error: unknown): error is ToolkitError {
  return error instanceof ToolkitError;
}
