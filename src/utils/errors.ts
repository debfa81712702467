// Standardized error handling utilities
// Shared by the HTTP layer and the turn orchestrator

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  RATE_LIMITED = 'rate_limited',
  VALIDATION_ERROR = 'validation_error',
  CONFIGURATION_ERROR = 'configuration_error',
  COMPLETION_FAILED = 'completion_failed',
  TURN_CANCELLED = 'turn_cancelled',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static rateLimited(retryAfter: number, message: string = 'Too many requests'): AppError {
    return new AppError(ErrorCode.RATE_LIMITED, message, 429, { retryAfter });
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static configuration(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.CONFIGURATION_ERROR, message, 500, details);
  }

  static cancelled(message: string = 'Turn cancelled by caller'): AppError {
    return new AppError(ErrorCode.TURN_CANCELLED, message, 499);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

/**
 * Raised when the completion engine fails: transport errors, upstream
 * failures, or a response the orchestrator cannot interpret.
 */
export class CompletionEngineError extends AppError {
  constructor(message: string, public readonly upstream?: unknown) {
    super(ErrorCode.COMPLETION_FAILED, message, 502);
    this.name = 'CompletionEngineError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  return AppError.internal(errorMessage(error));
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
  retry_after_seconds?: number;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  if (error.code === ErrorCode.RATE_LIMITED && isRetryDetails(error.details)) {
    response.retry_after_seconds = error.details.retryAfter;
  }

  return response;
}

function isRetryDetails(details: unknown): details is { retryAfter: number } {
  return typeof details === 'object'
    && details !== null
    && 'retryAfter' in details
    && typeof details.retryAfter === 'number'
    && details.retryAfter > 0;
}
