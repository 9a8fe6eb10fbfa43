import type { FastifyError } from 'fastify';

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | 'BAD_REQUEST'
  | 'UNPROCESSABLE_ENTITY'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'PAYLOAD_TOO_LARGE'
  | 'UPSTREAM_ERROR'
  | 'INTERNAL';

/**
 * Generic message for anything we did not raise ourselves
 */
export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

/**
 * Error raised by validators, handlers and the dispatcher.
 * The message is client-facing; `cause` is only ever logged.
 */
export class ApiError extends Error {
  readonly name = 'ApiError';

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }

  get statusCode(): number {
    return getStatusCodeForErrorCode(this.code);
  }
}

export const badRequest = (message: string): ApiError => new ApiError('BAD_REQUEST', message);

export const unprocessable = (message: string): ApiError => new ApiError('UNPROCESSABLE_ENTITY', message);

function isFastifyError(error: unknown): error is FastifyError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('FST_')
  );
}

function statusCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Convert any thrown value to an ApiError (safe, never leaks stack or internals)
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (isFastifyError(error)) {
    switch (error.code) {
      case 'FST_ERR_CTP_INVALID_MEDIA_TYPE':
        return new ApiError('BAD_REQUEST', 'Content-Type must be application/json', error);
      case 'FST_ERR_CTP_EMPTY_JSON_BODY':
        return new ApiError('BAD_REQUEST', 'Request body is required', error);
      case 'FST_ERR_CTP_BODY_TOO_LARGE':
        return new ApiError('PAYLOAD_TOO_LARGE', 'Request body too large', error);
    }
  }

  // Body parser failures (malformed JSON and friends) carry their own 4xx
  switch (statusCodeOf(error)) {
    case 400:
      return new ApiError('BAD_REQUEST', 'Request body must be valid JSON', error);
    case 413:
      return new ApiError('PAYLOAD_TOO_LARGE', 'Request body too large', error);
    case 415:
      return new ApiError('BAD_REQUEST', 'Content-Type must be application/json', error);
  }

  return new ApiError('INTERNAL', INTERNAL_ERROR_MESSAGE, error);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_REQUEST':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'METHOD_NOT_ALLOWED':
      return 405;
    case 'PAYLOAD_TOO_LARGE':
      return 413;
    case 'UNPROCESSABLE_ENTITY':
      return 422;
    case 'UPSTREAM_ERROR':
    case 'INTERNAL':
    default:
      return 500;
  }
}
