import type { ApiErrorCode, ApiFailure, PayloadParseResult } from '@owned-tasks/protocol';
import { fail } from '@owned-tasks/protocol';
import type { Logger } from './logger';

/** Internal failure kinds; several collapse onto one public code. */
export type TaskErrorKind =
  | 'CREDENTIAL_MISSING'
  | 'CREDENTIAL_INVALID'
  | 'CREDENTIAL_EXPIRED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'DUPLICATE_EMAIL'
  | 'INVALID_CREDENTIALS'
  | 'STORE_UNAVAILABLE';

export class TaskApiError extends Error {
  readonly kind: TaskErrorKind;

  constructor(kind: TaskErrorKind, message?: string) {
    super(message ?? kind);
    this.name = 'TaskApiError';
    this.kind = kind;
  }
}

export const isTaskApiError = (value: unknown): value is TaskApiError => value instanceof TaskApiError;

/** Returns the parsed payload or throws VALIDATION_ERROR with the parser's message */
export const unwrapPayload = <T>(result: PayloadParseResult<T>): T => {
  if (!result.success) {
    throw new TaskApiError('VALIDATION_ERROR', result.message);
  }
  return result.data;
};

/**
 * Runs one store call. Domain errors pass through; anything else is logged
 * with its detail and surfaces as STORE_UNAVAILABLE. Nothing is retried.
 */
export async function runStoreOperation<T>(logger: Logger, operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (isTaskApiError(err)) {
      throw err;
    }
    logger.error(`Store ${operation} failed`, {
      error: err instanceof Error ? err.message : String(err),
    });
    throw new TaskApiError('STORE_UNAVAILABLE');
  }
}

export interface HttpErrorResponse {
  status: number;
  body: ApiFailure;
  headers: Record<string, string>;
}

const NOT_FOUND_MESSAGE = 'Resource not found';
const INVALID_TOKEN_MESSAGE = 'Invalid or expired token';
const INTERNAL_MESSAGE = 'Internal server error';

const BEARER_CHALLENGE = { 'WWW-Authenticate': 'Bearer' };

const respond = (
  status: number,
  code: ApiErrorCode,
  message: string,
  headers: Record<string, string> = {}
): HttpErrorResponse => ({ status, body: fail(code, message), headers });

/**
 * Maps any thrown value onto status, envelope and headers. FORBIDDEN is
 * reported exactly like NOT_FOUND so callers cannot discover other users'
 * resources. Only validation messages reach the caller verbatim.
 */
export function toHttpError(err: unknown): HttpErrorResponse {
  if (!isTaskApiError(err)) {
    return respond(500, 'INTERNAL_ERROR', INTERNAL_MESSAGE);
  }

  switch (err.kind) {
    case 'CREDENTIAL_MISSING':
      return respond(401, 'AUTHENTICATION_REQUIRED', 'Authentication required', BEARER_CHALLENGE);
    case 'CREDENTIAL_INVALID':
    case 'CREDENTIAL_EXPIRED':
      return respond(401, 'AUTHENTICATION_REQUIRED', INVALID_TOKEN_MESSAGE, BEARER_CHALLENGE);
    case 'FORBIDDEN':
    case 'NOT_FOUND':
      return respond(404, 'NOT_FOUND', NOT_FOUND_MESSAGE);
    case 'VALIDATION_ERROR':
      return respond(400, 'VALIDATION_ERROR', err.message);
    case 'DUPLICATE_EMAIL':
      return respond(400, 'DUPLICATE_EMAIL', 'Email already registered');
    case 'INVALID_CREDENTIALS':
      return respond(401, 'INVALID_CREDENTIALS', 'Invalid email or password', BEARER_CHALLENGE);
    case 'STORE_UNAVAILABLE':
      return respond(500, 'INTERNAL_ERROR', INTERNAL_MESSAGE);
  }
}
