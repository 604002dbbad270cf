import type { ErrorRequestHandler, RequestHandler } from 'express';
import { TaskApiError, isTaskApiError, toHttpError } from '../errors';
import type { Logger } from '../logger';

interface BodyParserError {
  type: string;
  status: number;
}

// body-parser tags its errors with `type` and an HTTP `status`
const isBodyParserError = (err: unknown): err is BodyParserError => {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  return typeof e.type === 'string' && typeof e.status === 'number' && e.status >= 400 && e.status < 500;
};

const describeBodyError = (err: BodyParserError): string => {
  switch (err.type) {
    case 'entity.parse.failed':
      return 'Malformed JSON body';
    case 'entity.too.large':
      return 'Request body too large';
    default:
      return 'Unreadable request body';
  }
};

/** Answers unmatched routes with the same envelope as a missing task. */
export const notFoundHandler: RequestHandler = (_req, _res, next) => {
  next(new TaskApiError('NOT_FOUND'));
};

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    let failure: unknown = err;
    if (!isTaskApiError(err) && isBodyParserError(err)) {
      failure = new TaskApiError('VALIDATION_ERROR', describeBodyError(err));
    } else if (!isTaskApiError(err)) {
      logger.error('Unhandled error', { error: err instanceof Error ? err.message : String(err) });
    }

    const { status, body, headers } = toHttpError(failure);
    res.status(status).set(headers).json(body);
  };
}
