import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { parseBearerHeader, type Identity, type IdentityVerifier } from '../auth';
import { TaskApiError } from '../errors';
import type { Logger } from '../logger';

declare global {
  namespace Express {
    interface Request {
      /** Set by `authenticate` once the bearer token verifies */
      identity?: Identity;
    }
  }
}

/**
 * Verifies the bearer token and attaches the caller identity to the request.
 * Nothing downstream runs for an unauthenticated request.
 */
export function authenticate(verifier: IdentityVerifier, logger: Logger): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = parseBearerHeader(req.headers.authorization);
    if (!token) {
      logger.debug('Rejected request', { reason: 'CREDENTIAL_MISSING' });
      next(new TaskApiError('CREDENTIAL_MISSING'));
      return;
    }

    try {
      req.identity = verifier.verify(token);
      next();
    } catch (err) {
      if (err instanceof TaskApiError) {
        logger.debug('Rejected request', { reason: err.kind });
      }
      next(err);
    }
  };
}

/** Identity set by `authenticate`; its absence means the route was mounted wrong. */
export function requireIdentity(req: Request): Identity {
  if (!req.identity) {
    throw new TaskApiError('CREDENTIAL_MISSING');
  }
  return req.identity;
}
