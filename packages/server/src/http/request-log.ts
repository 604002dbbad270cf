import type { RequestHandler } from 'express';
import type { Logger } from '../logger';

/** Writes `METHOD path status durationms` once each response finishes. */
export function requestLog(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      const path = req.originalUrl.split('?')[0];
      logger.info(`${req.method} ${path} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`);
    });
    next();
  };
}
