import express, { type Express } from 'express';
import cors from 'cors';
import { ok } from '@owned-tasks/protocol';
import type { AccountService } from '../accounts';
import type { IdentityVerifier } from '../auth';
import type { Logger } from '../logger';
import type { TaskService } from '../tasks';
import { createAuthRouter } from './auth-router';
import { authenticate } from './authenticate';
import { createErrorHandler, notFoundHandler } from './error-handler';
import { createHealthRouter, type HealthInfo } from './health-router';
import { requestLog } from './request-log';
import { createTasksRouter } from './tasks-router';

export interface AppOptions {
  verifier: IdentityVerifier;
  service: TaskService;
  accounts: AccountService;
  logger: Logger;
  corsOrigin: string;
  info: HealthInfo;
}

/**
 * Builds the express app:
 *   GET /                 -> name and version
 *   GET /api/health       -> liveness
 *   POST /api/auth/*      -> sign-up and sign-in
 *   /api/:ownerId/tasks   -> task routes, bearer token required
 */
export function createApp(options: AppOptions): Express {
  const { verifier, service, accounts, logger, corsOrigin, info } = options;
  const app = express();

  app.disable('x-powered-by');
  app.use(cors({ origin: corsOrigin, credentials: true }));
  app.use(requestLog(logger.child('http')));

  app.get('/', (_req, res) => {
    res.json(ok({ message: `${info.appName} is running`, version: info.appVersion }));
  });

  app.use('/api', createHealthRouter(info));
  app.use('/api', createAuthRouter(accounts));
  app.use('/api', authenticate(verifier, logger.child('auth')), createTasksRouter(service));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger.child('http')));

  return app;
}
