import { Router } from 'express';
import { ok } from '@owned-tasks/protocol';

export interface HealthInfo {
  appName: string;
  appVersion: string;
}

export interface HealthStatus {
  status: 'healthy';
  name: string;
  version: string;
  timestamp: string;
}

export function createHealthRouter(info: HealthInfo, now: () => Date = () => new Date()): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const body: HealthStatus = {
      status: 'healthy',
      name: info.appName,
      version: info.appVersion,
      timestamp: now().toISOString(),
    };
    res.json(ok(body));
  });

  return router;
}
