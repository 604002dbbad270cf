/**
 * HTTP Module Exports
 */
export { createApp, type AppOptions } from './app';
export { authenticate, requireIdentity } from './authenticate';
export { createTasksRouter } from './tasks-router';
export { createAuthRouter } from './auth-router';
export { createHealthRouter, type HealthInfo, type HealthStatus } from './health-router';
export { createErrorHandler, notFoundHandler } from './error-handler';
export { requestLog } from './request-log';
