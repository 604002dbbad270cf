import type { Task } from '@owned-tasks/protocol';
import type { Identity } from '../src/auth';
import { TaskApiError, type TaskErrorKind } from '../src/errors';
import { createLogger, type Logger } from '../src/logger';

export const TEST_SECRET = 'test-secret';

export const identityOf = (userId: string): Identity => ({
  userId,
  issuedAt: null,
  expiresAt: new Date('2099-01-01T00:00:00.000Z'),
});

/** Clock that advances one second per call, starting at `start` */
export const steppingClock = (start: string = '2026-01-01T00:00:00.000Z'): (() => Date) => {
  let current = Date.parse(start);
  return () => {
    const value = new Date(current);
    current += 1000;
    return value;
  };
};

export const sequentialIds = (prefix: string = 'task'): (() => string) => {
  let counter = 0;
  return () => `${prefix}-${++counter}`;
};

export const makeTask = (overrides: Partial<Task> = {}): Task => ({
  id: 'task-1',
  ownerId: 'user-1',
  title: 'Buy milk',
  description: null,
  completed: false,
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
  ...overrides,
});

export const kindOfSync = (run: () => unknown): TaskErrorKind | null => {
  try {
    run();
  } catch (err) {
    if (err instanceof TaskApiError) {
      return err.kind;
    }
    throw err;
  }
  return null;
};

export const kindOf = async (pending: Promise<unknown>): Promise<TaskErrorKind | null> => {
  try {
    await pending;
  } catch (err) {
    if (err instanceof TaskApiError) {
      return err.kind;
    }
    throw err;
  }
  return null;
};

export interface CapturedLogger {
  logger: Logger;
  lines: string[];
}

export const captureLogger = (scope: string = 'test'): CapturedLogger => {
  const lines: string[] = [];
  const push = (line: string) => {
    lines.push(line);
  };
  const logger = createLogger(scope, {
    level: 'debug',
    sink: { debug: push, info: push, warn: push, error: push },
  });
  return { logger, lines };
};
