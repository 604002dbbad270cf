import { randomUUID } from 'node:crypto';
import {
  parseCreateTaskRequest,
  parseTaskListQuery,
  parseUpdateTaskRequest,
  type Task,
  type TaskListResponse,
} from '@owned-tasks/protocol';
import { assertOwner, type Identity } from '../auth';
import { TaskApiError, runStoreOperation, unwrapPayload } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { TaskStore } from './store';

export interface TaskServiceOptions {
  store: TaskStore;
  logger?: Logger;
  /** Clock for timestamps; defaults to the system clock */
  now?: () => Date;
  /** Id generator; defaults to random UUIDs */
  generateId?: () => string;
}

/**
 * TaskService - task lifecycle with ownership enforced on every call
 *
 * Each operation runs its stages in a fixed order and stops at the first
 * failure:
 * 1. ownership authorization (caller vs. owner in the path)
 * 2. existence of the task under that owner
 * 3. payload validation
 * 4. mutation
 *
 * Payloads arrive unparsed so that a foreign caller is rejected before its
 * body is looked at. Store failures surface as STORE_UNAVAILABLE and are
 * never retried.
 */
export class TaskService {
  private store: TaskStore;
  private logger: Logger;
  private now: () => Date;
  private generateId: () => string;

  constructor(options: TaskServiceOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async list(caller: Identity, ownerId: string, rawQuery?: unknown): Promise<TaskListResponse> {
    assertOwner(caller, ownerId);
    const query = unwrapPayload(parseTaskListQuery(rawQuery));

    const tasks = await this.withStore('list', () => this.store.listOwned(ownerId, query));
    return { tasks, total: tasks.length };
  }

  async create(caller: Identity, ownerId: string, payload: unknown): Promise<Task> {
    assertOwner(caller, ownerId);
    const input = unwrapPayload(parseCreateTaskRequest(payload));

    const timestamp = this.now().toISOString();
    const task: Task = {
      id: this.generateId(),
      ownerId,
      title: input.title,
      description: input.description ?? null,
      completed: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.withStore('create', () => this.store.insert(task));
    this.logger.debug('Task created', { taskId: task.id });
    return task;
  }

  async get(caller: Identity, ownerId: string, taskId: string): Promise<Task> {
    assertOwner(caller, ownerId);
    return this.requireOwned(ownerId, taskId);
  }

  async update(caller: Identity, ownerId: string, taskId: string, payload: unknown): Promise<Task> {
    assertOwner(caller, ownerId);
    await this.requireOwned(ownerId, taskId);
    const patch = unwrapPayload(parseUpdateTaskRequest(payload));

    const updatedAt = this.now().toISOString();
    const updated = await this.withStore('update', () =>
      this.store.updateOwned(ownerId, taskId, patch, updatedAt)
    );
    // Deleted between the existence check and the write
    if (!updated) {
      throw new TaskApiError('NOT_FOUND');
    }
    return updated;
  }

  async delete(caller: Identity, ownerId: string, taskId: string): Promise<void> {
    assertOwner(caller, ownerId);
    const removed = await this.withStore('delete', () => this.store.deleteOwned(ownerId, taskId));
    if (!removed) {
      throw new TaskApiError('NOT_FOUND');
    }
    this.logger.debug('Task deleted', { taskId });
  }

  async toggleComplete(caller: Identity, ownerId: string, taskId: string): Promise<Task> {
    assertOwner(caller, ownerId);
    const updatedAt = this.now().toISOString();
    const toggled = await this.withStore('toggle', () => this.store.toggleOwned(ownerId, taskId, updatedAt));
    if (!toggled) {
      throw new TaskApiError('NOT_FOUND');
    }
    return toggled;
  }

  private async requireOwned(ownerId: string, taskId: string): Promise<Task> {
    const task = await this.withStore('get', () => this.store.findOwned(ownerId, taskId));
    if (!task) {
      throw new TaskApiError('NOT_FOUND');
    }
    return task;
  }

  private withStore<T>(operation: string, run: () => Promise<T>): Promise<T> {
    return runStoreOperation(this.logger, operation, run);
  }
}
