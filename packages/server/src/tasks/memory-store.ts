import type { Task } from '@owned-tasks/protocol';
import { advanceTimestamp, type TaskListFilter, type TaskPatch, type TaskStore } from './store';

interface StoredTask {
  task: Task;
  /** Insertion sequence, the list order key */
  seq: number;
}

/**
 * Process-local task store. Each method finishes its read-modify-write
 * synchronously before returning a promise, so no two operations on the same
 * task can interleave.
 */
export class InMemoryTaskStore implements TaskStore {
  private tasks: Map<string, StoredTask> = new Map();
  /** Ids of deleted tasks; they are never accepted again */
  private retiredIds: Set<string> = new Set();
  private nextSeq = 1;

  async insert(task: Task): Promise<void> {
    if (this.tasks.has(task.id) || this.retiredIds.has(task.id)) {
      throw new Error(`Task id already used: ${task.id}`);
    }
    this.tasks.set(task.id, { task: { ...task }, seq: this.nextSeq++ });
  }

  async findOwned(ownerId: string, taskId: string): Promise<Task | null> {
    const stored = this.lookup(ownerId, taskId);
    return stored ? { ...stored.task } : null;
  }

  async listOwned(ownerId: string, filter: TaskListFilter): Promise<Task[]> {
    const owned: StoredTask[] = [];
    for (const stored of this.tasks.values()) {
      if (stored.task.ownerId !== ownerId) continue;
      if (filter.completed !== undefined && stored.task.completed !== filter.completed) continue;
      owned.push(stored);
    }

    owned.sort((a, b) => b.seq - a.seq);
    return owned.map((stored) => ({ ...stored.task }));
  }

  async updateOwned(ownerId: string, taskId: string, patch: TaskPatch, updatedAt: string): Promise<Task | null> {
    const stored = this.lookup(ownerId, taskId);
    if (!stored) {
      return null;
    }

    const updated: Task = {
      ...stored.task,
      ...(patch.title !== undefined && { title: patch.title }),
      ...(patch.description !== undefined && { description: patch.description }),
      ...(patch.completed !== undefined && { completed: patch.completed }),
      updatedAt: advanceTimestamp(stored.task.updatedAt, updatedAt),
    };
    stored.task = updated;
    return { ...updated };
  }

  async toggleOwned(ownerId: string, taskId: string, updatedAt: string): Promise<Task | null> {
    const stored = this.lookup(ownerId, taskId);
    if (!stored) {
      return null;
    }

    const updated: Task = {
      ...stored.task,
      completed: !stored.task.completed,
      updatedAt: advanceTimestamp(stored.task.updatedAt, updatedAt),
    };
    stored.task = updated;
    return { ...updated };
  }

  async deleteOwned(ownerId: string, taskId: string): Promise<boolean> {
    if (!this.lookup(ownerId, taskId)) {
      return false;
    }
    this.tasks.delete(taskId);
    this.retiredIds.add(taskId);
    return true;
  }

  async close(): Promise<void> {
    this.tasks.clear();
  }

  private lookup(ownerId: string, taskId: string): StoredTask | undefined {
    const stored = this.tasks.get(taskId);
    if (!stored || stored.task.ownerId !== ownerId) {
      return undefined;
    }
    return stored;
  }
}
