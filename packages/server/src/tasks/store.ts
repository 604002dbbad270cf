import type { Task } from '@owned-tasks/protocol';

/** Changes applied by an update; absent keys are left as they are */
export interface TaskPatch {
  title?: string;
  description?: string | null;
  completed?: boolean;
}

export interface TaskListFilter {
  completed?: boolean;
}

/**
 * Stamp for a mutation: `requested`, or one millisecond past `previous` when
 * the clock has not moved beyond it, so `updatedAt` advances on every change.
 */
export const advanceTimestamp = (previous: string, requested: string): string => {
  const last = Date.parse(previous);
  if (Number.isNaN(last) || Date.parse(requested) > last) {
    return requested;
  }
  return new Date(last + 1).toISOString();
};

/**
 * Persistence contract for tasks. Every read and write is keyed by owner as
 * well as id, so a query can never reach a task filed under someone else.
 *
 * `update` and `toggle` must apply as one atomic step per task: no other
 * operation on the same task may observe or interleave with the
 * read-modify-write. Both stamp `updatedAt` through `advanceTimestamp`.
 * Lists are ordered newest first by creation sequence.
 */
export interface TaskStore {
  insert(task: Task): Promise<void>;
  findOwned(ownerId: string, taskId: string): Promise<Task | null>;
  listOwned(ownerId: string, filter: TaskListFilter): Promise<Task[]>;
  /** Returns the updated task, or null when no owned task matched */
  updateOwned(ownerId: string, taskId: string, patch: TaskPatch, updatedAt: string): Promise<Task | null>;
  /** Flips `completed`; returns the updated task, or null when no owned task matched */
  toggleOwned(ownerId: string, taskId: string, updatedAt: string): Promise<Task | null>;
  /** Returns false when no owned task matched */
  deleteOwned(ownerId: string, taskId: string): Promise<boolean>;
  close(): Promise<void>;
}
