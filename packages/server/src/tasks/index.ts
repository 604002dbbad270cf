/**
 * Task Module Exports
 */
export { TaskService, type TaskServiceOptions } from './service';
export { InMemoryTaskStore } from './memory-store';
export { SqliteTaskStore } from './sqlite-store';
export { openTaskStore } from './open-store';
export type { TaskStore, TaskPatch, TaskListFilter } from './store';
export { advanceTimestamp } from './store';
