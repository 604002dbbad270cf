import type { DatabaseTarget } from '../config';
import { InMemoryTaskStore } from './memory-store';
import { SqliteTaskStore } from './sqlite-store';
import type { TaskStore } from './store';

export function openTaskStore(target: DatabaseTarget): TaskStore {
  switch (target.kind) {
    case 'memory':
      return new InMemoryTaskStore();
    case 'sqlite':
      return new SqliteTaskStore(target.filename);
  }
}
