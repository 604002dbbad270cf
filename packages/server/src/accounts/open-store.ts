import type { DatabaseTarget } from '../config';
import { InMemoryUserStore } from './memory-store';
import { SqliteUserStore } from './sqlite-store';
import type { UserStore } from './store';

export function openUserStore(target: DatabaseTarget): UserStore {
  switch (target.kind) {
    case 'memory':
      return new InMemoryUserStore();
    case 'sqlite':
      return new SqliteUserStore(target.filename);
  }
}
