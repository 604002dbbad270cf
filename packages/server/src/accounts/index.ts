/**
 * Accounts Module Exports
 */
export { AccountService, type AccountServiceOptions } from './service';
export { InMemoryUserStore } from './memory-store';
export { SqliteUserStore } from './sqlite-store';
export { openUserStore } from './open-store';
export type { UserStore, UserRecord } from './store';
