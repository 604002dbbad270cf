import type { UserRecord, UserStore } from './store';

/** Process-local account store. The email check and the write happen in one synchronous step. */
export class InMemoryUserStore implements UserStore {
  private users: Map<string, UserRecord> = new Map();

  async insert(user: UserRecord): Promise<boolean> {
    if (this.users.has(user.email)) {
      return false;
    }
    this.users.set(user.email, { ...user });
    return true;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const user = this.users.get(email);
    return user ? { ...user } : null;
  }

  async close(): Promise<void> {
    this.users.clear();
  }
}
