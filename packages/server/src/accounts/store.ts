/** An account as persisted; `passwordHash` never leaves the server */
export interface UserRecord {
  id: string;
  /** Lower-cased, unique across all accounts */
  email: string;
  name: string;
  passwordHash: string;
  createdAt: string;
}

/** Persistence contract for accounts, keyed by their lower-cased email. */
export interface UserStore {
  /** Returns false when the email is already registered */
  insert(user: UserRecord): Promise<boolean>;
  findByEmail(email: string): Promise<UserRecord | null>;
  close(): Promise<void>;
}
