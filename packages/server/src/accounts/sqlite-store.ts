import Database from 'better-sqlite3';
import type { UserRecord, UserStore } from './store';

interface UserRow {
  id: string;
  email: string;
  name: string;
  password_hash: string;
  created_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    email TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    password_hash TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
`;

function mapRowToUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class SqliteUserStore implements UserStore {
  private db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
  }

  async insert(user: UserRecord): Promise<boolean> {
    const result = this.db
      .prepare(
        `INSERT INTO users (id, email, name, password_hash, created_at)
         VALUES ($id, $email, $name, $passwordHash, $createdAt)
         ON CONFLICT(email) DO NOTHING`
      )
      .run({
        id: user.id,
        email: user.email,
        name: user.name,
        passwordHash: user.passwordHash,
        createdAt: user.createdAt,
      });
    return result.changes === 1;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const row = this.db
      .prepare('SELECT id, email, name, password_hash, created_at FROM users WHERE email = $email')
      .get({ email }) as UserRow | undefined;
    return row ? mapRowToUser(row) : null;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
