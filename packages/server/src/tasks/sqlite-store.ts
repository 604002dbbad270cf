import Database from 'better-sqlite3';
import type { Task } from '@owned-tasks/protocol';
import { advanceTimestamp, type TaskListFilter, type TaskPatch, type TaskStore } from './store';

interface TaskRecord {
  id: string;
  owner_id: string;
  title: string;
  description: string | null;
  completed: number;
  created_at: string;
  updated_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tasks (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    owner_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT,
    completed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS retired_task_ids (
    id TEXT PRIMARY KEY
  );

  CREATE INDEX IF NOT EXISTS idx_tasks_owner ON tasks(owner_id, seq);
`;

const TASK_COLUMNS = 'id, owner_id, title, description, completed, created_at, updated_at';

function mapRecordToTask(record: TaskRecord): Task {
  return {
    id: record.id,
    ownerId: record.owner_id,
    title: record.title,
    description: record.description,
    completed: record.completed === 1,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

/**
 * SQLite-backed task store. Updates and toggles are single
 * `UPDATE ... RETURNING` statements, so each is atomic per task.
 */
export class SqliteTaskStore implements TaskStore {
  private db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
    // Lets UPDATE statements stamp updated_at without a separate read
    this.db.function('advance_timestamp', { deterministic: true }, (previous: unknown, requested: unknown) => {
      if (typeof previous !== 'string' || typeof requested !== 'string') {
        return requested;
      }
      return advanceTimestamp(previous, requested);
    });
  }

  async insert(task: Task): Promise<void> {
    const retired = this.db.prepare('SELECT 1 FROM retired_task_ids WHERE id = $id').get({ id: task.id });
    if (retired) {
      throw new Error(`Task id already used: ${task.id}`);
    }

    this.db
      .prepare(
        `INSERT INTO tasks (${TASK_COLUMNS})
         VALUES ($id, $ownerId, $title, $description, $completed, $createdAt, $updatedAt)`
      )
      .run({
        id: task.id,
        ownerId: task.ownerId,
        title: task.title,
        description: task.description,
        completed: task.completed ? 1 : 0,
        createdAt: task.createdAt,
        updatedAt: task.updatedAt,
      });
  }

  async findOwned(ownerId: string, taskId: string): Promise<Task | null> {
    const record = this.db
      .prepare(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id = $taskId AND owner_id = $ownerId`)
      .get({ taskId, ownerId }) as TaskRecord | undefined;
    return record ? mapRecordToTask(record) : null;
  }

  async listOwned(ownerId: string, filter: TaskListFilter): Promise<Task[]> {
    let query = `SELECT ${TASK_COLUMNS} FROM tasks WHERE owner_id = $ownerId`;
    const params: { ownerId: string; completed?: number } = { ownerId };

    if (filter.completed !== undefined) {
      query += ' AND completed = $completed';
      params.completed = filter.completed ? 1 : 0;
    }

    query += ' ORDER BY seq DESC';

    const records = this.db.prepare(query).all(params) as TaskRecord[];
    return records.map(mapRecordToTask);
  }

  async updateOwned(ownerId: string, taskId: string, patch: TaskPatch, updatedAt: string): Promise<Task | null> {
    const assignments: string[] = ['updated_at = advance_timestamp(updated_at, $updatedAt)'];
    const params: Record<string, string | number | null> = { ownerId, taskId, updatedAt };

    if (patch.title !== undefined) {
      assignments.push('title = $title');
      params.title = patch.title;
    }
    if (patch.description !== undefined) {
      assignments.push('description = $description');
      params.description = patch.description;
    }
    if (patch.completed !== undefined) {
      assignments.push('completed = $completed');
      params.completed = patch.completed ? 1 : 0;
    }

    const record = this.db
      .prepare(
        `UPDATE tasks SET ${assignments.join(', ')}
         WHERE id = $taskId AND owner_id = $ownerId
         RETURNING ${TASK_COLUMNS}`
      )
      .get(params) as TaskRecord | undefined;
    return record ? mapRecordToTask(record) : null;
  }

  async toggleOwned(ownerId: string, taskId: string, updatedAt: string): Promise<Task | null> {
    const record = this.db
      .prepare(
        `UPDATE tasks SET completed = 1 - completed, updated_at = advance_timestamp(updated_at, $updatedAt)
         WHERE id = $taskId AND owner_id = $ownerId
         RETURNING ${TASK_COLUMNS}`
      )
      .get({ ownerId, taskId, updatedAt }) as TaskRecord | undefined;
    return record ? mapRecordToTask(record) : null;
  }

  async deleteOwned(ownerId: string, taskId: string): Promise<boolean> {
    const remove = this.db.transaction((owner: string, id: string): boolean => {
      const result = this.db.prepare('DELETE FROM tasks WHERE id = $id AND owner_id = $owner').run({ id, owner });
      if (result.changes === 0) {
        return false;
      }
      this.db.prepare('INSERT OR IGNORE INTO retired_task_ids (id) VALUES ($id)').run({ id });
      return true;
    });
    return remove(ownerId, taskId);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
