import type { Database, Dialect } from '../config/database';
import { TASK_PRIORITIES, TASK_STATUSES } from '../schemas/task';

const statusList = TASK_STATUSES.map((status) => `'${status}'`).join(', ');
const priorityList = TASK_PRIORITIES.map((priority) => `'${priority}'`).join(', ');

const TASKS_TABLE: Record<Dialect, string> = {
  postgres: `
CREATE TABLE IF NOT EXISTS tasks (
    id SERIAL PRIMARY KEY,
    title VARCHAR(200) NOT NULL CHECK (char_length(title) >= 1),
    description VARCHAR(1000),
    status VARCHAR(20) NOT NULL DEFAULT 'pending' CHECK (status IN (${statusList})),
    priority VARCHAR(20) NOT NULL DEFAULT 'medium' CHECK (priority IN (${priorityList})),
    due_date TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`,
  sqlite: `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL CHECK (length(title) BETWEEN 1 AND 200),
    description TEXT CHECK (description IS NULL OR length(description) <= 1000),
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN (${statusList})),
    priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN (${priorityList})),
    due_date TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
)`,
};

/** Creates the tasks table if it does not exist yet. */
export async function ensureSchema(database: Database): Promise<void> {
  await database.withSession(async (session) => {
    await session.query(TASKS_TABLE[database.dialect]);
  });
}
