import { z } from 'zod';
import type {
  CreateTaskRequest,
  ListTasksOptions,
  Task,
  UpdateTaskRequest,
} from '@taskboard/shared';
import type { DatabaseSession, Row, SqlValue } from '../config/database';
import { taskPrioritySchema, taskStatusSchema } from '../schemas/task';

// PostgreSQL hands back Date objects, SQLite ISO strings.
const taskRowSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  status: taskStatusSchema,
  priority: taskPrioritySchema,
  due_date: z.coerce.date().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

// Upper bound of the SERIAL (int4) id column.
export const MAX_TASK_ID = 2147483647;

// Ids no row can carry never reach the store, where PostgreSQL would
// reject them as out of range instead of finding nothing.
export function isStorableId(id: number): boolean {
  return Number.isSafeInteger(id) && id >= 1 && id <= MAX_TASK_ID;
}

const countRowSchema = z.object({ total: z.coerce.number().int() });

function toTimestamp(value: Date | null | undefined): string | null {
  return value ? value.toISOString() : null;
}

export interface TaskPage {
  tasks: Task[];
  total: number;
}

export class TaskRepository {
  constructor(
    private session: DatabaseSession,
    private now: () => Date = () => new Date()
  ) {}

  async findAll({ offset, limit }: ListTasksOptions): Promise<TaskPage> {
    const result = await this.session.query(
      'SELECT * FROM tasks ORDER BY id ASC LIMIT $1 OFFSET $2',
      [limit, offset]
    );
    const count = await this.session.query('SELECT CAST(COUNT(*) AS INTEGER) AS total FROM tasks');
    return {
      tasks: result.rows.map((row) => this.mapRowToTask(row)),
      total: countRowSchema.parse(count.rows[0]).total,
    };
  }

  async findById(id: number): Promise<Task | null> {
    if (!isStorableId(id)) {
      return null;
    }
    const result = await this.session.query('SELECT * FROM tasks WHERE id = $1', [id]);
    return result.rows[0] ? this.mapRowToTask(result.rows[0]) : null;
  }

  async create(data: CreateTaskRequest): Promise<Task> {
    const createdAt = this.now().toISOString();
    const result = await this.session.query(
      `INSERT INTO tasks (title, description, status, priority, due_date, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $6)
       RETURNING *`,
      [
        data.title,
        data.description ?? null,
        data.status ?? 'pending',
        data.priority ?? 'medium',
        toTimestamp(data.due_date),
        createdAt,
      ]
    );
    return this.mapRowToTask(result.rows[0]);
  }

  async update(id: number, data: UpdateTaskRequest): Promise<Task | null> {
    const existing = await this.findById(id);
    if (!existing) {
      return null;
    }

    const updates: string[] = [];
    const values: SqlValue[] = [];
    let paramCount = 1;

    if (data.title !== undefined) {
      updates.push(`title = $${paramCount++}`);
      values.push(data.title);
    }
    if (data.description !== undefined) {
      updates.push(`description = $${paramCount++}`);
      values.push(data.description);
    }
    if (data.status !== undefined) {
      updates.push(`status = $${paramCount++}`);
      values.push(data.status);
    }
    if (data.priority !== undefined) {
      updates.push(`priority = $${paramCount++}`);
      values.push(data.priority);
    }
    if (data.due_date !== undefined) {
      updates.push(`due_date = $${paramCount++}`);
      values.push(toTimestamp(data.due_date));
    }

    updates.push(`updated_at = $${paramCount++}`);
    values.push(this.nextUpdatedAt(existing.updated_at).toISOString());
    values.push(id);

    const result = await this.session.query(
      `UPDATE tasks SET ${updates.join(', ')} WHERE id = $${paramCount} RETURNING *`,
      values
    );
    return result.rows[0] ? this.mapRowToTask(result.rows[0]) : null;
  }

  async delete(id: number): Promise<boolean> {
    if (!isStorableId(id)) {
      return false;
    }
    const result = await this.session.query('DELETE FROM tasks WHERE id = $1', [id]);
    return result.rowCount > 0;
  }

  // updated_at must move forward even when two writes land in the same millisecond.
  private nextUpdatedAt(previous: Date): Date {
    const now = this.now();
    return now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);
  }

  private mapRowToTask(row: Row): Task {
    return taskRowSchema.parse(row);
  }
}
