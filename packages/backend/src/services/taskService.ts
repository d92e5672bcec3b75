import type {
  CreateTaskRequest,
  ListTasksOptions,
  Task,
  UpdateTaskRequest,
} from '@taskboard/shared';
import type { Database } from '../config/database';
import { TaskPage, TaskRepository } from '../repositories/taskRepository';

/**
 * Data-access entry points. Every call runs on its own database session,
 * released when the call settles.
 */
export class TaskService {
  constructor(private database: Database) {}

  async listTasks(options: ListTasksOptions): Promise<TaskPage> {
    return this.database.withSession((session) => new TaskRepository(session).findAll(options));
  }

  async getTaskById(id: number): Promise<Task | null> {
    return this.database.withSession((session) => new TaskRepository(session).findById(id));
  }

  async createTask(data: CreateTaskRequest): Promise<Task> {
    return this.database.withSession((session) => new TaskRepository(session).create(data));
  }

  async updateTask(id: number, data: UpdateTaskRequest): Promise<Task | null> {
    return this.database.withSession((session) => new TaskRepository(session).update(id, data));
  }

  async deleteTask(id: number): Promise<boolean> {
    return this.database.withSession((session) => new TaskRepository(session).delete(id));
  }
}
