export type {
  Task,
  TaskStatus,
  TaskPriority,
  CreateTaskRequest,
  UpdateTaskRequest,
  ListTasksOptions,
  TaskListResponse,
} from './types/task';
export type { HealthResponse } from './types/health';
