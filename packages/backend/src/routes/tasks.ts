import { NextFunction, Request, Response, Router } from 'express';
import type { Task, TaskListResponse } from '@taskboard/shared';
import { parseRequest } from '../middleware/validation';
import {
  createTaskSchema,
  listQuerySchema,
  taskIdParamSchema,
  taskListSchema,
  taskReadSchema,
  updateTaskSchema,
} from '../schemas/task';
import { TaskService } from '../services/taskService';
import { taskNotFound } from '../utils/errors';

export function createTasksRouter(taskService: TaskService): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { offset, limit } = parseRequest(listQuerySchema, req.query, 'query');
      const page = await taskService.listTasks({ offset, limit });
      const body: TaskListResponse = taskListSchema.parse({ tasks: page.tasks, count: page.total });
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, label } = parseRequest(taskIdParamSchema, req.params, 'params');
      const task = await taskService.getTaskById(id);
      if (!task) {
        throw taskNotFound(label);
      }
      res.json(taskReadSchema.parse(task));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = parseRequest(createTaskSchema, req.body, 'body');
      const task = await taskService.createTask(data);
      res.status(201).json(taskReadSchema.parse(task));
    } catch (error) {
      next(error);
    }
  });

  const updateHandler = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, label } = parseRequest(taskIdParamSchema, req.params, 'params');
      const data = parseRequest(updateTaskSchema, req.body, 'body');
      const task: Task | null = await taskService.updateTask(id, data);
      if (!task) {
        throw taskNotFound(label);
      }
      res.json(taskReadSchema.parse(task));
    } catch (error) {
      next(error);
    }
  };
  router.put('/:id', updateHandler);
  router.patch('/:id', updateHandler);

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, label } = parseRequest(taskIdParamSchema, req.params, 'params');
      const deleted = await taskService.deleteTask(id);
      if (!deleted) {
        throw taskNotFound(label);
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
