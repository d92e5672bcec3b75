import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { HealthResponse } from '@taskboard/shared';
import type { AppConfig } from './config/env';
import type { Database } from './config/database';
import { createTasksRouter } from './routes/tasks';
import { TaskService } from './services/taskService';
import { auditLog } from './middleware/audit';
import { errorHandler } from './middleware/errorHandler';

export interface AppOptions {
  config: Pick<AppConfig, 'appName' | 'appVersion' | 'debug'>;
  database: Database;
  logRequests?: boolean;
}

export function createApp({ config, database, logRequests = true }: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  if (logRequests) {
    app.use(auditLog);
  }

  // Routes
  app.use('/tasks', createTasksRouter(new TaskService(database)));

  // Liveness: the process answers and the store is reachable
  app.get('/', async (_req: Request, res: Response) => {
    const body: HealthResponse = {
      message: `Welcome to ${config.appName}`,
      version: config.appVersion,
      status: 'healthy',
      database: 'connected',
    };
    try {
      await database.ping();
      res.json(body);
    } catch (error) {
      console.error('[Health] Database ping failed:', error);
      res.status(503).json({ ...body, status: 'unhealthy', database: 'unreachable' });
    }
  });

  app.get('/health', async (_req: Request, res: Response) => {
    const timestamp = new Date().toISOString();
    try {
      await database.ping();
      res.json({ status: 'ok', timestamp });
    } catch (error) {
      console.error('[Health] Database ping failed:', error);
      res.status(503).json({ status: 'unavailable', timestamp });
    }
  });

  app.use(errorHandler({ debug: config.debug }));

  return app;
}
