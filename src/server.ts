import express, { Application } from 'express';
import morgan from 'morgan';
import { LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';

export interface AppOptions {
  /** Where request logs go (default: stdout) */
  logStream?: { write(line: string): void };
}

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult, options: AppOptions = {}): Application {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(morgan('dev', options.logStream ? { stream: options.logStream } : {}));

  // API routes
  app.use('/api', createApiRoutes(data));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      documents: data.documents.size
    });
  });

  return app;
}
