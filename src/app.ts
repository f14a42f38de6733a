import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import path from 'node:path';
import { createImagesRouter, type ImagesRouterDeps } from './api/routes/images.js';

export interface AppOptions extends ImagesRouterDeps {
  env: string;
}

export function createApp(options: AppOptions): Express {
  const app: Express = express();

  app.set('views', path.join(__dirname, '..', 'views'));
  app.set('view engine', 'ejs');

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      env: options.env,
    });
  });

  app.use(createImagesRouter(options));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: 'Invalid upload', message: err.message });
      return;
    }
    console.error('Error:', err);
    res.status(500).json({
      error: 'Internal server error',
      message: options.env === 'development' ? err.message : undefined,
    });
  });

  return app;
}
