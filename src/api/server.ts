import fs from 'node:fs';
import path from 'node:path';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { config } from '../config/index';
import type { StatusProvider } from '../display/types';
import { createLogger } from '../utils/logger';
import { createFrameRouter, type KioskControls } from './routes/frame';

const log = createLogger('kiosk');

/**
 * public/ sits at the project root, both from src/api and from dist/src/api
 */
export function resolvePublicDir(): string | undefined {
  const candidates = [
    path.resolve(__dirname, '..', '..', 'public'),
    path.resolve(__dirname, '..', '..', '..', 'public'),
  ];
  return candidates.find((dir) => fs.existsSync(path.join(dir, 'index.html')));
}

export function createKioskApp(controls: KioskControls, status?: StatusProvider): Express {
  const app: Express = express();

  app.disable('x-powered-by');
  app.use(express.json());

  const publicDir = resolvePublicDir();
  if (publicDir) {
    app.use(express.static(publicDir));
  } else {
    log.warn('Kiosk page not found; only the frame API is served');
  }

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      env: config.env,
      hasFrame: controls.currentFrame() !== null,
      ...(status ? status() : {}),
    });
  });

  app.use('/', createFrameRouter(controls));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser errors carry their own 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status < 500) {
      res.status(status).json({ error: 'Bad request', message: err.message });
      return;
    }

    log.error('Error:', err);
    res.status(status).json({
      error: 'Internal server error',
      message: config.env === 'development' ? err.message : undefined,
    });
  });

  return app;
}
