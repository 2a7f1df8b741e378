import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { logger } from './config/logger.js';

import analysisRoutes from './routes/analysis.js';
import comparisonRoutes from './routes/comparison.js';
import thankYouRoutes from './routes/thank-yous.js';

export function createApp() {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, {
      body: req.body && Object.keys(req.body).length > 0 ? '(has body)' : undefined,
    });
    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.use('/api/analysis', analysisRoutes);
  app.use('/api/comparison', comparisonRoutes);
  app.use('/api/thank-yous', thankYouRoutes);

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler; malformed JSON bodies arrive here as 400s from body-parser
  app.use((err: Error & { status?: number }, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
    });
    if (err.status === 400) {
      return res.status(400).json({ error: 'Malformed request body' });
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
