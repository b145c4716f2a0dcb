import express from 'express';
import cors from 'cors';
import { createJobRouter } from './routes/jobs';
import type { JobRouteDeps } from './routes/jobs';

export function createApp(deps: JobRouteDeps): express.Express {
  const app = express();
  const { logger } = deps;

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createJobRouter(deps));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), service: 'jobs' });
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'Malformed JSON body' });
      return;
    }
    logger.error('Unhandled error', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
