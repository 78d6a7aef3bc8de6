import cors from 'cors';
import express from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import { ServiceContainer } from '../../application/ServiceContainer';
import { createLogger } from '../../lib/logger';
import { errorHandler } from './middleware/error-handler';
import { reconciliationRoutes } from './routes/reconciliation';
import { uploadRoutes } from './routes/uploads';

const logger = createLogger('rest');

/**
 * Initialize the REST API
 * @returns Express application instance
 */
export function createServer(container: ServiceContainer): express.Application {
  const app = express();

  // Common middleware
  app.use(helmet());
  app.use(cors());
  app.use(
    '/api',
    rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      limit: 100,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
    })
  );

  app.use((req, _res, next) => {
    logger.info({ method: req.method, url: req.url }, `${req.method} ${req.url}`);
    next();
  });

  // API routes
  app.use('/api/uploads', uploadRoutes(container));
  app.use('/api/reconciliation', reconciliationRoutes(container));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', pendingSweeps: container.scheduler.size });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
