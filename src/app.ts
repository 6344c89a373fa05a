import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import pino from 'pino';
import { createAppraisalRouter } from './routes/appraisals.js';
import { createHealthRouter } from './routes/health.js';
import { createPriceRouter, type PriceRouterDeps } from './routes/prices.js';
import type { AppraisalService } from './services/appraisal/appraisal-service.js';
import { AppError, toErrorObject } from './utils/errors.js';

const logger = pino({ name: 'http' });

export interface AppDeps extends PriceRouterDeps {
  appraisal: Pick<AppraisalService, 'resolveMarketValue' | 'appraiseListing'>;
  checkDatabase: () => Promise<void>;
}

function statusOf(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return null;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Security headers
  app.use(helmet());
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, url: req.url }, 'request');
    next();
  });

  app.use(createHealthRouter(deps.checkDatabase));
  app.use('/api/appraisals', createAppraisalRouter(deps.appraisal));
  app.use('/api/prices', createPriceRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      res.status(err.statusCode).json({ error: err.message, code: err.code });
      return;
    }
    const status = statusOf(err);
    if (status !== null && status >= 400 && status < 500) {
      // Body parser rejections (malformed JSON, oversized payloads)
      res.status(status).json({ error: 'Invalid request body' });
      return;
    }
    logger.error({ err: toErrorObject(err) }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
