import { Router } from 'express';
import pino from 'pino';
import { toErrorObject } from '../utils/errors.js';

const log = pino({ name: 'health' });

/** Liveness for load balancers: 200 while the database answers, 503 otherwise. */
export function createHealthRouter(checkDatabase: () => Promise<void>): Router {
  const router = Router();

  router.get('/healthz', async (_req, res) => {
    try {
      await checkDatabase();
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch (err) {
      log.warn({ err: toErrorObject(err) }, 'Database health check failed');
      res.status(503).json({ status: 'error', error: 'database unavailable' });
    }
  });

  return router;
}
