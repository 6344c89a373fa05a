import { Router, type Request, type Response } from 'express';
import pino from 'pino';
import { z } from 'zod';
import { validateInput } from '../middleware/validation.js';
import type { CatalogProvider } from '../services/catalog/catalog-provider.js';
import {
  changeFrequency,
  FREQUENCY_CRON,
  PRICE_BATCH_JOB,
  readFrequency,
  updateFrequencySchema,
} from '../services/jobs/price-batch-job.js';
import type { JobScheduler } from '../services/jobs/scheduler.js';
import type { BatchJobController } from '../services/price-tracker/batch-job.js';
import { readLastRunStats, SETTING_KEYS, type SettingsStore } from '../services/price-tracker/settings-store.js';
import type { SnapshotStore } from '../services/price-tracker/snapshot-store.js';
import { getGainers, getGainersWithFallback } from '../services/price-tracker/trends.js';
import { toErrorObject } from '../utils/errors.js';

const log = pino({ name: 'prices' });

export interface PriceRouterDeps {
  controller: Pick<BatchJobController, 'runNow' | 'cancel' | 'isRunning'>;
  catalog: CatalogProvider;
  snapshots: Pick<SnapshotStore, 'getLatestSnapshotsForItems'>;
  settings: SettingsStore;
  scheduler: Pick<JobScheduler, 'rescheduleJob' | 'getJobStatuses'>;
}

const gainersQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  fallback: z.enum(['price']).optional(),
});

const frequencyBodySchema = z.object({ frequency: updateFrequencySchema });

export function createPriceRouter(deps: PriceRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/prices/gainers: Biggest movers between the two latest snapshots.
   * With ?fallback=price, falls back to the priciest items when too few have a trend.
   */
  router.get('/gainers', async (req: Request, res: Response) => {
    const query = validateInput(gainersQuerySchema, req.query, res, 'Invalid query parameters');
    if (!query) return;

    try {
      const catalog = await deps.catalog.listItems();
      if (query.fallback === 'price') {
        res.json(await getGainersWithFallback(deps.snapshots, catalog, query.limit));
        return;
      }
      res.json({ ranking: 'trend', items: await getGainers(deps.snapshots, catalog, query.limit) });
    } catch (err) {
      log.error({ err: toErrorObject(err) }, 'Failed to rank gainers');
      res.status(500).json({ error: 'Failed to rank gainers' });
    }
  });

  // GET /api/prices/batch
  router.get('/batch', async (_req: Request, res: Response) => {
    try {
      const [status, lastError, lastRun, frequency] = await Promise.all([
        deps.settings.getSetting(SETTING_KEYS.status),
        deps.settings.getSetting(SETTING_KEYS.lastError),
        readLastRunStats(deps.settings),
        readFrequency(deps.settings),
      ]);
      res.json({
        status: status ?? 'idle',
        isRunning: deps.controller.isRunning,
        lastRun,
        lastError,
        frequency,
        schedule: FREQUENCY_CRON[frequency],
        job: deps.scheduler.getJobStatuses()[PRICE_BATCH_JOB] ?? null,
      });
    } catch (err) {
      log.error({ err: toErrorObject(err) }, 'Failed to read batch status');
      res.status(500).json({ error: 'Failed to read batch status' });
    }
  });

  // POST /api/prices/batch/run
  router.post('/batch/run', (_req: Request, res: Response) => {
    const result = deps.controller.runNow();
    res.status(result.status === 'started' ? 202 : 409).json(result);
  });

  // POST /api/prices/batch/cancel
  router.post('/batch/cancel', (_req: Request, res: Response) => {
    res.json({ cancelled: deps.controller.cancel() });
  });

  // PUT /api/prices/batch/frequency
  router.put('/batch/frequency', async (req: Request, res: Response) => {
    const body = validateInput(frequencyBodySchema, req.body, res);
    if (!body) return;

    try {
      await changeFrequency(deps, body.frequency);
      log.info({ frequency: body.frequency }, 'Update frequency changed');
      res.json({ frequency: body.frequency, schedule: FREQUENCY_CRON[body.frequency] });
    } catch (err) {
      log.error({ err: toErrorObject(err) }, 'Failed to change frequency');
      res.status(500).json({ error: 'Failed to change frequency' });
    }
  });

  return router;
}
