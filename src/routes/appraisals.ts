import { Router, type Request, type Response } from 'express';
import pino from 'pino';
import { validateInput } from '../middleware/validation.js';
import type { AppraisalService } from '../services/appraisal/appraisal-service.js';
import { appraisalRequestSchema, compareRequestSchema } from '../services/appraisal/identity-schema.js';
import { toErrorObject } from '../utils/errors.js';

const log = pino({ name: 'appraisals' });

export function createAppraisalRouter(
  appraisal: Pick<AppraisalService, 'resolveMarketValue' | 'appraiseListing'>,
): Router {
  const router = Router();

  /**
   * POST /api/appraisals: Resolve the market value of one card.
   */
  router.post('/', async (req: Request, res: Response) => {
    const body = validateInput(appraisalRequestSchema, req.body, res);
    if (!body) return;

    try {
      const outcome = await appraisal.resolveMarketValue(body.identity, { forceRefresh: body.forceRefresh });
      if (!outcome.ok) {
        res.status(422).json({ error: 'unable to estimate', message: outcome.message });
        return;
      }
      res.json({ value: outcome.value, cached: outcome.cached });
    } catch (err) {
      log.error({ err: toErrorObject(err) }, 'Appraisal failed');
      res.status(500).json({ error: 'Appraisal failed' });
    }
  });

  /**
   * POST /api/appraisals/compare: Market value plus a listed-vs-market verdict.
   * `listedPrice` is in the target currency.
   */
  router.post('/compare', async (req: Request, res: Response) => {
    const body = validateInput(compareRequestSchema, req.body, res);
    if (!body) return;

    try {
      const { outcome, comparison } = await appraisal.appraiseListing(body.identity, body.listedPrice, {
        forceRefresh: body.forceRefresh,
      });
      if (!outcome.ok) {
        res.status(422).json({ error: 'unable to estimate', message: outcome.message });
        return;
      }
      res.json({ value: outcome.value, cached: outcome.cached, comparison });
    } catch (err) {
      log.error({ err: toErrorObject(err) }, 'Price comparison failed');
      res.status(500).json({ error: 'Price comparison failed' });
    }
  });

  return router;
}
