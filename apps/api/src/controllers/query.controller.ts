import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TrafficQueryPort } from '@traffic-counter/domain';
import { QueryTimeoutError } from '../middleware/http-errors.js';

const dataQuerySchema = z.object({
  location: z.string().optional(),
  vehicle: z.string().optional(),
});

export function createQueryRouter(query: TrafficQueryPort): Router {
  const router = Router();

  /** GET /api/locations — every location seen since startup */
  router.get('/locations', (_req: Request, res: Response) => {
    res.json(query.listLocations());
  });

  /** GET /api/data?location=&vehicle= — cumulative counts across locations */
  router.get('/data', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = dataQuerySchema.parse(req.query);
      const outcome = await query.queryReport(filters);
      if (outcome.status === 'timed_out') {
        throw new QueryTimeoutError(outcome.queryId, outcome.pending);
      }
      res.json(outcome.report);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
