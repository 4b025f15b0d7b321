import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { SensorIngestionPort } from '@traffic-counter/domain';

const sensorEntrySchema = z.object({
  location: z.string().min(1),
  data: z.array(z.string()),
});

export function createSensorRouter(ingestion: SensorIngestionPort): Router {
  const router = Router();

  /** POST /sensorapi/data — one batch of vehicle labels from a sensor */
  router.post('/data', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = sensorEntrySchema.parse(req.body);
      const result = ingestion.ingestBatch({ location: body.location, vehicles: body.data });
      res.status(202).json({ status: 'accepted', ...result });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
