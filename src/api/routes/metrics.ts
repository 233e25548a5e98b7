/**
 * Metric Window Routes
 */
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Governor } from '../../runtime/governor';
import { MetricAggregate } from '../../sampler/types';
import { ValidationError } from '../../utils/errors';

const DEFAULT_WINDOW_MS = 300_000;

const WindowQuerySchema = z.object({
  duration_ms: z.coerce.number().int().positive().max(86_400_000).default(DEFAULT_WINDOW_MS),
});

export function createMetricsRouter(governor: Governor): Router {
  const router = Router();

  /**
   * GET /api/v1/metrics/window?duration_ms=300000
   * Samples of the last `duration_ms` with per-metric aggregates.
   */
  router.get('/window', (req: Request, res: Response) => {
    const parsed = WindowQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new ValidationError("Query parameter 'duration_ms' must be a positive integer");
    }

    const window = governor.sampler.window(parsed.data.duration_ms);
    const metrics = new Set(window.samples().flatMap((sample) => Object.keys(sample.readings)));
    const aggregates: Record<string, MetricAggregate> = {};
    for (const metric of [...metrics].sort()) {
      const aggregate = window.aggregate(metric);
      if (aggregate) {
        aggregates[metric] = aggregate;
      }
    }

    res.json({
      duration_ms: parsed.data.duration_ms,
      aggregates,
      ...window.toJSON(),
    });
  });

  return router;
}
