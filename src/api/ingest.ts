/**
 * Manual ingestion trigger
 */

import { Router } from 'express';
import { IngestionInProgressError } from '../ingestion/runner';
import { AppContext } from './context';
import { adminAuth, asyncHandler, ingestRateLimiter } from './middleware';

export function createIngestRouter(ctx: AppContext): Router {
  const router = Router();

  /**
   * POST /api/ingest
   * Runs synchronously; the response carries the run summary
   */
  router.post('/', ingestRateLimiter, adminAuth(ctx.adminApiKey), asyncHandler(async (_req, res) => {
    try {
      const outcome = await ctx.job.runManual();

      if (outcome.status === 'idle') {
        res.json(outcome);
        return;
      }

      const conflict = outcome.stats?.persisted === 'conflict';
      res.status(conflict ? 409 : 500).json(outcome);
    } catch (error) {
      if (error instanceof IngestionInProgressError) {
        res.status(409).json({ error: error.message });
        return;
      }
      throw error;
    }
  }));

  return router;
}
