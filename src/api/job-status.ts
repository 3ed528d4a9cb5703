/**
 * API endpoint for background job status and metrics
 */

import { Router } from 'express';
import { loadSettings } from '../config/settings';
import { loadRunLog, loadRunStats, msUntilNextRun } from '../jobs/job-status';
import { getSchedulerStatus } from '../jobs/scheduler';
import { AppContext } from './context';
import { asyncHandler } from './middleware';

export function createJobStatusRouter(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/job-status
   * Returns scheduler state, persisted run state, the recent log window and in-memory metrics
   */
  router.get('/', asyncHandler(async (_req, res) => {
    const schedulerStatus = getSchedulerStatus();
    const memoryStats = ctx.metrics.getStats();
    const [settings, runStats, runLog] = await Promise.all([
      loadSettings(ctx.store),
      loadRunStats(ctx.store),
      loadRunLog(ctx.store),
    ]);

    const isHealthy =
      schedulerStatus.isRunning &&
      !ctx.metrics.isCriticalFailureState() &&
      runLog.status !== 'error';

    res.json({
      healthy: isHealthy,
      scheduler: {
        running: schedulerStatus.isRunning,
        cronExpression: schedulerStatus.cronExpression,
        autoScrapeEnabled: settings.enableAutoScrape,
        updateIntervalMinutes: settings.updateIntervalMinutes,
        currentlyExecuting: ctx.job.isRunning(),
        lastAutoScrape: runStats.lastAutoScrape,
        nextRunInMs: msUntilNextRun(settings, runStats.lastAutoScrape, new Date()),
      },
      run: {
        status: runLog.status,
        progress: runLog.progress,
        lastUpdated: runLog.lastUpdated,
        logs: runLog.logs,
      },
      scrapedCount: runStats.scrapedCount,
      memory: memoryStats,
    });
  }));

  return router;
}
