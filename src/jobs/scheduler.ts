/**
 * Background scheduler using node-cron
 */

import * as cron from 'node-cron';
import { NewsIngestionJob } from './news-ingestion-job';

// Cron expression: check every minute whether an automatic run is due
export const CRON_EXPRESSION = '* * * * *';

let scheduledTask: cron.ScheduledTask | null = null;
let scheduledJob: NewsIngestionJob | null = null;

async function tick(job: NewsIngestionJob): Promise<void> {
  try {
    await job.runIfDue();
  } catch (error) {
    console.error('Scheduler error:', error instanceof Error ? error.message : error);
  }
}

/**
 * Start the background scheduler. Only one scheduler exists per process;
 * later calls are ignored.
 */
export function startJobScheduler(job: NewsIngestionJob): boolean {
  if (scheduledTask) {
    console.warn('Job scheduler is already running');
    return false;
  }

  if (!cron.validate(CRON_EXPRESSION)) {
    throw new Error(`Invalid cron expression: ${CRON_EXPRESSION}`);
  }

  scheduledTask = cron.schedule(CRON_EXPRESSION, () => tick(job));
  scheduledJob = job;

  console.log('🤖 Background job scheduler started (checks every minute)');

  // Check immediately on startup instead of waiting for the first cron tick
  void tick(job);
  return true;
}

export function stopJobScheduler(): void {
  if (!scheduledTask) {
    console.warn('Job scheduler is not running');
    return;
  }

  scheduledTask.stop();
  scheduledTask = null;
  scheduledJob = null;

  console.log('Background job scheduler stopped');
}

/**
 * Stop the scheduler and wait for an in-flight run to finish (bounded)
 */
export async function gracefulShutdown(maxWaitTime = 30000): Promise<void> {
  console.log('Stopping background job scheduler...');

  const job = scheduledJob;
  if (scheduledTask) {
    stopJobScheduler();
  }
  scheduledJob = null;

  const startWait = Date.now();
  while (job?.isRunning() && Date.now() - startWait < maxWaitTime) {
    await new Promise((resolve) => setTimeout(resolve, 100));
  }

  if (job?.isRunning()) {
    console.warn('Background job did not finish within timeout period');
  } else {
    console.log('Background job scheduler shut down gracefully');
  }
}

export function getSchedulerStatus(): {
  isRunning: boolean;
  cronExpression: string;
  isJobCurrentlyExecuting: boolean;
} {
  return {
    isRunning: scheduledTask !== null,
    cronExpression: CRON_EXPRESSION,
    isJobCurrentlyExecuting: scheduledJob?.isRunning() ?? false,
  };
}
