/**
 * Ingestion runs with run-state bookkeeping, for both the scheduler and manual triggers
 */

import { loadSettings } from '../config/settings';
import { IngestionInProgressError, IngestionRunner } from '../ingestion/runner';
import { DocumentStore } from '../storage/document-store';
import { IngestionStats, IngestionTrigger } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { isAutoRunDue, loadRunStats, msUntilNextRun, recordRunCompletion } from './job-status';
import { MetricsTracker } from './metrics-tracker';
import { RunLog } from './run-log';

export type JobOutcome =
  | { status: 'idle'; stats: IngestionStats; durationMs: number }
  | { status: 'error'; error: string; stats?: IngestionStats; durationMs: number };

export interface NewsIngestionJobDeps {
  runner: IngestionRunner;
  store: DocumentStore;
  metrics: MetricsTracker;
  now?: () => Date;
  echo?: (line: string) => void;
}

const LABELS: Record<IngestionTrigger, string> = {
  auto: 'Auto-Scrape',
  manual: 'Manual Scrape',
};

export class NewsIngestionJob {
  private readonly now: () => Date;
  private active = false;

  constructor(private readonly deps: NewsIngestionJobDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * True from the moment a run is accepted until its final log flush
   */
  isRunning(): boolean {
    return this.active || this.deps.runner.isRunning();
  }

  /**
   * Scheduler tick: re-read settings and run state, and start an automatic run when due.
   * Returns null when nothing was started.
   */
  async runIfDue(): Promise<JobOutcome | null> {
    if (this.isRunning()) {
      debugLogger.info('JOB', 'Job already running, skipping this check');
      return null;
    }

    const settings = await loadSettings(this.deps.store);
    const runStats = await loadRunStats(this.deps.store);
    const now = this.now();
    const due = isAutoRunDue(settings, runStats.lastAutoScrape, now);
    const nextDueMs = msUntilNextRun(settings, runStats.lastAutoScrape, now);

    debugLogger.info('SCHEDULER', 'Scheduler check', {
      enabled: settings.enableAutoScrape,
      lastRun: runStats.lastAutoScrape,
      nextDueInSeconds: nextDueMs === null ? null : Math.round(nextDueMs / 1000),
      due
    });

    if (!due) {
      return null;
    }

    return this.execute('auto');
  }

  /**
   * Run triggered by an administrator. Throws IngestionInProgressError when a run is in flight.
   */
  runManual(): Promise<JobOutcome> {
    return this.execute('manual');
  }

  private async execute(trigger: IngestionTrigger): Promise<JobOutcome> {
    if (this.isRunning()) {
      throw new IngestionInProgressError();
    }

    const { runner, store, metrics } = this.deps;
    const label = LABELS[trigger];
    const automatic = trigger === 'auto';
    const startTime = Date.now();
    const log = new RunLog(store, { prefix: label, now: this.now, echo: this.deps.echo });

    this.active = true;
    metrics.recordJobStart(trigger);

    try {
      await log.status(automatic ? 'Starting automatic background collection...' : 'Starting manual collection...');
      await log.flush('running');

      const stats = await runner.run({ trigger, reporter: log });
      const durationMs = Date.now() - startTime;
      const saveFailed = stats.persisted === 'conflict' || stats.persisted === 'failed';

      await recordRunCompletion(store, {
        now: this.now(),
        automatic,
        newArticles: stats.persisted === 'saved' ? stats.newCount : 0,
      });

      if (saveFailed) {
        const error = `Collection not saved (${stats.persisted}): ${stats.persistError ?? 'unknown error'}`;
        metrics.recordJobFailure(error, stats);
        await log.status(`${label} Finished With Error: ${error}`);
        await log.flush('error');
        console.error(`❌ ${label}: ${error} (${durationMs}ms)`);
        return { status: 'error', error, stats, durationMs };
      }

      metrics.recordJobSuccess(stats, durationMs);
      await log.status(`${label} Finished Successfully.`);
      await log.flush('idle');

      if (stats.totalChanges > 0) {
        console.log(`🎉 ${label}: ${stats.newCount} new, ${stats.updatedCount} updated articles (${durationMs}ms)`);
      } else if (debugLogger.isEnabled()) {
        console.log(`😴 ${label}: No changes (checked ${stats.candidates} entries in ${durationMs}ms)`);
      }

      return { status: 'idle', stats, durationMs };
    } catch (error) {
      if (error instanceof IngestionInProgressError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      const durationMs = Date.now() - startTime;

      metrics.recordJobFailure(message);
      await log.status(`Error during ${label.toLowerCase()}: ${message}`);
      if (automatic) {
        await recordRunCompletion(store, { now: this.now(), automatic, newArticles: 0 });
      }
      await log.flush('error');

      console.error(`❌ ${label} failed: ${message} (${durationMs}ms)`);
      if (metrics.isCriticalFailureState()) {
        console.error(`🚨 CRITICAL: Ingestion has failed ${metrics.getConsecutiveFailures()} times consecutively!`);
      }

      return { status: 'error', error: message, durationMs };
    } finally {
      this.active = false;
    }
  }
}
