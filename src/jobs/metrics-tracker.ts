import { IngestionStats, IngestionTrigger } from '../types';

/**
 * In-process counters for ingestion runs, reported by /api/job-status.
 * Reset on restart; the persisted run state lives in the stats document.
 */
export interface RunMetrics {
  totalRuns: number;
  autoRuns: number;
  manualRuns: number;
  successfulRuns: number;
  failedRuns: number;
  saveConflicts: number;
  lastRunAt: Date | null;
  lastRunTrigger: IngestionTrigger | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
  averageDurationMs: number;
  totalCandidates: number;
  totalFeedErrors: number;
  totalArticlesAdded: number;
  totalArticlesUpdated: number;
}

export const CRITICAL_FAILURE_THRESHOLD = 3;

export class MetricsTracker {
  private metrics: RunMetrics = {
    totalRuns: 0,
    autoRuns: 0,
    manualRuns: 0,
    successfulRuns: 0,
    failedRuns: 0,
    saveConflicts: 0,
    lastRunAt: null,
    lastRunTrigger: null,
    lastSuccessAt: null,
    lastError: null,
    consecutiveFailures: 0,
    averageDurationMs: 0,
    totalCandidates: 0,
    totalFeedErrors: 0,
    totalArticlesAdded: 0,
    totalArticlesUpdated: 0,
  };

  recordJobStart(trigger: IngestionTrigger): void {
    this.metrics.totalRuns++;
    this.metrics.lastRunAt = new Date();
    this.metrics.lastRunTrigger = trigger;
    if (trigger === 'auto') {
      this.metrics.autoRuns++;
    } else {
      this.metrics.manualRuns++;
    }
  }

  recordJobSuccess(stats: IngestionStats, durationMs: number): void {
    const m = this.metrics;
    m.successfulRuns++;
    m.consecutiveFailures = 0;
    m.lastSuccessAt = new Date();
    m.lastError = null;

    m.totalCandidates += stats.candidates;
    m.totalFeedErrors += stats.feedErrors.length;
    m.totalArticlesAdded += stats.newCount;
    m.totalArticlesUpdated += stats.updatedCount;

    // Mean over successful runs only
    m.averageDurationMs = (m.averageDurationMs * (m.successfulRuns - 1) + durationMs) / m.successfulRuns;
  }

  /**
   * A run that ended without its result in the store. `stats` is present when the
   * pipeline finished but the write was rejected.
   */
  recordJobFailure(error: string, stats?: IngestionStats): void {
    this.metrics.failedRuns++;
    this.metrics.consecutiveFailures++;
    this.metrics.lastError = error;

    if (stats) {
      this.metrics.totalCandidates += stats.candidates;
      this.metrics.totalFeedErrors += stats.feedErrors.length;
      if (stats.persisted === 'conflict') {
        this.metrics.saveConflicts++;
      }
    }
  }

  getStats(): RunMetrics {
    return { ...this.metrics };
  }

  isCriticalFailureState(): boolean {
    return this.metrics.consecutiveFailures >= CRITICAL_FAILURE_THRESHOLD;
  }

  getConsecutiveFailures(): number {
    return this.metrics.consecutiveFailures;
  }
}

export const metricsTracker = new MetricsTracker();
