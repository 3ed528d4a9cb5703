/**
 * Persisted run state: last automatic run, per-day counts and the log window
 */

import { RunLogDocument, RunLogDocumentSchema, RunStats, RunStatsSchema } from '../schemas';
import { DocumentStore, DOCUMENTS, SaveResult } from '../storage/document-store';
import { parseDate, toIsoDay } from '../utils/time';

export const DEFAULT_RUN_STATS: RunStats = {
  lastAutoScrape: null,
  scrapedCount: {},
};

export const DEFAULT_RUN_LOG: RunLogDocument = {
  lastUpdated: null,
  status: 'idle',
  progress: 0,
  logs: [],
};

export function loadRunStats(store: DocumentStore): Promise<RunStats> {
  return store.load(DOCUMENTS.stats, RunStatsSchema, DEFAULT_RUN_STATS);
}

export function loadRunLog(store: DocumentStore): Promise<RunLogDocument> {
  return store.load(DOCUMENTS.logs, RunLogDocumentSchema, DEFAULT_RUN_LOG);
}

/**
 * Record a finished run. Re-reads the stats document so concurrent edits of
 * other fields are not lost.
 */
export async function recordRunCompletion(
  store: DocumentStore,
  options: { now: Date; automatic: boolean; newArticles: number }
): Promise<SaveResult> {
  const stats = await loadRunStats(store);
  const today = toIsoDay(options.now);

  const next: RunStats = {
    lastAutoScrape: options.automatic ? options.now.toISOString() : stats.lastAutoScrape,
    scrapedCount: {
      ...stats.scrapedCount,
      [today]: (stats.scrapedCount[today] ?? 0) + options.newArticles,
    },
  };

  return store.save(
    DOCUMENTS.stats,
    next,
    options.automatic ? 'Update stats: Auto-Scrape' : 'Update stats: Manual Scrape'
  );
}

/**
 * An automatic run is due when enabled and the interval has fully elapsed since the last one.
 * A missing or unreadable last-run time counts as never run.
 */
export function isAutoRunDue(
  settings: { enableAutoScrape: boolean; updateIntervalMinutes: number },
  lastAutoScrape: string | null,
  now: Date
): boolean {
  if (!settings.enableAutoScrape) {
    return false;
  }

  const lastRun = parseDate(lastAutoScrape);
  if (!lastRun) {
    return true;
  }

  return now.getTime() - lastRun.getTime() > settings.updateIntervalMinutes * 60 * 1000;
}

/**
 * Milliseconds until the next automatic run is due (negative when overdue)
 */
export function msUntilNextRun(
  settings: { updateIntervalMinutes: number },
  lastAutoScrape: string | null,
  now: Date
): number | null {
  const lastRun = parseDate(lastAutoScrape);
  if (!lastRun) return null;
  return lastRun.getTime() + settings.updateIntervalMinutes * 60 * 1000 - now.getTime();
}
