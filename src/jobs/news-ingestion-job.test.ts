import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_SETTINGS } from '../config/settings';
import { IngestionInProgressError, IngestionRunner } from '../ingestion/runner';
import { RunLogDocumentSchema, Settings } from '../schemas';
import { DOCUMENTS, SaveOptions, SaveResult } from '../storage/document-store';
import { InMemoryDocumentStore } from '../storage/memory-store';
import { candidate, createGate, fakeSummarizer, FEED_URL } from '../testing/fakes';
import { FeedFetcher } from '../types';
import { isAutoRunDue, loadRunLog, loadRunStats } from './job-status';
import { MetricsTracker } from './metrics-tracker';
import { NewsIngestionJob } from './news-ingestion-job';

const NOW = new Date('2026-03-10T12:00:00.000Z');
const MINUTE = 60 * 1000;

const SETTINGS: Settings = {
  ...DEFAULT_SETTINGS,
  rssUrls: [FEED_URL],
  enableAutoScrape: true,
  updateIntervalMinutes: 180,
};

class ConflictingArticlesStore extends InMemoryDocumentStore {
  async save<T>(name: string, document: T, changeDescription: string, options?: SaveOptions): Promise<SaveResult> {
    if (name === DOCUMENTS.articles) {
      return { ok: false, reason: 'conflict', message: 'Document news_data.json changed since it was read (expected version none, found 1)' };
    }
    return super.save(name, document, changeDescription, options);
  }
}

async function setup(options: { store?: InMemoryDocumentStore; settings?: Settings; lastAutoScrape?: string; fetchFeed?: FeedFetcher } = {}) {
  const store = options.store ?? new InMemoryDocumentStore();
  await store.save(DOCUMENTS.settings, options.settings ?? SETTINGS, 'seed');
  if (options.lastAutoScrape) {
    await store.save(DOCUMENTS.stats, { lastAutoScrape: options.lastAutoScrape, scrapedCount: {} }, 'seed');
  }

  const fetchImpl: FeedFetcher = options.fetchFeed ?? (async () => [candidate({ link: 'https://news.example.com/a' })]);
  const fetchFeed = vi.fn(fetchImpl);
  const { summarizer } = fakeSummarizer();
  const runner = new IngestionRunner({ store, fetchFeed, summarizer, now: () => NOW });
  const metrics = new MetricsTracker();
  const job = new NewsIngestionJob({ runner, store, metrics, now: () => NOW, echo: () => undefined });
  return { store, runner, metrics, job, fetchFeed };
}

describe('isAutoRunDue', () => {
  const last = new Date(NOW.getTime() - 180 * MINUTE).toISOString();

  it('is due when no run has happened yet', () => {
    expect(isAutoRunDue(SETTINGS, null, NOW)).toBe(true);
  });

  it('is not due when the interval has elapsed exactly', () => {
    expect(isAutoRunDue(SETTINGS, last, NOW)).toBe(false);
  });

  it('is due one millisecond after the interval', () => {
    expect(isAutoRunDue(SETTINGS, last, new Date(NOW.getTime() + 1))).toBe(true);
  });

  it('is never due when automatic runs are disabled', () => {
    expect(isAutoRunDue({ ...SETTINGS, enableAutoScrape: false }, null, NOW)).toBe(false);
  });

  it('treats an unreadable last-run time as never run', () => {
    expect(isAutoRunDue(SETTINGS, 'yesterday-ish', NOW)).toBe(true);
  });
});

describe('NewsIngestionJob', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts an automatic run when one is due and records it', async () => {
    const { store, job, metrics } = await setup();

    const outcome = await job.runIfDue();

    expect(outcome).toMatchObject({ status: 'idle', stats: { trigger: 'auto', newCount: 1, persisted: 'saved' } });
    expect(await loadRunStats(store)).toEqual({
      lastAutoScrape: '2026-03-10T12:00:00.000Z',
      scrapedCount: { '2026-03-10': 1 },
    });

    const runLog = await loadRunLog(store);
    expect(runLog.status).toBe('idle');
    expect(runLog.logs[0].message).toBe('Starting automatic background collection...');
    expect(runLog.logs[runLog.logs.length - 1].message).toBe('Auto-Scrape Finished Successfully.');
    expect(metrics.getStats()).toMatchObject({ totalRuns: 1, autoRuns: 1, successfulRuns: 1, totalArticlesAdded: 1, lastRunTrigger: 'auto' });
  });

  it('does nothing when the interval has not elapsed', async () => {
    const lastAutoScrape = new Date(NOW.getTime() - 179 * MINUTE).toISOString();
    const { job, fetchFeed, metrics } = await setup({ lastAutoScrape });

    await expect(job.runIfDue()).resolves.toBeNull();
    expect(fetchFeed).not.toHaveBeenCalled();
    expect(metrics.getStats().totalRuns).toBe(0);
  });

  it('does nothing when automatic runs are disabled', async () => {
    const { job, fetchFeed } = await setup({ settings: { ...SETTINGS, enableAutoScrape: false } });

    await expect(job.runIfDue()).resolves.toBeNull();
    expect(fetchFeed).not.toHaveBeenCalled();
  });

  it('persists the last automatic run even when the run fails', async () => {
    const { store, runner, job, metrics } = await setup();
    vi.spyOn(runner, 'run').mockRejectedValue(new Error('store offline'));

    const outcome = await job.runIfDue();

    expect(outcome).toMatchObject({ status: 'error', error: 'store offline' });
    expect((await loadRunStats(store)).lastAutoScrape).toBe('2026-03-10T12:00:00.000Z');

    const runLog = await loadRunLog(store);
    expect(runLog.status).toBe('error');
    expect(runLog.logs.map(entry => entry.message)).toContain('Error during auto-scrape: store offline');
    expect(metrics.getStats()).toMatchObject({ failedRuns: 1, consecutiveFailures: 1, lastError: 'store offline' });
    expect(job.isRunning()).toBe(false);
  });

  it('ends in the error state when the collection could not be saved', async () => {
    const { store, job, metrics } = await setup({ store: new ConflictingArticlesStore() });

    const outcome = await job.runManual();

    expect(outcome.status).toBe('error');
    expect(outcome.stats?.persisted).toBe('conflict');
    expect((await loadRunLog(store)).status).toBe('error');
    expect((await loadRunStats(store)).scrapedCount).toEqual({ '2026-03-10': 0 });
    expect(metrics.getStats()).toMatchObject({ manualRuns: 1, failedRuns: 1, saveConflicts: 1, totalCandidates: 1 });
  });

  it('persists a rising progress fraction that ends at 1', async () => {
    const { store, job } = await setup({
      fetchFeed: async () => [1, 2, 3, 4].map(i => candidate({ link: `https://news.example.com/${i}` })),
    });
    const save = vi.spyOn(store, 'save');

    await job.runManual();

    const written = save.mock.calls
      .filter(([name]) => name === DOCUMENTS.logs)
      .map(([, document]) => RunLogDocumentSchema.parse(document).progress);
    expect(written[0]).toBe(0);
    expect(written.some(fraction => fraction > 0 && fraction < 1)).toBe(true);
    expect(written).toEqual([...written].sort((a, b) => a - b));
    expect(written[written.length - 1]).toBe(1);
    expect((await loadRunLog(store)).progress).toBe(1);
  });

  it('ends in the error state without touching an unreadable collection', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const store = new InMemoryDocumentStore();
    await store.save(DOCUMENTS.articles, [{ id: 'legacy', link: 'https://news.example.com/legacy', title: null }], 'import');
    const { job, fetchFeed } = await setup({ store });

    const outcome = await job.runManual();

    expect(outcome).toMatchObject({ status: 'error', error: 'Stored news_data.json could not be read; collection left untouched' });
    expect(fetchFeed).not.toHaveBeenCalled();
    expect(store.lastChangeDescription(DOCUMENTS.articles)).toBe('import');
    expect((await loadRunLog(store)).status).toBe('error');
  });

  it('counts manual runs without moving the automatic schedule', async () => {
    const lastAutoScrape = '2026-03-10T11:00:00.000Z';
    const { store, job } = await setup({ lastAutoScrape });

    const outcome = await job.runManual();

    expect(outcome.status).toBe('idle');
    expect(await loadRunStats(store)).toEqual({ lastAutoScrape, scrapedCount: { '2026-03-10': 1 } });
    expect(store.lastChangeDescription(DOCUMENTS.stats)).toBe('Update stats: Manual Scrape');
  });

  it('rejects a manual run while an automatic run is in flight', async () => {
    const reached = createGate();
    const release = createGate();
    const { job, metrics } = await setup({
      fetchFeed: async () => {
        reached.open();
        await release.promise;
        return [];
      },
    });

    const automatic = job.runIfDue();
    await reached.promise;

    expect(job.isRunning()).toBe(true);
    await expect(job.runManual()).rejects.toBeInstanceOf(IngestionInProgressError);
    await expect(job.runIfDue()).resolves.toBeNull();

    release.open();
    await expect(automatic).resolves.toMatchObject({ status: 'idle' });
    expect(job.isRunning()).toBe(false);
    expect(metrics.getStats().totalRuns).toBe(1);
  });
});
