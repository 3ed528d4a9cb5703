import { Server } from 'http';
import { AddressInfo } from 'net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { createApp } from './app';
import { AppContext } from './api/context';
import { DEFAULT_SETTINGS } from './config/settings';
import { ArticleCollectionSchema } from './schemas';
import { IngestionRunner } from './ingestion/runner';
import { MetricsTracker } from './jobs/metrics-tracker';
import { NewsIngestionJob } from './jobs/news-ingestion-job';
import { DOCUMENTS } from './storage/document-store';
import { InMemoryDocumentStore } from './storage/memory-store';
import { article, candidate, createGate, fakeSummarizer, FEED_URL } from './testing/fakes';
import { FeedFetcher } from './types';

const ADMIN_KEY = 'test-admin-key';
const NOW = new Date('2026-03-10T12:00:00.000Z');

const ARTICLES = [
  article({ id: 'a1', link: 'https://news.example.com/1', date: '2026-03-10', timestamp: '2026-03-10T09:00:00.000Z' }),
  article({ id: 'a2', link: 'https://news.example.com/2', date: '2026-03-09', timestamp: '2026-03-09T09:00:00.000Z' }),
  article({ id: 'a3', link: 'https://news.example.com/3', date: '2026-03-07', timestamp: '2026-03-07T09:00:00.000Z' }),
];

const ArticleListSchema = z.object({ total: z.number(), articles: ArticleCollectionSchema });

interface Harness {
  baseUrl: string;
  store: InMemoryDocumentStore;
  server: Server;
}

let harness: Harness;

async function start(overrides: Partial<AppContext> = {}, fetchFeed?: FeedFetcher): Promise<Harness> {
  const store = new InMemoryDocumentStore();
  await store.save(DOCUMENTS.settings, { ...DEFAULT_SETTINGS, rssUrls: [FEED_URL] }, 'seed');
  await store.save(DOCUMENTS.articles, ARTICLES, 'seed');

  const { summarizer } = fakeSummarizer();
  const runner = new IngestionRunner({
    store,
    fetchFeed: fetchFeed ?? (async () => [candidate({ link: 'https://news.example.com/new' })]),
    summarizer,
    now: () => NOW,
  });
  const metrics = new MetricsTracker();
  const job = new NewsIngestionJob({ runner, store, metrics, now: () => NOW, echo: () => undefined });

  const app = createApp({ store, job, metrics, adminApiKey: ADMIN_KEY, logRequests: false, ...overrides });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  const { port }: AddressInfo = address;
  return { baseUrl: `http://127.0.0.1:${port}`, store, server };
}

function request(path: string, init: RequestInit = {}, admin = false): Promise<Response> {
  const headers = new Headers(init.headers);
  if (admin) {
    headers.set('X-API-Key', ADMIN_KEY);
  }
  if (init.body) {
    headers.set('Content-Type', 'application/json');
  }
  return fetch(`${harness.baseUrl}${path}`, { ...init, headers });
}

describe('HTTP API', () => {
  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    harness = await start();
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => harness.server.close(error => (error ? reject(error) : resolve())));
    vi.restoreAllMocks();
  });

  describe('GET /health', () => {
    it('reports the collection size and newest article', async () => {
      const res = await request('/health');
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        status: 'healthy',
        database: 'connected',
        totalArticles: 3,
        latestArticle: '2026-03-10T09:00:00.000Z',
      });
    });

    it('answers 503 when the store is unreachable', async () => {
      await new Promise<void>(resolve => harness.server.close(() => resolve()));
      harness = await start({ pingStore: async () => false });

      const res = await request('/health');

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ status: 'unhealthy', database: 'disconnected' });
    });
  });

  describe('GET /api/articles', () => {
    it('returns every article without a range', async () => {
      const res = await request('/api/articles');
      const body = ArticleListSchema.parse(await res.json());

      expect(body.total).toBe(3);
      expect(body.articles.map(a => a.id)).toEqual(['a1', 'a2', 'a3']);
    });

    it('filters by an inclusive date range', async () => {
      const res = await request('/api/articles?from=2026-03-08&to=2026-03-09');
      const body = ArticleListSchema.parse(await res.json());

      expect(body.total).toBe(1);
      expect(body.articles.map(a => a.id)).toEqual(['a2']);
    });

    it('rejects malformed dates', async () => {
      const res = await request('/api/articles?from=March');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid query', issues: ['Expected YYYY-MM-DD'] });
    });
  });

  describe('DELETE /api/articles/:id', () => {
    it('requires an API key', async () => {
      expect((await request('/api/articles/a1', { method: 'DELETE' })).status).toBe(401);
      expect((await request('/api/articles/a1', { method: 'DELETE', headers: { 'X-API-Key': 'wrong-key' } })).status).toBe(403);
    });

    it('removes one article', async () => {
      const res = await request('/api/articles/a2', { method: 'DELETE' }, true);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ deleted: 'a2', total: 2 });
      expect(harness.store.lastChangeDescription(DOCUMENTS.articles)).toBe('Delete article a2');
    });

    it('refuses to rewrite a collection it cannot read', async () => {
      await harness.store.save(DOCUMENTS.articles, [{ id: 'a1', link: 'https://news.example.com/1', title: null }], 'import');

      const res = await request('/api/articles/a1', { method: 'DELETE' }, true);

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Failed to delete article', message: 'Stored news_data.json could not be read' });
      expect(harness.store.lastChangeDescription(DOCUMENTS.articles)).toBe('import');
    });

    it('answers 404 for an unknown id', async () => {
      const res = await request('/api/articles/missing', { method: 'DELETE' }, true);

      expect(res.status).toBe(404);
    });
  });

  describe('/api/settings', () => {
    it('returns the stored settings to administrators', async () => {
      const res = await request('/api/settings', {}, true);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ...DEFAULT_SETTINGS, rssUrls: [FEED_URL] });
    });

    it('merges a partial update and removes duplicate feeds', async () => {
      const res = await request('/api/settings', {
        method: 'PUT',
        body: JSON.stringify({
          enableAutoScrape: true,
          rssUrls: [FEED_URL, 'https://feeds.example.com/ml.xml', FEED_URL],
        }),
      }, true);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        ...DEFAULT_SETTINGS,
        enableAutoScrape: true,
        rssUrls: [FEED_URL, 'https://feeds.example.com/ml.xml'],
      });
      expect(harness.store.lastChangeDescription(DOCUMENTS.settings)).toBe('Update Config: rssUrls, enableAutoScrape');
    });

    it('rejects invalid values', async () => {
      const res = await request('/api/settings', {
        method: 'PUT',
        body: JSON.stringify({ updateIntervalMinutes: 0 }),
      }, true);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Invalid settings',
        issues: ['updateIntervalMinutes: Number must be greater than or equal to 1'],
      });
    });

    it('rejects unknown fields', async () => {
      const res = await request('/api/settings', {
        method: 'PUT',
        body: JSON.stringify({ scrapeEverything: true }),
      }, true);

      expect(res.status).toBe(400);
    });
  });

  describe('POST /api/ingest', () => {
    it('runs an ingestion and returns its summary', async () => {
      const res = await request('/api/ingest', { method: 'POST' }, true);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        status: 'idle',
        stats: { trigger: 'manual', newCount: 1, persisted: 'saved', articleCount: 4 },
      });
    });

    it('answers 409 while a run is in flight', async () => {
      const reached = createGate();
      const release = createGate();
      await new Promise<void>(resolve => harness.server.close(() => resolve()));
      harness = await start({}, async () => {
        reached.open();
        await release.promise;
        return [];
      });

      const first = request('/api/ingest', { method: 'POST' }, true);
      await reached.promise;
      const second = await request('/api/ingest', { method: 'POST' }, true);

      expect(second.status).toBe(409);
      expect(await second.json()).toEqual({ error: 'An ingestion run is already in progress' });

      release.open();
      expect((await first).status).toBe(200);
    });
  });

  describe('GET /api/job-status', () => {
    it('reports scheduler, run state and metrics', async () => {
      const res = await request('/api/job-status');
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        healthy: false,
        scheduler: {
          running: false,
          cronExpression: '* * * * *',
          autoScrapeEnabled: false,
          updateIntervalMinutes: 180,
          currentlyExecuting: false,
          lastAutoScrape: null,
          nextRunInMs: null,
        },
        run: { status: 'idle', progress: 0, lastUpdated: null, logs: [] },
        scrapedCount: {},
        memory: { totalRuns: 0, failedRuns: 0 },
      });
    });
  });
});
