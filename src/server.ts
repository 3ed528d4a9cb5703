import { langfuseEnabled, spanProcessor } from './instrumentation'; // Must be first - loads .env and tracing
import { createLangfuseHandler } from './agents/llm';
import { ArticleSummarizer, createSummaryChainFactory } from './agents/summarizer';
import { createApp } from './app';
import { loadEnv } from './config/env';
import { fetchFeedEntries } from './ingestion/rss-fetcher';
import { IngestionRunner } from './ingestion/runner';
import { metricsTracker } from './jobs/metrics-tracker';
import { NewsIngestionJob } from './jobs/news-ingestion-job';
import { gracefulShutdown, startJobScheduler } from './jobs/scheduler';
import { disconnectPool, getPool } from './storage/db';
import { DocumentStore } from './storage/document-store';
import { InMemoryDocumentStore } from './storage/memory-store';
import { PostgresDocumentStore } from './storage/postgres-store';

async function main(): Promise<void> {
  const env = loadEnv();

  let store: DocumentStore;
  let pingStore: (() => Promise<boolean>) | undefined;

  if (env.DATABASE_URL) {
    const postgresStore = new PostgresDocumentStore(getPool(env.DATABASE_URL));
    await postgresStore.ensureSchema();
    store = postgresStore;
    pingStore = () => postgresStore.ping();
  } else {
    console.warn('DATABASE_URL is not set; documents are kept in memory and lost on restart');
    store = new InMemoryDocumentStore();
  }

  if (!env.OPENROUTER_API_KEY) {
    console.warn('OPENROUTER_API_KEY is not set; summaries will be stored as errors and retried later');
  }

  const summarizer = new ArticleSummarizer(
    createSummaryChainFactory(
      { apiKey: env.OPENROUTER_API_KEY, appUrl: env.APP_URL, timeoutMs: env.ORACLE_TIMEOUT_MS },
      () => (langfuseEnabled ? [createLangfuseHandler()] : [])
    )
  );

  const runner = new IngestionRunner({
    store,
    fetchFeed: (url) => fetchFeedEntries(url),
    summarizer,
  });
  const job = new NewsIngestionJob({ runner, store, metrics: metricsTracker });

  const app = createApp({
    store,
    job,
    metrics: metricsTracker,
    adminApiKey: env.ADMIN_API_KEY,
    frontendUrl: env.FRONTEND_URL,
    production: env.NODE_ENV === 'production',
    pingStore,
  });

  if (!env.ADMIN_API_KEY) {
    console.warn('ADMIN_API_KEY is not set; admin endpoints are open');
  }

  app.listen(env.PORT, env.HOST, () => {
    console.log(`🚀 Server running on ${env.HOST}:${env.PORT}`);
    console.log(`📊 Health check: http://localhost:${env.PORT}/health`);
    console.log(`📈 Job status: http://localhost:${env.PORT}/api/job-status`);

    startJobScheduler(job);
  });

  const shutdown = async () => {
    console.log('Shutting down gracefully...');
    await gracefulShutdown();
    await spanProcessor?.forceFlush();
    await disconnectPool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
