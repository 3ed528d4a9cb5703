import { loadSettings } from '../config/settings';
import { ArticleCollectionSchema } from '../schemas';
import { DocumentStore, DOCUMENTS } from '../storage/document-store';
import {
  FeedFetcher,
  IngestionStats,
  IngestionTrigger,
  PersistOutcome,
  ProgressReporter,
  Summarizer,
} from '../types';
import { debugLogger } from '../utils/debug-logger';
import { reconcileArticles } from './merge-engine';
import { collectCandidates } from './recency-filter';

export class IngestionInProgressError extends Error {
  constructor() {
    super('An ingestion run is already in progress');
    this.name = 'IngestionInProgressError';
  }
}

/**
 * The stored collection exists but could not be read; reconciling against the
 * fallback would overwrite every stored article.
 */
export class UnreadableCollectionError extends Error {
  constructor(name: string) {
    super(`Stored ${name} could not be read; collection left untouched`);
    this.name = 'UnreadableCollectionError';
  }
}

export interface IngestionRunnerDeps {
  store: DocumentStore;
  fetchFeed: FeedFetcher;
  summarizer: Summarizer;
  now?: () => Date;
  generateId?: () => string;
}

export interface RunOptions {
  trigger: IngestionTrigger;
  reporter?: ProgressReporter;
}

/**
 * Executes ingestion runs against the stored collection.
 * At most one run is in flight per process; overlapping calls are rejected, not queued.
 * Across processes the collection write is a compare-and-swap on the version read at start.
 */
export class IngestionRunner {
  private isIngesting = false;

  constructor(private readonly deps: IngestionRunnerDeps) {}

  isRunning(): boolean {
    return this.isIngesting;
  }

  async run(options: RunOptions): Promise<IngestionStats> {
    if (this.isIngesting) {
      throw new IngestionInProgressError();
    }

    this.isIngesting = true;
    try {
      return await this.execute(options);
    } finally {
      this.isIngesting = false;
    }
  }

  private async execute({ trigger, reporter }: RunOptions): Promise<IngestionStats> {
    const { store, fetchFeed, summarizer, generateId } = this.deps;
    const now = this.deps.now ?? (() => new Date());

    const stepId = debugLogger.stepStart('INGESTION', 'Starting ingestion run', { trigger });

    try {
      await reporter?.status('Initializing...');
      const settings = await loadSettings(store);
      const collection = await store.loadVersioned(DOCUMENTS.articles, ArticleCollectionSchema, []);
      if (!collection.valid) {
        throw new UnreadableCollectionError(DOCUMENTS.articles);
      }

      // Pass 1: fetch and filter, so progress has a fixed denominator
      await reporter?.status('Fetching RSS feeds...');
      const { candidates, feedErrors } = await collectCandidates(
        settings.rssUrls,
        settings.daysToScrape,
        fetchFeed,
        now(),
        reporter
      );
      await reporter?.status(
        `Found ${candidates.length} articles within the last ${settings.daysToScrape} days. Starting processing...`
      );

      // Pass 2: reconcile
      const result = await reconcileArticles(collection.content, candidates, {
        summarizer,
        model: settings.model,
        criterion: settings.aiFilterPrompt,
        reporter,
        now,
        generateId,
      });

      let persisted: PersistOutcome = 'unchanged';
      let persistError: string | undefined;

      if (result.totalChanges > 0) {
        const saveResult = await store.save(
          DOCUMENTS.articles,
          result.articles,
          trigger === 'auto' ? 'Auto-Scrape Update' : 'Manual Scrape Update',
          { expectedVersion: collection.version }
        );

        if (saveResult.ok) {
          persisted = 'saved';
          await reporter?.status(`Saved ${result.totalChanges} changes to ${DOCUMENTS.articles}`);
        } else {
          persisted = saveResult.reason === 'conflict' ? 'conflict' : 'failed';
          persistError = saveResult.message;
          await reporter?.status(`[ERROR] Could not save ${DOCUMENTS.articles}: ${saveResult.message}`);
        }
      } else {
        await reporter?.status('No changes found.');
      }

      const stats: IngestionStats = {
        trigger,
        candidates: candidates.length,
        feedErrors,
        newCount: result.newCount,
        updatedCount: result.updatedCount,
        totalChanges: result.totalChanges,
        articleCount: persisted === 'saved' ? result.articles.length : collection.content.length,
        persisted,
        persistError,
      };

      debugLogger.stepFinish(stepId, { ...stats });
      return stats;
    } catch (error) {
      debugLogger.stepError(stepId, 'INGESTION', 'Ingestion failed', error);
      throw error;
    }
  }
}
