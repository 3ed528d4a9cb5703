import { randomUUID } from 'crypto';
import { DEFAULT_FILTER_PROMPT } from '../schemas';
import {
  Article,
  CandidateEntry,
  ProgressReporter,
  ReconcileResult,
  Summarizer,
  SummaryOutcome,
} from '../types';
import { debugLogger } from '../utils/debug-logger';
import { sanitizeForLog } from '../utils/sanitize';
import { timestampMillis, toIsoDay } from '../utils/time';
import { MAX_SUMMARY_INPUT_LENGTH, MIN_CONTENT_LENGTH, normalizedEntryText } from './content';

export const SHORT_CONTENT_PLACEHOLDER = 'Content too short to summarize.';
export const ERROR_MARKER = 'Error';
export const ORACLE_ERROR_PREFIX = 'Error using AI model:';

export interface ReconcileOptions {
  summarizer: Summarizer;
  model: string;
  criterion?: string;
  reporter?: ProgressReporter;
  now?: () => Date;
  generateId?: () => string;
}

type ContentUpdate = Pick<Article, 'title' | 'summary' | 'summaryStatus'>;

type Processing =
  | { kind: 'skipped' }
  | { kind: 'irrelevant' }
  | { kind: 'content'; update: ContentUpdate };

/**
 * Whether a stored article should go through the summarizer again:
 * empty summary, a stored failure, or a summary that still looks untranslated.
 * The first-letter check is a cheap proxy for "still in the source language".
 */
export function needsReprocessing(article: Pick<Article, 'summary' | 'summaryStatus'>): boolean {
  const summary = article.summary ?? '';
  if (summary.trim().length === 0) return true;
  if (article.summaryStatus === 'failed') return true;
  if (summary.includes(ERROR_MARKER)) return true;
  return /^[A-Za-z]/.test(summary);
}

/**
 * Feed-provided time when present, otherwise the ingestion time
 */
export function effectiveTimestamp(entry: Pick<CandidateEntry, 'publishedAt' | 'updatedAt'>, now: Date): Pick<Article, 'date' | 'timestamp'> {
  const instant = entry.publishedAt ?? entry.updatedAt ?? now;
  return { date: toIsoDay(instant), timestamp: instant.toISOString() };
}

export function sortByTimestampDesc(articles: Article[]): Article[] {
  return [...articles].sort((a, b) => timestampMillis(b.timestamp) - timestampMillis(a.timestamp));
}

function outcomeToUpdate(outcome: Exclude<SummaryOutcome, { kind: 'irrelevant' }>, originalTitle: string): ContentUpdate {
  if (outcome.kind === 'processed') {
    return { title: outcome.title, summary: outcome.summary, summaryStatus: 'ok' };
  }
  return {
    title: originalTitle,
    summary: `${ORACLE_ERROR_PREFIX} ${outcome.reason}`,
    summaryStatus: 'failed',
  };
}

function snippet(text: string, length: number): string {
  return sanitizeForLog(text.substring(0, length));
}

/**
 * Merge freshly fetched candidates into an existing collection, keyed by link.
 *
 * New links become articles (unless judged irrelevant); known links get their
 * date/timestamp refreshed on every sighting and their content regenerated when
 * the stored summary needs it. The input array is never mutated.
 */
export async function reconcileArticles(
  existing: Article[],
  candidates: CandidateEntry[],
  options: ReconcileOptions
): Promise<ReconcileResult> {
  const {
    summarizer,
    model,
    reporter,
    now = () => new Date(),
    generateId = randomUUID,
  } = options;
  const criterion = options.criterion?.trim() || DEFAULT_FILTER_PROMPT;

  const stepId = debugLogger.stepStart('MERGE', 'Reconciling candidates with collection', {
    existing: existing.length,
    candidates: candidates.length
  });

  const byLink = new Map<string, Article>();
  for (const article of existing) {
    byLink.set(article.link, { ...article });
  }

  let newCount = 0;
  let updatedCount = 0;
  const total = candidates.length;

  async function processContent(entry: CandidateEntry, text: string): Promise<Processing> {
    if (text.length < MIN_CONTENT_LENGTH) {
      await reporter?.status(`[SKIP] Content too short: ${snippet(entry.title, 30)}...`);
      return {
        kind: 'content',
        update: { title: entry.title, summary: SHORT_CONTENT_PLACEHOLDER, summaryStatus: 'placeholder' },
      };
    }

    await reporter?.status(`[PROCESSING] Analyzing: ${snippet(entry.title, 200)}...`);
    const outcome = await summarizer.summarize({
      title: entry.title,
      text: text.substring(0, MAX_SUMMARY_INPUT_LENGTH),
      criterion,
      model,
    });

    if (outcome.kind === 'irrelevant') {
      await reporter?.status(`[SKIP] Irrelevant (AI Filter): ${snippet(entry.title, 200)}`);
      return { kind: 'irrelevant' };
    }

    if (outcome.kind === 'failed') {
      await reporter?.status(`[ERROR] Summarization failed for ${snippet(entry.title, 200)}: ${snippet(outcome.reason, 200)}`);
    } else {
      await reporter?.status(`[SUCCESS] Processed: ${snippet(outcome.title, 200)} > Summary: ${snippet(outcome.summary, 50)}...`);
    }
    return { kind: 'content', update: outcomeToUpdate(outcome, entry.title) };
  }

  for (let i = 0; i < total; i++) {
    reporter?.progress?.(i / total);
    const entry = candidates[i];

    try {
      const current = byLink.get(entry.link);
      const text = normalizedEntryText(entry);
      const times = effectiveTimestamp(entry, now());

      if (!current) {
        const processing = await processContent(entry, text);
        if (processing.kind !== 'content') {
          continue;
        }

        byLink.set(entry.link, {
          id: generateId(),
          link: entry.link,
          source: entry.sourceUrl,
          ...times,
          ...processing.update,
        });
        newCount++;
        continue;
      }

      let contentChanged = false;
      if (needsReprocessing(current)) {
        await reporter?.status(`Reprocessing: ${snippet(entry.title, 200)}`);
        const processing = await processContent(entry, text);
        // Irrelevant on re-evaluation keeps the previously accepted content
        if (processing.kind === 'content') {
          const { update } = processing;
          contentChanged = update.title !== current.title || update.summary !== current.summary;
          current.title = update.title;
          current.summary = update.summary;
          current.summaryStatus = update.summaryStatus;
        }
      }

      const timestampChanged = current.timestamp !== times.timestamp;
      current.timestamp = times.timestamp;
      current.date = times.date;

      if (contentChanged || timestampChanged) {
        updatedCount++;
        if (timestampChanged) {
          await reporter?.status(`[info] Timestamp updated for: ${snippet(entry.title, 200)}`);
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debugLogger.stepError(null, 'MERGE', `Failed to reconcile ${entry.link}`, error);
      await reporter?.status(`[ERROR] Failed to process ${snippet(entry.title, 200)}: ${snippet(message, 200)}`);
    }
  }

  reporter?.progress?.(1);

  const articles = sortByTimestampDesc(Array.from(byLink.values()));
  const result: ReconcileResult = {
    articles,
    newCount,
    updatedCount,
    totalChanges: newCount + updatedCount,
  };

  await reporter?.status(`Completed! New: ${newCount}, Updated: ${updatedCount}`);
  debugLogger.stepFinish(stepId, { newCount, updatedCount, articleCount: articles.length });
  return result;
}
