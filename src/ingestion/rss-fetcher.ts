import Parser from 'rss-parser';
import { CandidateEntry } from '../types';
import { sleep } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';
import { parseDate } from '../utils/time';

export const DEFAULT_TITLE = 'No Title';

const FETCH_TIMEOUT_MS = 30000;

interface FeedItemFields {
  contentEncoded?: string;
  description?: string;
  summary?: string;
  published?: string;
  updated?: string;
}

export type FeedItem = Parser.Item & FeedItemFields;

const parser = new Parser<Record<string, unknown>, FeedItemFields>({
  timeout: FETCH_TIMEOUT_MS,
  customFields: {
    item: [
      ['content:encoded', 'contentEncoded'],
      ['description', 'description'],
      ['summary', 'summary'],
      ['published', 'published'],
      ['updated', 'updated']
    ]
  }
});

export interface FetchOptions {
  maxRetries?: number;
  /** Base delay for exponential backoff between attempts */
  retryDelayMs?: number;
}

function textField(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Map one parsed feed item to a candidate entry. Dates that cannot be parsed are dropped.
 */
export function toCandidateEntry(item: FeedItem, sourceUrl: string): CandidateEntry {
  const fullContent = textField(item.contentEncoded);
  // rss-parser puts RSS <description> and Atom <content> in `content`
  const content = fullContent ? [fullContent] : [];
  const atomContent = textField(item.content);
  if (!fullContent && atomContent && atomContent !== textField(item.description)) {
    content.push(atomContent);
  }

  return {
    link: textField(item.link)?.trim() ?? '',
    title: textField(item.title)?.trim() || DEFAULT_TITLE,
    publishedAt: parseDate(item.published) ?? parseDate(item.isoDate) ?? parseDate(item.pubDate),
    updatedAt: parseDate(item.updated),
    body: {
      content,
      summary: textField(item.summary) ?? textField(item.contentSnippet),
      description: textField(item.description) ?? atomContent,
    },
    sourceUrl,
  };
}

async function fetchWithRetry(url: string, maxRetries: number, retryDelayMs: number): Promise<Parser.Output<FeedItemFields>> {
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const attemptStepId = debugLogger.stepStart('RSS_FETCH', `Attempt ${attempt}/${maxRetries}`, { url, attempt });

    try {
      const feed = await parser.parseURL(url);
      debugLogger.stepFinish(attemptStepId, { itemCount: feed.items?.length || 0 });
      return feed;
    } catch (error) {
      lastError = error;
      debugLogger.stepError(attemptStepId, 'RSS_FETCH', `Attempt ${attempt} failed`, error);

      if (attempt < maxRetries) {
        const delay = Math.pow(2, attempt - 1) * retryDelayMs;
        debugLogger.info('RSS_FETCH', `Retrying after ${delay}ms delay`, { delay, nextAttempt: attempt + 1 });
        await sleep(delay);
      }
    }
  }

  throw lastError instanceof Error ? lastError : new Error(`Failed to fetch ${url}`);
}

/**
 * Fetch and parse one feed. Throws when every attempt fails.
 */
export async function fetchFeedEntries(url: string, options: FetchOptions = {}): Promise<CandidateEntry[]> {
  const { maxRetries = 3, retryDelayMs = 1000 } = options;
  const stepId = debugLogger.stepStart('RSS', 'Fetching feed', { url });

  try {
    const feed = await fetchWithRetry(url, maxRetries, retryDelayMs);
    const entries = (feed.items ?? []).map(item => toCandidateEntry(item, url));
    debugLogger.stepFinish(stepId, { entryCount: entries.length });
    return entries;
  } catch (error) {
    debugLogger.stepError(stepId, 'RSS', `Failed to fetch ${url}`, error);
    console.error(`Failed to fetch feed ${url}:`, error instanceof Error ? error.message : error);
    throw error;
  }
}
