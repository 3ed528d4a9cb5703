import { CandidateEntry, FeedFetcher, ProgressReporter } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { elapsedDays } from '../utils/time';

/**
 * Whether an entry may enter the merge stage.
 * Entries without a link are rejected; entries without any date are kept.
 */
export function isWithinRecencyWindow(
  entry: Pick<CandidateEntry, 'link' | 'publishedAt' | 'updatedAt'>,
  daysLimit: number,
  now: Date
): boolean {
  if (!entry.link) {
    return false;
  }

  const referenceTime = entry.publishedAt ?? entry.updatedAt;
  if (!referenceTime) {
    return true;
  }

  return elapsedDays(referenceTime, now) <= daysLimit;
}

export interface CollectedCandidates {
  candidates: CandidateEntry[];
  feedErrors: string[];
}

/**
 * First pass of a run: fetch every feed in order and keep the entries inside the window,
 * so the total is known before any entry is processed.
 */
export async function collectCandidates(
  feedUrls: string[],
  daysLimit: number,
  fetchFeed: FeedFetcher,
  now: Date,
  reporter?: ProgressReporter
): Promise<CollectedCandidates> {
  const stepId = debugLogger.stepStart('RECENCY', 'Collecting candidates from feeds', {
    feedCount: feedUrls.length,
    daysLimit
  });

  const candidates: CandidateEntry[] = [];
  const feedErrors: string[] = [];

  for (const url of feedUrls) {
    let entries: CandidateEntry[];
    try {
      entries = await fetchFeed(url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      feedErrors.push(`${url}: ${message}`);
      await reporter?.status(`[ERROR] Failed to fetch feed ${url}: ${message}`);
      continue;
    }

    let kept = 0;
    for (const entry of entries) {
      if (!isWithinRecencyWindow(entry, daysLimit, now)) {
        continue;
      }
      candidates.push({ ...entry, sourceUrl: url });
      kept++;
    }

    debugLogger.info('RECENCY', `Feed ${url}`, { fetched: entries.length, kept });
  }

  debugLogger.stepFinish(stepId, { candidates: candidates.length, failedFeeds: feedErrors.length });
  return { candidates, feedErrors };
}
