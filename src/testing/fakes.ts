import { vi } from 'vitest';
import { Article, CandidateEntry, Summarizer, SummaryOutcome, SummaryRequest } from '../types';

export const FEED_URL = 'https://feeds.example.com/ai.xml';

export const LONG_PARAGRAPH = 'Open models keep improving on long-context retrieval. ';

export const LONG_BODY = `<p>${LONG_PARAGRAPH.repeat(10)}</p>`;

export function candidate(overrides: Partial<CandidateEntry> & { link: string }): CandidateEntry {
  return {
    title: 'New retrieval model released',
    body: { content: [], summary: LONG_BODY },
    sourceUrl: FEED_URL,
    ...overrides,
  };
}

export function article(overrides: Partial<Article> & { link: string }): Article {
  return {
    id: `id-${overrides.link}`,
    title: '기존 제목',
    summary: '이미 번역된 요약입니다.',
    source: FEED_URL,
    date: '2026-03-09',
    timestamp: '2026-03-09T08:00:00.000Z',
    summaryStatus: 'ok',
    ...overrides,
  };
}

export function processed(title: string, summary: string): SummaryOutcome {
  return { kind: 'processed', title, summary };
}

export function fakeSummarizer(
  respond: (request: SummaryRequest) => SummaryOutcome | Promise<SummaryOutcome> = () => processed('번역된 제목', '번역된 요약입니다.')
) {
  const summarize = vi.fn(async (request: SummaryRequest) => respond(request));
  const summarizer: Summarizer = { summarize };
  return { summarizer, summarize };
}

export function sequentialIds(prefix = 'article') {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/**
 * A promise that resolves only when opened, for pausing fakes mid-run
 */
export function createGate() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>(resolve => {
    release = resolve;
  });
  return { promise, open: () => release() };
}
