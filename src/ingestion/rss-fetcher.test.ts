import { describe, expect, it } from 'vitest';
import { DEFAULT_TITLE, toCandidateEntry } from './rss-fetcher';

const FEED = 'https://feeds.example.com/ai.xml';

describe('toCandidateEntry', () => {
  it('maps an RSS item with full content', () => {
    const entry = toCandidateEntry(
      {
        link: ' https://news.example.com/post ',
        title: '  Agents in production  ',
        pubDate: 'Mon, 09 Mar 2026 08:00:00 GMT',
        isoDate: '2026-03-09T08:00:00.000Z',
        contentEncoded: '<p>Full body</p>',
        description: 'Teaser',
        content: 'Teaser',
        contentSnippet: 'Teaser',
      },
      FEED
    );

    expect(entry).toEqual({
      link: 'https://news.example.com/post',
      title: 'Agents in production',
      publishedAt: new Date('2026-03-09T08:00:00.000Z'),
      updatedAt: undefined,
      body: { content: ['<p>Full body</p>'], summary: 'Teaser', description: 'Teaser' },
      sourceUrl: FEED,
    });
  });

  it('treats Atom content as the full body', () => {
    const entry = toCandidateEntry(
      {
        link: 'https://news.example.com/atom',
        title: 'Atom entry',
        content: '<div>Atom body</div>',
        summary: 'Atom summary',
        published: '2026-03-08T10:00:00Z',
        updated: '2026-03-09T10:00:00Z',
      },
      FEED
    );

    expect(entry.body).toEqual({ content: ['<div>Atom body</div>'], summary: 'Atom summary', description: '<div>Atom body</div>' });
    expect(entry.publishedAt).toEqual(new Date('2026-03-08T10:00:00.000Z'));
    expect(entry.updatedAt).toEqual(new Date('2026-03-09T10:00:00.000Z'));
  });

  it('defaults the title and leaves a missing link empty', () => {
    const entry = toCandidateEntry({ title: '   ' }, FEED);

    expect(entry.title).toBe(DEFAULT_TITLE);
    expect(entry.link).toBe('');
    expect(entry.body).toEqual({ content: [], summary: undefined, description: undefined });
  });

  it('drops dates that cannot be parsed', () => {
    const entry = toCandidateEntry(
      { link: 'https://news.example.com/x', pubDate: 'sometime last week', updated: 'soon' },
      FEED
    );

    expect(entry.publishedAt).toBeUndefined();
    expect(entry.updatedAt).toBeUndefined();
  });

  it('falls back to pubDate when no ISO date was derived', () => {
    const entry = toCandidateEntry(
      { link: 'https://news.example.com/x', pubDate: 'Tue, 10 Mar 2026 06:30:00 GMT' },
      FEED
    );

    expect(entry.publishedAt).toEqual(new Date('2026-03-10T06:30:00.000Z'));
  });
});
