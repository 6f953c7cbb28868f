/**
 * In-process stand-ins for feeds and the digest context
 */

import type { FeedRegistry } from '../config/feeds';
import type { DigestContext } from '../digest/context';
import type { RawEntry, RawFeed } from '../types/feed';

export const NOW = new Date('2026-03-14T12:00:00.000Z');
export const TODAY_MORNING = '2026-03-14T09:00:00.000Z';
export const YESTERDAY = '2026-03-13T18:30:00.000Z';

export const FEED_URLS = {
  alpha: 'https://feeds.test/alpha',
  beta: 'https://feeds.test/beta',
  pod: 'https://feeds.test/pod',
  papers: 'https://feeds.test/papers'
};

export function createTestRegistry(caseStudies: string[] = ['https://cases.test/one', 'https://cases.test/two']): FeedRegistry {
  return {
    sources: [
      { name: 'alpha', category: 'news', url: FEED_URLS.alpha },
      { name: 'beta', category: 'news', url: FEED_URLS.beta },
      { name: 'pod', category: 'podcast', url: FEED_URLS.pod },
      { name: 'papers', category: 'publication', url: FEED_URLS.papers }
    ],
    caseStudies
  };
}

/**
 * Serves entries per URL; an Error value or a URL with no fixture rejects.
 */
export function createFixtureFetcher(feeds: Record<string, RawEntry[] | Error>) {
  return jest.fn(async (url: string): Promise<RawFeed> => {
    const feed = feeds[url];
    if (feed === undefined) {
      throw new Error(`No fixture for ${url}`);
    }
    if (feed instanceof Error) {
      throw feed;
    }
    return { entries: feed };
  });
}

export function createTestContext(
  feeds: Record<string, RawEntry[] | Error> = {},
  overrides: Partial<DigestContext> = {}
): DigestContext {
  return {
    registry: createTestRegistry(),
    fetchFeed: createFixtureFetcher(feeds),
    concurrencyLimit: 2,
    repoLookup: { apiUrl: 'https://api.github.test', timeoutMs: 50 },
    suggestions: 'case-studies',
    now: () => NOW,
    random: () => 0,
    ...overrides
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}
