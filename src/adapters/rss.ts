import Parser from 'rss-parser';
import type { FeedFetcher, RawEntry, RawFeed } from '../types/feed';
import { logger } from '../utils/logger';

const log = logger.child('rss');

export interface RssFetcherOptions {
  timeoutMs: number;
}

/**
 * rss-parser configured to keep what the normalizer reads: every enclosure,
 * every link (Atom `rel="transcript"`) and the podcast namespace transcript.
 */
export function createFeedParser(timeoutMs: number): Parser {
  return new Parser({
    timeout: timeoutMs,
    headers: {
      'User-Agent': 'MorningDigest/1.0',
      'Accept': 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8'
    },
    customFields: {
      item: [
        ['transcript', 'transcript'],
        ['podcast:transcript', 'transcripts', { keepArray: true }],
        ['enclosure', 'enclosures', { keepArray: true }],
        ['link', 'links', { keepArray: true }]
      ]
    }
  });
}

// Parsed items become plain records; the normalizer treats every field as unknown
export function toRawFeed(feed: { title?: string; items: Parser.Item[] }): RawFeed {
  const entries: RawEntry[] = feed.items.map(item => Object.fromEntries(Object.entries(item)));
  return { title: feed.title, entries };
}

export function createRssFetcher({ timeoutMs }: RssFetcherOptions): FeedFetcher {
  const parser = createFeedParser(timeoutMs);

  return async (url: string): Promise<RawFeed> => {
    log.debug(`Fetching ${url}`);
    const feed = await parser.parseURL(url);
    log.debug(`Found ${feed.items.length} items in ${url}`);
    return toRawFeed(feed);
  };
}
