/**
 * Parses fixture feeds with the real rss-parser and checks what the
 * normalizer makes of them. Nothing is fetched.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { normalizeEntry } from '../../normalizers/entry';
import { createFeedParser, toRawFeed } from '../rss';

const readFixture = (name: string) => readFileSync(path.join(__dirname, 'fixtures', name), 'utf8');

async function parseFixture(name: string) {
  return toRawFeed(await createFeedParser(1000).parseString(readFixture(name)));
}

describe('rss-parser output', () => {
  describe('RSS podcast feed', () => {
    it('should keep the feed title and every item', async () => {
      const feed = await parseFixture('podcast.xml');

      expect(feed.title).toBe('Test Podcast');
      expect(feed.entries).toHaveLength(2);
    });

    it('should link an episode without <link> to its enclosure', async () => {
      const { entries } = await parseFixture('podcast.xml');

      const item = normalizeEntry(entries[0], 'podcast', 'pod');

      expect(item.title).toBe('Episode One');
      expect(item.link).toBe('https://cdn.test/ep1.mp3');
      expect(item.published?.toISOString()).toBe('2026-03-14T09:00:00.000Z');
    });

    it('should point at the podcast namespace transcript', async () => {
      const { entries } = await parseFixture('podcast.xml');

      expect(normalizeEntry(entries[0], 'podcast').body).toEqual({
        source: 'transcript',
        text: 'Transcript available here: https://pod.test/ep1.vtt'
      });
    });

    it('should fall back to the iTunes summary', async () => {
      const { entries } = await parseFixture('podcast.xml');

      const item = normalizeEntry(entries[1], 'podcast');

      expect(item.link).toBe('https://cdn.test/ep2.mp3');
      expect(item.body).toEqual({ source: 'summary', text: 'Only a summary here.' });
    });
  });

  describe('Atom feed', () => {
    it('should point at a transcript link relation', async () => {
      const { entries } = await parseFixture('atom.xml');

      expect(normalizeEntry(entries[0], 'podcast').body).toEqual({
        source: 'transcript',
        text: 'Transcript available here: https://atom.test/ep1.txt'
      });
    });

    it('should resolve author, alternate link and summary', async () => {
      const feed = await parseFixture('atom.xml');

      const item = normalizeEntry(feed.entries[0], 'news', 'atom');

      expect(feed.title).toBe('Atom Test Feed');
      expect(item).toEqual({
        category: 'news',
        sourceName: 'atom',
        title: 'Atom Episode',
        author: 'Atom Author',
        published: new Date('2026-03-14T10:00:00.000Z'),
        link: 'https://atom.test/ep1',
        body: { source: 'summary', text: 'Atom summary text' }
      });
    });
  });
});
