/**
 * Unit tests for per-category aggregation
 */

import { aggregate } from '../aggregator';
import { FEED_URLS, TODAY_MORNING, YESTERDAY, createFixtureFetcher, createTestContext } from '../../__tests__/fixtures';

const titles = (items: { title: string }[]) => items.map(item => item.title);

describe('aggregate', () => {
  it('should keep registry order, then feed order', async () => {
    const context = createTestContext({
      [FEED_URLS.alpha]: [{ title: 'a1' }, { title: 'a2' }],
      [FEED_URLS.beta]: [{ title: 'b1' }]
    });

    const items = await aggregate('news', { todayOnly: false, maxItems: 20 }, context);

    expect(titles(items)).toEqual(['a1', 'a2', 'b1']);
    expect(items.map(item => item.sourceName)).toEqual(['alpha', 'alpha', 'beta']);
  });

  it('should keep registry order when the first feed answers last', async () => {
    const fetchFeed = jest.fn(async (url: string) => {
      if (url === FEED_URLS.alpha) {
        await new Promise(resolve => setTimeout(resolve, 20));
        return { entries: [{ title: 'slow alpha' }] };
      }
      return { entries: [{ title: 'fast beta' }] };
    });
    const context = createTestContext({}, { fetchFeed });

    const items = await aggregate('news', { todayOnly: false, maxItems: 20 }, context);

    expect(titles(items)).toEqual(['slow alpha', 'fast beta']);
  });

  it('should take the first N in source order, not the freshest N', async () => {
    const context = createTestContext({
      [FEED_URLS.alpha]: [{ title: 'old', isoDate: '2020-01-01T00:00:00Z' }, { title: 'older', isoDate: '2019-01-01T00:00:00Z' }],
      [FEED_URLS.beta]: [{ title: 'fresh', isoDate: TODAY_MORNING }]
    });

    const items = await aggregate('news', { todayOnly: false, maxItems: 2 }, context);

    expect(titles(items)).toEqual(['old', 'older']);
  });

  it('should return nothing for a zero or negative maxItems', async () => {
    const context = createTestContext({
      [FEED_URLS.alpha]: [{ title: 'a1' }, { title: 'a2' }, { title: 'a3' }]
    });

    expect(await aggregate('news', { todayOnly: false, maxItems: 0 }, context)).toEqual([]);
    expect(await aggregate('news', { todayOnly: false, maxItems: -1 }, context)).toEqual([]);
  });

  it('should isolate a failing source', async () => {
    const context = createTestContext({
      [FEED_URLS.alpha]: new Error('socket hang up'),
      [FEED_URLS.beta]: [{ title: 'b1' }]
    });

    const items = await aggregate('news', { todayOnly: false, maxItems: 20 }, context);

    expect(titles(items)).toEqual(['b1']);
  });

  it('should apply the date filter and drop undated entries', async () => {
    const context = createTestContext({
      [FEED_URLS.alpha]: [
        { title: 'today', isoDate: TODAY_MORNING },
        { title: 'yesterday', isoDate: YESTERDAY },
        { title: 'undated' }
      ]
    });

    const items = await aggregate('news', { todayOnly: true, maxItems: 20 }, context);

    expect(titles(items)).toEqual(['today']);
  });

  it('should apply the per-source limit before the date filter', async () => {
    const context = createTestContext({
      [FEED_URLS.pod]: [
        { title: 'yesterday', isoDate: YESTERDAY },
        { title: 'today', isoDate: TODAY_MORNING }
      ]
    });

    const items = await aggregate('podcast', { todayOnly: true, maxItems: 5, perSourceLimit: 1 }, context);

    expect(items).toEqual([]);
  });

  it('should only fetch the requested sources', async () => {
    const fetchFeed = createFixtureFetcher({ [FEED_URLS.beta]: [{ title: 'b1' }] });
    const context = createTestContext({}, { fetchFeed });

    const items = await aggregate('news', { todayOnly: false, maxItems: 20, sources: ['beta'] }, context);

    expect(titles(items)).toEqual(['b1']);
    expect(fetchFeed).toHaveBeenCalledTimes(1);
    expect(fetchFeed).toHaveBeenCalledWith(FEED_URLS.beta);
  });

  it('should only touch sources of the requested category', async () => {
    const fetchFeed = createFixtureFetcher({});
    const context = createTestContext({}, { fetchFeed });

    await aggregate('publication', { todayOnly: false, maxItems: 8 }, context);

    expect(fetchFeed.mock.calls).toEqual([[FEED_URLS.papers]]);
  });
});
