import pLimit from 'p-limit';
import { sourcesFor } from '../config/feeds';
import { normalizeEntry } from '../normalizers/entry';
import type { ContentCategory, FeedFetcher, FeedSource, NormalizedItem, RawFeed } from '../types/feed';
import { describeError, logger } from '../utils/logger';
import type { DigestContext } from './context';
import { matchesToday } from './date-filter';

export interface AggregateOptions {
  todayOnly: boolean;
  maxItems: number;
  perSourceLimit?: number;     // Applied to each feed before the date filter
  sources?: readonly string[]; // Restrict to these source names
}

async function collectFromSource(
  source: FeedSource,
  options: AggregateOptions,
  now: Date,
  fetchFeed: FeedFetcher
): Promise<NormalizedItem[]> {
  const log = logger.child(source.name);
  let feed: RawFeed;
  try {
    feed = await fetchFeed(source.url);
  } catch (error) {
    // A broken feed contributes nothing instead of sinking the whole category
    log.warn('Feed fetch failed, skipping source', {
      url: source.url,
      error: describeError(error)
    });
    return [];
  }

  const entries = options.perSourceLimit === undefined
    ? feed.entries
    : feed.entries.slice(0, options.perSourceLimit);

  const items = entries
    .map(entry => normalizeEntry(entry, source.category, source.name))
    .filter(item => matchesToday(item.published, options.todayOnly, now));

  log.debug(`${items.length} of ${feed.entries.length} entries kept`);
  return items;
}

/**
 * Collects normalized items for one category.
 * Output keeps registry order then feed order and is cut to the first `maxItems`
 * (zero or less yields nothing); there is no cross-source sort by date.
 */
export async function aggregate(
  category: ContentCategory,
  options: AggregateOptions,
  context: DigestContext
): Promise<NormalizedItem[]> {
  const selected = sourcesFor(context.registry, category)
    .filter(source => !options.sources || options.sources.includes(source.name));

  const limit = pLimit(context.concurrencyLimit);
  const now = context.now();

  const perSource = await Promise.all(
    selected.map(source => limit(() => collectFromSource(source, options, now, context.fetchFeed)))
  );

  const cap = Math.max(0, Math.floor(options.maxItems));
  return perSource.flat().slice(0, cap);
}
