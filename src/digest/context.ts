import { createRssFetcher } from '../adapters/rss';
import { loadEnvironmentConfig, type SuggestionVariant } from '../config/environment';
import { defaultFeedRegistry, type FeedRegistry } from '../config/feeds';
import type { FeedFetcher } from '../types/feed';

export interface RepoLookupConfig {
  apiUrl: string;
  timeoutMs: number;
}

/**
 * Everything a digest operation reads from the outside world.
 * Tests swap in fixture registries, fetchers, clocks and random sources.
 */
export interface DigestContext {
  registry: FeedRegistry;
  fetchFeed: FeedFetcher;
  concurrencyLimit: number;
  repoLookup: RepoLookupConfig;
  suggestions: SuggestionVariant;
  now: () => Date;
  random: () => number;
}

export function createDigestContext(overrides: Partial<DigestContext> = {}): DigestContext {
  const config = loadEnvironmentConfig();

  return {
    registry: defaultFeedRegistry,
    fetchFeed: overrides.fetchFeed ?? createRssFetcher({ timeoutMs: config.feeds.timeoutMs }),
    concurrencyLimit: config.feeds.concurrencyLimit,
    repoLookup: config.repoLookup,
    suggestions: config.digest.suggestions,
    now: () => new Date(),
    random: Math.random,
    ...overrides
  };
}

// Lazy-loaded so env vars are read on first use, not at import time
let _defaultContext: DigestContext | null = null;
export function getDefaultDigestContext(): DigestContext {
  if (!_defaultContext) {
    _defaultContext = createDigestContext();
  }
  return _defaultContext;
}
