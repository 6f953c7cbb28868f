export { createFeedParser, createRssFetcher, toRawFeed } from './adapters/rss';
export { loadEnvironmentConfig } from './config/environment';
export type { EnvironmentConfig, SuggestionVariant } from './config/environment';
export { defaultFeedRegistry, sourcesFor } from './config/feeds';
export type { FeedRegistry } from './config/feeds';
export { normalizeEntry } from './normalizers/entry';
export { parseFeedDate } from './normalizers/fields';
export { matchesToday } from './digest/date-filter';
export { aggregate } from './digest/aggregator';
export { checkNewAiPubs, getAiNews, getAiPodcasts, suggestCaseStudies } from './digest/collections';
export { findRepo, suggestProjectsFromNews } from './digest/enrichment';
export { composeDailyDigest } from './digest/composer';
export { createDigestContext } from './digest/context';
export type { DigestContext } from './digest/context';
export { digestTools } from './agents/tools/digest-tools';
export { createDigestAgent, askDigestAgent } from './agents/digestAgent';
export type { ContentCategory, FeedFetcher, FeedSource, ItemBody, NormalizedItem, RawEntry, RawFeed } from './types/feed';
