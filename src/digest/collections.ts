import { sourcesFor } from '../config/feeds';
import { logger } from '../utils/logger';
import { aggregate } from './aggregator';
import type { DigestContext } from './context';
import { formatNewsItem, formatPodcastItem, formatPublicationItem } from './formatters';
import type { NormalizedItem } from '../types/feed';

const log = logger.child('news');

export const NO_NEWS = 'No AI news found today.';
export const NO_PODCASTS = 'No new podcast episodes found.';
export const NO_PUBLICATIONS = 'No new AI publications today.';
export const NO_CASE_STUDIES = 'No case studies configured.';

export const DEFAULT_NEWS_ITEMS = 20;
export const DEFAULT_PODCAST_ITEMS = 5;
export const DEFAULT_PUBLICATION_ITEMS = 8;
export const DEFAULT_CASE_STUDY_ITEMS = 8;

export interface NewsOptions {
  todayOnly?: boolean;
  maxItems?: number;
  source?: string | null;
}

export interface PodcastOptions {
  maxItems?: number;
  todayOnly?: boolean;
}

export interface PublicationOptions {
  todayOnly?: boolean;
  maxItems?: number;
}

function orPlaceholder(lines: string[], placeholder: string): string[] {
  return lines.length > 0 ? lines : [placeholder];
}

export function renderNews(items: readonly NormalizedItem[]): string[] {
  return orPlaceholder(items.map(formatNewsItem), NO_NEWS);
}

/**
 * AI news posts, optionally from a single named source.
 * An unknown source name yields a one-line message listing the valid ones.
 */
export async function getAiNews(
  { todayOnly = true, maxItems = DEFAULT_NEWS_ITEMS, source = null }: NewsOptions,
  context: DigestContext
): Promise<string[]> {
  let sources: string[] | undefined;

  if (source) {
    const wanted = source.trim().toLowerCase();
    const known = sourcesFor(context.registry, 'news').map(s => s.name);
    if (!known.includes(wanted)) {
      log.info(`Unknown source requested: ${source}`);
      return [`Unknown source "${source}". Valid options: ${known.join(', ')}`];
    }
    sources = [wanted];
  }

  return renderNews(await aggregate('news', { todayOnly, maxItems, sources }, context));
}

/**
 * Latest podcast episodes with a transcript pointer when the feed has one.
 * Each feed contributes at most `maxItems` of its newest entries.
 */
export async function getAiPodcasts(
  { maxItems = DEFAULT_PODCAST_ITEMS, todayOnly = false }: PodcastOptions,
  context: DigestContext
): Promise<string[]> {
  const items = await aggregate('podcast', { todayOnly, maxItems, perSourceLimit: maxItems }, context);
  return orPlaceholder(items.map(formatPodcastItem), NO_PODCASTS);
}

export async function checkNewAiPubs(
  { todayOnly = true, maxItems = DEFAULT_PUBLICATION_ITEMS }: PublicationOptions,
  context: DigestContext
): Promise<string[]> {
  const items = await aggregate('publication', { todayOnly, maxItems }, context);
  return orPlaceholder(items.map(formatPublicationItem), NO_PUBLICATIONS);
}

// Static links, nothing is fetched
export function suggestCaseStudies(
  { maxItems = DEFAULT_CASE_STUDY_ITEMS }: { maxItems?: number },
  context: DigestContext
): string[] {
  return orPlaceholder(context.registry.caseStudies.slice(0, maxItems), NO_CASE_STUDIES);
}
