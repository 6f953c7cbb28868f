/**
 * Project suggestions: pair today's headlines with a GitHub repository search.
 * Lookups are best effort and fall back to a placeholder instead of failing.
 */

import { z } from 'zod';
import { describeError, logger } from '../utils/logger';
import { aggregate } from './aggregator';
import { DEFAULT_NEWS_ITEMS } from './collections';
import type { DigestContext, RepoLookupConfig } from './context';
import type { NormalizedItem } from '../types/feed';

export const NO_REPO_FOUND = 'No repo found';
export const NO_HEADLINES = 'No news headlines to suggest projects from today.';
export const DEFAULT_MAX_PROJECTS = 3;

const log = logger.child('repo-lookup');

const repoSearchSchema = z.object({
  items: z.array(z.object({
    html_url: z.string().url()
  }))
});

/**
 * Search term for a headline: its first word, nothing smarter.
 */
export function searchTermFor(headline: string): string {
  return headline.trim().split(/\s+/)[0];
}

/**
 * Top repository URL for a headline, or NO_REPO_FOUND. Never throws.
 */
export async function findRepo(headline: string, lookup: RepoLookupConfig): Promise<string> {
  const term = searchTermFor(headline);
  if (!term) {
    log.debug('Empty headline, skipping search');
    return NO_REPO_FOUND;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), lookup.timeoutMs);

  try {
    const url = `${lookup.apiUrl}/search/repositories?q=${encodeURIComponent(term)}&sort=stars&order=desc&per_page=1`;
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'Accept': 'application/vnd.github+json',
        'User-Agent': 'MorningDigest/1.0'
      }
    });

    if (!response.ok) {
      throw new Error(`HTTP error! status: ${response.status}`);
    }

    const parsed = repoSearchSchema.safeParse(await response.json());
    if (!parsed.success) {
      log.warn(`Unexpected search response for "${term}"`, parsed.error.issues);
      return NO_REPO_FOUND;
    }

    const [top] = parsed.data.items;
    return top ? top.html_url : NO_REPO_FOUND;
  } catch (error) {
    const reason = error instanceof Error && error.name === 'AbortError'
      ? 'Request timeout'
      : describeError(error);
    log.warn(`Search failed for "${term}"`, { reason });
    return NO_REPO_FOUND;
  } finally {
    clearTimeout(timeout);
  }
}

// Fisher-Yates on a copy
export function shuffle<T>(values: readonly T[], random: () => number): T[] {
  const shuffled = [...values];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

export async function suggestProjectsFromNews(
  { maxProjects = DEFAULT_MAX_PROJECTS }: { maxProjects?: number },
  context: DigestContext
): Promise<string[]> {
  const news = await aggregate('news', { todayOnly: true, maxItems: DEFAULT_NEWS_ITEMS }, context);
  return suggestProjectsFromItems(news, maxProjects, context);
}

/**
 * Project lines for headlines that were already aggregated, so a caller that
 * also shows the news section can reuse one fetch.
 */
export async function suggestProjectsFromItems(
  news: readonly NormalizedItem[],
  maxProjects: number,
  context: DigestContext
): Promise<string[]> {
  const headlines = shuffle(news.map(item => item.title), context.random).slice(0, Math.max(0, maxProjects));

  if (headlines.length === 0) {
    return [NO_HEADLINES];
  }

  const suggestions: string[] = [];
  for (const headline of headlines) {
    const repo = await findRepo(headline, context.repoLookup);
    suggestions.push(`- 🛠️ Build on "${headline}" → ${repo}`);
  }
  return suggestions;
}
