import { aggregate } from './aggregator';
import { checkNewAiPubs, DEFAULT_NEWS_ITEMS, getAiPodcasts, renderNews, suggestCaseStudies } from './collections';
import type { DigestContext } from './context';
import { suggestProjectsFromItems, DEFAULT_MAX_PROJECTS } from './enrichment';

export const PODCASTS_HEADER = "📰 AI Podcasts' Summary (Today):";
export const NEWS_HEADER = '📰 AI News (Today):';
export const PUBLICATIONS_HEADER = '📚 Publications (Today):';
export const CASE_STUDIES_HEADER = '💡 Case Studies:';
export const PROJECTS_HEADER = '🛠️ Project Ideas:';

export function greetingFor(name?: string | null): string {
  const trimmed = name?.trim();
  return trimmed ? `👋 Good morning, ${trimmed}!\n` : '👋 Good morning!\n';
}

function section(header: string, lines: string[]): string {
  return `\n${header}\n${lines.join('\n')}\n`;
}

/**
 * Greeting followed by podcasts, news, publications and either case studies
 * or project ideas, depending on the configured suggestion variant.
 * News is aggregated once; project ideas are drawn from the same headlines.
 */
export async function composeDailyDigest(name: string | null | undefined, context: DigestContext): Promise<string> {
  const [episodes, news, pubs] = await Promise.all([
    getAiPodcasts({ todayOnly: true }, context),
    aggregate('news', { todayOnly: true, maxItems: DEFAULT_NEWS_ITEMS }, context),
    checkNewAiPubs({ todayOnly: true }, context)
  ]);

  const suggestions = context.suggestions === 'projects'
    ? section(PROJECTS_HEADER, await suggestProjectsFromItems(news, DEFAULT_MAX_PROJECTS, context))
    : section(CASE_STUDIES_HEADER, suggestCaseStudies({}, context));

  return greetingFor(name)
    + section(PODCASTS_HEADER, episodes)
    + section(NEWS_HEADER, renderNews(news))
    + section(PUBLICATIONS_HEADER, pubs)
    + suggestions;
}
