/**
 * Digest Helper Functions
 * Execute bodies for the agent tools, callable without the SDK wrapper
 */

import { checkNewAiPubs, getAiNews, getAiPodcasts, suggestCaseStudies } from '../../digest/collections';
import { composeDailyDigest } from '../../digest/composer';
import { getDefaultDigestContext, type DigestContext } from '../../digest/context';
import { suggestProjectsFromNews } from '../../digest/enrichment';
import { describeError, logger } from '../../utils/logger';

export type ListResult =
  | { success: true; items: string[]; count: number }
  | { success: false; items: string[]; count: 0; error: string };

export type DigestResult =
  | { success: true; digest: string }
  | { success: false; digest: null; error: string };

async function runList(toolName: string, produce: () => Promise<string[]> | string[]): Promise<ListResult> {
  const log = logger.child(toolName);
  try {
    const items = await produce();
    log.info(`Returned ${items.length} lines`);
    return { success: true, items, count: items.length };
  } catch (error) {
    log.error('Failed', error);
    return { success: false, items: [], count: 0, error: describeError(error) };
  }
}

export const getAiNewsExecute = async (
  { todayOnly, maxItems, source }: { todayOnly: boolean | null; maxItems: number | null; source: string | null },
  context: DigestContext = getDefaultDigestContext()
): Promise<ListResult> =>
  runList('get_ai_news', () => getAiNews({
    todayOnly: todayOnly ?? undefined,
    maxItems: maxItems ?? undefined,
    source
  }, context));

export const getAiPodcastsExecute = async (
  { maxItems, todayOnly }: { maxItems: number | null; todayOnly: boolean | null },
  context: DigestContext = getDefaultDigestContext()
): Promise<ListResult> =>
  runList('get_ai_podcasts', () => getAiPodcasts({
    maxItems: maxItems ?? undefined,
    todayOnly: todayOnly ?? undefined
  }, context));

export const checkNewAiPubsExecute = async (
  { todayOnly, maxItems }: { todayOnly: boolean | null; maxItems: number | null },
  context: DigestContext = getDefaultDigestContext()
): Promise<ListResult> =>
  runList('check_new_ai_pubs', () => checkNewAiPubs({
    todayOnly: todayOnly ?? undefined,
    maxItems: maxItems ?? undefined
  }, context));

export const suggestCaseStudiesExecute = async (
  { maxItems }: { maxItems: number | null },
  context: DigestContext = getDefaultDigestContext()
): Promise<ListResult> =>
  runList('suggest_case_studies', () => suggestCaseStudies({ maxItems: maxItems ?? undefined }, context));

export const suggestProjectsFromNewsExecute = async (
  { maxProjects }: { maxProjects: number | null },
  context: DigestContext = getDefaultDigestContext()
): Promise<ListResult> =>
  runList('suggest_projects_from_news', () => suggestProjectsFromNews({ maxProjects: maxProjects ?? undefined }, context));

export const dailyDigestExecute = async (
  { name }: { name: string | null },
  context: DigestContext = getDefaultDigestContext()
): Promise<DigestResult> => {
  const log = logger.child('daily_digest');
  try {
    const digest = await composeDailyDigest(name, context);
    log.info(`Composed digest (${digest.length} chars)`);
    return { success: true, digest };
  } catch (error) {
    log.error('Failed', error);
    return { success: false, digest: null, error: describeError(error) };
  }
};
