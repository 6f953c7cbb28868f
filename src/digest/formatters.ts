import type { NormalizedItem } from '../types/feed';
import { utcDay } from './date-filter';

export const ELLIPSIS = '...';
export const NEWS_SUMMARY_BUDGET = 220;
export const PODCAST_BODY_BUDGET = 640;
export const UNKNOWN_DATE = 'Unknown date';

/**
 * Cuts to `budget` characters and always appends the ellipsis, even for short text.
 */
export function truncate(text: string, budget: number): string {
  return `${text.slice(0, budget)}${ELLIPSIS}`;
}

export function formatDay(published: Date | null): string {
  return published ? utcDay(published) : UNKNOWN_DATE;
}

export function formatDayAndTime(published: Date | null): string {
  return published ? `${utcDay(published)} ${published.toISOString().slice(11, 16)}` : UNKNOWN_DATE;
}

export function formatNewsItem(item: NormalizedItem): string {
  let formatted = `- **${item.title}** by ${item.author} (${formatDayAndTime(item.published)}) → ${item.link}`;
  if (item.body.source !== 'none') {
    formatted += `\n  📝 ${truncate(item.body.text, NEWS_SUMMARY_BUDGET)}`;
  }
  return formatted;
}

export function formatPodcastItem(item: NormalizedItem): string {
  return `- **${item.title}** (${formatDay(item.published)}) → ${item.link}\n  🎧 ${truncate(item.body.text, PODCAST_BODY_BUDGET)}`;
}

export function formatPublicationItem(item: NormalizedItem): string {
  return `- ${item.title} by ${item.author} (${formatDay(item.published)}) → ${item.link}`;
}
