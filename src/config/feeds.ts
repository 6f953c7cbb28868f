import type { ContentCategory, FeedSource } from '../types/feed';

export interface FeedRegistry {
  sources: readonly FeedSource[];
  caseStudies: readonly string[];
}

const NEWS_FEEDS: Record<string, string> = {
  huggingface: 'https://huggingface.co/blog/feed.xml',
  kdnuggets: 'https://www.kdnuggets.com/feed',
  openai: 'https://openai.com/news/rss.xml',
  towardsai: 'https://towardsai.net/feed',
  googleai: 'https://blog.google/technology/ai/rss/'
};

const PODCAST_FEEDS: Record<string, string> = {
  everydayai: 'https://rss.buzzsprout.com/2175779.rss'
};

const PUBLICATION_FEEDS: Record<string, string> = {
  arxiv: 'https://export.arxiv.org/rss/cs.AI'
};

const CASE_STUDY_LINKS = [
  'https://huggingface.co/blog?tag=case-studies',
  'https://www.kdnuggets.com/'
];

function toSources(category: ContentCategory, feeds: Record<string, string>): FeedSource[] {
  return Object.entries(feeds).map(([name, url]) => ({ name, category, url }));
}

export const defaultFeedRegistry: FeedRegistry = {
  sources: [
    ...toSources('news', NEWS_FEEDS),
    ...toSources('podcast', PODCAST_FEEDS),
    ...toSources('publication', PUBLICATION_FEEDS)
  ],
  caseStudies: CASE_STUDY_LINKS
};

/**
 * Sources of one category, in registry insertion order.
 */
export function sourcesFor(registry: FeedRegistry, category: ContentCategory): FeedSource[] {
  return registry.sources.filter(source => source.category === category);
}
