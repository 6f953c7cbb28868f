// Shared feed and digest types

export type ContentCategory = 'news' | 'podcast' | 'publication';

export interface FeedSource {
  name: string;              // Logical source key (e.g., "huggingface", "arxiv")
  category: ContentCategory;
  url: string;               // Feed endpoint
}

/**
 * One parsed feed item as the parser hands it over.
 * Field presence and shape vary per source, so every read goes through a guard.
 */
export type RawEntry = Readonly<Record<string, unknown>>;

export interface RawFeed {
  title?: string;
  entries: RawEntry[];
}

export type FeedFetcher = (url: string) => Promise<RawFeed>;

export type ItemBody =
  | { source: 'transcript' | 'summary'; text: string }
  | { source: 'none'; text: string };

export interface NormalizedItem {
  category: ContentCategory;
  sourceName: string;
  title: string;
  author: string;
  published: Date | null;    // null renders as "Unknown date", never replaced by now
  link: string;
  body: ItemBody;
}
