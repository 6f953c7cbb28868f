import type { ContentCategory, ItemBody, NormalizedItem, RawEntry } from '../types/feed';
import {
  type Extractor,
  attributesOf,
  cleanLine,
  cleanString,
  dateField,
  firstOf,
  isRecord,
  lineField,
  listField,
  nestedStringField,
  stringField
} from './fields';

export const NO_TITLE = 'No title';
export const UNKNOWN_AUTHOR = 'Unknown author';
export const NO_LINK = 'No link available';
export const NO_SUMMARY = 'No summary available';

// Field chains: first match wins

const TITLE_CHAIN: Extractor<string>[] = [lineField('title')];

// The raw feed values come first: rss-parser derives isoDate in the host's zone
const PUBLISHED_CHAIN: Extractor<Date>[] = [
  dateField('pubDate'),
  dateField('published'),
  dateField('isoDate')
];

function authorList(entry: RawEntry): string | undefined {
  const names = listField(entry, 'authors')
    .map(author => (isRecord(author) ? cleanLine(author.name) : cleanLine(author)))
    .filter((name): name is string => name !== undefined);
  return names.length > 0 ? names.join(', ') : undefined;
}

const AUTHOR_CHAIN: Extractor<string>[] = [
  lineField('author'),
  lineField('creator'),
  authorList
];

function firstEnclosureUrl(entry: RawEntry): string | undefined {
  const enclosures = listField(entry, 'enclosures');
  if (enclosures.length === 0) return undefined;
  const attributes = attributesOf(enclosures[0]);
  return attributes ? cleanString(attributes.url) : undefined;
}

const LINK_CHAIN: Extractor<string>[] = [
  stringField('link'),
  nestedStringField('enclosure', 'url'),
  firstEnclosureUrl
];

const SUMMARY_CHAIN: Extractor<string>[] = [
  stringField('summary'),
  nestedStringField('itunes', 'summary'),
  stringField('contentSnippet')
];

function transcriptPointer(href: string): string {
  return `Transcript available here: ${href}`;
}

function podcastNamespaceTranscript(entry: RawEntry): string | undefined {
  for (const node of listField(entry, 'transcripts')) {
    const attributes = attributesOf(node);
    const href = attributes ? cleanString(attributes.url) ?? cleanString(attributes.href) : undefined;
    if (href) return transcriptPointer(href);
  }
  return undefined;
}

function transcriptLinkRelation(entry: RawEntry): string | undefined {
  for (const node of listField(entry, 'links')) {
    const attributes = attributesOf(node);
    if (!attributes) continue;
    const rel = cleanString(attributes.rel);
    const type = cleanString(attributes.type) ?? '';
    if (rel === 'transcript' || type.includes('transcript')) {
      const href = cleanString(attributes.href);
      if (href) return transcriptPointer(href);
    }
  }
  return undefined;
}

const TRANSCRIPT_CHAIN: Extractor<string>[] = [
  stringField('transcript'),
  podcastNamespaceTranscript,
  transcriptLinkRelation
];

function resolveBody(entry: RawEntry, category: ContentCategory): ItemBody {
  if (category === 'podcast') {
    const transcript = firstOf(entry, TRANSCRIPT_CHAIN);
    if (transcript !== undefined) {
      return { source: 'transcript', text: transcript };
    }
  }

  const summary = firstOf(entry, SUMMARY_CHAIN);
  if (summary !== undefined) {
    return { source: 'summary', text: summary };
  }
  return { source: 'none', text: NO_SUMMARY };
}

/**
 * Resolves every display field of a raw feed entry.
 * Never throws: a missing or oddly shaped field falls back to its default.
 */
export function normalizeEntry(entry: RawEntry, category: ContentCategory, sourceName = ''): NormalizedItem {
  return {
    category,
    sourceName,
    title: firstOf(entry, TITLE_CHAIN) ?? NO_TITLE,
    author: firstOf(entry, AUTHOR_CHAIN) ?? UNKNOWN_AUTHOR,
    published: firstOf(entry, PUBLISHED_CHAIN) ?? null,
    link: firstOf(entry, LINK_CHAIN) ?? NO_LINK,
    body: resolveBody(entry, category)
  };
}
