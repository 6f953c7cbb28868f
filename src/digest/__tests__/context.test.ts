import { defaultFeedRegistry, sourcesFor } from '../../config/feeds';
import { createDigestContext } from '../context';

describe('createDigestContext', () => {
  const originalSuggestions = process.env.DIGEST_SUGGESTIONS;

  afterEach(() => {
    if (originalSuggestions === undefined) {
      delete process.env.DIGEST_SUGGESTIONS;
    } else {
      process.env.DIGEST_SUGGESTIONS = originalSuggestions;
    }
  });

  it('should build from the environment and the default registry', () => {
    process.env.DIGEST_SUGGESTIONS = 'projects';

    const context = createDigestContext();

    expect(context.registry).toBe(defaultFeedRegistry);
    expect(context.suggestions).toBe('projects');
    expect(context.repoLookup.apiUrl).toBe('https://api.github.test');
    expect(typeof context.fetchFeed).toBe('function');
  });

  it('should let overrides win', () => {
    const fetchFeed = jest.fn();
    const now = () => new Date('2026-01-01T00:00:00Z');

    const context = createDigestContext({ fetchFeed, now, concurrencyLimit: 1 });

    expect(context.fetchFeed).toBe(fetchFeed);
    expect(context.now).toBe(now);
    expect(context.concurrencyLimit).toBe(1);
  });
});

describe('defaultFeedRegistry', () => {
  it('should list sources per category in insertion order', () => {
    expect(sourcesFor(defaultFeedRegistry, 'news').map(source => source.name))
      .toEqual(['huggingface', 'kdnuggets', 'openai', 'towardsai', 'googleai']);
    expect(sourcesFor(defaultFeedRegistry, 'podcast').map(source => source.name)).toEqual(['everydayai']);
    expect(sourcesFor(defaultFeedRegistry, 'publication').map(source => source.name)).toEqual(['arxiv']);
  });

  it('should only hold absolute https endpoints', () => {
    for (const source of defaultFeedRegistry.sources) {
      expect(new URL(source.url).protocol).toBe('https:');
    }
  });
});
