/**
 * Environment configuration for the digest tools
 * Loads and validates optional environment variables
 */

export type SuggestionVariant = 'case-studies' | 'projects';

export interface EnvironmentConfig {
  openai: {
    apiKey?: string;
    model?: string;
  };
  feeds: {
    timeoutMs: number;
    concurrencyLimit: number;
  };
  repoLookup: {
    apiUrl: string;
    timeoutMs: number;
  };
  digest: {
    suggestions: SuggestionVariant;
  };
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseSuggestionVariant(raw: string | undefined): SuggestionVariant {
  if (raw === undefined || raw === '' || raw === 'case-studies') {
    return 'case-studies';
  }
  if (raw === 'projects') {
    return 'projects';
  }
  throw new Error(`DIGEST_SUGGESTIONS must be "case-studies" or "projects", got "${raw}"`);
}

/**
 * Load and validate environment configuration
 * @throws Error if a numeric setting or DIGEST_SUGGESTIONS is malformed
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    openai: {
      apiKey: process.env.OPENAI_API_KEY || undefined,
      model: process.env.DIGEST_AGENT_MODEL || undefined
    },
    feeds: {
      timeoutMs: parsePositiveInt('FEED_TIMEOUT_MS', process.env.FEED_TIMEOUT_MS, 15000),
      concurrencyLimit: parsePositiveInt('FEED_CONCURRENCY', process.env.FEED_CONCURRENCY, 4)
    },
    repoLookup: {
      apiUrl: (process.env.GITHUB_API_URL || 'https://api.github.com').replace(/\/+$/, ''),
      timeoutMs: parsePositiveInt('REPO_LOOKUP_TIMEOUT_MS', process.env.REPO_LOOKUP_TIMEOUT_MS, 5000)
    },
    digest: {
      suggestions: parseSuggestionVariant(process.env.DIGEST_SUGGESTIONS)
    }
  };
}
