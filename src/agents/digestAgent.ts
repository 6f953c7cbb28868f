/**
 * DigestAgent - answers morning-briefing requests with the digest tools
 */

import { Agent, run } from '@openai/agents';
import { loadEnvironmentConfig } from '../config/environment';
import { logger } from '../utils/logger';
import { digestTools } from './tools/digest-tools';

const DIGEST_INSTRUCTIONS = `You are a morning briefing assistant for people following AI.

Use the tools to gather podcasts, news, research publications and suggestions.
For a general "what's new" request, call daily_digest once and return its text as-is.
For narrower questions, call the specific list tool and summarize only what it returned.
Never invent headlines, links or repositories.`;

export function createDigestAgent(model?: string) {
  return new Agent({
    name: 'DigestAgent',
    instructions: DIGEST_INSTRUCTIONS,
    ...(model ? { model } : {}),
    tools: digestTools
  });
}

/**
 * Runs one prompt through the agent and returns its final text
 * @throws Error if OPENAI_API_KEY is not configured
 */
export async function askDigestAgent(prompt: string): Promise<string> {
  const config = loadEnvironmentConfig();
  if (!config.openai.apiKey) {
    throw new Error('Missing required environment variable: OPENAI_API_KEY');
  }

  logger.child('DigestAgent').info('Running prompt', { prompt });
  const result = await run(createDigestAgent(config.openai.model), prompt);
  const output = result.finalOutput;

  if (typeof output !== 'string' || output.length === 0) {
    throw new Error('Agent finished without a text answer');
  }
  return output;
}
