/**
 * OpenAI Agents SDK Tool Definitions
 * Lean wrappers that define the tool interface for the digest agent
 */

import { tool } from '@openai/agents';
import { z } from 'zod';
import {
  DEFAULT_CASE_STUDY_ITEMS,
  DEFAULT_NEWS_ITEMS,
  DEFAULT_PODCAST_ITEMS,
  DEFAULT_PUBLICATION_ITEMS
} from '../../digest/collections';
import { DEFAULT_MAX_PROJECTS } from '../../digest/enrichment';
import {
  checkNewAiPubsExecute,
  dailyDigestExecute,
  getAiNewsExecute,
  getAiPodcastsExecute,
  suggestCaseStudiesExecute,
  suggestProjectsFromNewsExecute
} from './digest-helpers';

const maxItems = (defaultValue: number) =>
  z.number().int().positive().nullable()
    .describe(`Maximum number of lines to return (default ${defaultValue})`);

const todayOnly = (defaultValue: boolean) =>
  z.boolean().nullable()
    .describe(`Only include entries published on the current UTC day (default ${defaultValue})`);

export const getAiNewsParameters = z.object({
  todayOnly: todayOnly(true),
  maxItems: maxItems(DEFAULT_NEWS_ITEMS),
  source: z.string().nullable().describe('Restrict to one news source key (e.g., "openai", "huggingface")')
});

export const getAiPodcastsParameters = z.object({
  maxItems: maxItems(DEFAULT_PODCAST_ITEMS),
  todayOnly: todayOnly(false)
});

export const checkNewAiPubsParameters = z.object({
  todayOnly: todayOnly(true),
  maxItems: maxItems(DEFAULT_PUBLICATION_ITEMS)
});

export const suggestCaseStudiesParameters = z.object({
  maxItems: maxItems(DEFAULT_CASE_STUDY_ITEMS)
});

export const suggestProjectsFromNewsParameters = z.object({
  maxProjects: z.number().int().positive().nullable().describe(`Number of project ideas (default ${DEFAULT_MAX_PROJECTS})`)
});

export const dailyDigestParameters = z.object({
  name: z.string().nullable().describe('Name to greet, if known')
});

/**
 * Tool to list AI news posts
 */
export const getAiNewsTool = tool({
  name: 'get_ai_news',
  description: 'Fetch AI-related news (default: all published today). Includes summaries if available.',
  parameters: getAiNewsParameters,
  execute: input => getAiNewsExecute(input)
});

/**
 * Tool to list podcast episodes
 */
export const getAiPodcastsTool = tool({
  name: 'get_ai_podcasts',
  description: 'Fetch latest AI podcast episodes with transcripts if available, otherwise summaries.',
  parameters: getAiPodcastsParameters,
  execute: input => getAiPodcastsExecute(input)
});

/**
 * Tool to list research publications
 */
export const checkNewAiPubsTool = tool({
  name: 'check_new_ai_pubs',
  description: 'Check AI research publications (default: today only).',
  parameters: checkNewAiPubsParameters,
  execute: input => checkNewAiPubsExecute(input)
});

export const suggestCaseStudiesTool = tool({
  name: 'suggest_case_studies',
  description: 'Suggest case study collections to explore.',
  parameters: suggestCaseStudiesParameters,
  execute: input => suggestCaseStudiesExecute(input)
});

export const suggestProjectsFromNewsTool = tool({
  name: 'suggest_projects_from_news',
  description: "Pick random headlines from today's AI news and pair each with a related GitHub repository.",
  parameters: suggestProjectsFromNewsParameters,
  execute: input => suggestProjectsFromNewsExecute(input)
});

/**
 * Tool to compose the full morning digest
 */
export const dailyDigestTool = tool({
  name: 'daily_digest',
  description: 'Full daily update: greeting, AI podcasts, news, publications, and case studies or project ideas.',
  parameters: dailyDigestParameters,
  execute: input => dailyDigestExecute(input)
});

export const digestTools = [
  getAiNewsTool,
  getAiPodcastsTool,
  checkNewAiPubsTool,
  suggestCaseStudiesTool,
  suggestProjectsFromNewsTool,
  dailyDigestTool
];
