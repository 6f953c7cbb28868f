#!/usr/bin/env tsx

/**
 * Sends one prompt to the digest agent
 * Usage: npm run ask -- "Anything new from OpenAI today?"
 */

import dotenv from 'dotenv';
import path from 'path';

const projectRoot = path.resolve(__dirname, '..');

dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { askDigestAgent } from '../src/agents/digestAgent';

async function main() {
  const prompt = process.argv.slice(2).join(' ') || 'Give me my morning AI digest.';

  const answer = await askDigestAgent(prompt);
  console.log(answer);
}

main().catch(error => {
  console.error('💥 Agent run failed:', error);
  process.exit(1);
});
