#!/usr/bin/env tsx

/**
 * Prints today's digest without going through the agent
 * Usage: npm run digest -- [name]
 */

import dotenv from 'dotenv';
import path from 'path';

const projectRoot = path.resolve(__dirname, '..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { dailyDigestExecute } from '../src/agents/tools/digest-helpers';

async function main() {
  const name = process.argv[2] ?? null;
  const result = await dailyDigestExecute({ name });

  if (!result.success) {
    console.error('💥 Digest failed:', result.error);
    process.exit(1);
  }

  console.log(result.digest);
}

main().catch(error => {
  console.error('💥 Digest failed:', error);
  process.exit(1);
});
