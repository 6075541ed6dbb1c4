#!/usr/bin/env node
/**
 * run-daily: fetch today's new papers for one arXiv category, score them
 * against the user's interest, summarize the survivors and post the digest
 * to the group-chat webhook.
 *
 * Usage:
 *   npm run daily -- eess.AS --user-interest "audio synthesis" --filter-level mid
 *   npm run daily -- cs.CL --language Chinese --dry-run
 *
 * Environment:
 *   OPENAI_API_KEY (required), OPENAI_BASE_URL, OPENAI_MODEL_NAME,
 *   SUMMARY_LANGUAGE, WEBHOOK_URL, USER_INTEREST, FILTER_LEVEL
 *   (also read from ./.env; the real environment wins)
 *
 * Exit codes:
 *   0  Digest produced (including partial failures and empty days)
 *   1  Configuration, authentication or paper source error
 */

import path from 'node:path';

import { loadConfig } from '../lib/config.js';
import { DAILY_USAGE, parseDailyArgs } from '../lib/cli/args.js';
import { runDaily } from '../lib/runners/daily.js';
import { ConfigError, LlmAuthError, errorMessage } from '../lib/errors.js';

async function main() {
  const args = parseDailyArgs(process.argv.slice(2));
  if (args.help) {
    console.log(DAILY_USAGE);
    return;
  }

  const repoRoot = path.resolve(process.cwd());
  const config = loadConfig(repoRoot, { overrides: args.overrides });

  const res = await runDaily({
    config,
    ...(args.dryRun ? { send: null } : {}),
  });

  if (args.dryRun && !args.json) {
    for (const message of res.messages) {
      console.log(message);
      console.log('');
    }
  }

  console.log(JSON.stringify({
    kind: 'dailyDigest',
    status: res.status,
    category: res.stats.category,
    stats: res.stats,
    skipped: res.failures.map((f) => ({ id: f.paperId, stage: f.stage, error: f.error })),
    ...(args.json ? { messages: res.messages } : {}),
  }));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`Configuration error: ${err.message}`);
    console.error(DAILY_USAGE);
  } else if (err instanceof LlmAuthError) {
    console.error(`Authentication with the completion API failed: ${err.message}`);
  } else {
    console.error('run-daily error:', errorMessage(err));
  }
  process.exit(1);
});
