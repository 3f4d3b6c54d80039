#!/usr/bin/env node
/**
 * Domain Lookup CLI.
 *
 * Checks domain availability over WHOIS.
 *
 *   domain-lookup                     interactive prompt
 *   domain-lookup example.com foo.io  check the given domains and exit
 *
 * Configuration comes from the environment (see .env.example).
 */

import readline from 'node:readline';
import { config } from './config.js';
import { logger } from './utils/logger.js';
import { wrapError } from './utils/errors.js';
import {
  PROMPT,
  formatBanner,
  formatChecking,
  formatEmptyInput,
  formatInterrupted,
  formatInvalid,
  formatSummary,
  formatVerdict,
} from './utils/format.js';
import { runSession, type SessionReporter } from './services/session.js';
import { createWhoisSource } from './whois/index.js';

function createReporter(onPrompt: () => void): SessionReporter {
  return {
    prompt: onPrompt,
    empty: () => console.log(formatEmptyInput()),
    invalid: (domain, error) => console.log(formatInvalid(domain, error)),
    checking: (domain) => console.log(formatChecking(domain)),
    verdict: (_domain, verdict) => console.log(formatVerdict(verdict)),
    interrupted: () => console.log(formatInterrupted()),
    summary: (summary) => console.log(formatSummary(summary)),
  };
}

async function runBatch(domains: string[]): Promise<void> {
  const source = createWhoisSource(config);
  console.log(formatBanner(false));

  await runSession(
    domains,
    { source, delayMs: config.checkDelayMs },
    createReporter(() => undefined),
  );
}

async function runInteractive(): Promise<void> {
  const source = createWhoisSource(config);
  const controller = new AbortController();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: `\n${PROMPT}`,
  });

  // Ctrl+C: finish the current domain, then stop and summarize
  rl.on('SIGINT', () => {
    controller.abort();
    rl.close();
  });

  console.log(formatBanner(true));

  try {
    await runSession(
      rl,
      { source, delayMs: config.checkDelayMs },
      createReporter(() => rl.prompt()),
      controller.signal,
    );
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  logger.debug('Domain Lookup starting', {
    node_version: process.version,
    source: config.whois.source,
    delay_ms: config.checkDelayMs,
  });

  const domains = process.argv.slice(2).filter((arg) => arg.trim().length > 0);
  if (domains.length > 0) {
    await runBatch(domains);
  } else {
    await runInteractive();
  }
}

main().catch((error: unknown) => {
  const wrapped = wrapError(error);
  logger.logError('Domain Lookup failed', wrapped);
  console.error(wrapped.userMessage);
  if (wrapped.suggestedAction) {
    console.error(wrapped.suggestedAction);
  }
  process.exit(1);
});
