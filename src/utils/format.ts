/**
 * Terminal output formatting.
 *
 * Pure string builders; the CLI decides where the text goes.
 */

import chalk from 'chalk';
import type { SessionSummary, Verdict } from '../types.js';
import type { InvalidDomainError } from './errors.js';
import { isErrorOutcome } from '../services/classifier.js';

export const TITLE = 'Domain Availability Checker';
export const PROMPT = 'Enter domain to check (e.g., example.com): ';

export function formatBanner(interactive: boolean): string {
  const lines = [chalk.bold.cyan(`\n=== ${TITLE} ===`)];
  if (interactive) {
    lines.push("Enter domain names to check (type 'quit' or 'exit' to finish)");
    lines.push('Press Ctrl+C to exit at any time\n');
  }
  return lines.join('\n');
}

export function formatEmptyInput(): string {
  return 'Please enter a domain name';
}

export function formatInvalid(domain: string, error: InvalidDomainError): string {
  const lines = [chalk.bold.red(`Invalid domain format: ${domain}`)];
  if (error.suggestedAction) {
    lines.push(error.suggestedAction);
  }
  return lines.join('\n');
}

export function formatChecking(domain: string): string {
  return chalk.bold.yellow(`Checking ${domain}...`);
}

/**
 * One verdict line: ✓ available, ✗ registered, ! lookup problem
 * (followed by the retry hint when there is one).
 */
export function formatVerdict(verdict: Verdict): string {
  if (verdict.available) {
    return chalk.bold.green(`✓ ${verdict.message}`);
  }
  if (isErrorOutcome(verdict.outcome)) {
    const line = chalk.bold.yellow(`! ${verdict.message}`);
    return verdict.hint ? `${line}\n  ${chalk.dim(verdict.hint)}` : line;
  }
  return chalk.bold.red(`✗ ${verdict.message}`);
}

export function formatInterrupted(): string {
  return chalk.bold.yellow('\n\nSearch interrupted by user.');
}

export function formatSummary(summary: SessionSummary): string {
  const lines = [
    chalk.bold.cyan('\n=== Domain Lookup Summary ==='),
    `Domains checked: ${summary.checked}`,
    `Available domains found: ${summary.availableCount}`,
  ];

  if (summary.available.length > 0) {
    lines.push(chalk.bold.green('\nAvailable Domains:'));
    for (const domain of summary.available) {
      lines.push(`  - ${domain}`);
    }
  }

  lines.push(chalk.bold.cyan(`\nThank you for using the ${TITLE}!`));
  return lines.join('\n');
}
