/**
 * WHOIS Response Classifier.
 *
 * Turns whatever a WHOIS source produced (a parsed record or an error)
 * into an availability verdict with evidence. Pure: the clock is a
 * parameter and nothing here throws. An unclear answer is never
 * "available".
 */

import type { Outcome, Verdict, WhoisDate, WhoisRecord } from '../types.js';
import { DomainLookupError, WhoisLookupError } from '../utils/errors.js';
import { countOf, firstOf } from '../utils/one-or-many.js';

/**
 * Registry phrases meaning "no such domain". Lowercase.
 */
export const NOT_FOUND_PHRASES: readonly string[] = [
  'no match for',
  'no entries found',
  'not found',
  'no data found',
  'no match',
  'domain not found',
  'domain available',
  'status: free',
];

/**
 * Registry phrases meaning "registered, details hidden". Lowercase.
 */
export const PRIVACY_PHRASES: readonly string[] = [
  'redacted for privacy',
  'registration private',
  'data protected',
];

const AVAILABLE_OUTCOMES: ReadonlySet<Outcome> = new Set<Outcome>([
  'no_record',
  'expired',
]);

const ERROR_OUTCOMES: ReadonlySet<Outcome> = new Set<Outcome>([
  'lookup_ambiguous',
  'lookup_failed',
]);

export function isAvailableOutcome(outcome: Outcome): boolean {
  return AVAILABLE_OUTCOMES.has(outcome);
}

export function isErrorOutcome(outcome: Outcome): boolean {
  return ERROR_OUTCOMES.has(outcome);
}

/**
 * Case-insensitive substring match against a phrase set.
 */
export function matchesAny(text: string, phrases: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return phrases.some((phrase) => lower.includes(phrase));
}

/**
 * YYYY-MM-DD in UTC.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function asValidDate(value: WhoisDate | undefined): Date | undefined {
  if (value instanceof Date && !isNaN(value.getTime())) {
    return value;
  }
  return undefined;
}

function verdict(outcome: Outcome, message: string, hint?: string): Verdict {
  const result = { available: isAvailableOutcome(outcome), outcome, message };
  return hint ? { ...result, hint } : result;
}

/**
 * What to do next, for lookups worth retrying.
 */
function retryHint(error: Error): string | undefined {
  if (error instanceof DomainLookupError && error.retryable) {
    return error.suggestedAction;
  }
  return undefined;
}

/**
 * Classify the result of a WHOIS lookup.
 *
 * @param domain - Domain that was looked up, used in messages
 * @param result - Parsed record, or whatever the lookup threw
 * @param now - Reference time for the expiration check
 */
export function classify(
  domain: string,
  result: WhoisRecord | Error,
  now: Date,
): Verdict {
  if (result instanceof Error) {
    return classifyError(domain, result);
  }
  return classifyRecord(domain, result, now);
}

function classifyRecord(domain: string, record: WhoisRecord, now: Date): Verdict {
  if (!firstOf(record.domainName)) {
    return verdict(
      'no_record',
      `Domain ${domain} appears to be available (No domain record found)`,
    );
  }

  const details: string[] = [];

  const created = asValidDate(firstOf(record.creationDate));
  if (created) {
    details.push(`Created: ${formatDate(created)}`);
  }

  const expires = asValidDate(firstOf(record.expirationDate));
  if (expires) {
    details.push(`Expires: ${formatDate(expires)}`);
    if (expires.getTime() < now.getTime()) {
      return verdict(
        'expired',
        `Domain ${domain} expired on ${formatDate(expires)} and may be available for registration`,
      );
    }
  }

  if (record.registrar) {
    details.push(`Registrar: ${record.registrar}`);
  }

  const nameServerCount = countNonEmpty(record.nameServers);
  if (nameServerCount > 0) {
    details.push(`Nameservers: ${nameServerCount} configured`);
  }

  const status = describeStatus(record);
  if (status) {
    details.push(`Status: ${status}`);
  }

  if (details.length > 0) {
    return verdict(
      'registered',
      `Domain ${domain} is registered (${details.join(' | ')})`,
    );
  }

  return verdict(
    'registered_opaque',
    `Domain ${domain} appears to be registered, but limited details are available`,
  );
}

function countNonEmpty(field: WhoisRecord['nameServers']): number {
  if (field?.kind === 'single') {
    return field.value ? 1 : 0;
  }
  return countOf(field);
}

/**
 * First two statuses, then how many were left out.
 */
function describeStatus(record: WhoisRecord): string | undefined {
  const status = record.status;
  if (!status) return undefined;

  if (status.kind === 'single') {
    return status.value || undefined;
  }

  if (status.values.length === 0) return undefined;

  let text = status.values.slice(0, 2).join(', ');
  if (status.values.length > 2) {
    text += ` and ${status.values.length - 2} more`;
  }
  return text;
}

function classifyError(domain: string, error: Error): Verdict {
  if (!(error instanceof WhoisLookupError)) {
    return verdict(
      'lookup_failed',
      `Error checking ${domain}: ${error.name} - ${error.message}`,
      retryHint(error),
    );
  }

  const text = error.message;

  if (matchesAny(text, NOT_FOUND_PHRASES)) {
    const summary = text.split('.')[0];
    return verdict(
      'no_record',
      `Domain ${domain} appears to be available (WHOIS response: ${summary})`,
    );
  }

  if (matchesAny(text, PRIVACY_PHRASES)) {
    return verdict(
      'registered_private',
      `Domain ${domain} is registered with privacy protection`,
    );
  }

  return verdict(
    'lookup_ambiguous',
    `Error checking ${domain}: ${text}`,
    retryHint(error),
  );
}
