/**
 * Domain Name Validators.
 *
 * Gatekeeps terminal input before any WHOIS query goes out.
 */

import { InvalidDomainError } from './errors.js';

/**
 * Full domain pattern.
 * - One or more labels, each 1-63 characters
 * - Labels start and end alphanumeric, hyphens only in between
 * - TLD is 2-10 letters
 */
const DOMAIN_PATTERN =
  /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,10}$/i;

/**
 * Words that end an interactive session.
 */
const QUIT_COMMANDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);

/**
 * Does the input have the shape of a registrable domain name?
 */
export function validateDomain(input: string): boolean {
  return DOMAIN_PATTERN.test(input);
}

/**
 * Trim and lowercase raw terminal input.
 */
export function normalizeInput(raw: string): string {
  return raw.trim().toLowerCase();
}

export function isQuitCommand(input: string): boolean {
  return QUIT_COMMANDS.has(normalizeInput(input));
}

/**
 * Check a normalized domain, throwing with a reason when it is malformed.
 *
 * @throws InvalidDomainError if invalid
 */
export function assertValidDomain(domain: string): void {
  if (!domain) {
    throw new InvalidDomainError(domain, 'Domain name cannot be empty');
  }
  if (!validateDomain(domain)) {
    throw new InvalidDomainError(domain, describeProblem(domain));
  }
}

/**
 * Get the rightmost label of a domain.
 */
export function extractTld(domain: string): string {
  const parts = domain.toLowerCase().split('.');
  return parts[parts.length - 1] ?? '';
}

/**
 * Best guess at why a string failed the pattern.
 */
function describeProblem(domain: string): string {
  if (!domain.includes('.')) {
    return 'No TLD found. Include the extension (e.g., "example.com")';
  }
  if (domain.startsWith('.') || domain.endsWith('.')) {
    return 'Cannot start or end with a dot';
  }
  if (domain.includes('..')) {
    return 'Contains an empty label';
  }

  const invalidChar = domain.match(/[^a-z0-9.-]/i)?.[0];
  if (invalidChar) {
    return `Contains invalid character: "${invalidChar}"`;
  }

  const labels = domain.split('.');
  const tld = labels.pop() ?? '';
  if (!/^[a-z]{2,10}$/i.test(tld)) {
    return `TLD ".${tld}" must be 2-10 letters`;
  }

  const longLabel = labels.find((label) => label.length > 63);
  if (longLabel) {
    return `Label too long (${longLabel.length} chars, max 63)`;
  }

  return 'Labels cannot start or end with a hyphen';
}
