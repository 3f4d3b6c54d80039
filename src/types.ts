/**
 * Domain Lookup - Core Type Definitions
 *
 * These types describe what flows between the WHOIS sources, the
 * classifier and the interactive session.
 */

import type { InvalidDomainError } from './utils/errors.js';

// ═══════════════════════════════════════════════════════════════════════════
// WHOIS RECORD TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A WHOIS field that registries return either once or repeated.
 */
export type OneOrMany<T> =
  | { kind: 'single'; value: T }
  | { kind: 'multiple'; values: readonly T[] };

/**
 * A date field as it came out of the parser.
 * Strings are raw values that could not be read as a date.
 */
export type WhoisDate = Date | string;

/**
 * Registration data for one domain, as far as the registry disclosed it.
 * Every field is optional: registries disagree wildly on what they publish.
 */
export interface WhoisRecord {
  /** Presence means the registry knows the domain */
  domainName?: OneOrMany<string>;

  /** First value is authoritative when several are listed */
  creationDate?: OneOrMany<WhoisDate>;

  expirationDate?: OneOrMany<WhoisDate>;

  registrar?: string;

  nameServers?: OneOrMany<string>;

  /** EPP status codes, e.g. "clientTransferProhibited" */
  status?: OneOrMany<string>;

  /** WHOIS host (or API) that answered */
  server?: string;

  /** Unparsed response text, when the source had one */
  raw?: string;
}

/**
 * Anything that can look a domain up.
 */
export interface WhoisSource {
  readonly name: WhoisSourceName;
  lookup(domain: string): Promise<WhoisRecord>;
}

export type WhoisSourceName = 'port43' | 'http';

// ═══════════════════════════════════════════════════════════════════════════
// VERDICT TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * How a check ended.
 *
 * - no_record: the registry has no registration
 * - expired: a registration exists but lapsed
 * - registered: active registration with at least one detail
 * - registered_opaque: a record exists, nothing else could be read
 * - registered_private: WHOIS data is redacted for privacy
 * - lookup_ambiguous: the lookup failed with text we could not interpret
 * - lookup_failed: network, timeout or parser fault
 */
export type Outcome =
  | 'no_record'
  | 'expired'
  | 'registered'
  | 'registered_opaque'
  | 'registered_private'
  | 'lookup_ambiguous'
  | 'lookup_failed';

/**
 * The classifier's decision for one domain.
 */
export interface Verdict {
  readonly available: boolean;
  readonly message: string;
  readonly outcome: Outcome;
  /** Next step for a lookup that failed but may succeed on retry */
  readonly hint?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SESSION TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Counters for one run of the tool.
 */
export interface SessionState {
  checked: number;
  /** Available domains, in the order they were found */
  available: string[];
}

export interface SessionSummary {
  checked: number;
  availableCount: number;
  available: readonly string[];
}

/**
 * What a single line of input turned into.
 */
export type StepResult =
  | { type: 'quit' }
  | { type: 'empty' }
  | { type: 'invalid'; domain: string; error: InvalidDomainError }
  | { type: 'checked'; domain: string; verdict: Verdict };

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Runtime configuration.
 */
export interface Config {
  whois: {
    source: WhoisSourceName;
    /** Forces every port-43 query to this host */
    server?: string;
    port: number;
    timeoutMs: number;
    followReferrals: boolean;
  };

  http: {
    url: string;
    apiKey?: string;
  };

  // Pause before each lookup
  checkDelayMs: number;

  // Logging
  logLevel: LogLevel;
}
