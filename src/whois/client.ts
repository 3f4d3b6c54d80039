/**
 * WHOIS client (RFC 3912).
 *
 * One TCP connection per query on port 43: send the domain, read until
 * the server hangs up. Follows a single referral from a thin registry
 * (or IANA) to the server that holds the full record.
 */

import { createConnection } from 'node:net';
import type { WhoisRecord, WhoisSource } from '../types.js';
import { logger } from '../utils/logger.js';
import {
  TimeoutError,
  WhoisConnectionError,
  WhoisLookupError,
} from '../utils/errors.js';
import { extractTld } from '../utils/validators.js';
import { firstOf } from '../utils/one-or-many.js';
import { parseWhoisResponse } from './parser.js';
import {
  IANA_WHOIS_SERVER,
  extractReferralServer,
  getWhoisServer,
} from './servers.js';

export interface WhoisQueryOptions {
  port: number;
  timeoutMs: number;
}

export interface Port43Options extends WhoisQueryOptions {
  /** Send every query here instead of picking by TLD */
  server?: string;
  followReferrals: boolean;
}

export interface RawWhoisResponse {
  raw: string;
  server: string;
}

/**
 * Send one query and collect the full answer.
 */
export function queryWhoisServer(
  server: string,
  query: string,
  options: WhoisQueryOptions,
): Promise<string> {
  return new Promise((resolve, reject) => {
    let response = '';
    let settled = false;

    const finish = (error?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      if (error) {
        socket.destroy();
        reject(error);
      } else {
        resolve(response);
      }
    };

    const socket = createConnection({ host: server, port: options.port }, () => {
      socket.write(`${query}\r\n`);
    });

    const timeoutId = setTimeout(() => {
      finish(new TimeoutError(`WHOIS query to ${server}`, options.timeoutMs));
    }, options.timeoutMs);

    socket.setEncoding('utf-8');

    socket.on('data', (chunk: string) => {
      response += chunk;
    });

    socket.on('end', () => finish());

    socket.on('error', (error: NodeJS.ErrnoException) => {
      const detail = error.message || error.code || 'Connection failed';
      finish(new WhoisConnectionError(server, detail, error.code, error));
    });

    socket.on('close', (hadError) => {
      if (hadError && !response) {
        finish(
          new WhoisConnectionError(server, 'connection closed unexpectedly', 'ECONNRESET'),
        );
      } else {
        finish();
      }
    });
  });
}

/**
 * Does the text hold a registration record for the domain?
 */
function holdsRecord(raw: string): boolean {
  try {
    return firstOf(parseWhoisResponse(raw).domainName) !== undefined;
  } catch (error) {
    if (error instanceof WhoisLookupError) return false;
    throw error;
  }
}

/**
 * Query the right server for a domain, following one referral.
 *
 * A registrar's answer replaces the registry's only when it is itself a
 * record; a refusal, a "no match" or a dropped connection from the
 * registrar leaves the registry's answer in place. IANA answers describe
 * the TLD, so for those the referral is always taken and its answer,
 * whatever it says, is the result.
 */
export async function lookupRaw(
  domain: string,
  options: Port43Options,
): Promise<RawWhoisResponse> {
  const query = domain.trim().toLowerCase();
  const server =
    options.server || getWhoisServer(extractTld(query)) || IANA_WHOIS_SERVER;

  logger.debug('WHOIS query', { domain: query, server });
  const raw = await queryWhoisServer(server, query, options);

  const fromIana = !options.server && server === IANA_WHOIS_SERVER;
  if (options.server || !(options.followReferrals || fromIana)) {
    return { raw, server };
  }

  const referral = extractReferralServer(raw);
  if (!referral || referral === server) {
    if (fromIana) {
      throw new WhoisLookupError(
        'failure',
        `No WHOIS server known for .${extractTld(query)}`,
      );
    }
    return { raw, server };
  }

  logger.debug('Following WHOIS referral', { from: server, to: referral });

  if (fromIana) {
    return { raw: await queryWhoisServer(referral, query, options), server: referral };
  }

  try {
    const referred = await queryWhoisServer(referral, query, options);
    if (holdsRecord(referred)) {
      return { raw: referred, server: referral };
    }
    logger.warn('WHOIS referral returned no record, keeping registry answer', {
      domain: query,
      server: referral,
    });
  } catch (error) {
    logger.warn('WHOIS referral failed, keeping registry answer', {
      domain: query,
      server: referral,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  return { raw, server };
}

/**
 * WhoisSource speaking the WHOIS protocol directly.
 */
export class Port43WhoisSource implements WhoisSource {
  readonly name = 'port43';

  constructor(private readonly options: Port43Options) {}

  async lookup(domain: string): Promise<WhoisRecord> {
    const start = Date.now();
    const { raw, server } = await lookupRaw(domain, this.options);

    logger.debug('WHOIS answer received', {
      domain,
      server,
      bytes: raw.length,
      duration_ms: Date.now() - start,
    });

    return parseWhoisResponse(raw, server);
  }
}
