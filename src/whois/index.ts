/**
 * WHOIS sources.
 */

import type { Config, WhoisSource } from '../types.js';
import { Port43WhoisSource } from './client.js';
import { HttpWhoisSource } from './http-source.js';

export { Port43WhoisSource, lookupRaw, queryWhoisServer } from './client.js';
export { HttpWhoisSource, toWhoisRecord } from './http-source.js';
export { parseWhoisResponse, parseWhoisDate, parseKeyValues } from './parser.js';
export { getWhoisServer, extractReferralServer, IANA_WHOIS_SERVER } from './servers.js';

/**
 * Build the source selected by WHOIS_SOURCE.
 */
export function createWhoisSource(config: Config): WhoisSource {
  if (config.whois.source === 'http') {
    return new HttpWhoisSource({
      url: config.http.url,
      apiKey: config.http.apiKey,
      timeoutMs: config.whois.timeoutMs,
    });
  }

  return new Port43WhoisSource({
    server: config.whois.server,
    port: config.whois.port,
    timeoutMs: config.whois.timeoutMs,
    followReferrals: config.whois.followReferrals,
  });
}
