/**
 * WHOIS server mappings for common TLDs.
 *
 * Anything not listed goes to IANA first, which refers us on.
 */

export const IANA_WHOIS_SERVER = 'whois.iana.org';

const WHOIS_SERVERS: Record<string, string> = {
  com: 'whois.verisign-grs.com',
  net: 'whois.verisign-grs.com',
  org: 'whois.pir.org',
  info: 'whois.nic.info',
  biz: 'whois.nic.biz',
  io: 'whois.nic.io',
  co: 'whois.nic.co',
  ai: 'whois.nic.ai',
  me: 'whois.nic.me',
  sh: 'whois.nic.sh',
  xyz: 'whois.nic.xyz',
  app: 'whois.nic.google',
  dev: 'whois.nic.google',
  cc: 'ccwhois.verisign-grs.com',
  tv: 'whois.nic.tv',
  us: 'whois.nic.us',
  uk: 'whois.nic.uk',
  ca: 'whois.cira.ca',
  de: 'whois.denic.de',
  fr: 'whois.nic.fr',
  eu: 'whois.eu',
  nl: 'whois.domain-registry.nl',
  jp: 'whois.jprs.jp',
  au: 'whois.auda.org.au',
};

/**
 * Get WHOIS server for a TLD.
 */
export function getWhoisServer(tld: string): string | null {
  return WHOIS_SERVERS[tld.toLowerCase()] || null;
}

/**
 * Find the next WHOIS server named in a response.
 *
 * Thin registries (Verisign) name the registrar's server; IANA answers
 * with "refer:" / "whois:" lines.
 */
export function extractReferralServer(raw: string): string | null {
  for (const line of raw.split(/\r?\n/)) {
    const match = line
      .trim()
      .match(/^(?:registrar whois server|whois server|refer|whois):\s*(?:[a-z]+:\/\/)?([a-z0-9.-]+\.[a-z]{2,})/i);
    if (match) {
      return match[1].toLowerCase();
    }
  }
  return null;
}
