/**
 * WHOIS text parser.
 *
 * Registries answer in loosely structured "Key: value" text with their own
 * key names and date formats. This module maps the common variants onto
 * a WhoisRecord, or throws a WhoisLookupError when the text is a refusal
 * rather than a record.
 */

import type { OneOrMany, WhoisDate, WhoisRecord } from '../types.js';
import { WhoisLookupError } from '../utils/errors.js';
import { fromValues } from '../utils/one-or-many.js';
import { NOT_FOUND_PHRASES, matchesAny } from '../services/classifier.js';

export type KeyValues = Map<string, string[]>;

/**
 * Key aliases, in order of preference.
 */
const FIELD_KEYS = {
  domainName: ['domain name', 'domain', 'domain_name'],
  creationDate: [
    'creation date',
    'created',
    'created on',
    'registered on',
    'registration time',
    'domain registration date',
    'registered',
  ],
  expirationDate: [
    'registry expiry date',
    'registrar registration expiration date',
    'expiration date',
    'expiry date',
    'expires on',
    'expires',
    'paid-till',
    'expiration time',
  ],
  registrar: ['registrar', 'sponsoring registrar', 'registrar name'],
  nameServers: ['name server', 'nserver', 'nameservers', 'name servers', 'domain nameservers'],
  status: ['domain status', 'status', 'state', 'registration status'],
} as const;

/** DENIC and others answer an unregistered name with a record marked free */
const FREE_STATUS = /^free$/i;

const RATE_LIMIT_PATTERNS = [
  /limit exceeded/i,
  /too many requests/i,
  /quota exceeded/i,
  /exceeded the maximum/i,
];

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

/** "[Domain Name]   EXAMPLE.JP", optionally behind an "a." item letter */
const BRACKET_LINE = /^(?:[a-z]\.\s*)?\[([^\]]+)\]\s*(.*)$/i;

/** What may name a field inside an indented block ("URL", "Registered on") */
const BLOCK_KEY = /^[a-z][a-z0-9 _/()'-]*$/i;

function isNotice(line: string): boolean {
  return line.startsWith('%') || line.startsWith('#') || line.startsWith('>>>');
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Parse WHOIS text into lowercased keys and their values.
 *
 * Reads "Key: value" lines and "[Key] value" lines. A "Key:" line with
 * nothing after it opens a block: the following lines indented deeper
 * than the key are its values, up to a blank line. Repeated keys keep
 * every value.
 */
export function parseKeyValues(raw: string): KeyValues {
  const data: KeyValues = new Map();
  let block: { key: string; indent: number } | undefined;

  const add = (rawKey: string, rawValue: string) => {
    const key = rawKey.trim().toLowerCase();
    const value = rawValue.trim();
    if (!key || !value) return;

    const existing = data.get(key);
    if (existing) {
      existing.push(value);
    } else {
      data.set(key, [value]);
    }
  };

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line) {
      block = undefined;
      continue;
    }
    if (isNotice(line)) {
      continue;
    }

    const indent = indentOf(rawLine);
    if (block && indent <= block.indent) {
      block = undefined;
    }

    const bracket = line.match(BRACKET_LINE);
    if (bracket) {
      add(bracket[1], bracket[2]);
      continue;
    }

    const colonIndex = line.indexOf(':');
    const key = colonIndex === -1 ? '' : line.substring(0, colonIndex).trim();

    if (key && (!block || BLOCK_KEY.test(key))) {
      const value = line.substring(colonIndex + 1).trim();
      if (value) {
        add(key, value);
      } else if (!block) {
        block = { key, indent };
      }
      continue;
    }

    if (block) {
      add(block.key, line);
    }
  }

  return data;
}

function pick(data: KeyValues, keys: readonly string[]): string[] {
  for (const key of keys) {
    const values = data.get(key);
    if (values && values.length > 0) {
      return values;
    }
  }
  return [];
}

function utcDate(year: number, month: number, day: number, time?: string): Date {
  const [hours = 0, minutes = 0, seconds = 0] = (time ?? '')
    .split(':')
    .filter((part) => part.length > 0)
    .map((part) => parseInt(part, 10));
  return new Date(Date.UTC(year, month, day, hours, minutes, seconds));
}

/**
 * Read a registry date. Unknown formats come back as the raw string.
 */
export function parseWhoisDate(value: string): WhoisDate {
  const text = value.trim();

  // 2024-01-15, 2024-01-15T04:00:00Z, 2024-01-15 04:00:00, 2024.01.15, 2024/01/15
  const ymd = text.match(
    /^(\d{4})[-./](\d{2})[-./](\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?)(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?)?/,
  );
  if (ymd) {
    const [, year, month, day, time, zone] = ymd;
    if (zone && zone !== 'Z') {
      const iso = `${year}-${month}-${day}T${time}${zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`}`;
      const parsed = new Date(iso);
      return isNaN(parsed.getTime()) ? text : parsed;
    }
    return utcDate(Number(year), Number(month) - 1, Number(day), time);
  }

  // 15-jan-2024, 15 Jan 2024
  const dmyName = text.match(/^(\d{1,2})[- ]([a-z]{3})[a-z]*[- ](\d{4})(?:\s+(\d{2}:\d{2}(?::\d{2})?))?/i);
  if (dmyName) {
    const [, day, monthName, year, time] = dmyName;
    const month = MONTHS[monthName.toLowerCase()];
    if (month !== undefined) {
      return utcDate(Number(year), month, Number(day), time);
    }
  }

  // 15.01.2024, 15/01/2024
  const dmy = text.match(/^(\d{2})[./](\d{2})[./](\d{4})(?:\s+(\d{2}:\d{2}(?::\d{2})?))?/);
  if (dmy) {
    const [, day, month, year, time] = dmy;
    return utcDate(Number(year), Number(month) - 1, Number(day), time);
  }

  return text;
}

/**
 * Strip the ICANN reference URL registries append to status codes.
 */
function cleanStatus(value: string): string {
  return value.replace(/\s*\(?https?:\/\/\S*\)?$/i, '').trim();
}

function dateField(values: string[]): OneOrMany<WhoisDate> | undefined {
  return fromValues(values.map(parseWhoisDate));
}

/**
 * Lowercased, deduplicated, order kept.
 */
function uniqueLower(values: string[]): string[] {
  return [...new Set(values.map((value) => value.toLowerCase()))];
}

/**
 * Turn a raw WHOIS answer into a record.
 *
 * @throws WhoisLookupError when the text is a refusal or a "no match" answer
 */
export function parseWhoisResponse(
  raw: string,
  server?: string,
): WhoisRecord {
  const text = raw.trim();
  if (!text) {
    throw new WhoisLookupError('failure', 'Empty WHOIS response');
  }

  const data = parseKeyValues(text);
  const domainNames = pick(data, FIELD_KEYS.domainName);
  const statuses = pick(data, FIELD_KEYS.status).map(cleanStatus);

  if (statuses.some((status) => FREE_STATUS.test(status))) {
    throw new WhoisLookupError('no_record', 'Status: free');
  }

  if (domainNames.length === 0) {
    if (RATE_LIMIT_PATTERNS.some((pattern) => pattern.test(text))) {
      const firstLine = text.split(/\r?\n/)[0].trim();
      throw new WhoisLookupError('failure', firstLine);
    }
    if (matchesAny(text, NOT_FOUND_PHRASES)) {
      throw new WhoisLookupError('no_record', text);
    }
  }

  const registrar = pick(data, FIELD_KEYS.registrar)[0];

  return {
    domainName: fromValues(uniqueLower(domainNames)),
    creationDate: dateField(pick(data, FIELD_KEYS.creationDate)),
    expirationDate: dateField(pick(data, FIELD_KEYS.expirationDate)),
    registrar: registrar || undefined,
    nameServers: fromValues(uniqueLower(pick(data, FIELD_KEYS.nameServers))),
    status: fromValues([...new Set(statuses)]),
    server,
    raw,
  };
}
