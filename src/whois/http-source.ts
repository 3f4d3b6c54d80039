/**
 * JSON WHOIS API source.
 *
 * For networks where outbound port 43 is blocked. The API does the WHOIS
 * query and returns parsed fields; we validate them and map them onto a
 * WhoisRecord.
 */

import axios, { type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { WhoisDate, WhoisRecord, WhoisSource } from '../types.js';
import { logger } from '../utils/logger.js';
import {
  ConfigurationError,
  TimeoutError,
  WhoisLookupError,
  WhoisServiceError,
} from '../utils/errors.js';
import { fromValues } from '../utils/one-or-many.js';
import { parseWhoisDate } from './parser.js';

const SERVICE_NAME = 'WHOIS API';

const stringOrList = z.union([z.string(), z.array(z.string())]);

/**
 * Fields we read from the API. Everything else is ignored.
 */
export const whoisApiResponseSchema = z
  .object({
    domain_name: stringOrList.nullish(),
    creation_date: stringOrList.nullish(),
    expiration_date: stringOrList.nullish(),
    registrar: z
      .union([z.string(), z.object({ name: z.string().nullish() }).passthrough()])
      .nullish(),
    name_servers: stringOrList.nullish(),
    status: stringOrList.nullish(),
    message: z.string().nullish(),
  })
  .passthrough();

export type WhoisApiResponse = z.infer<typeof whoisApiResponseSchema>;

export interface HttpSourceOptions {
  url: string;
  apiKey?: string;
  timeoutMs: number;
}

function listOf(value: string | string[] | null | undefined): string[] {
  if (value === null || value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).filter((item) => item.trim().length > 0);
}

function datesOf(value: string | string[] | null | undefined): WhoisDate[] {
  return listOf(value).map(parseWhoisDate);
}

/**
 * Map a validated API payload onto a WhoisRecord.
 *
 * @throws WhoisLookupError when the payload says the domain is unknown
 */
export function toWhoisRecord(data: WhoisApiResponse, server: string): WhoisRecord {
  const domainNames = listOf(data.domain_name);
  const status = listOf(data.status);
  const message = data.message ?? '';

  if (domainNames.length === 0) {
    const hint = [message, ...status].join(' ');
    if (/not found|no match|\bavailable\b/i.test(hint)) {
      throw new WhoisLookupError('no_record', message || status.join(', '));
    }
  }

  const registrar =
    typeof data.registrar === 'string' ? data.registrar : data.registrar?.name;

  return {
    domainName: fromValues(domainNames.map((name) => name.toLowerCase())),
    creationDate: fromValues(datesOf(data.creation_date)),
    expirationDate: fromValues(datesOf(data.expiration_date)),
    registrar: registrar || undefined,
    nameServers: fromValues(listOf(data.name_servers).map((ns) => ns.toLowerCase())),
    status: fromValues(status),
    server,
  };
}

/**
 * WhoisSource backed by a JSON WHOIS API.
 */
export class HttpWhoisSource implements WhoisSource {
  readonly name = 'http';
  private readonly host: string;

  constructor(private readonly options: HttpSourceOptions) {
    if (!/^https?:\/\//i.test(options.url)) {
      throw new ConfigurationError(
        'WHOIS_HTTP_URL',
        'Set WHOIS_HTTP_URL to an http(s) URL of a JSON WHOIS API.',
      );
    }
    this.host = new URL(options.url).host;
  }

  async lookup(domain: string): Promise<WhoisRecord> {
    logger.debug('WHOIS API query', { domain, api: this.host });

    let response: AxiosResponse<unknown>;
    try {
      response = await axios.get<unknown>(this.options.url, {
        params: { domain },
        timeout: this.options.timeoutMs,
        headers: {
          Accept: 'application/json',
          ...(this.options.apiKey
            ? { Authorization: `Token=${this.options.apiKey}` }
            : {}),
        },
        validateStatus: () => true, // Don't throw on any status
      });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new TimeoutError(`${SERVICE_NAME} lookup`, this.options.timeoutMs);
        }
        throw new WhoisServiceError(SERVICE_NAME, error.message, undefined, error);
      }
      throw error;
    }

    if (response.status === 404) {
      throw new WhoisLookupError('no_record', `Domain not found: ${domain}`);
    }

    if (response.status !== 200) {
      throw new WhoisServiceError(
        SERVICE_NAME,
        `HTTP ${response.status}`,
        response.status,
      );
    }

    const parsed = whoisApiResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new WhoisLookupError(
        'failure',
        `Unexpected ${SERVICE_NAME} payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      );
    }

    return toWhoisRecord(parsed.data, this.host);
  }
}
