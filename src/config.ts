/**
 * Configuration loader for Domain Lookup.
 *
 * Loads environment variables with sensible defaults.
 * Nothing is required: the tool talks to public WHOIS servers out of the box.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { Config } from './types.js';

// Load .env file if present
loadDotenv();

const DEFAULT_HTTP_URL = 'https://whoisjson.com/api/v1/whois';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const sourceSchema = z.enum(['port43', 'http']);

/**
 * Parse an integer with a fallback default.
 */
function parseIntWithDefault(
  value: string | undefined,
  defaultValue: number,
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a boolean from environment variable.
 */
function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an enumerated value, falling back when it is missing or unknown.
 */
function parseEnum<T extends string>(
  schema: z.ZodType<T>,
  value: string | undefined,
  defaultValue: T,
): T {
  const result = schema.safeParse(value?.trim().toLowerCase());
  return result.success ? result.data : defaultValue;
}

/**
 * Load configuration from environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    whois: {
      source: parseEnum(sourceSchema, env.WHOIS_SOURCE, 'port43'),
      server: env.WHOIS_SERVER?.trim() || undefined,
      port: parseIntWithDefault(env.WHOIS_PORT, 43),
      timeoutMs: parseIntWithDefault(env.WHOIS_TIMEOUT_MS, 10000),
      followReferrals: parseBool(env.WHOIS_FOLLOW_REFERRALS, true),
    },
    http: {
      url: env.WHOIS_HTTP_URL?.trim() || DEFAULT_HTTP_URL,
      apiKey: env.WHOIS_HTTP_API_KEY || undefined,
    },
    checkDelayMs: Math.max(0, parseIntWithDefault(env.CHECK_DELAY_MS, 500)),
    logLevel: parseEnum(logLevelSchema, env.LOG_LEVEL, 'warn'),
  };
}

/**
 * Global config instance.
 * Loaded once at startup.
 */
export const config = loadConfig();
