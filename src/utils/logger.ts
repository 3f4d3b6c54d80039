/**
 * Structured logger.
 *
 * One JSON object per line on stderr; stdout belongs to the session.
 * Lines written during a domain check carry that check's request ID.
 * The configured WHOIS API key never reaches the output.
 */

import { config } from '../config.js';
import type { LogLevel } from '../types.js';

type LogData = Record<string, unknown>;

const REDACTED = '[REDACTED]';

/** Field names whose values are always hidden */
const SECRET_FIELD = /secret|password|api_?key|token|authorization/i;

/** "api_key=...", "Token=...", "password: ..." inside free text */
const SECRET_ASSIGNMENT = /\b(api[_-]?key|secret|password|token)([\s:="']+)[^\s"'&]+/gi;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function configuredSecrets(): string[] {
  return config.http.apiKey ? [config.http.apiKey] : [];
}

function maskText(text: string, secrets: readonly string[]): string {
  let masked = text;
  for (const secret of secrets) {
    masked = masked.split(secret).join(REDACTED);
  }
  return masked.replace(SECRET_ASSIGNMENT, `$1$2${REDACTED}`);
}

/**
 * Hide secrets in a log value.
 *
 * Masks the given secret strings wherever they appear, values of
 * secret-named fields, and key assignments in free text. Domain names,
 * however long their labels, pass through.
 */
export function maskSecrets(
  value: unknown,
  secrets: readonly string[] = configuredSecrets(),
): unknown {
  if (typeof value === 'string') {
    return maskText(value, secrets);
  }

  if (Array.isArray(value)) {
    return value.map((item) => maskSecrets(item, secrets));
  }

  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, field]) => [
        key,
        SECRET_FIELD.test(key) ? REDACTED : maskSecrets(field, secrets),
      ]),
    );
  }

  return value;
}

let currentRequestId: string | undefined;

export function generateRequestId(): string {
  return `chk_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

export function setRequestId(id: string): void {
  currentRequestId = id;
}

export function clearRequestId(): void {
  currentRequestId = undefined;
}

function write(level: LogLevel, message: string, data?: LogData): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.logLevel]) return;

  const entry: LogData = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (currentRequestId) {
    entry.request_id = currentRequestId;
  }

  if (data) {
    const secrets = configuredSecrets();
    for (const [key, field] of Object.entries(data)) {
      entry[key] = SECRET_FIELD.test(key) ? REDACTED : maskSecrets(field, secrets);
    }
  }

  console.error(JSON.stringify(entry));
}

export const logger = {
  debug: (message: string, data?: LogData) => write('debug', message, data),
  info: (message: string, data?: LogData) => write('info', message, data),
  warn: (message: string, data?: LogData) => write('warn', message, data),
  error: (message: string, data?: LogData) => write('error', message, data),

  /**
   * Log an error with its name, message and stack.
   */
  logError: (message: string, error: Error, data?: LogData) =>
    write('error', message, {
      ...data,
      error_name: error.name,
      error_message: error.message,
      error_stack: error.stack,
    }),
};
