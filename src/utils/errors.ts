/**
 * Custom Error Classes for Domain Lookup.
 *
 * Every error carries a machine-readable code plus a message meant for
 * the person at the terminal.
 */

/**
 * Base error class for all domain lookup errors.
 */
export class DomainLookupError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** User-friendly message */
  readonly userMessage: string;
  /** Can this operation be retried? */
  readonly retryable: boolean;
  /** Suggested action for the user */
  readonly suggestedAction?: string;

  constructor(
    code: string,
    message: string,
    userMessage: string,
    options?: {
      retryable?: boolean;
      suggestedAction?: string;
      cause?: Error;
    },
  ) {
    super(message);
    this.name = 'DomainLookupError';
    this.code = code;
    this.userMessage = userMessage;
    this.retryable = options?.retryable ?? false;
    this.suggestedAction = options?.suggestedAction;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }

  /**
   * Convert to a plain object for JSON output.
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.userMessage,
      retryable: this.retryable,
      suggestedAction: this.suggestedAction,
    };
  }
}

/**
 * Error when a domain name is invalid.
 */
export class InvalidDomainError extends DomainLookupError {
  constructor(domain: string, reason: string) {
    super(
      'INVALID_DOMAIN',
      `Invalid domain: ${domain} - ${reason}`,
      `The domain "${domain}" is not valid: ${reason}`,
      {
        retryable: false,
        suggestedAction: 'Domain should match pattern: example.com, sub.example.net, etc.',
      },
    );
    this.name = 'InvalidDomainError';
  }
}

/**
 * What a failed WHOIS answer looked like.
 * - no_record: the registry said it has no such domain
 * - failure: empty answer, rate-limit notice, unusable payload
 */
export type WhoisLookupErrorKind = 'no_record' | 'failure';

/**
 * The registry answered, but not with a registration record.
 * The message is the registry's own text.
 */
export class WhoisLookupError extends DomainLookupError {
  readonly kind: WhoisLookupErrorKind;

  constructor(kind: WhoisLookupErrorKind, message: string) {
    super(
      kind === 'no_record' ? 'WHOIS_NO_RECORD' : 'WHOIS_LOOKUP_FAILED',
      message,
      kind === 'no_record'
        ? 'The registry has no record of this domain.'
        : 'The WHOIS server did not return usable data.',
      {
        retryable: kind === 'failure',
        suggestedAction:
          kind === 'failure'
            ? 'Wait a moment and try again; registries throttle frequent queries.'
            : undefined,
      },
    );
    this.name = 'WhoisLookupError';
    this.kind = kind;
  }
}

/**
 * Error when a WHOIS server cannot be reached.
 */
export class WhoisConnectionError extends DomainLookupError {
  /** errno code from the socket, e.g. ECONNREFUSED */
  readonly errno?: string;

  constructor(server: string, detail: string, errno?: string, cause?: Error) {
    super(
      'WHOIS_CONNECTION',
      `WHOIS query to ${server} failed: ${detail}`,
      `Could not reach ${server}.`,
      {
        retryable: true,
        suggestedAction:
          'Check network/firewall settings blocking WHOIS port 43.',
        cause,
      },
    );
    this.name = 'WhoisConnectionError';
    this.errno = errno;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errno: this.errno };
  }
}

/**
 * Error when an HTTP WHOIS service answers with an error status.
 */
export class WhoisServiceError extends DomainLookupError {
  /** HTTP status code if available */
  readonly statusCode?: number;

  constructor(
    service: string,
    message: string,
    statusCode?: number,
    cause?: Error,
  ) {
    const isServerError = statusCode !== undefined && statusCode >= 500;

    super(
      'WHOIS_SERVICE_ERROR',
      `${service} error: ${message}`,
      isServerError
        ? `${service} is experiencing issues.`
        : `Could not check with ${service}: ${message}`,
      {
        retryable: isServerError,
        suggestedAction: isServerError
          ? 'Try again later, or switch WHOIS_SOURCE to port43.'
          : 'Check WHOIS_HTTP_URL and WHOIS_HTTP_API_KEY in your .env file.',
        cause,
      },
    );
    this.name = 'WhoisServiceError';
    this.statusCode = statusCode;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), statusCode: this.statusCode };
  }
}

/**
 * Error when a network request times out.
 */
export class TimeoutError extends DomainLookupError {
  constructor(operation: string, timeoutMs: number) {
    super(
      'TIMEOUT',
      `Operation timed out: ${operation} (${timeoutMs}ms)`,
      `The request took too long to complete.`,
      {
        retryable: true,
        suggestedAction: 'Increase WHOIS_TIMEOUT_MS for slower registries.',
      },
    );
    this.name = 'TimeoutError';
  }
}

/**
 * Error when a required configuration is missing.
 */
export class ConfigurationError extends DomainLookupError {
  constructor(missing: string, howToFix: string) {
    super(
      'CONFIG_ERROR',
      `Missing configuration: ${missing}`,
      `Configuration is incomplete.`,
      {
        retryable: false,
        suggestedAction: howToFix,
      },
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Convert any error to a DomainLookupError.
 */
export function wrapError(error: unknown): DomainLookupError {
  if (error instanceof DomainLookupError) {
    return error;
  }

  if (error instanceof Error) {
    const wrapped = new DomainLookupError(
      'UNKNOWN_ERROR',
      error.message,
      'An unexpected error occurred.',
      {
        retryable: true,
        suggestedAction: 'Try again or check the domain manually.',
        cause: error,
      },
    );
    // Keep the original category visible in verdict messages
    wrapped.name = error.name;
    return wrapped;
  }

  return new DomainLookupError(
    'UNKNOWN_ERROR',
    String(error),
    'An unexpected error occurred.',
    {
      retryable: true,
      suggestedAction: 'Try again or check the domain manually.',
    },
  );
}
