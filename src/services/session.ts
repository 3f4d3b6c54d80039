/**
 * Domain check session.
 *
 * Reads candidate domains one at a time, validates them, throttles,
 * looks them up and classifies the result. Strictly sequential: the next
 * input is not taken until the current verdict has been reported.
 */

import type {
  SessionState,
  SessionSummary,
  StepResult,
  Verdict,
  WhoisSource,
} from '../types.js';
import { InvalidDomainError, wrapError } from '../utils/errors.js';
import {
  clearRequestId,
  generateRequestId,
  logger,
  setRequestId,
} from '../utils/logger.js';
import { assertValidDomain, isQuitCommand, normalizeInput } from '../utils/validators.js';
import { classify, isErrorOutcome } from './classifier.js';

export interface SessionDeps {
  source: WhoisSource;
  /** Pause before each lookup, to stay under registry rate limits */
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Receives everything the session has to say.
 */
export interface SessionReporter {
  prompt(): void;
  empty(): void;
  invalid(domain: string, error: InvalidDomainError): void;
  checking(domain: string): void;
  verdict(domain: string, verdict: Verdict): void;
  interrupted(): void;
  summary(summary: SessionSummary): void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createSessionState(): SessionState {
  return { checked: 0, available: [] };
}

export function summarize(state: SessionState): SessionSummary {
  return {
    checked: state.checked,
    availableCount: state.available.length,
    available: [...state.available],
  };
}

/**
 * Look a domain up and classify it. Never throws.
 */
export async function checkDomain(
  domain: string,
  deps: Pick<SessionDeps, 'source' | 'now'>,
): Promise<Verdict> {
  const now = deps.now ?? (() => new Date());
  const requestId = generateRequestId();
  setRequestId(requestId);

  try {
    const record = await deps.source.lookup(domain);
    const verdict = classify(domain, record, now());
    logger.info('Domain classified', {
      domain,
      outcome: verdict.outcome,
      server: record.server,
    });
    return verdict;
  } catch (error) {
    const wrapped = wrapError(error);
    const verdict = classify(domain, wrapped, now());

    if (isErrorOutcome(verdict.outcome)) {
      logger.logError('Domain lookup failed', wrapped, {
        domain,
        outcome: verdict.outcome,
        error: wrapped.toJSON(),
      });
    } else {
      logger.info('Domain classified from lookup error', {
        domain,
        code: wrapped.code,
        outcome: verdict.outcome,
      });
    }
    return verdict;
  } finally {
    clearRequestId();
  }
}

/**
 * Handle one line of input.
 *
 * @param onCheck - Called once the input passed validation, before the lookup
 */
export async function processInput(
  state: SessionState,
  raw: string,
  deps: SessionDeps,
  onCheck?: (domain: string) => void,
): Promise<StepResult> {
  const input = normalizeInput(raw);

  if (isQuitCommand(input)) {
    return { type: 'quit' };
  }
  if (!input) {
    return { type: 'empty' };
  }

  try {
    assertValidDomain(input);
  } catch (error) {
    if (error instanceof InvalidDomainError) {
      return { type: 'invalid', domain: input, error };
    }
    throw error;
  }

  state.checked += 1;
  onCheck?.(input);
  await (deps.sleep ?? sleep)(deps.delayMs);

  const verdict = await checkDomain(input, deps);
  if (verdict.available) {
    state.available.push(input);
  }

  return { type: 'checked', domain: input, verdict };
}

/**
 * Run a whole session over a stream of input lines.
 *
 * Stops at a quit command, at the end of input, or when `signal` is
 * aborted (checked between domains). The summary is always reported.
 */
export async function runSession(
  inputs: AsyncIterable<string> | Iterable<string>,
  deps: SessionDeps,
  reporter: SessionReporter,
  signal?: AbortSignal,
): Promise<SessionSummary> {
  const state = createSessionState();

  reporter.prompt();
  for await (const line of inputs) {
    if (signal?.aborted) break;

    const step = await processInput(state, line, deps, (domain) =>
      reporter.checking(domain),
    );

    if (step.type === 'quit') break;
    if (step.type === 'empty') reporter.empty();
    if (step.type === 'invalid') reporter.invalid(step.domain, step.error);
    if (step.type === 'checked') reporter.verdict(step.domain, step.verdict);

    if (signal?.aborted) break;
    reporter.prompt();
  }

  if (signal?.aborted) {
    reporter.interrupted();
  }

  const summary = summarize(state);
  logger.info('Session finished', {
    checked: summary.checked,
    available: summary.availableCount,
  });
  reporter.summary(summary);
  return summary;
}
