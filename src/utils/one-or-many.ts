/**
 * Helpers for WHOIS fields that come back once or repeated.
 */

import type { OneOrMany } from '../types.js';

export function single<T>(value: T): OneOrMany<T> {
  return { kind: 'single', value };
}

export function multiple<T>(values: readonly T[]): OneOrMany<T> {
  return { kind: 'multiple', values };
}

/**
 * Wrap collected values: nothing for none, single for one, multiple otherwise.
 */
export function fromValues<T>(values: readonly T[]): OneOrMany<T> | undefined {
  if (values.length === 0) return undefined;
  if (values.length === 1) return single(values[0]);
  return multiple(values);
}

/**
 * The first (or only) value.
 */
export function firstOf<T>(field: OneOrMany<T> | undefined): T | undefined {
  if (!field) return undefined;
  return field.kind === 'single' ? field.value : field.values[0];
}

export function countOf<T>(field: OneOrMany<T> | undefined): number {
  if (!field) return 0;
  return field.kind === 'single' ? 1 : field.values.length;
}
