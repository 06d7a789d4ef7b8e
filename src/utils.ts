/**
 * Value sources and auth bookkeeping shared by the async and sync tool proxies
 */

import { ValidationError } from './errors.js';

const VALUE_SOURCE = Symbol('toolbox.valueSource');

/**
 * Where a bound parameter, header or token comes from
 */
export type ValueSource<T = unknown> =
  | { readonly [VALUE_SOURCE]: true; readonly kind: 'static'; readonly value: T }
  | { readonly [VALUE_SOURCE]: true; readonly kind: 'sync'; readonly get: () => T }
  | { readonly [VALUE_SOURCE]: true; readonly kind: 'async'; readonly get: () => Promise<T> };

/**
 * What callers may pass: an explicit source, a zero-argument function
 * (sync or async) or a plain value
 */
export type ValueInput<T = unknown> = ValueSource<T> | (() => T | Promise<T>) | T;

export type TokenGetter = ValueInput<string>;

export function staticValue<T>(value: T): ValueSource<T> {
  return { [VALUE_SOURCE]: true, kind: 'static', value };
}

export function syncProvider<T>(get: () => T): ValueSource<T> {
  return { [VALUE_SOURCE]: true, kind: 'sync', get };
}

export function asyncProvider<T>(get: () => Promise<T>): ValueSource<T> {
  return { [VALUE_SOURCE]: true, kind: 'async', get };
}

export function isValueSource(value: unknown): value is ValueSource {
  return typeof value === 'object' && value !== null && VALUE_SOURCE in value;
}

function isProvider(value: unknown): value is () => unknown {
  return typeof value === 'function';
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Normalize caller input into an explicit ValueSource
 *
 * A plain function is recorded as `sync`; if it hands back a promise the
 * async resolver awaits it and the sync resolver rejects it.
 */
export function toValueSource(input: unknown): ValueSource {
  if (isValueSource(input)) {
    return input;
  }
  if (isProvider(input)) {
    return syncProvider(input);
  }
  return staticValue(input);
}

/**
 * Resolve a source to its value, awaiting async providers
 */
export async function resolveValue(source: ValueSource): Promise<unknown> {
  switch (source.kind) {
    case 'static':
      return source.value;
    case 'sync':
      return await source.get();
    case 'async':
      return await source.get();
  }
}

/**
 * Resolve a source without yielding; async providers are an error here
 */
export function resolveValueSync(source: ValueSource, label: string): unknown {
  switch (source.kind) {
    case 'static':
      return source.value;
    case 'async':
      throw new ValidationError(`'${label}' has an asynchronous provider, which synchronous tools cannot resolve`);
    case 'sync': {
      const value = source.get();
      if (isThenable(value)) {
        throw new ValidationError(`'${label}' returned a promise, which synchronous tools cannot resolve`);
      }
      return value;
    }
  }
}

/**
 * Parameters whose auth requirement is not covered by the available services
 *
 * A parameter is covered as soon as any one of its sources has a getter.
 */
export function identifyRequiredAuthnParams(
  authnParams: Readonly<Record<string, readonly string[]>>,
  availableServices: Iterable<string>
): Record<string, string[]> {
  const available = new Set(availableServices);
  const required: Record<string, string[]> = {};
  for (const [param, services] of Object.entries(authnParams)) {
    if (!services.some((service) => available.has(service))) {
      required[param] = [...services];
    }
  }
  return required;
}

/**
 * Tool-level services still needed: empty once any listed service is available
 */
export function identifyRequiredAuthzTokens(
  authRequired: readonly string[],
  availableServices: Iterable<string>
): string[] {
  const available = new Set(availableServices);
  if (authRequired.length === 0 || authRequired.some((service) => available.has(service))) {
    return [];
  }
  return [...authRequired];
}

/**
 * Header that carries the token of an auth service
 */
export function authTokenHeader(service: string): string {
  return `${service}_token`;
}

/**
 * Keys present in both maps, sorted for stable messages
 */
export function duplicateKeys(existing: object, incoming: object): string[] {
  const current = new Set(Object.keys(existing));
  return Object.keys(incoming)
    .filter((key) => current.has(key))
    .sort();
}
