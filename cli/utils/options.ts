/**
 * Command-line option parsing shared by the commands
 */

import { ToolboxClient } from '../../src/client.js';
import type { ToolboxClientOptions } from '../../src/client.js';
import { InvalidOptionError, InvalidParamsError } from '../errors.js';

/**
 * Options every command accepts
 */
export interface ConnectionOptions {
  protocol?: string;
  header: string[];
  timeout?: string;
  json?: boolean;
}

export type ClientFactory = (url: string, options: ToolboxClientOptions) => ToolboxClient;

export const defaultClientFactory: ClientFactory = (url, options) => new ToolboxClient(url, options);

/**
 * Commander reducer for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse `name=value` entries; the value may itself contain `=`
 */
export function parseKeyValues(entries: readonly string[], option: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of entries) {
    const index = entry.indexOf('=');
    if (index <= 0) {
      throw new InvalidOptionError(option, entry, '<name>=<value>');
    }
    result[entry.slice(0, index)] = entry.slice(index + 1);
  }
  return result;
}

export function parseParams(text: string | undefined): Record<string, unknown> {
  if (text === undefined) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new InvalidParamsError('--params must be valid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidParamsError('--params must be a JSON object');
  }
  return { ...parsed };
}

function parseTimeoutOption(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidOptionError('--timeout', value, 'a positive number of milliseconds');
  }
  return timeout;
}

export function openClient(
  url: string,
  options: ConnectionOptions,
  factory: ClientFactory = defaultClientFactory
): ToolboxClient {
  return factory(url, {
    protocol: options.protocol,
    timeoutMs: parseTimeoutOption(options.timeout),
    clientHeaders: parseKeyValues(options.header, '--header')
  });
}
