/**
 * Client configuration
 *
 * Explicit options win over environment variables, which win over defaults:
 * - TOOLBOX_PROTOCOL            - protocol (toolbox, 2024-11-05, 2025-03-26, 2025-06-18)
 * - TOOLBOX_REQUEST_TIMEOUT_MS  - per-request deadline in milliseconds
 */

import { LATEST_MCP_PROTOCOL, Protocol } from './types.js';
import { ValidationError } from './errors.js';

export const DEFAULT_TIMEOUT_MS = 30000;

export const CLIENT_NAME = 'mcp-toolbox-client';
export const CLIENT_VERSION = '0.3.0';

export interface ClientConfigOptions {
  protocol?: Protocol | string;
  timeoutMs?: number;
}

export interface ResolvedClientConfig {
  protocol: Protocol;
  timeoutMs: number;
}

const PROTOCOLS: readonly Protocol[] = Object.values(Protocol);

/**
 * Parse a protocol name, accepting `mcp` as the newest MCP revision
 */
export function parseProtocol(value: string): Protocol {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'mcp') {
    return LATEST_MCP_PROTOCOL;
  }
  const match = PROTOCOLS.find((protocol) => protocol === normalized);
  if (!match) {
    throw new ValidationError(
      `Unsupported protocol: ${value}. Supported protocols: mcp, ${PROTOCOLS.join(', ')}`,
      { protocol: value }
    );
  }
  return match;
}

function parseTimeout(value: string, source: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ValidationError(`${source} must be a positive integer, got '${value}'`);
  }
  return timeout;
}

export function resolveClientConfig(
  options: ClientConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedClientConfig {
  let protocol: Protocol = LATEST_MCP_PROTOCOL;
  if (options.protocol !== undefined) {
    protocol = parseProtocol(options.protocol);
  } else if (env.TOOLBOX_PROTOCOL) {
    protocol = parseProtocol(env.TOOLBOX_PROTOCOL);
  }

  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (options.timeoutMs !== undefined) {
    timeoutMs = parseTimeout(String(options.timeoutMs), 'timeoutMs');
  } else if (env.TOOLBOX_REQUEST_TIMEOUT_MS) {
    timeoutMs = parseTimeout(env.TOOLBOX_REQUEST_TIMEOUT_MS, 'TOOLBOX_REQUEST_TIMEOUT_MS');
  }

  return { protocol, timeoutMs };
}
