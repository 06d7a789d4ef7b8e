/**
 * Messages exchanged between the blocking caller and the bridge worker
 */

import type { SerializedError } from '../errors.js';
import type { Headers, ToolCatalog } from '../types.js';
import { Protocol } from '../types.js';

export type BridgeRequest =
  | { id: number; op: 'open'; clientId: number; url: string; protocol: Protocol; timeoutMs: number }
  | { id: number; op: 'listTools'; clientId: number; toolset?: string; headers: Headers }
  | { id: number; op: 'getTool'; clientId: number; name: string; headers: Headers }
  | { id: number; op: 'invoke'; clientId: number; name: string; args: Record<string, unknown>; headers: Headers }
  | { id: number; op: 'close'; clientId: number };

type WithoutId<T> = T extends unknown ? Omit<T, 'id'> : never;

/** Request minus the id the bridge assigns */
export type BridgeCall = WithoutId<BridgeRequest>;

export type BridgeReply =
  | { id: number; ok: true; value: unknown }
  | { id: number; ok: false; error: SerializedError };

/**
 * Id of the reply a worker sends when it could not start
 */
export const BOOT_FAILURE_ID = -1;

/**
 * Slot 0 of the shared signal: 0 while the caller waits, 1 once a reply is posted
 */
export const SIGNAL_WAITING = 0;
export const SIGNAL_REPLIED = 1;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHeaders(value: unknown): value is Headers {
  return isRecord(value) && Object.values(value).every((entry) => typeof entry === 'string');
}

const PROTOCOLS: readonly string[] = Object.values(Protocol);

function isProtocol(value: unknown): value is Protocol {
  return typeof value === 'string' && PROTOCOLS.includes(value);
}

export function isBridgeRequest(value: unknown): value is BridgeRequest {
  if (!isRecord(value) || typeof value.id !== 'number' || typeof value.clientId !== 'number') {
    return false;
  }
  switch (value.op) {
    case 'open':
      return typeof value.url === 'string' && isProtocol(value.protocol) && typeof value.timeoutMs === 'number';
    case 'listTools':
      return (value.toolset === undefined || typeof value.toolset === 'string') && isHeaders(value.headers);
    case 'getTool':
      return typeof value.name === 'string' && isHeaders(value.headers);
    case 'invoke':
      return typeof value.name === 'string' && isRecord(value.args) && isHeaders(value.headers);
    case 'close':
      return true;
    default:
      return false;
  }
}

export function isBridgeReply(value: unknown): value is BridgeReply {
  if (!isRecord(value) || typeof value.id !== 'number') {
    return false;
  }
  return value.ok === true ? 'value' in value : value.ok === false && isRecord(value.error);
}

/**
 * Shallow check of a catalog crossing the thread boundary
 */
export function isToolCatalog(value: unknown): value is ToolCatalog {
  return isRecord(value) && typeof value.serverVersion === 'string' && isRecord(value.tools);
}
