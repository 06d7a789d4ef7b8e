/**
 * Transport abstract base class
 * Every wire protocol (native toolbox HTTP, each MCP revision) implements this
 */

import type { Headers, ToolCatalog } from '../types.js';
import type { HttpSession } from '../http.js';
import type { Logger } from '../logger.js';

/**
 * Options shared by all transports
 */
export interface TransportConfig {
  /** Server root, e.g. http://127.0.0.1:5000 */
  baseUrl: string;
  /** Caller-owned session; when absent the transport creates and owns one */
  session?: HttpSession;
  /** Deadline for sessions the transport creates */
  timeoutMs?: number;
  /** fetch used by sessions the transport creates */
  fetch?: typeof fetch;
  logger?: Logger;
}

export abstract class BaseTransport {
  /**
   * URL the tools are served from
   */
  abstract get baseUrl(): string;

  /**
   * List all tools, or the tools of one toolset
   */
  abstract listTools(toolsetName?: string, headers?: Headers): Promise<ToolCatalog>;

  /**
   * Catalog holding exactly the named tool; rejects with ToolNotFoundError
   */
  abstract getTool(toolName: string, headers?: Headers): Promise<ToolCatalog>;

  /**
   * Invoke a tool and return its result text
   */
  abstract invokeTool(toolName: string, args: Record<string, unknown>, headers?: Headers): Promise<string>;

  /**
   * Release owned resources; safe to call more than once
   */
  abstract close(): Promise<void>;
}

/**
 * Strip trailing slashes so paths can be appended with a single `/`
 */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}
