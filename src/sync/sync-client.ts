/**
 * Synchronous Toolbox client
 *
 * Same loading rules as ToolboxClient, but every call blocks until the
 * background bridge worker answers. Header, token and bound-parameter
 * providers must return their value synchronously.
 */

import { resolveClientConfig } from '../config.js';
import type { ClientConfigOptions, ResolvedClientConfig } from '../config.js';
import { ProtocolError, ToolNotFoundError, ValidationError } from '../errors.js';
import { mergeClientHeaders, selectForTool, unusedInputsError } from '../client.js';
import type { LoadToolOptions, LoadToolsetOptions } from '../client.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { normalizeSources } from '../tool.js';
import { resolveValueSync } from '../utils.js';
import type { ValueSource } from '../utils.js';
import type { Headers, ToolCatalog, ToolDescriptor } from '../types.js';
import { getSyncBridge } from './bridge.js';
import type { SyncBridge } from './bridge.js';
import { isToolCatalog } from './messages.js';
import { SyncRemoteTool } from './sync-tool.js';
import type { SyncToolContext } from './sync-tool.js';

export interface ToolboxSyncClientOptions extends ClientConfigOptions {
  clientHeaders?: Readonly<Record<string, unknown>>;
  logger?: Logger;
}

/**
 * A handshake, its notification and the request itself may each use the
 * full per-request deadline
 */
function blockingBudget(timeoutMs: number): number {
  return timeoutMs * 3 + 1000;
}

export class ToolboxSyncClient {
  private readonly bridge: SyncBridge;
  private readonly clientId: number;
  private readonly baseUrl: string;
  private clientHeaders: Readonly<Record<string, ValueSource>>;
  private readonly logger: Logger;
  private readonly context: SyncToolContext;
  private closed = false;
  readonly config: ResolvedClientConfig;

  constructor(url: string, options: ToolboxSyncClientOptions = {}) {
    this.config = resolveClientConfig(options);
    this.logger = options.logger ?? createLogger('toolbox-sync-client');
    this.baseUrl = url;
    this.clientHeaders = normalizeSources(options.clientHeaders ?? {});

    this.bridge = getSyncBridge();
    this.clientId = this.bridge.allocateClientId();
    this.context = { bridge: this.bridge, clientId: this.clientId, waitMs: blockingBudget(this.config.timeoutMs) };
    this.bridge.call(
      { op: 'open', clientId: this.clientId, url, protocol: this.config.protocol, timeoutMs: this.config.timeoutMs },
      this.context.waitMs
    );
  }

  private resolveClientHeaders(): Headers {
    const headers: Headers = {};
    for (const [name, source] of Object.entries(this.clientHeaders)) {
      const value = resolveValueSync(source, name);
      if (typeof value !== 'string') {
        throw new ValidationError(`Client header '${name}' did not resolve to a string`);
      }
      headers[name] = value;
    }
    return headers;
  }

  private catalog(value: unknown): ToolCatalog {
    if (!isToolCatalog(value)) {
      throw new ProtocolError('Bridge worker returned a malformed tool catalog');
    }
    return value;
  }

  private createTool(
    name: string,
    descriptor: ToolDescriptor,
    authTokenGetters: Readonly<Record<string, unknown>>,
    boundParams: Readonly<Record<string, unknown>>
  ): { tool: SyncRemoteTool; usedAuth: Set<string>; usedBound: Set<string> } {
    const selection = selectForTool(descriptor, authTokenGetters, boundParams);
    const tool = new SyncRemoteTool(this.context, {
      name,
      descriptor,
      authTokenGetters: normalizeSources(selection.authTokenGetters),
      boundParams: normalizeSources(selection.boundParams),
      clientHeaders: this.clientHeaders,
      baseUrl: this.baseUrl,
      logger: this.logger
    });
    return { tool, usedAuth: selection.usedAuth, usedBound: selection.usedBound };
  }

  loadTool(name: string, options: LoadToolOptions = {}): SyncRemoteTool {
    const authTokenGetters = options.authTokenGetters ?? {};
    const boundParams = options.boundParams ?? {};

    const catalog = this.catalog(
      this.bridge.call(
        { op: 'getTool', clientId: this.clientId, name, headers: this.resolveClientHeaders() },
        this.context.waitMs
      )
    );
    const descriptor = Object.hasOwn(catalog.tools, name) ? catalog.tools[name] : undefined;
    if (!descriptor) {
      throw new ToolNotFoundError(name);
    }

    const { tool, usedAuth, usedBound } = this.createTool(name, descriptor, authTokenGetters, boundParams);
    const unused = unusedInputsError(`tool '${name}'`, { authTokenGetters, boundParams }, usedAuth, usedBound);
    if (unused) {
      throw unused;
    }
    return tool;
  }

  loadToolset(name?: string, options: LoadToolsetOptions = {}): SyncRemoteTool[] {
    const authTokenGetters = options.authTokenGetters ?? {};
    const boundParams = options.boundParams ?? {};

    const catalog = this.catalog(
      this.bridge.call(
        { op: 'listTools', clientId: this.clientId, toolset: name, headers: this.resolveClientHeaders() },
        this.context.waitMs
      )
    );

    const tools: SyncRemoteTool[] = [];
    const overallAuth = new Set<string>();
    const overallBound = new Set<string>();
    for (const [toolName, descriptor] of Object.entries(catalog.tools)) {
      const { tool, usedAuth, usedBound } = this.createTool(toolName, descriptor, authTokenGetters, boundParams);
      tools.push(tool);
      if (options.strict) {
        const unused = unusedInputsError(`tool '${toolName}'`, { authTokenGetters, boundParams }, usedAuth, usedBound);
        if (unused) {
          throw unused;
        }
      } else {
        usedAuth.forEach((service) => overallAuth.add(service));
        usedBound.forEach((param) => overallBound.add(param));
      }
    }

    if (!options.strict) {
      const unused = unusedInputsError(
        `toolset '${name ?? 'default'}'`,
        { authTokenGetters, boundParams },
        overallAuth,
        overallBound,
        ' could not be applied to any tool'
      );
      if (unused) {
        throw unused;
      }
    }
    return tools;
  }

  addHeaders(headers: Readonly<Record<string, unknown>>): void {
    this.clientHeaders = mergeClientHeaders(this.clientHeaders, headers);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.bridge.call({ op: 'close', clientId: this.clientId }, this.context.waitMs);
  }

  [Symbol.dispose](): void {
    this.close();
  }
}
