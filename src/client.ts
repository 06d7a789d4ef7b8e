/**
 * Toolbox Client - discovers remote tools and hands them out as RemoteTool proxies
 *
 * Two ways of loading:
 * 1. loadTool(name): one tool
 * 2. loadToolset(name?): every tool of a toolset (or of the server)
 *
 * Auth token getters and bound parameters given at load time are attached to
 * the tools that use them; anything that no tool uses is reported as an error
 * instead of being silently dropped.
 */

import { resolveClientConfig } from './config.js';
import type { ClientConfigOptions, ResolvedClientConfig } from './config.js';
import { ToolNotFoundError, ValidationError } from './errors.js';
import type { HttpSession } from './http.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { RemoteTool, normalizeSources, toolRequirements } from './tool.js';
import { createTransport } from './transports/index.js';
import type { BaseTransport } from './transports/index.js';
import { duplicateKeys, resolveValue } from './utils.js';
import type { ValueSource } from './utils.js';
import type { Headers, ToolDescriptor } from './types.js';

/**
 * Client options
 */
export interface ToolboxClientOptions extends ClientConfigOptions {
  /** Caller-owned HTTP session; never closed by the client */
  session?: HttpSession;
  /** Use this transport instead of creating one from `protocol` */
  transport?: BaseTransport;
  /** Headers sent with every request: strings or (async) getters */
  clientHeaders?: Readonly<Record<string, unknown>>;
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Per-load options
 */
export interface LoadToolOptions {
  /** Auth service name -> token getter (string, function or value source) */
  authTokenGetters?: Readonly<Record<string, unknown>>;
  /** Parameter name -> value, function or value source */
  boundParams?: Readonly<Record<string, unknown>>;
}

export interface LoadToolsetOptions extends LoadToolOptions {
  /**
   * true: every tool must use every getter and bound parameter given.
   * false (default): each of them must be used by at least one tool.
   */
  strict?: boolean;
}

interface ParsedTool {
  tool: RemoteTool;
  usedAuth: Set<string>;
  usedBound: Set<string>;
}

/**
 * The getters and bound parameters one tool can use
 */
export interface ToolSelection {
  authTokenGetters: Record<string, unknown>;
  boundParams: Record<string, unknown>;
  usedAuth: Set<string>;
  usedBound: Set<string>;
}

export function selectForTool(
  descriptor: ToolDescriptor,
  authTokenGetters: Readonly<Record<string, unknown>>,
  boundParams: Readonly<Record<string, unknown>>
): ToolSelection {
  const { authServices, paramNames } = toolRequirements(descriptor);
  const selection: ToolSelection = {
    authTokenGetters: {},
    boundParams: {},
    usedAuth: new Set(),
    usedBound: new Set()
  };

  for (const [service, getter] of Object.entries(authTokenGetters)) {
    if (authServices.has(service)) {
      selection.authTokenGetters[service] = getter;
      selection.usedAuth.add(service);
    }
  }
  for (const [param, value] of Object.entries(boundParams)) {
    if (paramNames.has(param)) {
      selection.boundParams[param] = value;
      selection.usedBound.add(param);
    }
  }
  return selection;
}

/**
 * Error for getters or bound parameters nothing used, or null when all were
 */
export function unusedInputsError(
  subject: string,
  given: { authTokenGetters: Readonly<Record<string, unknown>>; boundParams: Readonly<Record<string, unknown>> },
  usedAuth: ReadonlySet<string>,
  usedBound: ReadonlySet<string>,
  suffix = ''
): ValidationError | null {
  const unusedAuth = Object.keys(given.authTokenGetters).filter((service) => !usedAuth.has(service));
  const unusedBound = Object.keys(given.boundParams).filter((param) => !usedBound.has(param));
  if (unusedAuth.length === 0 && unusedBound.length === 0) {
    return null;
  }

  const parts: string[] = [];
  if (unusedAuth.length > 0) {
    parts.push(`unused auth tokens${suffix}: ${unusedAuth.join(', ')}`);
  }
  if (unusedBound.length > 0) {
    parts.push(`unused bound parameters${suffix}: ${unusedBound.join(', ')}`);
  }
  return new ValidationError(`Validation failed for ${subject}: ${parts.join('; ')}.`, { unusedAuth, unusedBound });
}

/**
 * Client headers with `headers` added; a name registered twice is an error
 */
export function mergeClientHeaders(
  existing: Readonly<Record<string, ValueSource>>,
  headers: Readonly<Record<string, unknown>>
): Record<string, ValueSource> {
  const duplicates = duplicateKeys(existing, headers);
  if (duplicates.length > 0) {
    throw new ValidationError(`Client header(s) \`${duplicates.join(', ')}\` already registered in the client.`, {
      headers: duplicates
    });
  }
  return { ...existing, ...normalizeSources(headers) };
}

/**
 * Toolbox client class
 */
export class ToolboxClient {
  private readonly transport: BaseTransport;
  private clientHeaders: Readonly<Record<string, ValueSource>>;
  private readonly logger: Logger;
  readonly config: ResolvedClientConfig;

  constructor(url: string, options: ToolboxClientOptions = {}) {
    this.config = resolveClientConfig(options);
    this.logger = options.logger ?? createLogger('toolbox-client');
    this.transport =
      options.transport ??
      createTransport(this.config.protocol, {
        baseUrl: url,
        session: options.session,
        timeoutMs: this.config.timeoutMs,
        fetch: options.fetch,
        logger: options.logger
      });
    this.clientHeaders = normalizeSources(options.clientHeaders ?? {});
  }

  private async resolveClientHeaders(): Promise<Headers> {
    const headers: Headers = {};
    for (const [name, source] of Object.entries(this.clientHeaders)) {
      const value = await resolveValue(source);
      if (typeof value !== 'string') {
        throw new ValidationError(`Client header '${name}' did not resolve to a string`);
      }
      headers[name] = value;
    }
    return headers;
  }

  private parseTool(
    name: string,
    descriptor: ToolDescriptor,
    authTokenGetters: Readonly<Record<string, unknown>>,
    boundParams: Readonly<Record<string, unknown>>
  ): ParsedTool {
    const { authTokenGetters: getters, boundParams: bound, usedAuth, usedBound } = selectForTool(
      descriptor,
      authTokenGetters,
      boundParams
    );

    const tool = new RemoteTool(this.transport, {
      name,
      descriptor,
      authTokenGetters: normalizeSources(getters),
      boundParams: normalizeSources(bound),
      clientHeaders: this.clientHeaders,
      baseUrl: this.transport.baseUrl,
      logger: this.logger
    });

    return { tool, usedAuth, usedBound };
  }

  /**
   * Load one tool
   *
   * @param name - Tool name
   * @returns Proxy for the tool
   */
  async loadTool(name: string, options: LoadToolOptions = {}): Promise<RemoteTool> {
    const authTokenGetters = options.authTokenGetters ?? {};
    const boundParams = options.boundParams ?? {};

    const catalog = await this.transport.getTool(name, await this.resolveClientHeaders());
    const descriptor = Object.hasOwn(catalog.tools, name) ? catalog.tools[name] : undefined;
    if (!descriptor) {
      throw new ToolNotFoundError(name);
    }

    const { tool, usedAuth, usedBound } = this.parseTool(name, descriptor, authTokenGetters, boundParams);
    const unused = unusedInputsError(`tool '${name}'`, { authTokenGetters, boundParams }, usedAuth, usedBound);
    if (unused) {
      throw unused;
    }

    this.logger.debug(`loaded tool ${name} (server ${catalog.serverVersion})`);
    return tool;
  }

  /**
   * Load every tool of a toolset; without a name, the server's default set
   */
  async loadToolset(name?: string, options: LoadToolsetOptions = {}): Promise<RemoteTool[]> {
    const authTokenGetters = options.authTokenGetters ?? {};
    const boundParams = options.boundParams ?? {};

    const catalog = await this.transport.listTools(name, await this.resolveClientHeaders());

    const tools: RemoteTool[] = [];
    const overallAuth = new Set<string>();
    const overallBound = new Set<string>();

    for (const [toolName, descriptor] of Object.entries(catalog.tools)) {
      const { tool, usedAuth, usedBound } = this.parseTool(toolName, descriptor, authTokenGetters, boundParams);
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

    this.logger.debug(`loaded ${tools.length} tool(s) from toolset ${name ?? 'default'}`);
    return tools;
  }

  /**
   * Register more client headers; tools loaded earlier keep the headers they
   * were loaded with
   */
  addHeaders(headers: Readonly<Record<string, unknown>>): void {
    this.clientHeaders = mergeClientHeaders(this.clientHeaders, headers);
  }

  /**
   * Close the transport; tools from this client stop working
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  // ========== Context Management ==========

  /**
   * Allows `await using client = new ToolboxClient(...)`
   */
  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }
}
