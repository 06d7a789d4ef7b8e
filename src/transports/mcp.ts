/**
 * MCP transport over HTTP (JSON-RPC 2.0)
 *
 * One class serves every supported revision; what differs between revisions
 * is data in MCP_REVISIONS, not subclass overrides:
 * - 2024-11-05: baseline
 * - 2025-03-26: server hands out a session id in the initialize result, the
 *   client repeats it inside the params of every later message
 * - 2025-06-18: every request carries an MCP-Protocol-Version header
 *
 * The handshake runs lazily on first use and only once, however many calls
 * arrive while it is in flight.
 */

import { randomUUID } from 'node:crypto';

import { BaseTransport, normalizeBaseUrl } from './base.js';
import type { TransportConfig } from './base.js';
import { FetchSession } from '../http.js';
import type { HttpSession } from '../http.js';
import { convertMcpTool } from '../schema.js';
import { ProtocolError, RpcError, ToolNotFoundError, TransportError } from '../errors.js';
import { CLIENT_NAME, CLIENT_VERSION } from '../config.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { LATEST_MCP_PROTOCOL, Protocol } from '../types.js';
import type {
  Headers,
  JSONRPCNotification,
  JSONRPCRequest,
  MCPInitializeParams,
  MCPSession,
  MCPTool,
  ToolCatalog,
  ToolDescriptor
} from '../types.js';

export type McpProtocol = Protocol.MCP_v20241105 | Protocol.MCP_v20250326 | Protocol.MCP_v20250618;

/**
 * Wire differences of one MCP revision
 */
export interface McpRevision {
  version: McpProtocol;
  /** Initialize-result field holding the session id, echoed in later params */
  sessionIdField?: string;
  /** Header repeating the protocol version on every request */
  versionHeader?: string;
}

export const MCP_REVISIONS: Readonly<Record<McpProtocol, McpRevision>> = {
  [Protocol.MCP_v20241105]: { version: Protocol.MCP_v20241105 },
  [Protocol.MCP_v20250326]: { version: Protocol.MCP_v20250326, sessionIdField: 'Mcp-Session-Id' },
  [Protocol.MCP_v20250618]: { version: Protocol.MCP_v20250618, versionHeader: 'MCP-Protocol-Version' }
};

export function isMcpProtocol(protocol: Protocol): protocol is McpProtocol {
  return protocol !== Protocol.TOOLBOX;
}

/**
 * MCP transport configuration
 */
export interface McpTransportConfig extends TransportConfig {
  protocol?: McpProtocol;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonObjectText(text: string): boolean {
  try {
    return isRecord(JSON.parse(text));
  } catch {
    return false;
  }
}

/**
 * Turn a tools/call result into text
 *
 * Text blocks are concatenated, except that several blocks which each hold a
 * JSON object are joined into one JSON array. No text at all gives "null".
 */
export function decodeToolResult(result: unknown): string {
  const content = isRecord(result) && Array.isArray(result.content) ? result.content : [];

  const texts: string[] = [];
  for (const block of content) {
    if (!isRecord(block) || block.type !== 'text') {
      continue;
    }
    const text = block.text;
    if (typeof text === 'string') {
      texts.push(text);
    }
  }

  if (texts.length > 1 && texts.every(isJsonObjectText)) {
    return `[${texts.join(',')}]`;
  }
  return texts.join('') || 'null';
}

// Streamable-HTTP servers refuse requests that do not accept both
const MCP_ACCEPT = 'application/json, text/event-stream';

function isEventStream(text: string): boolean {
  return /^(event|data|id|retry):/.test(text.trimStart());
}

/**
 * Data of the last event in a text/event-stream body, which carries the
 * JSON-RPC response
 */
function lastEventData(stream: string): string {
  let last = '';
  for (const block of stream.split(/\r?\n\r?\n/)) {
    const data = block
      .split(/\r?\n/)
      .filter((line) => line.startsWith('data:'))
      .map((line) => line.slice(5).replace(/^ /, ''));
    if (data.length > 0) {
      last = data.join('\n');
    }
  }
  return last;
}

/**
 * MCP HTTP transport implementation
 */
export class McpHttpTransport extends BaseTransport {
  private readonly url: string;
  private readonly mcpUrl: string;
  private readonly revision: McpRevision;
  private readonly session: HttpSession;
  private readonly manageSession: boolean;
  private readonly logger: Logger;

  private sessionId: string | undefined;
  private negotiation: Promise<MCPSession> | null = null;
  private closed = false;
  private sessionReleased = false;

  constructor(config: McpTransportConfig) {
    super();
    this.url = normalizeBaseUrl(config.baseUrl);
    this.mcpUrl = `${this.url}/mcp/`;
    this.revision = MCP_REVISIONS[config.protocol ?? LATEST_MCP_PROTOCOL];
    this.manageSession = config.session === undefined;
    this.session = config.session ?? new FetchSession({ timeoutMs: config.timeoutMs, fetch: config.fetch });
    this.logger = config.logger ?? createLogger(`mcp ${this.revision.version}`);
  }

  get baseUrl(): string {
    return this.mcpUrl;
  }

  get protocolVersion(): McpProtocol {
    return this.revision.version;
  }

  // ========== Session ==========

  /**
   * Negotiated session; starts the handshake if nobody has yet
   */
  ensureInitialized(): Promise<MCPSession> {
    if (this.closed) {
      return Promise.reject(new TransportError('Transport is closed'));
    }
    if (!this.negotiation) {
      this.negotiation = this.initializeSession();
    }
    return this.negotiation;
  }

  private async initializeSession(): Promise<MCPSession> {
    try {
      return await this.negotiate();
    } catch (error) {
      await this.releaseSession();
      throw error;
    }
  }

  private async negotiate(): Promise<MCPSession> {
    const proposed = this.revision.version;
    const params: MCPInitializeParams = {
      processId: process.pid,
      clientInfo: { name: CLIENT_NAME, version: CLIENT_VERSION },
      capabilities: {},
      protocolVersion: proposed
    };

    this.logger.debug(`initialize ${this.mcpUrl} (protocol ${proposed})`);
    const result = await this.request(this.mcpUrl, 'initialize', { ...params });

    if (!isRecord(result)) {
      throw new ProtocolError('Initialize response did not contain a result');
    }

    const serverInfo = result.serverInfo;
    if (!isRecord(serverInfo)) {
      throw new ProtocolError('Server info not found in initialize response');
    }
    const serverVersion = serverInfo.version;
    if (typeof serverVersion !== 'string' || serverVersion === '') {
      throw new ProtocolError('Server version not found in initialize response');
    }

    const reported = result.protocolVersion;
    if (typeof reported !== 'string' || reported === '') {
      throw new ProtocolError('MCP protocol version not found in initialize response');
    }
    if (reported !== proposed) {
      throw new ProtocolError(
        `MCP version mismatch: client proposed ${proposed} but server reported ${reported}`,
        { proposed, reported }
      );
    }

    const capabilities = result.capabilities;
    if (!isRecord(capabilities) || !('tools' in capabilities)) {
      throw new ProtocolError("Server does not support the 'tools' capability.");
    }

    const field = this.revision.sessionIdField;
    if (field) {
      const sessionId = result[field];
      if (typeof sessionId !== 'string' || sessionId === '') {
        throw new ProtocolError(`Server did not return a ${field} during initialization.`);
      }
      this.sessionId = sessionId;
    }

    await this.notify(this.mcpUrl, 'notifications/initialized', {});
    this.logger.debug(`session ready (server ${serverVersion})`);

    return {
      protocolVersion: reported,
      serverVersion,
      sessionId: this.sessionId,
      serverCapabilities: capabilities
    };
  }

  private async releaseSession(): Promise<void> {
    if (!this.manageSession || this.sessionReleased) {
      return;
    }
    this.sessionReleased = true;
    await this.session.close();
  }

  // ========== JSON-RPC ==========

  private messageParams(method: string, params: Record<string, unknown>): Record<string, unknown> {
    const field = this.revision.sessionIdField;
    if (field && method !== 'initialize' && this.sessionId) {
      return { ...params, [field]: this.sessionId };
    }
    return params;
  }

  // Framing headers go last so caller headers cannot replace them
  private messageHeaders(headers?: Headers): Headers {
    const result: Headers = { ...headers, 'Content-Type': 'application/json', Accept: MCP_ACCEPT };
    if (this.revision.versionHeader) {
      result[this.revision.versionHeader] = this.revision.version;
    }
    return result;
  }

  private async post(
    url: string,
    message: JSONRPCRequest | JSONRPCNotification,
    headers?: Headers
  ): Promise<unknown> {
    const response = await this.session.request(url, {
      method: 'POST',
      headers: this.messageHeaders(headers),
      body: JSON.stringify(message)
    });
    const raw = await response.text();

    if (!response.ok) {
      throw TransportError.fromResponse(response.status, response.statusText, raw);
    }
    const text = isEventStream(raw) ? lastEventData(raw) : raw;
    if (response.status === 204 || text.trim() === '') {
      return null;
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new ProtocolError(
        `Failed to parse JSON-RPC response: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!isRecord(body)) {
      throw new ProtocolError('Failed to parse JSON-RPC response: not an object');
    }

    if ('error' in body && body.error !== undefined && body.error !== null) {
      const error = body.error;
      if (isRecord(error) && typeof error.code === 'number' && typeof error.message === 'string') {
        throw new RpcError(error.code, error.message, error.data);
      }
      throw new ProtocolError(`MCP request failed: ${JSON.stringify(error)}`);
    }

    return 'result' in body ? body.result : null;
  }

  private async request(
    url: string,
    method: string,
    params: Record<string, unknown>,
    headers?: Headers
  ): Promise<unknown> {
    const message: JSONRPCRequest = {
      jsonrpc: '2.0',
      id: randomUUID(),
      method,
      params: this.messageParams(method, params)
    };
    const result = await this.post(url, message, headers);
    if (result === null) {
      throw new ProtocolError(`Empty response to ${method}`);
    }
    return result;
  }

  private async notify(url: string, method: string, params: Record<string, unknown>): Promise<void> {
    const message: JSONRPCNotification = {
      jsonrpc: '2.0',
      method,
      params: this.messageParams(method, params)
    };
    await this.post(url, message);
  }

  // ========== Tools ==========

  private async fetchTools(toolsetName?: string, headers?: Headers): Promise<MCPTool[]> {
    const url = toolsetName ? `${this.mcpUrl}${encodeURIComponent(toolsetName)}` : this.mcpUrl;
    const result = await this.request(url, 'tools/list', {}, headers);

    if (!isRecord(result) || !Array.isArray(result.tools)) {
      throw new ProtocolError('tools/list result did not contain a tools list');
    }

    const tools: MCPTool[] = [];
    for (const entry of result.tools) {
      if (isRecord(entry) && typeof entry.name === 'string') {
        tools.push({
          name: entry.name,
          description: typeof entry.description === 'string' ? entry.description : undefined,
          inputSchema: isRecord(entry.inputSchema) ? entry.inputSchema : undefined,
          _meta: isRecord(entry._meta) ? entry._meta : undefined
        });
      } else {
        this.logger.warn('Skipping tools/list entry without a name');
      }
    }
    return tools;
  }

  async listTools(toolsetName?: string, headers?: Headers): Promise<ToolCatalog> {
    const session = await this.ensureInitialized();
    const tools: Record<string, ToolDescriptor> = {};
    for (const tool of await this.fetchTools(toolsetName, headers)) {
      tools[tool.name] = convertMcpTool(tool);
    }
    return { serverVersion: session.serverVersion, tools };
  }

  async getTool(toolName: string, headers?: Headers): Promise<ToolCatalog> {
    const session = await this.ensureInitialized();
    const tool = (await this.fetchTools(undefined, headers)).find((candidate) => candidate.name === toolName);
    if (!tool) {
      throw new ToolNotFoundError(toolName);
    }
    return { serverVersion: session.serverVersion, tools: { [toolName]: convertMcpTool(tool) } };
  }

  async invokeTool(toolName: string, args: Record<string, unknown>, headers?: Headers): Promise<string> {
    await this.ensureInitialized();
    const result = await this.request(this.mcpUrl, 'tools/call', { name: toolName, arguments: args }, headers);
    return decodeToolResult(result);
  }

  /**
   * Close the transport; waits for an in-flight handshake first
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.negotiation) {
      try {
        await this.negotiation;
      } catch (error) {
        this.logger.debug('closing after failed handshake', error);
      }
    }
    await this.releaseSession();
  }
}
