/**
 * Native toolbox HTTP transport
 *
 * Plain REST calls, no session:
 *   GET  /api/tool/{name}
 *   GET  /api/toolset/{name}
 *   POST /api/tool/{name}/invoke
 */

import { BaseTransport, normalizeBaseUrl } from './base.js';
import type { TransportConfig } from './base.js';
import { FetchSession } from '../http.js';
import type { HttpSession } from '../http.js';
import { parseManifest } from '../schema.js';
import { ProtocolError, ToolInvocationError, ToolNotFoundError, TransportError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { Headers, ToolCatalog } from '../types.js';

export class ToolboxHttpTransport extends BaseTransport {
  private readonly url: string;
  private readonly session: HttpSession;
  private readonly manageSession: boolean;
  private readonly logger: Logger;
  private closed = false;

  constructor(config: TransportConfig) {
    super();
    this.url = normalizeBaseUrl(config.baseUrl);
    this.manageSession = config.session === undefined;
    this.session = config.session ?? new FetchSession({ timeoutMs: config.timeoutMs, fetch: config.fetch });
    this.logger = config.logger ?? createLogger('toolbox-http');
  }

  get baseUrl(): string {
    return this.url;
  }

  private async getJson(url: string, headers?: Headers): Promise<unknown> {
    this.logger.debug(`GET ${url}`);
    const response = await this.session.request(url, { method: 'GET', headers: { ...headers } });
    const body = await response.text();

    if (!response.ok) {
      throw TransportError.fromResponse(response.status, response.statusText, body);
    }

    return parseJson(body, url);
  }

  async getTool(toolName: string, headers?: Headers): Promise<ToolCatalog> {
    const url = `${this.url}/api/tool/${encodeURIComponent(toolName)}`;
    const catalog = parseManifest(await this.getJson(url, headers));

    const tool = Object.hasOwn(catalog.tools, toolName) ? catalog.tools[toolName] : undefined;
    if (!tool) {
      throw new ToolNotFoundError(toolName, `Tool '${toolName}' not found in the manifest received from ${url}`);
    }

    return { serverVersion: catalog.serverVersion, tools: { [toolName]: tool } };
  }

  async listTools(toolsetName?: string, headers?: Headers): Promise<ToolCatalog> {
    const url = `${this.url}/api/toolset/${encodeURIComponent(toolsetName ?? '')}`;
    return parseManifest(await this.getJson(url, headers));
  }

  async invokeTool(toolName: string, args: Record<string, unknown>, headers?: Headers): Promise<string> {
    const url = `${this.url}/api/tool/${encodeURIComponent(toolName)}/invoke`;
    this.logger.debug(`POST ${url}`);

    const response = await this.session.request(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(args)
    });
    const text = await response.text();

    if (!response.ok) {
      throw TransportError.fromResponse(response.status, response.statusText, text);
    }

    const body = parseJson(text, url);
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return typeof body === 'string' ? body : JSON.stringify(body);
    }

    if ('error' in body && body.error !== undefined && body.error !== null) {
      const detail = typeof body.error === 'string' ? body.error : JSON.stringify(body.error);
      throw new ToolInvocationError(toolName, detail);
    }

    const result = 'result' in body ? body.result : body;
    return typeof result === 'string' ? result : JSON.stringify(result ?? null);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.manageSession && !this.session.closed) {
      await this.session.close();
    }
  }
}

function parseJson(text: string, url: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`Failed to parse JSON response from ${url}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
