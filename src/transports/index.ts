/**
 * Transport layer module
 */

import { Protocol } from '../types.js';
import type { BaseTransport, TransportConfig } from './base.js';
import { ToolboxHttpTransport } from './toolbox-http.js';
import { McpHttpTransport, isMcpProtocol } from './mcp.js';

// Export base class
export { BaseTransport, normalizeBaseUrl } from './base.js';
export type { TransportConfig } from './base.js';

// Export implementations
export { ToolboxHttpTransport } from './toolbox-http.js';
export { McpHttpTransport, MCP_REVISIONS, decodeToolResult, isMcpProtocol } from './mcp.js';
export type { McpProtocol, McpRevision, McpTransportConfig } from './mcp.js';

/**
 * Create the transport for a protocol
 */
export function createTransport(protocol: Protocol, config: TransportConfig): BaseTransport {
  if (isMcpProtocol(protocol)) {
    return new McpHttpTransport({ ...config, protocol });
  }
  return new ToolboxHttpTransport(config);
}
