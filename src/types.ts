/**
 * Toolbox client type definitions
 *
 * Language-neutral description of a remote tool's inputs, the catalog a
 * discovery call returns, and the wire shapes both protocols exchange.
 */

/**
 * Wire protocol spoken with the tool server
 */
export enum Protocol {
  /** Native toolbox HTTP API (`/api/tool/...`) */
  TOOLBOX = 'toolbox',
  MCP_v20241105 = '2024-11-05',
  MCP_v20250326 = '2025-03-26',
  MCP_v20250618 = '2025-06-18'
}

/**
 * Newest supported MCP revision, used when no protocol is given
 */
export const LATEST_MCP_PROTOCOL = Protocol.MCP_v20250618;

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

export const PARAMETER_TYPES: readonly ParameterType[] = [
  'string',
  'integer',
  'number',
  'boolean',
  'array',
  'object'
];

/**
 * One input of a tool
 *
 * `items` describes array elements, `additionalProperties` the value type of
 * an object used as a map (`true` means unconstrained, `false` means no keys
 * are allowed). `authSources` marks a parameter the server fills from an
 * auth token; exactly one listed service must supply that token at call time.
 */
export interface ParameterDescriptor {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  items?: ParameterDescriptor;
  additionalProperties?: boolean | ParameterDescriptor;
  authSources?: string[];
}

/**
 * A tool as advertised by the server
 */
export interface ToolDescriptor {
  description: string;
  /** In declaration order */
  parameters: ParameterDescriptor[];
  /** Services any one of which authorizes invoking the tool at all */
  authRequired: string[];
}

/**
 * Result of a discovery call
 */
export interface ToolCatalog {
  serverVersion: string;
  tools: Record<string, ToolDescriptor>;
}

/**
 * JSON-RPC request
 */
export interface JSONRPCRequest {
  jsonrpc: '2.0';
  id: number | string;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * JSON-RPC notification (no id, no response)
 */
export interface JSONRPCNotification {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
}

/**
 * MCP initialize request params
 */
export interface MCPInitializeParams {
  processId: number;
  clientInfo: {
    name: string;
    version: string;
  };
  capabilities: Record<string, unknown>;
  protocolVersion: string;
}

/**
 * Negotiated MCP session state
 */
export interface MCPSession {
  protocolVersion: string;
  serverVersion: string;
  sessionId?: string;
  serverCapabilities: Record<string, unknown>;
}

/**
 * MCP tool as returned by tools/list
 */
export interface MCPTool {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
  _meta?: Record<string, unknown>;
}

/**
 * Headers sent with a single request
 */
export type Headers = Record<string, string>;
