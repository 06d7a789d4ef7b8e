/**
 * MCP Toolbox Client - load remote tools and call them like local functions
 *
 * Tools are discovered from a toolbox server over its native HTTP API or over
 * MCP (2024-11-05, 2025-03-26, 2025-06-18), validated locally before every
 * call, and can carry bound parameters and auth token getters.
 *
 * Two flavours:
 * 1. ToolboxClient / RemoteTool: promise-based
 * 2. ToolboxSyncClient / SyncRemoteTool: blocking, backed by a worker thread
 */

// Clients
export { ToolboxClient, selectForTool, unusedInputsError } from './client.js';
export type { ToolboxClientOptions, LoadToolOptions, LoadToolsetOptions, ToolSelection } from './client.js';
export { ToolboxSyncClient } from './sync/sync-client.js';
export type { ToolboxSyncClientOptions } from './sync/sync-client.js';
export { shutdownSyncBridge } from './sync/bridge.js';

// Tools
export { RemoteTool, ToolProxyBase, toolRequirements } from './tool.js';
export type { ToolProxyState } from './tool.js';
export { SyncRemoteTool } from './sync/sync-tool.js';

// Transports and HTTP
export {
  BaseTransport,
  ToolboxHttpTransport,
  McpHttpTransport,
  MCP_REVISIONS,
  createTransport,
  decodeToolResult
} from './transports/index.js';
export type { TransportConfig, McpProtocol, McpRevision, McpTransportConfig } from './transports/index.js';
export { FetchSession } from './http.js';
export type { HttpSession, HttpRequest, HttpResponse, FetchSessionConfig } from './http.js';

// Schema
export { parseManifest, convertMcpTool, buildArgumentSchema, describeTool, typeLabel } from './schema.js';

// Value sources and auth
export { staticValue, syncProvider, asyncProvider } from './utils.js';
export type { ValueSource, ValueInput, TokenGetter } from './utils.js';
export { CachedTokenGetter, bearerToken, credentialTokenGetter } from './auth.js';
export type { Credential, FetchedToken, CachedTokenGetterOptions } from './auth.js';

// Errors, config, logging
export {
  ErrorType,
  ToolboxError,
  TransportError,
  ProtocolError,
  ToolInvocationError,
  ToolNotFoundError,
  ValidationError,
  AuthRequiredError,
  RpcError
} from './errors.js';
export { resolveClientConfig, parseProtocol, DEFAULT_TIMEOUT_MS } from './config.js';
export type { ClientConfigOptions, ResolvedClientConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

export { Protocol, LATEST_MCP_PROTOCOL } from './types.js';
export type { ParameterDescriptor, ParameterType, ToolDescriptor, ToolCatalog } from './types.js';
