/**
 * Structured errors
 *
 * Every failure of the client carries an ErrorType plus the context needed to
 * report it. Nothing here is retried; callers decide what to do.
 */

import { McpError } from '@modelcontextprotocol/sdk/types.js';

/**
 * Error type enum
 */
export enum ErrorType {
  /** Non-2xx HTTP status, connection failure, deadline */
  Transport = 'transport',
  /** Handshake or wire format problem */
  Protocol = 'protocol',
  /** Tool ran and reported a failure */
  Invocation = 'invocation',
  NotFound = 'not_found',
  /** Bad local input, caught before any network access */
  Validation = 'validation',
  /** A required auth service has no token getter yet */
  AuthRequired = 'auth_required'
}

/**
 * JSON-RPC code a server answers with when it cannot speak the requested
 * protocol revision
 */
export const VERSION_MISMATCH_CODE = -32000;

/**
 * Base error class
 */
export class ToolboxError extends Error {
  constructor(
    public readonly type: ErrorType,
    public readonly context: Record<string, unknown>,
    message?: string
  ) {
    super(message || `Toolbox error: ${type}`);
    this.name = 'ToolboxError';
    Error.captureStackTrace(this, this.constructor);
  }

  format(): string {
    switch (this.type) {
      case ErrorType.Transport:
        return `Request failed: ${this.message}`;

      case ErrorType.NotFound:
        return `Tool not found: ${String(this.context.tool)}`;

      case ErrorType.AuthRequired: {
        const services = Array.isArray(this.context.services) ? this.context.services.join(', ') : 'none';
        return `${this.message}\nRegister a token getter for one of: ${services}`;
      }

      default:
        return this.message;
    }
  }
}

/**
 * HTTP-level failure
 */
export class TransportError extends ToolboxError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly statusText?: string,
    public readonly body?: string
  ) {
    super(ErrorType.Transport, { status, statusText, body }, message);
    this.name = 'TransportError';
  }

  static fromResponse(status: number, statusText: string, body: string): TransportError {
    return new TransportError(
      `API request failed with status ${status} (${statusText}). Server response: ${body}`,
      status,
      statusText,
      body
    );
  }
}

/**
 * Handshake or framing failure
 */
export class ProtocolError extends ToolboxError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(ErrorType.Protocol, context, message);
    this.name = 'ProtocolError';
  }
}

/**
 * Tool reported an error in an otherwise successful response
 */
export class ToolInvocationError extends ToolboxError {
  constructor(tool: string, detail: string) {
    super(ErrorType.Invocation, { tool, detail }, detail);
    this.name = 'ToolInvocationError';
  }
}

export class ToolNotFoundError extends ToolboxError {
  constructor(tool: string, detail?: string) {
    super(ErrorType.NotFound, { tool }, detail ?? `Tool '${tool}' not found.`);
    this.name = 'ToolNotFoundError';
  }
}

export class ValidationError extends ToolboxError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(ErrorType.Validation, { reason, ...context }, reason);
    this.name = 'ValidationError';
  }
}

export class AuthRequiredError extends ToolboxError {
  constructor(services: string[]) {
    super(
      ErrorType.AuthRequired,
      { services },
      `One or more of the following authn services are required to invoke this tool: ${services.join(',')}`
    );
    this.name = 'AuthRequiredError';
  }
}

/**
 * JSON-RPC `error` object returned by an MCP server
 */
export class RpcError extends McpError {
  readonly versionMismatch: boolean;
  readonly detail: string;

  constructor(code: number, detail: string, data?: unknown) {
    const versionMismatch = code === VERSION_MISMATCH_CODE;
    super(
      code,
      versionMismatch
        ? `protocol version mismatch (code ${code}): ${detail}`
        : `request failed with code ${code}: ${detail}`,
      data
    );
    this.name = 'RpcError';
    this.versionMismatch = versionMismatch;
    this.detail = detail;
  }
}

// ========== Serialization (sync bridge) ==========

/**
 * Plain-data form of an error, safe to post between threads
 */
export type SerializedError =
  | { kind: 'toolbox'; name: string; type: ErrorType; message: string; context: Record<string, unknown> }
  | { kind: 'rpc'; code: number; detail: string }
  | { kind: 'error'; name: string; message: string };

export function serializeError(error: unknown): SerializedError {
  if (error instanceof RpcError) {
    return { kind: 'rpc', code: error.code, detail: error.detail };
  }
  if (error instanceof ToolboxError) {
    return {
      kind: 'toolbox',
      name: error.name,
      type: error.type,
      message: error.message,
      context: toCloneable(error.context)
    };
  }
  if (error instanceof Error) {
    return { kind: 'error', name: error.name, message: error.message };
  }
  return { kind: 'error', name: 'Error', message: String(error) };
}

export function deserializeError(data: SerializedError): Error {
  switch (data.kind) {
    case 'rpc':
      return new RpcError(data.code, data.detail);

    case 'toolbox':
      return rebuildToolboxError(data.name, data.type, data.message, data.context);

    default: {
      const error = new Error(data.message);
      error.name = data.name;
      return error;
    }
  }
}

function rebuildToolboxError(
  name: string,
  type: ErrorType,
  message: string,
  context: Record<string, unknown>
): ToolboxError {
  switch (name) {
    case 'TransportError':
      return new TransportError(
        message,
        typeof context.status === 'number' ? context.status : undefined,
        typeof context.statusText === 'string' ? context.statusText : undefined,
        typeof context.body === 'string' ? context.body : undefined
      );
    case 'ProtocolError':
      return new ProtocolError(message, context);
    case 'ToolInvocationError':
      return new ToolInvocationError(String(context.tool), message);
    case 'ToolNotFoundError':
      return new ToolNotFoundError(String(context.tool), message);
    case 'ValidationError':
      return new ValidationError(message, context);
    case 'AuthRequiredError':
      return new AuthRequiredError(
        Array.isArray(context.services) ? context.services.map(String) : []
      );
    default:
      return new ToolboxError(type, context, message);
  }
}

function toCloneable(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (typeof value !== 'function' && typeof value !== 'symbol') {
      result[key] = value;
    }
  }
  return result;
}
