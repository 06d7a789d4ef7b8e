/**
 * Tool schema conversion
 *
 * Turns what a server advertises (a native toolbox manifest or an MCP
 * `inputSchema`) into ParameterDescriptor/ToolDescriptor, and builds the zod
 * schema that checks call arguments before anything goes on the wire.
 */

import { z } from 'zod';

import { ProtocolError, ValidationError } from './errors.js';
import { PARAMETER_TYPES } from './types.js';
import type {
  MCPTool,
  ParameterDescriptor,
  ParameterType,
  ToolCatalog,
  ToolDescriptor
} from './types.js';

// ========== Native manifest ==========

function knownType(value: string): ParameterType | undefined {
  const type = value === 'float' ? 'number' : value;
  return PARAMETER_TYPES.find((candidate) => candidate === type);
}

interface RawParameter {
  name?: string;
  type: string;
  description?: string | null;
  required?: boolean | null;
  authSources?: string[] | null;
  items?: unknown;
  additionalProperties?: unknown;
  valueType?: string | null;
}

// items and additionalProperties stay loose here; fromRawParameter degrades them
const RawParameterSchema: z.ZodType<RawParameter> = z.object({
  name: z.string().optional(),
  type: z.string(),
  description: z.string().nullish(),
  required: z.boolean().nullish(),
  authSources: z.array(z.string()).nullish(),
  items: z.unknown().nullish(),
  additionalProperties: z.unknown().nullish(),
  valueType: z.string().nullish()
});

const ManifestSchema = z.object({
  serverVersion: z.string(),
  tools: z.record(
    z.object({
      description: z.string().nullish(),
      parameters: z.array(RawParameterSchema).nullish(),
      authRequired: z.array(z.string()).nullish()
    })
  )
});

function manifestType(raw: string, owner: string): ParameterType {
  const type = knownType(raw);
  if (!type) {
    throw new ProtocolError(`Unsupported schema type '${raw}' for parameter '${owner}'`, { type: raw });
  }
  return type;
}

// A nested schema with a known type, or null when it should degrade
function nestedParameter(node: unknown): ParameterDescriptor | null {
  const parsed = RawParameterSchema.safeParse(node);
  if (!parsed.success || !knownType(parsed.data.type)) {
    return null;
  }
  return fromRawParameter(parsed.data, '');
}

function fromRawParameter(raw: RawParameter, fallbackName: string): ParameterDescriptor {
  const name = raw.name ?? fallbackName;
  const param: ParameterDescriptor = {
    name,
    type: manifestType(raw.type, name),
    description: raw.description ?? '',
    required: raw.required ?? true
  };

  if (param.type === 'array' && raw.items !== undefined && raw.items !== null) {
    // tuple form or anything unreadable stays an untyped array
    const items = nestedParameter(raw.items);
    if (items) {
      param.items = items;
    }
  }

  if (param.type === 'object') {
    const additional = raw.additionalProperties;
    const valueType = raw.valueType ? knownType(raw.valueType) : undefined;
    if (typeof additional === 'boolean') {
      param.additionalProperties = additional;
    } else if (additional !== undefined && additional !== null) {
      param.additionalProperties = nestedParameter(additional) ?? true;
    } else if (valueType) {
      param.additionalProperties = { name: '', type: valueType, description: '', required: true };
    }
  }

  if (raw.authSources && raw.authSources.length > 0) {
    param.authSources = [...raw.authSources];
  }

  return param;
}

/**
 * Validate and convert a native toolbox manifest
 */
export function parseManifest(json: unknown): ToolCatalog {
  const parsed = ManifestSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new ProtocolError(`Malformed tool manifest${where}: ${issue?.message ?? 'invalid'}`);
  }

  const tools: Record<string, ToolDescriptor> = {};
  for (const [name, tool] of Object.entries(parsed.data.tools)) {
    tools[name] = {
      description: tool.description ?? '',
      parameters: (tool.parameters ?? []).map((param) => fromRawParameter(param, '')),
      authRequired: tool.authRequired ?? []
    };
  }

  return { serverVersion: parsed.data.serverVersion, tools };
}

// ========== MCP inputSchema ==========

const AUTH_PARAM_KEYS = ['toolbox/authParam', 'toolbox/authParams'];
const AUTH_INVOKE_KEY = 'toolbox/authInvoke';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

// JSON Schema allows `type: ["integer", "null"]`; the first usable member wins
function schemaType(value: unknown): ParameterType {
  if (typeof value === 'string') {
    return knownType(value) ?? 'string';
  }
  for (const member of stringList(value)) {
    const type = knownType(member);
    if (type) {
      return type;
    }
  }
  return 'string';
}

function convertNode(name: string, node: unknown, required: boolean): ParameterDescriptor {
  if (!isRecord(node)) {
    return { name, type: 'string', description: '', required };
  }

  const param: ParameterDescriptor = {
    name,
    type: schemaType(node.type),
    description: typeof node.description === 'string' ? node.description : '',
    required
  };

  if (param.type === 'array' && isRecord(node.items)) {
    // tuple form (a list) stays an untyped array
    param.items = convertNode('', node.items, true);
  }

  if (param.type === 'object') {
    const additional = node.additionalProperties;
    if (additional === false) {
      param.additionalProperties = false;
    } else if (isRecord(additional) && additional.type !== undefined) {
      param.additionalProperties = convertNode('', additional, true);
    } else {
      param.additionalProperties = true;
    }
  }

  return param;
}

function authParams(meta: Record<string, unknown>): Map<string, string[]> {
  const result = new Map<string, string[]>();
  for (const key of AUTH_PARAM_KEYS) {
    const entry = meta[key];
    if (!isRecord(entry)) {
      continue;
    }
    for (const [param, services] of Object.entries(entry)) {
      const list = stringList(services);
      if (list.length > 0 && !result.has(param)) {
        result.set(param, list);
      }
    }
  }
  return result;
}

/**
 * Convert one entry of an MCP tools/list result
 *
 * Never throws: anything malformed degrades to the loosest reading
 * (string parameter, untyped array, unconstrained map, no auth).
 */
export function convertMcpTool(tool: MCPTool): ToolDescriptor {
  const meta = isRecord(tool._meta) ? tool._meta : {};
  const paramAuth = authParams(meta);

  const inputSchema = isRecord(tool.inputSchema) ? tool.inputSchema : {};
  const properties = isRecord(inputSchema.properties) ? inputSchema.properties : {};
  const required = new Set(stringList(inputSchema.required));

  const parameters = Object.entries(properties).map(([name, node]) => {
    const param = convertNode(name, node, required.has(name));
    const sources = paramAuth.get(name);
    if (sources) {
      param.authSources = sources;
    }
    return param;
  });

  return {
    description: typeof tool.description === 'string' ? tool.description : '',
    parameters,
    authRequired: stringList(meta[AUTH_INVOKE_KEY])
  };
}

// ========== Argument validation ==========

function baseSchema(param: ParameterDescriptor): z.ZodTypeAny {
  switch (param.type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(param.items ? valueSchema(param.items) : z.unknown());
    case 'object': {
      const additional = param.additionalProperties;
      if (additional === false) {
        return z.object({}).strict();
      }
      if (additional === undefined || additional === true) {
        return z.record(z.unknown());
      }
      return z.record(valueSchema(additional));
    }
  }
}

function valueSchema(param: ParameterDescriptor): z.ZodTypeAny {
  const schema = baseSchema(param);
  return param.required ? schema : schema.nullable().optional();
}

/**
 * zod schema for the arguments of a tool
 */
export function buildArgumentSchema(params: readonly ParameterDescriptor[]): z.ZodObject<z.ZodRawShape> {
  const shape: z.ZodRawShape = {};
  for (const param of params) {
    shape[param.name] = valueSchema(param).describe(param.description);
  }
  return z.object(shape);
}

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return `Invalid type for argument '${path}': expected ${issue.expected}, received ${issue.received}`;
  }
  return `Invalid value for argument '${path}': ${issue.message}`;
}

/**
 * Check arguments against a schema built by buildArgumentSchema
 */
export function validateArguments(
  toolName: string,
  schema: z.ZodObject<z.ZodRawShape>,
  args: Record<string, unknown>
): void {
  const result = schema.safeParse(args);
  if (!result.success) {
    const details = result.error.issues.map(describeIssue);
    throw new ValidationError(details.join('; '), { tool: toolName, issues: details });
  }
}

/**
 * Human-readable summary of a tool and its arguments
 */
export function describeTool(description: string, params: readonly ParameterDescriptor[]): string {
  if (params.length === 0) {
    return description;
  }
  const lines = params.map((param) => `    ${param.name} (${typeLabel(param)}): ${param.description}`);
  return `${description}\n\nArgs:\n${lines.join('\n')}`;
}

/**
 * `array<string>`, `object<string, integer>` or the bare type
 */
export function typeLabel(param: ParameterDescriptor): string {
  if (param.type === 'array' && param.items) {
    return `array<${typeLabel(param.items)}>`;
  }
  if (param.type === 'object' && typeof param.additionalProperties === 'object') {
    return `object<string, ${typeLabel(param.additionalProperties)}>`;
  }
  return param.type;
}
