import { describe, it, expect } from 'vitest';

import {
  buildArgumentSchema,
  convertMcpTool,
  describeTool,
  parseManifest,
  validateArguments
} from '../../src/schema.js';
import { ProtocolError, ValidationError } from '../../src/errors.js';
import type { ParameterDescriptor } from '../../src/types.js';

describe('parseManifest', () => {
  it('should convert parameters and apply defaults', () => {
    const catalog = parseManifest({
      serverVersion: '0.9.0',
      tools: {
        lookup: {
          description: 'Look things up',
          parameters: [
            { name: 'query', type: 'string', description: 'what to find' },
            { name: 'ratio', type: 'float', description: 'weight', required: false },
            { name: 'tags', type: 'array', description: 'labels', items: { name: '', type: 'string', description: '' } },
            { name: 'user', type: 'string', description: 'caller', authSources: ['google'] }
          ],
          authRequired: ['admin']
        }
      }
    });

    expect(catalog.serverVersion).toBe('0.9.0');
    expect(catalog.tools.lookup).toEqual({
      description: 'Look things up',
      authRequired: ['admin'],
      parameters: [
        { name: 'query', type: 'string', description: 'what to find', required: true },
        { name: 'ratio', type: 'number', description: 'weight', required: false },
        {
          name: 'tags',
          type: 'array',
          description: 'labels',
          required: true,
          items: { name: '', type: 'string', description: '', required: true }
        },
        { name: 'user', type: 'string', description: 'caller', required: true, authSources: ['google'] }
      ]
    });
  });

  it('should turn a valueType into a typed map', () => {
    const catalog = parseManifest({
      serverVersion: '1',
      tools: { t: { parameters: [{ name: 'scores', type: 'object', valueType: 'integer' }] } }
    });

    expect(catalog.tools.t.parameters[0].additionalProperties).toEqual({
      name: '',
      type: 'integer',
      description: '',
      required: true
    });
    expect(catalog.tools.t.description).toBe('');
    expect(catalog.tools.t.authRequired).toEqual([]);
  });

  it('should report where a manifest is malformed', () => {
    expect(() => parseManifest({ tools: {} })).toThrow(
      new ProtocolError("Malformed tool manifest at 'serverVersion': Required")
    );
  });

  it('should reject unknown parameter types', () => {
    expect(() =>
      parseManifest({ serverVersion: '1', tools: { t: { parameters: [{ name: 'x', type: 'date' }] } } })
    ).toThrow("Unsupported schema type 'date' for parameter 'x'");
  });

  it('should degrade unreadable nested schemas instead of failing', () => {
    const catalog = parseManifest({
      serverVersion: '1',
      tools: {
        t: {
          parameters: [
            { name: 'pair', type: 'array', items: [{ type: 'string' }, { type: 'integer' }] },
            { name: 'odd', type: 'array', items: { type: 'date' } },
            { name: 'bag', type: 'object', additionalProperties: {} },
            { name: 'when', type: 'object', additionalProperties: { type: 'date' } },
            { name: 'shut', type: 'object', additionalProperties: false }
          ]
        }
      }
    });

    expect(catalog.tools.t.parameters).toEqual([
      { name: 'pair', type: 'array', description: '', required: true },
      { name: 'odd', type: 'array', description: '', required: true },
      { name: 'bag', type: 'object', description: '', required: true, additionalProperties: true },
      { name: 'when', type: 'object', description: '', required: true, additionalProperties: true },
      { name: 'shut', type: 'object', description: '', required: true, additionalProperties: false }
    ]);
  });

  it('should keep parameters whose names shadow object methods', () => {
    const catalog = parseManifest({
      serverVersion: '1',
      tools: { t: { parameters: [{ name: 'toString', type: 'string' }] } }
    });

    expect(catalog.tools.t.parameters.map((param) => param.name)).toEqual(['toString']);
  });
});

describe('convertMcpTool', () => {
  it('should not pick up auth sources from the object prototype', () => {
    const tool = convertMcpTool({
      name: 't',
      inputSchema: {
        type: 'object',
        properties: { constructor: { type: 'string' }, toString: { type: 'string' }, user: { type: 'string' } }
      },
      _meta: { 'toolbox/authParam': { user: ['svcA'] } }
    });

    expect(tool.parameters.map((param) => param.authSources)).toEqual([undefined, undefined, ['svcA']]);
  });

  it('should read properties, required names and auth metadata', () => {
    const tool = convertMcpTool({
      name: 'lookup',
      description: 'Look things up',
      inputSchema: {
        type: 'object',
        properties: {
          id: { type: ['integer', 'null'], description: 'row id' },
          names: { type: 'array', items: { type: 'string' } },
          token: { type: 'string' }
        },
        required: ['id']
      },
      _meta: {
        'toolbox/authParam': { token: ['my-service'] },
        'toolbox/authInvoke': ['admin']
      }
    });

    expect(tool).toEqual({
      description: 'Look things up',
      authRequired: ['admin'],
      parameters: [
        { name: 'id', type: 'integer', description: 'row id', required: true },
        {
          name: 'names',
          type: 'array',
          description: '',
          required: false,
          items: { name: '', type: 'string', description: '', required: true }
        },
        { name: 'token', type: 'string', description: '', required: false, authSources: ['my-service'] }
      ]
    });
  });

  it('should map additionalProperties onto the three object kinds', () => {
    const tool = convertMcpTool({
      name: 'maps',
      inputSchema: {
        properties: {
          closed: { type: 'object', additionalProperties: false },
          typed: { type: 'object', additionalProperties: { type: 'number' } },
          open: { type: 'object' }
        }
      }
    });

    const [closed, typed, open] = tool.parameters;
    expect(closed.additionalProperties).toBe(false);
    expect(typed.additionalProperties).toEqual({ name: '', type: 'number', description: '', required: true });
    expect(open.additionalProperties).toBe(true);
  });

  it('should degrade malformed schemas to strings instead of throwing', () => {
    const tool = convertMcpTool({ name: 'odd', inputSchema: { properties: { x: 'nope', y: { type: 'date' } } } });

    expect(tool.parameters).toEqual([
      { name: 'x', type: 'string', description: '', required: false },
      { name: 'y', type: 'string', description: '', required: false }
    ]);
    expect(tool.description).toBe('');
  });
});

describe('argument validation', () => {
  const params: ParameterDescriptor[] = [
    { name: 'count', type: 'integer', description: 'how many', required: true },
    { name: 'tags', type: 'array', description: 'labels', required: false, items: { name: '', type: 'string', description: '', required: true } }
  ];
  const schema = buildArgumentSchema(params);

  it('should accept matching arguments and a null optional', () => {
    expect(() => validateArguments('t', schema, { count: 2, tags: ['x'] })).not.toThrow();
    expect(() => validateArguments('t', schema, { count: 2, tags: null })).not.toThrow();
  });

  it('should name the argument and both types on a mismatch', () => {
    expect(() => validateArguments('t', schema, { count: 'two' })).toThrow(
      new ValidationError("Invalid type for argument 'count': expected number, received string")
    );
  });

  it('should report a float given for an integer', () => {
    expect(() => validateArguments('t', schema, { count: 1.5 })).toThrow(
      "Invalid type for argument 'count': expected integer, received float"
    );
  });

  it('should point into array elements', () => {
    expect(() => validateArguments('t', schema, { count: 1, tags: ['ok', 3] })).toThrow(
      "Invalid type for argument 'tags.1': expected string, received number"
    );
  });
});

describe('describeTool', () => {
  it('should list arguments with their type labels', () => {
    const text = describeTool('Find rows', [
      { name: 'ids', type: 'array', description: 'row ids', required: true, items: { name: '', type: 'integer', description: '', required: true } },
      {
        name: 'weights',
        type: 'object',
        description: 'per key',
        required: false,
        additionalProperties: { name: '', type: 'number', description: '', required: true }
      }
    ]);

    expect(text).toBe(
      'Find rows\n\nArgs:\n    ids (array<integer>): row ids\n    weights (object<string, number>): per key'
    );
  });

  it('should return the bare description without arguments', () => {
    expect(describeTool('No inputs', [])).toBe('No inputs');
  });
});
