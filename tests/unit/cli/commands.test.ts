import { describe, it, expect } from 'vitest';

import { runList } from '../../../cli/commands/list.js';
import { runSchema } from '../../../cli/commands/schema.js';
import { runInvoke } from '../../../cli/commands/invoke.js';
import { parseKeyValues, parseParams } from '../../../cli/utils/options.js';
import type { ClientFactory } from '../../../cli/utils/options.js';
import { ToolboxClient } from '../../../src/client.js';
import type { ToolboxClientOptions } from '../../../src/client.js';
import { silentLogger } from '../../../src/logger.js';
import { FakeSession, fakeToolboxServer } from '../fakes.js';

function fakeFactory() {
  const session = new FakeSession(fakeToolboxServer());
  const seen: ToolboxClientOptions[] = [];
  const factory: ClientFactory = (url, options) => {
    seen.push(options);
    return new ToolboxClient(url, { ...options, protocol: 'toolbox', session, logger: silentLogger });
  };
  return { factory, session, seen };
}

const BASE = { header: [] };

describe('CLI Commands (Unit Tests)', () => {
  describe('option parsing', () => {
    it('should split name=value pairs at the first equals sign', () => {
      expect(parseKeyValues(['svcX=a=b', 'other='], '--auth')).toEqual({ svcX: 'a=b', other: '' });
    });

    it('should reject entries without a name', () => {
      expect(() => parseKeyValues(['=oops'], '--header')).toThrow("Invalid value for --header: '=oops'");
    });

    it('should require params to be a JSON object', () => {
      expect(parseParams(undefined)).toEqual({});
      expect(parseParams('{"a":1}')).toEqual({ a: 1 });
      expect(() => parseParams('[1]')).toThrow('Invalid parameters: --params must be a JSON object');
      expect(() => parseParams('{')).toThrow('Invalid parameters: --params must be valid JSON');
    });
  });

  describe('list command', () => {
    it('should return tool names and descriptions', async () => {
      const { factory } = fakeFactory();

      const resp = await runList('http://srv', undefined, BASE, factory);

      expect(resp).toEqual({
        success: true,
        data: {
          kind: 'tools',
          toolset: undefined,
          tools: [
            { name: 'search', description: 'Search things' },
            { name: 'secure', description: 'Needs authorization' },
            { name: 'profile', description: 'Look up the caller' }
          ]
        }
      });
    });

    it('should pass headers and timeout to the client', async () => {
      const { factory, seen } = fakeFactory();

      await runList('http://srv', 'core', { header: ['X-Tenant=acme'], timeout: '900', protocol: 'toolbox' }, factory);

      expect(seen[0]).toEqual({ protocol: 'toolbox', timeoutMs: 900, clientHeaders: { 'X-Tenant': 'acme' } });
    });

    it('should report a bad timeout', async () => {
      const { factory } = fakeFactory();

      const resp = await runList('http://srv', undefined, { header: [], timeout: 'soon' }, factory);

      expect(resp).toEqual({
        success: false,
        error: "Invalid value for --timeout: 'soon'\nExpected a positive number of milliseconds"
      });
    });
  });

  describe('schema command', () => {
    it('should describe the parameters of a tool', async () => {
      const { factory } = fakeFactory();

      const resp = await runSchema('http://srv', 'search', BASE, factory);

      expect(resp.success).toBe(true);
      if (resp.success && resp.data.kind === 'schema') {
        expect(resp.data.parameters.map((param) => param.name)).toEqual(['a', 'b']);
        expect(resp.data.docstring).toBe('Search things\n\nArgs:\n    a (string): query\n    b (integer): limit');
      }
    });

    it('should report an unknown tool', async () => {
      const { factory } = fakeFactory();

      const resp = await runSchema('http://srv', 'ghost', BASE, factory);

      expect(resp).toEqual({ success: false, error: 'Tool not found: ghost' });
    });
  });

  describe('invoke command', () => {
    it('should invoke with params and auth tokens', async () => {
      const { factory, session } = fakeFactory();

      const resp = await runInvoke(
        'http://srv',
        'secure',
        { ...BASE, params: '{"x":"v"}', auth: ['svcX=test-secret'] },
        factory
      );

      expect(resp).toEqual({ success: true, data: { kind: 'result', tool: 'secure', result: '{"x":"v"}' } });
      expect(session.requests[1].headers.svcX_token).toBe('test-secret');
    });

    it('should explain a missing token', async () => {
      const { factory } = fakeFactory();

      const resp = await runInvoke('http://srv', 'secure', { ...BASE, params: '{"x":"v"}', auth: [] }, factory);

      expect(resp).toEqual({
        success: false,
        error:
          'One or more of the following authn services are required to invoke this tool: svcX\nRegister a token getter for one of: svcX'
      });
    });
  });
});
