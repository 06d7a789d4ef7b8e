import { describe, it, expect, vi } from 'vitest';

import { ToolboxClient } from '../../src/client.js';
import { AuthRequiredError, ValidationError } from '../../src/errors.js';
import { silentLogger } from '../../src/logger.js';
import type { Logger } from '../../src/logger.js';
import { asyncProvider } from '../../src/utils.js';
import { FakeSession, fakeToolboxServer } from './fakes.js';

function setup(clientHeaders: Record<string, unknown> = {}) {
  const session = new FakeSession(fakeToolboxServer());
  const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const client = new ToolboxClient('http://srv', { protocol: 'toolbox', session, logger, clientHeaders });
  const posts = () => session.requests.filter((request) => request.method === 'POST');
  return { client, session, logger, posts };
}

describe('RemoteTool', () => {
  describe('surface', () => {
    it('should expose name, description, parameters and docstring', async () => {
      const { client } = setup();
      const tool = await client.loadTool('search');

      expect(tool.name).toBe('search');
      expect(tool.description).toBe('Search things');
      expect(tool.parameters.map((param) => param.name)).toEqual(['a', 'b']);
      expect(tool.docstring).toBe('Search things\n\nArgs:\n    a (string): query\n    b (integer): limit');
    });

    it('should hide parameters filled from auth tokens', async () => {
      const { client } = setup();
      const tool = await client.loadTool('profile');

      expect(tool.parameters.map((param) => param.name)).toEqual(['q']);
      expect(tool.pendingAuthServices).toEqual(['svcA']);
    });
  });

  describe('invoke', () => {
    it('should send named arguments as the payload', async () => {
      const { client, posts } = setup();
      const tool = await client.loadTool('search');

      expect(await tool.invoke({ a: 'v' })).toBe('{"a":"v"}');
      expect(posts()[0].url).toBe('http://srv/api/tool/search/invoke');
    });

    it('should map positional arguments in parameter order', async () => {
      const { client } = setup();
      const tool = await client.loadTool('search');

      expect(await tool.invokePositional('q', 5)).toBe('{"a":"q","b":5}');
    });

    it('should drop optional arguments given as null', async () => {
      const { client } = setup();
      const tool = await client.loadTool('search');

      expect(await tool.invoke({ a: 'q', b: null })).toBe('{"a":"q"}');
    });

    it('should treat parameters named like object methods as ordinary parameters', async () => {
      const manifest = {
        serverVersion: '1',
        tools: { t: { parameters: [{ name: 'toString', type: 'string' }, { name: 'valueOf', type: 'string' }] } }
      };
      const session = new FakeSession(fakeToolboxServer(manifest));
      const client = new ToolboxClient('http://srv', { protocol: 'toolbox', session, logger: silentLogger });
      const tool = await client.loadTool('t');

      expect(tool.parameters.map((param) => param.name)).toEqual(['toString', 'valueOf']);
      expect(await tool.invoke({ toString: 'v', valueOf: 'w' })).toBe('{"toString":"v","valueOf":"w"}');
      await expect(tool.invokePositional('v', 'w')).resolves.toBe('{"toString":"v","valueOf":"w"}');
      await expect(tool.invoke({ valueOf: 'w' })).rejects.toThrow("Tool 't' is missing required argument(s): 'toString'");
    });

    it('should reject bad arguments before any request', async () => {
      const { client, posts } = setup();
      const tool = await client.loadTool('search');

      await expect(tool.invoke({ a: 1 })).rejects.toThrow(
        new ValidationError("Invalid type for argument 'a': expected string, received number")
      );
      await expect(tool.invoke({})).rejects.toThrow("Tool 'search' is missing required argument(s): 'a'");
      await expect(tool.invoke({ a: 'q', c: 1 })).rejects.toThrow("Tool 'search' got an unexpected keyword argument 'c'");
      await expect(tool.invokePositional('q', 1, 2)).rejects.toThrow(
        "Tool 'search' takes 2 positional argument(s) but 3 were given"
      );
      expect(posts()).toHaveLength(0);
    });
  });

  describe('auth', () => {
    it('should name the missing service and make no request', async () => {
      const { client, session } = setup();
      const tool = await client.loadTool('secure');

      const error = await tool.invoke({ x: 'v' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthRequiredError);
      expect(error).toHaveProperty(
        'message',
        'One or more of the following authn services are required to invoke this tool: svcX'
      );
      expect(session.requests).toHaveLength(1);
    });

    it('should send the token header once a getter is added', async () => {
      const { client, posts } = setup();
      const tool = (await client.loadTool('secure')).addAuthTokenGetter('svcX', () => 'test-secret');

      expect(await tool.invoke({ x: 'v' })).toBe('{"x":"v"}');
      expect(posts()[0].headers).toEqual({ 'Content-Type': 'application/json', svcX_token: 'test-secret' });
    });

    it('should accept getters at load time and warn about plain HTTP', async () => {
      const { client, logger } = setup();
      const tool = await client.loadTool('profile', { authTokenGetters: { svcA: asyncProvider(async () => 'test-secret') } });

      expect(await tool.invoke({ q: 'name' })).toBe('{"q":"name"}');
      expect(logger.warn).toHaveBeenCalledWith(
        'Sending ID token over HTTP. User data may be exposed. Use HTTPS for secure communication.'
      );
    });

    it('should refuse duplicate and unused auth sources', async () => {
      const { client } = setup();
      const tool = (await client.loadTool('secure')).addAuthTokenGetter('svcX', 'test-secret');

      expect(() => tool.addAuthTokenGetter('svcX', 'other')).toThrow(
        'Authentication source(s) `svcX` already registered in tool `secure`.'
      );
      expect(() => tool.addAuthTokenGetters({ svcY: 'other' })).toThrow(
        'Authentication source(s) `svcY` unused by tool `secure`.'
      );
    });

    it('should refuse a token header that clashes with a client header', async () => {
      const { client } = setup({ svcX_token: 'fixed' });

      await expect(client.loadTool('secure', { authTokenGetters: { svcX: 'test-secret' } })).rejects.toThrow(
        'Client header(s) `svcX_token` already registered in client. Cannot register the same header(s) as auth token(s).'
      );
    });

    it('should send client headers with discovery and invocation', async () => {
      const { client, session } = setup({ 'X-Tenant': async () => 'acme' });
      const tool = await client.loadTool('search');
      await tool.invoke({ a: 'v' });

      expect(session.requests.map((request) => request.headers['X-Tenant'])).toEqual(['acme', 'acme']);
    });
  });

  describe('binding', () => {
    it('should merge bound values into the payload', async () => {
      const { client } = setup();
      const tool = (await client.loadTool('search')).bindParam('b', 3);

      expect(tool.parameters.map((param) => param.name)).toEqual(['a']);
      expect(await tool.invoke({ a: 'q' })).toBe('{"a":"q","b":3}');
    });

    it('should resolve bound getters at call time', async () => {
      const { client } = setup();
      let limit = 1;
      const tool = (await client.loadTool('search')).bindParams({ b: async () => limit });

      limit = 7;
      expect(await tool.invoke({ a: 'q' })).toBe('{"a":"q","b":7}');
    });

    it('should leave the original proxy untouched', async () => {
      const { client } = setup();
      const original = await client.loadTool('search');
      original.bindParam('b', 3);

      expect(original.parameters).toHaveLength(2);
    });

    it('should refuse re-binding, unknown names and bound names passed as arguments', async () => {
      const { client } = setup();
      const tool = (await client.loadTool('search')).bindParam('b', 3);

      expect(() => tool.bindParam('b', 4)).toThrow("Cannot re-bind parameter(s) 'b' of tool 'search'");
      expect(() => tool.bindParam('zzz', 1)).toThrow("Unable to bind parameter(s) zzz: no such parameter on tool 'search'");
      await expect(tool.invoke({ a: 'q', b: 4 })).rejects.toThrow("Parameter 'b' of tool 'search' is bound and cannot be passed");
    });
  });
});
