import { describe, it, expect, vi, afterEach } from 'vitest';

import { ToolboxHttpTransport } from '../../../src/transports/index.js';
import { FetchSession } from '../../../src/http.js';
import { ToolInvocationError, ToolNotFoundError, TransportError } from '../../../src/errors.js';
import { silentLogger } from '../../../src/logger.js';
import { FakeSession } from '../fakes.js';
import type { FakeHandler } from '../fakes.js';

const MANIFEST = {
  serverVersion: '0.5.0',
  tools: {
    search: {
      description: 'Search things',
      parameters: [{ name: 'q', type: 'string', description: 'query' }]
    }
  }
};

function transportWith(handler: FakeHandler): { transport: ToolboxHttpTransport; session: FakeSession } {
  const session = new FakeSession(handler);
  const transport = new ToolboxHttpTransport({ baseUrl: 'http://srv/', session, logger: silentLogger });
  return { transport, session };
}

describe('ToolboxHttpTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fetch one tool from its manifest URL', async () => {
    const { transport, session } = transportWith(() => ({ body: MANIFEST }));

    const catalog = await transport.getTool('search', { 'X-Trace': 't1' });

    expect(session.requests[0]).toEqual({
      url: 'http://srv/api/tool/search',
      method: 'GET',
      headers: { 'X-Trace': 't1' },
      body: undefined
    });
    expect(catalog.serverVersion).toBe('0.5.0');
    expect(Object.keys(catalog.tools)).toEqual(['search']);
  });

  it('should fail when the manifest lacks the requested tool', async () => {
    const { transport } = transportWith(() => ({ body: MANIFEST }));

    const error = await transport.getTool('other').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ToolNotFoundError);
    expect(error).toHaveProperty('message', "Tool 'other' not found in the manifest received from http://srv/api/tool/other");
  });

  it('should list the default toolset under an empty name', async () => {
    const { transport, session } = transportWith(() => ({ body: MANIFEST }));

    await transport.listTools();
    await transport.listTools('my set');

    expect(session.requests.map((request) => request.url)).toEqual([
      'http://srv/api/toolset/',
      'http://srv/api/toolset/my%20set'
    ]);
  });

  it('should post arguments and return string results as they are', async () => {
    const { transport, session } = transportWith(() => ({ body: { result: 'hello' } }));

    const result = await transport.invokeTool('search', { q: 'v' }, { my_token: 'test-secret' });

    expect(result).toBe('hello');
    expect(session.requests[0]).toEqual({
      url: 'http://srv/api/tool/search/invoke',
      method: 'POST',
      headers: { 'Content-Type': 'application/json', my_token: 'test-secret' },
      body: { q: 'v' }
    });
  });

  it('should encode structured results as JSON text', async () => {
    const { transport } = transportWith(() => ({ body: { result: { rows: [1, 2] } } }));
    expect(await transport.invokeTool('search', {})).toBe('{"rows":[1,2]}');
  });

  it('should raise the error a tool reports', async () => {
    const { transport } = transportWith(() => ({ body: { error: 'query too broad' } }));
    await expect(transport.invokeTool('search', {})).rejects.toThrow(new ToolInvocationError('search', 'query too broad'));
  });

  it('should carry status and body of a failed request', async () => {
    const { transport } = transportWith(() => ({ status: 401, statusText: 'Unauthorized', body: 'missing token' }));

    const error = await transport.invokeTool('search', {}).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty(
      'message',
      'API request failed with status 401 (Unauthorized). Server response: missing token'
    );
    expect(error).toHaveProperty('status', 401);
  });

  it('should leave a supplied session open', async () => {
    const { transport, session } = transportWith(() => ({ body: MANIFEST }));
    await transport.close();
    expect(session.closeCount).toBe(0);
  });

  it('should close the session it created exactly once', async () => {
    const close = vi.spyOn(FetchSession.prototype, 'close');
    const transport = new ToolboxHttpTransport({
      baseUrl: 'http://srv',
      fetch: async () => new Response(JSON.stringify(MANIFEST)),
      logger: silentLogger
    });

    await transport.getTool('search');
    await transport.close();
    await transport.close();

    expect(close).toHaveBeenCalledTimes(1);
  });
});
