/**
 * Bridge worker: runs the async transports on its own event loop and answers
 * the blocked caller through a MessagePort plus a shared signal
 */

import { MessagePort, workerData } from 'node:worker_threads';

import { TransportError, ValidationError, serializeError } from '../errors.js';
import { createLogger } from '../logger.js';
import { createTransport } from '../transports/index.js';
import type { BaseTransport } from '../transports/index.js';
import { SIGNAL_REPLIED, isBridgeRequest } from './messages.js';
import type { BridgeReply, BridgeRequest } from './messages.js';

const logger = createLogger('sync-worker');
const transports = new Map<number, BaseTransport>();

function transportFor(clientId: number): BaseTransport {
  const transport = transports.get(clientId);
  if (!transport) {
    throw new TransportError(`Client ${clientId} is closed`);
  }
  return transport;
}

async function dispatch(request: BridgeRequest): Promise<unknown> {
  switch (request.op) {
    case 'open':
      transports.set(
        request.clientId,
        createTransport(request.protocol, { baseUrl: request.url, timeoutMs: request.timeoutMs })
      );
      return null;

    case 'listTools':
      return transportFor(request.clientId).listTools(request.toolset, request.headers);

    case 'getTool':
      return transportFor(request.clientId).getTool(request.name, request.headers);

    case 'invoke':
      return transportFor(request.clientId).invokeTool(request.name, request.args, request.headers);

    case 'close': {
      const transport = transports.get(request.clientId);
      transports.delete(request.clientId);
      if (transport) {
        await transport.close();
      }
      return null;
    }
  }
}

function start(port: MessagePort, signal: Int32Array): void {
  const send = (reply: BridgeReply): void => {
    port.postMessage(reply);
    Atomics.store(signal, 0, SIGNAL_REPLIED);
    Atomics.notify(signal, 0);
  };

  port.on('message', (message: unknown) => {
    if (!isBridgeRequest(message)) {
      logger.error('Dropping malformed bridge request', message);
      return;
    }
    dispatch(message).then(
      (value) => send({ id: message.id, ok: true, value }),
      (error: unknown) => send({ id: message.id, ok: false, error: serializeError(error) })
    );
  });
  logger.debug('bridge worker ready');
}

const data: unknown = workerData;
if (
  typeof data === 'object' &&
  data !== null &&
  'port' in data &&
  data.port instanceof MessagePort &&
  'signal' in data &&
  data.signal instanceof SharedArrayBuffer
) {
  start(data.port, new Int32Array(data.signal));
} else {
  throw new ValidationError('Bridge worker started without its port and signal');
}
