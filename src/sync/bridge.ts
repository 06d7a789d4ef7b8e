/**
 * Blocking bridge to a background event loop
 *
 * One worker thread per process runs every synchronous client's transport.
 * A call posts a request on a MessageChannel and parks the calling thread in
 * Atomics.wait until the worker flips the shared signal; the reply is taken
 * with receiveMessageOnPort, so the caller's own event loop never has to run.
 * That makes blocking calls safe even from inside async code.
 */

import { createRequire } from 'node:module';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { MessageChannel, Worker, receiveMessageOnPort } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';

import { ProtocolError, TransportError, deserializeError } from '../errors.js';
import { createLogger } from '../logger.js';
import { BOOT_FAILURE_ID, SIGNAL_WAITING, isBridgeReply } from './messages.js';
import type { BridgeCall } from './messages.js';

const logger = createLogger('sync-bridge');

// Loads the TypeScript worker through tsx when running from sources
const TS_BOOTSTRAP = `
const { workerData } = require('node:worker_threads');
import(workerData.loader)
  .then((api) => (api.register || api.default.register)())
  .then(() => import(workerData.entry))
  .catch((error) => {
    workerData.port.postMessage({
      id: ${BOOT_FAILURE_ID},
      ok: false,
      error: { kind: 'error', name: 'BridgeStartupError', message: String(error && error.message ? error.message : error) }
    });
    const signal = new Int32Array(workerData.signal);
    Atomics.store(signal, 0, 1);
    Atomics.notify(signal, 0);
  });
`;

function spawnWorker(port: MessagePort, signal: SharedArrayBuffer): Worker {
  const data = { port, signal };
  if (fileURLToPath(import.meta.url).endsWith('.ts')) {
    const require = createRequire(import.meta.url);
    return new Worker(TS_BOOTSTRAP, {
      eval: true,
      workerData: {
        ...data,
        loader: pathToFileURL(require.resolve('tsx/esm/api')).href,
        entry: new URL('./sync-worker.ts', import.meta.url).href
      },
      transferList: [port]
    });
  }
  return new Worker(new URL('./sync-worker.js', import.meta.url), { workerData: data, transferList: [port] });
}

export class SyncBridge {
  /** Thread running every synchronous client's transport */
  readonly worker: Worker;
  private readonly port: MessagePort;
  private readonly signal: Int32Array;
  private nextRequestId = 0;
  private nextClientId = 0;
  private failure: Error | null = null;
  private terminated = false;

  constructor() {
    const buffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    const { port1, port2 } = new MessageChannel();
    this.signal = new Int32Array(buffer);
    this.port = port1;
    this.worker = spawnWorker(port2, buffer);
    this.worker.on('error', (error: Error) => {
      logger.error(`bridge worker failed: ${error.message}`);
      this.failure = new TransportError(`Synchronous bridge worker failed: ${error.message}`);
    });
    this.worker.on('exit', (code: number) => {
      if (!this.terminated && !this.failure) {
        this.failure = new TransportError(`Synchronous bridge worker exited with code ${code}`);
      }
    });
    this.worker.unref();
    this.port.unref();
    logger.debug(`started bridge worker ${this.worker.threadId}`);
  }

  /**
   * Id under which the worker keeps one client's transport
   */
  /**
   * False once the worker has been shut down, failed or exited
   */
  get alive(): boolean {
    return !this.terminated && !this.failure;
  }

  allocateClientId(): number {
    return ++this.nextClientId;
  }

  /**
   * Send one request and block until its reply arrives or `waitMs` passes
   */
  call(request: BridgeCall, waitMs: number): unknown {
    if (this.terminated) {
      throw new TransportError('Synchronous bridge has been shut down');
    }
    if (this.failure) {
      throw this.failure;
    }

    const id = ++this.nextRequestId;
    Atomics.store(this.signal, 0, SIGNAL_WAITING);
    this.port.postMessage({ ...request, id });

    const deadline = Date.now() + waitMs;
    for (;;) {
      const reply = this.takeReply(id);
      if (reply) {
        return reply.value;
      }
      if (this.failure) {
        throw this.failure;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TransportError(`Synchronous '${request.op}' call timed out after ${waitMs} ms`);
      }
      Atomics.wait(this.signal, 0, SIGNAL_WAITING, remaining);
      Atomics.store(this.signal, 0, SIGNAL_WAITING);
    }
  }

  /**
   * Drain the port up to the reply for `id`; stale replies of timed-out calls
   * are dropped
   */
  private takeReply(id: number): { value: unknown } | null {
    for (;;) {
      const received = receiveMessageOnPort(this.port);
      if (!received) {
        return null;
      }
      const reply: unknown = received.message;
      if (!isBridgeReply(reply)) {
        throw new ProtocolError('Malformed reply from bridge worker');
      }
      if (reply.id === BOOT_FAILURE_ID && !reply.ok) {
        this.failure = deserializeError(reply.error);
        throw this.failure;
      }
      if (reply.id !== id) {
        logger.debug(`dropping stale bridge reply ${reply.id}`);
        continue;
      }
      if (!reply.ok) {
        throw deserializeError(reply.error);
      }
      return { value: reply.value };
    }
  }

  async terminate(): Promise<void> {
    if (this.terminated) {
      return;
    }
    this.terminated = true;
    this.port.close();
    await this.worker.terminate();
  }
}

let bridge: SyncBridge | null = null;

/**
 * The process-wide bridge, started on first use and again after its worker
 * has died
 */
export function getSyncBridge(): SyncBridge {
  if (!bridge || !bridge.alive) {
    bridge = new SyncBridge();
  }
  return bridge;
}

/**
 * Stop the bridge worker; a later synchronous client starts a new one
 */
export async function shutdownSyncBridge(): Promise<void> {
  const current = bridge;
  bridge = null;
  if (current) {
    await current.terminate();
  }
}
