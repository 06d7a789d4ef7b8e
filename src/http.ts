/**
 * HTTP session used by every transport
 *
 * A session may be created by a transport (owned, closed with it) or handed
 * in by the caller (never closed by the transport).
 */

import { TransportError } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './config.js';

export interface HttpRequest {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  ok: boolean;
  text(): Promise<string>;
}

export interface HttpSession {
  readonly closed: boolean;
  request(url: string, init: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

/**
 * Fetch session configuration
 */
export interface FetchSessionConfig {
  /** Per-request deadline (milliseconds) */
  timeoutMs?: number;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

/**
 * HttpSession on top of fetch
 *
 * Each request gets its own deadline, which covers reading the body; closing
 * aborts whatever is in flight.
 */
export class FetchSession implements HttpSession {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly controller = new AbortController();
  private _closed = false;

  constructor(config: FetchSessionConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
  }

  get closed(): boolean {
    return this._closed;
  }

  async request(url: string, init: HttpRequest): Promise<HttpResponse> {
    if (this._closed) {
      throw new TransportError(`Session is closed, cannot request ${url}`);
    }

    const signal = AbortSignal.any([this.controller.signal, AbortSignal.timeout(this.timeoutMs)]);

    try {
      const response = await this.fetchImpl(url, {
        method: init.method,
        headers: init.headers,
        body: init.body,
        signal
      });
      const text = await response.text();
      return {
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
        text: async () => text
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new TransportError(`Request to ${url} timed out after ${this.timeoutMs} ms`);
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request to ${url} was aborted because the session closed`);
      }
      if (error instanceof TypeError) {
        throw new TransportError(`Network connection to ${url} failed: ${error.message}`);
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this._closed) {
      return;
    }
    this._closed = true;
    this.controller.abort();
  }
}
