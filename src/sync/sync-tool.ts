/**
 * Blocking counterpart of RemoteTool
 */

import { ToolProxyBase, headerValue } from '../tool.js';
import type { ToolProxyState } from '../tool.js';
import { ProtocolError } from '../errors.js';
import { authTokenHeader, resolveValueSync } from '../utils.js';
import type { Headers } from '../types.js';
import type { SyncBridge } from './bridge.js';

export interface SyncToolContext {
  bridge: SyncBridge;
  clientId: number;
  /** How long one call may block */
  waitMs: number;
}

export class SyncRemoteTool extends ToolProxyBase<SyncRemoteTool> {
  private readonly context: SyncToolContext;

  constructor(context: SyncToolContext, state: ToolProxyState) {
    super(state);
    this.context = context;
  }

  protected derive(state: ToolProxyState): SyncRemoteTool {
    return new SyncRemoteTool(this.context, state);
  }

  invoke(args: Readonly<Record<string, unknown>> = {}): string {
    return this.execute([], args);
  }

  invokePositional(...values: unknown[]): string {
    return this.execute(values, {});
  }

  private execute(positional: readonly unknown[], named: Readonly<Record<string, unknown>>): string {
    const payload = this.prepareArguments(positional, named);

    for (const [param, source] of Object.entries(this.state.boundParams)) {
      payload[param] = resolveValueSync(source, param);
    }

    const headers: Headers = {};
    for (const [header, source] of Object.entries(this.state.clientHeaders)) {
      headers[header] = headerValue(resolveValueSync(source, header), `Client header '${header}'`);
    }
    for (const [service, source] of Object.entries(this.state.authTokenGetters)) {
      headers[authTokenHeader(service)] = headerValue(
        resolveValueSync(source, service),
        `Auth token getter for '${service}'`
      );
    }

    this.warnIfInsecure();
    const { bridge, clientId, waitMs } = this.context;
    const result = bridge.call({ op: 'invoke', clientId, name: this.state.name, args: payload, headers }, waitMs);
    if (typeof result !== 'string') {
      throw new ProtocolError(`Tool '${this.state.name}' returned a non-text result through the bridge`);
    }
    return result;
  }
}
