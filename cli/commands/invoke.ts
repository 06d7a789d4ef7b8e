/**
 * invoke command
 * Call a tool with JSON parameters and print its result
 */

import { OutputFormatter } from '../formatter.js';
import type { ApiResponse } from '../formatter.js';
import { describeError } from '../errors.js';
import { defaultClientFactory, openClient, parseKeyValues, parseParams } from '../utils/options.js';
import type { ClientFactory, ConnectionOptions } from '../utils/options.js';
import type { ToolboxClient } from '../../src/client.js';

export interface InvokeOptions extends ConnectionOptions {
  params?: string;
  /** `service=token` entries */
  auth: string[];
}

export async function runInvoke(
  url: string,
  toolName: string,
  options: InvokeOptions,
  factory: ClientFactory = defaultClientFactory
): Promise<ApiResponse> {
  let client: ToolboxClient | undefined;
  try {
    const params = parseParams(options.params);
    const authTokenGetters = parseKeyValues(options.auth, '--auth');

    client = openClient(url, options, factory);
    const tool = await client.loadTool(toolName, { authTokenGetters });
    const result = await tool.invoke(params);
    return { success: true, data: { kind: 'result', tool: toolName, result } };
  } catch (error) {
    return { success: false, error: describeError(error) };
  } finally {
    await client?.close();
  }
}

export async function invoke(url: string, toolName: string, options: InvokeOptions): Promise<void> {
  const resp = await runInvoke(url, toolName, options);
  OutputFormatter.printResponse(resp, options.json);
  process.exit(resp.success ? 0 : 1);
}
