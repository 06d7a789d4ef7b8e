/**
 * list command
 * Names and descriptions of every tool in a toolset (or on the server)
 */

import { OutputFormatter } from '../formatter.js';
import type { ApiResponse } from '../formatter.js';
import { describeError } from '../errors.js';
import { defaultClientFactory, openClient } from '../utils/options.js';
import type { ClientFactory, ConnectionOptions } from '../utils/options.js';
import type { ToolboxClient } from '../../src/client.js';

export async function runList(
  url: string,
  toolset: string | undefined,
  options: ConnectionOptions,
  factory: ClientFactory = defaultClientFactory
): Promise<ApiResponse> {
  let client: ToolboxClient | undefined;
  try {
    client = openClient(url, options, factory);
    const tools = await client.loadToolset(toolset);
    return {
      success: true,
      data: {
        kind: 'tools',
        toolset,
        tools: tools.map((tool) => ({ name: tool.name, description: tool.description }))
      }
    };
  } catch (error) {
    return { success: false, error: describeError(error) };
  } finally {
    await client?.close();
  }
}

export async function list(url: string, toolset: string | undefined, options: ConnectionOptions): Promise<void> {
  const resp = await runList(url, toolset, options);
  OutputFormatter.printResponse(resp, options.json);
  process.exit(resp.success ? 0 : 1);
}
