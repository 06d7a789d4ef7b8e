/**
 * schema command
 * Parameters a caller has to supply for one tool
 */

import { OutputFormatter } from '../formatter.js';
import type { ApiResponse } from '../formatter.js';
import { describeError } from '../errors.js';
import { defaultClientFactory, openClient } from '../utils/options.js';
import type { ClientFactory, ConnectionOptions } from '../utils/options.js';
import type { ToolboxClient } from '../../src/client.js';

export async function runSchema(
  url: string,
  toolName: string,
  options: ConnectionOptions,
  factory: ClientFactory = defaultClientFactory
): Promise<ApiResponse> {
  let client: ToolboxClient | undefined;
  try {
    client = openClient(url, options, factory);
    const tool = await client.loadTool(toolName);
    return {
      success: true,
      data: {
        kind: 'schema',
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
        docstring: tool.docstring
      }
    };
  } catch (error) {
    return { success: false, error: describeError(error) };
  } finally {
    await client?.close();
  }
}

export async function schema(url: string, toolName: string, options: ConnectionOptions): Promise<void> {
  const resp = await runSchema(url, toolName, options);
  OutputFormatter.printResponse(resp, options.json);
  process.exit(resp.success ? 0 : 1);
}
