/**
 * Output formatting, two modes:
 * - JSON: one line per response, for scripts and agents
 * - Human: coloured summary
 */

import chalk from 'chalk';

import { typeLabel } from '../src/schema.js';
import type { ParameterDescriptor } from '../src/types.js';

export interface ToolSummary {
  name: string;
  description: string;
}

export type ResponseData =
  | { kind: 'tools'; toolset?: string; tools: ToolSummary[] }
  | { kind: 'schema'; name: string; description: string; parameters: readonly ParameterDescriptor[]; docstring: string }
  | { kind: 'result'; tool: string; result: string };

export type ApiResponse = { success: true; data: ResponseData } | { success: false; error: string };

/**
 * Pretty-print a result that holds JSON, otherwise return it untouched
 */
function formatResult(result: string): string {
  try {
    return JSON.stringify(JSON.parse(result), null, 2);
  } catch {
    return result;
  }
}

export class OutputFormatter {
  /**
   * Lines for stdout and stderr
   */
  static render(resp: ApiResponse, jsonMode = false): { out: string[]; err: string[] } {
    if (jsonMode) {
      return { out: [JSON.stringify(resp)], err: [] };
    }

    if (!resp.success) {
      return { out: [], err: [`${chalk.red('✗')} ${resp.error}`] };
    }

    const data = resp.data;
    switch (data.kind) {
      case 'tools': {
        const title = data.toolset ? `Tools in ${data.toolset}` : 'Available tools';
        return {
          out: [
            `${chalk.blue('📋')} ${title} (${data.tools.length}):`,
            ...data.tools.map((tool) => `  - ${chalk.cyan(tool.name)}: ${tool.description || 'No description'}`)
          ],
          err: []
        };
      }

      case 'schema': {
        const lines = [`${chalk.green('✓')} ${data.name}`, `  Description: ${data.description || 'No description'}`];
        if (data.parameters.length === 0) {
          lines.push('  Parameters: none');
        } else {
          lines.push('  Parameters:');
          for (const param of data.parameters) {
            const flag = param.required ? chalk.yellow('required') : chalk.gray('optional');
            lines.push(`    ${chalk.cyan(param.name)} (${typeLabel(param)}, ${flag}): ${param.description}`);
          }
        }
        return { out: lines, err: [] };
      }

      case 'result':
        return { out: [`${chalk.green('✓')} Called ${data.tool}`, formatResult(data.result)], err: [] };
    }
  }

  static printResponse(resp: ApiResponse, jsonMode = false): void {
    const { out, err } = OutputFormatter.render(resp, jsonMode);
    out.forEach((line) => console.log(line));
    err.forEach((line) => console.error(line));
  }
}
