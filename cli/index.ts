#!/usr/bin/env node
/**
 * Toolbox client CLI
 */

import { Command } from 'commander';

import { list } from './commands/list.js';
import { schema } from './commands/schema.js';
import { invoke } from './commands/invoke.js';
import { collect } from './utils/options.js';
import { CLIENT_VERSION } from '../src/config.js';

const program = new Command();

program
  .name('toolbox-client')
  .description('Discover and invoke tools on a toolbox server (native HTTP API or MCP)')
  .version(CLIENT_VERSION);

// Options every command takes
function withConnectionOptions(command: Command): Command {
  return command
    .option('--protocol <protocol>', 'toolbox, mcp, 2024-11-05, 2025-03-26 or 2025-06-18 (default: TOOLBOX_PROTOCOL or mcp)')
    .option('--header <name=value>', 'Header sent with every request (repeatable)', collect, [])
    .option('--timeout <ms>', 'Per-request deadline in milliseconds')
    .option('--json', 'JSON output mode');
}

withConnectionOptions(
  program.command('list <url> [toolset]').description('List the tools of a toolset, or of the whole server')
).action(list);

withConnectionOptions(program.command('schema <url> <tool>').description('Show the parameters of a tool')).action(
  schema
);

withConnectionOptions(
  program
    .command('invoke <url> <tool>')
    .description('Invoke a tool')
    .option('--params <json>', 'Tool parameters (JSON object)')
    .option('--auth <service=token>', 'Token for an auth service (repeatable)', collect, [])
).action(invoke);

program.parse();
