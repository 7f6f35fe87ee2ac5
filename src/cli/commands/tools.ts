/**
 * Tools command - List the core tools and invoke one
 */

import { Command } from 'commander';
import type { ToolDescriptor } from '../../tools/tool-system.js';
import { loadRuntime } from '../utils/runtime.js';

interface ListOptions {
  json?: boolean;
}

interface CallOptions {
  cwd?: string;
}

/**
 * Creates the tools command with subcommands
 */
export function toolsCommand(): Command {
  const cmd = new Command('tools');

  cmd.description('List and invoke agent tools');

  cmd
    .command('list')
    .description('List available tools')
    .option('--json', 'Print function-calling definitions as JSON')
    .action(async (options: ListOptions) => {
      await listTools(options);
    });

  cmd
    .command('call <name> [args]')
    .description('Invoke a tool with a JSON object of arguments')
    .option('-C, --cwd <dir>', 'Working directory for the tool')
    .action(async (name: string, args: string | undefined, options: CallOptions) => {
      await callTool(name, args ?? '{}', options);
    });

  return cmd;
}

/**
 * One-line summary of a tool's signature, optional arguments in brackets
 */
export function formatSignature(descriptor: ToolDescriptor): string {
  const args = descriptor.args.map((arg) =>
    arg.required ? `${arg.name}: ${arg.type}` : `[${arg.name}: ${arg.type}]`,
  );
  return `${descriptor.name}(${args.join(', ')})`;
}

async function listTools(options: ListOptions): Promise<void> {
  const { toolSystem } = await loadRuntime();

  if (options.json) {
    console.log(JSON.stringify(toolSystem.list(), null, 2));
    return;
  }

  for (const descriptor of toolSystem.descriptors()) {
    console.log(`${formatSignature(descriptor)}  [${descriptor.category}]`);
  }
}

/**
 * Parses the JSON argument object given on the command line
 */
export function parseCallArguments(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Tool arguments must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

async function callTool(name: string, rawArgs: string, options: CallOptions): Promise<void> {
  let args: Record<string, unknown>;
  try {
    args = parseCallArguments(rawArgs);
  } catch (error) {
    console.error(`Invalid arguments: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const { toolSystem } = await loadRuntime({ workingDirectory: options.cwd });
  const result = await toolSystem.execute({ id: `cli-${Date.now()}`, name, arguments: args });

  if (!result.success) {
    console.error(`${result.error?.errorType ?? 'execution'} error: ${result.error?.message ?? 'unknown error'}`);
    process.exit(1);
  }

  console.log(result.output ?? '');
}
