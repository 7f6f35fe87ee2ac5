#!/usr/bin/env node
/**
 * edit-tools CLI - List, invoke and configure the agent tools
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { toolsCommand } from './commands/tools.js';
import { configCommand } from './commands/config.js';
import { logsCommand } from './commands/logs.js';

function readVersion(): string {
  const packagePath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Fall through to the default below
  }
  return '0.1.0';
}

/**
 * Creates and configures the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('edit-tools')
    .description('File, shell and buffer tools for editor-hosted LLM agents')
    .version(readVersion(), '-v, --version', 'Display version number');

  program.addCommand(toolsCommand());
  program.addCommand(configCommand());
  program.addCommand(logsCommand());

  return program;
}

await createProgram().parseAsync(process.argv);
