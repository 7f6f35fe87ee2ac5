/**
 * Config command - Inspect and change tool settings
 */

import { Command } from 'commander';
import { ensureStateDirs, loadConfig, resolveStatePaths } from '../utils/runtime.js';

export type ConfigScalar = string | number | boolean;

/**
 * Flattens nested settings into `section.key` pairs, in declaration order
 */
export function flattenConfig(value: Record<string, unknown>, prefix = ''): Array<[string, ConfigScalar]> {
  const pairs: Array<[string, ConfigScalar]> = [];
  for (const [key, entry] of Object.entries(value)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      pairs.push([path, entry]);
    } else if (entry !== null && typeof entry === 'object' && !Array.isArray(entry)) {
      pairs.push(...flattenConfig(Object.fromEntries(Object.entries(entry)), path));
    }
  }
  return pairs;
}

/**
 * One `key = value` line per setting, values JSON-encoded
 */
export function formatConfigLines(config: Record<string, unknown>): string[] {
  return flattenConfig(config).map(([key, value]) => `${key} = ${JSON.stringify(value)}`);
}

/**
 * Parses a command-line value into a number, boolean or string
 */
export function parseConfigValue(value: string): ConfigScalar {
  if (value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return lower === 'true';
  }
  return value;
}

async function showConfig(): Promise<void> {
  const paths = resolveStatePaths();
  const { manager, result } = await loadConfig(paths);

  console.log(`# ${manager.path}`);
  for (const line of formatConfigLines(manager.config)) {
    console.log(line);
  }

  if (!result.success) {
    console.log('\nIgnored, defaults shown instead:');
    for (const error of result.errors ?? []) {
      console.log(`  - ${error}`);
    }
  }
}

async function getConfig(key: string): Promise<void> {
  const { manager } = await loadConfig(resolveStatePaths());
  const value = manager.get(key);

  if (value === undefined) {
    console.error(`Unknown setting: ${key}`);
    process.exit(1);
  }

  if (value !== null && typeof value === 'object') {
    for (const line of formatConfigLines({ [key]: value })) {
      console.log(line);
    }
  } else {
    console.log(String(value));
  }
}

async function setConfig(key: string, raw: string): Promise<void> {
  const paths = resolveStatePaths();
  await ensureStateDirs(paths);
  const { manager } = await loadConfig(paths);

  const value = parseConfigValue(raw);
  const result = manager.set(key, value);
  if (!result.success) {
    console.error(`Cannot set ${key}:`);
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  await manager.save();
  console.log(`${key} = ${JSON.stringify(value)}`);
}

export function configCommand(): Command {
  const cmd = new Command('config').description('Inspect and change tool settings');

  cmd
    .command('show', { isDefault: true })
    .description('Print every setting as key = value')
    .action(showConfig);

  cmd
    .command('get <key>')
    .description('Print one setting or section, e.g. tools.shell')
    .action(getConfig);

  cmd
    .command('set <key> <value>')
    .description('Change a setting, e.g. tools.commandTimeout 60000')
    .action(setConfig);

  return cmd;
}
