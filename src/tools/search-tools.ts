import { readdir, readFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { glob } from 'glob';
import type { ToolDescriptor } from './tool-system.js';
import { optionalStringArg, optionalStringArrayArg, stringArg } from './tool-args.js';
import type { ToolContext } from './tool-context.js';

export const NO_FILES_MESSAGE = 'No files found';
export const NO_MATCHES_MESSAGE = 'No matches found';

const SEARCH_IGNORE = ['**/node_modules/**', '**/.git/**'];

/**
 * Expands a glob relative to a directory into sorted absolute file paths
 */
export async function globFiles(pattern: string, root: string): Promise<string[]> {
  const files = await glob(pattern, { cwd: root, nodir: true, absolute: true });
  return files.sort();
}

/**
 * Searches files under a directory for lines matching a regular expression.
 * Returns `file:line:text` entries with files relative to the root.
 *
 * @param include - Glob restricting the files searched; without a slash it matches base names
 */
export async function searchFiles(pattern: string, root: string, include?: string): Promise<string[]> {
  const regex = new RegExp(pattern);
  const files = await glob(include ?? '**/*', {
    cwd: root,
    nodir: true,
    matchBase: true,
    ignore: SEARCH_IGNORE,
  });

  const matches: string[] = [];
  for (const file of files.sort()) {
    const content = await readFile(join(root, file), 'utf-8').catch(() => undefined);
    // Unreadable entries (dangling links, no permission) and binaries are skipped
    if (content === undefined || content.includes('\0')) {
      continue;
    }

    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (line !== undefined && regex.test(line)) {
        matches.push(`${file}:${i + 1}:${line}`);
      }
    }
  }

  return matches;
}

/**
 * Lists the immediate entries of a directory by base name, sorted.
 * Entries whose absolute path matches any ignore pattern are left out.
 */
export async function listDirectory(dir: string, ignore: readonly string[] = []): Promise<string[]> {
  const patterns = ignore.map((pattern) => new RegExp(pattern));
  const entries = (await readdir(dir)).sort();

  return entries
    .map((entry) => join(dir, entry))
    .filter((absolutePath) => !patterns.some((pattern) => pattern.test(absolutePath)))
    .map((absolutePath) => basename(absolutePath));
}

export function createGlobTool(context: ToolContext): ToolDescriptor {
  return {
    name: 'GlobTool',
    description:
      'Find files by glob pattern (e.g. "**/*.ts"). Returns matching absolute paths, one per line.',
    category: 'filesystem',
    args: [
      { name: 'pattern', type: 'string', description: 'Glob pattern to match files against', required: true },
      { name: 'path', type: 'string', description: 'Directory to search from (default: working directory)' },
    ],
    handler: async (args) => {
      const root = resolve(context.workingDirectory, optionalStringArg(args, 'path') ?? '.');
      const files = await globFiles(stringArg(args, 'pattern'), root);
      return files.length > 0 ? files.join('\n') : NO_FILES_MESSAGE;
    },
  };
}

export function createGrepTool(context: ToolContext): ToolDescriptor {
  return {
    name: 'GrepTool',
    description:
      'Search file contents with a regular expression, recursively. ' +
      'Returns matching lines prefixed with file:line.',
    category: 'filesystem',
    args: [
      { name: 'pattern', type: 'string', description: 'Regular expression to search for', required: true },
      { name: 'include', type: 'string', description: 'Glob restricting which files are searched (e.g. "*.ts")' },
      { name: 'path', type: 'string', description: 'Directory to search in (default: working directory)' },
    ],
    handler: async (args) => {
      const root = resolve(context.workingDirectory, optionalStringArg(args, 'path') ?? '.');
      const matches = await searchFiles(stringArg(args, 'pattern'), root, optionalStringArg(args, 'include'));
      return matches.length > 0 ? matches.join('\n') : NO_MATCHES_MESSAGE;
    },
  };
}

export function createListTool(context: ToolContext): ToolDescriptor {
  return {
    name: 'LS',
    description: 'List the entries of a directory, one name per line. Does not recurse.',
    category: 'filesystem',
    args: [
      { name: 'path', type: 'string', description: 'Directory to list', required: true },
      {
        name: 'ignore',
        type: 'array',
        description: 'Regular expressions; entries whose absolute path matches any of them are skipped',
      },
    ],
    handler: async (args) => {
      const dir = resolve(context.workingDirectory, stringArg(args, 'path'));
      const entries = await listDirectory(dir, optionalStringArrayArg(args, 'ignore'));
      return entries.join('\n');
    },
  };
}
