import { resolve } from 'node:path';
import { BufferStore } from '../targets/buffer-store.js';

/**
 * Everything the core tools need from their environment
 */
export interface ToolContext {
  /** Session buffers used by the buffer tools */
  buffers: BufferStore;
  /** Directory relative paths and commands resolve against */
  workingDirectory: string;
  /** Shell that runs Bash commands */
  shell: string;
  /** Default command timeout in milliseconds */
  commandTimeout: number;
}

export const DEFAULT_COMMAND_TIMEOUT = 30000;

/**
 * Creates a tool context, filling in defaults for anything not given
 */
export function createToolContext(overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    buffers: overrides.buffers ?? new BufferStore(),
    workingDirectory: resolve(overrides.workingDirectory ?? process.cwd()),
    shell: overrides.shell ?? '/bin/sh',
    commandTimeout: overrides.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT,
  };
}

/**
 * Settings the tools read from configuration
 */
export interface ToolSettings {
  workingDirectory: string;
  shell: string;
  commandTimeout: number;
}

/**
 * Creates a tool context from configured settings
 */
export function toolContextFromSettings(settings: ToolSettings, buffers: BufferStore = new BufferStore()): ToolContext {
  return createToolContext({ ...settings, buffers });
}
