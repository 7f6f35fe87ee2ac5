import { spawn } from 'node:child_process';
import { ToolTimeoutError, type ToolDescriptor } from './tool-system.js';
import { optionalNumberArg, stringArg } from './tool-args.js';
import type { ToolContext } from './tool-context.js';

export const NO_OUTPUT_MESSAGE = 'Command executed successfully (no output)';

/** Largest delay setTimeout honours; longer timeouts are clamped to it */
export const MAX_COMMAND_TIMEOUT = 2_147_483_647;

export interface CommandOptions {
  cwd: string;
  shell: string;
  timeout: number;
}

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr in arrival order */
  output: string;
}

/**
 * Runs a command through a shell and captures its combined output.
 * The child is killed with SIGTERM once the timeout elapses; stdin is closed.
 */
export function runCommand(command: string, options: CommandOptions): Promise<CommandResult> {
  if (!(options.timeout > 0)) {
    return Promise.reject(new RangeError(`Timeout must be a positive number of milliseconds, got ${options.timeout}`));
  }
  const timeout = Math.min(options.timeout, MAX_COMMAND_TIMEOUT);

  return new Promise((resolve, reject) => {
    const child = spawn(command, {
      shell: options.shell,
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let output = '';
    let settled = false;

    child.stdout.on('data', (data: Buffer) => {
      output += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      output += data.toString();
    });

    const timeoutId = setTimeout(() => {
      settled = true;
      child.kill('SIGTERM');
      reject(new ToolTimeoutError(`Command timed out after ${timeout}ms`, timeout));
    }, timeout);

    child.on('close', (code) => {
      clearTimeout(timeoutId);
      if (settled) return;
      settled = true;
      resolve({ exitCode: code ?? -1, output });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      if (settled) return;
      settled = true;
      reject(error);
    });
  });
}

/**
 * Turns a command result into the text reported to the agent
 */
export function formatCommandResult(result: CommandResult): string {
  if (result.output.length > 0) {
    return result.output;
  }
  return result.exitCode === 0
    ? NO_OUTPUT_MESSAGE
    : `Command exited with code ${result.exitCode} (no output)`;
}

export function createBashTool(context: ToolContext): ToolDescriptor {
  return {
    name: 'Bash',
    description:
      'Execute a shell command and return its combined stdout and stderr. ' +
      'Commands run in the working directory and are killed when the timeout elapses.',
    category: 'shell',
    args: [
      { name: 'command', type: 'string', description: 'The shell command to execute', required: true },
      {
        name: 'timeout',
        type: 'number',
        description: `Timeout in milliseconds (default: ${context.commandTimeout})`,
      },
    ],
    handler: async (args) => {
      const result = await runCommand(stringArg(args, 'command'), {
        cwd: context.workingDirectory,
        shell: context.shell,
        timeout: optionalNumberArg(args, 'timeout') ?? context.commandTimeout,
      });
      return formatCommandResult(result);
    },
  };
}
