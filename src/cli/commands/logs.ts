/**
 * Logs command - View recent log entries
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadConfig, resolveStatePaths } from '../utils/runtime.js';
import { type LogLevel, LOG_LEVELS, type LogEntry } from '../../logging/logger.js';

interface LogsOptions {
  level?: string;
  lines?: number;
}

/**
 * Creates the logs command
 */
export function logsCommand(): Command {
  const cmd = new Command('logs');

  cmd
    .description('View the tool call log')
    .option('-l, --level <level>', 'Filter by minimum log level (debug, info, warn, error)')
    .option('-n, --lines <count>', 'Number of lines to show', (value) => Number.parseInt(value, 10))
    .action(async (options: LogsOptions) => {
      await runLogs(options);
    });

  return cmd;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

async function runLogs(options: LogsOptions): Promise<void> {
  const paths = resolveStatePaths();
  const { manager } = await loadConfig(paths);
  const logPath = join(paths.logsDir, manager.config.logging.file);

  let minLevel: LogLevel | undefined;
  if (options.level !== undefined) {
    if (!isLogLevel(options.level)) {
      console.error(`Invalid log level: ${options.level}`);
      console.error('Valid levels: debug, info, warn, error');
      process.exit(1);
    }
    minLevel = options.level;
  }

  let content: string;
  try {
    content = await readFile(logPath, 'utf-8');
  } catch {
    console.log('No log file found.');
    return;
  }

  for (const entry of selectEntries(content, minLevel, options.lines ?? 50)) {
    console.log(formatEntry(entry));
  }
}

/**
 * Parses a log line into a LogEntry
 */
export function parseLine(line: string): LogEntry | null {
  try {
    const parsed: unknown = JSON.parse(line);
    if (
      parsed !== null &&
      typeof parsed === 'object' &&
      'level' in parsed &&
      'message' in parsed &&
      'timestamp' in parsed &&
      typeof parsed.level === 'string' &&
      isLogLevel(parsed.level) &&
      typeof parsed.message === 'string' &&
      typeof parsed.timestamp === 'string'
    ) {
      const entry: LogEntry = { timestamp: parsed.timestamp, level: parsed.level, message: parsed.message };
      if ('context' in parsed && parsed.context !== null && typeof parsed.context === 'object') {
        entry.context = Object.fromEntries(Object.entries(parsed.context));
      }
      if ('stack' in parsed && typeof parsed.stack === 'string') {
        entry.stack = parsed.stack;
      }
      return entry;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Takes the last `lineCount` lines of a log and keeps entries at or above `minLevel`
 */
export function selectEntries(content: string, minLevel: LogLevel | undefined, lineCount: number): LogEntry[] {
  const lines = content.trim().split('\n').slice(-lineCount);
  const entries: LogEntry[] = [];

  for (const line of lines) {
    const entry = parseLine(line);
    if (entry && (!minLevel || LOG_LEVELS[entry.level] >= LOG_LEVELS[minLevel])) {
      entries.push(entry);
    }
  }

  return entries;
}

/**
 * Formats a log entry as `[time] LEVEL message key=value ...`
 */
export function formatEntry(entry: LogEntry): string {
  const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const level = entry.level.toUpperCase().padEnd(5);

  let output = `[${time}] ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    output += ` ${contextStr}`;
  }

  if (entry.stack) {
    output += `\n${entry.stack}`;
  }

  return output;
}
