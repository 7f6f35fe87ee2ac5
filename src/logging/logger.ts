import { appendFile, mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Fields attached to every entry. Tool calls carry `tool` and `callId`.
 */
export interface LogContext {
  tool?: string;
  callId?: string;
  [key: string]: unknown;
}

/**
 * One line of the log file
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  stack?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  path: string;
  /** Bytes after which the file rolls over to `<path>.1` */
  maxSize: number;
  /** Rolled-over files kept beside the live one */
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: 'edit-tools.log',
  maxSize: 10 * 1024 * 1024,
  maxFiles: 5,
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function sizeOf(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
}

/**
 * Append-only file that rolls over by size into `<path>.1` … `<path>.<maxFiles>`.
 *
 * Appends are queued, so concurrent tool calls never interleave a roll-over
 * with a write.
 */
export class RotatingFile {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly path: string,
    private readonly maxSize: number,
    private readonly maxFiles: number,
  ) {}

  append(line: string): Promise<void> {
    const next = this.queue.then(() => this.appendNow(line));
    // The caller sees the failure; the queue itself moves on
    this.queue = next.catch(() => undefined);
    return next;
  }

  /**
   * The live file followed by the rolled-over ones that exist, newest first
   */
  async files(): Promise<string[]> {
    const found: string[] = [];
    for (const candidate of [this.path, ...this.rolledPaths()]) {
      if ((await sizeOf(candidate)) !== undefined) {
        found.push(candidate);
      }
    }
    return found;
  }

  private rolledPaths(): string[] {
    return Array.from({ length: this.maxFiles }, (_, i) => `${this.path}.${i + 1}`);
  }

  private async appendNow(line: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });

    const size = await sizeOf(this.path);
    if (size !== undefined && size >= this.maxSize) {
      await this.roll();
    }

    await appendFile(this.path, line, 'utf-8');
  }

  private async roll(): Promise<void> {
    const rolled = this.rolledPaths();
    const oldest = rolled[rolled.length - 1];
    if (oldest === undefined) {
      await rm(this.path, { force: true });
      return;
    }

    await rm(oldest, { force: true });
    for (let i = rolled.length - 1; i > 0; i--) {
      const from = rolled[i - 1];
      const to = rolled[i];
      if (from !== undefined && to !== undefined && (await sizeOf(from)) !== undefined) {
        await rename(from, to);
      }
    }
    await rename(this.path, `${this.path}.1`);
  }
}

/**
 * JSON-lines logger for tool calls.
 *
 * The usual entry point is `forCall`, which stamps every entry with the tool
 * name and call id. Children share the parent's file.
 */
export class Logger {
  private minLevel: LogLevel;
  private readonly sink: RotatingFile;
  private readonly context: LogContext;

  constructor(config: Partial<LoggerConfig> = {}, context: LogContext = {}, sink?: RotatingFile) {
    const { level, path, maxSize, maxFiles } = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.minLevel = level;
    this.sink = sink ?? new RotatingFile(path, maxSize, maxFiles);
    this.context = context;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  set level(level: LogLevel) {
    this.minLevel = level;
  }

  get path(): string {
    return this.sink.path;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  child(context: LogContext): Logger {
    return new Logger({ level: this.minLevel }, { ...this.context, ...context }, this.sink);
  }

  forCall(tool: string, callId: string): Logger {
    return this.child({ tool, callId });
  }

  /**
   * Writes one entry. An `Error` contributes its stack; anything else thrown
   * is recorded as `context.thrown`.
   */
  async log(level: LogLevel, message: string, context: LogContext = {}, error?: unknown): Promise<void> {
    if (!this.shouldLog(level)) return;

    const merged: LogContext = { ...this.context, ...context };
    if (error !== undefined && !(error instanceof Error)) {
      merged['thrown'] = String(error);
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }
    if (error instanceof Error && error.stack) {
      entry.stack = error.stack;
    }

    await this.sink.append(`${JSON.stringify(entry)}\n`);
  }

  debug(message: string, context?: LogContext): Promise<void> {
    return this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): Promise<void> {
    return this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): Promise<void> {
    return this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): Promise<void> {
    return this.log('error', message, context, error);
  }

  listLogFiles(): Promise<string[]> {
    return this.sink.files();
  }
}
