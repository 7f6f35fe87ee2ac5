import { readFile, writeFile, mkdir, access, constants } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import type { TextTarget } from './text-target.js';

/**
 * FileTarget - TextTarget backed by a file on disk
 *
 * Reads and writes are whole-file operations. Missing parent directories
 * are created on write.
 */
export class FileTarget implements TextTarget {
  readonly kind = 'file' as const;
  readonly name: string;
  private readonly absolutePath: string;

  /**
   * @param path - Path as given by the caller, kept for messages
   * @param baseDir - Directory relative paths resolve against
   */
  constructor(path: string, baseDir: string = process.cwd()) {
    this.name = path;
    this.absolutePath = isAbsolute(path) ? path : resolve(baseDir, path);
  }

  get path(): string {
    return this.absolutePath;
  }

  async read(): Promise<string> {
    return readFile(this.absolutePath, 'utf-8');
  }

  async write(content: string): Promise<void> {
    await mkdir(dirname(this.absolutePath), { recursive: true });
    await writeFile(this.absolutePath, content, { encoding: 'utf-8' });
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.absolutePath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }
}
