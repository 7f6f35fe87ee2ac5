import type { TextTarget } from './text-target.js';

/**
 * Raised when a tool addresses a buffer that is not open
 */
export class BufferNotFoundError extends Error {
  readonly bufferName: string;

  constructor(bufferName: string) {
    super(`No buffer named '${bufferName}'`);
    this.name = 'BufferNotFoundError';
    this.bufferName = bufferName;
  }
}

/**
 * BufferStore - In-memory text buffers for one session
 *
 * Buffers keep their creation order; overwriting a buffer does not move it.
 */
export class BufferStore {
  private buffers: Map<string, string> = new Map();

  /**
   * Opens a buffer, creating it when missing.
   * An existing buffer keeps its content unless `content` is given.
   */
  open(name: string, content?: string): BufferTarget {
    if (content !== undefined || !this.buffers.has(name)) {
      this.buffers.set(name, content ?? '');
    }
    return new BufferTarget(this, name);
  }

  has(name: string): boolean {
    return this.buffers.has(name);
  }

  /**
   * @throws BufferNotFoundError if the buffer is not open
   */
  get(name: string): string {
    const content = this.buffers.get(name);
    if (content === undefined) {
      throw new BufferNotFoundError(name);
    }
    return content;
  }

  set(name: string, content: string): void {
    this.buffers.set(name, content);
  }

  /**
   * Closes a buffer, discarding its content
   */
  kill(name: string): boolean {
    return this.buffers.delete(name);
  }

  list(): string[] {
    return Array.from(this.buffers.keys());
  }

  /**
   * Returns a target for the named buffer without opening it
   */
  target(name: string): BufferTarget {
    return new BufferTarget(this, name);
  }
}

/**
 * BufferTarget - TextTarget view of one buffer in a BufferStore
 */
export class BufferTarget implements TextTarget {
  readonly kind = 'buffer' as const;
  readonly name: string;
  private readonly store: BufferStore;

  constructor(store: BufferStore, name: string) {
    this.store = store;
    this.name = name;
  }

  async read(): Promise<string> {
    return this.store.get(this.name);
  }

  async write(content: string): Promise<void> {
    this.store.set(this.name, content);
  }

  async exists(): Promise<boolean> {
    return this.store.has(this.name);
  }
}
