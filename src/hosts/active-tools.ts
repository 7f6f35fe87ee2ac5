import type { ToolDescriptor } from '../tools/tool-system.js';

/**
 * A host's collection of active tools, owned by the host.
 * Adapters only upsert into it: remove any entry of the same name, then
 * register the new entry at the front.
 */
export interface ActiveTools<T> {
  registerTool(tool: T): void;
  removeByName(name: string): void;
  list(): readonly T[];
}

/**
 * ActiveToolList - In-memory ActiveTools, most recently registered first
 */
export class ActiveToolList<T> implements ActiveTools<T> {
  private tools: T[] = [];
  private readonly nameOf: (tool: T) => string;

  constructor(nameOf: (tool: T) => string) {
    this.nameOf = nameOf;
  }

  registerTool(tool: T): void {
    this.tools.unshift(tool);
  }

  removeByName(name: string): void {
    this.tools = this.tools.filter((tool) => this.nameOf(tool) !== name);
  }

  list(): readonly T[] {
    return this.tools;
  }

  names(): string[] {
    return this.tools.map(this.nameOf);
  }

  find(name: string): T | undefined {
    return this.tools.find((tool) => this.nameOf(tool) === name);
  }
}

/**
 * Upserts one host tool per descriptor, in order.
 * The last descriptor ends up first; installing again yields the same collection.
 */
export function installTools<T>(
  host: ActiveTools<T>,
  descriptors: readonly ToolDescriptor[],
  build: (descriptor: ToolDescriptor) => T,
): T[] {
  const installed: T[] = [];
  for (const descriptor of descriptors) {
    const tool = build(descriptor);
    host.removeByName(descriptor.name);
    host.registerTool(tool);
    installed.push(tool);
  }
  return installed;
}
