import type { ToolArgType, ToolDescriptor } from '../tools/tool-system.js';
import { ActiveToolList, installTools, type ActiveTools } from './active-tools.js';
import { invokeDescriptor, positionalToNamed } from './invoke.js';

export interface ArgListToolArg {
  name: string;
  type: ToolArgType;
  description: string;
  optional?: boolean;
}

/**
 * Tool object for hosts that declare arguments as an ordered list and call
 * the tool with positional values
 */
export interface ArgListTool {
  name: string;
  description: string;
  category: string;
  args: ArgListToolArg[];
  function(...values: unknown[]): Promise<string>;
}

export function toArgListTool(descriptor: ToolDescriptor): ArgListTool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    category: descriptor.category,
    args: descriptor.args.map((arg) => ({
      name: arg.name,
      type: arg.type,
      description: arg.description,
      ...(arg.required ? {} : { optional: true }),
    })),
    function: async (...values) => invokeDescriptor(descriptor, positionalToNamed(descriptor, values)),
  };
}

export function createArgListToolList(): ActiveToolList<ArgListTool> {
  return new ActiveToolList<ArgListTool>((tool) => tool.name);
}

/**
 * Registers the descriptors with an argument-list host
 */
export function registerArgListTools(
  host: ActiveTools<ArgListTool>,
  descriptors: readonly ToolDescriptor[],
): ArgListTool[] {
  return installTools(host, descriptors, toArgListTool);
}
