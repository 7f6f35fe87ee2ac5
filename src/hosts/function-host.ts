import { toJSONSchema, type JSONSchema, type ToolDescriptor } from '../tools/tool-system.js';
import { ActiveToolList, installTools, type ActiveTools } from './active-tools.js';
import { invokeDescriptor } from './invoke.js';

/**
 * Tool object for hosts that speak function-calling JSON schema and pass
 * arguments as one named object
 */
export interface FunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JSONSchema;
  };
  execute(args: Record<string, unknown>): Promise<string>;
}

export function toFunctionTool(descriptor: ToolDescriptor): FunctionTool {
  return {
    type: 'function',
    function: {
      name: descriptor.name,
      description: descriptor.description,
      parameters: toJSONSchema(descriptor.args),
    },
    execute: (args) => invokeDescriptor(descriptor, args),
  };
}

export function createFunctionToolList(): ActiveToolList<FunctionTool> {
  return new ActiveToolList<FunctionTool>((tool) => tool.function.name);
}

/**
 * Registers the descriptors with a function-calling host
 */
export function registerFunctionTools(
  host: ActiveTools<FunctionTool>,
  descriptors: readonly ToolDescriptor[],
): FunctionTool[] {
  return installTools(host, descriptors, toFunctionTool);
}
