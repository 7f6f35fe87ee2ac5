import { toJSONSchema, validateAgainstSchema, type ToolDescriptor } from '../tools/tool-system.js';

/**
 * Raised when a host passes arguments that do not fit a tool's schema
 */
export class ToolArgumentError extends Error {
  readonly toolName: string;
  readonly errors: string[];

  constructor(toolName: string, errors: string[]) {
    super(`Invalid arguments for ${toolName}: ${errors.join('; ')}`);
    this.name = 'ToolArgumentError';
    this.toolName = toolName;
    this.errors = errors;
  }
}

/**
 * Validates named arguments and runs the descriptor's handler
 */
export async function invokeDescriptor(descriptor: ToolDescriptor, args: Record<string, unknown>): Promise<string> {
  const validation = validateAgainstSchema(toJSONSchema(descriptor.args), args);
  if (!validation.valid) {
    throw new ToolArgumentError(descriptor.name, validation.errors ?? []);
  }
  return descriptor.handler(args);
}

/**
 * Maps positional values onto the descriptor's declared argument order.
 * null and undefined mean the argument was not given.
 */
export function positionalToNamed(descriptor: ToolDescriptor, values: readonly unknown[]): Record<string, unknown> {
  if (values.length > descriptor.args.length) {
    throw new ToolArgumentError(descriptor.name, [
      `Expected at most ${descriptor.args.length} arguments, got ${values.length}`,
    ]);
  }

  const named: Record<string, unknown> = {};
  descriptor.args.forEach((arg, index) => {
    const value = values[index];
    if (value !== undefined && value !== null) {
      named[arg.name] = value;
    }
  });
  return named;
}
