import type { Logger } from '../logging/logger.js';

/**
 * JSON Schema type for tool parameter validation
 */
export interface JSONSchema {
  type: 'object' | 'string' | 'number' | 'boolean' | 'array';
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
  items?: JSONSchemaProperty;
  additionalProperties?: boolean;
}

export interface JSONSchemaProperty {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
  enum?: string[];
  default?: unknown;
  items?: JSONSchemaProperty;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
}

/**
 * Argument types a tool can declare; 'array' is an array of strings
 */
export type ToolArgType = 'string' | 'number' | 'array';

/**
 * One entry of a tool's ordered argument list
 */
export interface ToolArg {
  name: string;
  type: ToolArgType;
  description: string;
  required?: boolean;
}

/**
 * Tool handler function type
 */
export type ToolHandler = (args: Record<string, unknown>) => Promise<string>;

/**
 * Tool descriptor: metadata, argument schema and the operation behind it
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  category: string;
  args: readonly ToolArg[];
  handler: ToolHandler;
}

/**
 * Tool definition in function-calling form
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JSONSchema;
}

/**
 * Tool call request
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Tool execution result
 */
export interface ToolResult {
  callId: string;
  success: boolean;
  output?: string;
  error?: ToolError;
}

/**
 * Structured tool error
 */
export interface ToolError {
  toolName: string;
  errorType: 'validation' | 'execution' | 'timeout' | 'not_found';
  message: string;
  details?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Raised by handlers whose work ran past its deadline
 */
export class ToolTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'ToolTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Builds the JSON schema for an ordered argument list
 */
export function toJSONSchema(args: readonly ToolArg[]): JSONSchema {
  const properties: Record<string, JSONSchemaProperty> = {};
  const required: string[] = [];

  for (const arg of args) {
    properties[arg.name] =
      arg.type === 'array'
        ? { type: 'array', description: arg.description, items: { type: 'string' } }
        : { type: arg.type, description: arg.description };
    if (arg.required) {
      required.push(arg.name);
    }
  }

  return { type: 'object', properties, required, additionalProperties: false };
}

/**
 * Converts a descriptor into its function-calling definition
 */
export function toDefinition(descriptor: ToolDescriptor): ToolDefinition {
  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: toJSONSchema(descriptor.args),
  };
}

/**
 * Validates call arguments against a JSON schema
 */
export function validateAgainstSchema(schema: JSONSchema, args: Record<string, unknown>): ValidationResult {
  const errors: string[] = [];

  // Check required properties
  if (schema.required) {
    for (const required of schema.required) {
      if (args[required] === undefined || args[required] === null) {
        errors.push(`Missing required parameter: '${required}'`);
      }
    }
  }

  // Validate property types
  if (schema.properties) {
    for (const [key, value] of Object.entries(args)) {
      const propSchema = schema.properties[key];
      if (!propSchema) {
        if (schema.additionalProperties === false) {
          errors.push(`Unknown parameter: '${key}'`);
        }
        continue;
      }

      // Optional arguments may be passed explicitly as undefined or null
      if (value === undefined || value === null) {
        continue;
      }

      const typeError = validateType(key, value, propSchema);
      if (typeError) {
        errors.push(typeError);
      }
    }
  }

  return errors.length > 0 ? { valid: false, errors } : { valid: true };
}

/**
 * Validates a value against a JSON schema property type
 */
function validateType(key: string, value: unknown, schema: JSONSchemaProperty): string | null {
  const actualType = Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;

  if (schema.type !== actualType) {
    return `Parameter '${key}' must be of type '${schema.type}', got '${actualType}'`;
  }

  // Validate enum values
  if (schema.enum && typeof value === 'string') {
    if (!schema.enum.includes(value)) {
      return `Parameter '${key}' must be one of: ${schema.enum.join(', ')}`;
    }
  }

  // Validate array items
  if (schema.type === 'array' && Array.isArray(value) && schema.items) {
    for (let i = 0; i < value.length; i++) {
      const itemError = validateType(`${key}[${i}]`, value[i], schema.items);
      if (itemError) {
        return itemError;
      }
    }
  }

  return null;
}

/**
 * ToolSystem - Manages tool registration, validation, and execution
 *
 * Registering a name that is already present replaces the earlier entry.
 * Listing keeps registration order.
 */
export class ToolSystem {
  private tools: Map<string, ToolDescriptor> = new Map();
  private logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Registers a tool, replacing any tool of the same name
   */
  register(descriptor: ToolDescriptor): void {
    // Delete first so the replacement moves to the end of the listing
    this.tools.delete(descriptor.name);
    this.tools.set(descriptor.name, descriptor);
  }

  /**
   * Registers several tools in order
   */
  registerAll(descriptors: readonly ToolDescriptor[]): void {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Unregisters a tool by name
   */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  /**
   * Lists all registered tool definitions
   */
  list(): ToolDefinition[] {
    return Array.from(this.tools.values()).map(toDefinition);
  }

  /**
   * Lists the registered descriptors
   */
  descriptors(): ToolDescriptor[] {
    return Array.from(this.tools.values());
  }

  /**
   * Gets a tool definition by name
   */
  get(name: string): ToolDefinition | undefined {
    const descriptor = this.tools.get(name);
    return descriptor ? toDefinition(descriptor) : undefined;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Validates tool parameters against the tool's JSON schema
   */
  validateParameters(toolName: string, args: Record<string, unknown>): ValidationResult {
    const descriptor = this.tools.get(toolName);
    if (!descriptor) {
      return { valid: false, errors: [`Tool '${toolName}' not found`] };
    }
    return validateAgainstSchema(toJSONSchema(descriptor.args), args);
  }

  /**
   * Executes a tool call
   */
  async execute(call: ToolCall): Promise<ToolResult> {
    const descriptor = this.tools.get(call.name);
    const log = this.logger?.forCall(call.name, call.id);

    // Check if tool exists
    if (!descriptor) {
      await log?.warn('Unknown tool requested');
      return {
        callId: call.id,
        success: false,
        error: {
          toolName: call.name,
          errorType: 'not_found',
          message: `Tool '${call.name}' is not registered`,
        },
      };
    }

    // Validate parameters
    const validation = this.validateParameters(call.name, call.arguments);
    if (!validation.valid) {
      await log?.warn('Tool parameter validation failed', { errors: validation.errors });
      return {
        callId: call.id,
        success: false,
        error: {
          toolName: call.name,
          errorType: 'validation',
          message: `Parameter validation failed: ${validation.errors?.join('; ')}`,
          details: validation.errors,
        },
      };
    }

    // Execute the tool handler
    await log?.debug('Executing tool');
    try {
      const output = await descriptor.handler(call.arguments);
      return {
        callId: call.id,
        success: true,
        output,
      };
    } catch (error) {
      await log?.error('Tool execution failed', error);
      return {
        callId: call.id,
        success: false,
        error: {
          toolName: call.name,
          errorType: error instanceof ToolTimeoutError ? 'timeout' : 'execution',
          message: error instanceof Error ? error.message : String(error),
          details: error instanceof Error ? { stack: error.stack } : undefined,
        },
      };
    }
  }
}
