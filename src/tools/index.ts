/**
 * Tool System - Tool descriptors, validation, and execution
 */

export {
  ToolSystem,
  ToolTimeoutError,
  toJSONSchema,
  toDefinition,
  validateAgainstSchema,
  type ToolArg,
  type ToolArgType,
  type ToolDescriptor,
  type ToolDefinition,
  type ToolCall,
  type ToolResult,
  type ToolError,
  type ToolHandler,
  type JSONSchema,
  type JSONSchemaProperty,
  type ValidationResult,
} from './tool-system.js';

export {
  createToolContext,
  toolContextFromSettings,
  DEFAULT_COMMAND_TIMEOUT,
  type ToolContext,
  type ToolSettings,
} from './tool-context.js';

export {
  createCoreTools,
  createCoreToolSystem,
  CORE_TOOL_NAMES,
  type CoreToolName,
} from './core-tools.js';

export {
  runCommand,
  formatCommandResult,
  NO_OUTPUT_MESSAGE,
  MAX_COMMAND_TIMEOUT,
  type CommandOptions,
  type CommandResult,
} from './shell-tools.js';

export {
  globFiles,
  searchFiles,
  listDirectory,
  NO_FILES_MESSAGE,
  NO_MATCHES_MESSAGE,
} from './search-tools.js';

export { fileBinding, bufferBinding, type TargetBinding } from './target-tools.js';
