/**
 * agent-edit-tools - File, shell and buffer tools for editor-hosted LLM agents
 */

export {
  FileTarget,
  BufferStore,
  BufferTarget,
  BufferNotFoundError,
  type TextTarget,
  type TextTargetKind,
} from './targets/index.js';

export {
  replaceSingle,
  countOccurrences,
  editTarget,
  replaceTarget,
  viewTarget,
  sliceLines,
  type ReplaceOutcome,
  type ViewOptions,
} from './editing/text-edit.js';

export * from './tools/index.js';

export * from './hosts/index.js';

export {
  ConfigManager,
  EditToolsConfigSchema,
  DEFAULT_CONFIG,
  type EditToolsConfig,
  type PartialEditToolsConfig,
  type ConfigValidationResult,
} from './config/config-manager.js';

export {
  Logger,
  RotatingFile,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  type LogLevel,
  type LogContext,
  type LoggerConfig,
  type LogEntry,
} from './logging/logger.js';
