import { mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigManager, type ConfigValidationResult, type EditToolsConfig } from '../../config/config-manager.js';
import { Logger } from '../../logging/logger.js';
import { ToolSystem } from '../../tools/tool-system.js';
import { createCoreToolSystem } from '../../tools/core-tools.js';
import { toolContextFromSettings } from '../../tools/tool-context.js';

/**
 * Where the CLI keeps its state: `config.json` and `logs/` under one root,
 * `$EDIT_TOOLS_HOME` or `~/.edit-tools`
 */
export interface StatePaths {
  root: string;
  configFile: string;
  logsDir: string;
}

export function resolveStatePaths(env: NodeJS.ProcessEnv = process.env): StatePaths {
  const home = env['EDIT_TOOLS_HOME'];
  const root = home ? resolve(home) : join(homedir(), '.edit-tools');
  return { root, configFile: join(root, 'config.json'), logsDir: join(root, 'logs') };
}

/**
 * Creates the state root and its logs directory, readable by the owner only
 */
export async function ensureStateDirs(paths: StatePaths): Promise<void> {
  await mkdir(paths.logsDir, { recursive: true, mode: 0o700 });
}

export interface LoadedConfig {
  manager: ConfigManager;
  result: ConfigValidationResult;
}

export async function loadConfig(paths: StatePaths, env: NodeJS.ProcessEnv = process.env): Promise<LoadedConfig> {
  const manager = new ConfigManager(paths.configFile, env);
  const result = await manager.load();
  return { manager, result };
}

/**
 * Prints configuration errors and exits
 */
export function failOnConfigErrors(result: ConfigValidationResult): EditToolsConfig {
  if (result.success && result.config) {
    return result.config;
  }
  console.error('Configuration error:');
  for (const error of result.errors ?? []) {
    console.error(`  - ${error}`);
  }
  process.exit(1);
}

/**
 * Builds the logger the configuration asks for, if logging is enabled.
 * The configured file name lives under the logs directory.
 */
export function createLogger(config: EditToolsConfig, paths: StatePaths): Logger | undefined {
  const { enabled, level, file, maxSize, maxFiles } = config.logging;
  return enabled ? new Logger({ level, path: join(paths.logsDir, file), maxSize, maxFiles }) : undefined;
}

export interface CliRuntime {
  paths: StatePaths;
  config: EditToolsConfig;
  logger: Logger | undefined;
  toolSystem: ToolSystem;
}

export interface RuntimeOverrides {
  workingDirectory?: string;
}

/**
 * Loads configuration and logger and registers the core tools
 */
export async function loadRuntime(overrides: RuntimeOverrides = {}): Promise<CliRuntime> {
  const paths = resolveStatePaths();
  await ensureStateDirs(paths);

  const config = failOnConfigErrors((await loadConfig(paths)).result);
  const logger = createLogger(config, paths);

  const context = toolContextFromSettings({
    ...config.tools,
    workingDirectory: overrides.workingDirectory ?? config.tools.workingDirectory,
  });
  const toolSystem = createCoreToolSystem(context, new ToolSystem(logger));

  return { paths, config, logger, toolSystem };
}
