import { z } from 'zod';
import { readFile, writeFile, rename, unlink, access, constants } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Configuration schema using Zod for validation
 */
export const EditToolsConfigSchema = z.object({
  tools: z.object({
    workingDirectory: z.string().min(1).default('.'),
    shell: z.string().min(1).default('/bin/sh'),
    commandTimeout: z.number().int().min(1).max(3_600_000).default(30000),
  }).default({}),

  logging: z.object({
    enabled: z.boolean().default(true),
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    file: z.string().min(1).regex(/^(?!\.\.?$)[^/\\]+$/, 'must be a file name, not a path').default('edit-tools.log'),
    maxSize: z.number().int().min(1024).default(10 * 1024 * 1024), // 10MB
    maxFiles: z.number().int().min(1).max(100).default(5),
  }).default({}),
});

/**
 * Type for the full configuration
 */
export type EditToolsConfig = z.infer<typeof EditToolsConfigSchema>;

/**
 * Type for partial configuration (user overrides)
 */
export type PartialEditToolsConfig = z.input<typeof EditToolsConfigSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: EditToolsConfig = EditToolsConfigSchema.parse({});

/**
 * Environment variable prefix for configuration overrides
 */
const ENV_PREFIX = 'EDIT_TOOLS_';

type EnvValueKind = 'string' | 'integer' | 'boolean';

/**
 * Mapping of environment variables to config paths
 */
const ENV_MAPPINGS: Record<string, { path: [string, string]; kind: EnvValueKind }> = {
  [`${ENV_PREFIX}WORKING_DIRECTORY`]: { path: ['tools', 'workingDirectory'], kind: 'string' },
  [`${ENV_PREFIX}SHELL`]: { path: ['tools', 'shell'], kind: 'string' },
  [`${ENV_PREFIX}COMMAND_TIMEOUT`]: { path: ['tools', 'commandTimeout'], kind: 'integer' },
  [`${ENV_PREFIX}LOGGING_ENABLED`]: { path: ['logging', 'enabled'], kind: 'boolean' },
  [`${ENV_PREFIX}LOGGING_LEVEL`]: { path: ['logging', 'level'], kind: 'string' },
  [`${ENV_PREFIX}LOGGING_FILE`]: { path: ['logging', 'file'], kind: 'string' },
  [`${ENV_PREFIX}LOGGING_MAX_SIZE`]: { path: ['logging', 'maxSize'], kind: 'integer' },
  [`${ENV_PREFIX}LOGGING_MAX_FILES`]: { path: ['logging', 'maxFiles'], kind: 'integer' },
};

/**
 * Result of configuration validation
 */
export interface ConfigValidationResult {
  success: boolean;
  config?: EditToolsConfig;
  errors?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * ConfigManager - Manages configuration loading, validation, and persistence
 *
 * Precedence is defaults, then the JSON file, then EDIT_TOOLS_* environment
 * variables. Saves go through a temp file and a rename.
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: EditToolsConfig;
  private env: NodeJS.ProcessEnv;

  /**
   * @param configPath - Path to the configuration file
   * @param env - Environment to read overrides from (default: process.env)
   */
  constructor(configPath: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
    this.env = env;
  }

  get config(): EditToolsConfig {
    return this.currentConfig;
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Loads configuration with precedence: defaults → file → environment
   */
  async load(): Promise<ConfigValidationResult> {
    let fileConfig: Record<string, unknown> = {};

    // Try to load from file
    try {
      const content = await readFile(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isRecord(parsed)) {
        return { success: false, errors: ['Config file must contain a JSON object'] };
      }
      fileConfig = parsed;
    } catch (error) {
      // A missing file means defaults
      const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
      if (!missing) {
        return {
          success: false,
          errors: [`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`],
        };
      }
    }

    // Apply environment variable overrides
    const envErrors: string[] = [];
    const envOverrides = this.getEnvironmentOverrides(envErrors);
    if (envErrors.length > 0) {
      return { success: false, errors: envErrors };
    }

    return this.validate(this.deepMerge(fileConfig, envOverrides));
  }

  /**
   * Validates a partial configuration and returns the full config with defaults
   */
  validate(partialConfig: unknown): ConfigValidationResult {
    const result = EditToolsConfigSchema.safeParse(partialConfig);

    if (result.success) {
      this.currentConfig = result.data;
      return {
        success: true,
        config: result.data,
      };
    }

    // Format Zod errors into clear messages
    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `Configuration error at '${path}': ${issue.message}`;
    });

    return {
      success: false,
      errors,
    };
  }

  /**
   * Saves the current configuration to file atomically
   */
  async save(config?: PartialEditToolsConfig): Promise<void> {
    const configToSave = config ?? this.currentConfig;

    const validation = this.validate(configToSave);
    if (!validation.success) {
      throw new Error(`Invalid configuration: ${validation.errors?.join(', ')}`);
    }

    await this.atomicWrite(this.configPath, JSON.stringify(configToSave, null, 2));
  }

  /**
   * Writes content to a file atomically using temp file + rename
   */
  async atomicWrite(filePath: string, content: string): Promise<void> {
    const dir = dirname(filePath);
    const tempPath = join(dir, `.config-${randomUUID()}.tmp`);

    try {
      await writeFile(tempPath, content, { mode: 0o600 });
      await rename(tempPath, filePath);
    } catch (error) {
      // Clean up temp file on failure
      const tempExists = await access(tempPath, constants.F_OK).then(() => true, () => false);
      if (tempExists) {
        await unlink(tempPath);
      }
      throw error;
    }
  }

  /**
   * Gets configuration overrides from environment variables
   */
  private getEnvironmentOverrides(errors: string[]): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
      const value = this.env[envVar];
      if (value === undefined) {
        continue;
      }

      const parsed = this.parseEnvValue(value, mapping.kind);
      if (parsed === undefined) {
        errors.push(`Invalid ${mapping.kind} value for ${envVar}: ${value}`);
        continue;
      }

      const [section, key] = mapping.path;
      const target = overrides[section];
      if (isRecord(target)) {
        target[key] = parsed;
      } else {
        overrides[section] = { [key]: parsed };
      }
    }

    return overrides;
  }

  /**
   * Parses an environment variable value; undefined when it does not parse
   */
  private parseEnvValue(value: string, kind: EnvValueKind): string | number | boolean | undefined {
    switch (kind) {
      case 'integer': {
        const num = Number.parseInt(value, 10);
        return Number.isNaN(num) ? undefined : num;
      }
      case 'boolean':
        if (value === 'true' || value === '1') return true;
        if (value === 'false' || value === '0') return false;
        return undefined;
      case 'string':
        return value;
    }
  }

  /**
   * Deep merges two configuration objects
   * Later values override earlier values
   */
  private deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };

    for (const [key, value] of Object.entries(overrides)) {
      const existing = result[key];
      result[key] = isRecord(value) && isRecord(existing) ? this.deepMerge(existing, value) : value;
    }

    return result;
  }

  /**
   * Gets a specific configuration value by dotted path
   */
  get(path: string): unknown {
    let current: unknown = this.currentConfig;

    for (const part of path.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[part];
    }

    return current;
  }

  /**
   * Sets a specific configuration value by dotted path
   */
  set(path: string, value: unknown): ConfigValidationResult {
    const parts = path.split('.');
    const newConfig: Record<string, unknown> = JSON.parse(JSON.stringify(this.currentConfig));

    let current = newConfig;
    for (const part of parts.slice(0, -1)) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    const lastPart = parts[parts.length - 1];
    if (lastPart !== undefined) {
      current[lastPart] = value;
    }

    return this.validate(newConfig);
  }
}
