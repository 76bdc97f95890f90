import * as path from 'node:path';
import { ConfigSchema, type ConfigFileInput } from './schema.js';
import { buildConfig, type GeneratorConfig } from './model.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { BridgegenError, ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = 'bridgegen.yaml';

/**
 * Default configuration: every backend disabled.
 */
export function getDefaultConfig(): GeneratorConfig {
  return mergeConfig({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist. Relative folders in the
 * file resolve against the file's directory.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<GeneratorConfig> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return mergeConfig({}, { baseDir: projectRoot });
  }

  try {
    const input = await loadYamlWithSchema(fullPath, ConfigSchema);
    return buildConfig(input, { baseDir: path.dirname(fullPath) });
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    if (error instanceof BridgegenError) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Build configuration from an in-memory object, applying defaults.
 */
export function mergeConfig(
  partial: ConfigFileInput,
  options: { baseDir?: string } = {}
): GeneratorConfig {
  const result = ConfigSchema.safeParse(partial);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return buildConfig(result.data, options);
}

/** Settings the command line may override after loading. */
export interface ConfigOverrides {
  idlFileName?: string;
  skipGeneration?: boolean;
  /** Manifest file, already resolved. */
  outFileList?: string;
}

/**
 * Apply command-line overrides. Unset overrides keep the loaded values.
 */
export function applyOverrides(config: GeneratorConfig, overrides: ConfigOverrides): GeneratorConfig {
  return Object.freeze({
    ...config,
    idlFileName: overrides.idlFileName ?? config.idlFileName,
    skipGeneration: overrides.skipGeneration ?? config.skipGeneration,
    outFileList: overrides.outFileList ?? config.outFileList,
  });
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}
