import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigSchema, type Config, type WizardConfig } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_FILE = 'service-wizard.yaml';

/**
 * Template root shipped with the package.
 */
export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL('../../../templates/', import.meta.url));

function resolveConfig(config: Config, baseDir: string): WizardConfig {
  return {
    ...config,
    templates_dir: config.templates_dir
      ? path.resolve(baseDir, config.templates_dir)
      : path.resolve(BUNDLED_TEMPLATES_DIR),
  };
}

/**
 * Default configuration, used when no config file exists.
 */
export function getDefaultConfig(): WizardConfig {
  return resolveConfig(ConfigSchema.parse({}), process.cwd());
}

/**
 * Load configuration once at process start.
 * An explicit path must exist; the implicit service-wizard.yaml may be absent.
 * A relative templates_dir resolves against the config file's directory.
 */
export async function loadConfig(
  workingDir: string,
  configPath?: string
): Promise<WizardConfig> {
  const fullPath = path.resolve(workingDir, configPath ?? DEFAULT_CONFIG_FILE);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, {
        path: fullPath,
      });
    }
    return resolveConfig(ConfigSchema.parse({}), workingDir);
  }

  try {
    const config = await loadYamlWithSchema(fullPath, ConfigSchema);
    return resolveConfig(config, path.dirname(fullPath));
  } catch (error) {
    if (error instanceof Error) {
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
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>, baseDir: string = process.cwd()): WizardConfig {
  return resolveConfig(ConfigSchema.parse(partial), baseDir);
}
