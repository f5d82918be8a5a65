import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import type { AdapterBudget } from '../../adapters/boundary.js';
import { ConfigurationError, ErrorCodes, GateError, errorMessage } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';

export const DEFAULT_CONFIG_PATH = '.layergate/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * A missing default file yields the defaults; a missing file that was asked
 * for explicitly is a configuration error.
 */
export async function loadConfig(repoRoot: string, configPath?: string): Promise<Config> {
  const fullPath = configPath !== undefined ? path.resolve(repoRoot, configPath) : getConfigPath(repoRoot);

  if (!(await fileExists(fullPath))) {
    if (configPath !== undefined) {
      throw new ConfigurationError(ErrorCodes.CONFIG_LOAD, `Config file not found: ${fullPath}`, { path: fullPath });
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof GateError) {
      throw new ConfigurationError(error.code, `Invalid config ${fullPath}: ${error.message}`, {
        path: fullPath,
        ...error.details,
      });
    }
    throw new ConfigurationError(ErrorCodes.CONFIG_LOAD, `Failed to load config from ${fullPath}: ${errorMessage(error)}`, {
      path: fullPath,
    });
  }
}

/**
 * Get the expected config file path for a repository.
 */
export function getConfigPath(repoRoot: string): string {
  return path.resolve(repoRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Adapter budget from the engine section.
 */
export function budgetFromConfig(config: Config): AdapterBudget {
  return {
    maxFileBytes: config.engine.max_file_bytes,
    timeoutMs: config.engine.file_timeout_ms,
    maxAttempts: config.engine.max_attempts,
  };
}
