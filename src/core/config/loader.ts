/**
 * Project configuration in `.appforge/config.yaml`. Every key has a default,
 * so a project without the file behaves like one with an empty file.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, SystemError, ErrorCodes } from '../../utils/errors.js';

export const CONFIG_DIR = '.appforge';
const CONFIG_FILE = 'config.yaml';

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function mergeConfig(partial: Record<string, unknown>): Config {
  return ConfigSchema.parse(partial);
}

export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Load the project config. `configPath`, relative to the root, replaces the
 * default location and must exist; the default location may be absent.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const file = configPath === undefined ? getConfigPath(projectRoot) : path.resolve(projectRoot, configPath);

  if (!(await fileExists(file))) {
    if (configPath === undefined) return getDefaultConfig();
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${file}`, { path: file });
  }

  try {
    return await loadYamlWithSchema(file, ConfigSchema);
  } catch (error) {
    if (!(error instanceof SystemError)) throw error;
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Invalid config: ${error.message}`, {
      path: file,
      cause: error.code,
      issues: error.details?.issues,
    });
  }
}
