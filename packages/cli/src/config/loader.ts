/**
 * Configuration loader using cosmiconfig for file discovery and Zod for validation.
 *
 * @module config/loader
 */

import { cosmiconfig } from 'cosmiconfig';
import { ConfigSchema, parseConfig, type Column, type Config } from './schema.js';
import { logger } from '../utils/logger.js';

/**
 * Search places for cosmiconfig to look for configuration files.
 */
const SEARCH_PLACES = [
  '.rowcastrc',
  '.rowcastrc.json',
  '.rowcastrc.yaml',
  '.rowcastrc.yml',
  '.rowcastrc.js',
  '.rowcastrc.cjs',
  '.config/rowcast/config.yaml',
  '.config/rowcast/config.yml',
  '.config/rowcast/config.json',
  'rowcast.config.js',
  'rowcast.config.cjs',
];

/**
 * Output settings that command-line flags can override.
 */
export interface OutputOverrides {
  format?: string;
  file?: string;
}

/**
 * Create a cosmiconfig explorer for rowcast configuration.
 */
function createExplorer() {
  return cosmiconfig('rowcast', {
    searchPlaces: SEARCH_PLACES,
  });
}

/**
 * Load configuration from file or defaults.
 *
 * @param configPath - Explicit config file path (optional)
 * @param searchFrom - Directory to search from (optional, defaults to cwd)
 * @returns Validated configuration
 */
export async function loadConfig(configPath?: string, searchFrom?: string): Promise<Config> {
  const explorer = createExplorer();

  logger.debug(`Loading config${configPath ? ` from: ${configPath}` : '...'}`);

  try {
    const result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);

    if (result && !result.isEmpty) {
      logger.debug(`Config loaded from: ${result.filepath}`);

      if (result.filepath.endsWith('.js') || result.filepath.endsWith('.cjs')) {
        logger.warn(
          `Loading config from JavaScript file: ${result.filepath}\n` +
            `  Only use .js config files from sources you trust.`
        );
      }

      return parseConfig(result.config);
    }

    logger.debug('No config file found, using defaults');
    return parseConfig({});
  } catch (error) {
    if (error instanceof Error) {
      logger.error(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Get the path to the active configuration file, if any.
 *
 * @param configPath - Explicit config file path (optional)
 * @param searchFrom - Directory to search from (optional)
 * @returns Path to config file, or null if none found
 */
export async function getConfigPath(configPath?: string, searchFrom?: string): Promise<string | null> {
  if (configPath) {
    return configPath;
  }

  const explorer = createExplorer();

  try {
    const result = await explorer.search(searchFrom);
    return result && !result.isEmpty ? result.filepath : null;
  } catch (error) {
    logger.debug(`Config search failed: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * Merge file configuration with command-line output overrides.
 *
 * Flags that were given take precedence; the result is validated again so
 * defaults still apply.
 *
 * @param fileConfig - Configuration loaded from file
 * @param overrides - Output settings from command-line flags
 * @returns Merged and validated configuration
 */
export function mergeConfig(fileConfig: Config, overrides: OutputOverrides): Config {
  logger.debug('Merging file config with CLI flags');

  const output = { ...fileConfig.output };
  if (overrides.format !== undefined) {
    output.format = overrides.format;
  }
  if (overrides.file !== undefined) {
    output.file = overrides.file;
  }

  const result = ConfigSchema.parse({ ...fileConfig, output });

  logger.debug(`Merged config: format=${result.output.format}, file=${result.output.file || '(stdout)'}`);

  return result;
}

/**
 * Resolve the columns of a named shape.
 *
 * @param config - Full configuration with shapes
 * @param shapeName - Shape to use (falls back to the configured default)
 * @returns The shape's columns, or null when no shape is named or defaulted
 * @throws Error if the named shape does not exist
 */
export function resolveShape(config: Config, shapeName?: string): Column[] | null {
  const target = shapeName ?? config.default;
  if (!target) {
    return null;
  }

  const shapes = config.shapes ?? {};
  const shape = shapes[target];
  if (!shape) {
    const available = Object.keys(shapes).join(', ') || '(none)';
    throw new Error(`Shape '${target}' not found. Available shapes: ${available}`);
  }

  return shape.columns;
}

/**
 * Re-export types and utilities for convenience.
 */
export { ConfigSchema, type Config, type Column } from './schema.js';
