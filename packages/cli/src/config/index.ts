/**
 * Configuration module for rowcast CLI.
 *
 * @module config
 */

export {
  ConfigSchema,
  ColumnSchema,
  ShapeSchema,
  OutputConfigSchema,
  FieldKindSchema,
  parseConfig,
  type Config,
  type Column,
  type Shape,
  type OutputConfig,
} from './schema.js';

export { loadConfig, mergeConfig, getConfigPath, resolveShape, type OutputOverrides } from './loader.js';
