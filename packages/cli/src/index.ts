/**
 * @fileoverview Public API for @rowcast/cli package.
 *
 * Exports the CLI entry point, configuration loading and record-file
 * helpers used by the `rowcast` command.
 *
 * @module @rowcast/cli
 *
 * @example
 * ```typescript
 * import { main, setLogLevel } from '@rowcast/cli';
 *
 * setLogLevel('debug');
 * await main(['render', 'people.json', '--format', 'csv']);
 * ```
 */

import { logger, setLogLevel, getLogLevel, isDebugEnv, type LogLevel } from './utils/logger.js';

// Re-export logger utilities
export { logger, setLogLevel, getLogLevel, isDebugEnv, type LogLevel };

// Re-export command utilities
export { createCLI, createRenderCommand, createConfigCommand, VERSION } from './commands/index.js';

// Re-export config utilities
export {
  ConfigSchema,
  parseConfig,
  loadConfig,
  mergeConfig,
  getConfigPath,
  resolveShape,
  type Config,
  type Column,
  type Shape,
  type OutputConfig,
  type OutputOverrides,
} from './config/index.js';

// Re-export record helpers
export {
  readRecords,
  parseRecords,
  recordSchemaFor,
  validateRecords,
  shapeFor,
  inferColumns,
  type InputRecord,
} from './records/index.js';

/**
 * Main CLI entry point.
 *
 * @param args - Command-line arguments (typically process.argv.slice(2))
 */
export async function main(args: string[]): Promise<void> {
  const { createCLI } = await import('./commands/index.js');
  logger.debug('CLI main() called', { args });

  const cli = createCLI();
  await cli.parseAsync(['node', 'rowcast', ...args]);
}
