/**
 * @fileoverview Config command for rowcast CLI.
 *
 * Provides subcommands for viewing configuration and configured shapes.
 *
 * @module commands/config
 */

import { Command } from 'commander';
import { stringify as yamlStringify } from 'yaml';
import { loadConfig, getConfigPath } from '../config/index.js';
import { logger } from '../utils/index.js';

/**
 * Log a failed subcommand and exit.
 */
function fail(error: unknown): void {
  if (error instanceof Error) {
    logger.error(error.message);
  }
  process.exit(1);
}

/**
 * Create the config command with show, path, and shapes subcommands.
 *
 * @returns Command instance for config inspection
 *
 * @example
 * ```typescript
 * const program = new Command();
 * program.addCommand(createConfigCommand());
 * program.parse(['config', 'shapes']);
 * ```
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description(
    'View rowcast configuration\n\n' +
      'Configuration is loaded from .rowcastrc.yaml, .rowcastrc.json, or rowcast.config.js\n' +
      'files in the current directory or parent directories.\n\n' +
      'Examples:\n' +
      '  $ rowcast config show\n' +
      '  $ rowcast config shapes\n' +
      '  $ rowcast config path'
  );

  // config show - resolved configuration
  config
    .command('show')
    .description('Show resolved configuration as YAML, with all defaults applied')
    .option('-c, --config <path>', 'Path to a specific config file to load')
    .action(async (options: { config?: string }) => {
      try {
        const loaded = await loadConfig(options.config);
        console.log(yamlStringify(loaded));
      } catch (error) {
        fail(error);
      }
    });

  // config shapes - configured shapes and their columns
  config
    .command('shapes')
    .description('List configured shapes and their CSV columns')
    .option('-c, --config <path>', 'Path to a specific config file to load')
    .action(async (options: { config?: string }) => {
      try {
        const loaded = await loadConfig(options.config);
        const shapes = Object.entries(loaded.shapes ?? {});

        if (shapes.length === 0) {
          console.log('No shapes defined. Columns are inferred from the records.');
          return;
        }

        for (const [name, shape] of shapes) {
          const marker = loaded.default === name ? ' (default)' : '';
          console.log(`${name}${marker}`);
          for (const column of shape.columns) {
            const header = column.header ? ` as "${column.header}"` : '';
            console.log(`  ${column.field}: ${column.kind}${header}`);
          }
        }
      } catch (error) {
        fail(error);
      }
    });

  // config path - config file path
  config
    .command('path')
    .description('Show the path of the discovered config file')
    .option('-c, --config <path>', 'Path to a specific config file to check')
    .action(async (options: { config?: string }) => {
      const configPath = await getConfigPath(options.config);
      console.log(configPath ?? 'no config file found');
    });

  return config;
}
