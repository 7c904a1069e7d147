/**
 * @fileoverview Render command for rowcast CLI.
 *
 * Reads records from a JSON or YAML file and writes them as JSON or CSV.
 *
 * @module commands/render
 */

import { Command } from 'commander';
import { renderTo } from '@rowcast/core';
import { loadConfig, mergeConfig, resolveShape } from '../config/index.js';
import { readRecords, validateRecords, shapeFor, inferColumns } from '../records/index.js';
import { checkPathOrThrow, logger } from '../utils/index.js';

/**
 * Options for the render command.
 */
interface RenderOptions {
  format?: string;
  output?: string;
  shape?: string;
  config?: string;
}

/**
 * Create the render command.
 *
 * @returns Command instance for rendering record files
 *
 * @example
 * ```typescript
 * const program = new Command();
 * program.addCommand(createRenderCommand());
 * program.parse(['render', 'people.json', '--format', 'csv']);
 * ```
 */
export function createRenderCommand(): Command {
  return new Command('render')
    .description(
      'Render records as JSON or CSV\n\n' +
        'Reads an array of records from a .json, .yaml or .yml file and writes\n' +
        'it to standard output or a file. CSV columns come from a configured\n' +
        'shape, or from the first record when no shape is configured.\n\n' +
        'Examples:\n' +
        '  $ rowcast render people.json\n' +
        '  $ rowcast render people.yaml --format json\n' +
        '  $ rowcast render people.json --shape people -o people.csv'
    )
    .argument('<input>', 'Record file (.json, .yaml or .yml)')
    .option('-f, --format <format>', 'Output format: json or csv (default from config, else csv)')
    .option('-o, --output <file>', 'Output file, created with owner-only permissions (default: stdout)')
    .option('-s, --shape <name>', 'Configured shape that defines the CSV columns')
    .option('-c, --config <file>', 'Path to custom config file (.rowcastrc.yaml)')
    .action(async (input: string, options: RenderOptions) => {
      try {
        const fileConfig = await loadConfig(options.config);
        const config = mergeConfig(fileConfig, { format: options.format, file: options.output });

        const { resolvedPath, warning } = checkPathOrThrow(input, 'input');
        if (warning) {
          logger.warn(warning);
        }

        const destination = config.output.file;
        if (destination) {
          const check = checkPathOrThrow(destination, 'output');
          if (check.warning) {
            logger.warn(check.warning);
          }
        }

        const raw = await readRecords(resolvedPath);
        let columns = resolveShape(config, options.shape);
        if (columns === null) {
          columns = inferColumns(raw);
          logger.debug(`Inferred columns: ${columns.map((column) => column.field).join(', ')}`);
        }
        const records = validateRecords(columns, raw);

        logger.debug(`Rendering ${records.length} records as '${config.output.format}'`);
        await renderTo(destination, config.output.format, shapeFor(columns), records);

        if (destination) {
          logger.info(`Wrote ${records.length} records to ${destination}`);
        }
      } catch (error) {
        logger.error(error instanceof Error ? error.message : `Unexpected error: ${String(error)}`);
        process.exit(1);
      }
    });
}
