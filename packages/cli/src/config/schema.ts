/**
 * Configuration schema for rowcast CLI using Zod validation.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { FIELD_KINDS } from '@rowcast/core';
import { logger } from '../utils/logger.js';

/**
 * Field kind options.
 */
export const FieldKindSchema = z.enum(FIELD_KINDS);

/**
 * One CSV column: the record field it reads and how it is shown.
 */
export const ColumnSchema = z.object({
  /** Record field name */
  field: z.string().min(1),
  /** Header display name (defaults to the field name) */
  header: z.string().optional(),
  /** Kind of value the field holds */
  kind: FieldKindSchema.default('text'),
});

export type Column = z.infer<typeof ColumnSchema>;

/**
 * Named record shape: the ordered columns of one record type.
 */
export const ShapeSchema = z.object({
  columns: z.array(ColumnSchema).min(1),
});

export type Shape = z.infer<typeof ShapeSchema>;

/**
 * Output configuration schema.
 */
export const OutputConfigSchema = z
  .object({
    /** Format selector passed to the formatter ('json' or 'csv'; anything else writes nothing) */
    format: z.string().default('csv'),
    /** Destination file; empty writes to standard output */
    file: z.string().default(''),
  })
  .default({});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

/**
 * Complete rowcast CLI configuration schema.
 *
 * @example
 * ```yaml
 * output:
 *   format: csv
 * shapes:
 *   people:
 *     columns:
 *       - field: Name
 *         header: full_name
 *       - field: Age
 *         kind: integer
 * default: people
 * ```
 */
export const ConfigSchema = z
  .object({
    /** Output settings */
    output: OutputConfigSchema,
    /** Named record shapes */
    shapes: z.record(z.string(), ShapeSchema).optional(),
    /** Shape to use when none is named on the command line */
    default: z.string().optional(),
  })
  .default({});

/**
 * Inferred configuration type from schema.
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration, logging any validation errors.
 *
 * @param data - Raw configuration data
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If validation fails
 */
export function parseConfig(data: unknown): Config {
  logger.debug('Parsing configuration...');
  try {
    const config = ConfigSchema.parse(data);
    logger.debug(`Config parsed: format=${config.output.format}, shapes=${Object.keys(config.shapes ?? {}).length}`);
    return config;
  } catch (error) {
    if (error instanceof z.ZodError) {
      logger.error(`Config validation failed: ${error.message}`);
    }
    throw error;
  }
}
