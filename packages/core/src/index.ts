/**
 * @fileoverview Public API for @rowcast/core package.
 *
 * Renders homogeneous record lists as pretty-printed JSON or as CSV and
 * writes them to standard output or an owner-only file.
 *
 * @module @rowcast/core
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { RecordFormatter, shapeFromSchema } from '@rowcast/core';
 *
 * const PersonSchema = z.object({ Name: z.string(), Age: z.number().int() });
 * const shape = shapeFromSchema(PersonSchema, { headers: { Name: 'full_name' } });
 *
 * const formatter = new RecordFormatter({ stream: process.stdout, format: 'csv', shape });
 * await formatter.write([{ Name: 'Ann', Age: 30 }]);
 * // full_name,Age
 * // Ann,30
 * ```
 */

// ============================================
// FORMATTER
// ============================================

export { RecordFormatter, type RecordFormatterOptions } from './formatter.js';

// ============================================
// DESTINATIONS
// ============================================

export {
  openDestination,
  renderTo,
  DESTINATION_FILE_MODE,
  type Destination,
} from './destination.js';

// ============================================
// SHAPES
// ============================================

export { RecordShape, defineShape, shapeFromSchema, kindOf, type SchemaShapeOptions } from './shape/index.js';

// ============================================
// RENDERERS
// ============================================

export {
  JsonRenderer,
  CsvRenderer,
  createRenderer,
  parseFormat,
  stringifyScalar,
  writeChunk,
  INVALID_VALUE,
  JSON_INDENT,
  type OutputFormat,
  type Renderer,
} from './output/index.js';

// ============================================
// TYPES
// ============================================

export { Ref, deref, FIELD_KINDS } from './types.js';
export type { FieldKind, FieldDescriptor, Tabular, RecordInput } from './types.js';
