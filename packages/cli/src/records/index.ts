/**
 * @fileoverview Record input and column handling for the CLI.
 * @module records
 */

export { readRecords, parseRecords } from './reader.js';
export {
  recordSchemaFor,
  validateRecords,
  shapeFor,
  inferColumns,
  type InputRecord,
} from './columns.js';
