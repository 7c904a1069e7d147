/**
 * Output renderers for rowcast.
 *
 * Provides the JSON and CSV renderers, the scalar stringifier, and a
 * factory that picks a renderer for a format.
 *
 * @module output
 */

export type { OutputFormat, Renderer } from './renderer.js';
export { JsonRenderer, JSON_INDENT } from './json.js';
export { CsvRenderer } from './csv.js';
export { stringifyScalar, INVALID_VALUE } from './stringify.js';
export { writeChunk } from './sink.js';

import type { Tabular } from '../types.js';
import type { OutputFormat, Renderer } from './renderer.js';
import { JsonRenderer } from './json.js';
import { CsvRenderer } from './csv.js';

/**
 * Normalize a free-form format selector.
 *
 * @param format - Selector as given by the caller
 * @returns The matching format, or null for an empty or unrecognized selector
 *
 * @example
 * ```typescript
 * parseFormat(' CSV ');  // 'csv'
 * parseFormat('xml');    // null
 * ```
 */
export function parseFormat(format: string): OutputFormat | null {
  switch (format.trim().toLowerCase()) {
    case 'json':
      return 'json';
    case 'csv':
      return 'csv';
    default:
      return null;
  }
}

/**
 * Create a renderer for the specified output format.
 *
 * @param format - The output format ('json' or 'csv')
 * @param shape - Column source for CSV output
 * @returns A Renderer instance for the format
 */
export function createRenderer<T>(format: OutputFormat, shape: Tabular<T>): Renderer<T> {
  switch (format) {
    case 'json':
      return new JsonRenderer<T>();
    case 'csv':
      return new CsvRenderer(shape);
  }
}
