/**
 * CSV renderer for tabular output.
 *
 * @module output/csv
 */

import type { Writable } from 'node:stream';
import { stringify } from 'csv-stringify/sync';
import type { Tabular } from '../types.js';
import type { Renderer } from './renderer.js';
import { writeChunk } from './sink.js';

/**
 * Cells quoted beyond the delimiter, quote and newline defaults: a carriage
 * return anywhere, a leading Unicode space, or the lone cell `\.`.
 */
const EXTRA_QUOTED =
  /\r|^[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]|^\\\.$/;

/**
 * Renders records as comma-separated rows under one header row.
 *
 * Columns come from the shape alone, so an empty record list still
 * produces the header row.
 */
export class CsvRenderer<T> implements Renderer<T> {
  constructor(private readonly shape: Tabular<T>) {}

  /**
   * Build the header and data rows, then write them in one chunk.
   */
  async render(records: readonly T[], stream: Writable): Promise<void> {
    const content: string[][] = [this.shape.headers()];
    for (const record of records) {
      content.push(this.shape.row(record));
    }

    const text = stringify(content, {
      delimiter: ',',
      record_delimiter: 'unix',
      quoted_empty: false,
      quoted_match: EXTRA_QUOTED,
    });
    await writeChunk(stream, text);
  }
}
