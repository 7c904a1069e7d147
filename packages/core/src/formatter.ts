/**
 * @fileoverview RecordFormatter - renders a record sequence in a selected
 * format onto a bound stream.
 *
 * @module @rowcast/core/formatter
 */

import type { Writable } from 'node:stream';
import { deref, type RecordInput, type Tabular } from './types.js';
import { createRenderer, parseFormat } from './output/index.js';

/**
 * Options for constructing a {@link RecordFormatter}.
 */
export interface RecordFormatterOptions<T> {
  /** Destination stream; the formatter never ends or closes it */
  stream: Writable;
  /** Format selector: 'json' or 'csv', case and surrounding whitespace ignored */
  format: string;
  /** Column source for CSV output */
  shape: Tabular<T>;
}

/**
 * Renders records as JSON or CSV onto a stream.
 *
 * An empty or unrecognized format selector writes nothing and succeeds.
 * Serialization and stream errors are rethrown as they are.
 *
 * @example
 * ```typescript
 * const formatter = new RecordFormatter({ stream: process.stdout, format: 'csv', shape });
 * await formatter.write([{ Name: 'Ann', Age: 30 }]);
 * ```
 */
export class RecordFormatter<T> {
  private readonly stream: Writable;
  private readonly format: string;
  private readonly shape: Tabular<T>;

  constructor(options: RecordFormatterOptions<T>) {
    this.stream = options.stream;
    this.format = options.format;
    this.shape = options.shape;
  }

  /**
   * Render the records in the bound format.
   *
   * Each record is dereferenced once before rendering.
   *
   * @param records - Records or references to records, in output order
   */
  async write(records: readonly RecordInput<T>[]): Promise<void> {
    const format = parseFormat(this.format);
    if (format === null) {
      return;
    }

    const renderer = createRenderer(format, this.shape);
    await renderer.render(
      records.map((record) => deref(record)),
      this.stream
    );
  }
}
