/**
 * Renderer interface and output format types for rowcast.
 *
 * @module output/renderer
 */

import type { Writable } from 'node:stream';

/**
 * Output formats with a renderer.
 */
export type OutputFormat = 'json' | 'csv';

/**
 * Renders a full record sequence onto a stream.
 *
 * Implementations write directly to the stream and reject with the
 * underlying error, unwrapped, when serialization or the write fails.
 */
export interface Renderer<T> {
  /**
   * Render the records and write the bytes.
   *
   * @param records - Dereferenced records, in output order
   * @param stream - Destination stream (left open)
   */
  render(records: readonly T[], stream: Writable): Promise<void>;
}
