/**
 * JSON renderer for structured output.
 *
 * @module output/json
 */

import type { Writable } from 'node:stream';
import type { Renderer } from './renderer.js';
import { writeChunk } from './sink.js';

/**
 * Indentation used for every nesting level.
 */
export const JSON_INDENT = 2;

/**
 * Renders records as one pretty-printed JSON array.
 *
 * Keys are the records' own property names; CSV display names do not apply.
 * The document is written without a trailing newline.
 */
export class JsonRenderer<T> implements Renderer<T> {
  /**
   * Serialize the records and write them.
   *
   * `JSON.stringify` errors (cycles, bigint values) reject before any byte
   * reaches the stream.
   */
  async render(records: readonly T[], stream: Writable): Promise<void> {
    const document = JSON.stringify(records, null, JSON_INDENT);
    await writeChunk(stream, document);
  }
}
