/**
 * @fileoverview Destination acquisition: standard output or an owner-only file.
 *
 * @module @rowcast/core/destination
 */

import { open } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { Tabular, RecordInput } from './types.js';
import { RecordFormatter } from './formatter.js';

/**
 * Permission bits for files created by {@link openDestination}.
 */
export const DESTINATION_FILE_MODE = 0o600;

/**
 * An acquired output stream.
 */
export interface Destination {
  /** Stream to write to */
  stream: Writable;
  /** Whether the caller owns the stream and must close it */
  owned: boolean;
  /** End an owned stream and wait for its bytes to land; no-op for stdout */
  close(): Promise<void>;
}

/**
 * Acquire the output stream for a destination name.
 *
 * An empty or absent name selects standard output, which the caller must
 * not close. Any other name opens that path write-only, creating it with
 * mode 0600 or truncating it. Open errors reject with the original `fs`
 * error.
 *
 * @param name - Output file path, or empty for stdout
 *
 * @example
 * ```typescript
 * const destination = await openDestination('out.csv');
 * try {
 *   await new RecordFormatter({ stream: destination.stream, format: 'csv', shape }).write(records);
 * } finally {
 *   await destination.close();
 * }
 * ```
 */
export async function openDestination(name?: string): Promise<Destination> {
  if (!name) {
    return {
      stream: process.stdout,
      owned: false,
      close: async () => {},
    };
  }

  const handle = await open(name, 'w', DESTINATION_FILE_MODE);
  const stream = handle.createWriteStream({ encoding: 'utf8' });

  return {
    stream,
    owned: true,
    close: async () => {
      stream.end();
      await finished(stream);
    },
  };
}

/**
 * Open a destination, render the records onto it, and release it.
 *
 * An owned destination is released on every exit path: closed after a
 * successful render, destroyed after a failed one.
 *
 * @param name - Output file path, or empty for stdout
 * @param format - Format selector
 * @param shape - Column source for CSV output
 * @param records - Records to render
 */
export async function renderTo<T>(
  name: string | undefined,
  format: string,
  shape: Tabular<T>,
  records: readonly RecordInput<T>[]
): Promise<void> {
  const destination = await openDestination(name);
  try {
    await new RecordFormatter({ stream: destination.stream, format, shape }).write(records);
  } catch (error) {
    if (destination.owned) {
      destination.stream.destroy();
    }
    throw error;
  }
  await destination.close();
}
