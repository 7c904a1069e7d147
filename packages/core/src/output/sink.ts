/**
 * Promise wrapper around a single stream write.
 *
 * @module output/sink
 */

import type { Writable } from 'node:stream';

/**
 * Write one chunk and wait for the stream to accept it.
 *
 * Rejects with the stream's own error. The error listener stays attached
 * after a failed write so the stream's follow-up `error` event is handled.
 *
 * @param stream - Destination stream
 * @param chunk - UTF-8 text to write
 */
export function writeChunk(stream: Writable, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => reject(error);
    stream.once('error', onError);

    stream.write(chunk, 'utf8', (error) => {
      if (error) {
        reject(error);
        return;
      }
      stream.removeListener('error', onError);
      resolve();
    });
  });
}
