/**
 * @fileoverview Record input files: JSON or YAML arrays.
 *
 * @module records/reader
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

/**
 * Input file extensions and the parser for each.
 */
const PARSERS: Record<string, (text: string) => unknown> = {
  '.json': (text) => JSON.parse(text),
  '.yaml': (text) => parseYaml(text),
  '.yml': (text) => parseYaml(text),
};

/**
 * Parse record input text by file extension.
 *
 * @param text - File contents
 * @param filePath - File name, used for its extension and in errors
 * @returns The top-level array
 * @throws Error if the extension is unsupported or the value is not an array
 */
export function parseRecords(text: string, filePath: string): unknown[] {
  const extension = path.extname(filePath).toLowerCase();
  const parser = PARSERS[extension];
  if (!parser) {
    throw new Error(
      `Unsupported input format: "${extension || filePath}" (expected ${Object.keys(PARSERS).join(', ')})`
    );
  }

  const value = parser(text);
  if (!Array.isArray(value)) {
    throw new Error(`Input must be an array of records: ${filePath}`);
  }
  return value;
}

/**
 * Read and parse a record input file.
 *
 * @param filePath - Path to a .json, .yaml or .yml file
 */
export async function readRecords(filePath: string): Promise<unknown[]> {
  const text = await readFile(filePath, 'utf-8');
  return parseRecords(text, filePath);
}
