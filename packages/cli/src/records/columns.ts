/**
 * @fileoverview Bridges configured columns to the core formatter: record
 * validation schemas, record shapes, and column inference.
 *
 * @module records/columns
 */

import { z } from 'zod';
import { defineShape, type FieldKind, type RecordShape } from '@rowcast/core';
import type { Column } from '../config/index.js';

/**
 * A record read from an input file.
 */
export type InputRecord = Record<string, unknown>;

const FIELD_SCHEMAS: Record<FieldKind, () => z.ZodTypeAny> = {
  text: () => z.string(),
  integer: () => z.number().int(),
  float: () => z.number(),
  boolean: () => z.boolean(),
  timestamp: () => z.coerce.date(),
  composite: () => z.unknown(),
};

/**
 * Build the schema input records must satisfy for the given columns.
 *
 * Every column is optional and nullable so a missing field reaches the
 * formatter as absent; timestamp columns accept date strings. Fields not
 * named by a column pass through untouched.
 *
 * @param columns - Configured columns
 */
export function recordSchemaFor(columns: readonly Column[]) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const column of columns) {
    shape[column.field] = FIELD_SCHEMAS[column.kind]().nullish();
  }
  return z.array(z.object(shape).passthrough());
}

/**
 * Validate raw input records against the given columns.
 *
 * @throws {z.ZodError} If a record does not match its columns
 */
export function validateRecords(columns: readonly Column[], raw: unknown[]): InputRecord[] {
  return recordSchemaFor(columns).parse(raw);
}

/**
 * Build the core record shape for the given columns.
 */
export function shapeFor(columns: readonly Column[]): RecordShape<InputRecord> {
  return defineShape<InputRecord>(
    columns.map((column) =>
      column.header === undefined
        ? { field: column.field, kind: column.kind }
        : { field: column.field, header: column.header, kind: column.kind }
    )
  );
}

function kindOfValue(value: unknown): FieldKind {
  switch (typeof value) {
    case 'string':
      return 'text';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    case 'bigint':
      return 'integer';
    case 'boolean':
      return 'boolean';
    default:
      return value instanceof Date ? 'timestamp' : 'composite';
  }
}

/**
 * Settle the kind of one column from the kinds of its values.
 *
 * Integers mixed with floats widen to float; any other disagreement makes
 * the column composite, as does a column with no values at all.
 */
function mergeKinds(kinds: ReadonlySet<FieldKind>): FieldKind {
  if (kinds.size === 1) {
    const [only] = kinds;
    return only ?? 'composite';
  }
  if (kinds.size === 2 && kinds.has('integer') && kinds.has('float')) {
    return 'float';
  }
  return 'composite';
}

function isRecord(value: unknown): value is InputRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Infer columns from the records: the first record's keys in order, each
 * with the kind its values share across every record.
 *
 * Missing and `null` values are skipped when choosing a kind, so a column
 * whose first value is `null` still takes the kind of the later ones.
 *
 * @param raw - Parsed input records
 * @returns Columns, or an empty list when there is no object to inspect
 */
export function inferColumns(raw: readonly unknown[]): Column[] {
  const [first] = raw;
  if (!isRecord(first)) {
    return [];
  }

  const kinds = new Map<string, Set<FieldKind>>(
    Object.keys(first).map((field): [string, Set<FieldKind>] => [field, new Set<FieldKind>()])
  );
  for (const record of raw) {
    if (!isRecord(record)) {
      continue;
    }
    for (const [field, seen] of kinds) {
      const value: unknown = record[field];
      if (value !== undefined && value !== null) {
        seen.add(kindOfValue(value));
      }
    }
  }

  return [...kinds].map(([field, seen]) => ({ field, kind: mergeKinds(seen) }));
}
