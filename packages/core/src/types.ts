/**
 * @fileoverview Core type definitions for @rowcast/core package.
 *
 * Field kinds, field descriptors, the tabular capability interface and the
 * one-level record reference shared by the renderers.
 *
 * @module @rowcast/core/types
 */

// ============================================
// FIELDS
// ============================================

/**
 * All field kinds, in the order the stringifier checks them.
 */
export const FIELD_KINDS = ['text', 'integer', 'float', 'boolean', 'timestamp', 'composite'] as const;

/**
 * Kind of value a record field holds.
 *
 * Drives CSV cell conversion: integers never show decimals, floats always
 * show two, composites render as empty cells.
 */
export type FieldKind = (typeof FIELD_KINDS)[number];

/**
 * A record field paired with its optional CSV display name.
 *
 * @example
 * ```typescript
 * const name: FieldDescriptor<Person> = { field: 'Name', header: 'full_name', kind: 'text' };
 * ```
 */
export interface FieldDescriptor<T> {
  /** Property name as declared on the record type */
  field: Extract<keyof T, string>;
  /** Display name for the CSV header (defaults to `field`) */
  header?: string;
  /** Kind of value the field holds */
  kind: FieldKind;
}

// ============================================
// CAPABILITIES
// ============================================

/**
 * Capability to present a record type as CSV rows.
 *
 * `headers()` and `row()` must agree on column count and order.
 */
export interface Tabular<T> {
  /** Header cells, one per column */
  headers(): string[];
  /** Data cells for one record, in header order */
  row(record: T): string[];
}

// ============================================
// RECORD REFERENCES
// ============================================

/**
 * One level of indirection around a record.
 *
 * Renderers unwrap a `Ref` exactly once; a `Ref` holding another `Ref`
 * is not followed further.
 */
export class Ref<T> {
  constructor(public readonly current: T) {}
}

/**
 * A record as accepted by the formatter: either the record itself or a
 * reference to it.
 */
export type RecordInput<T> = T | Ref<T>;

/**
 * Unwrap one level of reference.
 *
 * @param input - Record or reference to a record
 * @returns The referenced record, or the input when it is not a reference
 */
export function deref<T>(input: RecordInput<T>): T {
  return input instanceof Ref ? input.current : input;
}
