/**
 * @fileoverview Default tabular implementation built from field descriptors.
 *
 * @module @rowcast/core/shape
 */

import type { FieldDescriptor, Tabular } from '../types.js';
import { stringifyScalar } from '../output/stringify.js';

/**
 * Ordered set of field descriptors for one record type.
 *
 * The descriptor list is fixed at construction, so the header row depends
 * only on the shape and never on the records being rendered.
 *
 * @example
 * ```typescript
 * interface Person { Name: string; Age: number }
 *
 * const shape = defineShape<Person>([
 *   { field: 'Name', header: 'full_name', kind: 'text' },
 *   { field: 'Age', kind: 'integer' },
 * ]);
 *
 * shape.headers();                        // ['full_name', 'Age']
 * shape.row({ Name: 'Ann', Age: 30 });    // ['Ann', '30']
 * ```
 */
export class RecordShape<T extends object> implements Tabular<T> {
  private readonly descriptors: readonly FieldDescriptor<T>[];

  constructor(descriptors: readonly FieldDescriptor<T>[]) {
    this.descriptors = [...descriptors];
  }

  /**
   * Field descriptors in column order.
   */
  fields(): readonly FieldDescriptor<T>[] {
    return this.descriptors;
  }

  /**
   * Header cells: the display override when set, else the field name.
   */
  headers(): string[] {
    return this.descriptors.map((descriptor) => descriptor.header ?? descriptor.field);
  }

  /**
   * Data cells for one record.
   *
   * A field missing from the record instance yields an empty cell.
   */
  row(record: T): string[] {
    return this.descriptors.map(({ field, kind }) => {
      if (!(field in record)) {
        return '';
      }
      const value: unknown = Reflect.get(record, field);
      return stringifyScalar(value, kind);
    });
  }
}

/**
 * Build a shape from an explicit, ordered descriptor list.
 *
 * @param descriptors - One descriptor per column, in declaration order
 */
export function defineShape<T extends object>(
  descriptors: readonly FieldDescriptor<T>[]
): RecordShape<T> {
  return new RecordShape(descriptors);
}
