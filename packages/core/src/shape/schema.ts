/**
 * @fileoverview Record shapes derived from zod object schemas.
 *
 * Field order follows the schema's key order; field kinds follow the zod
 * type of each key.
 *
 * @module @rowcast/core/shape/schema
 */

import { z } from 'zod';
import type { FieldDescriptor, FieldKind } from '../types.js';
import { RecordShape } from './record-shape.js';

/**
 * Options for {@link shapeFromSchema}.
 */
export interface SchemaShapeOptions<Schema extends z.AnyZodObject> {
  /** CSV display names, keyed by schema field */
  headers?: Partial<Record<Extract<keyof z.infer<Schema>, string>, string>>;
}

/**
 * Strip optional, nullable, default and effects wrappers.
 */
function unwrap(type: z.ZodTypeAny): z.ZodTypeAny {
  let current = type;
  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      return current;
    }
  }
}

/**
 * Resolve the field kind of a zod type.
 *
 * @param type - Schema of a single field
 * @returns The matching kind, or `composite` for anything non-scalar
 */
export function kindOf(type: z.ZodTypeAny): FieldKind {
  const inner = unwrap(type);

  if (inner instanceof z.ZodString || inner instanceof z.ZodEnum) {
    return 'text';
  }
  if (inner instanceof z.ZodNumber) {
    return inner.isInt ? 'integer' : 'float';
  }
  if (inner instanceof z.ZodBigInt) {
    return 'integer';
  }
  if (inner instanceof z.ZodBoolean) {
    return 'boolean';
  }
  if (inner instanceof z.ZodDate) {
    return 'timestamp';
  }
  if (inner instanceof z.ZodLiteral) {
    const value: unknown = inner.value;
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
        return 'composite';
    }
  }
  return 'composite';
}

function isSchemaField<Schema extends z.AnyZodObject>(
  schema: Schema,
  key: string
): key is Extract<keyof z.infer<Schema>, string> {
  return Object.prototype.hasOwnProperty.call(schema.shape, key);
}

/**
 * Derive a record shape from a zod object schema.
 *
 * @param schema - Object schema describing one record
 * @param options - Display-name overrides
 * @returns Shape with one column per schema key, in key order
 *
 * @example
 * ```typescript
 * const PersonSchema = z.object({ Name: z.string(), Age: z.number().int() });
 * const shape = shapeFromSchema(PersonSchema, { headers: { Name: 'full_name' } });
 *
 * shape.headers(); // ['full_name', 'Age']
 * ```
 */
export function shapeFromSchema<Schema extends z.AnyZodObject>(
  schema: Schema,
  options: SchemaShapeOptions<Schema> = {}
): RecordShape<z.infer<Schema>> {
  const descriptors: FieldDescriptor<z.infer<Schema>>[] = [];

  for (const [key, type] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    if (!isSchemaField(schema, key)) {
      continue;
    }
    const header = options.headers?.[key];
    descriptors.push(
      header === undefined ? { field: key, kind: kindOf(type) } : { field: key, header, kind: kindOf(type) }
    );
  }

  return new RecordShape(descriptors);
}
