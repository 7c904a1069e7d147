/**
 * @fileoverview Record shapes: ordered field descriptors for CSV columns.
 * @module @rowcast/core/shape
 */

export { RecordShape, defineShape } from './record-shape.js';
export { shapeFromSchema, kindOf, type SchemaShapeOptions } from './schema.js';
