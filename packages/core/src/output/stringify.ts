/**
 * Scalar-to-cell conversion for CSV output.
 *
 * @module output/stringify
 */

import type { FieldKind } from '../types.js';

/**
 * Cell text for a field that is present but holds no value.
 */
export const INVALID_VALUE = '<invalid Value>';

/**
 * Magnitude from which `Number#toFixed` switches to exponent notation.
 */
const FIXED_LIMIT = 1e21;

/**
 * Fixed-point text with two decimals.
 *
 * Exact binary ties (odd multiples of 1/8) round half to even and negative
 * zero keeps its sign; everything else is `toFixed` on the magnitude.
 */
function formatFloat(value: number): string {
  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const magnitude = Math.abs(value);

  // every double this large is a whole number
  if (magnitude >= FIXED_LIMIT) {
    return `${sign}${BigInt(magnitude).toString(10)}.00`;
  }

  const eighths = magnitude * 8;
  if (Number.isInteger(eighths) && eighths % 2 === 1) {
    // magnitude * 100 lies exactly halfway between two cent values
    const lower = (BigInt(eighths) * 25n - 1n) / 2n;
    const cents = lower % 2n === 0n ? lower : lower + 1n;
    return `${sign}${cents / 100n}.${(cents % 100n).toString(10).padStart(2, '0')}`;
  }

  return `${sign}${magnitude.toFixed(2)}`;
}

/**
 * Convert a field value to its CSV cell text.
 *
 * Never throws. Checked in order:
 * - `undefined` → `<invalid Value>`
 * - text → the string unmodified
 * - integer → base-10 digits, no separators or exponent
 * - float → fixed-point with exactly two decimals, never exponent notation
 * - boolean → `true` / `false`
 * - timestamp → `Date#toString()`
 * - composites, `null`, and values that do not match their kind → empty string
 *
 * @param value - Field value read from a record
 * @param kind - Declared kind of the field
 *
 * @example
 * ```typescript
 * stringifyScalar(3, 'float');   // '3.00'
 * stringifyScalar(3, 'integer'); // '3'
 * stringifyScalar([1], 'composite'); // ''
 * ```
 */
export function stringifyScalar(value: unknown, kind: FieldKind): string {
  if (value === undefined) {
    return INVALID_VALUE;
  }

  switch (kind) {
    case 'text':
      return typeof value === 'string' ? value : '';
    case 'integer':
      if (typeof value === 'bigint') {
        return value.toString(10);
      }
      // BigInt keeps large integers out of exponent notation
      return typeof value === 'number' && Number.isInteger(value) ? BigInt(value).toString(10) : '';
    case 'float':
      return typeof value === 'number' && Number.isFinite(value) ? formatFloat(value) : '';
    case 'boolean':
      return typeof value === 'boolean' ? String(value) : '';
    case 'timestamp':
      return value instanceof Date && !Number.isNaN(value.getTime()) ? value.toString() : '';
    case 'composite':
      return '';
  }
}
