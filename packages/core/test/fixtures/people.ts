/**
 * Sample record type and shapes shared by the core tests.
 */

import { defineShape } from '../../src/shape/record-shape.js';

export interface Person {
  Name: string;
  Age: number;
  Score: number;
  Active: boolean;
}

export const PERSON_SHAPE = defineShape<Person>([
  { field: 'Name', header: 'full_name', kind: 'text' },
  { field: 'Age', kind: 'integer' },
  { field: 'Score', kind: 'float' },
  { field: 'Active', kind: 'boolean' },
]);

export const ANN: Person = { Name: 'Ann', Age: 30, Score: 91.456, Active: true };
export const BO: Person = { Name: 'Bo', Age: 4, Score: 7, Active: false };
