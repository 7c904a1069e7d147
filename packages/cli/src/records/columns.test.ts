import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { inferColumns, shapeFor, validateRecords } from './columns.js';
import type { Column } from '../config/index.js';

const PEOPLE_COLUMNS: Column[] = [
  { field: 'Name', header: 'full_name', kind: 'text' },
  { field: 'Age', kind: 'integer' },
  { field: 'Score', kind: 'float' },
  { field: 'Joined', kind: 'timestamp' },
];

describe('validateRecords', () => {
  it('coerces timestamp strings to dates', () => {
    const [record] = validateRecords(PEOPLE_COLUMNS, [{ Name: 'Ann', Joined: '2024-01-15T09:30:00Z' }]);

    expect(record?.Joined).toEqual(new Date('2024-01-15T09:30:00Z'));
  });

  it('keeps missing fields absent', () => {
    const [record] = validateRecords(PEOPLE_COLUMNS, [{ Name: 'Ann' }]);

    expect(record).toEqual({ Name: 'Ann' });
    expect(record !== undefined && 'Age' in record).toBe(false);
  });

  it('accepts null values', () => {
    expect(validateRecords(PEOPLE_COLUMNS, [{ Name: null }])).toEqual([{ Name: null }]);
  });

  it('passes through fields without a column', () => {
    expect(validateRecords(PEOPLE_COLUMNS, [{ Name: 'Ann', Extra: [1, 2] }])).toEqual([
      { Name: 'Ann', Extra: [1, 2] },
    ]);
  });

  it('rejects values that do not match their column kind', () => {
    expect(() => validateRecords(PEOPLE_COLUMNS, [{ Age: 'thirty' }])).toThrow(z.ZodError);
    expect(() => validateRecords(PEOPLE_COLUMNS, [{ Age: 1.5 }])).toThrow(z.ZodError);
  });

  it('rejects entries that are not objects', () => {
    expect(() => validateRecords(PEOPLE_COLUMNS, ['Ann'])).toThrow(z.ZodError);
  });
});

describe('shapeFor', () => {
  it('maps columns to headers and rows', () => {
    const shape = shapeFor(PEOPLE_COLUMNS);
    const joined = new Date('2024-01-15T09:30:00Z');

    expect(shape.headers()).toEqual(['full_name', 'Age', 'Score', 'Joined']);
    expect(shape.row({ Name: 'Ann', Age: 30, Score: 2.5, Joined: joined })).toEqual([
      'Ann',
      '30',
      '2.50',
      joined.toString(),
    ]);
  });

  it('leaves missing fields empty', () => {
    expect(shapeFor(PEOPLE_COLUMNS).row({ Name: 'Bo' })).toEqual(['Bo', '', '', '']);
  });
});

describe('inferColumns', () => {
  it('uses the first record keys in order with their value kinds', () => {
    expect(
      inferColumns([
        { Name: 'Ann', Age: 30, Score: 1.5, Active: true, Tags: ['a'], Extra: null },
        { Other: 'ignored' },
      ])
    ).toEqual([
      { field: 'Name', kind: 'text' },
      { field: 'Age', kind: 'integer' },
      { field: 'Score', kind: 'float' },
      { field: 'Active', kind: 'boolean' },
      { field: 'Tags', kind: 'composite' },
      { field: 'Extra', kind: 'composite' },
    ]);
  });

  it('widens integer columns to float when any value is fractional', () => {
    expect(inferColumns([{ Score: 1 }, { Score: 2.5 }, { Score: 3 }])).toEqual([
      { field: 'Score', kind: 'float' },
    ]);
  });

  it('skips null and missing values when choosing a kind', () => {
    expect(inferColumns([{ Name: null, Age: 30 }, { Name: 'Bo' }, { Name: 'Cy', Age: null }])).toEqual([
      { field: 'Name', kind: 'text' },
      { field: 'Age', kind: 'integer' },
    ]);
  });

  it('makes columns with conflicting kinds composite', () => {
    expect(inferColumns([{ Id: 'a1' }, { Id: 7 }])).toEqual([{ field: 'Id', kind: 'composite' }]);
  });

  it('produces columns that every inspected record validates against', () => {
    const raw = [
      { Name: 'Ann', Score: 1 },
      { Name: 'Bo', Score: 2.5 },
    ];

    expect(validateRecords(inferColumns(raw), raw)).toEqual(raw);
  });

  it('returns no columns without an object to inspect', () => {
    expect(inferColumns([])).toEqual([]);
    expect(inferColumns(['Ann'])).toEqual([]);
    expect(inferColumns([[1, 2]])).toEqual([]);
  });
});
