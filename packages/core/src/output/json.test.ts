import { describe, it, expect } from 'vitest';
import { JsonRenderer } from './json.js';
import { MemoryWritable, FailingWritable } from '../../test/fixtures/streams.js';

describe('JsonRenderer', () => {
  it('writes an indented array with keys in declaration order', async () => {
    const stream = new MemoryWritable();

    await new JsonRenderer().render(
      [
        { Name: 'Ann', Age: 30 },
        { Name: 'Bo', Age: 4 },
      ],
      stream
    );

    expect(stream.text).toBe(
      [
        '[',
        '  {',
        '    "Name": "Ann",',
        '    "Age": 30',
        '  },',
        '  {',
        '    "Name": "Bo",',
        '    "Age": 4',
        '  }',
        ']',
      ].join('\n')
    );
  });

  it('writes an empty array for no records', async () => {
    const stream = new MemoryWritable();

    await new JsonRenderer().render([], stream);

    expect(stream.text).toBe('[]');
  });

  it('uses native JSON values without CSV formatting', async () => {
    const stream = new MemoryWritable();

    await new JsonRenderer().render(
      [{ Score: 7, Joined: new Date(Date.UTC(2024, 0, 15, 9, 30)), Tags: ['a'] }],
      stream
    );

    expect(JSON.parse(stream.text)).toEqual([
      { Score: 7, Joined: '2024-01-15T09:30:00.000Z', Tags: ['a'] },
    ]);
  });

  it('rejects cyclic records before writing anything', async () => {
    const stream = new MemoryWritable();
    const cyclic: { Name: string; self?: unknown } = { Name: 'loop' };
    cyclic.self = cyclic;

    await expect(new JsonRenderer().render([cyclic], stream)).rejects.toThrow(TypeError);
    expect(stream.chunks).toEqual([]);
  });

  it('rejects bigint values', async () => {
    const stream = new MemoryWritable();

    await expect(new JsonRenderer().render([{ Big: 1n }], stream)).rejects.toThrow(TypeError);
  });

  it('rejects with the stream error', async () => {
    const stream = new FailingWritable('broken pipe');

    await expect(new JsonRenderer().render([{ Name: 'Ann' }], stream)).rejects.toBe(stream.failure);
  });
});
