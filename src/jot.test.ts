import { describe, expect, it } from 'vitest';
import { jot } from './jot.js';

describe('jot', () => {
  const schema = jot.object({
    name: jot.string(),
    score: jot.withDefault(jot.number(), 0),
    author: jot.nullable(jot.string()),
    kind: jot.literal(['t1', 't3'] as const),
    tags: jot.array(jot.string()),
  });

  it('parses a matching object and ignores unknown keys', () => {
    expect(schema.parse({ name: 'x', author: 'a', kind: 't1', tags: ['a'], extra: true })).toEqual({
      name: 'x',
      score: 0,
      author: 'a',
      kind: 't1',
      tags: ['a'],
    });
  });

  it('maps missing nullable values to null', () => {
    expect(schema.parse({ name: 'x', kind: 't3', tags: [] }).author).toBeNull();
  });

  it('reports the path of the failing value', () => {
    expect(() => schema.parse({ name: 'x', kind: 't1', tags: ['a', 2] }, 'thing')).toThrow(
      'thing.tags[1] must be a string',
    );
    expect(() => schema.parse({ name: 'x', kind: 't2', tags: [] }, 'thing')).toThrow(
      'thing.kind must be one of t1, t3',
    );
  });
});
