import { describe, it, expect } from 'vitest';

import { InvalidArgumentError } from '../errors.js';
import { Row } from '../segment/row.js';

describe('Row', () => {
  const row = new Row([
    ['age', 31n],
    ['name', 'Ada'],
    ['nickname', null],
  ]);

  it('should look values up by column name', () => {
    expect(row.get('age')).toBe(31n);
    expect(row.get('nickname')).toBeNull();
    expect(row.get('missing')).toBeUndefined();
    expect(row.has('nickname')).toBe(true);
    expect(row.has('missing')).toBe(false);
  });

  it('should keep column order', () => {
    expect(row.size).toBe(3);
    expect(row.names()).toEqual(['age', 'name', 'nickname']);
    expect(row.values()).toEqual([31n, 'Ada', null]);
    expect([...row]).toEqual([
      ['age', 31n],
      ['name', 'Ada'],
      ['nickname', null],
    ]);
  });

  it('should convert to a plain object', () => {
    expect(row.toObject()).toEqual({ age: 31n, name: 'Ada', nickname: null });
  });

  it('should reject repeated column names', () => {
    expect(
      () =>
        new Row([
          ['age', 1n],
          ['age', 2n],
        ])
    ).toThrow(InvalidArgumentError);
  });
});
