import { describe, it, expect } from 'vitest';

import { InvalidArgumentError } from '../errors.js';
import { dateToTimestamp, makePartition, makeRow, newCorrelationId } from '../helpers.js';

describe('makeRow', () => {
  it('should keep supported values and drop undefined entries', () => {
    const blob = new Uint8Array([1, 2]);
    expect(makeRow({ age: 31n, name: 'Ada', score: 0.5, ok: true, blob, note: null, skipped: undefined })).toEqual({
      age: 31n,
      name: 'Ada',
      score: 0.5,
      ok: true,
      blob,
      note: null,
    });
  });

  it('should convert dates to timestamps, including inside lists', () => {
    const at = new Date(Date.UTC(2024, 0, 1, 0, 0, 1, 250));
    expect(makeRow({ at, seen: [at, null] })).toEqual({
      at: { seconds: 1_704_067_201, nanos: 250_000_000 },
      seen: [{ seconds: 1_704_067_201, nanos: 250_000_000 }, null],
    });
  });

  it('should reject values that cannot be written', () => {
    expect(() => makeRow({ meta: { nested: true } })).toThrow(InvalidArgumentError);
    expect(() => makeRow({ tags: ['a', undefined] })).toThrow('Column tags has a value that cannot be written: undefined');
  });
});

describe('makePartition', () => {
  it('should keep key order and turn integers into int64 values', () => {
    expect(makePartition({ region: 'eu', bucket: 7, active: false })).toEqual([
      { name: 'region', value: 'eu' },
      { name: 'bucket', value: 7n },
      { name: 'active', value: false },
    ]);
  });

  it('should convert dates to timestamps', () => {
    expect(makePartition({ minute: new Date(Date.UTC(1970, 0, 1, 0, 2)) })).toEqual([
      { name: 'minute', value: { seconds: 120, nanos: 0 } },
    ]);
  });

  it('should reject fractional numbers and unsupported values', () => {
    expect(() => makePartition({ ratio: 0.5 })).toThrow('Partition field ratio must be an integer, got 0.5');
    expect(() => makePartition({ blob: new Uint8Array(1) })).toThrow(InvalidArgumentError);
  });
});

describe('dateToTimestamp', () => {
  it('should floor dates before the epoch', () => {
    expect(dateToTimestamp(new Date(-1))).toEqual({ seconds: -1, nanos: 999_000_000 });
  });

  it('should reject invalid dates', () => {
    expect(() => dateToTimestamp(new Date(Number.NaN))).toThrow('Invalid Date');
  });
});

describe('newCorrelationId', () => {
  it('should return distinct v4 UUIDs', () => {
    const a = newCorrelationId();
    const b = newCorrelationId();
    expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(a).not.toBe(b);
  });
});
