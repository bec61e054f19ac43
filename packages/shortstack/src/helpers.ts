/**
 * Builders for write rows, partitions and correlation ids
 */

import { randomUUID } from 'node:crypto';

import { isFieldValue, isPartitionFieldValue } from 'shortstack-rpc';
import type { FieldValue, PartitionField, PartitionFieldValue, Timestamp, WriteRow } from 'shortstack-rpc';

import { InvalidArgumentError } from './errors.js';

/**
 * Id tying together the column and deletion reads of one segment decode
 */
export function newCorrelationId(): string {
  return randomUUID();
}

export function dateToTimestamp(date: Date): Timestamp {
  const ms = date.getTime();
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError('Invalid Date');
  }
  const seconds = Math.floor(ms / 1000);
  return { seconds, nanos: (ms - seconds * 1000) * 1_000_000 };
}

function toFieldValue(column: string, value: unknown): FieldValue {
  if (value instanceof Date) {
    return dateToTimestamp(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toFieldValue(column, item));
  }
  if (value === undefined || !isFieldValue(value)) {
    throw new InvalidArgumentError(`Column ${column} has a value that cannot be written: ${String(value)}`);
  }
  return value;
}

/**
 * Build a write row from plain values. Dates become timestamps and
 * undefined entries are left out.
 *
 * @example
 * ```ts
 * makeRow({ age: 31n, name: 'Ada', seen: new Date(), tags: ['a', null] });
 * ```
 */
export function makeRow(record: Record<string, unknown>): WriteRow {
  const row: WriteRow = {};
  for (const [column, value] of Object.entries(record)) {
    if (value !== undefined) {
      row[column] = toFieldValue(column, value);
    }
  }
  return row;
}

function toPartitionValue(name: string, value: unknown): PartitionFieldValue {
  if (value instanceof Date) {
    return dateToTimestamp(value);
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidArgumentError(`Partition field ${name} must be an integer, got ${value}`);
    }
    return BigInt(value);
  }
  if (!isPartitionFieldValue(value)) {
    throw new InvalidArgumentError(`Partition field ${name} has unsupported value ${String(value)}`);
  }
  return value;
}

/**
 * Build an ordered partition from a record; field order follows the
 * record's key order. Integer numbers become int64 values.
 */
export function makePartition(record: Record<string, unknown>): PartitionField[] {
  return Object.entries(record).map(([name, value]) => ({ name, value: toPartitionValue(name, value) }));
}
