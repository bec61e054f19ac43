/**
 * Column Page Decoder
 *
 * A page is the binary payload of one ReadSegmentColumn response:
 *
 *   version:u8 dtype:u8 depth:u8 count:varint value{count}
 *
 * where each value is a 0x00 null marker or 0x01 followed by its payload.
 * A list payload is a varint length and that many values one level down.
 * A zero-length buffer is an empty page.
 */

import { isTimestamp } from 'shortstack-rpc';
import type { ColumnDescriptor, DataType, FieldValue, Timestamp } from 'shortstack-rpc';

import { DecodeError, InvalidArgumentError, TypeMismatchError } from '../errors.js';
import {
  DTYPE_CODES,
  FORMAT_VERSION,
  MICROS_PER_SECOND,
  NANOS_PER_MICRO,
  NULL_MARKER,
  PRESENT_MARKER,
  dtypeFromCode,
} from './constants.js';
import { ByteReader, ByteWriter } from './io.js';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Human-readable type of a column, e.g. `list<list<int64>>`
 */
export function describeColumnType(dtype: string, depth: number): string {
  return `${'list<'.repeat(depth)}${dtype}${'>'.repeat(depth)}`;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled data type: ${String(value)}`);
}

function microsToTimestamp(micros: bigint): Timestamp {
  let seconds = micros / MICROS_PER_SECOND;
  let rem = micros % MICROS_PER_SECOND;
  if (rem < 0n) {
    seconds -= 1n;
    rem += MICROS_PER_SECOND;
  }
  return { seconds: Number(seconds), nanos: Number(rem) * NANOS_PER_MICRO };
}

function timestampToMicros(ts: Timestamp): bigint {
  return BigInt(ts.seconds) * MICROS_PER_SECOND + BigInt(Math.floor(ts.nanos / NANOS_PER_MICRO));
}

function readPrimitive(reader: ByteReader, dtype: DataType): FieldValue {
  switch (dtype) {
    case 'int64':
      return reader.readI64BE();
    case 'float32':
      return reader.readF32BE();
    case 'float64':
      return reader.readF64BE();
    case 'bool': {
      const start = reader.offset;
      const byte = reader.readU8('bool');
      if (byte > 1) {
        throw new DecodeError(`Invalid bool byte 0x${byte.toString(16).padStart(2, '0')}`, start);
      }
      return byte === 1;
    }
    case 'string':
      return reader.readString();
    case 'bytes': {
      const length = reader.readVarint('bytes length');
      return reader.readBytes(length).slice();
    }
    case 'timestamp_micros':
      return microsToTimestamp(reader.readI64BE('timestamp'));
    default:
      return assertNever(dtype);
  }
}

function readValue(reader: ByteReader, dtype: DataType, depth: number): FieldValue {
  const start = reader.offset;
  const marker = reader.readU8('null marker');
  if (marker === NULL_MARKER) {
    return null;
  }
  if (marker !== PRESENT_MARKER) {
    throw new DecodeError(`Invalid null marker 0x${marker.toString(16).padStart(2, '0')}`, start);
  }
  if (depth === 0) {
    return readPrimitive(reader, dtype);
  }

  const lengthAt = reader.offset;
  const length = reader.readVarint('list length');
  // every element takes at least its marker byte
  if (length > reader.remaining) {
    throw new DecodeError(`List of ${length} elements exceeds remaining ${reader.remaining} bytes`, lengthAt);
  }
  const items: FieldValue[] = [];
  for (let i = 0; i < length; i++) {
    items.push(readValue(reader, dtype, depth - 1));
  }
  return items;
}

/**
 * Decode one page of column data into values in row order.
 *
 * @throws {DecodeError} malformed, truncated or over-long page bytes
 * @throws {TypeMismatchError} the page encodes a different type or nesting
 *   depth than `column` declares
 */
export function decodeColumnPage(data: Uint8Array, column: ColumnDescriptor): FieldValue[] {
  if (data.length === 0) {
    return [];
  }

  const reader = new ByteReader(data);
  const version = reader.readU8('format version');
  if (version !== FORMAT_VERSION) {
    throw new DecodeError(`Unsupported page format version ${version}`, 0);
  }

  const code = reader.readU8('dtype');
  const dtype = dtypeFromCode(code);
  if (dtype === undefined) {
    throw new DecodeError(`Unknown dtype code ${code}`, 1);
  }
  const depth = reader.readU8('nesting depth');
  const expectedDepth = column.nestedListDepth ?? 0;
  if (dtype !== column.dtype || depth !== expectedDepth) {
    throw new TypeMismatchError(
      column.name,
      describeColumnType(column.dtype, expectedDepth),
      describeColumnType(dtype, depth)
    );
  }

  const countAt = reader.offset;
  const count = reader.readVarint('value count');
  if (count > reader.remaining) {
    throw new DecodeError(`Page declares ${count} values but only ${reader.remaining} bytes follow`, countAt);
  }

  const values: FieldValue[] = [];
  for (let i = 0; i < count; i++) {
    values.push(readValue(reader, dtype, depth));
  }

  if (!reader.atEnd) {
    throw new DecodeError(`${reader.remaining} trailing bytes after ${count} values`, reader.offset);
  }
  return values;
}

function writePrimitive(writer: ByteWriter, column: ColumnDescriptor, value: FieldValue): void {
  const mismatch = (): InvalidArgumentError =>
    new InvalidArgumentError(`Value for column ${column.name} is not a valid ${column.dtype}`);

  switch (column.dtype) {
    case 'int64':
      if (typeof value !== 'bigint' || value < INT64_MIN || value > INT64_MAX) throw mismatch();
      writer.writeI64BE(value);
      return;
    case 'float32':
      if (typeof value !== 'number') throw mismatch();
      writer.writeF32BE(value);
      return;
    case 'float64':
      if (typeof value !== 'number') throw mismatch();
      writer.writeF64BE(value);
      return;
    case 'bool':
      if (typeof value !== 'boolean') throw mismatch();
      writer.writeU8(value ? 1 : 0);
      return;
    case 'string':
      if (typeof value !== 'string') throw mismatch();
      writer.writeString(value);
      return;
    case 'bytes':
      if (!(value instanceof Uint8Array)) throw mismatch();
      writer.writeVarint(value.length);
      writer.write(value);
      return;
    case 'timestamp_micros':
      if (!isTimestamp(value)) throw mismatch();
      writer.writeI64BE(timestampToMicros(value));
      return;
    default:
      assertNever(column.dtype);
  }
}

function writeValue(writer: ByteWriter, column: ColumnDescriptor, value: FieldValue, depth: number): void {
  if (value === null) {
    writer.writeU8(NULL_MARKER);
    return;
  }
  writer.writeU8(PRESENT_MARKER);
  if (depth === 0) {
    writePrimitive(writer, column, value);
    return;
  }
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError(`Value for column ${column.name} must be a list at depth ${depth}`);
  }
  writer.writeVarint(value.length);
  for (const item of value) {
    writeValue(writer, column, item, depth - 1);
  }
}

/**
 * Encode values as one page for `column`. No values encode to the empty page.
 */
export function encodeColumnPage(values: readonly FieldValue[], column: ColumnDescriptor): Uint8Array {
  if (values.length === 0) {
    return new Uint8Array(0);
  }
  const depth = column.nestedListDepth ?? 0;
  const writer = new ByteWriter();
  writer.writeU8(FORMAT_VERSION);
  writer.writeU8(DTYPE_CODES[column.dtype]);
  writer.writeU8(depth);
  writer.writeVarint(values.length);
  for (const value of values) {
    writeValue(writer, column, value, depth);
  }
  return writer.finish();
}
