/**
 * Shortstack data model
 *
 * Types shared by the client and anything that speaks the wire protocol:
 * column and partition metadata, decoded field values, segment identity.
 */

export const DATA_TYPES = [
  'string',
  'int64',
  'bool',
  'bytes',
  'float32',
  'float64',
  'timestamp_micros',
] as const;

export const PARTITION_DATA_TYPES = ['string', 'int64', 'bool', 'timestamp_minute'] as const;

/**
 * Column value types
 */
export type DataType = (typeof DATA_TYPES)[number];

/**
 * Partition value types
 */
export type PartitionDataType = (typeof PARTITION_DATA_TYPES)[number];

/**
 * Column metadata as stored in a table schema
 */
export interface ColumnMeta {
  dtype: DataType;
  /** Lists nested this many levels deep; 0 or absent for scalars */
  nestedListDepth?: number;
}

/**
 * A column to read: its name plus declared type
 */
export interface ColumnDescriptor extends ColumnMeta {
  name: string;
}

export interface PartitionMeta {
  dtype: PartitionDataType;
}

export interface Schema {
  columns: Record<string, ColumnMeta>;
  partitioning: Record<string, PartitionMeta>;
}

/**
 * Point in time with nanosecond resolution; nanos is always in [0, 1e9)
 */
export interface Timestamp {
  seconds: number;
  nanos: number;
}

/**
 * One decoded value for one row of one column.
 *
 * int64 decodes to bigint, float32/float64 to number, timestamp_micros to
 * Timestamp and list columns to arrays. Missing values are null.
 */
export type FieldValue =
  | null
  | string
  | bigint
  | boolean
  | number
  | Uint8Array
  | Timestamp
  | FieldValue[];

export type PartitionFieldValue = string | bigint | boolean | Timestamp;

/**
 * One dimension of a partition
 */
export interface PartitionField {
  name: string;
  value: PartitionFieldValue;
}

/**
 * A fully-specified segment: table, partition and segment ID
 */
export interface SegmentKey {
  tableName: string;
  partition: PartitionField[];
  segmentId: string;
}

export interface SegmentMetadata {
  rowCount: number;
  deletionCount?: number;
}

export interface Segment {
  segmentId: string;
  partition: PartitionField[];
  metadata?: SegmentMetadata;
}

export interface TableInfo {
  tableName: string;
}

/**
 * A row as written: column name to value
 */
export type WriteRow = Record<string, FieldValue>;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if value is a known column DataType
 */
export function isDataType(value: unknown): value is DataType {
  return typeof value === 'string' && DATA_TYPES.some((dtype) => dtype === value);
}

/**
 * Check if value is a known PartitionDataType
 */
export function isPartitionDataType(value: unknown): value is PartitionDataType {
  return typeof value === 'string' && PARTITION_DATA_TYPES.some((dtype) => dtype === value);
}

/**
 * Check if value is a valid Timestamp object
 */
export function isTimestamp(value: unknown): value is Timestamp {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Uint8Array) {
    return false;
  }
  if (!('seconds' in value) || !('nanos' in value)) {
    return false;
  }
  const { seconds, nanos } = value;
  return (
    Number.isInteger(seconds) &&
    typeof nanos === 'number' &&
    Number.isInteger(nanos) &&
    nanos >= 0 &&
    nanos < 1_000_000_000
  );
}

/**
 * Check if value is a valid FieldValue (recursively for lists)
 */
export function isFieldValue(value: unknown): value is FieldValue {
  switch (typeof value) {
    case 'string':
    case 'bigint':
    case 'boolean':
    case 'number':
      return true;
    case 'object':
      if (value === null || value instanceof Uint8Array) {
        return true;
      }
      if (Array.isArray(value)) {
        return value.every(isFieldValue);
      }
      return isTimestamp(value);
    default:
      return false;
  }
}

/**
 * Check if value is a valid PartitionFieldValue
 */
export function isPartitionFieldValue(value: unknown): value is PartitionFieldValue {
  return (
    typeof value === 'string' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    isTimestamp(value)
  );
}

// =============================================================================
// Validation Functions
// =============================================================================

/**
 * Validate a ColumnDescriptor and return error message or null
 */
export function validateColumnDescriptor(value: ColumnDescriptor): string | null {
  if (value.name === '') {
    return 'Column name must be a non-empty string';
  }
  if (!isDataType(value.dtype)) {
    return `Column ${value.name} has unknown dtype ${String(value.dtype)}`;
  }
  const depth = value.nestedListDepth ?? 0;
  if (!Number.isInteger(depth) || depth < 0 || depth > 255) {
    return `Column ${value.name} nestedListDepth must be an integer between 0 and 255`;
  }
  return null;
}

/**
 * Validate a SegmentKey and return error message or null
 */
export function validateSegmentKey(value: SegmentKey): string | null {
  if (value.tableName === '') {
    return 'SegmentKey tableName must be a non-empty string';
  }
  if (value.segmentId === '') {
    return 'SegmentKey segmentId must be a non-empty string';
  }
  const seen = new Set<string>();
  for (const field of value.partition) {
    if (seen.has(field.name)) {
      return `SegmentKey partition repeats field ${field.name}`;
    }
    seen.add(field.name);
  }
  return null;
}
