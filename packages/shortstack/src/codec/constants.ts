import { DATA_TYPES } from 'shortstack-rpc';
import type { DataType } from 'shortstack-rpc';

/** Page layout version written in the first byte */
export const FORMAT_VERSION = 1;

export const NULL_MARKER = 0x00;
export const PRESENT_MARKER = 0x01;

/**
 * Wire codes for column data types
 */
export const DTYPE_CODES: Readonly<Record<DataType, number>> = {
  string: 0,
  int64: 1,
  bool: 2,
  bytes: 3,
  float32: 4,
  float64: 5,
  timestamp_micros: 6,
};

const DTYPE_BY_CODE: ReadonlyMap<number, DataType> = new Map(
  DATA_TYPES.map((dtype) => [DTYPE_CODES[dtype], dtype] as const)
);

export function dtypeFromCode(code: number): DataType | undefined {
  return DTYPE_BY_CODE.get(code);
}

export const MICROS_PER_SECOND = 1_000_000n;
export const NANOS_PER_MICRO = 1000;
