/**
 * Row Assembler
 *
 * Reads the requested columns of a segment concurrently and zips them into
 * rows.
 */

import { validateColumnDescriptor, validateSegmentKey } from 'shortstack-rpc';
import type { ColumnDescriptor, FieldValue, SegmentKey } from 'shortstack-rpc';

import { InvalidArgumentError, RowAlignmentError } from '../errors.js';
import type { Gateway } from '../gateway.js';
import { newCorrelationId } from '../helpers.js';
import { readColumnStream } from './column-stream.js';
import type { ReadOptions } from './column-stream.js';
import { isRowDeleted, readDeletionMask } from './deletions.js';
import { Row } from './row.js';

export interface DecodeSegmentOptions extends ReadOptions {
  /** Shared by every read of this decode; generated when absent */
  correlationId?: string;
  /** Fetch the deletion mask and skip deleted rows */
  applyDeletions?: boolean;
}

export function assertValidSegmentKey(segment: SegmentKey): void {
  const problem = validateSegmentKey(segment);
  if (problem !== null) {
    throw new InvalidArgumentError(problem);
  }
}

export function assertValidColumn(column: ColumnDescriptor): void {
  const problem = validateColumnDescriptor(column);
  if (problem !== null) {
    throw new InvalidArgumentError(problem);
  }
}

/**
 * Reject an empty column list, duplicate names and invalid descriptors
 */
export function assertValidColumns(columns: readonly ColumnDescriptor[]): void {
  if (columns.length === 0) {
    throw new InvalidArgumentError('At least one column is required');
  }
  const seen = new Set<string>();
  for (const column of columns) {
    assertValidColumn(column);
    if (seen.has(column.name)) {
      throw new InvalidArgumentError(`Column ${column.name} is requested more than once`);
    }
    seen.add(column.name);
  }
}

/**
 * Zip per-column value sequences into rows, skipping deleted rows.
 *
 * @throws {RowAlignmentError} the sequences have different lengths
 */
export function assembleRows(
  segment: SegmentKey,
  columns: readonly ColumnDescriptor[],
  sequences: readonly (readonly FieldValue[])[],
  isDeleted?: readonly boolean[]
): Row[] {
  const lengths: Record<string, number> = {};
  columns.forEach((column, j) => {
    lengths[column.name] = sequences[j].length;
  });
  const rowCount = sequences[0]?.length ?? 0;
  if (sequences.some((values) => values.length !== rowCount)) {
    throw new RowAlignmentError(segment, lengths);
  }

  const rows: Row[] = [];
  for (let i = 0; i < rowCount; i++) {
    if (isRowDeleted(isDeleted, i)) {
      continue;
    }
    rows.push(new Row(columns.map((column, j) => [column.name, sequences[j][i]] as const)));
  }
  return rows;
}

/**
 * Decode `columns` of one segment into rows.
 *
 * Columns are read concurrently; the first failure aborts the other reads
 * and rejects the decode.
 */
export async function decodeSegment(
  gateway: Gateway,
  segment: SegmentKey,
  columns: readonly ColumnDescriptor[],
  options: DecodeSegmentOptions
): Promise<Row[]> {
  assertValidSegmentKey(segment);
  assertValidColumns(columns);

  const controller = new AbortController();
  const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;
  const readOptions: ReadOptions = { retry: options.retry, logger: options.logger, signal };
  const correlationId = options.correlationId ?? newCorrelationId();

  const abortSiblings = (error: unknown): never => {
    if (!controller.signal.aborted) {
      controller.abort(error);
    }
    throw error;
  };

  const readers = columns.map((column) =>
    readColumnStream(gateway, { segment, column, correlationId }, readOptions).catch(abortSiblings)
  );
  const deletions =
    options.applyDeletions === false
      ? Promise.resolve(undefined)
      : readDeletionMask(gateway, segment, correlationId, readOptions).catch(abortSiblings);

  const [sequences, isDeleted] = await Promise.all([Promise.all(readers), deletions]);
  options.logger.debug(
    `Decoded ${columns.length} columns of ${segment.tableName}/${segment.segmentId} (correlation ${correlationId})`
  );
  return assembleRows(segment, columns, sequences, isDeleted);
}
