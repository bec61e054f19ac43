import { createReadSegmentDeletionsRequest } from 'shortstack-rpc';
import type { FieldValue, SegmentKey } from 'shortstack-rpc';

import { decodeDeletions } from '../codec/deletions.js';
import type { Gateway } from '../gateway.js';
import { withRetry } from '../retry.js';
import type { ReadOptions } from './column-stream.js';

/**
 * Fetch and decode the deletion mask of a segment
 */
export async function readDeletionMask(
  gateway: Gateway,
  segment: SegmentKey,
  correlationId: string,
  options: ReadOptions
): Promise<boolean[]> {
  const { retry, logger, signal } = options;
  const result = await withRetry(
    () =>
      gateway.readSegmentDeletions(
        createReadSegmentDeletionsRequest({
          tableName: segment.tableName,
          partition: segment.partition,
          segmentId: segment.segmentId,
          correlationId,
        }),
        signal
      ),
    { policy: retry, logger, signal, description: `read deletions of ${segment.tableName}/${segment.segmentId}` }
  );
  return decodeDeletions(result.data);
}

/**
 * True when row `index` is marked deleted. Rows past the end of the mask
 * are live.
 */
export function isRowDeleted(isDeleted: readonly boolean[] | undefined, index: number): boolean {
  return isDeleted !== undefined && index < isDeleted.length && isDeleted[index];
}

/**
 * Drop the values of deleted rows
 */
export function applyDeletionMask(values: readonly FieldValue[], isDeleted: readonly boolean[]): FieldValue[] {
  return values.filter((_, i) => !isRowDeleted(isDeleted, i));
}
