/**
 * Column Stream Reader
 *
 * Follows continuation tokens across ReadSegmentColumn calls until the
 * server reports the column exhausted, decoding each page as it arrives.
 */

import { createReadSegmentColumnRequest } from 'shortstack-rpc';
import type { ColumnDescriptor, FieldValue, ReadSegmentColumnResult, SegmentKey } from 'shortstack-rpc';

import { decodeColumnPage } from '../codec/page.js';
import type { RetryPolicy } from '../config.js';
import { DecodeError } from '../errors.js';
import type { Gateway } from '../gateway.js';
import type { Logger } from '../logger.js';
import { withRetry } from '../retry.js';

export interface ColumnStreamRequest {
  segment: SegmentKey;
  column: ColumnDescriptor;
  correlationId: string;
}

export interface ReadOptions {
  retry: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Pagination state. `fetching` with no token is the first request.
 */
export type StreamState =
  | { kind: 'start' }
  | { kind: 'fetching'; token: string | undefined; values: FieldValue[]; pages: number }
  | { kind: 'done'; values: FieldValue[] }
  | { kind: 'failed'; error: unknown };

function assertNever(state: never): never {
  throw new Error(`Unknown stream state: ${JSON.stringify(state)}`);
}

/**
 * Read every page of one column of one segment and return the values in
 * row order. Any failure rejects the whole read; values from pages already
 * fetched are discarded.
 */
export async function readColumnStream(
  gateway: Gateway,
  request: ColumnStreamRequest,
  options: ReadOptions
): Promise<FieldValue[]> {
  const { segment, column, correlationId } = request;
  const { retry, logger, signal } = options;
  const label = `${segment.tableName}.${column.name}`;

  const fetchPage = (token: string | undefined): Promise<ReadSegmentColumnResult> =>
    withRetry(
      () =>
        gateway.readSegmentColumn(
          createReadSegmentColumnRequest({
            tableName: segment.tableName,
            partition: segment.partition,
            segmentId: segment.segmentId,
            columnName: column.name,
            correlationId,
            ...(token !== undefined ? { continuationToken: token } : {}),
          }),
          signal
        ),
      { policy: retry, logger, signal, description: `read ${label}` }
    );

  let state: StreamState = { kind: 'start' };
  for (;;) {
    switch (state.kind) {
      case 'start':
        state = { kind: 'fetching', token: undefined, values: [], pages: 0 };
        break;

      case 'fetching': {
        const token: string | undefined = state.token;
        const values: FieldValue[] = state.values;
        const pages: number = state.pages + 1;
        try {
          signal?.throwIfAborted();
          const page = await fetchPage(token);
          if (page.codec) {
            throw new DecodeError(`Page ${pages} of ${label} uses unsupported codec ${page.codec}`, 0);
          }
          const decoded = decodeColumnPage(page.data, column);
          for (const value of decoded) {
            values.push(value);
          }
          const next: string | undefined = page.continuationToken;
          logger.debug(
            `${label} page ${pages}: ${decoded.length} values${next ? `, continuing at ${next}` : ', done'}`
          );
          if (next) {
            state = { kind: 'fetching', token: next, values, pages };
          } else {
            const implicitNulls = new Array<FieldValue>(page.implicitNullsCount ?? 0).fill(null);
            state = { kind: 'done', values: [...implicitNulls, ...values] };
          }
        } catch (error) {
          state = { kind: 'failed', error };
        }
        break;
      }

      case 'done':
        return state.values;

      case 'failed':
        throw state.error;

      default:
        return assertNever(state);
    }
  }
}
