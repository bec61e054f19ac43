/**
 * shortstack
 *
 * Client for a remote columnar datastore: schema management, writes and
 * decoded segment reads.
 *
 * @example
 * ```ts
 * import { createClient } from 'shortstack';
 *
 * const client = createClient({ endpoint: 'https://datastore.example.com/rpc' });
 * const rows = await client.read(key, [{ name: 'age', dtype: 'int64' }]);
 * ```
 */

export { ShortstackClient, createClient } from './client.js';
export type { CallOptions, DecodeColumnOptions, DecodeSegmentOptions } from './client.js';

export { DEFAULT_RETRY, DEFAULT_TIMEOUT_MS, configFromEnv, resolveConfig } from './config.js';
export type { ClientConfig, ResolvedConfig, RetryPolicy } from './config.js';

export {
  ErrorCode,
  RETRYABLE_SERVER_CODES,
  ShortstackError,
  TransportError,
  ServerError,
  ProtocolError,
  DecodeError,
  TypeMismatchError,
  RowAlignmentError,
  InvalidArgumentError,
  isRetryableError,
} from './errors.js';

export { HttpGateway } from './gateway.js';
export type { Gateway } from './gateway.js';

export { Logger, LOG_LEVELS, createLogger, isLogLevel } from './logger.js';
export type { LogLevel, LoggerOptions } from './logger.js';

export { backoffDelay, withRetry } from './retry.js';
export type { RetryOptions } from './retry.js';

export { decodeColumnPage, encodeColumnPage, describeColumnType } from './codec/page.js';
export { decodeDeletions, encodeDeletions } from './codec/deletions.js';

export { readColumnStream } from './segment/column-stream.js';
export type { ColumnStreamRequest, ReadOptions, StreamState } from './segment/column-stream.js';
export { assembleRows } from './segment/assembler.js';
export { applyDeletionMask } from './segment/deletions.js';
export { Row } from './segment/row.js';
export type { RowEntry } from './segment/row.js';

export { makeRow, makePartition, newCorrelationId, dateToTimestamp } from './helpers.js';

export type {
  ColumnDescriptor,
  ColumnMeta,
  DataType,
  FieldValue,
  PartitionDataType,
  PartitionField,
  PartitionFieldValue,
  Schema,
  SchemaMode,
  Segment,
  SegmentKey,
  TableInfo,
  Timestamp,
  WriteRow,
} from 'shortstack-rpc';
