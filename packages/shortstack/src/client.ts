/**
 * ShortstackClient - client for a remote columnar datastore
 *
 * Schema management, writes, segment listing and typed segment reads.
 * Segment reads page through each column, decode the binary pages and
 * assemble rows.
 */

import {
  createAlterTableRequest,
  createCreateTableRequest,
  createDeleteFromSegmentRequest,
  createDropTableRequest,
  createGetSchemaRequest,
  createListSegmentsRequest,
  createListTablesRequest,
  createReadSegmentColumnRequest,
  createReadSegmentDeletionsRequest,
  createWriteToPartitionRequest,
} from 'shortstack-rpc';
import type {
  AlterTableRequest,
  ColumnDescriptor,
  CreateTableRequest,
  CreateTableResult,
  DeleteFromSegmentRequest,
  DropTableRequest,
  FieldValue,
  GetSchemaRequest,
  ListSegmentsRequest,
  ReadSegmentColumnRequest,
  ReadSegmentColumnResult,
  ReadSegmentDeletionsRequest,
  ReadSegmentDeletionsResult,
  RequestBody,
  Schema,
  Segment,
  SegmentKey,
  TableInfo,
  WriteToPartitionRequest,
} from 'shortstack-rpc';

import { resolveConfig } from './config.js';
import type { ClientConfig, ResolvedConfig } from './config.js';
import { InvalidArgumentError } from './errors.js';
import { HttpGateway } from './gateway.js';
import type { Gateway } from './gateway.js';
import { newCorrelationId } from './helpers.js';
import { withRetry } from './retry.js';
import { assertValidColumn, assertValidSegmentKey, decodeSegment } from './segment/assembler.js';
import { readColumnStream } from './segment/column-stream.js';
import type { ReadOptions } from './segment/column-stream.js';
import { applyDeletionMask, readDeletionMask } from './segment/deletions.js';
import type { Row } from './segment/row.js';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface DecodeColumnOptions extends CallOptions {
  correlationId?: string;
  /** Values of rows marked true are dropped */
  isDeleted?: readonly boolean[];
}

export interface DecodeSegmentOptions extends CallOptions {
  correlationId?: string;
  /**
   * Fetch the segment's deletion mask and skip deleted rows
   * @default true
   */
  applyDeletions?: boolean;
}

function assertTableName(tableName: string): void {
  if (tableName === '') {
    throw new InvalidArgumentError('tableName must be a non-empty string');
  }
}

function isColumnList(value: ColumnDescriptor | readonly ColumnDescriptor[]): value is readonly ColumnDescriptor[] {
  return Array.isArray(value);
}

/**
 * ShortstackClient - Main client interface
 */
export class ShortstackClient {
  private readonly config: ResolvedConfig;
  private readonly gateway: Gateway;

  /**
   * @param gateway - transport to use instead of HTTP, e.g. an in-process
   *   server
   */
  constructor(config: ClientConfig, gateway?: Gateway) {
    this.config = resolveConfig(config);
    this.gateway = gateway ?? new HttpGateway(this.config);
  }

  private readOptions(signal?: AbortSignal): ReadOptions {
    return { retry: this.config.retry, logger: this.config.logger, signal };
  }

  private retrying<T>(description: string, call: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(() => call(signal), {
      policy: this.config.retry,
      logger: this.config.logger,
      signal,
      description,
    });
  }

  // ===========================================================================
  // Schema
  // ===========================================================================

  /**
   * Create a table
   *
   * @example
   * ```ts
   * await client.createTable({
   *   tableName: 'events',
   *   schema: {
   *     columns: { age: { dtype: 'int64' }, tags: { dtype: 'string', nestedListDepth: 1 } },
   *     partitioning: { day: { dtype: 'timestamp_minute' } },
   *   },
   *   mode: 'add_new_columns',
   * });
   * ```
   */
  async createTable(body: RequestBody<CreateTableRequest>, options: CallOptions = {}): Promise<CreateTableResult> {
    assertTableName(body.tableName);
    return this.retrying(
      `createTable ${body.tableName}`,
      (signal) => this.gateway.createTable(createCreateTableRequest(body), signal),
      options.signal
    );
  }

  async alterTable(body: RequestBody<AlterTableRequest>, options: CallOptions = {}): Promise<void> {
    assertTableName(body.tableName);
    await this.retrying(
      `alterTable ${body.tableName}`,
      (signal) => this.gateway.alterTable(createAlterTableRequest(body), signal),
      options.signal
    );
  }

  async dropTable(body: RequestBody<DropTableRequest>, options: CallOptions = {}): Promise<void> {
    assertTableName(body.tableName);
    await this.retrying(
      `dropTable ${body.tableName}`,
      (signal) => this.gateway.dropTable(createDropTableRequest(body), signal),
      options.signal
    );
  }

  async getSchema(body: RequestBody<GetSchemaRequest>, options: CallOptions = {}): Promise<Schema> {
    assertTableName(body.tableName);
    const result = await this.retrying(
      `getSchema ${body.tableName}`,
      (signal) => this.gateway.getSchema(createGetSchemaRequest(body), signal),
      options.signal
    );
    return result.schema;
  }

  async listTables(options: CallOptions = {}): Promise<TableInfo[]> {
    const result = await this.retrying(
      'listTables',
      (signal) => this.gateway.listTables(createListTablesRequest(), signal),
      options.signal
    );
    return result.tables;
  }

  // ===========================================================================
  // Data
  // ===========================================================================

  async listSegments(body: RequestBody<ListSegmentsRequest>, options: CallOptions = {}): Promise<Segment[]> {
    assertTableName(body.tableName);
    const result = await this.retrying(
      `listSegments ${body.tableName}`,
      (signal) => this.gateway.listSegments(createListSegmentsRequest(body), signal),
      options.signal
    );
    return result.segments;
  }

  /**
   * Append rows to a partition. Sent exactly once: a failed write is not
   * retried, since the server may have applied it.
   *
   * @example
   * ```ts
   * await client.writeToPartition({
   *   tableName: 'events',
   *   partition: makePartition({ day: new Date('2024-01-01T00:00:00Z') }),
   *   rows: [makeRow({ age: 31n, tags: ['a', 'b'] })],
   * });
   * ```
   */
  async writeToPartition(body: RequestBody<WriteToPartitionRequest>, options: CallOptions = {}): Promise<void> {
    assertTableName(body.tableName);
    await this.gateway.writeToPartition(createWriteToPartitionRequest(body), options.signal);
  }

  async deleteFromSegment(body: RequestBody<DeleteFromSegmentRequest>, options: CallOptions = {}): Promise<void> {
    assertValidSegmentKey(body);
    await this.retrying(
      `deleteFromSegment ${body.tableName}/${body.segmentId}`,
      (signal) => this.gateway.deleteFromSegment(createDeleteFromSegmentRequest(body), signal),
      options.signal
    );
  }

  // ===========================================================================
  // Raw segment reads
  // ===========================================================================

  /**
   * Fetch one raw page of a column
   */
  async readSegmentColumn(
    body: RequestBody<ReadSegmentColumnRequest>,
    options: CallOptions = {}
  ): Promise<ReadSegmentColumnResult> {
    assertValidSegmentKey(body);
    return this.retrying(
      `readSegmentColumn ${body.tableName}.${body.columnName}`,
      (signal) => this.gateway.readSegmentColumn(createReadSegmentColumnRequest(body), signal),
      options.signal
    );
  }

  /**
   * Fetch the raw deletion bitmap of a segment
   */
  async readSegmentDeletions(
    body: RequestBody<ReadSegmentDeletionsRequest>,
    options: CallOptions = {}
  ): Promise<ReadSegmentDeletionsResult> {
    assertValidSegmentKey(body);
    return this.retrying(
      `readSegmentDeletions ${body.tableName}/${body.segmentId}`,
      (signal) => this.gateway.readSegmentDeletions(createReadSegmentDeletionsRequest(body), signal),
      options.signal
    );
  }

  // ===========================================================================
  // Decoded segment reads
  // ===========================================================================

  /**
   * Deletion mask of a segment; index i is true when row i is deleted.
   * Empty when nothing has been deleted.
   */
  async decodeIsDeleted(key: SegmentKey, correlationId?: string, options: CallOptions = {}): Promise<boolean[]> {
    assertValidSegmentKey(key);
    return readDeletionMask(this.gateway, key, correlationId ?? newCorrelationId(), this.readOptions(options.signal));
  }

  /**
   * Every value of one column of a segment, in row order
   */
  async decodeSegmentColumn(
    key: SegmentKey,
    column: ColumnDescriptor,
    options: DecodeColumnOptions = {}
  ): Promise<FieldValue[]> {
    assertValidSegmentKey(key);
    assertValidColumn(column);
    const values = await readColumnStream(
      this.gateway,
      { segment: key, column, correlationId: options.correlationId ?? newCorrelationId() },
      this.readOptions(options.signal)
    );
    return options.isDeleted ? applyDeletionMask(values, options.isDeleted) : values;
  }

  /**
   * Rows of a segment with the given columns, in column order
   *
   * @example
   * ```ts
   * const rows = await client.decodeSegment(key, [
   *   { name: 'age', dtype: 'int64' },
   *   { name: 'name', dtype: 'string' },
   * ]);
   * for (const row of rows) {
   *   console.log(row.get('name'), row.get('age'));
   * }
   * ```
   */
  decodeSegment(
    key: SegmentKey,
    columns: readonly ColumnDescriptor[],
    options: DecodeSegmentOptions = {}
  ): Promise<Row[]> {
    return decodeSegment(this.gateway, key, columns, {
      ...this.readOptions(options.signal),
      correlationId: options.correlationId,
      applyDeletions: options.applyDeletions,
    });
  }

  /**
   * Read one column as values, or several columns as rows
   */
  read(key: SegmentKey, column: ColumnDescriptor, options?: DecodeColumnOptions): Promise<FieldValue[]>;
  read(key: SegmentKey, columns: readonly ColumnDescriptor[], options?: DecodeSegmentOptions): Promise<Row[]>;
  read(
    key: SegmentKey,
    columns: ColumnDescriptor | readonly ColumnDescriptor[],
    options: DecodeColumnOptions & DecodeSegmentOptions = {}
  ): Promise<FieldValue[] | Row[]> {
    if (isColumnList(columns)) {
      return this.decodeSegment(key, columns, options);
    }
    return this.decodeSegmentColumn(key, columns, options);
  }
}

/**
 * Create a Shortstack client
 *
 * @example
 * ```ts
 * import { createClient } from 'shortstack';
 *
 * const client = createClient({ endpoint: 'https://datastore.example.com/rpc', token: 'test-secret' });
 * const segments = await client.listSegments({ tableName: 'events' });
 * ```
 */
export function createClient(config: ClientConfig, gateway?: Gateway): ShortstackClient {
  return new ShortstackClient(config, gateway);
}
