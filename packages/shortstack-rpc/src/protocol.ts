/**
 * Shortstack RPC Protocol
 *
 * Defines the wire protocol between ShortstackClient and the datastore
 * server. Every call is a unary request answered by a RESULT or ERROR
 * message carrying the same id.
 */

import type {
  ColumnMeta,
  PartitionField,
  Schema,
  Segment,
  TableInfo,
  WriteRow,
} from './types.js';

/**
 * RPC message types
 */
export enum MessageType {
  // Schema operations
  CREATE_TABLE = 0x01,
  ALTER_TABLE = 0x02,
  DROP_TABLE = 0x03,
  GET_SCHEMA = 0x04,
  LIST_TABLES = 0x05,

  // Data operations
  LIST_SEGMENTS = 0x10,
  WRITE_TO_PARTITION = 0x11,
  DELETE_FROM_SEGMENT = 0x12,

  // Segment reads
  READ_SEGMENT_DELETIONS = 0x20,
  READ_SEGMENT_COLUMN = 0x21,

  // Response types
  RESULT = 0x80,
  ERROR = 0x81,
}

/**
 * Base RPC message
 */
export interface RpcMessage {
  type: MessageType;
  id: string;
  timestamp: number;
}

export const SCHEMA_MODES = ['fail_if_exists', 'ok_if_exact', 'add_new_columns'] as const;

/**
 * How createTable treats an existing table of the same name
 */
export type SchemaMode = (typeof SCHEMA_MODES)[number];

export interface CreateTableRequest extends RpcMessage {
  type: MessageType.CREATE_TABLE;
  tableName: string;
  schema: Schema;
  mode?: SchemaMode;
}

export interface AlterTableRequest extends RpcMessage {
  type: MessageType.ALTER_TABLE;
  tableName: string;
  newColumns: Record<string, ColumnMeta>;
}

export interface DropTableRequest extends RpcMessage {
  type: MessageType.DROP_TABLE;
  tableName: string;
}

export interface GetSchemaRequest extends RpcMessage {
  type: MessageType.GET_SCHEMA;
  tableName: string;
}

export interface ListTablesRequest extends RpcMessage {
  type: MessageType.LIST_TABLES;
}

export interface ListSegmentsRequest extends RpcMessage {
  type: MessageType.LIST_SEGMENTS;
  tableName: string;
  /** Only segments whose partition matches every field */
  partitionFilter?: PartitionField[];
  includeMetadata?: boolean;
}

export interface WriteToPartitionRequest extends RpcMessage {
  type: MessageType.WRITE_TO_PARTITION;
  tableName: string;
  partition: PartitionField[];
  rows: WriteRow[];
}

export interface DeleteFromSegmentRequest extends RpcMessage {
  type: MessageType.DELETE_FROM_SEGMENT;
  tableName: string;
  partition: PartitionField[];
  segmentId: string;
  rowIds: number[];
}

/**
 * Read the deletion bitmap of a segment
 */
export interface ReadSegmentDeletionsRequest extends RpcMessage {
  type: MessageType.READ_SEGMENT_DELETIONS;
  tableName: string;
  partition: PartitionField[];
  segmentId: string;
  correlationId: string;
}

/**
 * Read one page of a segment column.
 *
 * The first request omits continuationToken; each following request passes
 * the token of the response immediately before it.
 */
export interface ReadSegmentColumnRequest extends RpcMessage {
  type: MessageType.READ_SEGMENT_COLUMN;
  tableName: string;
  partition: PartitionField[];
  segmentId: string;
  columnName: string;
  correlationId: string;
  continuationToken?: string;
}

// =============================================================================
// Results
// =============================================================================

export interface CreateTableResult {
  alreadyExists: boolean;
  columnsAdded: string[];
}

/**
 * Result of calls that only acknowledge
 */
export type EmptyResult = Record<never, never>;

export type AlterTableResult = EmptyResult;

export type DropTableResult = EmptyResult;

export interface GetSchemaResult {
  schema: Schema;
}

export interface ListTablesResult {
  tables: TableInfo[];
}

export interface ListSegmentsResult {
  segments: Segment[];
}

export type WriteToPartitionResult = EmptyResult;

export type DeleteFromSegmentResult = EmptyResult;

export interface ReadSegmentDeletionsResult {
  data: Uint8Array;
}

/**
 * One page of column data
 */
export interface ReadSegmentColumnResult {
  data: Uint8Array;
  /** Present and non-empty while more pages remain */
  continuationToken?: string;
  /** Rows that predate the column and read as null */
  implicitNullsCount?: number;
  /** Compression codec of data; empty or absent for plain pages */
  codec?: string;
}

/**
 * Successful response
 */
export interface ResultResponse<T = unknown> extends RpcMessage {
  type: MessageType.RESULT;
  result: T;
}

/**
 * Error response
 */
export interface ErrorResponse extends RpcMessage {
  type: MessageType.ERROR;
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Union of all request types
 */
export type Request =
  | CreateTableRequest
  | AlterTableRequest
  | DropTableRequest
  | GetSchemaRequest
  | ListTablesRequest
  | ListSegmentsRequest
  | WriteToPartitionRequest
  | DeleteFromSegmentRequest
  | ReadSegmentDeletionsRequest
  | ReadSegmentColumnRequest;

/**
 * Maps each request type to the result it is answered with
 */
export interface ResultMap {
  [MessageType.CREATE_TABLE]: CreateTableResult;
  [MessageType.ALTER_TABLE]: AlterTableResult;
  [MessageType.DROP_TABLE]: DropTableResult;
  [MessageType.GET_SCHEMA]: GetSchemaResult;
  [MessageType.LIST_TABLES]: ListTablesResult;
  [MessageType.LIST_SEGMENTS]: ListSegmentsResult;
  [MessageType.WRITE_TO_PARTITION]: WriteToPartitionResult;
  [MessageType.DELETE_FROM_SEGMENT]: DeleteFromSegmentResult;
  [MessageType.READ_SEGMENT_DELETIONS]: ReadSegmentDeletionsResult;
  [MessageType.READ_SEGMENT_COLUMN]: ReadSegmentColumnResult;
}

export type RequestType = Request['type'];

export type ResultOf<R extends Request> = ResultMap[R['type']];

/**
 * Union of all response types
 */
export type Response = ResultResponse | ErrorResponse;

/**
 * Request payload without the envelope fields
 */
export type RequestBody<R extends Request> = Omit<R, keyof RpcMessage>;

/**
 * Create a unique message ID
 */
export function createMessageId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

function envelope<T extends MessageType>(type: T): { type: T; id: string; timestamp: number } {
  return { type, id: createMessageId(), timestamp: Date.now() };
}

export function createCreateTableRequest(body: RequestBody<CreateTableRequest>): CreateTableRequest {
  return { ...envelope(MessageType.CREATE_TABLE), ...body };
}

export function createAlterTableRequest(body: RequestBody<AlterTableRequest>): AlterTableRequest {
  return { ...envelope(MessageType.ALTER_TABLE), ...body };
}

export function createDropTableRequest(body: RequestBody<DropTableRequest>): DropTableRequest {
  return { ...envelope(MessageType.DROP_TABLE), ...body };
}

export function createGetSchemaRequest(body: RequestBody<GetSchemaRequest>): GetSchemaRequest {
  return { ...envelope(MessageType.GET_SCHEMA), ...body };
}

export function createListTablesRequest(): ListTablesRequest {
  return envelope(MessageType.LIST_TABLES);
}

export function createListSegmentsRequest(body: RequestBody<ListSegmentsRequest>): ListSegmentsRequest {
  return { ...envelope(MessageType.LIST_SEGMENTS), ...body };
}

export function createWriteToPartitionRequest(
  body: RequestBody<WriteToPartitionRequest>
): WriteToPartitionRequest {
  return { ...envelope(MessageType.WRITE_TO_PARTITION), ...body };
}

export function createDeleteFromSegmentRequest(
  body: RequestBody<DeleteFromSegmentRequest>
): DeleteFromSegmentRequest {
  return { ...envelope(MessageType.DELETE_FROM_SEGMENT), ...body };
}

/**
 * Create a read segment deletions request
 */
export function createReadSegmentDeletionsRequest(
  body: RequestBody<ReadSegmentDeletionsRequest>
): ReadSegmentDeletionsRequest {
  return { ...envelope(MessageType.READ_SEGMENT_DELETIONS), ...body };
}

/**
 * Create a read segment column request
 */
export function createReadSegmentColumnRequest(
  body: RequestBody<ReadSegmentColumnRequest>
): ReadSegmentColumnRequest {
  return { ...envelope(MessageType.READ_SEGMENT_COLUMN), ...body };
}

/**
 * Create a result response
 */
export function createResultResponse<T>(requestId: string, result: T): ResultResponse<T> {
  return {
    type: MessageType.RESULT,
    id: requestId,
    timestamp: Date.now(),
    result,
  };
}

/**
 * Create an error response
 */
export function createErrorResponse(
  requestId: string,
  code: string,
  message: string,
  details?: unknown
): ErrorResponse {
  return {
    type: MessageType.ERROR,
    id: requestId,
    timestamp: Date.now(),
    code,
    message,
    ...(details !== undefined && { details }),
  };
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if value carries the RpcMessage envelope
 */
export function isRpcMessage(value: unknown): value is RpcMessage {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('type' in value) || !('id' in value) || !('timestamp' in value)) {
    return false;
  }
  return (
    typeof value.type === 'number' &&
    value.type in MessageType &&
    typeof value.id === 'string' &&
    typeof value.timestamp === 'number'
  );
}

export function isErrorResponse(value: unknown): value is ErrorResponse {
  return isRpcMessage(value) && value.type === MessageType.ERROR;
}

export function isResultResponse(value: unknown): value is ResultResponse {
  return isRpcMessage(value) && value.type === MessageType.RESULT;
}
