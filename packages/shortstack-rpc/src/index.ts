/**
 * shortstack-rpc
 *
 * Wire protocol, data model types and message validation for Shortstack
 */

// Types
export type {
  DataType,
  PartitionDataType,
  ColumnMeta,
  ColumnDescriptor,
  PartitionMeta,
  Schema,
  Timestamp,
  FieldValue,
  PartitionFieldValue,
  PartitionField,
  SegmentKey,
  SegmentMetadata,
  Segment,
  TableInfo,
  WriteRow,
} from './types.js';

export {
  DATA_TYPES,
  PARTITION_DATA_TYPES,
  isDataType,
  isPartitionDataType,
  isTimestamp,
  isFieldValue,
  isPartitionFieldValue,
  validateColumnDescriptor,
  validateSegmentKey,
} from './types.js';

// Protocol
export {
  MessageType,
  SCHEMA_MODES,
  createMessageId,
  createCreateTableRequest,
  createAlterTableRequest,
  createDropTableRequest,
  createGetSchemaRequest,
  createListTablesRequest,
  createListSegmentsRequest,
  createWriteToPartitionRequest,
  createDeleteFromSegmentRequest,
  createReadSegmentDeletionsRequest,
  createReadSegmentColumnRequest,
  createResultResponse,
  createErrorResponse,
  isRpcMessage,
  isErrorResponse,
  isResultResponse,
} from './protocol.js';

export type {
  RpcMessage,
  SchemaMode,
  CreateTableRequest,
  AlterTableRequest,
  DropTableRequest,
  GetSchemaRequest,
  ListTablesRequest,
  ListSegmentsRequest,
  WriteToPartitionRequest,
  DeleteFromSegmentRequest,
  ReadSegmentDeletionsRequest,
  ReadSegmentColumnRequest,
  EmptyResult,
  CreateTableResult,
  AlterTableResult,
  DropTableResult,
  GetSchemaResult,
  ListTablesResult,
  ListSegmentsResult,
  WriteToPartitionResult,
  DeleteFromSegmentResult,
  ReadSegmentDeletionsResult,
  ReadSegmentColumnResult,
  ResultResponse,
  ErrorResponse,
  Request,
  RequestType,
  RequestBody,
  ResultMap,
  ResultOf,
  Response,
} from './protocol.js';

// Validation
export {
  DataTypeSchema,
  PartitionDataTypeSchema,
  TimestampSchema,
  FieldValueSchema,
  PartitionFieldValueSchema,
  PartitionFieldSchema,
  ColumnMetaSchema,
  TableSchemaSchema,
  SegmentSchema,
  RequestSchema,
  ResponseSchema,
  RESULT_SCHEMAS,
} from './schemas.js';

// Serialization
export {
  MessageParseError,
  serializeRequest,
  serializeResponse,
  deserializeRequest,
  deserializeResponse,
} from './serialization.js';

export type { DecodedResponse } from './serialization.js';
