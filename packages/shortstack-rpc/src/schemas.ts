/**
 * Shortstack Zod Schemas
 *
 * Runtime validation for every message that crosses the wire. Values are
 * validated after the serialization reviver has restored bigint and
 * Uint8Array values.
 */

import { z } from 'zod';

import { MessageType, SCHEMA_MODES } from './protocol.js';
import type { Request, RequestType, ResultMap } from './protocol.js';
import { DATA_TYPES, PARTITION_DATA_TYPES } from './types.js';
import type { FieldValue, PartitionFieldValue, Timestamp } from './types.js';

// =============================================================================
// Data Model Schemas
// =============================================================================

export const DataTypeSchema = z.enum(DATA_TYPES);

export const PartitionDataTypeSchema = z.enum(PARTITION_DATA_TYPES);

export const TimestampSchema: z.ZodType<Timestamp> = z.object({
  seconds: z.number().int(),
  nanos: z.number().int().min(0).lt(1_000_000_000),
});

export const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.string(),
    z.bigint(),
    z.boolean(),
    z.number(),
    z.instanceof(Uint8Array),
    TimestampSchema,
    z.array(FieldValueSchema),
  ])
);

export const PartitionFieldValueSchema: z.ZodType<PartitionFieldValue> = z.union([
  z.string(),
  z.bigint(),
  z.boolean(),
  TimestampSchema,
]);

export const PartitionFieldSchema = z.object({
  name: z.string().min(1),
  value: PartitionFieldValueSchema,
});

export const ColumnMetaSchema = z.object({
  dtype: DataTypeSchema,
  nestedListDepth: z.number().int().min(0).max(255).optional(),
});

export const TableSchemaSchema = z.object({
  columns: z.record(z.string(), ColumnMetaSchema),
  partitioning: z.record(z.string(), z.object({ dtype: PartitionDataTypeSchema })),
});

export const SegmentSchema = z.object({
  segmentId: z.string().min(1),
  partition: z.array(PartitionFieldSchema),
  metadata: z
    .object({
      rowCount: z.number().int().nonnegative(),
      deletionCount: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

// =============================================================================
// Request Schemas
// =============================================================================

const envelope = {
  id: z.string().min(1),
  timestamp: z.number().int(),
};

const segmentTarget = {
  tableName: z.string().min(1),
  partition: z.array(PartitionFieldSchema),
  segmentId: z.string().min(1),
};

export const CreateTableRequestSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.CREATE_TABLE),
  tableName: z.string().min(1),
  schema: TableSchemaSchema,
  mode: z.enum(SCHEMA_MODES).optional(),
});

export const AlterTableRequestSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.ALTER_TABLE),
  tableName: z.string().min(1),
  newColumns: z.record(z.string(), ColumnMetaSchema),
});

export const DropTableRequestSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.DROP_TABLE),
  tableName: z.string().min(1),
});

export const GetSchemaRequestSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.GET_SCHEMA),
  tableName: z.string().min(1),
});

export const ListTablesRequestSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.LIST_TABLES),
});

export const ListSegmentsRequestSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.LIST_SEGMENTS),
  tableName: z.string().min(1),
  partitionFilter: z.array(PartitionFieldSchema).optional(),
  includeMetadata: z.boolean().optional(),
});

export const WriteToPartitionRequestSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.WRITE_TO_PARTITION),
  tableName: z.string().min(1),
  partition: z.array(PartitionFieldSchema),
  rows: z.array(z.record(z.string(), FieldValueSchema)),
});

export const DeleteFromSegmentRequestSchema = z.object({
  ...envelope,
  ...segmentTarget,
  type: z.literal(MessageType.DELETE_FROM_SEGMENT),
  rowIds: z.array(z.number().int().nonnegative()),
});

export const ReadSegmentDeletionsRequestSchema = z.object({
  ...envelope,
  ...segmentTarget,
  type: z.literal(MessageType.READ_SEGMENT_DELETIONS),
  correlationId: z.string().min(1),
});

export const ReadSegmentColumnRequestSchema = z.object({
  ...envelope,
  ...segmentTarget,
  type: z.literal(MessageType.READ_SEGMENT_COLUMN),
  columnName: z.string().min(1),
  correlationId: z.string().min(1),
  continuationToken: z.string().optional(),
});

export const RequestSchema: z.ZodType<Request> = z.discriminatedUnion('type', [
  CreateTableRequestSchema,
  AlterTableRequestSchema,
  DropTableRequestSchema,
  GetSchemaRequestSchema,
  ListTablesRequestSchema,
  ListSegmentsRequestSchema,
  WriteToPartitionRequestSchema,
  DeleteFromSegmentRequestSchema,
  ReadSegmentDeletionsRequestSchema,
  ReadSegmentColumnRequestSchema,
]);

// =============================================================================
// Response Schemas
// =============================================================================

export const ResultResponseSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.RESULT),
  result: z.unknown(),
});

export const ErrorResponseSchema = z.object({
  ...envelope,
  type: z.literal(MessageType.ERROR),
  code: z.string().min(1),
  message: z.string(),
  details: z.unknown().optional(),
});

export const ResponseSchema = z.discriminatedUnion('type', [
  ResultResponseSchema,
  ErrorResponseSchema,
]);

const EmptyResultSchema = z.object({});

/**
 * Schema of the result payload answering each request type
 */
export const RESULT_SCHEMAS: { [K in RequestType]: z.ZodType<ResultMap[K]> } = {
  [MessageType.CREATE_TABLE]: z.object({
    alreadyExists: z.boolean(),
    columnsAdded: z.array(z.string()),
  }),
  [MessageType.ALTER_TABLE]: EmptyResultSchema,
  [MessageType.DROP_TABLE]: EmptyResultSchema,
  [MessageType.GET_SCHEMA]: z.object({ schema: TableSchemaSchema }),
  [MessageType.LIST_TABLES]: z.object({
    tables: z.array(z.object({ tableName: z.string().min(1) })),
  }),
  [MessageType.LIST_SEGMENTS]: z.object({ segments: z.array(SegmentSchema) }),
  [MessageType.WRITE_TO_PARTITION]: EmptyResultSchema,
  [MessageType.DELETE_FROM_SEGMENT]: EmptyResultSchema,
  [MessageType.READ_SEGMENT_DELETIONS]: z.object({ data: z.instanceof(Uint8Array) }),
  [MessageType.READ_SEGMENT_COLUMN]: z.object({
    data: z.instanceof(Uint8Array),
    continuationToken: z.string().optional(),
    implicitNullsCount: z.number().int().nonnegative().optional(),
    codec: z.string().optional(),
  }),
};
