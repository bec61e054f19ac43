/**
 * Raw RPC gateway
 *
 * One method per unary call. Each call makes a single attempt; retry is
 * layered on top by the client.
 */

import {
  MessageParseError,
  MessageType,
  deserializeResponse,
  serializeRequest,
} from 'shortstack-rpc';
import type {
  AlterTableRequest,
  AlterTableResult,
  CreateTableRequest,
  CreateTableResult,
  DecodedResponse,
  DeleteFromSegmentRequest,
  DeleteFromSegmentResult,
  DropTableRequest,
  DropTableResult,
  GetSchemaRequest,
  GetSchemaResult,
  ListSegmentsRequest,
  ListSegmentsResult,
  ListTablesRequest,
  ListTablesResult,
  ReadSegmentColumnRequest,
  ReadSegmentColumnResult,
  ReadSegmentDeletionsRequest,
  ReadSegmentDeletionsResult,
  Request,
  RequestType,
  ResultOf,
  WriteToPartitionRequest,
  WriteToPartitionResult,
} from 'shortstack-rpc';

import type { ResolvedConfig } from './config.js';
import { ProtocolError, ServerError, TransportError } from './errors.js';

/**
 * Transport to the datastore server.
 *
 * Implementations reject with TransportError for network-level failures,
 * ServerError when the server answers with an error and ProtocolError when
 * the answer cannot be understood.
 */
export interface Gateway {
  createTable(request: CreateTableRequest, signal?: AbortSignal): Promise<CreateTableResult>;
  alterTable(request: AlterTableRequest, signal?: AbortSignal): Promise<AlterTableResult>;
  dropTable(request: DropTableRequest, signal?: AbortSignal): Promise<DropTableResult>;
  getSchema(request: GetSchemaRequest, signal?: AbortSignal): Promise<GetSchemaResult>;
  listTables(request: ListTablesRequest, signal?: AbortSignal): Promise<ListTablesResult>;
  listSegments(request: ListSegmentsRequest, signal?: AbortSignal): Promise<ListSegmentsResult>;
  writeToPartition(request: WriteToPartitionRequest, signal?: AbortSignal): Promise<WriteToPartitionResult>;
  deleteFromSegment(request: DeleteFromSegmentRequest, signal?: AbortSignal): Promise<DeleteFromSegmentResult>;
  readSegmentDeletions(
    request: ReadSegmentDeletionsRequest,
    signal?: AbortSignal
  ): Promise<ReadSegmentDeletionsResult>;
  readSegmentColumn(request: ReadSegmentColumnRequest, signal?: AbortSignal): Promise<ReadSegmentColumnResult>;
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodeResponse<K extends RequestType>(text: string, type: K, name: string): DecodedResponse<K> {
  try {
    return deserializeResponse(text, type);
  } catch (error) {
    if (error instanceof MessageParseError) {
      throw new ProtocolError(`${name}: ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Gateway speaking JSON over HTTP POST
 */
export class HttpGateway implements Gateway {
  private readonly config: ResolvedConfig;

  constructor(config: ResolvedConfig) {
    this.config = config;
  }

  createTable(request: CreateTableRequest, signal?: AbortSignal): Promise<CreateTableResult> {
    return this.send(request, signal);
  }

  alterTable(request: AlterTableRequest, signal?: AbortSignal): Promise<AlterTableResult> {
    return this.send(request, signal);
  }

  dropTable(request: DropTableRequest, signal?: AbortSignal): Promise<DropTableResult> {
    return this.send(request, signal);
  }

  getSchema(request: GetSchemaRequest, signal?: AbortSignal): Promise<GetSchemaResult> {
    return this.send(request, signal);
  }

  listTables(request: ListTablesRequest, signal?: AbortSignal): Promise<ListTablesResult> {
    return this.send(request, signal);
  }

  listSegments(request: ListSegmentsRequest, signal?: AbortSignal): Promise<ListSegmentsResult> {
    return this.send(request, signal);
  }

  writeToPartition(request: WriteToPartitionRequest, signal?: AbortSignal): Promise<WriteToPartitionResult> {
    return this.send(request, signal);
  }

  deleteFromSegment(request: DeleteFromSegmentRequest, signal?: AbortSignal): Promise<DeleteFromSegmentResult> {
    return this.send(request, signal);
  }

  readSegmentDeletions(
    request: ReadSegmentDeletionsRequest,
    signal?: AbortSignal
  ): Promise<ReadSegmentDeletionsResult> {
    return this.send(request, signal);
  }

  readSegmentColumn(request: ReadSegmentColumnRequest, signal?: AbortSignal): Promise<ReadSegmentColumnResult> {
    return this.send(request, signal);
  }

  /**
   * POST one request and validate the answer against the result schema for
   * its type
   */
  private async send<R extends Request>(request: R, signal?: AbortSignal): Promise<ResultOf<R>> {
    const { endpoint, token, timeout, logger } = this.config;
    const type: RequestType = request.type;
    const name = MessageType[type];
    logger.debug(`${name} ${request.id}`);

    const timeoutSignal = AbortSignal.timeout(timeout);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    let text: string;
    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(token !== undefined ? { Authorization: `Bearer ${token}` } : {}),
        },
        body: serializeRequest(request),
        signal: combined,
      });
      if (!response.ok) {
        if (isTransientStatus(response.status)) {
          throw new TransportError(`HTTP ${response.status}: ${response.statusText}`, { status: response.status });
        }
        throw new ServerError(`HTTP_${response.status}`, `HTTP ${response.status}: ${response.statusText}`);
      }
      text = await response.text();
    } catch (error) {
      if (error instanceof TransportError || error instanceof ServerError || signal?.aborted) {
        throw error;
      }
      if (timeoutSignal.aborted) {
        throw new TransportError(`${name} timed out after ${timeout}ms`, { cause: error });
      }
      throw new TransportError(`${name} failed: ${describe(error)}`, { cause: error });
    }

    const decoded = decodeResponse<R['type']>(text, request.type, name);

    const responseId = decoded.type === 'error' ? decoded.error.id : decoded.id;
    if (responseId !== request.id) {
      throw new ProtocolError(`${name}: response id ${responseId} does not answer request ${request.id}`);
    }
    if (decoded.type === 'error') {
      const { code, message, details } = decoded.error;
      throw new ServerError(code, message, details);
    }
    return decoded.result;
  }
}
