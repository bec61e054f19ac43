/**
 * Shortstack error classes
 *
 * Every error thrown by the client extends ShortstackError, which carries a
 * machine-readable code and whether the failed call is safe to retry.
 */

import type { SegmentKey } from 'shortstack-rpc';

export const ErrorCode = {
  TRANSPORT: 'TRANSPORT',
  SERVER: 'SERVER',
  PROTOCOL: 'PROTOCOL',
  DECODE: 'DECODE',
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  ROW_ALIGNMENT: 'ROW_ALIGNMENT',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Server error codes that indicate a transient condition
 */
export const RETRYABLE_SERVER_CODES = ['UNAVAILABLE', 'RESOURCE_EXHAUSTED', 'TIMEOUT'] as const;

const RETRYABLE_SERVER_CODES_SET: ReadonlySet<string> = new Set(RETRYABLE_SERVER_CODES);

/**
 * Base error for all Shortstack failures
 *
 * @example
 * ```ts
 * try {
 *   await client.decodeSegment(key, columns);
 * } catch (error) {
 *   if (error instanceof ShortstackError && error.code === ErrorCode.ROW_ALIGNMENT) {
 *     // server-side inconsistency, do not retry
 *   }
 * }
 * ```
 */
export class ShortstackError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ShortstackError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Network or RPC failure: connection refused, timeout, HTTP 408/429/5xx.
 * Reads may be retried at the same continuation token.
 */
export class TransportError extends ShortstackError {
  /** HTTP status, when the server answered at all */
  readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(ErrorCode.TRANSPORT, message, { retryable: true, cause: options?.cause });
    this.name = 'TransportError';
    this.status = options?.status;
  }
}

/**
 * The server answered with an error message
 */
export class ServerError extends ShortstackError {
  /** Error code sent by the server, e.g. NOT_FOUND */
  readonly serverCode: string;
  readonly details: unknown;

  constructor(serverCode: string, message: string, details?: unknown) {
    super(ErrorCode.SERVER, message, { retryable: RETRYABLE_SERVER_CODES_SET.has(serverCode) });
    this.name = 'ServerError';
    this.serverCode = serverCode;
    this.details = details;
  }
}

/**
 * The response could not be parsed or did not match the message schema
 */
export class ProtocolError extends ShortstackError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.PROTOCOL, message, { cause });
    this.name = 'ProtocolError';
  }
}

/**
 * Malformed or truncated page bytes
 */
export class DecodeError extends ShortstackError {
  /** Byte offset within the page where decoding failed */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(ErrorCode.DECODE, `${message} (at byte ${offset})`);
    this.name = 'DecodeError';
    this.offset = offset;
  }
}

/**
 * The page encodes a different type than the column descriptor declares
 */
export class TypeMismatchError extends ShortstackError {
  readonly column: string;
  readonly expected: string;
  readonly actual: string;

  constructor(column: string, expected: string, actual: string) {
    super(ErrorCode.TYPE_MISMATCH, `Column ${column} declared as ${expected} but page encodes ${actual}`);
    this.name = 'TypeMismatchError';
    this.column = column;
    this.expected = expected;
    this.actual = actual;
  }
}

function describePartition(key: SegmentKey): string {
  const fields = key.partition.map(({ name, value }) => {
    const text = typeof value === 'object' ? `${value.seconds}s+${value.nanos}ns` : String(value);
    return `${name}=${text}`;
  });
  return `{${fields.join(', ')}}`;
}

/**
 * Columns of one segment decoded to different lengths
 */
export class RowAlignmentError extends ShortstackError {
  readonly segment: SegmentKey;
  /** Decoded value count per column, in request order */
  readonly lengths: Readonly<Record<string, number>>;

  constructor(segment: SegmentKey, lengths: Record<string, number>) {
    const summary = Object.entries(lengths)
      .map(([name, length]) => `${name}=${length}`)
      .join(', ');
    super(
      ErrorCode.ROW_ALIGNMENT,
      `Column lengths disagree in table ${segment.tableName} partition ${describePartition(segment)} ` +
        `segment ${segment.segmentId}: ${summary}`
    );
    this.name = 'RowAlignmentError';
    this.segment = segment;
    this.lengths = lengths;
  }
}

/**
 * The caller passed arguments the client rejects before any network call
 */
export class InvalidArgumentError extends ShortstackError {
  constructor(message: string) {
    super(ErrorCode.INVALID_ARGUMENT, message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Checks if an error is safe to retry
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ShortstackError && error.retryable;
}
