/**
 * Shortstack RPC - Serialization Module
 *
 * JSON serialization and deserialization for RPC messages. Binary data and
 * 64-bit integers survive the round trip through tagged objects.
 */

import type { z } from 'zod';

import { MessageType } from './protocol.js';
import type { ErrorResponse, Request, RequestType, Response, ResultMap, RpcMessage } from './protocol.js';
import { RESULT_SCHEMAS, RequestSchema, ResponseSchema } from './schemas.js';

/**
 * Error thrown when a message cannot be parsed or fails validation.
 *
 * Indicates a protocol mismatch or corrupt payload rather than a transient
 * failure, so callers should not retry on it.
 */
export class MessageParseError extends Error {
  /** The raw message that failed to parse (truncated) */
  readonly rawMessage: string | undefined;

  constructor(message: string, rawMessage?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MessageParseError';
    this.rawMessage = rawMessage !== undefined ? rawMessage.substring(0, 1000) : undefined;
  }
}

/**
 * Custom replacer for JSON.stringify that handles special types
 */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return { __type: 'BigInt', value: value.toString() };
  }
  if (value instanceof Uint8Array) {
    let binary = '';
    for (const byte of value) {
      binary += String.fromCharCode(byte);
    }
    return { __type: 'Uint8Array', data: btoa(binary) };
  }
  return value;
}

/**
 * Custom reviver for JSON.parse that handles special types
 */
function jsonReviver(_key: string, value: unknown): unknown {
  if (typeof value !== 'object' || value === null || !('__type' in value)) {
    return value;
  }
  if (value.__type === 'Uint8Array' && 'data' in value && typeof value.data === 'string') {
    const binary = atob(value.data);
    const bytes = new Uint8Array(binary.length);
    for (let i = 0; i < binary.length; i++) {
      bytes[i] = binary.charCodeAt(i);
    }
    return bytes;
  }
  if (value.__type === 'BigInt' && 'value' in value && typeof value.value === 'string') {
    return BigInt(value.value);
  }
  return value;
}

function parseJson(json: string): unknown {
  try {
    return JSON.parse(json, jsonReviver);
  } catch (error) {
    throw new MessageParseError('Invalid JSON', json, { cause: error });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function serializeMessage(message: RpcMessage): string {
  return JSON.stringify(message, jsonReplacer);
}

/**
 * Serialize a request to JSON string
 */
export function serializeRequest(request: Request): string {
  return serializeMessage(request);
}

/**
 * Serialize a response to JSON string
 */
export function serializeResponse(response: Response): string {
  return serializeMessage(response);
}

/**
 * Deserialize a JSON string to a validated Request
 */
export function deserializeRequest(json: string): Request {
  const parsed = RequestSchema.safeParse(parseJson(json));
  if (!parsed.success) {
    throw new MessageParseError(`Invalid request: ${describeIssues(parsed.error)}`, json);
  }
  return parsed.data;
}

/**
 * A response whose result payload has been validated for the request type
 * it answers
 */
export type DecodedResponse<K extends RequestType> =
  | { type: 'result'; id: string; result: ResultMap[K] }
  | { type: 'error'; error: ErrorResponse };

/**
 * Deserialize a JSON string to the response answering a request of the
 * given type
 */
export function deserializeResponse<K extends RequestType>(json: string, requestType: K): DecodedResponse<K> {
  const parsed = ResponseSchema.safeParse(parseJson(json));
  if (!parsed.success) {
    throw new MessageParseError(`Invalid response: ${describeIssues(parsed.error)}`, json);
  }
  const response = parsed.data;
  if (response.type === MessageType.ERROR) {
    return { type: 'error', error: response };
  }

  const schema: z.ZodType<ResultMap[K]> = RESULT_SCHEMAS[requestType];
  const result = schema.safeParse(response.result);
  if (!result.success) {
    throw new MessageParseError(`Invalid result: ${describeIssues(result.error)}`, json);
  }
  return { type: 'result', id: response.id, result: result.data };
}
