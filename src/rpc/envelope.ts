/**
 * JSON-RPC wire codec
 *
 * Normalizes outgoing requests, serializes them, and classifies incoming
 * frames. Ids travel untouched: a number stays a number, a string stays a
 * string.
 *
 * @module rpc/envelope
 */

import type { IdGenerator } from './IdGenerator.js';
import {
  SUBSCRIPTION_METHOD,
  type RequestId,
  type RpcErrorObject,
  type RpcRequest,
  type RpcRequestInput,
  type RpcResponse,
  type RpcSubscriptionNotification,
} from './types.js';

export function normalizeRequest(input: RpcRequestInput, idGenerator: IdGenerator): RpcRequest {
  const request: RpcRequest = {
    jsonrpc: '2.0',
    id: input.id ?? idGenerator.next(),
    method: input.method,
  };
  if (input.params !== undefined) {
    request.params = input.params;
  }
  return request;
}

export function serializeRequest(request: RpcRequest | RpcRequest[]): string {
  return JSON.stringify(request);
}

/**
 * @throws SyntaxError when the text is not JSON
 */
export function parseMessage(text: string): unknown {
  return JSON.parse(text);
}

/**
 * Correlation key for pending-request maps. Keeps `1` and `"1"` apart.
 */
export function requestKey(id: RequestId): string {
  return `${typeof id}:${id}`;
}

export function isRequestId(value: unknown): value is RequestId {
  return typeof value === 'number' || typeof value === 'string';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRpcErrorObject(value: unknown): value is RpcErrorObject {
  return isRecord(value) && typeof value.code === 'number' && typeof value.message === 'string';
}

export function isRpcResponse(value: unknown): value is RpcResponse {
  if (!isRecord(value) || 'method' in value) return false;
  if (!(value.id === null || isRequestId(value.id))) return false;
  if (value.error !== undefined) return isRpcErrorObject(value.error);
  return 'result' in value;
}

export function isSubscriptionNotification(value: unknown): value is RpcSubscriptionNotification {
  if (!isRecord(value) || value.method !== SUBSCRIPTION_METHOD) return false;
  const params = value.params;
  return isRecord(params) && typeof params.subscription === 'string' && 'result' in params;
}

/**
 * Validates a batch reply body.
 * @returns The well-formed responses; malformed entries are dropped, so their
 * callers end up with a missing response.
 * @throws TypeError when the body is not an array
 */
export function parseBatchResponse(value: unknown): RpcResponse[] {
  if (!Array.isArray(value)) {
    throw new TypeError('Batch reply is not a JSON array');
  }
  return value.filter(isRpcResponse);
}
