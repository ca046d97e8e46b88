/**
 * JSON-RPC envelope types
 *
 * Wire contract shared by every transport: request/response objects,
 * subscription push notifications and the reserved error codes.
 *
 * @module rpc/types
 */

/**
 * Request identifier. Servers echo it back verbatim, so a number stays a
 * number and a string stays a string.
 */
export type RequestId = number | string;

export interface RpcRequest {
  jsonrpc: '2.0';
  id: RequestId;
  method: string;
  params?: unknown;
}

/**
 * Request as handed to a transport. `jsonrpc` and `id` are filled in by the
 * transport when absent.
 */
export interface RpcRequestInput {
  jsonrpc?: '2.0';
  id?: RequestId;
  method: string;
  params?: unknown;
}

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface RpcResponse<TResult = unknown> {
  jsonrpc: '2.0';
  id: RequestId | null;
  result?: TResult;
  error?: RpcErrorObject;
}

export interface RpcSubscriptionParams {
  subscription: string;
  result: unknown;
}

/**
 * Unsolicited push frame. Distinguished from responses by `method`.
 */
export interface RpcSubscriptionNotification {
  jsonrpc: '2.0';
  method: 'eth_subscription';
  params: RpcSubscriptionParams;
}

export type RpcIncomingMessage = RpcResponse | RpcSubscriptionNotification;

export const SUBSCRIPTION_METHOD = 'eth_subscription';

/**
 * Standard JSON-RPC 2.0 codes
 */
export const RPC_ERROR_CODE_PARSE = -32700;
export const RPC_ERROR_CODE_INVALID_REQUEST = -32600;
export const RPC_ERROR_CODE_METHOD_NOT_FOUND = -32601;
export const RPC_ERROR_CODE_INVALID_PARAMS = -32602;
export const RPC_ERROR_CODE_INTERNAL = -32603;

/**
 * Server-defined codes (EIP-1474)
 */
export const RPC_ERROR_CODE_INVALID_INPUT = -32000;
export const RPC_ERROR_CODE_RESOURCE_NOT_FOUND = -32001;
export const RPC_ERROR_CODE_RESOURCE_UNAVAILABLE = -32002;
export const RPC_ERROR_CODE_TRANSACTION_REJECTED = -32003;
export const RPC_ERROR_CODE_METHOD_NOT_SUPPORTED = -32004;
export const RPC_ERROR_CODE_LIMIT_EXCEEDED = -32005;
export const RPC_ERROR_CODE_VERSION_UNSUPPORTED = -32006;

/**
 * RPC error codes worth another attempt. -1 is what several node
 * implementations use for "unknown / try again".
 */
export const RETRYABLE_RPC_ERROR_CODES = [
  -1,
  RPC_ERROR_CODE_LIMIT_EXCEEDED,
  RPC_ERROR_CODE_INTERNAL,
] as const;

/**
 * HTTP statuses worth another attempt
 */
export const RETRYABLE_HTTP_STATUS_CODES = [403, 408, 413, 429, 500, 502, 503, 504] as const;
