import {
  RETRYABLE_HTTP_STATUS_CODES,
  RETRYABLE_RPC_ERROR_CODES,
  type RequestId,
  type RpcErrorObject,
} from '../rpc/types.js';

/**
 * Discriminant of every error the transport layer raises. Callers switch on
 * `error.kind` instead of probing classes.
 */
export type TransportErrorKind =
  | 'configuration'
  | 'method-not-supported'
  | 'rpc'
  | 'http'
  | 'websocket'
  | 'socket-closed'
  | 'timeout'
  | 'cancelled'
  | 'missing-response'
  | 'closed'
  | 'data';

/**
 * Base error class for all transport errors
 * Provides structured error information with context and retry guidance
 */
export abstract class IntegrationError extends Error {
  abstract readonly kind: TransportErrorKind;

  /**
   * Unique error code for categorization
   * Format: CATEGORY_SPECIFIC_ERROR (e.g. HTTP_REQUEST_FAILED, RPC_LIMIT_EXCEEDED)
   */
  readonly code: string;

  /**
   * Indicates if this error is transient and can be retried
   */
  readonly retriable: boolean;

  /**
   * Additional context for debugging and logging.
   * Sanitized on serialization.
   */
  readonly context: Record<string, unknown>;

  readonly timestamp: Date;

  /**
   * @param message - Human-readable error message
   * @param code - Unique error code
   * @param retriable - Whether this error can be retried
   * @param context - Additional context information
   * @param cause - Original error (optional)
   */
  constructor(
    message: string,
    code: string,
    retriable: boolean,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.retriable = retriable;
    this.context = context;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      code: this.code,
      retriable: this.retriable,
      context: ErrorUtils.sanitizeContext(this.context),
      timestamp: this.timestamp.toISOString(),
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: this.cause.message }
          : undefined,
    };
  }
}

/**
 * Invalid construction input: missing endpoint URL, no usable child
 * transports, out-of-range option values. Never retried.
 */
export class ConfigurationError extends IntegrationError {
  readonly kind = 'configuration' as const;
  readonly field: string;

  constructor(message: string, field: string, context?: Record<string, unknown>) {
    super(message, `CONFIGURATION_${field.toUpperCase()}_INVALID`, false, context);
    this.field = field;
  }

  static urlRequired(): ConfigurationError {
    return new ConfigurationError(
      'No URL was provided to the transport. Pass a URL or a chain with RPC URLs.',
      'url'
    );
  }

  static noTransports(): ConfigurationError {
    return new ConfigurationError('Fallback transport needs at least one usable transport', 'transports');
  }

  /** Caller-supplied id that is already in flight on the same connection or batch */
  static duplicateRequestId(id: RequestId): ConfigurationError {
    return new ConfigurationError(`Request id ${JSON.stringify(id)} is already in flight`, 'id', { id });
  }

  static invalidValue(field: string, expected: string, received: unknown): ConfigurationError {
    return new ConfigurationError(
      `Invalid value for ${field}: expected ${expected}, received ${String(received)}`,
      field,
      { expected, received: String(received) }
    );
  }
}

/**
 * Method rejected by the transport's method filter. No request was sent.
 */
export class MethodNotSupportedError extends IntegrationError {
  readonly kind = 'method-not-supported' as const;
  readonly method: string;

  constructor(method: string) {
    super(`Method "${method}" is not supported by this transport`, 'METHOD_NOT_SUPPORTED', false, {
      method,
    });
    this.method = method;
  }
}

/**
 * JSON-RPC error object returned by the server
 */
export class RpcError extends IntegrationError {
  readonly kind = 'rpc' as const;
  /** JSON-RPC error code from the response */
  readonly rpcCode: number;
  readonly data?: unknown;

  constructor(error: RpcErrorObject) {
    super(
      `RPC error ${error.code}: ${error.message}`,
      'RPC_ERROR',
      (RETRYABLE_RPC_ERROR_CODES as readonly number[]).includes(error.code),
      { rpcCode: error.code }
    );
    this.rpcCode = error.code;
    this.data = error.data;
  }

  toObject(): RpcErrorObject {
    return this.data === undefined
      ? { code: this.rpcCode, message: this.shortMessage }
      : { code: this.rpcCode, message: this.shortMessage, data: this.data };
  }

  private get shortMessage(): string {
    return this.message.replace(/^RPC error -?\d+: /, '');
  }
}

/**
 * RPC error wrapped with the request that produced it. The wrapped
 * `RpcError` is available as `cause` and decides retryability.
 */
export class RpcRequestError extends IntegrationError {
  readonly kind = 'rpc' as const;
  readonly url: string;
  readonly body: unknown;
  readonly rpcError: RpcError;

  constructor(url: string, body: unknown, rpcError: RpcError) {
    super(rpcError.message, 'RPC_REQUEST_FAILED', rpcError.retriable, { url, rpcCode: rpcError.rpcCode }, rpcError);
    this.url = url;
    this.body = body;
    this.rpcError = rpcError;
  }

  get rpcCode(): number {
    return this.rpcError.rpcCode;
  }
}

export interface HttpRequestErrorParams {
  url: string;
  status?: number;
  statusText?: string;
  body?: unknown;
  headers?: Record<string, string>;
  cause?: unknown;
  details?: string;
}

/**
 * HTTP-level failure. With a status it is retried only for the
 * retryable status set; without one (network failure, unreadable body)
 * it is always retried.
 */
export class HttpRequestError extends IntegrationError {
  readonly kind = 'http' as const;
  readonly url: string;
  readonly status?: number;
  readonly statusText?: string;
  readonly body?: unknown;
  /** Response headers, lower-cased names */
  readonly headers: Record<string, string>;

  constructor(params: HttpRequestErrorParams) {
    const { url, status, statusText, body, headers = {}, cause, details } = params;
    const reason =
      status !== undefined
        ? `${status}${statusText ? ` ${statusText}` : ''}`
        : details ?? (cause instanceof Error ? cause.message : 'network error');
    super(
      `HTTP request failed: ${reason} (url: ${url})`,
      status !== undefined ? `HTTP_STATUS_${status}` : 'HTTP_REQUEST_FAILED',
      status === undefined || (RETRYABLE_HTTP_STATUS_CODES as readonly number[]).includes(status),
      { url, status },
      cause
    );
    this.url = url;
    this.status = status;
    this.statusText = statusText;
    this.body = body;
    this.headers = headers;
  }

  /**
   * Delay requested by the server through `Retry-After` (seconds form only)
   * @returns Milliseconds, or undefined when absent or not an integer
   */
  get retryAfterMs(): number | undefined {
    const value = this.headers['retry-after'];
    if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
    return Number.parseInt(value.trim(), 10) * 1000;
  }
}

/**
 * WebSocket dial, write or read failure
 */
export class WebSocketRequestError extends IntegrationError {
  readonly kind = 'websocket' as const;
  readonly url: string;
  readonly body?: unknown;

  constructor(url: string, cause?: unknown, body?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'connection failed';
    super(`WebSocket request failed: ${reason} (url: ${url})`, 'WEBSOCKET_REQUEST_FAILED', true, { url }, cause);
    this.url = url;
    this.body = body;
  }
}

/**
 * The socket went away underneath a live subscription or request
 */
export class SocketClosedError extends IntegrationError {
  readonly kind = 'socket-closed' as const;
  readonly url: string;

  constructor(url: string) {
    super(`Socket is closed (url: ${url})`, 'SOCKET_CLOSED', false, { url });
    this.url = url;
  }
}

/**
 * Per-attempt deadline exceeded
 */
export class TimeoutError extends IntegrationError {
  readonly kind = 'timeout' as const;
  readonly url: string;
  readonly timeoutMs: number;
  readonly body?: unknown;

  constructor(url: string, timeoutMs: number, body?: unknown) {
    super(`Request timed out after ${timeoutMs}ms (url: ${url})`, 'REQUEST_TIMEOUT', true, { url, timeoutMs });
    this.url = url;
    this.timeoutMs = timeoutMs;
    this.body = body;
  }
}

/**
 * The caller's AbortSignal fired. Never retried.
 */
export class RequestCancelledError extends IntegrationError {
  readonly kind = 'cancelled' as const;

  constructor(reason?: unknown) {
    super('Request was cancelled', 'REQUEST_CANCELLED', false, {}, reason);
  }
}

/**
 * A batch reply did not contain an entry for this request's id.
 * Only the affected caller receives it.
 */
export class BatchMissingResponseError extends IntegrationError {
  readonly kind = 'missing-response' as const;
  readonly url: string;
  readonly requestId: RequestId;

  constructor(url: string, requestId: RequestId) {
    super(
      `Missing response for request ${JSON.stringify(requestId)} in batch reply (url: ${url})`,
      'BATCH_MISSING_RESPONSE',
      false,
      { url, requestId }
    );
    this.url = url;
    this.requestId = requestId;
  }
}

/**
 * Used after close(): the scheduler, client or transport no longer accepts work
 */
export class TransportClosedError extends IntegrationError {
  readonly kind = 'closed' as const;
  readonly component: string;

  constructor(component: string) {
    super(`${component} is closed`, 'TRANSPORT_CLOSED', false, { component });
    this.component = component;
  }
}

/**
 * Data format error in an RPC result
 * Not retriable - indicates provider issue or data corruption
 */
export class DataError extends IntegrationError {
  readonly kind = 'data' as const;
  readonly dataType: 'BLOCK_NUMBER' | 'CHAIN_ID' | 'BALANCE' | 'CALL_RESULT' | 'SUBSCRIPTION_ID' | 'OTHER';

  constructor(message: string, dataType: DataError['dataType'], received: unknown) {
    super(message, `DATA_${dataType}_INVALID`, false, { received });
    this.dataType = dataType;
  }

  static unexpectedResult(dataType: DataError['dataType'], expected: string, received: unknown): DataError {
    return new DataError(`Expected ${expected} in RPC result, received ${JSON.stringify(received)}`, dataType, received);
  }
}

/**
 * Closed union of transport failures
 */
export type TransportFailure =
  | ConfigurationError
  | MethodNotSupportedError
  | RpcError
  | RpcRequestError
  | HttpRequestError
  | WebSocketRequestError
  | SocketClosedError
  | TimeoutError
  | RequestCancelledError
  | BatchMissingResponseError
  | TransportClosedError
  | DataError;

/**
 * Utility functions for error handling
 */
export class ErrorUtils {
  private static readonly SENSITIVE_KEYS = [
    'apiKey',
    'api_key',
    'secret',
    'password',
    'token',
    'authorization',
    'privateKey',
    'private_key',
  ];

  /**
   * Pure retry classifier shared by every retry loop.
   * Unclassified errors (resets, DNS failures...) default to retryable.
   */
  static isRetryable(error: unknown): boolean {
    if (error === undefined || error === null) return false;
    if (error instanceof IntegrationError) return error.retriable;
    return true;
  }

  static isTransportFailure(error: unknown): error is TransportFailure {
    return error instanceof IntegrationError;
  }

  /**
   * @returns The failure kind, or undefined for foreign errors
   */
  static getKind(error: unknown): TransportErrorKind | undefined {
    return error instanceof IntegrationError ? error.kind : undefined;
  }

  /**
   * Sanitizes error context to remove sensitive data
   * @returns Sanitized context safe for logging
   */
  static sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = this.SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive.toLowerCase()));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
        continue;
      }

      if (isPlainRecord(value)) {
        sanitized[key] = this.sanitizeContext(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }
}

export const isRetryableError = (error: unknown): boolean => ErrorUtils.isRetryable(error);

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
