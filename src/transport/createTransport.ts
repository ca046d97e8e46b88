/**
 * Shared transport core: immutable config, method filtering, request
 * normalization and the retry/timeout loop. Concrete transports supply only
 * the single-attempt request function.
 *
 * @module transport/createTransport
 */

import { TransportEventType } from '../events/types.js';
import type { EventBus } from '../events/EventBus.js';
import { normalizeRequest } from '../rpc/envelope.js';
import { IdGenerator } from '../rpc/IdGenerator.js';
import type { RpcRequest, RpcRequestInput, RpcResponse } from '../rpc/types.js';
import {
  DEFAULT_RETRY_COUNT,
  DEFAULT_RETRY_DELAY,
  DEFAULT_TIMEOUT,
  RetryPolicy,
} from '../resilience/RetryPolicy.js';
import { MethodNotSupportedError } from '../utils/errors.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { isMethodAllowed, type MethodFilter } from './MethodFilter.js';
import type { RequestOptions, TransportConfig, TransportType } from './types.js';

export type SingleRequestFn = (request: RpcRequest, signal: AbortSignal) => Promise<RpcResponse>;

export interface CreateTransportOptions {
  name: string;
  key: string;
  type: TransportType;
  methods?: MethodFilter;
  retryCount?: number;
  retryDelay?: number;
  timeout?: number;
  /** One attempt, without retries */
  request: SingleRequestFn;
  /** Sanitized URL used in errors */
  url?: string;
  raw?: boolean;
  idGenerator?: IdGenerator;
  eventBus?: EventBus;
  logger?: Logger;
}

export interface TransportCore {
  readonly config: TransportConfig;
  readonly idGenerator: IdGenerator;
  /**
   * Applies the method filter and fills `jsonrpc`/`id`
   * @throws MethodNotSupportedError
   */
  prepare(input: RpcRequestInput): RpcRequest;
  /** prepare + retry loop around the single-attempt request function */
  request(input: RpcRequestInput, options?: RequestOptions): Promise<RpcResponse>;
}

/**
 * Fills retry defaults and freezes the result
 */
export function resolveTransportConfig(
  options: Pick<CreateTransportOptions, 'name' | 'key' | 'type' | 'methods' | 'retryCount' | 'retryDelay' | 'timeout'>
): TransportConfig {
  return Object.freeze({
    name: options.name,
    key: options.key,
    type: options.type,
    methods: options.methods,
    retryCount: options.retryCount ?? DEFAULT_RETRY_COUNT,
    retryDelay: options.retryDelay ?? DEFAULT_RETRY_DELAY,
    timeout: options.timeout ?? DEFAULT_TIMEOUT,
  });
}

export function createTransport(options: CreateTransportOptions): TransportCore {
  const config = resolveTransportConfig(options);
  const idGenerator = options.idGenerator ?? new IdGenerator();
  const logger = options.logger ?? noopLogger;
  const url = options.url ?? config.key;

  const prepare = (input: RpcRequestInput): RpcRequest => {
    if (!isMethodAllowed(config.methods, input.method)) {
      throw new MethodNotSupportedError(input.method);
    }
    return normalizeRequest(input, idGenerator);
  };

  const policy = new RetryPolicy({
    retryCount: config.retryCount,
    retryDelay: config.retryDelay,
    timeout: config.timeout,
    onRetry: (attempt, error, delay, retried) => {
      logger.debug(`Retrying ${retried.method} (attempt ${attempt}) in ${delay}ms`, error);
      options.eventBus?.emit(TransportEventType.REQUEST_RETRY, config.key, {
        method: retried.method,
        attempt,
        delay,
        error,
      });
    },
  });

  const request = async (input: RpcRequestInput, requestOptions: RequestOptions = {}): Promise<RpcResponse> => {
    const prepared = prepare(input);
    return policy.execute((signal) => options.request(prepared, signal), {
      request: prepared,
      url,
      signal: requestOptions.signal,
      raw: options.raw,
    });
  };

  return { config, idGenerator, prepare, request };
}
