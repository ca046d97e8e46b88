/**
 * Custom transport: any user-supplied request function behind the shared
 * method filter and retry policy. Handy for in-process providers and tests.
 *
 * @module transport/custom/CustomTransport
 */

import type { RpcRequestInput, RpcResponse } from '../../rpc/types.js';
import { createTransport, type SingleRequestFn, type TransportCore } from '../createTransport.js';
import type { MethodFilter } from '../MethodFilter.js';
import type {
  RequestOptions,
  Transport,
  TransportConfig,
  TransportFactory,
  TransportParams,
  TransportValue,
} from '../types.js';

export interface CustomTransportConfig {
  /** One attempt; the signal aborts on cancellation or when the attempt deadline passes */
  request: SingleRequestFn;
  key?: string;
  name?: string;
  methods?: MethodFilter;
  retryCount?: number;
  retryDelay?: number;
  timeout?: number;
  /** Return RPC error replies instead of raising them */
  raw?: boolean;
}

export class CustomTransport implements Transport {
  readonly value: TransportValue = {};
  private readonly core: TransportCore;

  constructor(config: CustomTransportConfig, params: TransportParams = {}) {
    this.core = createTransport({
      key: config.key ?? 'custom',
      name: config.name ?? 'Custom JSON-RPC',
      type: 'custom',
      methods: config.methods,
      retryCount: params.retryCount ?? config.retryCount,
      retryDelay: config.retryDelay,
      timeout: params.timeout ?? config.timeout,
      raw: config.raw,
      request: config.request,
      idGenerator: params.idGenerator,
      eventBus: params.eventBus,
      logger: params.logger,
    });
  }

  get config(): TransportConfig {
    return this.core.config;
  }

  request(input: RpcRequestInput, options?: RequestOptions): Promise<RpcResponse> {
    return this.core.request(input, options);
  }

  /** Nothing to release; the request function owns its resources */
  close(): Promise<void> {
    return Promise.resolve();
  }
}

export function custom(config: CustomTransportConfig): TransportFactory<CustomTransport> {
  return (params = {}) => new CustomTransport(config, params);
}
