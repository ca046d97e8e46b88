/**
 * HTTP transport: JSON-RPC over POST with retries, per-attempt deadlines and
 * optional request batching.
 *
 * @module transport/http/HttpTransport
 */

import type { RpcRequestInput, RpcResponse } from '../../rpc/types.js';
import { ConfigurationError, RpcError, RpcRequestError } from '../../utils/errors.js';
import { createTransport, type TransportCore } from '../createTransport.js';
import type { MethodFilter } from '../MethodFilter.js';
import type {
  RequestOptions,
  Transport,
  TransportConfig,
  TransportFactory,
  TransportParams,
  TransportValue,
} from '../types.js';
import { BatchScheduler, type BatchSchedulerConfig } from './BatchScheduler.js';
import { HttpRpcClient, type HttpRpcClientOptions } from './HttpRpcClient.js';

export interface HttpTransportConfig extends HttpRpcClientOptions {
  key?: string;
  name?: string;
  methods?: MethodFilter;
  retryCount?: number;
  retryDelay?: number;
  timeout?: number;
  /** Return RPC error replies as responses instead of raising them */
  raw?: boolean;
  /** `true` for defaults, or batch size / wait overrides */
  batch?: boolean | Partial<Pick<BatchSchedulerConfig, 'batchSize' | 'wait'>>;
}

export class HttpTransport implements Transport {
  readonly value: TransportValue;

  private readonly core: TransportCore;
  private readonly client: HttpRpcClient;
  private readonly scheduler?: BatchScheduler;
  private readonly raw: boolean;

  constructor(url: string, config: HttpTransportConfig = {}, params: TransportParams = {}) {
    this.client = new HttpRpcClient(url, config);
    this.raw = config.raw ?? false;
    this.value = { url: this.client.url };

    this.core = createTransport({
      key: config.key ?? 'http',
      name: config.name ?? 'HTTP JSON-RPC',
      type: 'http',
      methods: config.methods,
      retryCount: params.retryCount ?? config.retryCount,
      retryDelay: config.retryDelay,
      timeout: params.timeout ?? config.timeout,
      url: this.client.sanitizedUrl,
      raw: this.raw,
      idGenerator: params.idGenerator,
      eventBus: params.eventBus,
      logger: params.logger,
      request: (request, signal) => this.client.request(request, signal),
    });

    if (config.batch) {
      const batch = config.batch === true ? {} : config.batch;
      this.scheduler = new BatchScheduler((requests, signal) => this.client.batchRequest(requests, signal), {
        ...batch,
        url: this.client.sanitizedUrl,
        eventBus: params.eventBus,
        logger: params.logger,
      });
    }
  }

  get config(): TransportConfig {
    return this.core.config;
  }

  get batchScheduler(): BatchScheduler | undefined {
    return this.scheduler;
  }

  async request(input: RpcRequestInput, options: RequestOptions = {}): Promise<RpcResponse> {
    if (!this.scheduler) {
      return this.core.request(input, options);
    }

    // Batched requests are sent once, without the retry loop
    const request = this.core.prepare(input);
    const response = await this.scheduler.schedule(request, options.signal);
    if (response.error && !this.raw) {
      throw new RpcRequestError(this.client.sanitizedUrl, request, new RpcError(response.error));
    }
    return response;
  }

  async close(): Promise<void> {
    this.scheduler?.close();
  }
}

/**
 * Creates an HTTP transport factory. Without a URL the chain's first
 * default HTTP endpoint is used.
 * @throws ConfigurationError from the factory when no URL can be found
 */
export function http(url?: string, config: HttpTransportConfig = {}): TransportFactory<HttpTransport> {
  return (params = {}) => {
    const endpoint = url || params.chain?.rpcUrls.default.http[0];
    if (!endpoint) {
      throw ConfigurationError.urlRequired();
    }
    return new HttpTransport(endpoint, config, params);
  };
}
