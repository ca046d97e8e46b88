/**
 * WebSocket transport: request/response plus `eth_subscribe` push
 * subscriptions over one lazily-dialed socket.
 *
 * @module transport/websocket/WebSocketTransport
 */

import type { Address, Hex } from 'viem';
import type { RpcRequestInput, RpcResponse } from '../../rpc/types.js';
import { ConfigurationError, MethodNotSupportedError } from '../../utils/errors.js';
import { createTransport, type TransportCore } from '../createTransport.js';
import { isMethodAllowed, type MethodFilter } from '../MethodFilter.js';
import type {
  RequestOptions,
  SubscribeParams,
  Subscriber,
  Subscription,
  SubscriptionHandlers,
  Transport,
  TransportConfig,
  TransportFactory,
  TransportParams,
  TransportValue,
} from '../types.js';
import { WebSocketRpcClient, type WebSocketRpcClientOptions } from './WebSocketRpcClient.js';

export interface WebSocketTransportConfig
  extends Pick<WebSocketRpcClientOptions, 'keepAlive' | 'reconnect' | 'socketFactory'> {
  key?: string;
  name?: string;
  methods?: MethodFilter;
  retryCount?: number;
  retryDelay?: number;
  timeout?: number;
  /**
   * Wait for `eth_subscribe` confirmation (ms)
   * @default 10000
   */
  subscribeTimeout?: number;
}

export interface LogsFilter {
  address?: Address | Address[];
  topics?: Array<Hex | Hex[] | null>;
}

export const newHeadsParams = (): SubscribeParams => ['newHeads'];
export const newPendingTransactionsParams = (): SubscribeParams => ['newPendingTransactions'];
export const syncingParams = (): SubscribeParams => ['syncing'];

export function logsParams(filter: LogsFilter = {}): SubscribeParams {
  const criteria: LogsFilter = {};
  if (filter.address !== undefined) criteria.address = filter.address;
  if (filter.topics !== undefined) criteria.topics = filter.topics;
  return ['logs', criteria];
}

export class WebSocketTransport implements Transport, Subscriber {
  readonly value: TransportValue;
  readonly client: WebSocketRpcClient;

  private readonly core: TransportCore;
  private readonly methods?: MethodFilter;
  private readonly subscribeTimeout?: number;

  constructor(url: string, config: WebSocketTransportConfig = {}, params: TransportParams = {}) {
    const key = config.key ?? 'webSocket';
    this.client = new WebSocketRpcClient(url, {
      keepAlive: config.keepAlive,
      reconnect: config.reconnect,
      socketFactory: config.socketFactory,
      idGenerator: params.idGenerator,
      eventBus: params.eventBus,
      logger: params.logger,
      key,
    });
    this.value = { url };
    this.methods = config.methods;
    this.subscribeTimeout = config.subscribeTimeout;

    this.core = createTransport({
      key,
      name: config.name ?? 'WebSocket JSON-RPC',
      type: 'webSocket',
      methods: config.methods,
      retryCount: params.retryCount ?? config.retryCount,
      retryDelay: config.retryDelay,
      timeout: params.timeout ?? config.timeout,
      url: this.client.sanitizedUrl,
      idGenerator: params.idGenerator,
      eventBus: params.eventBus,
      logger: params.logger,
      request: async (request, signal) => {
        await this.client.connect();
        return this.client.requestAsync(request, { signal });
      },
    });
  }

  get config(): TransportConfig {
    return this.core.config;
  }

  get isConnected(): boolean {
    return this.client.isConnected;
  }

  request(input: RpcRequestInput, options?: RequestOptions): Promise<RpcResponse> {
    return this.core.request(input, options);
  }

  async subscribe(params: SubscribeParams, handlers: SubscriptionHandlers): Promise<Subscription> {
    if (!isMethodAllowed(this.methods, 'eth_subscribe')) {
      throw new MethodNotSupportedError('eth_subscribe');
    }
    await this.client.connect();
    return this.client.subscribe(params, handlers.onData, handlers.onError, { timeout: this.subscribeTimeout });
  }

  subscribeNewHeads(handlers: SubscriptionHandlers): Promise<Subscription> {
    return this.subscribe(newHeadsParams(), handlers);
  }

  subscribeNewPendingTransactions(handlers: SubscriptionHandlers): Promise<Subscription> {
    return this.subscribe(newPendingTransactionsParams(), handlers);
  }

  subscribeLogs(filter: LogsFilter, handlers: SubscriptionHandlers): Promise<Subscription> {
    return this.subscribe(logsParams(filter), handlers);
  }

  subscribeSyncing(handlers: SubscriptionHandlers): Promise<Subscription> {
    return this.subscribe(syncingParams(), handlers);
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

/**
 * Creates a WebSocket transport factory. Without a URL the chain's first
 * default WebSocket endpoint is used.
 * @throws ConfigurationError from the factory when no URL can be found
 */
export function webSocket(url?: string, config: WebSocketTransportConfig = {}): TransportFactory<WebSocketTransport> {
  return (params = {}) => {
    const endpoint = url || params.chain?.rpcUrls.default.webSocket?.[0];
    if (!endpoint) {
      throw ConfigurationError.urlRequired();
    }
    return new WebSocketTransport(endpoint, config, params);
  };
}
