/**
 * Transport contract
 *
 * A transport is an immutable configuration plus a request function.
 * Subscription support is a separate capability (`Subscriber`) that
 * callers discover through `isSubscriber`.
 *
 * @module transport/types
 */

import type { EventBus } from '../events/EventBus.js';
import type { IdGenerator } from '../rpc/IdGenerator.js';
import type { RpcRequestInput, RpcResponse } from '../rpc/types.js';
import type { Logger } from '../utils/logger.js';
import type { MethodFilter } from './MethodFilter.js';

export type TransportType = 'http' | 'webSocket' | 'fallback' | 'custom';

export interface TransportConfig {
  readonly name: string;
  readonly key: string;
  readonly type: TransportType;
  readonly methods?: MethodFilter;
  readonly retryCount: number;
  /** Base backoff in ms */
  readonly retryDelay: number;
  /** Per-attempt deadline in ms */
  readonly timeout: number;
}

export interface TransportValue {
  url?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface Transport {
  readonly config: TransportConfig;
  readonly value: TransportValue;
  request(request: RpcRequestInput, options?: RequestOptions): Promise<RpcResponse>;
  close(): Promise<void>;
}

/**
 * Structural subset of viem's `Chain`, so `viem/chains` definitions can be
 * passed as-is.
 */
export interface ChainLike {
  id: number;
  name: string;
  rpcUrls: {
    default: {
      http: readonly string[];
      webSocket?: readonly string[];
    };
  };
  /** Average block time in ms */
  blockTime?: number;
}

/**
 * Values a client hands to every transport factory it builds
 */
export interface TransportParams {
  chain?: ChainLike;
  retryCount?: number;
  timeout?: number;
  pollingInterval?: number;
  idGenerator?: IdGenerator;
  logger?: Logger;
  eventBus?: EventBus;
}

export type TransportFactory<T extends Transport = Transport> = (params?: TransportParams) => T;

/** `eth_subscribe` params, e.g. `['newHeads']` or `['logs', { address }]` */
export type SubscribeParams = readonly unknown[];

export interface SubscriptionHandlers {
  onData: (data: unknown) => void;
  onError?: (error: Error) => void;
}

export interface Subscription {
  /** Current server-side subscription id; changes after a reconnect */
  readonly id: string;
  unsubscribe(): Promise<void>;
}

export interface Subscriber {
  subscribe(params: SubscribeParams, handlers: SubscriptionHandlers): Promise<Subscription>;
}

export function isSubscriber<T extends Transport>(transport: T): transport is T & Subscriber {
  return 'subscribe' in transport && typeof transport.subscribe === 'function';
}
