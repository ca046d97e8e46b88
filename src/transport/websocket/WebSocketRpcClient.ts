/**
 * JSON-RPC client over a single WebSocket
 *
 * Correlates replies to requests by id, routes `eth_subscription` pushes to
 * their handles, keeps the connection warm and re-dials after a drop.
 * Subscription handles survive reconnects: the same `eth_subscribe` params
 * are replayed and the new server id replaces the old one.
 *
 * @module transport/websocket/WebSocketRpcClient
 */

import { TransportEventType } from '../../events/types.js';
import type { EventBus } from '../../events/EventBus.js';
import { isRpcResponse, isSubscriptionNotification, parseMessage, requestKey } from '../../rpc/envelope.js';
import { IdGenerator } from '../../rpc/IdGenerator.js';
import type { RpcRequest, RpcResponse } from '../../rpc/types.js';
import { sleep } from '../../utils/abort.js';
import {
  ConfigurationError,
  DataError,
  RequestCancelledError,
  RpcError,
  RpcRequestError,
  SocketClosedError,
  TimeoutError,
  TransportClosedError,
  WebSocketRequestError,
} from '../../utils/errors.js';
import { noopLogger, type Logger } from '../../utils/logger.js';
import { resolveToggle } from '../../utils/options.js';
import { sanitizeUrl } from '../../utils/url.js';
import type { SubscribeParams, Subscription } from '../types.js';
import { wsSocketFactory, type SocketConnection, type SocketFactory } from './socket.js';

export type WebSocketStatus = 'idle' | 'connecting' | 'connected' | 'disconnected' | 'reconnecting' | 'closed';

export interface KeepAliveConfig {
  /**
   * Ping interval (ms)
   * @default 30000
   */
  interval: number;
}

export interface ReconnectConfig {
  /**
   * Dial attempts per reconnect sequence
   * @default 5
   */
  attempts: number;

  /**
   * Pause before each dial (ms)
   * @default 2000
   */
  delay: number;
}

export interface WebSocketRpcClientOptions {
  /** `false` disables pings */
  keepAlive?: boolean | Partial<KeepAliveConfig>;
  /** `false` disables reconnects */
  reconnect?: boolean | Partial<ReconnectConfig>;
  socketFactory?: SocketFactory;
  idGenerator?: IdGenerator;
  eventBus?: EventBus;
  logger?: Logger;
  /** Event source name */
  key?: string;
}

export interface RequestAsyncOptions {
  timeout?: number;
  signal?: AbortSignal;
}

export const DEFAULT_KEEP_ALIVE_INTERVAL = 30_000;
export const DEFAULT_RECONNECT_ATTEMPTS = 5;
export const DEFAULT_RECONNECT_DELAY = 2_000;
export const DEFAULT_SUBSCRIBE_TIMEOUT = 10_000;

interface PendingRequest {
  body: RpcRequest;
  onResponse: (response: RpcResponse) => void;
  onError: (error: Error) => void;
}

interface SubscriptionEntry {
  params: SubscribeParams;
  /** Current server-side id */
  id: string;
  active: boolean;
  onData: (data: unknown) => void;
  onError?: (error: Error) => void;
}

export class WebSocketRpcClient {
  readonly url: string;
  readonly sanitizedUrl: string;

  private socket?: SocketConnection;
  private currentStatus: WebSocketStatus = 'idle';
  private connecting?: Promise<void>;
  private reconnecting = false;
  private abortDial?: () => void;
  private keepAliveTimer: NodeJS.Timeout | null = null;
  private readonly lifecycle = new AbortController();

  private readonly pending = new Map<string, PendingRequest>();
  /** Live subscriptions keyed by current server id */
  private readonly subscriptions = new Map<string, SubscriptionEntry>();
  /** Every open handle, including those waiting for a replay */
  private readonly handles = new Set<SubscriptionEntry>();

  private readonly keepAlive: KeepAliveConfig | null;
  private readonly reconnect: ReconnectConfig | null;
  private readonly socketFactory: SocketFactory;
  private readonly idGenerator: IdGenerator;
  private readonly logger: Logger;
  private readonly eventBus?: EventBus;
  private readonly key: string;

  constructor(url: string, options: WebSocketRpcClientOptions = {}) {
    this.url = url;
    this.sanitizedUrl = sanitizeUrl(url);
    const keepAlive = resolveToggle<KeepAliveConfig>(options.keepAlive);
    this.keepAlive = keepAlive ? { interval: keepAlive.interval ?? DEFAULT_KEEP_ALIVE_INTERVAL } : null;
    const reconnect = resolveToggle<ReconnectConfig>(options.reconnect);
    this.reconnect = reconnect
      ? {
          attempts: reconnect.attempts ?? DEFAULT_RECONNECT_ATTEMPTS,
          delay: reconnect.delay ?? DEFAULT_RECONNECT_DELAY,
        }
      : null;
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
    this.idGenerator = options.idGenerator ?? new IdGenerator();
    this.logger = options.logger ?? noopLogger;
    this.eventBus = options.eventBus;
    this.key = options.key ?? 'webSocket';
  }

  get status(): WebSocketStatus {
    return this.currentStatus;
  }

  get isConnected(): boolean {
    return this.currentStatus === 'connected';
  }

  /** Number of requests awaiting a reply */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Number of open subscription handles */
  get subscriptionCount(): number {
    return this.handles.size;
  }

  /**
   * Dials the socket if it is not connected yet. Concurrent callers share
   * one dial.
   * @throws WebSocketRequestError when the dial fails or a reconnect is running
   */
  async connect(): Promise<void> {
    switch (this.currentStatus) {
      case 'connected':
        return;
      case 'closed':
        throw new TransportClosedError('WebSocketRpcClient');
      case 'reconnecting':
        throw new WebSocketRequestError(this.sanitizedUrl, new Error('reconnect in progress'));
      default:
        break;
    }

    if (!this.connecting) {
      this.currentStatus = 'connecting';
      this.connecting = this.dial()
        .catch((error: unknown) => {
          if (this.currentStatus === 'connecting') this.currentStatus = 'disconnected';
          throw error;
        })
        .finally(() => {
          this.connecting = undefined;
        });
    }
    return this.connecting;
  }

  /**
   * Sends a request; exactly one of the callbacks fires
   */
  request(body: RpcRequest, onResponse: (response: RpcResponse) => void, onError: (error: Error) => void): void {
    if (this.currentStatus === 'closed') {
      onError(new TransportClosedError('WebSocketRpcClient'));
      return;
    }
    const socket = this.socket;
    if (!socket || this.currentStatus !== 'connected') {
      onError(new WebSocketRequestError(this.sanitizedUrl, new Error('socket is not connected'), body));
      return;
    }

    const key = requestKey(body.id);
    if (this.pending.has(key)) {
      onError(ConfigurationError.duplicateRequestId(body.id));
      return;
    }
    const entry: PendingRequest = { body, onResponse, onError };
    this.pending.set(key, entry);

    socket.send(JSON.stringify(body)).catch((error: unknown) => {
      if (this.pending.get(key) !== entry) return;
      this.pending.delete(key);
      onError(new WebSocketRequestError(this.sanitizedUrl, error, body));
    });
  }

  /**
   * Promise form of `request`. A timeout or an abort releases the pending
   * entry, so a late reply is dropped.
   */
  requestAsync(body: RpcRequest, options: RequestAsyncOptions = {}): Promise<RpcResponse> {
    const { timeout, signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError(signal.reason));
    }

    return new Promise<RpcResponse>((resolve, reject) => {
      const key = requestKey(body.id);
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (settle: () => void) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        settle();
      };
      const release = () => {
        const entry = this.pending.get(key);
        if (entry?.body === body) this.pending.delete(key);
      };
      const onAbort = () => {
        release();
        finish(() => reject(new RequestCancelledError(signal?.reason)));
      };

      if (timeout !== undefined) {
        timer = setTimeout(() => {
          release();
          finish(() => reject(new TimeoutError(this.sanitizedUrl, timeout, body)));
        }, timeout);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.request(
        body,
        (response) => finish(() => resolve(response)),
        (error) => finish(() => reject(error))
      );
    });
  }

  /**
   * Opens an `eth_subscribe` subscription
   * @returns A handle whose `id` follows server-side id changes after reconnects
   */
  async subscribe(
    params: SubscribeParams,
    onData: (data: unknown) => void,
    onError?: (error: Error) => void,
    options: { timeout?: number } = {}
  ): Promise<Subscription> {
    const id = await this.sendSubscribe(params, options.timeout ?? DEFAULT_SUBSCRIBE_TIMEOUT);
    const entry: SubscriptionEntry = { params, id, active: true, onData, onError };
    this.subscriptions.set(id, entry);
    this.handles.add(entry);

    return {
      get id() {
        return entry.id;
      },
      unsubscribe: () => this.unsubscribeEntry(entry),
    };
  }

  /**
   * Cancels a subscription by its current server id. Unknown ids resolve
   * quietly.
   */
  async unsubscribe(id: string): Promise<void> {
    const entry = this.subscriptions.get(id) ?? [...this.handles].find((handle) => handle.id === id);
    if (entry) {
      await this.unsubscribeEntry(entry);
    }
  }

  /**
   * Stops keep-alive and reconnects, fails pending requests with
   * `SocketClosedError` and closes the socket. Idempotent.
   */
  async close(): Promise<void> {
    if (this.currentStatus === 'closed') return;
    this.currentStatus = 'closed';
    this.lifecycle.abort();
    this.abortDial?.();
    this.stopKeepAlive();

    const error = new SocketClosedError(this.sanitizedUrl);
    const pending = [...this.pending.values()];
    this.pending.clear();
    for (const entry of pending) entry.onError(error);

    for (const entry of this.handles) entry.active = false;
    this.handles.clear();
    this.subscriptions.clear();

    const socket = this.socket;
    this.socket = undefined;
    socket?.close();
  }

  private dial(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let opened = false;
      let failed = false;

      const connection = this.socketFactory(this.url, {
        onOpen: () => {
          if (failed) {
            connection.close();
            return;
          }
          opened = true;
          this.abortDial = undefined;
          this.socket = connection;
          this.currentStatus = 'connected';
          this.startKeepAlive();
          this.eventBus?.emit(TransportEventType.WEBSOCKET_CONNECTED, this.key, { url: this.sanitizedUrl });
          resolve();
        },
        onMessage: (text) => {
          if (this.socket === connection) this.handleMessage(text);
        },
        onError: (error) => {
          if (!opened) {
            if (failed) return;
            failed = true;
            reject(new WebSocketRequestError(this.sanitizedUrl, error));
            return;
          }
          this.logger.warn(`WebSocket error on ${this.sanitizedUrl}`, error);
        },
        onClose: (reason) => {
          if (!opened) {
            if (failed) return;
            failed = true;
            reject(new WebSocketRequestError(this.sanitizedUrl, new Error(`closed before open: ${reason ?? 'unknown'}`)));
            return;
          }
          if (this.socket === connection) this.handleDisconnect(new Error(reason ?? 'socket closed'));
        },
      });

      this.abortDial = () => {
        this.abortDial = undefined;
        if (opened || failed) return;
        failed = true;
        connection.close();
        reject(new TransportClosedError('WebSocketRpcClient'));
      };
    });
  }

  private handleMessage(text: string): void {
    let message: unknown;
    try {
      message = parseMessage(text);
    } catch (error) {
      this.logger.warn(`Dropping malformed frame from ${this.sanitizedUrl}`, error);
      return;
    }

    if (isSubscriptionNotification(message)) {
      const entry = this.subscriptions.get(message.params.subscription);
      if (entry?.active) {
        entry.onData(message.params.result);
      }
      return;
    }

    if (isRpcResponse(message)) {
      if (message.id === null) return;
      const key = requestKey(message.id);
      const entry = this.pending.get(key);
      if (entry) {
        this.pending.delete(key);
        entry.onResponse(message);
      }
      return;
    }

    this.logger.debug(`Ignoring unrecognized frame from ${this.sanitizedUrl}`);
  }

  /**
   * Connection-loss path: every pending request gets one
   * `WebSocketRequestError`, every live subscription one `SocketClosedError`.
   */
  private handleDisconnect(cause: Error): void {
    if (this.currentStatus === 'closed' || this.currentStatus === 'disconnected' || this.currentStatus === 'reconnecting') {
      return;
    }
    const socket = this.socket;
    this.socket = undefined;
    socket?.close();
    this.currentStatus = 'disconnected';
    this.stopKeepAlive();
    this.eventBus?.emit(TransportEventType.WEBSOCKET_DISCONNECTED, this.key, {
      url: this.sanitizedUrl,
      reason: cause.message,
    });

    const pending = [...this.pending.values()];
    this.pending.clear();
    for (const entry of pending) {
      entry.onError(new WebSocketRequestError(this.sanitizedUrl, cause, entry.body));
    }

    const live = [...this.subscriptions.values()];
    this.subscriptions.clear();
    for (const entry of live) {
      entry.onError?.(new SocketClosedError(this.sanitizedUrl));
    }

    if (this.reconnect) {
      this.runReconnect(this.reconnect).catch((error: unknown) => {
        this.logger.error(`Reconnect to ${this.sanitizedUrl} failed unexpectedly`, error);
      });
    }
  }

  private async runReconnect(config: ReconnectConfig): Promise<void> {
    if (this.reconnecting) return;
    this.reconnecting = true;
    this.currentStatus = 'reconnecting';

    let reconnectedOn: number | undefined;
    try {
      for (let attempt = 1; attempt <= config.attempts; attempt++) {
        this.eventBus?.emit(TransportEventType.WEBSOCKET_RECONNECTING, this.key, {
          url: this.sanitizedUrl,
          attempt,
          delay: config.delay,
        });
        try {
          await sleep(config.delay, this.lifecycle.signal);
        } catch (error) {
          if (error instanceof RequestCancelledError) return;
          throw error;
        }
        if (this.status === 'closed') return;

        try {
          await this.dial();
        } catch (error) {
          this.logger.warn(`Reconnect attempt ${attempt} to ${this.sanitizedUrl} failed`, error);
          if (this.status !== 'closed') this.currentStatus = 'reconnecting';
          continue;
        }
        reconnectedOn = attempt;
        break;
      }
    } finally {
      // A drop during the replay below starts a new sequence
      this.reconnecting = false;
    }

    if (reconnectedOn === undefined) {
      this.logger.error(`Giving up on ${this.sanitizedUrl} after ${config.attempts} reconnect attempts`);
      this.eventBus?.emit(TransportEventType.WEBSOCKET_FAILED, this.key, {
        url: this.sanitizedUrl,
        attempts: config.attempts,
      });
      await this.close();
      return;
    }
    if (this.status === 'closed') return;
    if (this.status !== 'connected') {
      // Lost again before the flag was cleared
      await this.runReconnect(config);
      return;
    }

    this.eventBus?.emit(TransportEventType.WEBSOCKET_RECONNECTED, this.key, {
      url: this.sanitizedUrl,
      attempt: reconnectedOn,
    });
    await this.resubscribe();
  }

  /**
   * Replays every live handle on the current socket. Stops without dropping
   * handles when that socket goes away; the next reconnect replays them.
   */
  private async resubscribe(): Promise<void> {
    const socket = this.socket;
    for (const entry of [...this.handles]) {
      if (this.socket !== socket || this.currentStatus !== 'connected') return;
      if (!entry.active) continue;
      const previousId = entry.id;
      try {
        const id = await this.sendSubscribe(entry.params, DEFAULT_SUBSCRIBE_TIMEOUT);
        if (!entry.active) continue;
        entry.id = id;
        this.subscriptions.set(id, entry);
        this.eventBus?.emit(TransportEventType.SUBSCRIPTION_RESTORED, this.key, {
          url: this.sanitizedUrl,
          previousId,
          id,
        });
      } catch (error) {
        if (this.socket !== socket) return;
        this.logger.warn(`Failed to restore subscription ${previousId} on ${this.sanitizedUrl}`, error);
        entry.active = false;
        this.handles.delete(entry);
        entry.onError?.(error instanceof Error ? error : new Error(String(error)));
      }
    }
  }

  private async sendSubscribe(params: SubscribeParams, timeout: number): Promise<string> {
    const body: RpcRequest = { jsonrpc: '2.0', id: this.idGenerator.next(), method: 'eth_subscribe', params };
    const response = await this.requestAsync(body, { timeout });
    if (response.error) {
      throw new RpcRequestError(this.sanitizedUrl, body, new RpcError(response.error));
    }
    if (typeof response.result !== 'string') {
      throw DataError.unexpectedResult('SUBSCRIPTION_ID', 'a subscription id string', response.result);
    }
    return response.result;
  }

  private async unsubscribeEntry(entry: SubscriptionEntry): Promise<void> {
    if (!entry.active) return;
    entry.active = false;
    this.handles.delete(entry);
    this.subscriptions.delete(entry.id);

    if (this.currentStatus !== 'connected') return;
    const body: RpcRequest = { jsonrpc: '2.0', id: this.idGenerator.next(), method: 'eth_unsubscribe', params: [entry.id] };
    const response = await this.requestAsync(body, { timeout: DEFAULT_SUBSCRIBE_TIMEOUT });
    if (response.error) {
      throw new RpcRequestError(this.sanitizedUrl, body, new RpcError(response.error));
    }
  }

  private startKeepAlive(): void {
    const keepAlive = this.keepAlive;
    if (!keepAlive) return;
    this.stopKeepAlive();
    this.keepAliveTimer = setInterval(() => this.ping(), keepAlive.interval);
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  private ping(): void {
    const socket = this.socket;
    if (!socket || this.currentStatus !== 'connected') return;
    // Unregistered id: the reply matches no pending request and is dropped
    const frame = JSON.stringify({ jsonrpc: '2.0', id: null, method: 'net_version', params: [] });
    socket.send(frame).catch((error: unknown) => {
      if (this.socket !== socket) return;
      this.logger.warn(`Keep-alive to ${this.sanitizedUrl} failed`, error);
      this.handleDisconnect(error instanceof Error ? error : new Error(String(error)));
    });
  }
}
