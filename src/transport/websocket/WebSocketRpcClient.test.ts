import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocketRpcClient } from './WebSocketRpcClient.js';
import { FakeSocketServer, readRequest, subscriptionNode } from '../../test-utils/index.js';
import { EventBus } from '../../events/EventBus.js';
import { TransportEventType } from '../../events/types.js';
import {
  ConfigurationError,
  DataError,
  RequestCancelledError,
  SocketClosedError,
  TimeoutError,
  TransportClosedError,
  WebSocketRequestError,
} from '../../utils/errors.js';
import type { RpcRequest } from '../../rpc/types.js';

const WS_URL = 'wss://node.test';

const body = (id: number, method = 'eth_chainId'): RpcRequest => ({ jsonrpc: '2.0', id, method });

const push = (subscription: string, result: unknown) => ({
  jsonrpc: '2.0',
  method: 'eth_subscription',
  params: { subscription, result },
});

describe('WebSocketRpcClient', () => {
  let server: FakeSocketServer;

  beforeEach(() => {
    server = new FakeSocketServer();
    server.respond = subscriptionNode();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const createClient = (options: ConstructorParameters<typeof WebSocketRpcClient>[1] = {}) =>
    new WebSocketRpcClient(WS_URL, { socketFactory: server.factory, keepAlive: false, reconnect: false, ...options });

  describe('connect', () => {
    it('should share one dial between concurrent callers', async () => {
      const client = createClient();

      await Promise.all([client.connect(), client.connect()]);

      expect(server.sockets).toHaveLength(1);
      expect(client.status).toBe('connected');
      expect(client.isConnected).toBe(true);
      await client.close();
    });

    it('should report a failed dial as a retryable WebSocketRequestError', async () => {
      server.failDials = 1;
      const client = createClient();

      const error = await client.connect().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WebSocketRequestError);
      expect(error instanceof WebSocketRequestError && error.retriable).toBe(true);
      expect(client.status).toBe('disconnected');

      await client.connect();
      expect(client.status).toBe('connected');
      await client.close();
    });

    it('should reject a dial interrupted by close', async () => {
      server.autoOpen = false;
      const client = createClient();

      const dialing = client.connect();
      await client.close();

      await expect(dialing).rejects.toBeInstanceOf(TransportClosedError);
      expect(server.latest.closed).toBe(true);
    });

    it('should refuse to connect once closed', async () => {
      const client = createClient();
      await client.close();

      await expect(client.connect()).rejects.toBeInstanceOf(TransportClosedError);
    });
  });

  describe('requests', () => {
    it('should correlate replies by id', async () => {
      const client = createClient();
      await client.connect();

      const [first, second] = await Promise.all([
        client.requestAsync(body(1, 'eth_chainId')),
        client.requestAsync(body(2, 'eth_blockNumber')),
      ]);

      expect(first).toEqual({ jsonrpc: '2.0', id: 1, result: 'eth_chainId' });
      expect(second).toEqual({ jsonrpc: '2.0', id: 2, result: 'eth_blockNumber' });
      expect(client.pendingCount).toBe(0);
      await client.close();
    });

    it('should reject a call whose id is already in flight', async () => {
      const client = createClient();
      await client.connect();

      const first = client.requestAsync(body(7, 'eth_chainId'));
      const second = client.requestAsync(body(7, 'eth_blockNumber'));

      const error = await second.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.code).toBe('CONFIGURATION_ID_INVALID');
      await expect(first).resolves.toEqual({ jsonrpc: '2.0', id: 7, result: 'eth_chainId' });
      expect(server.latest.sentWith('eth_blockNumber')).toHaveLength(0);
      await client.close();
    });

    it('should keep numeric and string ids apart', async () => {
      server.respond = undefined;
      const client = createClient();
      await client.connect();

      const numeric = client.requestAsync(body(7));
      const text = client.requestAsync({ jsonrpc: '2.0', id: '7', method: 'net_version' });
      server.latest.receive({ jsonrpc: '2.0', id: '7', result: 'text' });
      server.latest.receive({ jsonrpc: '2.0', id: 7, result: 'number' });

      await expect(numeric).resolves.toMatchObject({ result: 'number' });
      await expect(text).resolves.toMatchObject({ result: 'text' });
      await client.close();
    });

    it('should fail immediately when not connected', () => {
      const client = createClient();
      const onError = vi.fn();

      client.request(body(1), vi.fn(), onError);

      expect(onError).toHaveBeenCalledWith(expect.any(WebSocketRequestError));
      expect(server.sockets).toHaveLength(0);
    });

    it('should report a failed write through onError', async () => {
      const client = createClient();
      await client.connect();
      server.latest.failSends = true;

      await expect(client.requestAsync(body(1))).rejects.toBeInstanceOf(WebSocketRequestError);
      expect(client.pendingCount).toBe(0);
      await client.close();
    });

    it('should time out and drop the late reply', async () => {
      server.respond = undefined;
      const client = createClient();
      await client.connect();

      await expect(client.requestAsync(body(1), { timeout: 20 })).rejects.toBeInstanceOf(TimeoutError);
      expect(client.pendingCount).toBe(0);

      server.latest.receive({ jsonrpc: '2.0', id: 1, result: 'late' });
      expect(client.pendingCount).toBe(0);
      await client.close();
    });

    it('should release the entry when the caller aborts', async () => {
      server.respond = undefined;
      const client = createClient();
      await client.connect();
      const controller = new AbortController();

      const pending = client.requestAsync(body(1), { signal: controller.signal });
      expect(client.pendingCount).toBe(1);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
      expect(client.pendingCount).toBe(0);
      await client.close();
    });

    it('should ignore malformed frames', async () => {
      server.respond = undefined;
      const client = createClient();
      await client.connect();

      const pending = client.requestAsync(body(3));
      server.latest.receive('{not json');
      server.latest.receive({ jsonrpc: '2.0', id: 3, result: '0x1' });

      await expect(pending).resolves.toMatchObject({ result: '0x1' });
      await client.close();
    });
  });

  describe('connection loss', () => {
    it('should fail every pending request exactly once', async () => {
      server.respond = undefined;
      const client = createClient();
      await client.connect();
      const firstError = vi.fn();
      const secondError = vi.fn();

      client.request(body(1), vi.fn(), firstError);
      client.request(body(2), vi.fn(), secondError);
      server.latest.drop('server restart');

      expect(firstError).toHaveBeenCalledTimes(1);
      expect(firstError).toHaveBeenCalledWith(expect.any(WebSocketRequestError));
      expect(secondError).toHaveBeenCalledTimes(1);
      expect(client.pendingCount).toBe(0);
      expect(client.status).toBe('disconnected');
    });

    it('should notify each subscription once with SocketClosedError', async () => {
      const client = createClient();
      await client.connect();
      const onError = vi.fn();
      await client.subscribe(['newHeads'], vi.fn(), onError);

      server.latest.drop();

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(expect.any(SocketClosedError));
    });

    it('should emit a disconnect event', async () => {
      const eventBus = new EventBus();
      const listener = vi.fn();
      eventBus.on(TransportEventType.WEBSOCKET_DISCONNECTED, listener);
      const client = createClient({ eventBus, key: 'ws-main' });
      await client.connect();

      server.latest.drop('going away');

      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({ source: 'ws-main', data: { url: WS_URL, reason: 'going away' } })
      );
    });
  });

  describe('subscriptions', () => {
    it('should route pushes to the matching handler', async () => {
      const client = createClient();
      await client.connect();
      const heads = vi.fn();
      const logs = vi.fn();

      const headsSub = await client.subscribe(['newHeads'], heads);
      const logsSub = await client.subscribe(['logs', {}], logs);
      server.latest.receive(push('0xsub2', { logIndex: '0x0' }));
      server.latest.receive(push('0xsub1', { number: '0x10' }));

      expect(headsSub.id).toBe('0xsub1');
      expect(logsSub.id).toBe('0xsub2');
      expect(heads).toHaveBeenCalledWith({ number: '0x10' });
      expect(logs).toHaveBeenCalledWith({ logIndex: '0x0' });
      expect(client.subscriptionCount).toBe(2);
      await client.close();
    });

    it('should send eth_unsubscribe and stop delivery', async () => {
      const client = createClient();
      await client.connect();
      const onData = vi.fn();
      const subscription = await client.subscribe(['newHeads'], onData);

      await subscription.unsubscribe();
      server.latest.receive(push('0xsub1', { number: '0x1' }));

      expect(server.latest.sentWith('eth_unsubscribe').map((r) => r.params)).toEqual([['0xsub1']]);
      expect(onData).not.toHaveBeenCalled();
      expect(client.subscriptionCount).toBe(0);
      await client.close();
    });

    it('should unsubscribe by server id', async () => {
      const client = createClient();
      await client.connect();
      await client.subscribe(['newPendingTransactions'], vi.fn());

      await client.unsubscribe('0xsub1');
      await client.unsubscribe('0xunknown');

      expect(server.latest.sentWith('eth_unsubscribe')).toHaveLength(1);
      expect(client.subscriptionCount).toBe(0);
      await client.close();
    });

    it('should reject a non-string subscription id', async () => {
      server.respond = (message) => ({ jsonrpc: '2.0', id: readRequest(message).id, result: 42 });
      const client = createClient();
      await client.connect();

      await expect(client.subscribe(['newHeads'], vi.fn())).rejects.toBeInstanceOf(DataError);
      await client.close();
    });
  });

  describe('reconnect', () => {
    it('should replay subscriptions and keep the original handler', async () => {
      vi.useFakeTimers();
      const eventBus = new EventBus();
      const restored = vi.fn();
      eventBus.on(TransportEventType.SUBSCRIPTION_RESTORED, restored);
      const client = createClient({ eventBus, reconnect: { attempts: 3, delay: 100 } });
      await client.connect();
      const onData = vi.fn();
      const onError = vi.fn();
      const subscription = await client.subscribe(['newHeads'], onData, onError);

      server.latest.drop();
      expect(client.status).toBe('reconnecting');
      await vi.advanceTimersByTimeAsync(100);
      await vi.waitFor(() => expect(subscription.id).toBe('0xsub2'));

      server.sockets[1].receive(push('0xsub2', { number: '0x2' }));

      expect(server.sockets).toHaveLength(2);
      expect(client.status).toBe('connected');
      expect(server.sockets[1].sentWith('eth_subscribe').map((r) => r.params)).toEqual([['newHeads']]);
      expect(onData).toHaveBeenCalledWith({ number: '0x2' });
      expect(onError).toHaveBeenCalledTimes(1);
      expect(restored).toHaveBeenCalledWith(
        expect.objectContaining({ data: { url: WS_URL, previousId: '0xsub1', id: '0xsub2' } })
      );
      await client.close();
    });

    it('should reconnect again when the socket drops during replay', async () => {
      vi.useFakeTimers();
      const node = subscriptionNode();
      // The second socket never confirms the replayed subscription
      server.respond = (message, socket) =>
        socket === server.sockets[1] && readRequest(message).method === 'eth_subscribe' ? undefined : node(message);
      const client = createClient({ reconnect: { attempts: 3, delay: 100 } });
      await client.connect();
      const onData = vi.fn();
      const onError = vi.fn();
      const subscription = await client.subscribe(['newHeads'], onData, onError);

      server.latest.drop();
      await vi.advanceTimersByTimeAsync(100);
      await vi.waitFor(() => expect(server.sockets[1]?.sentWith('eth_subscribe')).toHaveLength(1));
      server.sockets[1].drop();
      expect(client.status).toBe('reconnecting');

      await vi.advanceTimersByTimeAsync(100);
      await vi.waitFor(() => expect(subscription.id).toBe('0xsub2'));
      server.sockets[2].receive(push('0xsub2', { number: '0x3' }));

      expect(server.sockets).toHaveLength(3);
      expect(client.status).toBe('connected');
      expect(client.subscriptionCount).toBe(1);
      expect(onData).toHaveBeenCalledWith({ number: '0x3' });
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(expect.any(SocketClosedError));
      await client.close();
    });

    it('should reject new connects while a reconnect is running', async () => {
      vi.useFakeTimers();
      const client = createClient({ reconnect: { attempts: 1, delay: 1000 } });
      await client.connect();

      server.latest.drop();
      const error = await client.connect().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WebSocketRequestError);
      expect(error instanceof WebSocketRequestError && error.retriable).toBe(true);
      await client.close();
    });

    it('should close after exhausting its attempts', async () => {
      vi.useFakeTimers();
      const eventBus = new EventBus();
      const failed = vi.fn();
      eventBus.on(TransportEventType.WEBSOCKET_FAILED, failed);
      const client = createClient({ eventBus, reconnect: { attempts: 2, delay: 10 } });
      await client.connect();
      server.failDials = 2;

      server.latest.drop();
      await vi.advanceTimersByTimeAsync(20);
      await vi.waitFor(() => expect(client.status).toBe('closed'));

      expect(server.sockets).toHaveLength(3);
      expect(failed).toHaveBeenCalledWith(expect.objectContaining({ data: { url: WS_URL, attempts: 2 } }));
    });

    it('should stop reconnecting on close', async () => {
      vi.useFakeTimers();
      const client = createClient({ reconnect: { attempts: 3, delay: 100 } });
      await client.connect();

      server.latest.drop();
      await client.close();
      await vi.advanceTimersByTimeAsync(500);

      expect(server.sockets).toHaveLength(1);
      expect(client.status).toBe('closed');
    });
  });

  describe('keep-alive', () => {
    it('should send net_version with a null id on every interval', async () => {
      vi.useFakeTimers();
      const client = createClient({ keepAlive: { interval: 1000 } });
      await client.connect();

      await vi.advanceTimersByTimeAsync(2000);

      expect(server.latest.sentWith('net_version')).toEqual([
        { id: null, method: 'net_version', params: [] },
        { id: null, method: 'net_version', params: [] },
      ]);
      expect(client.pendingCount).toBe(0);
      await client.close();
    });

    it('should treat a failed ping as a connection loss', async () => {
      vi.useFakeTimers();
      const client = createClient({ keepAlive: { interval: 1000 }, reconnect: { attempts: 1, delay: 50 } });
      await client.connect();
      server.latest.failSends = true;

      await vi.advanceTimersByTimeAsync(1000);
      expect(client.status).toBe('reconnecting');

      await vi.advanceTimersByTimeAsync(50);
      await vi.waitFor(() => expect(client.status).toBe('connected'));
      expect(server.sockets).toHaveLength(2);
      await client.close();
    });
  });

  describe('close', () => {
    it('should fail pending requests with SocketClosedError', async () => {
      server.respond = undefined;
      const client = createClient();
      await client.connect();

      const pending = client.requestAsync(body(1));
      await client.close();

      await expect(pending).rejects.toBeInstanceOf(SocketClosedError);
      expect(server.latest.closed).toBe(true);
      expect(client.status).toBe('closed');
    });

    it('should be idempotent', async () => {
      const client = createClient();
      await client.connect();

      await client.close();
      await client.close();

      expect(client.status).toBe('closed');
    });

    it('should reject requests after close', async () => {
      const client = createClient();
      await client.close();

      await expect(client.requestAsync(body(1))).rejects.toBeInstanceOf(TransportClosedError);
    });
  });
});
