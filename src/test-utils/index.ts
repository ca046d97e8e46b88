/**
 * Test utilities: in-process stand-ins for HTTP endpoints and sockets
 */

import { vi } from 'vitest';
import type { FetchFn } from '../transport/http/HttpRpcClient.js';
import type { SocketConnection, SocketFactory, SocketHandlers } from '../transport/websocket/socket.js';

/**
 * Builds a fetch Response carrying a JSON body
 */
export function jsonResponse(
  body: unknown,
  init: { status?: number; statusText?: string; headers?: Record<string, string> } = {}
): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    ...init,
    headers: { 'content-type': 'application/json', ...init.headers },
  });
}

export interface RecordedPost {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Fake fetch that parses each POST body and hands it to `handler`
 */
export function createFetchStub(handler: (body: unknown, post: RecordedPost) => Response | Promise<Response>) {
  const posts: RecordedPost[] = [];
  const fetchFn = vi.fn<FetchFn>(async (url, init) => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
    const post = { url, headers, body };
    posts.push(post);
    return handler(body, post);
  });
  return { fetchFn, posts };
}

/**
 * Echo server: answers every request in a body (single or batch) with
 * `result: <method>:<id>`
 */
export function echoReply(body: unknown): Response {
  const answer = (request: unknown) => {
    const { id, method } = readRequest(request);
    return { jsonrpc: '2.0', id, result: `${method}:${String(id)}` };
  };
  return jsonResponse(Array.isArray(body) ? body.map(answer) : answer(body));
}

export function readRequest(value: unknown): { id: unknown; method: string; params: unknown } {
  if (typeof value !== 'object' || value === null || !('method' in value) || typeof value.method !== 'string') {
    throw new Error(`Not a JSON-RPC request: ${JSON.stringify(value)}`);
  }
  return {
    id: 'id' in value ? value.id : undefined,
    method: value.method,
    params: 'params' in value ? value.params : undefined,
  };
}

/**
 * Controllable socket handed out by `FakeSocketServer`
 */
export class FakeSocket implements SocketConnection {
  readonly sent: unknown[] = [];
  closed = false;
  failSends = false;

  constructor(
    readonly url: string,
    private readonly handlers: SocketHandlers,
    private readonly server: FakeSocketServer
  ) {}

  async send(data: string): Promise<void> {
    if (this.closed) throw new Error('Socket is not open');
    if (this.failSends) throw new Error('write EPIPE');
    const message: unknown = JSON.parse(data);
    this.sent.push(message);
    const reply = this.server.respond?.(message, this);
    if (reply !== undefined) {
      queueMicrotask(() => this.receive(reply));
    }
  }

  close(): void {
    this.closed = true;
  }

  open(): void {
    this.handlers.onOpen();
  }

  receive(message: unknown): void {
    this.handlers.onMessage(typeof message === 'string' ? message : JSON.stringify(message));
  }

  /** Simulates the server going away */
  drop(reason = 'connection reset'): void {
    this.closed = true;
    this.handlers.onClose(reason);
  }

  /** Simulates a dial that never opens */
  fail(error = new Error('ECONNREFUSED')): void {
    this.closed = true;
    this.handlers.onError(error);
    this.handlers.onClose('1006');
  }

  /** Messages sent with the given method */
  sentWith(method: string): Array<{ id: unknown; method: string; params: unknown }> {
    return this.sent.map(readRequest).filter((request) => request.method === method);
  }
}

/**
 * In-process stand-in for a WebSocket endpoint
 */
export class FakeSocketServer {
  readonly sockets: FakeSocket[] = [];
  /** Open each dialed socket on the next microtask */
  autoOpen = true;
  /** Number of upcoming dials that fail */
  failDials = 0;
  /** Optional auto-responder; return undefined to stay silent */
  respond?: (message: unknown, socket: FakeSocket) => unknown;

  readonly factory: SocketFactory = (url, handlers) => {
    const socket = new FakeSocket(url, handlers, this);
    this.sockets.push(socket);
    if (this.failDials > 0) {
      this.failDials--;
      queueMicrotask(() => socket.fail());
    } else if (this.autoOpen) {
      queueMicrotask(() => socket.open());
    }
    return socket;
  };

  get latest(): FakeSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) throw new Error('No socket has been dialed');
    return socket;
  }
}

/**
 * Auto-responder for a node that answers `eth_subscribe` with sequential
 * ids and everything else with `result: <method>`
 */
export function subscriptionNode(): (message: unknown) => unknown {
  let next = 0;
  return (message) => {
    const { id, method } = readRequest(message);
    if (id === null) return { jsonrpc: '2.0', id: null, result: '1' };
    if (method === 'eth_subscribe') {
      next++;
      return { jsonrpc: '2.0', id, result: `0xsub${next}` };
    }
    if (method === 'eth_unsubscribe') return { jsonrpc: '2.0', id, result: true };
    return { jsonrpc: '2.0', id, result: method };
  };
}

/**
 * Flushes all pending promises
 */
export async function flushPromises(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}
