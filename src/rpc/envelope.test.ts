import { describe, it, expect } from 'vitest';
import {
  isRpcResponse,
  isSubscriptionNotification,
  normalizeRequest,
  parseBatchResponse,
  parseMessage,
  requestKey,
  serializeRequest,
} from './envelope.js';
import { IdGenerator } from './IdGenerator.js';

describe('envelope', () => {
  describe('normalizeRequest', () => {
    it('fills jsonrpc and a generated id', () => {
      const ids = new IdGenerator();
      const request = normalizeRequest({ method: 'eth_chainId' }, ids);

      expect(request).toEqual({ jsonrpc: '2.0', id: 1, method: 'eth_chainId' });
      expect(ids.current).toBe(1);
    });

    it('keeps a caller-supplied id without consuming the generator', () => {
      const ids = new IdGenerator();
      const request = normalizeRequest({ id: 'abc', method: 'eth_blockNumber', params: [] }, ids);

      expect(request).toEqual({ jsonrpc: '2.0', id: 'abc', method: 'eth_blockNumber', params: [] });
      expect(ids.current).toBe(0);
    });

    it('hands out increasing ids from a shared generator', () => {
      const ids = new IdGenerator(41);
      expect(normalizeRequest({ method: 'a' }, ids).id).toBe(42);
      expect(normalizeRequest({ method: 'b' }, ids).id).toBe(43);
    });
  });

  it('preserves numeric and string ids across the wire', () => {
    const ids = new IdGenerator();
    const numeric = parseMessage(serializeRequest(normalizeRequest({ id: 7, method: 'm' }, ids)));
    const text = parseMessage(serializeRequest(normalizeRequest({ id: '7', method: 'm' }, ids)));

    expect(numeric).toEqual({ jsonrpc: '2.0', id: 7, method: 'm' });
    expect(text).toEqual({ jsonrpc: '2.0', id: '7', method: 'm' });
  });

  it('requestKey keeps numeric and string ids apart', () => {
    expect(requestKey(1)).toBe('number:1');
    expect(requestKey('1')).toBe('string:1');
  });

  describe('isRpcResponse', () => {
    it('accepts result and error replies', () => {
      expect(isRpcResponse({ jsonrpc: '2.0', id: 1, result: '0x1' })).toBe(true);
      expect(isRpcResponse({ jsonrpc: '2.0', id: 1, result: null })).toBe(true);
      expect(isRpcResponse({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } })).toBe(true);
    });

    it('rejects notifications and malformed objects', () => {
      expect(
        isRpcResponse({ jsonrpc: '2.0', method: 'eth_subscription', params: { subscription: '0x1', result: {} } })
      ).toBe(false);
      expect(isRpcResponse({ jsonrpc: '2.0', id: 1 })).toBe(false);
      expect(isRpcResponse({ jsonrpc: '2.0', id: 1, error: { message: 'no code' } })).toBe(false);
      expect(isRpcResponse([])).toBe(false);
    });
  });

  it('isSubscriptionNotification recognizes push frames', () => {
    expect(
      isSubscriptionNotification({
        jsonrpc: '2.0',
        method: 'eth_subscription',
        params: { subscription: '0xabc', result: { number: '0x10' } },
      })
    ).toBe(true);
    expect(isSubscriptionNotification({ jsonrpc: '2.0', id: 1, result: '0xabc' })).toBe(false);
  });

  describe('parseBatchResponse', () => {
    it('drops malformed entries', () => {
      const responses = parseBatchResponse([
        { jsonrpc: '2.0', id: 2, result: '0x2' },
        { garbage: true },
        { jsonrpc: '2.0', id: 1, result: '0x1' },
      ]);

      expect(responses.map((r) => r.id)).toEqual([2, 1]);
    });

    it('throws when the body is not an array', () => {
      expect(() => parseBatchResponse({ jsonrpc: '2.0', id: 1, result: '0x1' })).toThrow(TypeError);
    });
  });
});
