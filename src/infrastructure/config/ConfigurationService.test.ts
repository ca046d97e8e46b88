import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationService, DEFAULT_TRANSPORT_SETTINGS, pollingIntervalFor } from './ConfigurationService.js';
import { ConfigurationError } from '../../utils/errors.js';
import { DEFAULT_RETRY_COUNT, DEFAULT_RETRY_DELAY, DEFAULT_TIMEOUT } from '../../resilience/RetryPolicy.js';
import { DEFAULT_RANK_INTERVAL } from '../../transport/fallback/FallbackTransport.js';
import { DEFAULT_BATCH_SIZE, DEFAULT_BATCH_WAIT } from '../../transport/http/BatchScheduler.js';
import {
  DEFAULT_KEEP_ALIVE_INTERVAL,
  DEFAULT_RECONNECT_ATTEMPTS,
  DEFAULT_RECONNECT_DELAY,
} from '../../transport/websocket/WebSocketRpcClient.js';

describe('ConfigurationService', () => {
  beforeEach(() => {
    ConfigurationService.resetInstance();
  });

  it('should start from the defaults', () => {
    const service = ConfigurationService.getInstance({}, {});

    expect(service.getConfig()).toEqual(DEFAULT_TRANSPORT_SETTINGS);
    expect(service.getRetryConfig()).toEqual({ retryCount: 3, retryDelay: 150, timeout: 10_000 });
    expect(service.getBatchConfig()).toEqual({ batchSize: 1_000, wait: 0 });
    expect(service.getWebSocketConfig()).toEqual({
      keepAlive: { interval: 30_000 },
      reconnect: { attempts: 5, delay: 2_000 },
    });
    expect(service.getRankConfig()).toEqual({ interval: 10_000 });
  });

  it('should take its defaults from the modules that own them', () => {
    expect(DEFAULT_TRANSPORT_SETTINGS).toEqual({
      retryCount: DEFAULT_RETRY_COUNT,
      retryDelay: DEFAULT_RETRY_DELAY,
      timeout: DEFAULT_TIMEOUT,
      batchSize: DEFAULT_BATCH_SIZE,
      batchWait: DEFAULT_BATCH_WAIT,
      keepAliveInterval: DEFAULT_KEEP_ALIVE_INTERVAL,
      reconnectAttempts: DEFAULT_RECONNECT_ATTEMPTS,
      reconnectDelay: DEFAULT_RECONNECT_DELAY,
      rankInterval: DEFAULT_RANK_INTERVAL,
      logLevel: 'warn',
    });
  });

  it('should return the same instance until reset', () => {
    const first = ConfigurationService.getInstance({}, {});

    expect(ConfigurationService.getInstance({ retryCount: 9 })).toBe(first);
    expect(first.getRetryConfig().retryCount).toBe(3);
  });

  it('should read RPC_* environment variables', () => {
    const service = ConfigurationService.getInstance(
      {},
      {
        RPC_RETRY_COUNT: '0',
        RPC_TIMEOUT_MS: '2500',
        RPC_BATCH_WAIT_MS: '5',
        RPC_WS_RECONNECT_ATTEMPTS: '8',
        RPC_RANK_INTERVAL_MS: '0',
        RPC_LOG_LEVEL: 'debug',
      }
    );

    expect(service.getConfig()).toMatchObject({
      retryCount: 0,
      timeout: 2500,
      batchWait: 5,
      reconnectAttempts: 8,
      rankInterval: 0,
      logLevel: 'debug',
    });
  });

  it('should let overrides win over the environment', () => {
    const service = ConfigurationService.getInstance({ timeout: 750 }, { RPC_TIMEOUT_MS: '2500' });

    expect(service.getRetryConfig().timeout).toBe(750);
  });

  it('should ignore empty variables', () => {
    const service = ConfigurationService.getInstance({}, { RPC_RETRY_COUNT: '' });

    expect(service.getRetryConfig().retryCount).toBe(3);
  });

  it.each([
    ['RPC_RETRY_COUNT', 'three'],
    ['RPC_RETRY_DELAY_MS', '-1'],
    ['RPC_TIMEOUT_MS', '0'],
    ['RPC_BATCH_SIZE', '1.5'],
  ])('should reject %s=%s', (name, value) => {
    expect(() => ConfigurationService.getInstance({}, { [name]: value })).toThrow(ConfigurationError);
  });

  it('should name the offending variable in the error', () => {
    const error = (() => {
      try {
        ConfigurationService.getInstance({}, { RPC_LOG_LEVEL: 'verbose' });
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.code).toBe('CONFIGURATION_RPC_LOG_LEVEL_INVALID');
  });

  it('should apply runtime updates', () => {
    const service = ConfigurationService.getInstance({}, {});

    service.updateConfig({ logLevel: 'error' });

    expect(service.getLogLevel()).toBe('error');
  });
});

describe('pollingIntervalFor', () => {
  it('should default to 4s without a block time', () => {
    expect(pollingIntervalFor()).toBe(4_000);
  });

  it('should use half the block time', () => {
    expect(pollingIntervalFor(12_000)).toBe(6_000);
    expect(pollingIntervalFor(2_001)).toBe(1_000);
  });

  it('should not poll faster than every 500ms', () => {
    expect(pollingIntervalFor(250)).toBe(500);
  });

  it('should back the service method', () => {
    expect(ConfigurationService.getInstance({}, {}).getPollingInterval(12_000)).toBe(6_000);
  });
});
