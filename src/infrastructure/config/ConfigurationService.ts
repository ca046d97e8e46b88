import { DEFAULT_RETRY_COUNT, DEFAULT_RETRY_DELAY, DEFAULT_TIMEOUT } from '../../resilience/RetryPolicy.js';
import { DEFAULT_RANK_INTERVAL } from '../../transport/fallback/FallbackTransport.js';
import { DEFAULT_BATCH_SIZE, DEFAULT_BATCH_WAIT } from '../../transport/http/BatchScheduler.js';
import {
  DEFAULT_KEEP_ALIVE_INTERVAL,
  DEFAULT_RECONNECT_ATTEMPTS,
  DEFAULT_RECONNECT_DELAY,
} from '../../transport/websocket/WebSocketRpcClient.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createConsoleLogger, isLogLevel, type Logger, type LogLevel } from '../../utils/logger.js';

export interface TransportDefaults {
  retryCount: number;
  retryDelay: number;
  timeout: number;
  batchSize: number;
  batchWait: number;
  keepAliveInterval: number;
  reconnectAttempts: number;
  reconnectDelay: number;
  rankInterval: number;
  logLevel: LogLevel;
}

type NumericSetting = Exclude<keyof TransportDefaults, 'logLevel'>;

/** Environment variable and lower bound for every numeric setting */
const NUMERIC_ENV: Record<NumericSetting, { name: string; min: number }> = {
  retryCount: { name: 'RPC_RETRY_COUNT', min: 0 },
  retryDelay: { name: 'RPC_RETRY_DELAY_MS', min: 0 },
  timeout: { name: 'RPC_TIMEOUT_MS', min: 1 },
  batchSize: { name: 'RPC_BATCH_SIZE', min: 1 },
  batchWait: { name: 'RPC_BATCH_WAIT_MS', min: 0 },
  keepAliveInterval: { name: 'RPC_WS_KEEPALIVE_INTERVAL_MS', min: 1 },
  reconnectAttempts: { name: 'RPC_WS_RECONNECT_ATTEMPTS', min: 0 },
  reconnectDelay: { name: 'RPC_WS_RECONNECT_DELAY_MS', min: 0 },
  rankInterval: { name: 'RPC_RANK_INTERVAL_MS', min: 0 },
};

export const DEFAULT_TRANSPORT_SETTINGS: Readonly<TransportDefaults> = Object.freeze({
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

export const DEFAULT_POLLING_INTERVAL = 4_000;
export const MIN_POLLING_INTERVAL = 500;

/**
 * Half the block time, never below 500ms; 4s when the block time is unknown
 */
export function pollingIntervalFor(blockTime?: number): number {
  if (blockTime === undefined || blockTime <= 0) {
    return DEFAULT_POLLING_INTERVAL;
  }
  return Math.max(Math.floor(blockTime / 2), MIN_POLLING_INTERVAL);
}

/**
 * Configuration service for the transports
 * Merges defaults, `RPC_*` environment variables and explicit overrides
 */
export class ConfigurationService {
  private static instance: ConfigurationService | undefined;
  private config: TransportDefaults;

  private constructor(overrides: Partial<TransportDefaults> = {}, env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfiguration(overrides, env);
  }

  /**
   * Gets the singleton instance. Arguments only apply on first use.
   * @throws ConfigurationError when an environment variable is malformed
   */
  static getInstance(overrides?: Partial<TransportDefaults>, env?: NodeJS.ProcessEnv): ConfigurationService {
    if (!ConfigurationService.instance) {
      ConfigurationService.instance = new ConfigurationService(overrides, env);
    }
    return ConfigurationService.instance;
  }

  /**
   * Drops the singleton (for testing purposes)
   */
  static resetInstance(): void {
    ConfigurationService.instance = undefined;
  }

  private loadConfiguration(overrides: Partial<TransportDefaults>, env: NodeJS.ProcessEnv): TransportDefaults {
    return {
      ...DEFAULT_TRANSPORT_SETTINGS,
      ...this.loadFromEnvironment(env),
      ...overrides,
    };
  }

  private loadFromEnvironment(env: NodeJS.ProcessEnv): Partial<TransportDefaults> {
    const config: Partial<TransportDefaults> = {};

    for (const [setting, { name, min }] of Object.entries(NUMERIC_ENV)) {
      const raw = env[name];
      if (raw === undefined || raw === '') continue;
      if (!/^\d+$/.test(raw) || Number(raw) < min) {
        throw ConfigurationError.invalidValue(name, `an integer >= ${min}`, raw);
      }
      if (isNumericSetting(setting)) {
        config[setting] = Number(raw);
      }
    }

    const level = env.RPC_LOG_LEVEL;
    if (level !== undefined && level !== '') {
      if (!isLogLevel(level)) {
        throw ConfigurationError.invalidValue('RPC_LOG_LEVEL', 'debug, info, warn, error or silent', level);
      }
      config.logLevel = level;
    }

    return config;
  }

  getConfig(): Readonly<TransportDefaults> {
    return { ...this.config };
  }

  /**
   * Retry settings in the shape every transport config takes
   */
  getRetryConfig(): { retryCount: number; retryDelay: number; timeout: number } {
    const { retryCount, retryDelay, timeout } = this.config;
    return { retryCount, retryDelay, timeout };
  }

  getBatchConfig(): { batchSize: number; wait: number } {
    return { batchSize: this.config.batchSize, wait: this.config.batchWait };
  }

  getWebSocketConfig(): { keepAlive: { interval: number }; reconnect: { attempts: number; delay: number } } {
    return {
      keepAlive: { interval: this.config.keepAliveInterval },
      reconnect: { attempts: this.config.reconnectAttempts, delay: this.config.reconnectDelay },
    };
  }

  getRankConfig(): { interval: number } {
    return { interval: this.config.rankInterval };
  }

  /**
   * Gets polling interval in milliseconds for a chain's block time
   */
  getPollingInterval(blockTime?: number): number {
    return pollingIntervalFor(blockTime);
  }

  getLogLevel(): LogLevel {
    return this.config.logLevel;
  }

  /**
   * Console logger at the configured level
   */
  createLogger(prefix?: string): Logger {
    return createConsoleLogger(this.config.logLevel, prefix);
  }

  /**
   * Updates configuration (for testing purposes)
   */
  updateConfig(updates: Partial<TransportDefaults>): void {
    this.config = { ...this.config, ...updates };
  }
}

function isNumericSetting(value: string): value is NumericSetting {
  return Object.prototype.hasOwnProperty.call(NUMERIC_ENV, value);
}
