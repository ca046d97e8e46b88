/**
 * Fallback Transport
 *
 * Ordered traversal over child transports: the first child that answers
 * wins. Children keep their own retry policies; the fallback only records
 * per-child stats and, when ranking is on, periodically reorders children
 * by latency and stability.
 *
 * @module transport/fallback/FallbackTransport
 */

import { TransportEventType } from '../../events/types.js';
import type { EventBus } from '../../events/EventBus.js';
import { normalizeRequest } from '../../rpc/envelope.js';
import { IdGenerator } from '../../rpc/IdGenerator.js';
import type { RpcRequestInput, RpcResponse } from '../../rpc/types.js';
import { ConfigurationError, MethodNotSupportedError, RequestCancelledError } from '../../utils/errors.js';
import { noopLogger, type Logger } from '../../utils/logger.js';
import { resolveToggle } from '../../utils/options.js';
import { resolveTransportConfig } from '../createTransport.js';
import { isMethodAllowed, type MethodFilter } from '../MethodFilter.js';
import type {
  RequestOptions,
  Transport,
  TransportConfig,
  TransportFactory,
  TransportParams,
  TransportValue,
} from '../types.js';
import { DEFAULT_RANK_WEIGHTS, TransportStats, type RankWeights, type TransportStatsSnapshot } from './TransportStats.js';

export const DEFAULT_RANK_INTERVAL = 10_000;

export interface RankConfig {
  /**
   * Re-rank period (ms); `0` leaves ranking to explicit `rank()` calls
   * @default 10000
   */
  interval?: number;
  weights?: Partial<RankWeights>;
}

export interface FallbackTransportConfig {
  key?: string;
  name?: string;
  methods?: MethodFilter;
  /** `false` keeps the declared order forever */
  rank?: boolean | RankConfig;
  retryCount?: number;
  retryDelay?: number;
  timeout?: number;
}

export interface FallbackStats extends TransportStatsSnapshot {
  key: string;
  /** Position in the current order, 0 = tried first */
  position: number;
}

export class FallbackTransport implements Transport {
  readonly config: TransportConfig;
  readonly transports: readonly Transport[];

  private readonly stats: TransportStats;
  private currentOrder: number[];
  private readonly weights: RankWeights;
  private rankTimer: NodeJS.Timeout | null = null;
  private readonly idGenerator: IdGenerator;
  private readonly logger: Logger;
  private readonly eventBus?: EventBus;

  constructor(transports: readonly Transport[], config: FallbackTransportConfig = {}, params: TransportParams = {}) {
    if (transports.length === 0) {
      throw ConfigurationError.noTransports();
    }
    this.transports = transports;
    this.config = resolveTransportConfig({
      key: config.key ?? 'fallback',
      name: config.name ?? 'Fallback JSON-RPC',
      type: 'fallback',
      methods: config.methods,
      retryCount: params.retryCount ?? config.retryCount,
      retryDelay: config.retryDelay,
      timeout: params.timeout ?? config.timeout,
    });
    this.stats = new TransportStats(transports.length);
    this.currentOrder = transports.map((_, index) => index);
    this.idGenerator = params.idGenerator ?? new IdGenerator();
    this.logger = params.logger ?? noopLogger;
    this.eventBus = params.eventBus;

    const rank = resolveToggle<RankConfig>(config.rank);
    this.weights = { ...DEFAULT_RANK_WEIGHTS, ...rank?.weights };
    const interval = rank?.interval ?? DEFAULT_RANK_INTERVAL;
    if (rank && interval > 0) {
      this.rankTimer = setInterval(() => this.rank(), interval);
      // Ranking alone never keeps the process alive
      this.rankTimer.unref();
    }
  }

  /** Attributes of the first declared child */
  get value(): TransportValue {
    return this.transports[0].value;
  }

  /** Child indices in the order the next request will try them */
  get order(): readonly number[] {
    return [...this.currentOrder];
  }

  /**
   * Tries each child in the current order.
   * @throws MethodNotSupportedError before any child is called
   * @throws RequestCancelledError when the caller aborts between children
   * @throws The last child's error when every child fails
   */
  async request(input: RpcRequestInput, options: RequestOptions = {}): Promise<RpcResponse> {
    if (!isMethodAllowed(this.config.methods, input.method)) {
      throw new MethodNotSupportedError(input.method);
    }
    const request = normalizeRequest(input, this.idGenerator);
    const order = [...this.currentOrder];
    let lastError: unknown;

    for (const index of order) {
      const transport = this.transports[index];
      const started = Date.now();
      try {
        const response = await transport.request(request, options);
        this.stats.recordSuccess(index, Date.now() - started);
        return response;
      } catch (error) {
        this.stats.recordFailure(index);
        lastError = error;
        this.logger.debug(`Fallback child ${transport.config.key} failed for ${request.method}`, error);
        this.eventBus?.emit(TransportEventType.FALLBACK_TRANSPORT_FAILED, this.config.key, {
          key: transport.config.key,
          method: request.method,
          error,
        });

        const signal = options.signal;
        if (signal?.aborted) {
          throw error instanceof RequestCancelledError ? error : new RequestCancelledError(signal.reason);
        }
      }
    }

    throw lastError;
  }

  /**
   * Recomputes the order from the collected stats
   */
  rank(): void {
    this.currentOrder = this.stats.rankedOrder(this.weights);
    this.eventBus?.emit(TransportEventType.FALLBACK_RANKING_UPDATED, this.config.key, {
      order: this.currentOrder.map((index) => this.transports[index].config.key),
    });
  }

  getStats(): FallbackStats[] {
    return this.stats.getAllSnapshots().map((snapshot) => ({
      ...snapshot,
      key: this.transports[snapshot.index].config.key,
      position: this.currentOrder.indexOf(snapshot.index),
    }));
  }

  /**
   * Stops ranking and closes every child
   * @throws AggregateError listing the children that failed to close
   */
  async close(): Promise<void> {
    if (this.rankTimer) {
      clearInterval(this.rankTimer);
      this.rankTimer = null;
    }

    const results = await Promise.allSettled(this.transports.map((transport) => transport.close()));
    const failures: unknown[] = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));
    if (failures.length > 0) {
      throw new AggregateError(failures, `Failed to close ${failures.length} of ${this.transports.length} transports`);
    }
  }
}

/**
 * Creates a fallback transport factory. Child factories that throw are
 * skipped; every surviving child shares the fallback's id generator.
 * @throws ConfigurationError from the factory when no child could be built
 */
export function fallback(
  factories: readonly TransportFactory[],
  config: FallbackTransportConfig = {}
): TransportFactory<FallbackTransport> {
  return (params = {}) => {
    const shared: TransportParams = { ...params, idGenerator: params.idGenerator ?? new IdGenerator() };
    const logger = params.logger ?? noopLogger;
    const transports: Transport[] = [];

    for (const factory of factories) {
      try {
        transports.push(factory(shared));
      } catch (error) {
        logger.warn('Skipping fallback child that failed to build', error);
      }
    }

    if (transports.length === 0) {
      throw ConfigurationError.noTransports();
    }
    return new FallbackTransport(transports, config, shared);
  };
}
