import { TransportEventType } from '../../events/types.js';
import type { EventBus } from '../../events/EventBus.js';
import { requestKey } from '../../rpc/envelope.js';
import type { RpcRequest, RpcResponse } from '../../rpc/types.js';
import {
  BatchMissingResponseError,
  ConfigurationError,
  RequestCancelledError,
  TransportClosedError,
} from '../../utils/errors.js';
import { noopLogger, type Logger } from '../../utils/logger.js';

/**
 * Batch configuration
 */
export interface BatchSchedulerConfig {
  /**
   * Maximum requests per batch; reaching it flushes at once
   * @default 1000
   */
  batchSize: number;

  /**
   * Time window for collecting requests (ms). 0 still coalesces the calls
   * made in the same tick.
   * @default 0
   */
  wait: number;

  /**
   * Sanitized endpoint for errors and events
   */
  url: string;

  eventBus?: EventBus;
  logger?: Logger;
}

/**
 * Sends one batch; the signal aborts when the scheduler closes
 */
export type BatchSendFn = (requests: RpcRequest[], signal: AbortSignal) => Promise<RpcResponse[]>;

/**
 * Queued or in-flight caller
 * @private
 */
interface BatchedRequest {
  request: RpcRequest;
  key: string;
  settled: boolean;
  resolve: (response: RpcResponse) => void;
  reject: (error: Error) => void;
}

/**
 * Batch statistics
 */
export interface BatchStats {
  totalBatches: number;
  totalRequests: number;
  averageBatchSize: number;
  largestBatch: number;
  smallestBatch: number;
}

export const DEFAULT_BATCH_SIZE = 1000;
export const DEFAULT_BATCH_WAIT = 0;

/**
 * Combines concurrent JSON-RPC requests into array POSTs and routes each
 * reply entry back to its caller by id.
 */
export class BatchScheduler {
  private config: BatchSchedulerConfig;
  private queue: BatchedRequest[] = [];
  /** Every caller not yet settled, queued or in flight */
  private waiting = new Set<BatchedRequest>();
  private inFlight = new Set<AbortController>();
  private timer: NodeJS.Timeout | null = null;
  private closed = false;
  private stats: BatchStats = {
    totalBatches: 0,
    totalRequests: 0,
    averageBatchSize: 0,
    largestBatch: 0,
    smallestBatch: Infinity,
  };
  private readonly logger: Logger;

  constructor(
    private readonly send: BatchSendFn,
    config: Partial<BatchSchedulerConfig> & Pick<BatchSchedulerConfig, 'url'>
  ) {
    this.config = {
      batchSize: config.batchSize ?? DEFAULT_BATCH_SIZE,
      wait: config.wait ?? DEFAULT_BATCH_WAIT,
      url: config.url,
      eventBus: config.eventBus,
      logger: config.logger,
    };
    this.logger = config.logger ?? noopLogger;

    if (!Number.isInteger(this.config.batchSize) || this.config.batchSize < 1) {
      throw ConfigurationError.invalidValue('batchSize', 'a positive integer', this.config.batchSize);
    }
    if (this.config.wait < 0) {
      throw ConfigurationError.invalidValue('wait', 'a non-negative number', this.config.wait);
    }
  }

  /**
   * Queues a request for the next batch
   * @returns The reply entry carrying this request's id
   */
  schedule(request: RpcRequest, signal?: AbortSignal): Promise<RpcResponse> {
    if (this.closed) {
      return Promise.reject(new TransportClosedError('BatchScheduler'));
    }
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError(signal.reason));
    }
    const key = requestKey(request.id);
    if (this.queue.some((queued) => queued.key === key)) {
      return Promise.reject(ConfigurationError.duplicateRequestId(request.id));
    }

    return new Promise<RpcResponse>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(entry);
        if (index >= 0) {
          this.queue.splice(index, 1);
          if (this.queue.length === 0) this.stopTimer();
        }
        // An already-sent entry stays in its batch; the reply is discarded
        this.settle(entry, () => reject(new RequestCancelledError(signal?.reason)));
      };

      const entry: BatchedRequest = {
        request,
        key,
        settled: false,
        resolve: (response) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(response);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(entry);
      this.waiting.add(entry);

      if (this.queue.length >= this.config.batchSize) {
        this.stopTimer();
        this.dispatch();
      } else if (this.queue.length === 1) {
        this.startTimer();
      }
    });
  }

  /**
   * Manually flushes the current batch
   * @returns Number of requests flushed
   */
  async flush(): Promise<number> {
    this.stopTimer();
    const batch = this.takeQueue();
    if (batch.length > 0) {
      await this.processBatch(batch);
    }
    return batch.length;
  }

  /** Requests queued for the next batch */
  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Gets batch statistics
   * @returns Current stats
   */
  getStats(): Readonly<BatchStats> {
    return { ...this.stats };
  }

  /**
   * Stops the timer, aborts in-flight batches and rejects every waiting
   * caller. Later `schedule` calls reject too.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stopTimer();
    this.queue = [];

    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();

    const error = new TransportClosedError('BatchScheduler');
    for (const entry of [...this.waiting]) {
      this.settle(entry, () => entry.reject(error));
    }
  }

  private startTimer(): void {
    if (!this.timer) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.dispatch();
      }, this.config.wait);
    }
  }

  private stopTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private takeQueue(): BatchedRequest[] {
    const batch = this.queue;
    this.queue = [];
    return batch;
  }

  private dispatch(): void {
    const batch = this.takeQueue();
    if (batch.length === 0) return;
    this.processBatch(batch).catch((error: unknown) => {
      this.logger.error('Batch dispatch failed', error);
    });
  }

  private async processBatch(batch: BatchedRequest[]): Promise<void> {
    const controller = new AbortController();
    this.inFlight.add(controller);
    this.updateStats(batch.length);
    this.config.eventBus?.emit(TransportEventType.BATCH_FLUSHED, this.config.url, {
      url: this.config.url,
      size: batch.length,
    });

    try {
      const responses = await this.send(
        batch.map((entry) => entry.request),
        controller.signal
      );

      const byKey = new Map<string, RpcResponse>();
      for (const response of responses) {
        if (response.id !== null) byKey.set(requestKey(response.id), response);
      }

      for (const entry of batch) {
        const response = byKey.get(entry.key);
        if (response) {
          this.settle(entry, () => entry.resolve(response));
        } else {
          const error = new BatchMissingResponseError(this.config.url, entry.request.id);
          this.settle(entry, () => entry.reject(error));
        }
      }
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      for (const entry of batch) {
        this.settle(entry, () => entry.reject(failure));
      }
    } finally {
      this.inFlight.delete(controller);
    }
  }

  private settle(entry: BatchedRequest, finish: () => void): void {
    if (entry.settled) return;
    entry.settled = true;
    this.waiting.delete(entry);
    finish();
  }

  /**
   * Updates batch statistics
   * @param batchSize - Size of processed batch
   * @private
   */
  private updateStats(batchSize: number): void {
    this.stats.totalBatches++;
    this.stats.totalRequests += batchSize;
    this.stats.averageBatchSize = this.stats.totalRequests / this.stats.totalBatches;
    this.stats.largestBatch = Math.max(this.stats.largestBatch, batchSize);
    this.stats.smallestBatch = Math.min(this.stats.smallestBatch, batchSize);
  }
}
