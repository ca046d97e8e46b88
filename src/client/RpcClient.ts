/**
 * Thin typed facade over a transport: the handful of read calls every
 * consumer needs, with hex results validated and decoded through viem.
 *
 * @module client/RpcClient
 */

import {
  decodeFunctionResult,
  encodeFunctionData,
  hexToBigInt,
  isHex,
  numberToHex,
  type Abi,
  type Address,
  type BlockTag,
  type Hex,
} from 'viem';
import type { EventBus } from '../events/EventBus.js';
import { pollingIntervalFor } from '../infrastructure/config/ConfigurationService.js';
import type { IdGenerator } from '../rpc/IdGenerator.js';
import { DataError, RpcError } from '../utils/errors.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { logsParams, newHeadsParams, type LogsFilter } from '../transport/websocket/WebSocketTransport.js';
import type {
  ChainLike,
  Subscriber,
  Subscription,
  Transport,
  TransportFactory,
  TransportParams,
} from '../transport/types.js';

export type BlockParameter = BlockTag | bigint;

export interface CallParameters {
  to: Address;
  data?: Hex;
  from?: Address;
}

export interface ReadContractParameters {
  address: Address;
  abi: Abi;
  functionName: string;
  args?: readonly unknown[];
  block?: BlockParameter;
}

export interface RpcClientOptions {
  chain?: ChainLike;
  /** Block-number polling period (ms); derived from `chain.blockTime` when absent */
  pollingInterval?: number;
  /** Handed to the transport factory */
  retryCount?: number;
  /** Handed to the transport factory */
  timeout?: number;
  idGenerator?: IdGenerator;
  eventBus?: EventBus;
  logger?: Logger;
}

export interface Reader {
  readonly transport: Transport;
  readonly pollingInterval: number;
  /**
   * Raw call; resolves with the `result` member
   * @throws RpcError when a raw-mode transport hands back an error reply
   */
  request(method: string, params?: unknown): Promise<unknown>;
  getChainId(): Promise<number>;
  getBlockNumber(): Promise<bigint>;
  getBalance(address: Address, block?: BlockParameter): Promise<bigint>;
  call(parameters: CallParameters, block?: BlockParameter): Promise<Hex>;
  readContract(parameters: ReadContractParameters): Promise<unknown>;
  /**
   * Polls `eth_blockNumber` and reports each new value once
   * @returns A function that stops polling
   */
  watchBlockNumber(onBlockNumber: (blockNumber: bigint) => void, onError?: (error: Error) => void): () => void;
  /** Stops every watcher and closes the transport */
  close(): Promise<void>;
}

export interface Watcher {
  watchNewHeads(onHead: (head: unknown) => void, onError?: (error: Error) => void): Promise<Subscription>;
  watchLogs(filter: LogsFilter, onLog: (log: unknown) => void, onError?: (error: Error) => void): Promise<Subscription>;
}

function resolveTransport<T extends Transport>(transport: T | TransportFactory<T>, params: TransportParams): T {
  return 'request' in transport ? transport : transport(params);
}

function toBlockParameter(block: BlockParameter = 'latest'): string {
  return typeof block === 'bigint' ? numberToHex(block) : block;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function expectHex(value: unknown, dataType: DataError['dataType'], expected: string): Hex {
  if (typeof value !== 'string' || !isHex(value)) {
    throw DataError.unexpectedResult(dataType, expected, value);
  }
  return value;
}

function expectQuantity(value: unknown, dataType: DataError['dataType']): bigint {
  const hex = expectHex(value, dataType, 'a hex quantity');
  if (hex === '0x') {
    throw DataError.unexpectedResult(dataType, 'a hex quantity', value);
  }
  return hexToBigInt(hex);
}

/**
 * Creates a read-only client
 */
export function createPublicRpcClient<T extends Transport>(
  transportOrFactory: T | TransportFactory<T>,
  options: RpcClientOptions = {}
): Reader {
  const pollingInterval = options.pollingInterval ?? pollingIntervalFor(options.chain?.blockTime);
  const logger = options.logger ?? noopLogger;
  const transport = resolveTransport(transportOrFactory, {
    chain: options.chain,
    pollingInterval,
    retryCount: options.retryCount,
    timeout: options.timeout,
    idGenerator: options.idGenerator,
    eventBus: options.eventBus,
    logger: options.logger,
  });
  const watchers = new Set<() => void>();

  const request = async (method: string, params?: unknown): Promise<unknown> => {
    const response = await transport.request(params === undefined ? { method } : { method, params });
    if (response.error) {
      throw new RpcError(response.error);
    }
    return response.result;
  };

  const getBlockNumber = async (): Promise<bigint> =>
    expectQuantity(await request('eth_blockNumber', []), 'BLOCK_NUMBER');

  const call = async (parameters: CallParameters, block?: BlockParameter): Promise<Hex> => {
    const tx: Record<string, string> = { to: parameters.to };
    if (parameters.from !== undefined) tx.from = parameters.from;
    if (parameters.data !== undefined) tx.data = parameters.data;
    const result = await request('eth_call', [tx, toBlockParameter(block)]);
    return expectHex(result, 'CALL_RESULT', 'hex call data');
  };

  return {
    transport,
    pollingInterval,
    request,

    async getChainId() {
      return Number(expectQuantity(await request('eth_chainId', []), 'CHAIN_ID'));
    },

    getBlockNumber,

    async getBalance(address, block) {
      return expectQuantity(await request('eth_getBalance', [address, toBlockParameter(block)]), 'BALANCE');
    },

    call,

    async readContract({ address, abi, functionName, args, block }) {
      const data = encodeFunctionData({ abi, functionName, args });
      const result = await call({ to: address, data }, block);
      return decodeFunctionResult({ abi, functionName, data: result });
    },

    watchBlockNumber(onBlockNumber, onError) {
      let active = true;
      let last: bigint | undefined;
      let timer: NodeJS.Timeout | undefined;

      const poll = async (): Promise<void> => {
        try {
          const blockNumber = await getBlockNumber();
          if (active && blockNumber !== last) {
            last = blockNumber;
            onBlockNumber(blockNumber);
          }
        } catch (error) {
          if (!active) return;
          if (onError) {
            onError(toError(error));
          } else {
            logger.warn('Block number poll failed', error);
          }
        }
      };

      // The next poll is scheduled only once the previous one has settled
      const run = (): void => {
        void poll()
          .catch((error: unknown) => {
            logger.error('Block number watcher callback failed', error);
          })
          .finally(() => {
            if (active) timer = setTimeout(run, pollingInterval);
          });
      };
      run();

      const stop = () => {
        active = false;
        if (timer) clearTimeout(timer);
        watchers.delete(stop);
      };
      watchers.add(stop);
      return stop;
    },

    async close() {
      for (const stop of [...watchers]) stop();
      await transport.close();
    },
  };
}

/**
 * Creates a client that can also push-subscribe
 */
export function createSubscriptionRpcClient<T extends Transport & Subscriber>(
  transportOrFactory: T | TransportFactory<T>,
  options: RpcClientOptions = {}
): Reader & Watcher {
  const pollingInterval = options.pollingInterval ?? pollingIntervalFor(options.chain?.blockTime);
  const transport = resolveTransport(transportOrFactory, {
    chain: options.chain,
    pollingInterval,
    retryCount: options.retryCount,
    timeout: options.timeout,
    idGenerator: options.idGenerator,
    eventBus: options.eventBus,
    logger: options.logger,
  });
  const reader = createPublicRpcClient(transport, { ...options, pollingInterval });

  return {
    ...reader,
    watchNewHeads: (onHead, onError) => transport.subscribe(newHeadsParams(), { onData: onHead, onError }),
    watchLogs: (filter, onLog, onError) => transport.subscribe(logsParams(filter), { onData: onLog, onError }),
  };
}
