// Transports - Public API
export { http, HttpTransport } from './transport/http/HttpTransport.js';
export type { HttpTransportConfig } from './transport/http/HttpTransport.js';
export { HttpRpcClient } from './transport/http/HttpRpcClient.js';
export type { FetchFn, HttpRequestContext, HttpRpcClientOptions } from './transport/http/HttpRpcClient.js';
export { BatchScheduler } from './transport/http/BatchScheduler.js';
export type { BatchSchedulerConfig, BatchSendFn, BatchStats } from './transport/http/BatchScheduler.js';

export {
  webSocket,
  WebSocketTransport,
  newHeadsParams,
  newPendingTransactionsParams,
  logsParams,
  syncingParams,
} from './transport/websocket/WebSocketTransport.js';
export type { WebSocketTransportConfig, LogsFilter } from './transport/websocket/WebSocketTransport.js';
export { WebSocketRpcClient } from './transport/websocket/WebSocketRpcClient.js';
export type {
  WebSocketStatus,
  WebSocketRpcClientOptions,
  KeepAliveConfig,
  ReconnectConfig,
  RequestAsyncOptions,
} from './transport/websocket/WebSocketRpcClient.js';
export { wsSocketFactory } from './transport/websocket/socket.js';
export type { SocketConnection, SocketFactory, SocketHandlers } from './transport/websocket/socket.js';

export { fallback, FallbackTransport } from './transport/fallback/FallbackTransport.js';
export type { FallbackTransportConfig, FallbackStats, RankConfig } from './transport/fallback/FallbackTransport.js';
export { TransportStats } from './transport/fallback/TransportStats.js';
export type { RankWeights, TransportStatsSnapshot } from './transport/fallback/TransportStats.js';

export { custom, CustomTransport } from './transport/custom/CustomTransport.js';
export type { CustomTransportConfig } from './transport/custom/CustomTransport.js';

export { createTransport, resolveTransportConfig } from './transport/createTransport.js';
export type { CreateTransportOptions, SingleRequestFn, TransportCore } from './transport/createTransport.js';
export { isMethodAllowed } from './transport/MethodFilter.js';
export type { MethodFilter } from './transport/MethodFilter.js';
export { isSubscriber } from './transport/types.js';
export type {
  ChainLike,
  RequestOptions,
  SubscribeParams,
  Subscriber,
  Subscription,
  SubscriptionHandlers,
  Transport,
  TransportConfig,
  TransportFactory,
  TransportParams,
  TransportType,
  TransportValue,
} from './transport/types.js';

// Client facade
export { createPublicRpcClient, createSubscriptionRpcClient } from './client/RpcClient.js';
export type {
  BlockParameter,
  CallParameters,
  ReadContractParameters,
  Reader,
  RpcClientOptions,
  Watcher,
} from './client/RpcClient.js';

// JSON-RPC envelope
export * from './rpc/types.js';
export {
  normalizeRequest,
  serializeRequest,
  parseMessage,
  parseBatchResponse,
  requestKey,
  isRequestId,
  isRpcResponse,
  isSubscriptionNotification,
} from './rpc/envelope.js';
export { IdGenerator } from './rpc/IdGenerator.js';

// Resilience
export { RetryPolicy, DEFAULT_RETRY_COUNT, DEFAULT_RETRY_DELAY, DEFAULT_TIMEOUT } from './resilience/RetryPolicy.js';
export type { RetryConfig, RetryStats, ExecuteOptions, AttemptFn } from './resilience/RetryPolicy.js';

// Events
export { EventBus } from './events/EventBus.js';
export { TransportEventType } from './events/types.js';
export type { TransportEvent, TransportEventDataMap, TransportEventListener } from './events/types.js';

// Configuration
export {
  ConfigurationService,
  DEFAULT_TRANSPORT_SETTINGS,
  pollingIntervalFor,
} from './infrastructure/config/ConfigurationService.js';
export type { TransportDefaults } from './infrastructure/config/ConfigurationService.js';

// Utils
export * from './utils/errors.js';
export { createConsoleLogger, noopLogger, isLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { extractUrlCredentials, sanitizeUrl } from './utils/url.js';
