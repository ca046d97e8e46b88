/**
 * Transport lifecycle events
 *
 * @module events/types
 */

export enum TransportEventType {
  // Retry loop
  REQUEST_RETRY = 'REQUEST_RETRY',

  // WebSocket lifecycle
  WEBSOCKET_CONNECTED = 'WEBSOCKET_CONNECTED',
  WEBSOCKET_DISCONNECTED = 'WEBSOCKET_DISCONNECTED',
  WEBSOCKET_RECONNECTING = 'WEBSOCKET_RECONNECTING',
  WEBSOCKET_RECONNECTED = 'WEBSOCKET_RECONNECTED',
  WEBSOCKET_FAILED = 'WEBSOCKET_FAILED',
  SUBSCRIPTION_RESTORED = 'SUBSCRIPTION_RESTORED',

  // HTTP batching
  BATCH_FLUSHED = 'BATCH_FLUSHED',

  // Fallback
  FALLBACK_TRANSPORT_FAILED = 'FALLBACK_TRANSPORT_FAILED',
  FALLBACK_RANKING_UPDATED = 'FALLBACK_RANKING_UPDATED',
}

/**
 * Payload carried by each event type
 */
export interface TransportEventDataMap {
  [TransportEventType.REQUEST_RETRY]: { method: string; attempt: number; delay: number; error: unknown };
  [TransportEventType.WEBSOCKET_CONNECTED]: { url: string };
  [TransportEventType.WEBSOCKET_DISCONNECTED]: { url: string; reason?: string };
  [TransportEventType.WEBSOCKET_RECONNECTING]: { url: string; attempt: number; delay: number };
  [TransportEventType.WEBSOCKET_RECONNECTED]: { url: string; attempt: number };
  [TransportEventType.WEBSOCKET_FAILED]: { url: string; attempts: number };
  [TransportEventType.SUBSCRIPTION_RESTORED]: { url: string; previousId: string; id: string };
  [TransportEventType.BATCH_FLUSHED]: { url: string; size: number };
  [TransportEventType.FALLBACK_TRANSPORT_FAILED]: { key: string; method: string; error: unknown };
  [TransportEventType.FALLBACK_RANKING_UPDATED]: { order: string[] };
}

export interface TransportEvent<K extends TransportEventType = TransportEventType> {
  type: K;
  /** Key of the transport that emitted the event */
  source: string;
  timestamp: Date;
  data: TransportEventDataMap[K];
}

export type TransportEventListener<K extends TransportEventType = TransportEventType> = (
  event: TransportEvent<K>
) => void;
