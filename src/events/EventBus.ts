/**
 * EventBus for transport lifecycle events
 *
 * Every transport of one client publishes through the same bus, so retries,
 * reconnects, batch flushes and fallback decisions can be observed without
 * reaching into the transports.
 *
 * @module events/EventBus
 */

import { noopLogger, type Logger } from '../utils/logger.js';
import {
  TransportEventType,
  type TransportEvent,
  type TransportEventDataMap,
  type TransportEventListener,
} from './types.js';

type ErasedListener = (event: TransportEvent) => void;

function isEventOfType<K extends TransportEventType>(event: TransportEvent, type: K): event is TransportEvent<K> {
  return event.type === type;
}

export class EventBus {
  private listeners = new Map<TransportEventType, Set<ErasedListener>>();
  private allListeners = new Set<ErasedListener>();

  constructor(private readonly logger: Logger = noopLogger) {}

  on<K extends TransportEventType>(type: K, listener: TransportEventListener<K>): () => void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    const erased: ErasedListener = (event) => {
      if (isEventOfType(event, type)) listener(event);
    };
    const target = set;
    target.add(erased);
    return () => {
      target.delete(erased);
    };
  }

  onAll(listener: TransportEventListener): () => void {
    this.allListeners.add(listener);
    return () => {
      this.allListeners.delete(listener);
    };
  }

  emit<K extends TransportEventType>(type: K, source: string, data: TransportEventDataMap[K]): void {
    const event: TransportEvent<K> = {
      type,
      source,
      timestamp: new Date(),
      data,
    };

    const typed = this.listeners.get(type) ?? new Set<ErasedListener>();
    for (const listener of [...typed, ...this.allListeners]) {
      try {
        listener(event);
      } catch (error) {
        // Listener failures never stop delivery to the remaining listeners
        this.logger.warn(`EventBus listener for ${type} threw`, error);
      }
    }
  }

  listenerCount(type?: TransportEventType): number {
    if (type === undefined) {
      let total = this.allListeners.size;
      for (const set of this.listeners.values()) total += set.size;
      return total;
    }
    return this.listeners.get(type)?.size ?? 0;
  }

  removeAllListeners(): void {
    this.listeners.clear();
    this.allListeners.clear();
  }
}
