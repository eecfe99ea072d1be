/**
 * EventBus - typed pub/sub for estimator change notifications
 *
 * Handlers are isolated from one another: a throwing or rejecting handler
 * is logged and reported as `system:error`, and the remaining handlers
 * still run. A bounded history is kept for inspection.
 */

import {
  createEvent,
  type EventType,
  type TypedEvent,
  type EventHandler,
  type EventFilter,
  type PayloadFor,
  type SystemErrorPayload,
} from './event-types.js';
import { logger } from '../logging/index.js';

const log = logger.child('EventBus');

export interface EventBusConfig {
  /** Maximum number of events to keep in history (default: 100) */
  historySize?: number;
  /** Whether handler failures are logged (default: true) */
  logErrors?: boolean;
}

const DEFAULT_CONFIG: Required<EventBusConfig> = {
  historySize: 100,
  logErrors: true,
};

type InternalHandler = (event: TypedEvent<EventType, unknown>) => void | Promise<void>;

/**
 * Fixed-capacity ring buffer, oldest entry overwritten first.
 */
class CircularBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private count = 0;
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(capacity, 1);
    this.buffer = new Array<T | undefined>(this.capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    }
  }

  toArray(): T[] {
    const result: T[] = [];
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(start + i) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }

  get length(): number {
    return this.count;
  }
}

/**
 * @example
 * ```typescript
 * const bus = new EventBus();
 * bus.on('config:changed', (event) => {
 *   cache.clear();
 *   log.info('Config changed', { version: event.payload.version });
 * });
 * bus.emit(createEvent('config:changed', { version: 2, changedKeys: ['style'] }));
 * ```
 */
export class EventBus {
  private config: Required<EventBusConfig>;
  private handlers = new Map<EventType, Set<InternalHandler>>();
  private history: CircularBuffer<TypedEvent<EventType, unknown>>;
  private emittingError = false;

  constructor(config: EventBusConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.history = new CircularBuffer(this.config.historySize);
  }

  /**
   * Subscribe to an event type.
   *
   * @returns Unsubscribe function
   */
  on<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    let handlers = this.handlers.get(type);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(type, handlers);
    }

    // The generic parameter ties handler and event type together at the call site
    const internalHandler = handler as unknown as InternalHandler;
    const registered = handlers;
    registered.add(internalHandler);

    log.debug('Handler registered', { eventType: type, handlerCount: registered.size });

    return () => {
      registered.delete(internalHandler);
    };
  }

  /**
   * Subscribe for a single emission only.
   */
  once<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    const unsubscribe = this.on(type, (event) => {
      unsubscribe();
      return handler(event);
    });
    return unsubscribe;
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler as unknown as InternalHandler);
  }

  /**
   * Remove listeners for one event type, or all listeners when no type is given.
   */
  removeAllListeners(type?: EventType): void {
    if (type) {
      this.handlers.delete(type);
    } else {
      this.handlers.clear();
    }
  }

  listenerCount(type: EventType): number {
    return this.handlers.get(type)?.size ?? 0;
  }

  /**
   * Deliver an event to every handler registered for its type.
   *
   * Async handlers are not awaited; their rejections are reported the same
   * way as synchronous throws.
   */
  emit<T extends EventType>(event: TypedEvent<T, PayloadFor<T>>): void {
    const stored: TypedEvent<EventType, unknown> = event;
    this.history.push(stored);

    const handlers = this.handlers.get(event.type);
    log.debug('Event emitted', {
      eventType: event.type,
      correlationId: event.correlationId,
      handlerCount: handlers?.size ?? 0,
    });

    if (!handlers) return;

    // Copy so that once() handlers can unsubscribe mid-iteration
    for (const handler of [...handlers]) {
      this.safeExecuteHandler(handler, stored);
    }
  }

  getHistory(filter?: EventFilter): TypedEvent<EventType, unknown>[] {
    let result = this.history.toArray();
    if (!filter) return result;

    if (filter.types && filter.types.length > 0) {
      const typeSet = new Set(filter.types);
      result = result.filter((e) => typeSet.has(e.type));
    }
    if (filter.correlationId) {
      const correlationId = filter.correlationId;
      result = result.filter((e) => e.correlationId === correlationId);
    }
    const { startTime, endTime } = filter;
    if (startTime) {
      result = result.filter((e) => e.timestamp >= startTime);
    }
    if (endTime) {
      result = result.filter((e) => e.timestamp <= endTime);
    }
    if (filter.limit !== undefined && filter.limit > 0) {
      result = result.slice(0, filter.limit);
    }
    return result;
  }

  clearHistory(): void {
    this.history.clear();
  }

  destroy(): void {
    this.removeAllListeners();
    this.clearHistory();
  }

  private safeExecuteHandler(handler: InternalHandler, event: TypedEvent<EventType, unknown>): void {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          this.handleHandlerError(error, event);
        });
      }
    } catch (error) {
      this.handleHandlerError(error, event);
    }
  }

  private handleHandlerError(error: unknown, originalEvent: TypedEvent<EventType, unknown>): void {
    const errorObj = error instanceof Error ? error : new Error(String(error));

    if (this.config.logErrors) {
      log.error('Event handler failed', errorObj, {
        eventType: originalEvent.type,
        correlationId: originalEvent.correlationId,
      });
    }

    // Never re-enter for failures raised while reporting a failure
    if (!this.emittingError && originalEvent.type !== 'system:error') {
      this.emittingError = true;
      try {
        const payload: SystemErrorPayload = {
          error: errorObj,
          component: 'event-bus',
          message: `Handler error for event ${originalEvent.type}`,
        };
        this.emit(createEvent('system:error', payload, originalEvent.correlationId));
      } finally {
        this.emittingError = false;
      }
    }
  }
}
