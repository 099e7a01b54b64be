/**
 * Event Dispatcher
 *
 * Fans coordinator events out to subscribers. Each subscriber owns a bounded
 * FIFO queue drained by its own async loop, so a slow handler only delays
 * itself. When a queue is full the oldest pending event is dropped.
 */

import { QueueOverflowError } from '../errors/sync-error.js';
import { getLogger, type Logger } from '../logging/logger.js';
import type {
  SubscribeOptions,
  SyncEvent,
  SyncEventHandler,
  SyncEventOf,
  SyncEventType,
  Unsubscribe,
} from './types.js';

interface Subscriber {
  id: number;
  type: SyncEventType | '*';
  deliver: (event: SyncEvent) => void | Promise<void>;
  queue: SyncEvent[];
  maxQueueSize: number;
  dropped: number;
  /** Set while the drain loop runs */
  draining: Promise<void> | null;
  active: boolean;
}

export interface DispatcherStats {
  subscribers: number;
  queued: number;
  dropped: number;
  delivered: number;
  handlerErrors: number;
}

function isEventOf<K extends SyncEventType>(event: SyncEvent, type: K): event is SyncEventOf<K> {
  return event.type === type;
}

export class EventDispatcher {
  private subscribers = new Map<number, Subscriber>();
  private nextId = 1;
  private closed = false;
  private delivered = 0;
  private handlerErrors = 0;
  private droppedFromRemoved = 0;
  private readonly logger: Logger;
  private readonly defaultQueueSize: number;

  constructor(options: { logger?: Logger; defaultQueueSize?: number } = {}) {
    this.logger = (options.logger ?? getLogger()).child({ component: 'dispatcher' });
    this.defaultQueueSize = options.defaultQueueSize ?? 100;
  }

  /** Receive events of one type. */
  subscribe<K extends SyncEventType>(
    type: K,
    handler: SyncEventHandler<SyncEventOf<K>>,
    options: SubscribeOptions = {}
  ): Unsubscribe {
    return this.addSubscriber(
      type,
      (event) => (isEventOf(event, type) ? handler(event) : undefined),
      options
    );
  }

  /** Receive every event. */
  subscribeAll(handler: SyncEventHandler, options: SubscribeOptions = {}): Unsubscribe {
    return this.addSubscriber('*', handler, options);
  }

  /** Queue an event for every matching subscriber. Never blocks on handlers. */
  publish(event: SyncEvent): void {
    if (this.closed) {
      this.logger.debug({ type: event.type }, 'Dispatcher closed; event discarded');
      return;
    }

    for (const subscriber of this.subscribers.values()) {
      if (subscriber.type !== '*' && subscriber.type !== event.type) continue;

      if (subscriber.queue.length >= subscriber.maxQueueSize) {
        const oldest = subscriber.queue.shift();
        subscriber.dropped++;
        const err = new QueueOverflowError('Subscriber queue full; dropped oldest event', subscriber.dropped, {
          subscriber: subscriber.id,
          droppedType: oldest?.type,
        });
        this.logger.warn({ err }, 'Event queue overflow');
      }

      subscriber.queue.push(event);
      if (!subscriber.draining) {
        subscriber.draining = this.drainSubscriber(subscriber);
      }
    }
  }

  /** Resolves once every queue is empty and no handler is running. */
  async drain(): Promise<void> {
    for (;;) {
      const pending = [...this.subscribers.values()]
        .map((subscriber) => subscriber.draining)
        .filter((draining): draining is Promise<void> => draining !== null);
      if (pending.length === 0) return;
      await Promise.all(pending);
    }
  }

  /**
   * Stop accepting events, let queued ones deliver for up to `timeoutMs`,
   * then discard the rest.
   */
  async close(timeoutMs = 5_000): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const drained = this.drain().then(() => true);
    const finished = await Promise.race([
      drained,
      new Promise<false>((resolve) => {
        const timer = setTimeout(() => resolve(false), timeoutMs);
        void drained.then(() => clearTimeout(timer));
      }),
    ]);

    if (!finished) {
      const abandoned = [...this.subscribers.values()].reduce((sum, s) => sum + s.queue.length, 0);
      this.logger.warn({ abandoned, timeoutMs }, 'Dispatcher closed before queues drained');
    }

    for (const subscriber of this.subscribers.values()) {
      subscriber.active = false;
      subscriber.queue.length = 0;
    }
    this.subscribers.clear();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStats(): DispatcherStats {
    let queued = 0;
    let dropped = this.droppedFromRemoved;
    for (const subscriber of this.subscribers.values()) {
      queued += subscriber.queue.length;
      dropped += subscriber.dropped;
    }
    return {
      subscribers: this.subscribers.size,
      queued,
      dropped,
      delivered: this.delivered,
      handlerErrors: this.handlerErrors,
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────────────

  private addSubscriber(
    type: SyncEventType | '*',
    deliver: (event: SyncEvent) => void | Promise<void>,
    options: SubscribeOptions
  ): Unsubscribe {
    const maxQueueSize = options.maxQueueSize ?? this.defaultQueueSize;
    if (maxQueueSize < 1) {
      throw new RangeError(`maxQueueSize must be at least 1 (got ${maxQueueSize})`);
    }

    const subscriber: Subscriber = {
      id: this.nextId++,
      type,
      deliver,
      queue: [],
      maxQueueSize,
      dropped: 0,
      draining: null,
      active: true,
    };
    this.subscribers.set(subscriber.id, subscriber);

    return () => {
      if (!subscriber.active) return;
      subscriber.active = false;
      subscriber.queue.length = 0;
      this.droppedFromRemoved += subscriber.dropped;
      this.subscribers.delete(subscriber.id);
    };
  }

  private async drainSubscriber(subscriber: Subscriber): Promise<void> {
    // Yield first so publish() returns before any handler runs
    await Promise.resolve();

    while (subscriber.active && subscriber.queue.length > 0) {
      const event = subscriber.queue.shift();
      if (!event) break;
      try {
        await subscriber.deliver(event);
        this.delivered++;
      } catch (err) {
        this.handlerErrors++;
        this.logger.error({ err, type: event.type, subscriber: subscriber.id }, 'Event handler failed');
      }
    }

    subscriber.draining = null;
  }
}
