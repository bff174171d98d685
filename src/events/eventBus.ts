import { EventEmitter } from 'node:events';

import { hashObject } from '../domain/models.js';

import type { EventHandler, HandlerFailedPayload, TradingEventMap, TradingEventName } from './events.js';

export type EventBusOptions = {
  queueEmits?: boolean;
};

type QueuedEvent<TName extends TradingEventName = TradingEventName> = {
  event: TName;
  payload: TradingEventMap[TName];
};

const DEFAULT_QUEUE_OPTIONS: Required<EventBusOptions> = {
  queueEmits: false
};

/**
 * Typed in-process pub/sub. Handlers are isolated: one that throws or rejects
 * produces a `handler.failed` event and never reaches the emitter.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly options: Required<EventBusOptions>;
  private readonly queue: QueuedEvent[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private isFlushingQueue = false;

  constructor(options?: EventBusOptions) {
    this.options = {
      ...DEFAULT_QUEUE_OPTIONS,
      ...options
    };
  }

  on<TName extends TradingEventName>(event: TName, handler: EventHandler<TradingEventMap[TName]>): () => void {
    const wrapped = (payload: TradingEventMap[TName]): void => {
      const run = (async () => {
        try {
          await handler(payload);
        } catch (error: unknown) {
          this.emitHandlerFailure(event, payload, error);
        }
      })();

      this.inFlight.add(run);
      void run.finally(() => this.inFlight.delete(run));
    };

    this.emitter.on(event, wrapped);

    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  emit<TName extends TradingEventName>(event: TName, payload: TradingEventMap[TName]): void {
    if (!this.options.queueEmits) {
      this.emitter.emit(event, payload);
      return;
    }

    this.queue.push({ event, payload });
    this.flushQueue();
  }

  getPendingCount(): number {
    return this.queue.length + this.inFlight.size;
  }

  /** Resolves once every handler started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private flushQueue(): void {
    if (this.isFlushingQueue) {
      return;
    }

    this.isFlushingQueue = true;
    try {
      while (this.queue.length > 0) {
        const item = this.queue.shift();
        if (!item) {
          continue;
        }

        this.emitter.emit(item.event, item.payload);
      }
    } finally {
      this.isFlushingQueue = false;
    }
  }

  private emitHandlerFailure<TName extends TradingEventName>(
    sourceEvent: TName,
    sourcePayload: TradingEventMap[TName],
    error: unknown
  ): void {
    if (sourceEvent === 'handler.failed') {
      return;
    }

    const failure: HandlerFailedPayload = {
      ts: Date.now(),
      sourceEvent,
      message: error instanceof Error ? error.message : 'Unknown handler error',
      errorName: error instanceof Error ? error.name : 'UnknownError',
      payloadHash: hashObject(sourcePayload)
    };

    this.emitter.emit('handler.failed', failure);
  }
}
