import { ChangeEvent, ChangeEventInit } from '../types/index.js';
import { Logger } from './logger.js';
import { Clock, createMonotonicClock } from './utils/clock.js';

export type ChangeListener = (event: ChangeEvent) => void | Promise<void>;

export interface ChangeNotifierOptions {
  /** Events buffered per subscriber before it is dropped */
  bufferSize?: number;
  now?: Clock;
}

interface Subscriber {
  id: number;
  listener: ChangeListener;
  queue: ChangeEvent[];
  onDrop?: () => void;
}

export interface SubscribeOptions {
  /** Called once if the subscriber is dropped for falling behind */
  onDrop?: () => void;
}

export const DEFAULT_NOTIFIER_BUFFER_SIZE = 256;

/**
 * Fans committed mutations out to observers without blocking the caller.
 * Each subscriber has its own bounded queue drained on a later tick.
 */
export class ChangeNotifier {
  private readonly logger: Logger;
  private readonly bufferSize: number;
  private readonly now: Clock;
  private readonly subscribers = new Map<number, Subscriber>();
  private nextId = 1;
  private sequence = 0;
  private drainScheduled = false;

  constructor(logger: Logger, options: ChangeNotifierOptions = {}) {
    this.logger = logger;
    this.bufferSize = options.bufferSize ?? DEFAULT_NOTIFIER_BUFFER_SIZE;
    this.now = options.now ?? createMonotonicClock();
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  emit(init: ChangeEventInit): void {
    const event: ChangeEvent = { sequence: ++this.sequence, timestamp: this.now(), ...init };

    for (const subscriber of [...this.subscribers.values()]) {
      if (subscriber.queue.length >= this.bufferSize) {
        this.drop(subscriber);
        continue;
      }
      subscriber.queue.push(event);
    }

    this.scheduleDrain();
  }

  /**
   * Registers a listener; the returned function unsubscribes it
   */
  subscribe(listener: ChangeListener, options: SubscribeOptions = {}): () => void {
    const id = this.nextId++;
    this.subscribers.set(id, { id, listener, queue: [], onDrop: options.onDrop });
    this.logger.debug('Observer subscribed', { id });
    return () => {
      if (this.subscribers.delete(id)) {
        this.logger.debug('Observer unsubscribed', { id });
      }
    };
  }

  /**
   * Pull-style view of the event stream. Ends when the consumer returns or
   * when it falls behind far enough to be dropped.
   */
  stream(): AsyncIterableIterator<ChangeEvent> {
    const pending: ChangeEvent[] = [];
    let wake: ((result: IteratorResult<ChangeEvent>) => void) | null = null;
    let done = false;

    const finish = (): void => {
      done = true;
      unsubscribe();
      if (wake) {
        const resolve = wake;
        wake = null;
        resolve({ value: undefined, done: true });
      }
    };

    const unsubscribe = this.subscribe(event => {
      if (wake) {
        const resolve = wake;
        wake = null;
        resolve({ value: event, done: false });
      } else if (pending.length >= this.bufferSize) {
        this.logger.warn('Dropped event stream consumer that stopped pulling', { bufferSize: this.bufferSize });
        finish();
      } else {
        pending.push(event);
      }
    }, { onDrop: finish });

    const iterator: AsyncIterableIterator<ChangeEvent> = {
      next: () => {
        const event = pending.shift();
        if (event) {
          return Promise.resolve({ value: event, done: false });
        }
        if (done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<ChangeEvent>>(resolve => {
          wake = resolve;
        });
      },
      return: () => {
        finish();
        return Promise.resolve({ value: undefined, done: true });
      },
      [Symbol.asyncIterator]: () => iterator,
    };
    return iterator;
  }

  private drop(subscriber: Subscriber): void {
    this.subscribers.delete(subscriber.id);
    subscriber.queue.length = 0;
    this.logger.warn('Dropped observer that fell behind', { id: subscriber.id, bufferSize: this.bufferSize });
    subscriber.onDrop?.();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    for (const subscriber of [...this.subscribers.values()]) {
      const events = subscriber.queue.splice(0);
      for (const event of events) {
        this.deliver(subscriber, event);
      }
    }
  }

  private deliver(subscriber: Subscriber, event: ChangeEvent): void {
    try {
      const result = subscriber.listener(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          this.logger.error('Observer rejected change event', { id: subscriber.id, sequence: event.sequence, error });
        });
      }
    } catch (error) {
      this.logger.error('Observer failed on change event', { id: subscriber.id, sequence: event.sequence, error });
    }
  }
}
