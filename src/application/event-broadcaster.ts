import type { Logger } from 'pino';
import type { DomainEvent } from '../domain/index.js';
import type { EventPublisher } from './log-ingestion.js';

export const DEFAULT_SUBSCRIPTION_CAPACITY = 1024;

export interface SubscribeOptions {
  /** Only events for this schema are delivered. Unset → everything. */
  schemaId?: string | null;
  /** Buffered events kept before the oldest is discarded. */
  capacity?: number;
  /** Called before the next delivery when events were skipped. */
  onLagged?: (missed: number) => void;
}

let nextSubscriptionId = 1;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * One subscriber's bounded event queue.
 *
 * Loss policy is "skip missed, continue": when the queue is full the oldest
 * buffered event is dropped, the gap is counted, and delivery resumes with
 * the next retained event. Nothing is replayed.
 *
 * Single consumer: at most one pending `next()` at a time.
 */
export class Subscription implements AsyncIterable<DomainEvent> {
  readonly id: number;
  readonly schemaId: string | null;
  readonly capacity: number;

  private readonly queue: DomainEvent[] = [];
  private waiter: ((result: IteratorResult<DomainEvent, undefined>) => void) | null = null;
  private missed = 0;
  private totalMissed = 0;
  private closed = false;
  private readonly onLagged: ((missed: number) => void) | undefined;
  private readonly detach: (sub: Subscription) => void;

  constructor(options: SubscribeOptions, detach: (sub: Subscription) => void) {
    const capacity = options.capacity ?? DEFAULT_SUBSCRIPTION_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Subscription capacity must be a positive integer, got ${capacity}`);
    }

    this.id = nextSubscriptionId++;
    this.schemaId = options.schemaId ?? null;
    this.capacity = capacity;
    this.onLagged = options.onLagged;
    this.detach = detach;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Events currently buffered and not yet taken. */
  get pending(): number {
    return this.queue.length;
  }

  /** Events discarded by the loss policy over this subscription's life. */
  get missedTotal(): number {
    return this.totalMissed;
  }

  matches(event: DomainEvent): boolean {
    return this.schemaId === null || this.schemaId === event.schema_id;
  }

  /**
   * Hands an event to this subscriber without blocking.
   * Returns false only when the subscription is already closed.
   */
  offer(event: DomainEvent): boolean {
    if (this.closed) return false;

    if (this.waiter !== null) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: false, value: event });
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.missed++;
      this.totalMissed++;
    }
    this.queue.push(event);
    return true;
  }

  next(): Promise<IteratorResult<DomainEvent, undefined>> {
    if (this.waiter !== null) {
      return Promise.reject(new Error('Subscription already has a pending next()'));
    }

    const event = this.queue.shift();
    if (event !== undefined) {
      this.reportLag();
      return Promise.resolve({ done: false, value: event });
    }

    if (this.closed) return Promise.resolve(DONE);

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Idempotent. Ends iteration and unregisters from the broadcaster. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;

    if (this.waiter !== null) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(DONE);
    }

    this.detach(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<DomainEvent, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve(DONE);
      },
    };
  }

  private reportLag(): void {
    if (this.missed === 0) return;
    const missed = this.missed;
    this.missed = 0;
    this.onLagged?.(missed);
  }
}

/**
 * Process-wide fan-out of domain events to live subscribers.
 *
 * `publish` is synchronous: it only enqueues, so a slow or dead subscriber
 * costs the publisher nothing beyond its bounded queue. Holds no durable
 * state; subscriptions live until closed.
 */
export class EventBroadcaster implements EventPublisher {
  private readonly subscriptions = new Set<Subscription>();
  private readonly capacity: number;
  private readonly log: Logger;

  constructor(options: { capacity?: number; log: Logger }) {
    this.capacity = options.capacity ?? DEFAULT_SUBSCRIPTION_CAPACITY;
    this.log = options.log.child({ component: 'event-broadcaster' });
  }

  get size(): number {
    return this.subscriptions.size;
  }

  subscribe(options: SubscribeOptions = {}): Subscription {
    const subscription = new Subscription(
      { ...options, capacity: options.capacity ?? this.capacity },
      (sub) => {
        if (this.subscriptions.delete(sub)) {
          this.log.debug({ subscription_id: sub.id, subscribers: this.subscriptions.size }, 'Unsubscribed');
        }
      },
    );

    this.subscriptions.add(subscription);
    this.log.debug(
      { subscription_id: subscription.id, schema_id: subscription.schemaId, subscribers: this.subscriptions.size },
      'Subscribed',
    );
    return subscription;
  }

  /** Returns how many subscribers the event was handed to. */
  publish(event: DomainEvent): number {
    let delivered = 0;
    for (const subscription of this.subscriptions) {
      if (subscription.matches(event) && subscription.offer(event)) {
        delivered++;
      }
    }
    return delivered;
  }

  closeAll(): void {
    for (const subscription of [...this.subscriptions]) {
      subscription.close();
    }
  }
}
