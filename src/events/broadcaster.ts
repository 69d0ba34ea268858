// ---------------------------------------------------------------------------
// Event Broadcaster: best-effort fan-out to connected observers
// ---------------------------------------------------------------------------
//
// One long-lived instance per process, handed to the coordinators. Publishing
// never blocks and never throws: an observer whose delivery throws, rejects
// or outlives the delivery timeout is dropped (unsubscribed and closed) and
// the rest carry on.
// ---------------------------------------------------------------------------

import { v7 as uuidv7 } from 'uuid';
import type { StorefrontEvent } from '../domain/events.js';
import { getConfiguration } from '../config.js';
import { createServiceLogger } from '../logging/logger.js';

const log = createServiceLogger('broadcaster');

export interface Observer {
  send(event: StorefrontEvent): void | Promise<void>;
  /** Called once when the broadcaster drops the observer */
  close?(): void;
}

export interface ObserverHandle {
  readonly id: string;
}

export interface BroadcasterOptions {
  /** Delivery bound per event (default: the configured deliveryTimeoutMs) */
  deliveryTimeoutMs?: number;
}

export class EventBroadcaster {
  private readonly observers = new Map<string, Observer>();

  constructor(private readonly options: BroadcasterOptions = {}) {}

  get size(): number {
    return this.observers.size;
  }

  get deliveryTimeoutMs(): number {
    return this.options.deliveryTimeoutMs ?? getConfiguration().deliveryTimeoutMs;
  }

  subscribe(observer: Observer): ObserverHandle {
    const id = uuidv7();
    this.observers.set(id, observer);
    log.debug('Observer subscribed', { observerId: id, observers: this.observers.size });
    return { id };
  }

  unsubscribe(handle: ObserverHandle): boolean {
    const removed = this.observers.delete(handle.id);
    if (removed) {
      log.debug('Observer unsubscribed', { observerId: handle.id, observers: this.observers.size });
    }
    return removed;
  }

  /**
   * Deliver to every observer subscribed at the moment of the call.
   */
  publish(event: StorefrontEvent): void {
    for (const [id, observer] of [...this.observers]) {
      this.deliver(id, observer, event);
    }
  }

  /** Publish each event in order */
  publishAll(events: readonly StorefrontEvent[]): void {
    for (const event of events) {
      this.publish(event);
    }
  }

  private deliver(id: string, observer: Observer, event: StorefrontEvent): void {
    let outcome: void | Promise<void>;
    try {
      outcome = observer.send(event);
    } catch (err) {
      this.drop(id, observer, err);
      return;
    }
    if (!(outcome instanceof Promise)) return;

    const limitMs = this.deliveryTimeoutMs;
    const timer = setTimeout(() => {
      this.drop(id, observer, new Error(`Delivery exceeded ${limitMs}ms`));
    }, limitMs);

    void outcome.then(
      () => clearTimeout(timer),
      (err: unknown) => {
        clearTimeout(timer);
        this.drop(id, observer, err);
      },
    );
  }

  private drop(id: string, observer: Observer, reason: unknown): void {
    if (this.observers.get(id) !== observer) return;
    this.observers.delete(id);

    log.debug('Observer dropped', {
      observerId: id,
      reason: reason instanceof Error ? reason.message : String(reason),
    });

    try {
      observer.close?.();
    } catch (err) {
      log.debug('Observer close failed', { observerId: id, error: err });
    }
  }
}
