/**
 * PlanEventBus - per-plan status broadcast
 *
 * Fire-and-forget from the publisher's side:
 * - publish() never blocks and never throws
 * - each subscriber has its own bounded buffer (drop-oldest)
 * - listener failures are logged and isolated
 * - no replay: a subscriber only sees events published after it joined
 */

import type {
  StatusEvent,
  StatusEventHandler,
  SubscribeOptions,
  Unsubscribe,
} from './types.js';
import { ObserverDeliveryError, getErrorMessage } from '../types/errors.js';
import { getLog } from '../services/get-log.js';

export const DEFAULT_SUBSCRIBER_BUFFER_SIZE = 256;

type Waiter = (result: IteratorResult<StatusEvent, undefined>) => void;

// ============================================================================
// Subscription
// ============================================================================

/**
 * One observer's view of one plan. Consume with `for await`; leaving the
 * loop early closes the subscription.
 */
export class PlanSubscription implements AsyncIterable<StatusEvent> {
  private buffer: StatusEvent[] = [];
  private waiter: Waiter | null = null;
  private ended = false;
  private closed = false;
  private droppedCount = 0;

  constructor(
    readonly planId: string,
    private readonly bufferSize: number,
    private readonly onClose: (subscription: PlanSubscription) => void,
  ) {}

  /** Events discarded because the buffer was full */
  get dropped(): number {
    return this.droppedCount;
  }

  get isOpen(): boolean {
    return !this.closed && !this.ended;
  }

  /** @internal called by the bus */
  push(event: StatusEvent): void {
    if (!this.isOpen) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: event, done: false });
      return;
    }

    this.buffer.push(event);
    if (this.buffer.length > this.bufferSize) {
      this.buffer.shift();
      this.droppedCount++;
    }
  }

  /** @internal no more events; buffered ones are still delivered */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.onClose(this);
    this.flushWaiter();
  }

  /**
   * Stop receiving events and discard anything buffered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer = [];
    this.onClose(this);
    this.flushWaiter();
  }

  next(): Promise<IteratorResult<StatusEvent, undefined>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (!this.isOpen) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<StatusEvent, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private flushWaiter(): void {
    const waiter = this.waiter;
    if (waiter && this.buffer.length === 0) {
      this.waiter = null;
      waiter({ value: undefined, done: true });
    }
  }
}

// ============================================================================
// Bus
// ============================================================================

export class PlanEventBus {
  private readonly subscriptions = new Map<string, Set<PlanSubscription>>();
  private readonly globalHandlers = new Set<(event: StatusEvent) => void>();
  private readonly log = getLog('EventBus');

  constructor(private readonly defaultBufferSize = DEFAULT_SUBSCRIBER_BUFFER_SIZE) {}

  /**
   * Deliver an event to every observer of its plan.
   */
  publish(event: StatusEvent): void {
    for (const handler of this.globalHandlers) {
      this.safeCall(handler, event);
    }

    const subs = this.subscriptions.get(event.planId);
    if (!subs) return;
    for (const subscription of [...subs]) {
      subscription.push(event);
    }
  }

  subscribe(planId: string, options: SubscribeOptions = {}): PlanSubscription {
    const subscription = new PlanSubscription(
      planId,
      Math.max(1, options.bufferSize ?? this.defaultBufferSize),
      (sub) => this.remove(sub),
    );

    let subs = this.subscriptions.get(planId);
    if (!subs) {
      subs = new Set();
      this.subscriptions.set(planId, subs);
    }
    subs.add(subscription);
    return subscription;
  }

  /**
   * Callback-style subscription. Events go through the same bounded buffer
   * as subscribe(); the handler is awaited before the next one is delivered.
   */
  listen(planId: string, handler: StatusEventHandler, options: SubscribeOptions = {}): Unsubscribe {
    const subscription = this.subscribe(planId, options);
    this.drain(subscription, handler).catch((error: unknown) => {
      this.log.error('Listener drain loop stopped', { planId, error: getErrorMessage(error) });
    });
    return () => subscription.close();
  }

  /**
   * Process-wide observer for every plan (logging, metrics). Called
   * synchronously from publish(); errors are isolated.
   */
  onAny(handler: (event: StatusEvent) => void): Unsubscribe {
    this.globalHandlers.add(handler);
    return () => {
      this.globalHandlers.delete(handler);
    };
  }

  /**
   * End every subscription of a finished plan once its buffer drains.
   */
  complete(planId: string): void {
    const subs = this.subscriptions.get(planId);
    if (!subs) return;
    for (const subscription of [...subs]) {
      subscription.end();
    }
    this.subscriptions.delete(planId);
  }

  subscriberCount(planId: string): number {
    return this.subscriptions.get(planId)?.size ?? 0;
  }

  clear(): void {
    for (const subs of this.subscriptions.values()) {
      for (const subscription of [...subs]) subscription.close();
    }
    this.subscriptions.clear();
    this.globalHandlers.clear();
  }

  // --- Internal ---

  private remove(subscription: PlanSubscription): void {
    const subs = this.subscriptions.get(subscription.planId);
    if (!subs) return;
    subs.delete(subscription);
    if (subs.size === 0) this.subscriptions.delete(subscription.planId);
  }

  private async drain(subscription: PlanSubscription, handler: StatusEventHandler): Promise<void> {
    for await (const event of subscription) {
      try {
        await handler(event);
      } catch (error) {
        this.reportDeliveryFailure(event, error);
      }
    }
  }

  private safeCall(handler: (event: StatusEvent) => void, event: StatusEvent): void {
    try {
      handler(event);
    } catch (error) {
      this.reportDeliveryFailure(event, error);
    }
  }

  private reportDeliveryFailure(event: StatusEvent, cause: unknown): void {
    const failure = new ObserverDeliveryError(event.planId, { cause });
    this.log.warn(failure.message, {
      code: failure.code,
      sequence: event.sequence,
      error: getErrorMessage(cause),
    });
  }
}
