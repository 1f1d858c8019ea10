import { logger } from '../utils/logger';

export type ChangeListener<T> = (event: T) => void | Promise<void>;

interface Subscription<T> {
  listener: ChangeListener<T>;
  pending: boolean;
}

/**
 * Publish/subscribe fan-out for roster change signals.
 *
 * Delivery is deferred to a later tick and holds at most one pending event per
 * subscriber: while an event is queued for a subscriber, further events for it
 * are dropped. Publishing therefore never waits on a subscriber.
 */
export class ChangeFeed<T> {
  private readonly subscriptions = new Set<Subscription<T>>();
  private dropped = 0;

  subscribe(listener: ChangeListener<T>): () => void {
    const subscription: Subscription<T> = { listener, pending: false };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  publish(event: T): void {
    for (const subscription of this.subscriptions) {
      if (subscription.pending) {
        this.dropped++;
        continue;
      }

      subscription.pending = true;
      setImmediate(() => {
        subscription.pending = false;
        if (!this.subscriptions.has(subscription)) {
          return;
        }
        void this.deliver(subscription, event);
      });
    }
  }

  private async deliver(subscription: Subscription<T>, event: T): Promise<void> {
    try {
      await subscription.listener(event);
    } catch (error) {
      logger.warn('Change subscriber failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  getStats(): { subscribers: number; dropped: number } {
    return { subscribers: this.subscriptions.size, dropped: this.dropped };
  }

  clear(): void {
    this.subscriptions.clear();
  }
}

export default ChangeFeed;
