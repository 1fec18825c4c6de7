/**
 * Subscription Registry
 *
 * Tracks live subscriptions per service and fans instance updates out to
 * them. Cancelled subscriptions are skipped on delivery and dropped by
 * sweep(). Nothing is delivered once the engine is shut down, even when a
 * handler earlier in the same fan-out triggered the shutdown. Only touched
 * from tasks on the engine's serial executor.
 */

import type { Logger } from 'pino';
import { serviceKey, type CompletionReason, type LookupResult, type NextHandler, type Service } from '../types/service.js';
import type { CancellationToken } from './cancellation-token.js';

export interface Subscription {
  service: Service;
  nextHandler: NextHandler;
  token: CancellationToken;
  /** Set once the initial lookup outcome has been handed to nextHandler */
  initialDelivered: boolean;
}

/**
 * Subscription registry statistics
 */
export interface SubscriptionRegistryStats {
  services: number;
  subscriptions: number;
  cancelled: number;
}

export class SubscriptionRegistry {
  private subscriptions: Map<string, Subscription[]> = new Map();

  constructor(
    private readonly logger: Logger,
    private readonly isShutdown: () => boolean = () => false
  ) {}

  add(subscription: Subscription): void {
    const key = serviceKey(subscription.service);
    const list = this.subscriptions.get(key) ?? [];
    list.push(subscription);
    this.subscriptions.set(key, list);

    this.logger.debug(
      { service: subscription.service.name, subscribers: list.length },
      'Subscription added'
    );
  }

  /**
   * Deliver a result to one subscription unless it or the engine has ended
   *
   * @returns true if the handler was called
   */
  deliver(subscription: Subscription, result: LookupResult): boolean {
    if (subscription.token.isCancelled || this.isShutdown()) {
      return false;
    }
    try {
      subscription.nextHandler(result);
    } catch (error) {
      this.logger.warn(
        { service: subscription.service.name, err: error },
        'Subscriber handler threw'
      );
    }
    return true;
  }

  /**
   * Deliver a result to every live subscription of a service
   *
   * @param filter - Optional predicate selecting which subscriptions to notify
   * @returns number of subscriptions notified
   */
  notify(
    service: Service,
    result: LookupResult,
    filter: (subscription: Subscription) => boolean = () => true
  ): number {
    const list = this.subscriptions.get(serviceKey(service));
    if (!list) {
      return 0;
    }

    let notified = 0;
    // Copy: a handler may subscribe again and grow the list
    for (const subscription of [...list]) {
      if (filter(subscription) && this.deliver(subscription, result)) {
        notified++;
      }
    }
    return notified;
  }

  /**
   * End every live subscription with the given reason
   *
   * The map itself is kept.
   *
   * @returns number of subscriptions completed
   */
  completeAll(reason: CompletionReason): number {
    let completed = 0;
    for (const list of this.subscriptions.values()) {
      for (const subscription of list) {
        try {
          if (subscription.token.complete(reason)) {
            completed++;
          }
        } catch (error) {
          this.logger.warn(
            { service: subscription.service.name, err: error },
            'Subscriber completion handler threw'
          );
        }
      }
    }
    return completed;
  }

  /**
   * Drop cancelled subscriptions and services left without any
   *
   * @returns number of subscriptions removed
   */
  sweep(): number {
    let removed = 0;
    for (const [key, list] of this.subscriptions) {
      const live = list.filter((subscription) => !subscription.token.isCancelled);
      removed += list.length - live.length;
      if (live.length === 0) {
        this.subscriptions.delete(key);
      } else {
        this.subscriptions.set(key, live);
      }
    }

    if (removed > 0) {
      this.logger.debug({ removed }, 'Swept cancelled subscriptions');
    }
    return removed;
  }

  isEmpty(): boolean {
    return this.subscriptions.size === 0;
  }

  getStats(): SubscriptionRegistryStats {
    let subscriptions = 0;
    let cancelled = 0;
    for (const list of this.subscriptions.values()) {
      subscriptions += list.length;
      cancelled += list.filter((subscription) => subscription.token.isCancelled).length;
    }
    return { services: this.subscriptions.size, subscriptions, cancelled };
  }
}
