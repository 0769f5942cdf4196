import { Injectable, Logger } from '@nestjs/common';
import type { FtxFill, FtxOrder } from '../schemas/ftx.schema';
import type { PrivateEvent } from '../types/stream.types';

export const ALL_MARKETS = '*';

export type FillListener = (fill: FtxFill) => void;
export type OrderListener = (order: FtxOrder) => void;

// How many fill ids are remembered to drop redeliveries
const SEEN_FILLS_LIMIT = 1000;

// Fans private fills and order updates out to listeners registered for one
// market or for every market (ALL_MARKETS). Delivery is synchronous, in arrival order.
@Injectable()
export class PrivateStreamRouter {
  private readonly logger = new Logger(PrivateStreamRouter.name);
  private readonly fillListeners = new Map<string, Set<FillListener>>();
  private readonly orderListeners = new Map<string, Set<OrderListener>>();
  private readonly seenFillIds = new Set<string>();

  /**
   * Returns a function that removes the listener
   */
  onFill(market: string, listener: FillListener): () => void {
    return register(this.fillListeners, market, listener);
  }

  onOrder(market: string, listener: OrderListener): () => void {
    return register(this.orderListeners, market, listener);
  }

  /**
   * Deliver an event to its market's listeners, then to the global ones.
   * Returns the number of listeners reached.
   */
  dispatch(event: PrivateEvent): number {
    switch (event.kind) {
      case 'fill': {
        if (this.isDuplicateFill(event.fill.id)) {
          this.logger.debug(`Dropping redelivered fill ${event.fill.id}`);
          return 0;
        }
        return this.deliver(this.fillListeners, event.fill.market, event.fill);
      }
      case 'order':
        return this.deliver(
          this.orderListeners,
          event.order.market,
          event.order,
        );
    }
  }

  listenerCount(): number {
    let count = 0;
    for (const listeners of [
      ...this.fillListeners.values(),
      ...this.orderListeners.values(),
    ]) {
      count += listeners.size;
    }
    return count;
  }

  private deliver<T>(
    registry: Map<string, Set<(payload: T) => void>>,
    market: string,
    payload: T,
  ): number {
    // Copy first so listeners can unregister themselves while being called
    const targets = [
      ...(registry.get(market) ?? []),
      ...(registry.get(ALL_MARKETS) ?? []),
    ];

    for (const listener of targets) {
      try {
        listener(payload);
      } catch (error) {
        this.logger.error(
          `Private stream listener for ${market} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }

    return targets.length;
  }

  private isDuplicateFill(id: string): boolean {
    if (this.seenFillIds.has(id)) {
      return true;
    }

    this.seenFillIds.add(id);
    if (this.seenFillIds.size > SEEN_FILLS_LIMIT) {
      // Sets iterate in insertion order, so the first value is the oldest
      const oldest = this.seenFillIds.values().next();
      if (!oldest.done) {
        this.seenFillIds.delete(oldest.value);
      }
    }
    return false;
  }
}

function register<T>(
  registry: Map<string, Set<T>>,
  market: string,
  listener: T,
): () => void {
  const listeners = registry.get(market) ?? new Set<T>();
  registry.set(market, listeners);
  listeners.add(listener);

  return () => {
    listeners.delete(listener);
    if (listeners.size === 0 && registry.get(market) === listeners) {
      registry.delete(market);
    }
  };
}
