import { Injectable, Logger } from '@nestjs/common';
import {
  PRIVATE_CHANNELS,
  type Channel,
  type PrivateChannel,
  type Subscription,
} from '../types/stream.types';

export type SubscriptionState = 'subscribed' | 'unsubscribing';

export interface SubscriptionEntry extends Subscription {
  state: SubscriptionState;
}

interface TrackedEntry extends SubscriptionEntry {
  // Confirmed by the exchange on the current connection
  acknowledged: boolean;
  // Request sent on the current connection, waiting for its confirmation
  inFlight: 'subscribe' | 'unsubscribe' | null;
  // Confirmed but must be dropped and re-requested (fresh snapshot)
  stale: boolean;
}

export interface PendingActions {
  subscribe: Subscription[];
  unsubscribe: Subscription[];
}

export function subscriptionKey(channel: Channel, market?: string): string {
  return isPrivateChannel(channel) ? channel : `${channel}:${market ?? ''}`;
}

export function isPrivateChannel(channel: Channel): channel is PrivateChannel {
  return PRIVATE_CHANNELS.some((privateChannel) => privateChannel === channel);
}

// Desired-state ledger of channel subscriptions.
// It never talks to the network: the stream service asks it what is left to send
// and tells it what the exchange confirmed.
@Injectable()
export class SubscriptionRegistry {
  private readonly logger = new Logger(SubscriptionRegistry.name);
  private readonly entries = new Map<string, TrackedEntry>();

  /**
   * Add a subscription to the desired set. Returns false when it was already desired.
   */
  subscribe(channel: Channel, market?: string): boolean {
    const key = subscriptionKey(channel, market);
    const existing = this.entries.get(key);

    if (existing?.state === 'subscribed') {
      return false;
    }

    if (existing) {
      // Re-subscribed before the exchange confirmed the unsubscribe
      existing.state = 'subscribed';
    } else {
      this.entries.set(key, {
        channel,
        market: isPrivateChannel(channel) ? undefined : market,
        state: 'subscribed',
        acknowledged: false,
        inFlight: null,
        stale: false,
      });
    }

    this.logger.debug(`Desired: ${key}`);
    return true;
  }

  /**
   * Remove a subscription from the desired set. Returns false when it was not desired.
   */
  unsubscribe(channel: Channel, market?: string): boolean {
    const key = subscriptionKey(channel, market);
    const entry = this.entries.get(key);

    if (!entry || entry.state === 'unsubscribing') {
      return false;
    }

    if (entry.acknowledged || entry.inFlight) {
      // The exchange knows about it, keep it until the unsubscribe is confirmed
      entry.state = 'unsubscribing';
      entry.stale = false;
    } else {
      this.entries.delete(key);
    }

    this.logger.debug(`No longer desired: ${key}`);
    return true;
  }

  isDesired(channel: Channel, market?: string): boolean {
    return (
      this.entries.get(subscriptionKey(channel, market))?.state === 'subscribed'
    );
  }

  isAcknowledged(channel: Channel, market?: string): boolean {
    const entry = this.entries.get(subscriptionKey(channel, market));
    return entry?.acknowledged ?? false;
  }

  /**
   * Every subscription that should exist, sorted by key.
   */
  desiredState(): Subscription[] {
    return [...this.entries.entries()]
      .filter(([, entry]) => entry.state === 'subscribed')
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([, entry]) => toSubscription(entry));
  }

  entriesSnapshot(): SubscriptionEntry[] {
    return [...this.entries.values()].map((entry) => ({
      ...toSubscription(entry),
      state: entry.state,
    }));
  }

  /**
   * Diff the desired set against what the current connection has confirmed
   * or has in flight.
   */
  pendingActions(): PendingActions {
    const actions: PendingActions = { subscribe: [], unsubscribe: [] };

    for (const entry of this.entries.values()) {
      if (entry.inFlight) {
        continue;
      }

      if (entry.state === 'subscribed') {
        if (!entry.acknowledged) {
          actions.subscribe.push(toSubscription(entry));
        } else if (entry.stale) {
          actions.unsubscribe.push(toSubscription(entry));
        }
      } else if (entry.acknowledged) {
        actions.unsubscribe.push(toSubscription(entry));
      }
    }

    return actions;
  }

  markRequested(
    op: 'subscribe' | 'unsubscribe',
    channel: Channel,
    market?: string,
  ): void {
    const entry = this.entries.get(subscriptionKey(channel, market));
    if (entry) {
      entry.inFlight = op;
    }
  }

  /**
   * Record a confirmation from the exchange.
   */
  acknowledge(
    kind: 'subscribed' | 'unsubscribed',
    channel: Channel,
    market?: string,
  ): void {
    const key = subscriptionKey(channel, market);
    const entry = this.entries.get(key);

    if (!entry) {
      this.logger.debug(`Confirmation for untracked subscription ${key}`);
      return;
    }

    entry.inFlight = null;

    if (kind === 'subscribed') {
      entry.acknowledged = true;
      entry.stale = false;
      return;
    }

    entry.acknowledged = false;
    entry.stale = false;
    if (entry.state === 'unsubscribing') {
      this.entries.delete(key);
    }
  }

  /**
   * Force an unsubscribe/subscribe round trip for a confirmed subscription.
   * Returns false when the subscription is not desired.
   */
  markStale(channel: Channel, market?: string): boolean {
    const entry = this.entries.get(subscriptionKey(channel, market));
    if (!entry || entry.state !== 'subscribed') {
      return false;
    }
    // Not confirmed yet: the pending subscribe brings a fresh snapshot anyway
    if (entry.acknowledged) {
      entry.stale = true;
    }
    return true;
  }

  /**
   * A new socket knows nothing: drop every confirmation and in-flight request,
   * and forget subscriptions that were only waiting to be removed.
   */
  resetConnection(): void {
    for (const [key, entry] of this.entries) {
      if (entry.state === 'unsubscribing') {
        this.entries.delete(key);
        continue;
      }
      entry.acknowledged = false;
      entry.inFlight = null;
      entry.stale = false;
    }
  }
}

function toSubscription(entry: Subscription): Subscription {
  return entry.market === undefined
    ? { channel: entry.channel }
    : { channel: entry.channel, market: entry.market };
}
