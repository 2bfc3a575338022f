/**
 * Mnemo Event Bus — Observer Channel
 *
 * In-process pub/sub. No Redis, no NATS. Local-first.
 * Use cases publish what happened; observers (tray surface, inspector SSE
 * stream, tests) subscribe to what they need. Nothing the core does depends
 * on a subscriber's return value.
 *
 * Capture publishes: memory.node_captured, memory.capture_failed
 * Recall publishes: memory.node_recalled, memory.recall_failed
 * Purge/Sweeper publish: memory.purged, memory.expired
 * Runtime publishes: circle.switched, circle.registered
 */

import type { EventChannel, EventPayloads, BusEvent, EventHandler, EventSource } from '../types/index.js';
import { createLogger } from '../log/index.js';

type NamespaceOf<C> = C extends `${infer N}.${string}` ? N : never;
type EventNamespace = NamespaceOf<EventChannel>;

export type WildcardChannel = EventChannel | '*' | `${EventNamespace}.*`;

type PayloadFor<C extends WildcardChannel> = C extends EventChannel ? EventPayloads[C] : unknown;

interface Subscription {
  id: string;
  channel: WildcardChannel;
  once: boolean;
  deliver(event: BusEvent): void | Promise<void>;
}

const log = createLogger('EventBus');

export class EventBus {
  private subscriptions: Map<string, Subscription> = new Map();
  private channelIndex: Map<WildcardChannel, Set<string>> = new Map();
  private history: BusEvent[] = [];
  private maxHistory: number;
  private subCounter = 0;

  constructor(opts?: { maxHistory?: number }) {
    this.maxHistory = opts?.maxHistory ?? 1000;
  }

  /**
   * Subscribe to a channel. Returns unsubscribe function.
   */
  on<C extends WildcardChannel>(channel: C, handler: EventHandler<PayloadFor<C>>): () => void {
    return this.subscribe(channel, handler, false);
  }

  /**
   * Subscribe to a channel for exactly one event.
   */
  once<C extends WildcardChannel>(channel: C, handler: EventHandler<PayloadFor<C>>): () => void {
    return this.subscribe(channel, handler, true);
  }

  /**
   * Publish an event. All matching subscribers are notified in subscription order.
   * Supports wildcard ('*') and prefix ('memory.*') subscribers.
   * A failing handler is logged and never reaches the publisher.
   */
  async emit<T>(event: BusEvent<T>): Promise<void> {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    const matchingIds = new Set<string>();

    const channelSubs = this.channelIndex.get(event.channel);
    if (channelSubs) {
      for (const id of channelSubs) matchingIds.add(id);
    }

    const wildcardSubs = this.channelIndex.get('*');
    if (wildcardSubs) {
      for (const id of wildcardSubs) matchingIds.add(id);
    }

    for (const [channel, subIds] of this.channelIndex) {
      if (channel !== '*' && channel.endsWith('.*')) {
        const prefix = channel.slice(0, -1);
        if (event.channel.startsWith(prefix)) {
          for (const id of subIds) matchingIds.add(id);
        }
      }
    }

    const ordered = Array.from(matchingIds).sort((a, b) => this.seq(a) - this.seq(b));
    const toRemove: string[] = [];
    for (const id of ordered) {
      const sub = this.subscriptions.get(id);
      if (!sub) continue;

      try {
        await sub.deliver(event);
      } catch (err) {
        log.error(`Handler error on ${event.channel}:`, err);
      }

      if (sub.once) {
        toRemove.push(id);
      }
    }

    for (const id of toRemove) {
      this.unsubscribe(id);
    }
  }

  /**
   * Get recent event history, optionally filtered by channel.
   */
  getHistory(channel?: EventChannel, limit = 100): BusEvent[] {
    const events = channel
      ? this.history.filter(e => e.channel === channel)
      : this.history;
    return events.slice(-limit);
  }

  /**
   * Get count of active subscriptions per channel.
   */
  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [channel, ids] of this.channelIndex) {
      stats[channel] = ids.size;
    }
    return stats;
  }

  /**
   * Remove all subscriptions and history.
   */
  clear(): void {
    this.subscriptions.clear();
    this.channelIndex.clear();
    this.history = [];
  }

  private subscribe<T>(channel: WildcardChannel, handler: EventHandler<T>, once: boolean): () => void {
    const id = `sub_${++this.subCounter}`;
    const sub: Subscription = { id, channel, once, deliver: handler };

    this.subscriptions.set(id, sub);

    let ids = this.channelIndex.get(channel);
    if (!ids) {
      ids = new Set();
      this.channelIndex.set(channel, ids);
    }
    ids.add(id);

    return () => this.unsubscribe(id);
  }

  private seq(id: string): number {
    return Number(id.slice(4));
  }

  private unsubscribe(id: string): void {
    const sub = this.subscriptions.get(id);
    if (!sub) return;

    this.subscriptions.delete(id);
    const channelSubs = this.channelIndex.get(sub.channel);
    if (channelSubs) {
      channelSubs.delete(id);
      if (channelSubs.size === 0) {
        this.channelIndex.delete(sub.channel);
      }
    }
  }
}

/**
 * Helper to create a typed event with defaults.
 */
export function createEvent<C extends EventChannel>(
  channel: C,
  source: EventSource,
  payload: EventPayloads[C],
  opts?: { circleId?: string }
): BusEvent<EventPayloads[C]> {
  return {
    channel,
    timestamp: new Date().toISOString(),
    source,
    circleId: opts?.circleId ?? null,
    payload,
  };
}
