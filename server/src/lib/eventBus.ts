import type { HubEvent, HubEventType } from '../types.js';
import { logger } from './logger.js';

export type EventListener = (event: HubEvent) => void;
export type EventFilter = Record<string, unknown>;

interface Subscription {
  listener: EventListener;
  filter: EventFilter;
}

function matchesFilter(event: HubEvent, filter: EventFilter): boolean {
  const fields = new Map<string, unknown>(Object.entries(event));
  return Object.entries(filter).every(([key, expected]) => fields.get(key) === expected);
}

/**
 * In-process fan-out. Every subscriber of an event type receives every event of
 * that type whose fields match its filter; there is no per-recipient routing.
 */
export class EventBus {
  private subscriptions = new Map<HubEventType, Set<Subscription>>();

  subscribe(
    eventType: HubEventType,
    listener: EventListener,
    filter: EventFilter = {},
  ): () => void {
    let set = this.subscriptions.get(eventType);
    if (!set) {
      set = new Set();
      this.subscriptions.set(eventType, set);
    }
    const subscription: Subscription = { listener, filter };
    set.add(subscription);

    return () => {
      const current = this.subscriptions.get(eventType);
      if (!current) return;
      current.delete(subscription);
      if (current.size === 0) {
        this.subscriptions.delete(eventType);
      }
    };
  }

  publish(event: HubEvent): void {
    const subscribers = this.subscriptions.get(event.event_type);
    if (!subscribers) return;

    for (const { listener, filter } of Array.from(subscribers)) {
      if (!matchesFilter(event, filter)) continue;
      try {
        listener(event);
      } catch (err) {
        logger.error({ err, eventType: event.event_type }, 'event_listener_failed');
      }
    }
  }

  listenerCount(eventType: HubEventType): number {
    return this.subscriptions.get(eventType)?.size ?? 0;
  }
}
