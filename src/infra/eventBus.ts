/**
 * Simple in-memory pub/sub event bus.
 * Services publish committed ledger events here; the WebSocket handler broadcasts them.
 */

import { LedgerEventType } from '../domain/events.js';

export type EventType = LedgerEventType;

export type EventCallback = (event: EventType, data: unknown) => void;

export class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private listenerFailures = 0;

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    const set = this.listeners.get(event) ?? new Set<EventCallback>();
    set.add(callback);
    this.listeners.set(event, set);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers. A throwing listener never
   * blocks the others; failures are only counted.
   */
  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];
    for (const cb of targets) {
      try {
        cb(event, data);
      } catch {
        this.listenerFailures += 1;
      }
    }
  }

  get failures(): number {
    return this.listenerFailures;
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.listenerFailures = 0;
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
