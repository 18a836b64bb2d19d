/**
 * @module event-bus
 * In-process event bus for structured engine events.
 *
 * Components publish on fixed channels (`knowledge`, `resolution`,
 * `semantic`, `web`, `monitor`, `healer`); front ends subscribe to render
 * progress or logs.
 */

import type { EventSink, BusMessage } from './types.js';

/**
 * In-process event bus implementing {@link EventSink}.
 *
 * Usage:
 * ```ts
 * const bus = createEventBus();
 * const unsub = bus.subscribe('resolution', (msg) => console.log(msg));
 * bus.emit('resolution', { event: 'solved', data: { source: 'local' } });
 * unsub();
 * ```
 */
export class EventBus implements EventSink {
  private listeners = new Map<string, Set<(msg: BusMessage) => void>>();

  emit(channel: string, message: BusMessage): void {
    const subs = this.listeners.get(channel);
    if (!subs) return;
    for (const handler of subs) {
      handler(message);
    }
  }

  /**
   * Subscribe to a channel.
   *
   * @returns An unsubscribe function
   */
  subscribe(channel: string, handler: (msg: BusMessage) => void): () => void {
    let subs = this.listeners.get(channel);
    if (!subs) {
      subs = new Set();
      this.listeners.set(channel, subs);
    }
    subs.add(handler);

    return () => {
      subs.delete(handler);
      if (subs.size === 0) {
        this.listeners.delete(channel);
      }
    };
  }
}

export function createEventBus(): EventBus {
  return new EventBus();
}
