/**
 * Notification log: in-memory append-only store.
 *
 * Deposits, withdrawals, payouts, votes and rate changes are appended
 * after their state transition commits. Subscribers are called
 * synchronously; a throwing subscriber does not undo the append.
 */

import type { EventEnvelope } from "./schemas.js";

export type EventListener = (event: EventEnvelope) => void;

export interface EventLogOptions {
  /** Called when a subscriber throws. Default: console.error. */
  onListenerError?: (error: unknown, event: EventEnvelope) => void;
}

export class EventLog {
  private readonly events: EventEnvelope[] = [];
  private readonly listeners = new Set<EventListener>();
  private readonly onListenerError: (error: unknown, event: EventEnvelope) => void;

  constructor(options: EventLogOptions = {}) {
    this.onListenerError =
      options.onListenerError ??
      ((err, event) => console.error(`[event-log] listener failed on ${event.type}:`, err));
  }

  append(event: Omit<EventEnvelope, "seq">): EventEnvelope {
    const record: EventEnvelope = { ...event, seq: this.events.length + 1 };
    this.events.push(record);
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (err) {
        this.onListenerError(err, record);
      }
    }
    return record;
  }

  getEvents(fromSeq: number = 0): EventEnvelope[] {
    return this.events.filter((e) => e.seq >= fromSeq);
  }

  getEventsByType(type: string): EventEnvelope[] {
    return this.events.filter((e) => e.type === type);
  }

  count(): number {
    return this.events.length;
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
