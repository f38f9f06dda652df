/**
 * Event Bus - ordered notification channel to the GUI collaborator
 *
 * Events are delivered synchronously, in publish order, to every listener.
 * A listener that publishes while being notified does not jump the queue:
 * its event is appended and delivered after the current one reaches all
 * listeners, so every listener observes the same global order.
 */

import { logger } from '../utils/logger.js';
import type {
  BusLogLevel,
  EventListener,
  EventOf,
  OrchestratorEvent,
  OrchestratorEventType,
} from '../types/events.js';

const busLogger = logger.create('EventBus');

export class EventBus {
  private listeners: Set<EventListener> = new Set();
  private pending: OrchestratorEvent[] = [];
  private delivering = false;
  private seq = 0;

  /**
   * Subscribe to every event. Returns the unsubscribe function.
   */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Subscribe to a single event type
   */
  on<T extends OrchestratorEventType>(type: T, listener: EventListener<EventOf<T>>): () => void {
    return this.subscribe((event, seq) => {
      if (isEventOf(event, type)) {
        listener(event, seq);
      }
    });
  }

  publish(event: OrchestratorEvent): void {
    this.pending.push(event);
    if (this.delivering) {
      return;
    }

    this.delivering = true;
    try {
      let next = this.pending.shift();
      while (next) {
        this.deliver(next, ++this.seq);
        next = this.pending.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  /**
   * Publish a GUI-facing log line
   */
  log(level: BusLogLevel, message: string): void {
    this.publish({ type: 'log', level, message });
  }

  /**
   * Sequence number of the last delivered event
   */
  get sequence(): number {
    return this.seq;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  clear(): void {
    this.listeners.clear();
    this.pending = [];
  }

  private deliver(event: OrchestratorEvent, seq: number): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event, seq);
      } catch (error) {
        busLogger.error('Event listener error', { error, eventType: event.type, seq });
      }
    }
  }
}

function isEventOf<T extends OrchestratorEventType>(event: OrchestratorEvent, type: T): event is EventOf<T> {
  return event.type === type;
}
