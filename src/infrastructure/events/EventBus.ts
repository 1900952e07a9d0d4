import { EventType } from '../../core/entities/Event.js';
import type { EventHandler, EventMap, PollingEvent } from '../../core/entities/Event.js';

type ListenerRegistry = { [K in EventType]: Array<EventHandler<K>> };

function createRegistry(): ListenerRegistry {
  return {
    [EventType.JobCreated]: [],
    [EventType.StatusChanged]: [],
    [EventType.RetryAttempted]: [],
    [EventType.ErrorOccurred]: [],
    [EventType.JobCompleted]: [],
    [EventType.JobFailed]: [],
    [EventType.Timeout]: [],
    [EventType.CircuitBreakerOpened]: [],
    [EventType.CircuitBreakerClosed]: [],
    [EventType.BatchOperation]: [],
  };
}

/**
 * In-process publish/subscribe for polling lifecycle events
 *
 * Every emitted event is appended to the history before subscribers run.
 * Subscribers are called synchronously in registration order; one that
 * throws is logged and skipped, the rest still receive the event.
 */
export class EventBus {
  private listeners: ListenerRegistry = createRegistry();
  private history: PollingEvent[] = [];

  subscribe<K extends EventType>(type: K, handler: EventHandler<K>): void {
    this.listeners[type].push(handler);
  }

  /**
   * Remove one registration of `handler`; unknown handlers are ignored
   */
  unsubscribe<K extends EventType>(type: K, handler: EventHandler<K>): void {
    const handlers = this.listeners[type];
    const index = handlers.indexOf(handler);
    if (index !== -1) {
      handlers.splice(index, 1);
    }
  }

  emit<K extends EventType>(event: EventMap[K] & { type: K }): void {
    const type: K = event.type;
    this.history.push(event);

    // Snapshot so handlers that (un)subscribe don't disturb this dispatch
    for (const handler of [...this.listeners[type]]) {
      try {
        handler(event);
      } catch (error) {
        console.error(`[EventBus] Error in ${type} handler:`, error);
      }
    }
  }

  getHistory(): readonly PollingEvent[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  listenerCount(type: EventType): number {
    return this.listeners[type].length;
  }
}
