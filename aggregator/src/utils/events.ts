/**
 * EventBus: fan-out of aggregator notifications to external consumers.
 *
 * Listeners run after the operation has committed. A listener that throws is
 * logged and skipped; it cannot roll back or fail the operation.
 */

import type { Logger } from "./logger.js";
import type { AggregatorEvent, AggregatorEventListener } from "../types/events.js";

export class EventBus {
  private listeners: Set<AggregatorEventListener> = new Set();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  on(listener: AggregatorEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: AggregatorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, event: event.type }, "Event listener failed");
      }
    }
  }

  destroy(): void {
    this.listeners.clear();
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
