/**
 * Typed event hub
 *
 * Handlers are called synchronously in registration order. A throwing
 * handler is logged and does not prevent the others from running.
 */

import { silentLogger, type Logger } from './logger.js';

export type EventHandler<T> = (data: T) => void;

export class EventHub<M extends object> {
  private readonly handlers: { [K in keyof M]?: Set<EventHandler<M[K]>> } = {};

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Add an event handler, returning a function that removes it
   */
  on<E extends keyof M>(event: E, handler: EventHandler<M[E]>): () => void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<M[E]>>();
      this.handlers[event] = set;
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  /**
   * Remove an event handler
   */
  off<E extends keyof M>(event: E, handler: EventHandler<M[E]>): void {
    this.handlers[event]?.delete(handler);
  }

  /**
   * Emit an event to all handlers
   */
  emit<E extends keyof M>(event: E, data: M[E]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(data);
      } catch (error) {
        this.logger.error(`Error in event handler for ${String(event)}:`, error);
      }
    }
  }

  listenerCount(event: keyof M): number {
    return this.handlers[event]?.size ?? 0;
  }
}
