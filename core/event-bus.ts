/**
 * EventBus - typed pub/sub between platform adapters and plugins
 *
 * Handlers of one event run side by side. A failing handler is logged and
 * reported as `plugin:error`; the others still complete.
 */

import { createLogger } from './logger';
import type { EventHandler, EventName, EventPayload } from './types/events';
import type { Logger } from './types/plugin';

type Subscriptions = { [E in EventName]?: Map<EventHandler<E>, { once: boolean }> };

export interface EventBusOptions {
  /** Receives handler failures, and dispatch traces at debug level */
  logger?: Logger;
}

export class EventBus {
  private readonly subscriptions: Subscriptions = {};
  private readonly logger: Logger;

  constructor(options: EventBusOptions = {}) {
    this.logger = options.logger ?? createLogger();
  }

  on<E extends EventName>(event: E, handler: EventHandler<E>): void {
    this.subscribe(event, handler, false);
  }

  /** Subscribe for the next emit only */
  once<E extends EventName>(event: E, handler: EventHandler<E>): void {
    this.subscribe(event, handler, true);
  }

  off<E extends EventName>(event: E, handler: EventHandler<E>): void {
    this.handlersFor(event)?.delete(handler);
  }

  /**
   * Run every handler for the event and wait for all of them
   */
  async emit<E extends EventName>(event: E, payload: EventPayload<E>): Promise<void> {
    const handlers = this.handlersFor(event);
    if (!handlers || handlers.size === 0) return;

    this.logger.debug(`Dispatching ${event}`, { handlers: handlers.size });

    const running: Promise<void>[] = [];
    for (const [handler, { once }] of [...handlers]) {
      if (once) handlers.delete(handler);
      running.push(this.invoke(event, handler, payload));
    }
    await Promise.all(running);
  }

  /**
   * Emit without waiting. Handlers start synchronously.
   */
  fire<E extends EventName>(event: E, payload: EventPayload<E>): void {
    this.emit(event, payload).catch((error: unknown) => {
      this.logger.error(`Dispatching ${event} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  private handlersFor<E extends EventName>(event: E): Map<EventHandler<E>, { once: boolean }> | undefined {
    return this.subscriptions[event];
  }

  private subscribe<E extends EventName>(event: E, handler: EventHandler<E>, once: boolean): void {
    let handlers = this.handlersFor(event);
    if (!handlers) {
      handlers = new Map();
      const subscriptions: { [K in E]?: Map<EventHandler<K>, { once: boolean }> } = this.subscriptions;
      subscriptions[event] = handlers;
    }
    handlers.set(handler, { once });
  }

  private async invoke<E extends EventName>(
    event: E,
    handler: EventHandler<E>,
    payload: EventPayload<E>,
  ): Promise<void> {
    try {
      await handler(payload);
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      this.logger.error(`Handler for ${event} failed`, { error: error.message });

      // A failing plugin:error handler must not report itself
      if (event !== 'plugin:error') {
        this.fire('plugin:error', { pluginId: 'unknown', error });
      }
    }
  }
}

export function createEventBus(options?: EventBusOptions): EventBus {
  return new EventBus(options);
}
