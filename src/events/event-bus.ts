/**
 * EventBus - typed in-process dispatch of order lifecycle events
 *
 * Handlers run synchronously, in registration order, inside whatever
 * transaction published the event. A throwing handler aborts publishing and
 * propagates to the publisher, which rolls the transaction back. Handlers
 * that must not affect the order flow catch their own errors.
 */

import { getConfiguration } from '../config.js';
import type { Logger } from '../logging/logger.js';
import {
  OrderEventName,
  type OrderEvent,
  type OrderEventOf,
} from '../domain/order/order-events.js';

export type OrderEventHandler<K extends OrderEventName> = (event: OrderEventOf<K>) => void;

type HandlerMap = { [K in OrderEventName]: OrderEventHandler<K>[] };

function emptyHandlerMap(): HandlerMap {
  return {
    order_created: [],
    order_status_changed: [],
    order_completed: [],
    order_canceled: [],
    order_refunded: [],
    order_returned: [],
  };
}

export class EventBus {
  private handlers: HandlerMap = emptyHandlerMap();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? getConfiguration().logger).child({ component: 'event-bus' });
  }

  /**
   * Register `handler` for `name`. Returns a function that unregisters it.
   */
  on<K extends OrderEventName>(name: K, handler: OrderEventHandler<K>): () => void {
    const list: OrderEventHandler<K>[] = this.handlers[name];
    list.push(handler);
    return () => {
      const index = list.indexOf(handler);
      if (index !== -1) list.splice(index, 1);
    };
  }

  publish<K extends OrderEventName>(event: OrderEventOf<K>): void {
    const list: OrderEventHandler<K>[] = this.handlers[event.eventName];
    this.logger.debug('Publishing event', {
      event: event.eventName,
      event_id: event.eventId,
      handlers: list.length,
    });
    for (const handler of [...list]) {
      handler(event);
    }
  }

  publishAll(events: readonly OrderEvent[]): void {
    for (const event of events) {
      this.publish(event);
    }
  }

  handlerCount(name: OrderEventName): number {
    return this.handlers[name].length;
  }

  clear(): void {
    this.handlers = emptyHandlerMap();
  }
}
