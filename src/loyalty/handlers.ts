/**
 * Event handlers that connect order lifecycle events to loyalty tasks
 */

import type { OrderEventName } from '../domain/order/order-events.js';
import type { EventBus } from '../events/event-bus.js';
import type { LedgerDatabase } from '../infrastructure/sqlite/database.js';
import type { Logger } from '../logging/logger.js';
import type { TaskQueue } from '../queue/task-queue.js';
import type { TaskClass } from '../task.js';
import { ProcessOrderPointsTask } from './tasks/process-order-points.task.js';
import { ReverseOrderPointsTask } from './tasks/reverse-order-points.task.js';

export interface LoyaltyHandlerDeps {
  db: LedgerDatabase;
  events: EventBus;
  queue: TaskQueue;
  logger: Logger;
}

const REVERSAL_EVENTS = ['order_canceled', 'order_refunded', 'order_returned'] as const;

/**
 * Register the loyalty handlers on `deps.events`. Returns a function that
 * removes them again.
 *
 * Guest orders enqueue nothing. Tasks are enqueued only once the
 * transaction that raised the event commits, and a failed enqueue is
 * logged without affecting the order.
 */
export function registerLoyaltyHandlers(deps: LoyaltyHandlerDeps): () => void {
  const logger = deps.logger.child({ component: 'loyalty-handlers' });

  const enqueueAfterCommit = <T extends object>(
    eventName: OrderEventName,
    orderId: number,
    userId: number | null,
    taskClass: TaskClass<T>
  ): void => {
    if (userId === null) {
      logger.debug('Guest order; no loyalty task', { event: eventName, order_id: orderId });
      return;
    }
    deps.db.onCommit(() => {
      try {
        const ticket = deps.queue.enqueue(taskClass, { orderId });
        logger.info('Loyalty task enqueued', {
          event: eventName,
          order_id: orderId,
          task: ticket.taskName,
          ticket: ticket.id,
        });
      } catch (error) {
        logger.error('Failed to enqueue loyalty task', {
          event: eventName,
          order_id: orderId,
          task: taskClass.name,
          error,
        });
      }
    });
  };

  const unsubscribers = [
    deps.events.on('order_completed', (event) => {
      const { orderId, userId } = event.payload;
      enqueueAfterCommit(event.eventName, orderId, userId, ProcessOrderPointsTask);
    }),
    ...REVERSAL_EVENTS.map((name) =>
      deps.events.on(name, (event) => {
        const { orderId, userId } = event.payload;
        enqueueAfterCommit(event.eventName, orderId, userId, ReverseOrderPointsTask);
      })
    ),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}
