/**
 * OrderLifecycle - status writes and their side effects
 */

import type { Order, TransitionOptions, TransitionOutcome } from '../domain/order/order.js';
import { HistoryChangeType } from '../domain/order/order-history.js';
import { OrderStatus } from '../domain/order/order-status.js';
import type { EventBus } from '../events/event-bus.js';
import type { LedgerDatabase } from '../infrastructure/sqlite/database.js';
import type { OrderRepository } from '../infrastructure/sqlite/order.repository.js';
import type { Logger } from '../logging/logger.js';
import type { StockGuard } from '../stock/stock-guard.js';

export interface OrderLifecycleDeps {
  db: LedgerDatabase;
  orders: OrderRepository;
  stock: StockGuard;
  events: EventBus;
  logger: Logger;
}

/**
 * Applies one status change to a loaded order. The status write, the
 * stock restore on cancel, the history row and every handler of the raised
 * events share one transaction.
 */
export class OrderLifecycle {
  private readonly deps: OrderLifecycleDeps;
  private readonly logger: Logger;

  constructor(deps: OrderLifecycleDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'order-lifecycle' });
  }

  /**
   * @throws {InvalidTransitionError} when the table does not allow the move;
   *   nothing is written in that case
   */
  transition(order: Order, status: OrderStatus, options: TransitionOptions = {}): TransitionOutcome {
    const { db, orders, events } = this.deps;

    return db.withTransaction(() => {
      const outcome = order.transitionTo(status, options);
      if (!outcome.changed) {
        this.logger.info('Status unchanged', { order_id: order.id, status });
        return outcome;
      }

      if (outcome.current === OrderStatus.CANCELED) {
        this.restoreStock(order);
      }

      orders.update(order);
      orders.appendHistory({
        orderId: order.id,
        changeType: HistoryChangeType.STATUS,
        previousStatus: outcome.previous,
        newStatus: outcome.current,
        note: options.reason ?? '',
        payload: options.actor ? { actor: options.actor } : {},
        createdAt: order.statusUpdatedAt,
      });
      events.publishAll(order.pullDomainEvents());

      this.logger.info('Order status changed', {
        order_id: order.id,
        from: outcome.previous,
        to: outcome.current,
      });
      return outcome;
    });
  }

  private restoreStock(order: Order): void {
    for (const item of order.items) {
      const held = item.releaseAllStock();
      if (held <= 0) continue;
      this.deps.stock.restore(item.productId, held, {
        orderId: order.id,
        reason: `Order ${order.id} canceled`,
      });
      this.deps.orders.updateItem(item);
    }
  }
}
