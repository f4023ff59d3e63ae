/**
 * OrderService - order use cases around the lifecycle engine
 */

import { z } from 'zod';
import {
  CurrencyMismatchError,
  ErrorCollection,
  OrderItemNotFoundError,
  OrderNotFoundError,
  OrderValidationError,
  UserNotFoundError,
} from '../errors.js';
import type { Product } from '../domain/catalog/product.js';
import type { Order } from '../domain/order/order.js';
import { OrderItem } from '../domain/order/order-item.js';
import { orderEvent } from '../domain/order/order-events.js';
import { HistoryChangeType, type OrderHistoryEntry } from '../domain/order/order-history.js';
import { OrderStatus, PaymentStatus, isEditable } from '../domain/order/order-status.js';
import type { DecimalInput } from '../domain/shared/decimal.js';
import { Money } from '../domain/shared/money.js';
import type { EventBus } from '../events/event-bus.js';
import type { LedgerDatabase } from '../infrastructure/sqlite/database.js';
import type { OrderRepository } from '../infrastructure/sqlite/order.repository.js';
import type { ProductRepository } from '../infrastructure/sqlite/product.repository.js';
import type { UserRepository } from '../infrastructure/sqlite/user.repository.js';
import type { Logger } from '../logging/logger.js';
import type { StockGuard } from '../stock/stock-guard.js';
import { generateUUID } from '../utils/uuid.js';
import { OrderLifecycle } from './lifecycle.js';

const createOrderSchema = z.object({
  userId: z.number().int().positive().nullable().default(null),
  currency: z.string().length(3).optional(),
  shippingPrice: z.union([z.string(), z.number()]).default(0),
  metadata: z.record(z.unknown()).default({}),
  items: z
    .array(
      z.object({
        productId: z.number().int().positive(),
        quantity: z.number(),
      })
    )
    .min(1, 'must contain at least one item'),
});

export type CreateOrderInput = z.input<typeof createOrderSchema>;

export interface CancelOrderOptions {
  reason?: string | null;
  canceledBy?: string | null;
}

export interface RefundPaymentOptions {
  amount?: DecimalInput;
  reason?: string | null;
}

export interface StatusChangeOptions {
  reason?: string | null;
  actor?: string | null;
}

export interface OrderServiceDeps {
  db: LedgerDatabase;
  orders: OrderRepository;
  products: ProductRepository;
  users: UserRepository;
  stock: StockGuard;
  events: EventBus;
  logger: Logger;
}

export class OrderService {
  private readonly deps: OrderServiceDeps;
  private readonly lifecycle: OrderLifecycle;
  private readonly logger: Logger;

  constructor(deps: OrderServiceDeps) {
    this.deps = deps;
    this.lifecycle = new OrderLifecycle(deps);
    this.logger = deps.logger.child({ component: 'order-service' });
  }

  /**
   * Validate lines, reserve stock for each and persist the order.
   *
   * @throws {OrderValidationError} on invalid input, listing every field error
   * @throws {CurrencyMismatchError} when products are priced in different currencies
   * @throws {InsufficientStockError} when a reservation loses a race with another order
   */
  createOrder(input: CreateOrderInput): Order {
    const parsed = createOrderSchema.safeParse(input);
    if (!parsed.success) {
      const errors = new ErrorCollection();
      for (const issue of parsed.error.issues) {
        errors.add(issue.path.join('.') || 'order', issue.message);
      }
      throw new OrderValidationError(errors);
    }
    const data = parsed.data;
    const { db, orders, products, users, stock, events } = this.deps;

    if (data.userId !== null && !users.findById(data.userId)) {
      throw new UserNotFoundError(data.userId);
    }

    const errors = new ErrorCollection();
    const lines: { product: Product; quantity: number }[] = [];
    data.items.forEach((line, index) => {
      const product = products.findById(line.productId);
      if (!product) {
        errors.add(`items.${index}.productId`, `refers to unknown product ${line.productId}`);
        return;
      }
      OrderItem.validate(
        { quantity: line.quantity, availableStock: product.stock },
        errors,
        `items.${index}.`
      );
      lines.push({ product, quantity: line.quantity });
    });
    if (!errors.isEmpty) {
      throw new OrderValidationError(errors);
    }

    const currency = (data.currency ?? lines[0]?.product.currency ?? '').toUpperCase();
    for (const { product } of lines) {
      if (product.currency !== currency) {
        throw new CurrencyMismatchError(currency, product.currency);
      }
    }
    const shippingPrice = Money.of(data.shippingPrice, currency);

    const order = db.withTransaction(() => {
      const createdAt = new Date();
      const orderId = orders.insert({
        uuid: generateUUID(),
        userId: data.userId,
        status: OrderStatus.PENDING,
        paymentStatus: PaymentStatus.PENDING,
        currency,
        shippingPrice,
        metadata: data.metadata,
        createdAt,
      });

      for (const { product, quantity } of lines) {
        stock.reserve(product.id, quantity, { orderId, reason: `Order ${orderId} created` });
        orders.insertItem({
          orderId,
          productId: product.id,
          productName: product.name,
          unitPrice: product.finalPrice,
          quantity,
          reservedQuantity: quantity,
        });
      }

      orders.appendHistory({
        orderId,
        changeType: HistoryChangeType.NOTE,
        previousStatus: null,
        newStatus: OrderStatus.PENDING,
        note: 'Order created',
        payload: {},
        createdAt,
      });

      const created = this.requireOrder(orderId);
      events.publish(
        orderEvent(
          'order_created',
          {
            orderId,
            userId: created.userId,
            status: created.status,
            total: created.total.toJSON(),
          },
          createdAt
        )
      );
      return created;
    });

    this.logger.info('Order created', {
      order_id: order.id,
      user_id: order.userId,
      items: order.items.length,
      total: order.total.toString(),
    });
    return order;
  }

  getOrder(orderId: number): Order {
    return this.requireOrder(orderId);
  }

  getOrderByUuid(uuid: string): Order {
    const order = this.deps.orders.findByUuid(uuid);
    if (!order) {
      throw new OrderNotFoundError(uuid);
    }
    return order;
  }

  listUserOrders(userId: number): Order[] {
    return this.deps.orders.listByUser(userId);
  }

  history(orderId: number): OrderHistoryEntry[] {
    return this.deps.orders.listHistory(orderId);
  }

  /**
   * @throws {InvalidTransitionError} when the transition table forbids the move
   */
  updateStatus(orderId: number, status: OrderStatus, options: StatusChangeOptions = {}): Order {
    return this.deps.db.withTransaction(() => {
      const order = this.requireOrder(orderId);
      this.lifecycle.transition(order, status, options);
      return order;
    });
  }

  cancelOrder(orderId: number, options: CancelOrderOptions = {}): Order {
    return this.updateStatus(orderId, OrderStatus.CANCELED, {
      reason: options.reason ?? null,
      actor: options.canceledBy ?? null,
    });
  }

  /**
   * Change the quantity of an existing line. The new quantity is not
   * checked against stock: an increase reserves what stock is left and
   * logs any shortfall, a decrease returns only units the line still holds.
   */
  updateItemQuantity(itemId: number, quantity: number): OrderItem {
    const { db, orders, stock } = this.deps;

    return db.withTransaction(() => {
      const { order, item } = this.requireItem(itemId);
      assertEditable(order);

      const errors = OrderItem.validate({ quantity, refundedQuantity: item.refundedQuantity });
      if (!errors.isEmpty) {
        throw new OrderValidationError(errors);
      }

      const previousQuantity = item.quantity;
      const delta = item.changeQuantity(quantity);
      if (delta === 0) {
        return item;
      }

      const reason = `Order ${order.id} item ${item.id} quantity ${previousQuantity} -> ${quantity}`;
      let reserved = 0;
      if (delta > 0) {
        reserved = stock.reserveAvailable(item.productId, delta, { orderId: order.id, reason });
        item.holdStock(reserved);
      } else {
        const released = item.releaseExcessStock();
        if (released > 0) {
          stock.restore(item.productId, released, { orderId: order.id, reason });
        }
      }

      orders.updateItem(item);
      order.touch();
      orders.update(order);
      orders.appendHistory({
        orderId: order.id,
        changeType: HistoryChangeType.NOTE,
        previousStatus: order.status,
        newStatus: order.status,
        note: 'Item quantity changed',
        payload: {
          itemId: item.id,
          previousQuantity,
          quantity,
          ...(delta > 0 ? { stockReserved: reserved } : {}),
        },
      });

      this.logger.info('Item quantity changed', {
        order_id: order.id,
        item_id: item.id,
        from: previousQuantity,
        to: quantity,
      });
      return item;
    });
  }

  /**
   * Refund `quantity` units of a line (all remaining units by default)
   * and return to stock whatever the line now holds beyond its net quantity.
   */
  refundItem(itemId: number, quantity?: number): OrderItem {
    const { db, orders, stock } = this.deps;

    return db.withTransaction(() => {
      const { order, item } = this.requireItem(itemId);
      if (order.status === OrderStatus.CANCELED) {
        const errors = new ErrorCollection();
        errors.add('status', 'is CANCELED; stock was already returned');
        throw new OrderValidationError(errors);
      }

      const remaining = item.netQuantity;
      const requested = quantity ?? remaining;
      if (!Number.isInteger(requested) || requested <= 0 || requested > remaining) {
        const errors = new ErrorCollection();
        errors.add('quantity', `must be between 1 and ${remaining}`);
        throw new OrderValidationError(errors);
      }

      const refunded = item.refund(requested);
      const released = item.releaseExcessStock();
      if (released > 0) {
        stock.restore(item.productId, released, {
          orderId: order.id,
          reason: `Order ${order.id} item ${item.id} refunded`,
        });
      }

      orders.updateItem(item);
      order.touch();
      orders.update(order);
      orders.appendHistory({
        orderId: order.id,
        changeType: HistoryChangeType.REFUND,
        previousStatus: order.status,
        newStatus: order.status,
        note: 'Item refunded',
        payload: {
          itemId: item.id,
          quantity: refunded,
          amount: item.unitPrice.times(refunded).toJSON(),
          stockReturned: released,
        },
      });

      this.logger.info('Item refunded', { order_id: order.id, item_id: item.id, quantity: refunded });
      return item;
    });
  }

  recordPayment(orderId: number, amount: DecimalInput): Order {
    const { db, orders } = this.deps;

    return db.withTransaction(() => {
      const order = this.requireOrder(orderId);
      const payment = Money.of(amount, order.currency);
      order.recordPayment(payment);
      orders.update(order);
      orders.appendHistory({
        orderId,
        changeType: HistoryChangeType.PAYMENT,
        previousStatus: order.status,
        newStatus: order.status,
        note: 'Payment recorded',
        payload: { amount: payment.toJSON() },
      });
      return order;
    });
  }

  /**
   * @throws {PaymentError} when nothing was paid, the payment is already
   *   refunded, or the amount exceeds what is left to refund
   */
  refundPayment(orderId: number, options: RefundPaymentOptions = {}): Order {
    const { db, orders, events } = this.deps;

    return db.withTransaction(() => {
      const order = this.requireOrder(orderId);
      const amount =
        options.amount === undefined ? undefined : Money.of(options.amount, order.currency);
      const refund = order.refundPayment(amount, options.reason ?? null);

      orders.update(order);
      orders.appendHistory({
        orderId,
        changeType: HistoryChangeType.PAYMENT,
        previousStatus: order.status,
        newStatus: order.status,
        note: 'Payment refunded',
        payload: { amount: refund.toJSON(), paymentStatus: order.paymentStatus },
      });
      events.publishAll(order.pullDomainEvents());

      this.logger.info('Payment refunded', {
        order_id: orderId,
        amount: refund.toString(),
        payment_status: order.paymentStatus,
      });
      return order;
    });
  }

  /**
   * Store tracking details; orders not yet shipped move to SHIPPED.
   */
  addTrackingInfo(orderId: number, trackingNumber: string, carrier: string): Order {
    const { db, orders } = this.deps;

    return db.withTransaction(() => {
      const order = this.requireOrder(orderId);
      order.setTracking(trackingNumber, carrier);
      orders.update(order);
      orders.appendHistory({
        orderId,
        changeType: HistoryChangeType.SHIPPING,
        previousStatus: order.status,
        newStatus: order.status,
        note: 'Tracking added',
        payload: { trackingNumber, carrier },
      });

      if (order.status === OrderStatus.PENDING) {
        this.lifecycle.transition(order, OrderStatus.PROCESSING);
      }
      if (order.status === OrderStatus.PROCESSING) {
        this.lifecycle.transition(order, OrderStatus.SHIPPED);
      }
      return order;
    });
  }

  softDeleteOrder(orderId: number): void {
    const { db, orders } = this.deps;

    db.withTransaction(() => {
      const order = this.requireOrder(orderId);
      order.softDelete();
      orders.update(order);
    });
    this.logger.info('Order deleted', { order_id: orderId });
  }

  /** Statuses `orderId` can move to from where it is now */
  transitionsFor(orderId: number): OrderStatus[] {
    const order = this.requireOrder(orderId);
    return Object.values(OrderStatus).filter((status) => order.canTransitionTo(status));
  }

  private requireOrder(orderId: number): Order {
    const order = this.deps.orders.findById(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    return order;
  }

  private requireItem(itemId: number): { order: Order; item: OrderItem } {
    const orderId = this.deps.orders.findOrderIdForItem(itemId);
    const order = orderId === null ? null : this.deps.orders.findById(orderId);
    const item = order?.findItem(itemId);
    if (!order || !item) {
      throw new OrderItemNotFoundError(itemId);
    }
    return { order, item };
  }
}

function assertEditable(order: Order): void {
  if (!isEditable(order.status)) {
    const errors = new ErrorCollection();
    errors.add('status', `is ${order.status}; items can only change while PENDING or PROCESSING`);
    throw new OrderValidationError(errors);
  }
}
