import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { resetConfiguration } from '../config.js';
import {
  CurrencyMismatchError,
  InvalidTransitionError,
  OrderNotFoundError,
  OrderValidationError,
  PaymentError,
  UserNotFoundError,
} from '../errors.js';
import type { Product } from '../domain/catalog/product.js';
import type { OrderEvent } from '../domain/order/order-events.js';
import type { OrderStatus } from '../domain/order/order-status.js';
import { Money } from '../domain/shared/money.js';
import type { UserAccount } from '../domain/user/user-account.js';
import { createTestLedger, type TestLedger } from '../testing/fixtures.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

describe('OrderService', () => {
  let ledger: TestLedger;
  let product: Product;
  let user: UserAccount;

  beforeEach(() => {
    ledger = createTestLedger();
    product = ledger.createProduct({ stock: 5 });
    user = ledger.createUser();
  });

  afterEach(async () => {
    await ledger.runtime.close();
    resetConfiguration();
  });

  function placeOrder(quantity = 2, userId: number | null = user.id) {
    return ledger.runtime.orders.createOrder({
      userId,
      items: [{ productId: product.id, quantity }],
    });
  }

  function walk(orderId: number, statuses: OrderStatus[]): void {
    for (const status of statuses) {
      ledger.runtime.orders.updateStatus(orderId, status);
    }
  }

  describe('createOrder()', () => {
    it('should persist a PENDING order and reserve its stock', () => {
      const order = placeOrder(2);

      expect(order.status).toBe('PENDING');
      expect(order.paymentStatus).toBe('PENDING');
      expect(order.userId).toBe(user.id);
      expect(order.items).toHaveLength(1);
      expect(order.items[0]?.unitPrice.toJSON()).toEqual({ amount: '100', currency: 'EUR' });
      expect(order.total.toString()).toBe('200.00 EUR');
      expect(ledger.runtime.stock.available(product.id)).toBe(3);
    });

    it('should snapshot the final price including VAT and discount', () => {
      const taxed = ledger.createProduct({
        price: Money.of('50.00', 'EUR'),
        vatPercent: 20,
        discountPercent: 10,
      });

      const order = ledger.runtime.orders.createOrder({
        userId: user.id,
        items: [{ productId: taxed.id, quantity: 1 }],
        shippingPrice: '4.90',
      });

      expect(order.items[0]?.unitPrice.format()).toBe('55.00');
      expect(order.total.format()).toBe('59.90');
    });

    it('should write a creation history row', () => {
      const order = placeOrder();

      const history = ledger.runtime.orders.history(order.id);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        changeType: 'NOTE',
        previousStatus: null,
        newStatus: 'PENDING',
        note: 'Order created',
      });
    });

    it('should publish order_created', () => {
      const events: OrderEvent[] = [];
      ledger.runtime.events.on('order_created', (event) => events.push(event));

      const order = placeOrder();

      expect(events).toHaveLength(1);
      expect(events[0]?.payload).toEqual({
        orderId: order.id,
        userId: user.id,
        status: 'PENDING',
        total: { amount: '200', currency: 'EUR' },
      });
    });

    it('should reject a quantity above stock and reserve nothing', () => {
      const error = captureError(() => placeOrder(6));

      expect(error).toBeInstanceOf(OrderValidationError);
      expect(error).toMatchObject({ message: 'items.0.quantity exceeds available stock (5).' });
      expect(ledger.runtime.stock.available(product.id)).toBe(5);
      expect(ledger.runtime.orders.listUserOrders(user.id)).toEqual([]);
    });

    it('should list every invalid line', () => {
      const error = captureError(() =>
        ledger.runtime.orders.createOrder({
          userId: user.id,
          items: [
            { productId: product.id, quantity: 0 },
            { productId: 999, quantity: 1 },
          ],
        })
      );

      expect(error).toBeInstanceOf(OrderValidationError);
      if (error instanceof OrderValidationError) {
        expect(error.errors.messages).toEqual({
          'items.0.quantity': ['must be greater than 0'],
          'items.1.productId': ['refers to unknown product 999'],
        });
      }
    });

    it('should require at least one item', () => {
      const error = captureError(() =>
        ledger.runtime.orders.createOrder({ userId: user.id, items: [] })
      );

      expect(error).toBeInstanceOf(OrderValidationError);
      if (error instanceof OrderValidationError) {
        expect(error.errors.get('items')).toEqual(['must contain at least one item']);
      }
    });

    it('should reject unknown users', () => {
      expect(() => placeOrder(1, 999)).toThrow(UserNotFoundError);
    });

    it('should accept guest orders', () => {
      expect(placeOrder(1, null).isGuest).toBe(true);
    });

    it('should reject products priced in different currencies', () => {
      const dollars = ledger.createProduct({ price: Money.of('10', 'USD') });

      expect(() =>
        ledger.runtime.orders.createOrder({
          userId: user.id,
          items: [
            { productId: product.id, quantity: 1 },
            { productId: dollars.id, quantity: 1 },
          ],
        })
      ).toThrow(CurrencyMismatchError);
      expect(ledger.runtime.stock.available(product.id)).toBe(5);
    });
  });

  describe('updateStatus()', () => {
    it('should reject PENDING to DELIVERED and keep the order as it was', () => {
      const order = placeOrder();

      const error = captureError(() => ledger.runtime.orders.updateStatus(order.id, 'DELIVERED'));

      expect(error).toBeInstanceOf(InvalidTransitionError);
      expect(error).toMatchObject({
        currentStatus: 'PENDING',
        requestedStatus: 'DELIVERED',
        allowed: ['PROCESSING', 'CANCELED'],
      });
      expect(ledger.runtime.orders.getOrder(order.id).status).toBe('PENDING');
      expect(ledger.runtime.orders.history(order.id)).toHaveLength(1);
    });

    it('should record each step of the happy path', () => {
      const order = placeOrder();

      walk(order.id, ['PROCESSING', 'SHIPPED', 'DELIVERED', 'COMPLETED']);

      const steps = ledger.runtime.orders
        .history(order.id)
        .filter((entry) => entry.changeType === 'STATUS')
        .map((entry) => `${entry.previousStatus}->${entry.newStatus}`);
      expect(steps).toEqual([
        'PENDING->PROCESSING',
        'PROCESSING->SHIPPED',
        'SHIPPED->DELIVERED',
        'DELIVERED->COMPLETED',
      ]);
      expect(ledger.runtime.orders.getOrder(order.id).status).toBe('COMPLETED');
    });

    it('should treat the current status as a no-op', () => {
      const order = placeOrder();

      ledger.runtime.orders.updateStatus(order.id, 'PENDING');

      expect(ledger.runtime.orders.history(order.id)).toHaveLength(1);
      expect(ledger.output.find('Status unchanged')?.['order_id']).toBe(order.id);
    });

    it('should store the actor and reason on the history row', () => {
      const order = placeOrder();

      ledger.runtime.orders.updateStatus(order.id, 'PROCESSING', {
        reason: 'picked',
        actor: 'warehouse',
      });

      const row = ledger.runtime.orders.history(order.id)[1];
      expect(row).toMatchObject({ note: 'picked', payload: { actor: 'warehouse' } });
    });

    it('should roll back the transition when a handler throws', () => {
      const order = placeOrder();
      walk(order.id, ['PROCESSING', 'SHIPPED', 'DELIVERED']);
      ledger.runtime.events.on('order_completed', () => {
        throw new Error('projection failed');
      });

      expect(() => ledger.runtime.orders.updateStatus(order.id, 'COMPLETED')).toThrow(
        'projection failed'
      );
      expect(ledger.runtime.orders.getOrder(order.id).status).toBe('DELIVERED');
    });

    it('should list the statuses an order can move to', () => {
      const order = placeOrder();
      walk(order.id, ['PROCESSING', 'SHIPPED']);

      expect(ledger.runtime.orders.transitionsFor(order.id)).toEqual([
        'DELIVERED',
        'RETURNED',
        'REFUNDED',
      ]);
    });
  });

  describe('cancelOrder()', () => {
    it('should return net stock and record the cancellation', () => {
      const order = placeOrder(3);
      const itemId = order.items[0]?.id ?? 0;
      ledger.runtime.orders.refundItem(itemId, 1);
      const events: OrderEvent[] = [];
      ledger.runtime.events.on('order_canceled', (event) => events.push(event));

      const canceled = ledger.runtime.orders.cancelOrder(order.id, {
        reason: 'customer request',
        canceledBy: 'support',
      });

      expect(canceled.status).toBe('CANCELED');
      expect(ledger.runtime.stock.available(product.id)).toBe(5);
      expect(canceled.metadata['cancellation']).toMatchObject({
        reason: 'customer request',
        canceledBy: 'support',
        previousStatus: 'PENDING',
      });
      expect(events[0]?.payload).toEqual({
        orderId: order.id,
        userId: user.id,
        previousStatus: 'PENDING',
        reason: 'customer request',
        canceledBy: 'support',
      });
    });

    it('should not cancel a completed order', () => {
      const order = placeOrder();
      walk(order.id, ['PROCESSING', 'SHIPPED', 'DELIVERED', 'COMPLETED']);

      expect(() => ledger.runtime.orders.cancelOrder(order.id)).toThrow(InvalidTransitionError);
      expect(ledger.runtime.stock.available(product.id)).toBe(3);
    });
  });

  describe('updateItemQuantity()', () => {
    it('should let an existing line go past the stock left', () => {
      const order = placeOrder(5);
      const itemId = order.items[0]?.id ?? 0;

      const item = ledger.runtime.orders.updateItemQuantity(itemId, 6);

      expect(item.quantity).toBe(6);
      expect(ledger.runtime.stock.available(product.id)).toBe(0);
      expect(ledger.output.find('Stock shortfall on reservation')).toMatchObject({
        requested: 1,
        reserved: 0,
      });
      const last = ledger.runtime.orders.history(order.id).at(-1);
      expect(last?.payload).toEqual({ itemId, previousQuantity: 5, quantity: 6, stockReserved: 0 });
    });

    it('should restore only the units a grown line actually reserved', () => {
      const order = placeOrder(5);
      const itemId = order.items[0]?.id ?? 0;
      ledger.runtime.orders.updateItemQuantity(itemId, 8);

      ledger.runtime.orders.cancelOrder(order.id);

      expect(ledger.runtime.stock.available(product.id)).toBe(5);
      const item = ledger.runtime.orders.getOrder(order.id).items[0];
      expect(item?.quantity).toBe(8);
      expect(item?.reservedQuantity).toBe(0);
    });

    it('should not return unreserved units when a grown line shrinks', () => {
      const order = placeOrder(5);
      const itemId = order.items[0]?.id ?? 0;
      ledger.runtime.orders.updateItemQuantity(itemId, 8);

      ledger.runtime.orders.updateItemQuantity(itemId, 6);

      expect(ledger.runtime.stock.available(product.id)).toBe(0);
      expect(ledger.runtime.orders.getOrder(order.id).items[0]?.reservedQuantity).toBe(5);
    });

    it('should return stock when a line shrinks', () => {
      const order = placeOrder(4);

      ledger.runtime.orders.updateItemQuantity(order.items[0]?.id ?? 0, 1);

      expect(ledger.runtime.stock.available(product.id)).toBe(4);
      expect(ledger.runtime.orders.getOrder(order.id).items[0]?.quantity).toBe(1);
    });

    it('should refuse edits once the order has shipped', () => {
      const order = placeOrder(1);
      walk(order.id, ['PROCESSING', 'SHIPPED']);

      const error = captureError(() =>
        ledger.runtime.orders.updateItemQuantity(order.items[0]?.id ?? 0, 2)
      );

      expect(error).toBeInstanceOf(OrderValidationError);
      if (error instanceof OrderValidationError) {
        expect(error.errors.get('status')).toEqual([
          'is SHIPPED; items can only change while PENDING or PROCESSING',
        ]);
      }
    });

    it('should refuse a zero quantity', () => {
      const order = placeOrder(1);

      expect(() => ledger.runtime.orders.updateItemQuantity(order.items[0]?.id ?? 0, 0)).toThrow(
        OrderValidationError
      );
    });
  });

  describe('refundItem()', () => {
    it('should restore refunded units and log the refund', () => {
      const order = placeOrder(3);
      const itemId = order.items[0]?.id ?? 0;

      const item = ledger.runtime.orders.refundItem(itemId, 2);

      expect(item.refundedQuantity).toBe(2);
      expect(ledger.runtime.stock.available(product.id)).toBe(4);
      const last = ledger.runtime.orders.history(order.id).at(-1);
      expect(last).toMatchObject({
        changeType: 'REFUND',
        note: 'Item refunded',
        payload: { itemId, quantity: 2, amount: { amount: '200', currency: 'EUR' } },
      });
    });

    it('should return only held units when refunding a short line', () => {
      const order = placeOrder(5);
      const itemId = order.items[0]?.id ?? 0;
      ledger.runtime.orders.updateItemQuantity(itemId, 8);

      ledger.runtime.orders.refundItem(itemId, 4);

      expect(ledger.runtime.stock.available(product.id)).toBe(1);
      expect(ledger.runtime.orders.history(order.id).at(-1)?.payload).toMatchObject({
        quantity: 4,
        stockReturned: 1,
      });

      ledger.runtime.orders.cancelOrder(order.id);

      expect(ledger.runtime.stock.available(product.id)).toBe(5);
    });

    it('should bound the quantity by what is left', () => {
      const order = placeOrder(2);

      const error = captureError(() => ledger.runtime.orders.refundItem(order.items[0]?.id ?? 0, 3));

      expect(error).toBeInstanceOf(OrderValidationError);
      if (error instanceof OrderValidationError) {
        expect(error.errors.get('quantity')).toEqual(['must be between 1 and 2']);
      }
    });

    it('should refuse refunds on canceled orders', () => {
      const order = placeOrder(2);
      ledger.runtime.orders.cancelOrder(order.id);

      expect(() => ledger.runtime.orders.refundItem(order.items[0]?.id ?? 0)).toThrow(
        OrderValidationError
      );
      expect(ledger.runtime.stock.available(product.id)).toBe(5);
    });
  });

  describe('payments', () => {
    it('should record and partially refund a payment', () => {
      const order = placeOrder(2);
      ledger.runtime.orders.recordPayment(order.id, '200');

      const refunded = ledger.runtime.orders.refundPayment(order.id, { amount: '50', reason: 'late' });

      expect(refunded.paymentStatus).toBe('PARTIALLY_REFUNDED');
      expect(refunded.paidAmount.format()).toBe('200.00');
      expect(ledger.runtime.orders.getOrder(order.id).paymentRefunds).toHaveLength(1);
      expect(
        ledger.runtime.orders
          .history(order.id)
          .filter((entry) => entry.changeType === 'PAYMENT')
          .map((entry) => entry.note)
      ).toEqual(['Payment recorded', 'Payment refunded']);
    });

    it('should publish order_refunded for a payment refund', () => {
      const order = placeOrder(2);
      ledger.runtime.orders.recordPayment(order.id, '200');
      const events: OrderEvent[] = [];
      ledger.runtime.events.on('order_refunded', (event) => events.push(event));

      ledger.runtime.orders.refundPayment(order.id);

      expect(events[0]?.payload).toEqual({
        orderId: order.id,
        userId: user.id,
        source: 'payment',
        amount: { amount: '200', currency: 'EUR' },
        reason: null,
      });
      expect(ledger.runtime.orders.getOrder(order.id).paymentStatus).toBe('REFUNDED');
    });

    it('should refuse to refund an unpaid order', () => {
      const order = placeOrder();

      expect(() => ledger.runtime.orders.refundPayment(order.id)).toThrow(
        `Order ${order.id} has no captured payment to refund`
      );
    });

    it('should refuse a second full refund', () => {
      const order = placeOrder();
      ledger.runtime.orders.recordPayment(order.id, '200');
      ledger.runtime.orders.refundPayment(order.id);

      expect(() => ledger.runtime.orders.refundPayment(order.id)).toThrow(PaymentError);
    });
  });

  describe('addTrackingInfo()', () => {
    it('should store tracking and move a pending order to SHIPPED', () => {
      const order = placeOrder();

      const shipped = ledger.runtime.orders.addTrackingInfo(order.id, 'TRK-1', 'ParcelCo');

      expect(shipped.status).toBe('SHIPPED');
      expect(shipped.trackingNumber).toBe('TRK-1');
      expect(shipped.carrier).toBe('ParcelCo');
      expect(ledger.runtime.orders.history(order.id).map((entry) => entry.changeType)).toEqual([
        'NOTE',
        'SHIPPING',
        'STATUS',
        'STATUS',
      ]);
    });
  });

  describe('lookups', () => {
    it('should find orders by uuid', () => {
      const order = placeOrder();

      expect(ledger.runtime.orders.getOrderByUuid(order.uuid).id).toBe(order.id);
      expect(() => ledger.runtime.orders.getOrderByUuid('missing')).toThrow(OrderNotFoundError);
    });

    it('should hide soft-deleted orders', () => {
      const kept = placeOrder(1);
      const deleted = placeOrder(1);

      ledger.runtime.orders.softDeleteOrder(deleted.id);

      expect(() => ledger.runtime.orders.getOrder(deleted.id)).toThrow(OrderNotFoundError);
      expect(ledger.runtime.orders.listUserOrders(user.id).map((order) => order.id)).toEqual([
        kept.id,
      ]);
    });
  });
});
