import type { Database } from 'better-sqlite3';
import { Money } from '../../domain/shared/money.js';
import { Order } from '../../domain/order/order.js';
import { OrderItem } from '../../domain/order/order-item.js';
import {
  HistoryChangeType,
  type NewOrderHistoryEntry,
  type OrderHistoryEntry,
} from '../../domain/order/order-history.js';
import {
  isOrderStatus,
  isPaymentStatus,
  type OrderStatus,
  type PaymentStatus,
} from '../../domain/order/order-status.js';
import type { LedgerDatabase } from './database.js';
import {
  parseJsonObject,
  toRowId,
  type OrderHistoryRow,
  type OrderItemRow,
  type OrderRow,
} from './rows.js';

export interface NewOrderRecord {
  uuid: string;
  userId: number | null;
  status: OrderStatus;
  paymentStatus: PaymentStatus;
  currency: string;
  shippingPrice: Money;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export interface NewOrderItemRecord {
  orderId: number;
  productId: number;
  productName: string;
  unitPrice: Money;
  quantity: number;
  reservedQuantity: number;
}

export interface FindOrderOptions {
  includeDeleted?: boolean;
}

/**
 * Orders, their lines and their history. Orders are written back whole
 * through `update`; lines through `updateItem`.
 */
export class OrderRepository {
  private readonly conn: Database;

  constructor(db: LedgerDatabase) {
    this.conn = db.connection;
  }

  insert(record: NewOrderRecord): number {
    const at = record.createdAt.toISOString();
    const info = this.conn
      .prepare<
        [string, number | null, string, string, string, string, string, string, string, string]
      >(
        `INSERT INTO orders
           (uuid, user_id, status, payment_status, currency, shipping_price, metadata,
            created_at, updated_at, status_updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.uuid,
        record.userId,
        record.status,
        record.paymentStatus,
        record.currency,
        record.shippingPrice.amount.toString(),
        JSON.stringify(record.metadata),
        at,
        at,
        at
      );
    return toRowId(info.lastInsertRowid);
  }

  insertItem(record: NewOrderItemRecord): number {
    const info = this.conn
      .prepare<[number, number, string, string, string, number, number, number]>(
        `INSERT INTO order_items
           (order_id, product_id, product_name, unit_price, currency, quantity, original_quantity,
            reserved_quantity)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.orderId,
        record.productId,
        record.productName,
        record.unitPrice.amount.toString(),
        record.unitPrice.currency,
        record.quantity,
        record.quantity,
        record.reservedQuantity
      );
    return toRowId(info.lastInsertRowid);
  }

  update(order: Order): void {
    this.conn
      .prepare<
        [
          string,
          string,
          string,
          string,
          string,
          string | null,
          string | null,
          number,
          string,
          string,
          number,
        ]
      >(
        `UPDATE orders SET
           status = ?, payment_status = ?, shipping_price = ?, paid_amount = ?, metadata = ?,
           tracking_number = ?, carrier = ?, is_deleted = ?, updated_at = ?, status_updated_at = ?
         WHERE id = ?`
      )
      .run(
        order.status,
        order.paymentStatus,
        order.shippingPrice.amount.toString(),
        order.paidAmount.amount.toString(),
        JSON.stringify(order.metadata),
        order.trackingNumber,
        order.carrier,
        order.isDeleted ? 1 : 0,
        order.updatedAt.toISOString(),
        order.statusUpdatedAt.toISOString(),
        order.id
      );
  }

  updateItem(item: OrderItem): void {
    this.conn
      .prepare<[number, number, number, number]>(
        `UPDATE order_items
            SET quantity = ?, refunded_quantity = ?, reserved_quantity = ?
          WHERE id = ?`
      )
      .run(item.quantity, item.refundedQuantity, item.reservedQuantity, item.id);
  }

  findById(id: number, options: FindOrderOptions = {}): Order | null {
    const row = this.conn.prepare<[number], OrderRow>('SELECT * FROM orders WHERE id = ?').get(id);
    if (!row || (row.is_deleted === 1 && !options.includeDeleted)) {
      return null;
    }
    return this.toOrder(row);
  }

  findByUuid(uuid: string): Order | null {
    const row = this.conn
      .prepare<[string], OrderRow>('SELECT * FROM orders WHERE uuid = ? AND is_deleted = 0')
      .get(uuid);
    return row ? this.toOrder(row) : null;
  }

  /** Id of the order owning line `itemId` */
  findOrderIdForItem(itemId: number): number | null {
    const row = this.conn
      .prepare<[number], { order_id: number }>('SELECT order_id FROM order_items WHERE id = ?')
      .get(itemId);
    return row?.order_id ?? null;
  }

  /** Newest first, soft-deleted orders excluded */
  listByUser(userId: number): Order[] {
    return this.conn
      .prepare<[number], OrderRow>(
        `SELECT * FROM orders
         WHERE user_id = ? AND is_deleted = 0
         ORDER BY created_at DESC, id DESC`
      )
      .all(userId)
      .map((row) => this.toOrder(row));
  }

  appendHistory(entry: NewOrderHistoryEntry): OrderHistoryEntry {
    const createdAt = entry.createdAt ?? new Date();
    const info = this.conn
      .prepare<[number, string, string | null, string | null, string, string, string]>(
        `INSERT INTO order_history
           (order_id, change_type, previous_status, new_status, note, payload, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.orderId,
        entry.changeType,
        entry.previousStatus,
        entry.newStatus,
        entry.note,
        JSON.stringify(entry.payload),
        createdAt.toISOString()
      );
    return { ...entry, id: toRowId(info.lastInsertRowid), createdAt };
  }

  listHistory(orderId: number): OrderHistoryEntry[] {
    return this.conn
      .prepare<[number], OrderHistoryRow>(
        'SELECT * FROM order_history WHERE order_id = ? ORDER BY id'
      )
      .all(orderId)
      .map(toHistoryEntry);
  }

  private itemsFor(orderId: number): OrderItem[] {
    return this.conn
      .prepare<[number], OrderItemRow>('SELECT * FROM order_items WHERE order_id = ? ORDER BY id')
      .all(orderId)
      .map(toItem);
  }

  private toOrder(row: OrderRow): Order {
    return Order.reconstitute({
      id: row.id,
      uuid: row.uuid,
      userId: row.user_id,
      status: parseStatus(row.status),
      paymentStatus: parsePaymentStatus(row.payment_status),
      currency: row.currency,
      shippingPrice: Money.of(row.shipping_price, row.currency),
      paidAmount: Money.of(row.paid_amount, row.currency),
      metadata: parseJsonObject(row.metadata),
      trackingNumber: row.tracking_number,
      carrier: row.carrier,
      isDeleted: row.is_deleted === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      statusUpdatedAt: new Date(row.status_updated_at),
      items: this.itemsFor(row.id),
    });
  }
}

function parseStatus(value: string): OrderStatus {
  if (!isOrderStatus(value)) {
    throw new TypeError(`Unknown order status '${value}'`);
  }
  return value;
}

function parsePaymentStatus(value: string): PaymentStatus {
  if (!isPaymentStatus(value)) {
    throw new TypeError(`Unknown payment status '${value}'`);
  }
  return value;
}

function toItem(row: OrderItemRow): OrderItem {
  return OrderItem.reconstitute({
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    productName: row.product_name,
    unitPrice: Money.of(row.unit_price, row.currency),
    quantity: row.quantity,
    originalQuantity: row.original_quantity,
    refundedQuantity: row.refunded_quantity,
    reservedQuantity: row.reserved_quantity,
  });
}

function toHistoryEntry(row: OrderHistoryRow): OrderHistoryEntry {
  return {
    id: row.id,
    orderId: row.order_id,
    changeType: parseChangeType(row.change_type),
    previousStatus: row.previous_status === null ? null : parseStatus(row.previous_status),
    newStatus: row.new_status === null ? null : parseStatus(row.new_status),
    note: row.note,
    payload: parseJsonObject(row.payload),
    createdAt: new Date(row.created_at),
  };
}

function parseChangeType(value: string): HistoryChangeType {
  switch (value) {
    case HistoryChangeType.STATUS:
    case HistoryChangeType.REFUND:
    case HistoryChangeType.SHIPPING:
    case HistoryChangeType.PAYMENT:
      return value;
    default:
      return HistoryChangeType.NOTE;
  }
}
