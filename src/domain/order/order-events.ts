import { DomainEvent } from '../shared/domain-event.js';
import type { MoneyJSON } from '../shared/money.js';
import type { OrderStatus } from './order-status.js';

/**
 * Order lifecycle events
 */
export const OrderEventName = {
  CREATED: 'order_created',
  STATUS_CHANGED: 'order_status_changed',
  COMPLETED: 'order_completed',
  CANCELED: 'order_canceled',
  REFUNDED: 'order_refunded',
  RETURNED: 'order_returned',
} as const;

export type OrderEventName = (typeof OrderEventName)[keyof typeof OrderEventName];

interface OrderRef {
  orderId: number;
  /** `null` for guest orders */
  userId: number | null;
}

export interface OrderEventPayloads {
  order_created: OrderRef & { status: OrderStatus; total: MoneyJSON };
  order_status_changed: OrderRef & { previousStatus: OrderStatus; newStatus: OrderStatus };
  order_completed: OrderRef;
  order_canceled: OrderRef & {
    previousStatus: OrderStatus;
    reason: string | null;
    canceledBy: string | null;
  };
  order_refunded: OrderRef & {
    source: 'status' | 'payment';
    amount: MoneyJSON | null;
    reason: string | null;
  };
  order_returned: OrderRef;
}

export type OrderEventOf<K extends OrderEventName> = DomainEvent<K, OrderEventPayloads[K]>;

export type OrderEvent = { [K in OrderEventName]: OrderEventOf<K> }[OrderEventName];

export function orderEvent<K extends OrderEventName>(
  name: K,
  payload: OrderEventPayloads[K],
  occurredAt?: Date
): OrderEventOf<K> {
  return new DomainEvent(name, payload, occurredAt);
}
