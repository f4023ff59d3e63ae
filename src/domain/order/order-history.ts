import type { OrderStatus } from './order-status.js';

/**
 * Order history audit rows
 */
export const HistoryChangeType = {
  STATUS: 'STATUS',
  NOTE: 'NOTE',
  REFUND: 'REFUND',
  SHIPPING: 'SHIPPING',
  PAYMENT: 'PAYMENT',
} as const;

export type HistoryChangeType = (typeof HistoryChangeType)[keyof typeof HistoryChangeType];

export interface OrderHistoryEntry {
  readonly id: number;
  readonly orderId: number;
  readonly changeType: HistoryChangeType;
  readonly previousStatus: OrderStatus | null;
  readonly newStatus: OrderStatus | null;
  readonly note: string;
  readonly payload: Record<string, unknown>;
  readonly createdAt: Date;
}

export type NewOrderHistoryEntry = Omit<OrderHistoryEntry, 'id' | 'createdAt'> & {
  createdAt?: Date;
};
