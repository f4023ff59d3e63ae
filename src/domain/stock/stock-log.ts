/**
 * Audit row written for every stock mutation
 */
export const StockOperation = {
  RESERVE: 'RESERVE',
  RESTORE: 'RESTORE',
} as const;

export type StockOperation = (typeof StockOperation)[keyof typeof StockOperation];

export interface StockLogEntry {
  readonly id: number;
  readonly productId: number;
  readonly orderId: number | null;
  readonly operation: StockOperation;
  /** Signed change applied to stock */
  readonly quantity: number;
  readonly stockBefore: number;
  readonly stockAfter: number;
  readonly reason: string;
  readonly createdAt: Date;
}

export type NewStockLogEntry = Omit<StockLogEntry, 'id' | 'createdAt'> & { createdAt?: Date };
