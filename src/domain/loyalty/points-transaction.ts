/**
 * Points ledger rows. Rows are immutable once written.
 */
export const TransactionKind = {
  EARN: 'EARN',
  REDEEM: 'REDEEM',
  EXPIRE: 'EXPIRE',
  ADJUST: 'ADJUST',
  BONUS: 'BONUS',
} as const;

export type TransactionKind = (typeof TransactionKind)[keyof typeof TransactionKind];

const KINDS: readonly string[] = Object.values(TransactionKind);

export function isTransactionKind(value: string): value is TransactionKind {
  return KINDS.includes(value);
}

export interface PointsTransaction {
  readonly id: number;
  readonly userId: number;
  /** Signed: credits are positive, debits negative */
  readonly points: number;
  readonly kind: TransactionKind;
  readonly referenceOrderId: number | null;
  /** Order line an EARN row was computed from */
  readonly orderItemId: number | null;
  /** EARN row offset by an EXPIRE row */
  readonly sourceTransactionId: number | null;
  readonly description: string;
  readonly createdBy: string | null;
  readonly createdAt: Date;
}

export type NewPointsTransaction = Omit<
  PointsTransaction,
  'id' | 'createdAt' | 'referenceOrderId' | 'orderItemId' | 'sourceTransactionId' | 'createdBy'
> & {
  referenceOrderId?: number | null;
  orderItemId?: number | null;
  sourceTransactionId?: number | null;
  createdBy?: string | null;
  createdAt?: Date;
};
