import type { Database } from 'better-sqlite3';
import {
  TransactionKind,
  isTransactionKind,
  type NewPointsTransaction,
  type PointsTransaction,
} from '../../domain/loyalty/points-transaction.js';
import type { LedgerDatabase } from './database.js';
import { toRowId, type PointsTransactionRow } from './rows.js';

export interface ListTransactionsOptions {
  kind?: TransactionKind;
  limit?: number;
}

/**
 * Append-only access to `points_transactions`. There is no update or delete.
 */
export class PointsRepository {
  private readonly conn: Database;

  constructor(db: LedgerDatabase) {
    this.conn = db.connection;
  }

  insert(tx: NewPointsTransaction): PointsTransaction {
    const createdAt = tx.createdAt ?? new Date();
    const row: Omit<PointsTransaction, 'id'> = {
      userId: tx.userId,
      points: tx.points,
      kind: tx.kind,
      referenceOrderId: tx.referenceOrderId ?? null,
      orderItemId: tx.orderItemId ?? null,
      sourceTransactionId: tx.sourceTransactionId ?? null,
      description: tx.description,
      createdBy: tx.createdBy ?? null,
      createdAt,
    };
    const info = this.conn
      .prepare<
        [number, number, string, number | null, number | null, number | null, string, string | null, string]
      >(
        `INSERT INTO points_transactions
           (user_id, points, kind, reference_order_id, order_item_id, source_transaction_id,
            description, created_by, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        row.userId,
        row.points,
        row.kind,
        row.referenceOrderId,
        row.orderItemId,
        row.sourceTransactionId,
        row.description,
        row.createdBy,
        createdAt.toISOString()
      );
    return { ...row, id: toRowId(info.lastInsertRowid) };
  }

  findById(id: number): PointsTransaction | null {
    const row = this.conn
      .prepare<[number], PointsTransactionRow>('SELECT * FROM points_transactions WHERE id = ?')
      .get(id);
    return row ? toTransaction(row) : null;
  }

  /** Sum of all points for the user */
  balance(userId: number): number {
    const row = this.conn
      .prepare<[number], { balance: number }>(
        'SELECT COALESCE(SUM(points), 0) AS balance FROM points_transactions WHERE user_id = ?'
      )
      .get(userId);
    return row?.balance ?? 0;
  }

  forOrder(orderId: number, kind: TransactionKind): PointsTransaction[] {
    return this.conn
      .prepare<[number, string], PointsTransactionRow>(
        `SELECT * FROM points_transactions
         WHERE reference_order_id = ? AND kind = ?
         ORDER BY id`
      )
      .all(orderId, kind)
      .map(toTransaction);
  }

  hasKindForOrder(orderId: number, kind: TransactionKind): boolean {
    const row = this.conn
      .prepare<[number, string], { found: number }>(
        `SELECT EXISTS (
           SELECT 1 FROM points_transactions WHERE reference_order_id = ? AND kind = ?
         ) AS found`
      )
      .get(orderId, kind);
    return row?.found === 1;
  }

  /**
   * Whether the user earned points on any order other than `orderId`
   */
  hasEarnOutsideOrder(userId: number, orderId: number): boolean {
    const row = this.conn
      .prepare<[number, string, number], { found: number }>(
        `SELECT EXISTS (
           SELECT 1 FROM points_transactions
           WHERE user_id = ? AND kind = ?
             AND (reference_order_id IS NULL OR reference_order_id <> ?)
         ) AS found`
      )
      .get(userId, TransactionKind.EARN, orderId);
    return row?.found === 1;
  }

  hasKindWithDescription(userId: number, kind: TransactionKind, description: string): boolean {
    const row = this.conn
      .prepare<[number, string, string], { found: number }>(
        `SELECT EXISTS (
           SELECT 1 FROM points_transactions WHERE user_id = ? AND kind = ? AND description = ?
         ) AS found`
      )
      .get(userId, kind, description);
    return row?.found === 1;
  }

  /**
   * EARN rows created before `cutoff` that neither an EXPIRE row nor a
   * reversal of their order offsets yet, oldest first
   */
  findExpirable(cutoff: Date): PointsTransaction[] {
    return this.conn
      .prepare<[string], PointsTransactionRow>(
        `SELECT earn.* FROM points_transactions AS earn
         WHERE earn.kind = 'EARN'
           AND earn.created_at < ?
           AND NOT EXISTS (
             SELECT 1 FROM points_transactions AS exp
             WHERE exp.kind = 'EXPIRE' AND exp.source_transaction_id = earn.id
           )
           AND NOT EXISTS (
             SELECT 1 FROM points_transactions AS adj
             WHERE adj.kind = 'ADJUST' AND adj.reference_order_id = earn.reference_order_id
           )
         ORDER BY earn.created_at, earn.id`
      )
      .all(cutoff.toISOString())
      .map(toTransaction);
  }

  /** Newest first */
  listByUser(userId: number, options: ListTransactionsOptions = {}): PointsTransaction[] {
    const limit = options.limit ?? -1;
    if (options.kind) {
      return this.conn
        .prepare<[number, string, number], PointsTransactionRow>(
          `SELECT * FROM points_transactions
           WHERE user_id = ? AND kind = ?
           ORDER BY created_at DESC, id DESC
           LIMIT ?`
        )
        .all(userId, options.kind, limit)
        .map(toTransaction);
    }
    return this.conn
      .prepare<[number, number], PointsTransactionRow>(
        `SELECT * FROM points_transactions
         WHERE user_id = ?
         ORDER BY created_at DESC, id DESC
         LIMIT ?`
      )
      .all(userId, limit)
      .map(toTransaction);
  }
}

function toTransaction(row: PointsTransactionRow): PointsTransaction {
  if (!isTransactionKind(row.kind)) {
    throw new TypeError(`Unknown points transaction kind '${row.kind}' on row ${row.id}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    points: row.points,
    kind: row.kind,
    referenceOrderId: row.reference_order_id,
    orderItemId: row.order_item_id,
    sourceTransactionId: row.source_transaction_id,
    description: row.description,
    createdBy: row.created_by,
    createdAt: new Date(row.created_at),
  };
}
