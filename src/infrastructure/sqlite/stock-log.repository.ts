import type { Database } from 'better-sqlite3';
import {
  StockOperation,
  type NewStockLogEntry,
  type StockLogEntry,
} from '../../domain/stock/stock-log.js';
import type { LedgerDatabase } from './database.js';
import { toRowId, type StockLogRow } from './rows.js';

export class StockLogRepository {
  private readonly conn: Database;

  constructor(db: LedgerDatabase) {
    this.conn = db.connection;
  }

  append(entry: NewStockLogEntry): StockLogEntry {
    const createdAt = entry.createdAt ?? new Date();
    const info = this.conn
      .prepare<[number, number | null, string, number, number, number, string, string]>(
        `INSERT INTO stock_logs
           (product_id, order_id, operation, quantity, stock_before, stock_after, reason, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.productId,
        entry.orderId,
        entry.operation,
        entry.quantity,
        entry.stockBefore,
        entry.stockAfter,
        entry.reason,
        createdAt.toISOString()
      );
    return { ...entry, id: toRowId(info.lastInsertRowid), createdAt };
  }

  listByProduct(productId: number): StockLogEntry[] {
    return this.conn
      .prepare<[number], StockLogRow>('SELECT * FROM stock_logs WHERE product_id = ? ORDER BY id')
      .all(productId)
      .map(toEntry);
  }

  listByOrder(orderId: number): StockLogEntry[] {
    return this.conn
      .prepare<[number], StockLogRow>('SELECT * FROM stock_logs WHERE order_id = ? ORDER BY id')
      .all(orderId)
      .map(toEntry);
  }
}

function toEntry(row: StockLogRow): StockLogEntry {
  return {
    id: row.id,
    productId: row.product_id,
    orderId: row.order_id,
    operation: row.operation === StockOperation.RESTORE ? StockOperation.RESTORE : StockOperation.RESERVE,
    quantity: row.quantity,
    stockBefore: row.stock_before,
    stockAfter: row.stock_after,
    reason: row.reason,
    createdAt: new Date(row.created_at),
  };
}
