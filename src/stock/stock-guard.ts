/**
 * StockGuard - atomic reserve/restore of product stock
 */

import { InsufficientStockError, ProductNotFoundError } from '../errors.js';
import { StockOperation, type StockLogEntry } from '../domain/stock/stock-log.js';
import type { LedgerDatabase } from '../infrastructure/sqlite/database.js';
import type { ProductRepository } from '../infrastructure/sqlite/product.repository.js';
import type { StockLogRepository } from '../infrastructure/sqlite/stock-log.repository.js';
import type { Logger } from '../logging/logger.js';

export interface StockMutationOptions {
  orderId?: number | null;
  reason?: string;
}

export interface StockGuardDeps {
  db: LedgerDatabase;
  products: ProductRepository;
  stockLogs: StockLogRepository;
  logger: Logger;
}

/**
 * The only writer of product stock. Each mutation and its stock log row
 * commit together; the check-and-decrement is one conditional UPDATE.
 */
export class StockGuard {
  private readonly db: LedgerDatabase;
  private readonly products: ProductRepository;
  private readonly stockLogs: StockLogRepository;
  private readonly logger: Logger;

  constructor(deps: StockGuardDeps) {
    this.db = deps.db;
    this.products = deps.products;
    this.stockLogs = deps.stockLogs;
    this.logger = deps.logger.child({ component: 'stock-guard' });
  }

  /**
   * @throws {InsufficientStockError} when `quantity` exceeds current stock
   */
  reserve(productId: number, quantity: number, options: StockMutationOptions = {}): StockLogEntry {
    assertQuantity(quantity);
    return this.db.withTransaction(() => {
      const before = this.requireStock(productId);
      if (!this.products.decrementIfAvailable(productId, quantity)) {
        throw new InsufficientStockError(productId, this.requireStock(productId), quantity);
      }
      return this.record(StockOperation.RESERVE, productId, -quantity, before, options);
    });
  }

  /**
   * Reserve up to `quantity`; returns the number of units actually reserved.
   * A shortfall is logged, never thrown.
   */
  reserveAvailable(productId: number, quantity: number, options: StockMutationOptions = {}): number {
    assertQuantity(quantity);
    return this.db.withTransaction(() => {
      const before = this.requireStock(productId);
      const reserved = Math.min(before, quantity);
      if (reserved < quantity) {
        this.logger.warn('Stock shortfall on reservation', {
          product_id: productId,
          order_id: options.orderId ?? null,
          requested: quantity,
          reserved,
        });
      }
      if (reserved === 0) return 0;
      if (!this.products.decrementIfAvailable(productId, reserved)) {
        throw new InsufficientStockError(productId, this.requireStock(productId), reserved);
      }
      this.record(StockOperation.RESERVE, productId, -reserved, before, options);
      return reserved;
    });
  }

  restore(productId: number, quantity: number, options: StockMutationOptions = {}): StockLogEntry {
    assertQuantity(quantity);
    return this.db.withTransaction(() => {
      const before = this.requireStock(productId);
      this.products.increment(productId, quantity);
      return this.record(StockOperation.RESTORE, productId, quantity, before, options);
    });
  }

  available(productId: number): number {
    return this.requireStock(productId);
  }

  history(productId: number): StockLogEntry[] {
    return this.stockLogs.listByProduct(productId);
  }

  private requireStock(productId: number): number {
    const stock = this.products.getStock(productId);
    if (stock === null) {
      throw new ProductNotFoundError(productId);
    }
    return stock;
  }

  private record(
    operation: StockOperation,
    productId: number,
    delta: number,
    before: number,
    options: StockMutationOptions
  ): StockLogEntry {
    const entry = this.stockLogs.append({
      productId,
      orderId: options.orderId ?? null,
      operation,
      quantity: delta,
      stockBefore: before,
      stockAfter: before + delta,
      reason: options.reason ?? '',
    });
    this.logger.debug('Stock updated', {
      product_id: productId,
      operation,
      quantity: delta,
      stock_after: entry.stockAfter,
    });
    return entry;
  }
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new RangeError(`Stock quantity must be a positive integer, got ${quantity}`);
  }
}
