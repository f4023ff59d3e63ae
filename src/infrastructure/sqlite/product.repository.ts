import type { Statement } from 'better-sqlite3';
import { Product, type ProductProps } from '../../domain/catalog/product.js';
import { Decimal } from '../../domain/shared/decimal.js';
import { Money } from '../../domain/shared/money.js';
import type { LedgerDatabase } from './database.js';
import { toRowId, type ProductRow } from './rows.js';

export type NewProduct = Omit<ProductProps, 'id'>;

/**
 * Catalog rows. Stock only changes through the conditional statements below.
 */
export class ProductRepository {
  private readonly insertStmt: Statement<
    [string, string, string, string, string, number, string, number]
  >;
  private readonly byIdStmt: Statement<[number], ProductRow>;
  private readonly stockStmt: Statement<[number], { stock: number }>;
  private readonly decrementStmt: Statement<[number, number, number]>;
  private readonly incrementStmt: Statement<[number, number]>;

  constructor(db: LedgerDatabase) {
    const conn = db.connection;
    this.insertStmt = conn.prepare<[string, string, string, string, string, number, string, number]>(
      `INSERT INTO products
         (name, price, currency, vat_percent, discount_percent, stock, points_coefficient, fixed_bonus_points)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    this.byIdStmt = conn.prepare<[number], ProductRow>('SELECT * FROM products WHERE id = ?');
    this.stockStmt = conn.prepare<[number], { stock: number }>('SELECT stock FROM products WHERE id = ?');
    this.decrementStmt = conn.prepare<[number, number, number]>(
      'UPDATE products SET stock = stock - ? WHERE id = ? AND stock >= ?'
    );
    this.incrementStmt = conn.prepare<[number, number]>('UPDATE products SET stock = stock + ? WHERE id = ?');
  }

  create(input: NewProduct): Product {
    // Validate before writing
    const draft = new Product({ ...input, id: 0 });
    const info = this.insertStmt.run(
      draft.name,
      draft.price.amount.toString(),
      draft.currency,
      draft.vatPercent.toString(),
      draft.discountPercent.toString(),
      draft.stock,
      draft.pointsCoefficient.toString(),
      draft.fixedBonusPoints
    );
    return new Product({ ...draft.toProps(), id: toRowId(info.lastInsertRowid) });
  }

  findById(id: number): Product | null {
    const row = this.byIdStmt.get(id);
    return row ? toProduct(row) : null;
  }

  getStock(id: number): number | null {
    return this.stockStmt.get(id)?.stock ?? null;
  }

  /**
   * Decrement stock by `quantity` only if that much is available.
   * Returns false when nothing was changed.
   */
  decrementIfAvailable(id: number, quantity: number): boolean {
    return this.decrementStmt.run(quantity, id, quantity).changes > 0;
  }

  increment(id: number, quantity: number): boolean {
    return this.incrementStmt.run(quantity, id).changes > 0;
  }
}

function toProduct(row: ProductRow): Product {
  return new Product({
    id: row.id,
    name: row.name,
    price: Money.of(row.price, row.currency),
    vatPercent: Decimal.from(row.vat_percent),
    discountPercent: Decimal.from(row.discount_percent),
    stock: row.stock,
    pointsCoefficient: Decimal.from(row.points_coefficient),
    fixedBonusPoints: row.fixed_bonus_points,
  });
}
