import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { resetConfiguration } from '../config.js';
import { InsufficientStockError, ProductNotFoundError } from '../errors.js';
import { createTestLedger, randomInt, seededRandom, type TestLedger } from '../testing/fixtures.js';

describe('StockGuard', () => {
  let ledger: TestLedger;

  beforeEach(() => {
    ledger = createTestLedger();
  });

  afterEach(async () => {
    await ledger.runtime.close();
    resetConfiguration();
  });

  describe('reserve()', () => {
    it('should decrement stock and log the reservation', () => {
      const product = ledger.createProduct({ stock: 5 });
      const { stock } = ledger.runtime;

      const entry = stock.reserve(product.id, 3, { orderId: null, reason: 'manual hold' });

      expect(stock.available(product.id)).toBe(2);
      expect(entry).toMatchObject({
        productId: product.id,
        orderId: null,
        operation: 'RESERVE',
        quantity: -3,
        stockBefore: 5,
        stockAfter: 2,
        reason: 'manual hold',
      });
    });

    it('should refuse to oversell and leave stock untouched', () => {
      const product = ledger.createProduct({ stock: 2 });
      const { stock } = ledger.runtime;

      let caught: unknown;
      try {
        stock.reserve(product.id, 3);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InsufficientStockError);
      expect(caught).toMatchObject({ productId: product.id, available: 2, requested: 3 });
      expect(stock.available(product.id)).toBe(2);
      expect(stock.history(product.id)).toEqual([]);
    });

    it('should allow reserving the last unit', () => {
      const product = ledger.createProduct({ stock: 1 });

      ledger.runtime.stock.reserve(product.id, 1);

      expect(ledger.runtime.stock.available(product.id)).toBe(0);
    });

    it('should reject unknown products and non-positive quantities', () => {
      const product = ledger.createProduct();

      expect(() => ledger.runtime.stock.reserve(999, 1)).toThrow(ProductNotFoundError);
      expect(() => ledger.runtime.stock.reserve(product.id, 0)).toThrow(RangeError);
      expect(() => ledger.runtime.stock.reserve(product.id, 1.5)).toThrow(RangeError);
    });
  });

  describe('reserveAvailable()', () => {
    it('should reserve what is left and warn about the shortfall', () => {
      const product = ledger.createProduct({ stock: 2 });

      const reserved = ledger.runtime.stock.reserveAvailable(product.id, 5, { orderId: 4 });

      expect(reserved).toBe(2);
      expect(ledger.runtime.stock.available(product.id)).toBe(0);
      const warning = ledger.output.find('Stock shortfall on reservation');
      expect(warning?.['requested']).toBe(5);
      expect(warning?.['reserved']).toBe(2);
    });

    it('should reserve nothing from an empty shelf', () => {
      const product = ledger.createProduct({ stock: 0 });

      expect(ledger.runtime.stock.reserveAvailable(product.id, 1)).toBe(0);
      expect(ledger.runtime.stock.history(product.id)).toEqual([]);
    });
  });

  describe('restore()', () => {
    it('should return units to stock', () => {
      const product = ledger.createProduct({ stock: 5 });
      const { stock } = ledger.runtime;
      stock.reserve(product.id, 4);

      const entry = stock.restore(product.id, 4, { reason: 'canceled' });

      expect(stock.available(product.id)).toBe(5);
      expect(entry).toMatchObject({ operation: 'RESTORE', quantity: 4, stockBefore: 1, stockAfter: 5 });
      expect(stock.history(product.id).map((log) => log.operation)).toEqual(['RESERVE', 'RESTORE']);
    });
  });

  describe('no oversell', () => {
    it('should never let reservations exceed the initial stock', async () => {
      const random = seededRandom(20240501);

      for (let round = 0; round < 20; round++) {
        const initial = randomInt(random, 0, 12);
        const product = ledger.createProduct({ stock: initial });
        const requests = Array.from({ length: 15 }, () => randomInt(random, 1, 4));

        const outcomes = await Promise.all(
          requests.map(async (quantity) => {
            try {
              ledger.runtime.stock.reserve(product.id, quantity);
              return quantity;
            } catch (error) {
              if (error instanceof InsufficientStockError) return 0;
              throw error;
            }
          })
        );

        const reserved = outcomes.reduce((sum, quantity) => sum + quantity, 0);
        expect(reserved).toBeLessThanOrEqual(initial);
        expect(ledger.runtime.stock.available(product.id)).toBe(initial - reserved);
      }
    });

    it('should grant exactly the stock when every request asks for one unit', async () => {
      const product = ledger.createProduct({ stock: 7 });

      const outcomes = await Promise.all(
        Array.from({ length: 12 }, async () => {
          try {
            ledger.runtime.stock.reserve(product.id, 1);
            return true;
          } catch (error) {
            if (error instanceof InsufficientStockError) return false;
            throw error;
          }
        })
      );

      expect(outcomes.filter(Boolean)).toHaveLength(7);
      expect(ledger.runtime.stock.available(product.id)).toBe(0);
    });
  });
});
