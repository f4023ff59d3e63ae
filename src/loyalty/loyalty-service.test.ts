import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { resetConfiguration } from '../config.js';
import { LoyaltyValidationError, UserNotFoundError } from '../errors.js';
import type { Order } from '../domain/order/order.js';
import { Money } from '../domain/shared/money.js';
import type { UserAccount } from '../domain/user/user-account.js';
import { createTestLedger, randomInt, seededRandom, type TestLedger } from '../testing/fixtures.js';
import type { SettingValue } from './settings.js';

function captureLoyaltyError(fn: () => unknown): LoyaltyValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LoyaltyValidationError) return error;
    throw error;
  }
  throw new Error('Expected a LoyaltyValidationError');
}

describe('LoyaltyService', () => {
  let ledger: TestLedger;
  let user: UserAccount;

  function setup(settings: Record<string, SettingValue> = {}): void {
    ledger = createTestLedger({ LOYALTY_ENABLED: true, ...settings });
    user = ledger.createUser();
  }

  afterEach(async () => {
    await ledger.runtime.close();
    resetConfiguration();
  });

  function placeOrder(price: string, quantity: number, userId: number | null = user.id): Order {
    const product = ledger.createProduct({ price: Money.of(price, 'EUR'), stock: 100 });
    return ledger.runtime.orders.createOrder({
      userId,
      items: [{ productId: product.id, quantity }],
    });
  }

  function currentUser(): UserAccount {
    const found = ledger.runtime.repositories.users.findById(user.id);
    if (!found) throw new Error(`User ${user.id} disappeared`);
    return found;
  }

  describe('awardOrderPoints()', () => {
    beforeEach(() => setup());

    it('should award points once per order', () => {
      const order = placeOrder('100.00', 2);
      const { loyalty } = ledger.runtime;

      expect(loyalty.awardOrderPoints(order.id)).toBe(200);
      expect(loyalty.awardOrderPoints(order.id)).toBe(0);

      expect(loyalty.getBalance(user.id)).toBe(200);
      expect(currentUser().totalXp).toBe(200);
      const earned = loyalty.listTransactions(user.id, { kind: 'EARN' });
      expect(earned).toHaveLength(1);
      expect(earned[0]).toMatchObject({
        points: 200,
        referenceOrderId: order.id,
        orderItemId: order.items[0]?.id,
        description: 'Points earned for Widget x2',
      });
    });

    it('should cache the tier reached by the award', () => {
      const order = placeOrder('100.00', 2);

      ledger.runtime.loyalty.awardOrderPoints(order.id);

      expect(ledger.runtime.loyalty.getTier(user.id)?.name).toBe('Bronze');
      expect(currentUser().loyaltyTierId).toBe(ledger.runtime.loyalty.getTier(user.id)?.id);
    });

    it('should write one row per order line', () => {
      const first = ledger.createProduct({ name: 'Lamp', price: Money.of('10.99', 'EUR') });
      const second = ledger.createProduct({ name: 'Bulb', price: Money.of('2.50', 'EUR') });
      const order = ledger.runtime.orders.createOrder({
        userId: user.id,
        items: [
          { productId: first.id, quantity: 3 },
          { productId: second.id, quantity: 1 },
        ],
      });

      expect(ledger.runtime.loyalty.awardOrderPoints(order.id)).toBe(34);
      expect(
        ledger.runtime.loyalty
          .listTransactions(user.id)
          .map((tx) => tx.points)
          .sort((a, b) => a - b)
      ).toEqual([2, 32]);
    });

    it('should skip guest and unknown orders', () => {
      const guest = placeOrder('100.00', 1, null);

      expect(ledger.runtime.loyalty.awardOrderPoints(guest.id)).toBe(0);
      expect(ledger.runtime.loyalty.awardOrderPoints(999)).toBe(0);
    });

    it('should multiply by the cached tier when multipliers are on', () => {
      ledger.settings.set('LOYALTY_TIER_MULTIPLIER_ENABLED', true);
      ledger.runtime.loyalty.adjustPoints(user.id, 4000);
      const order = placeOrder('100.00', 2);

      expect(ledger.runtime.loyalty.awardOrderPoints(order.id)).toBe(250);
      expect(currentUser().totalXp).toBe(4250);
    });
  });

  describe('when the program is disabled', () => {
    beforeEach(() => setup({ LOYALTY_ENABLED: false }));

    it('should award and reverse nothing', () => {
      const order = placeOrder('100.00', 2);

      expect(ledger.runtime.loyalty.awardOrderPoints(order.id)).toBe(0);
      expect(ledger.runtime.loyalty.reverseOrderPoints(order.id)).toBe(0);
      expect(ledger.runtime.loyalty.getProductPotentialPoints(order.items[0]?.productId ?? 0)).toBe(0);
    });

    it('should refuse redemptions', () => {
      const error = captureLoyaltyError(() => ledger.runtime.loyalty.redeemPoints(user.id, 10, 'EUR'));

      expect(error.reason).toBe('disabled');
    });
  });

  describe('reverseOrderPoints()', () => {
    beforeEach(() => setup());

    it('should negate the earned points', () => {
      const order = placeOrder('100.00', 2);
      const { loyalty } = ledger.runtime;
      loyalty.awardOrderPoints(order.id);

      expect(loyalty.reverseOrderPoints(order.id)).toBe(200);

      expect(loyalty.getBalance(user.id)).toBe(0);
      expect(currentUser().totalXp).toBe(0);
      const adjustments = loyalty.listTransactions(user.id, { kind: 'ADJUST' });
      expect(adjustments).toHaveLength(1);
      expect(adjustments[0]).toMatchObject({
        points: -200,
        referenceOrderId: order.id,
        description: `Points reversed for order #${order.id}`,
      });
    });

    it('should clamp the reversal to the balance and run only once', () => {
      const order = placeOrder('120.00', 2);
      const { loyalty } = ledger.runtime;
      expect(loyalty.awardOrderPoints(order.id)).toBe(240);
      loyalty.adjustPoints(user.id, -210);

      expect(loyalty.reverseOrderPoints(order.id)).toBe(30);
      expect(loyalty.reverseOrderPoints(order.id)).toBe(0);

      expect(loyalty.getBalance(user.id)).toBe(0);
      expect(currentUser().totalXp).toBe(0);
      const warning = ledger.output.find('Reversal clamped to balance');
      expect(warning?.['requested']).toBe(240);
      expect(warning?.['reversed']).toBe(30);
    });

    it('should mark a reversal clamped to zero so it is not repeated', () => {
      const order = placeOrder('120.00', 2);
      const { loyalty } = ledger.runtime;
      loyalty.awardOrderPoints(order.id);
      loyalty.adjustPoints(user.id, -240);

      expect(loyalty.reverseOrderPoints(order.id)).toBe(0);
      loyalty.adjustPoints(user.id, 100);
      expect(loyalty.reverseOrderPoints(order.id)).toBe(0);

      expect(loyalty.getBalance(user.id)).toBe(100);
      const reversals = loyalty
        .listTransactions(user.id, { kind: 'ADJUST' })
        .filter((tx) => tx.referenceOrderId === order.id);
      expect(reversals).toHaveLength(1);
      expect(reversals[0]?.points).toBe(0);
    });

    it('should do nothing for an order that never earned', () => {
      const order = placeOrder('100.00', 1);

      expect(ledger.runtime.loyalty.reverseOrderPoints(order.id)).toBe(0);
      expect(ledger.runtime.loyalty.listTransactions(user.id)).toEqual([]);
    });
  });

  describe('redeemPoints()', () => {
    beforeEach(() => setup());

    it('should refuse to spend more than the balance', () => {
      const { loyalty } = ledger.runtime;
      loyalty.adjustPoints(user.id, 50);

      const error = captureLoyaltyError(() => loyalty.redeemPoints(user.id, 100, 'EUR'));

      expect(error.reason).toBe('insufficient_balance');
      expect(error.message).toBe('Insufficient points balance');
      expect(error.details).toEqual({ balance: 50, requested: 100 });
      expect(loyalty.listTransactions(user.id)).toHaveLength(1);
      expect(loyalty.getBalance(user.id)).toBe(50);
    });

    it('should convert points at the currency ratio', () => {
      const { loyalty } = ledger.runtime;
      loyalty.adjustPoints(user.id, 150);

      const discount = loyalty.redeemPoints(user.id, 150, 'eur');

      expect(discount.toJSON()).toEqual({ amount: '1.5', currency: 'EUR' });
      expect(loyalty.getBalance(user.id)).toBe(0);
      expect(loyalty.listTransactions(user.id, { kind: 'REDEEM' })[0]).toMatchObject({
        points: -150,
        referenceOrderId: null,
        description: 'Redeemed 150 points for 1.50 EUR discount',
      });
    });

    it('should round the discount to cents', () => {
      ledger.settings.set('LOYALTY_REDEMPTION_RATIO_EUR', 30);
      ledger.runtime.loyalty.adjustPoints(user.id, 100);

      expect(ledger.runtime.loyalty.redeemPoints(user.id, 100, 'EUR').amount.toString()).toBe('3.33');
    });

    it('should record the discount on the order', () => {
      const order = placeOrder('100.00', 1);
      ledger.runtime.loyalty.adjustPoints(user.id, 100);

      ledger.runtime.loyalty.redeemPoints(user.id, 100, 'EUR', order.id);

      const stored = ledger.runtime.orders.getOrder(order.id);
      expect(stored.metadata['loyaltyPointsRedeemed']).toBe(100);
      expect(stored.metadata['loyaltyDiscount']).toEqual({ amount: '1', currency: 'EUR' });
    });

    it('should validate amount and currency before touching the ledger', () => {
      const { loyalty } = ledger.runtime;
      loyalty.adjustPoints(user.id, 100);

      expect(captureLoyaltyError(() => loyalty.redeemPoints(user.id, 0, 'EUR')).reason).toBe(
        'invalid_amount'
      );
      expect(captureLoyaltyError(() => loyalty.redeemPoints(user.id, 2.5, 'EUR')).reason).toBe(
        'invalid_amount'
      );
      expect(captureLoyaltyError(() => loyalty.redeemPoints(user.id, 10, 'GBP')).reason).toBe(
        'unsupported_currency'
      );
      expect(captureLoyaltyError(() => loyalty.redeemPoints(user.id, 10, 'EUR', 999)).reason).toBe(
        'order_not_found'
      );
      expect(loyalty.getBalance(user.id)).toBe(100);
    });

    it('should refuse an order in another currency', () => {
      const order = placeOrder('100.00', 1);
      ledger.runtime.loyalty.adjustPoints(user.id, 100);

      const error = captureLoyaltyError(() =>
        ledger.runtime.loyalty.redeemPoints(user.id, 10, 'USD', order.id)
      );

      expect(error.reason).toBe('currency_mismatch');
      expect(ledger.runtime.loyalty.getBalance(user.id)).toBe(100);
    });

    it('should reject unknown users', () => {
      expect(() => ledger.runtime.loyalty.redeemPoints(999, 10, 'EUR')).toThrow(UserNotFoundError);
    });
  });

  describe('processExpiration()', () => {
    const now = new Date('2026-03-01T00:00:00.000Z');

    beforeEach(() => setup({ LOYALTY_POINTS_EXPIRATION_DAYS: 30 }));

    function earn(points: number, createdAt: string, order?: Order) {
      return ledger.runtime.repositories.points.insert({
        userId: user.id,
        points,
        kind: 'EARN',
        referenceOrderId: order?.id ?? null,
        orderItemId: order?.items[0]?.id ?? null,
        description: 'seed',
        createdAt: new Date(createdAt),
      });
    }

    it('should offset old EARN rows once', () => {
      const old = earn(100, '2026-01-01T00:00:00.000Z');
      earn(40, '2026-02-20T00:00:00.000Z');
      const { loyalty } = ledger.runtime;

      expect(loyalty.processExpiration(now)).toBe(1);
      expect(loyalty.processExpiration(now)).toBe(0);

      expect(loyalty.getBalance(user.id)).toBe(40);
      expect(loyalty.listTransactions(user.id, { kind: 'EXPIRE' })).toEqual([
        expect.objectContaining({
          points: -100,
          sourceTransactionId: old.id,
          description: `Points expired from transaction ${old.id}`,
        }),
      ]);
    });

    it('should clamp expiration to the balance', () => {
      earn(100, '2026-01-01T00:00:00.000Z');
      ledger.runtime.loyalty.redeemPoints(user.id, 80, 'EUR');

      expect(ledger.runtime.loyalty.processExpiration(now)).toBe(1);

      expect(ledger.runtime.loyalty.getBalance(user.id)).toBe(0);
      expect(ledger.output.find('Expiration clamped to balance')?.['expired']).toBe(20);
    });

    it('should skip points already taken back by a reversal', () => {
      const order = placeOrder('100.00', 1);
      earn(100, '2026-01-01T00:00:00.000Z', order);
      const { loyalty } = ledger.runtime;
      expect(loyalty.reverseOrderPoints(order.id)).toBe(100);
      loyalty.adjustPoints(user.id, 500);

      expect(loyalty.processExpiration(now)).toBe(0);

      expect(loyalty.getBalance(user.id)).toBe(500);
      expect(loyalty.listTransactions(user.id, { kind: 'EXPIRE' })).toEqual([]);
    });

    it('should do nothing when expiration is off', () => {
      ledger.settings.set('LOYALTY_POINTS_EXPIRATION_DAYS', 0);
      earn(100, '2026-01-01T00:00:00.000Z');

      expect(ledger.runtime.loyalty.processExpiration(now)).toBe(0);
      expect(ledger.runtime.loyalty.getBalance(user.id)).toBe(100);
    });
  });

  describe('checkNewCustomerBonus()', () => {
    beforeEach(() => setup({ LOYALTY_NEW_CUSTOMER_BONUS_ENABLED: true }));

    it('should grant the bonus on the first earning order only', () => {
      const order = placeOrder('100.00', 1);
      const { loyalty } = ledger.runtime;
      loyalty.awardOrderPoints(order.id);

      expect(loyalty.checkNewCustomerBonus(user.id, order.id)).toBe(100);
      expect(loyalty.checkNewCustomerBonus(user.id, order.id)).toBe(0);

      expect(loyalty.getBalance(user.id)).toBe(200);
      expect(currentUser().totalXp).toBe(100);
      expect(loyalty.listTransactions(user.id, { kind: 'BONUS' })[0]?.description).toBe(
        'New customer bonus'
      );
    });

    it('should skip customers who earned on an earlier order', () => {
      const first = placeOrder('100.00', 1);
      const second = placeOrder('100.00', 1);
      ledger.runtime.loyalty.awardOrderPoints(first.id);
      ledger.runtime.loyalty.awardOrderPoints(second.id);

      expect(ledger.runtime.loyalty.checkNewCustomerBonus(user.id, second.id)).toBe(0);
    });

    it('should grant nothing when the bonus is off', () => {
      ledger.settings.set('LOYALTY_NEW_CUSTOMER_BONUS_ENABLED', false);
      const order = placeOrder('100.00', 1);

      expect(ledger.runtime.loyalty.checkNewCustomerBonus(user.id, order.id)).toBe(0);
    });
  });

  describe('adjustPoints()', () => {
    beforeEach(() => setup());

    it('should record who made the adjustment', () => {
      const tx = ledger.runtime.loyalty.adjustPoints(user.id, 25, { createdBy: 'admin' });

      expect(tx).toMatchObject({
        points: 25,
        kind: 'ADJUST',
        description: 'Manual adjustment',
        createdBy: 'admin',
      });
      expect(currentUser().totalXp).toBe(25);
    });

    it('should reject zero and over-deductions', () => {
      const { loyalty } = ledger.runtime;
      loyalty.adjustPoints(user.id, 10);

      const zero = captureLoyaltyError(() => loyalty.adjustPoints(user.id, 0));
      expect(zero.reason).toBe('invalid_amount');
      expect(zero.message).toBe('Adjustment must be a non-zero integer');
      expect(captureLoyaltyError(() => loyalty.adjustPoints(user.id, -11)).reason).toBe(
        'insufficient_balance'
      );
      expect(loyalty.getBalance(user.id)).toBe(10);
    });
  });

  describe('derived views', () => {
    beforeEach(() => setup());

    it('should summarize balance, level and tiers', () => {
      ledger.runtime.loyalty.adjustPoints(user.id, 4000);

      const summary = ledger.runtime.loyalty.getSummary(user.id);

      expect(summary).toMatchObject({
        userId: user.id,
        balance: 4000,
        totalXp: 4000,
        level: 5,
        xpToNextLevel: 1000,
      });
      expect(summary.tier?.name).toBe('Silver');
      expect(summary.nextTier?.name).toBe('Gold');
    });

    it('should place a new customer in the first tier', () => {
      const summary = ledger.runtime.loyalty.getSummary(user.id);

      expect(summary.level).toBe(1);
      expect(summary.tier?.name).toBe('Bronze');
      expect(summary.nextTier?.name).toBe('Silver');
    });

    it('should price potential points at the user tier', () => {
      ledger.settings.set('LOYALTY_TIER_MULTIPLIER_ENABLED', true);
      const product = ledger.createProduct();
      ledger.runtime.loyalty.adjustPoints(user.id, 4000);

      expect(ledger.runtime.loyalty.getProductPotentialPoints(product.id)).toBe(100);
      expect(ledger.runtime.loyalty.getProductPotentialPoints(product.id, user.id)).toBe(125);
    });

    it('should limit listed transactions', () => {
      const { loyalty } = ledger.runtime;
      loyalty.adjustPoints(user.id, 1);
      loyalty.adjustPoints(user.id, 2);
      loyalty.adjustPoints(user.id, 3);

      expect(loyalty.listTransactions(user.id, { limit: 2 }).map((tx) => tx.points)).toEqual([3, 2]);
    });
  });

  describe('balance', () => {
    beforeEach(() => setup());

    it('should never go negative under any sequence of operations', () => {
      const random = seededRandom(99);
      const { loyalty } = ledger.runtime;
      const product = ledger.createProduct({ price: Money.of('10.00', 'EUR'), stock: 1000 });
      const awarded: number[] = [];

      for (let step = 0; step < 80; step++) {
        const amount = randomInt(random, 1, 300);
        try {
          switch (randomInt(random, 0, 4)) {
            case 0:
              loyalty.adjustPoints(user.id, amount);
              break;
            case 1:
              loyalty.adjustPoints(user.id, -amount);
              break;
            case 2:
              loyalty.redeemPoints(user.id, amount, 'EUR');
              break;
            case 3: {
              const order = ledger.runtime.orders.createOrder({
                userId: user.id,
                items: [{ productId: product.id, quantity: randomInt(random, 1, 3) }],
              });
              loyalty.awardOrderPoints(order.id);
              awarded.push(order.id);
              break;
            }
            default: {
              const orderId = awarded[randomInt(random, 0, Math.max(0, awarded.length - 1))];
              if (orderId !== undefined) loyalty.reverseOrderPoints(orderId);
            }
          }
        } catch (error) {
          if (!(error instanceof LoyaltyValidationError)) throw error;
        }

        const balance = loyalty.getBalance(user.id);
        expect(balance).toBeGreaterThanOrEqual(0);
        expect(loyalty.listTransactions(user.id).reduce((sum, tx) => sum + tx.points, 0)).toBe(balance);
        expect(currentUser().totalXp).toBeGreaterThanOrEqual(0);
      }
    });
  });
});
