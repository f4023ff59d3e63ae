/**
 * LoyaltyService - the only writer of the points ledger
 */

import { LoyaltyValidationError, ProductNotFoundError, UserNotFoundError } from '../errors.js';
import { LoyaltyTier } from '../domain/loyalty/loyalty-tier.js';
import {
  TransactionKind,
  type PointsTransaction,
} from '../domain/loyalty/points-transaction.js';
import type { Order } from '../domain/order/order.js';
import { Decimal } from '../domain/shared/decimal.js';
import { Money } from '../domain/shared/money.js';
import type { UserAccount } from '../domain/user/user-account.js';
import type { LedgerDatabase } from '../infrastructure/sqlite/database.js';
import type { OrderRepository } from '../infrastructure/sqlite/order.repository.js';
import type {
  ListTransactionsOptions,
  PointsRepository,
} from '../infrastructure/sqlite/points.repository.js';
import type { ProductRepository } from '../infrastructure/sqlite/product.repository.js';
import type { TierRepository } from '../infrastructure/sqlite/tier.repository.js';
import type { UserRepository } from '../infrastructure/sqlite/user.repository.js';
import type { Logger } from '../logging/logger.js';
import { calculateItemPoints, calculateLevel, xpToNextLevel } from './points-calculator.js';
import {
  isRedemptionCurrency,
  readLoyaltySettings,
  readRedemptionRatio,
  type LoyaltySettings,
  type SettingsStore,
} from './settings.js';

export const NEW_CUSTOMER_BONUS_DESCRIPTION = 'New customer bonus';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface LoyaltyServiceDeps {
  db: LedgerDatabase;
  points: PointsRepository;
  users: UserRepository;
  tiers: TierRepository;
  orders: OrderRepository;
  products: ProductRepository;
  settings: SettingsStore;
  logger: Logger;
}

export interface AdjustPointsOptions {
  description?: string;
  createdBy?: string | null;
}

export interface LoyaltySummary {
  userId: number;
  balance: number;
  totalXp: number;
  level: number;
  xpToNextLevel: number;
  tier: LoyaltyTier | null;
  nextTier: LoyaltyTier | null;
}

/**
 * Ledger operations and derived views. Every mutation runs in one
 * transaction spanning its ledger rows and the XP and tier updates.
 * Balance is always the sum of the user's rows; it is never stored.
 */
export class LoyaltyService {
  private readonly deps: LoyaltyServiceDeps;
  private readonly logger: Logger;

  constructor(deps: LoyaltyServiceDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'loyalty' });
  }

  get settings(): LoyaltySettings {
    return readLoyaltySettings(this.deps.settings);
  }

  /**
   * Fresh read of an order, soft-deleted ones included
   */
  findOrder(orderId: number): Order | null {
    return this.deps.orders.findById(orderId, { includeDeleted: true });
  }

  // ==================== Ledger operations ====================

  /**
   * One EARN row per order line. Returns the points awarded, 0 when the
   * order already earned points, belongs to a guest, or does not exist.
   */
  awardOrderPoints(orderId: number): number {
    const settings = this.settings;
    if (!settings.enabled) {
      return 0;
    }
    const { db, points, users, products } = this.deps;

    try {
      return db.withTransaction(() => {
        const order = this.findOrder(orderId);
        if (!order || order.userId === null) {
          return 0;
        }
        if (points.hasKindForOrder(orderId, TransactionKind.EARN)) {
          this.logger.debug('Order points already awarded', { order_id: orderId });
          return 0;
        }
        const user = this.requireUser(order.userId);
        const multiplier = this.tierMultiplier(user);

        let total = 0;
        for (const item of order.items) {
          const product = products.findById(item.productId);
          if (!product) {
            throw new ProductNotFoundError(item.productId);
          }
          const earned = calculateItemPoints(product, item.quantity, multiplier, settings);
          points.insert({
            userId: user.id,
            points: earned,
            kind: TransactionKind.EARN,
            referenceOrderId: orderId,
            orderItemId: item.id,
            description: `Points earned for ${product.name} x${item.quantity}`,
          });
          total += earned;
        }

        users.addXp(user.id, total);
        this.refreshTier(user.id);
        this.logger.info('Order points awarded', {
          order_id: orderId,
          user_id: user.id,
          points: total,
        });
        return total;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.warn('Concurrent award lost the race; points already recorded', {
          order_id: orderId,
        });
        return 0;
      }
      throw error;
    }
  }

  /**
   * Negate the order's EARN rows with ADJUST rows. Each reversal is clamped
   * so the balance never drops below zero; a row clamped to 0 is still
   * written and marks the order as reversed. Returns the points reversed.
   */
  reverseOrderPoints(orderId: number): number {
    if (!this.settings.enabled) {
      return 0;
    }
    const { db, points, users } = this.deps;

    return db.withTransaction(() => {
      const order = this.findOrder(orderId);
      if (!order || order.userId === null) {
        return 0;
      }
      const earned = points.forOrder(orderId, TransactionKind.EARN);
      if (earned.length === 0 || points.hasKindForOrder(orderId, TransactionKind.ADJUST)) {
        return 0;
      }

      const userId = order.userId;
      let balance = points.balance(userId);
      let reversed = 0;
      for (const row of earned) {
        const amount = Math.min(row.points, Math.max(0, balance));
        if (amount < row.points) {
          this.logger.warn('Reversal clamped to balance', {
            order_id: orderId,
            user_id: userId,
            transaction_id: row.id,
            requested: row.points,
            reversed: amount,
          });
        }

        points.insert({
          userId,
          points: 0 - amount,
          kind: TransactionKind.ADJUST,
          referenceOrderId: orderId,
          orderItemId: row.orderItemId,
          description: `Points reversed for order #${orderId}`,
        });
        balance -= amount;
        reversed += amount;
      }

      if (reversed > 0) {
        users.addXp(userId, -reversed);
      }
      this.refreshTier(userId);
      this.logger.info('Order points reversed', {
        order_id: orderId,
        user_id: userId,
        points: reversed,
      });
      return reversed;
    });
  }

  /**
   * Spend `amount` points for a discount in `currency`.
   *
   * @throws {LoyaltyValidationError} before anything is written
   */
  redeemPoints(userId: number, amount: number, currency: string, orderId?: number): Money {
    const code = currency.toUpperCase();
    if (!this.settings.enabled) {
      throw new LoyaltyValidationError('disabled', 'Loyalty program is disabled');
    }
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new LoyaltyValidationError('invalid_amount', 'Points amount must be a positive integer', {
        amount,
      });
    }
    if (!isRedemptionCurrency(code)) {
      throw new LoyaltyValidationError('unsupported_currency', `Unsupported currency: ${currency}`, {
        currency,
      });
    }
    const { db, points, orders } = this.deps;

    return db.withTransaction(() => {
      this.requireUser(userId);
      const balance = points.balance(userId);
      if (amount > balance) {
        throw new LoyaltyValidationError('insufficient_balance', 'Insufficient points balance', {
          balance,
          requested: amount,
        });
      }

      let order: Order | null = null;
      if (orderId !== undefined) {
        order = orders.findById(orderId);
        if (!order) {
          throw new LoyaltyValidationError('order_not_found', `Order ${orderId} not found`, {
            orderId,
          });
        }
        if (order.currency !== code) {
          throw new LoyaltyValidationError(
            'currency_mismatch',
            `Order ${orderId} is in ${order.currency}, not ${code}`,
            { orderId, orderCurrency: order.currency, currency: code }
          );
        }
      }

      const ratio = readRedemptionRatio(this.deps.settings, code);
      const discount = Money.of(Decimal.from(amount).dividedBy(ratio, 2, 'half-up'), code);

      points.insert({
        userId,
        points: -amount,
        kind: TransactionKind.REDEEM,
        referenceOrderId: orderId ?? null,
        description: `Redeemed ${amount} points for ${discount.format()} ${code} discount`,
      });

      if (order) {
        order.storeValueInMetadata('loyaltyPointsRedeemed', amount);
        order.storeValueInMetadata('loyaltyDiscount', discount.toJSON());
        order.touch();
        orders.update(order);
      }

      this.logger.info('Points redeemed', {
        user_id: userId,
        order_id: orderId ?? null,
        points: amount,
        discount: discount.toString(),
      });
      return discount;
    });
  }

  /**
   * Offset EARN rows older than the expiration window with EXPIRE rows.
   * Returns the number of EXPIRE rows written.
   */
  processExpiration(now: Date = new Date()): number {
    const days = this.settings.expirationDays;
    if (days <= 0) {
      return 0;
    }
    const { db, points } = this.deps;
    const cutoff = new Date(now.getTime() - days * DAY_MS);

    return db.withTransaction(() => {
      const balances = new Map<number, number>();
      let created = 0;

      for (const row of points.findExpirable(cutoff)) {
        const balance = balances.get(row.userId) ?? points.balance(row.userId);
        const amount = Math.min(row.points, Math.max(0, balance));
        if (amount < row.points) {
          this.logger.warn('Expiration clamped to balance', {
            user_id: row.userId,
            transaction_id: row.id,
            requested: row.points,
            expired: amount,
          });
        }

        // Written even when clamped to 0 so the EARN row counts as offset
        points.insert({
          userId: row.userId,
          points: 0 - amount,
          kind: TransactionKind.EXPIRE,
          referenceOrderId: row.referenceOrderId,
          sourceTransactionId: row.id,
          description: `Points expired from transaction ${row.id}`,
        });
        balances.set(row.userId, balance - amount);
        created++;
      }

      if (created > 0) {
        this.logger.info('Points expired', { transactions: created, cutoff });
      }
      return created;
    });
  }

  /**
   * One-time BONUS for a user whose first earning order is `orderId`.
   * Returns the bonus points, or 0.
   */
  checkNewCustomerBonus(userId: number, orderId: number): number {
    const settings = this.settings;
    if (!settings.newCustomerBonusEnabled || settings.newCustomerBonusPoints <= 0) {
      return 0;
    }
    const { db, points } = this.deps;

    return db.withTransaction(() => {
      this.requireUser(userId);
      if (points.hasEarnOutsideOrder(userId, orderId)) {
        return 0;
      }
      if (
        points.hasKindWithDescription(userId, TransactionKind.BONUS, NEW_CUSTOMER_BONUS_DESCRIPTION)
      ) {
        return 0;
      }

      points.insert({
        userId,
        points: settings.newCustomerBonusPoints,
        kind: TransactionKind.BONUS,
        referenceOrderId: orderId,
        description: NEW_CUSTOMER_BONUS_DESCRIPTION,
      });
      this.logger.info('New customer bonus awarded', {
        user_id: userId,
        order_id: orderId,
        points: settings.newCustomerBonusPoints,
      });
      return settings.newCustomerBonusPoints;
    });
  }

  /**
   * Manual correction. XP moves by the same delta, floored at zero.
   *
   * @throws {LoyaltyValidationError} for a zero or fractional delta, or a
   *   deduction larger than the balance
   */
  adjustPoints(userId: number, delta: number, options: AdjustPointsOptions = {}): PointsTransaction {
    if (!Number.isInteger(delta) || delta === 0) {
      throw new LoyaltyValidationError('invalid_amount', 'Adjustment must be a non-zero integer', {
        delta,
      });
    }
    const { db, points, users } = this.deps;

    return db.withTransaction(() => {
      this.requireUser(userId);
      const balance = points.balance(userId);
      if (balance + delta < 0) {
        throw new LoyaltyValidationError('insufficient_balance', 'Insufficient points balance', {
          balance,
          requested: -delta,
        });
      }

      const tx = points.insert({
        userId,
        points: delta,
        kind: TransactionKind.ADJUST,
        description: options.description ?? 'Manual adjustment',
        createdBy: options.createdBy ?? null,
      });
      users.addXp(userId, delta);
      this.refreshTier(userId);
      this.logger.info('Points adjusted', {
        user_id: userId,
        points: delta,
        created_by: options.createdBy ?? null,
      });
      return tx;
    });
  }

  // ==================== Derived views ====================

  getBalance(userId: number): number {
    return this.deps.points.balance(userId);
  }

  getLevel(userId: number): number {
    return calculateLevel(this.requireUser(userId).totalXp, this.settings.xpPerLevel);
  }

  getTier(userId: number): LoyaltyTier | null {
    return LoyaltyTier.forLevel(this.deps.tiers.list(), this.getLevel(userId));
  }

  /**
   * Store the derived tier on the user. Returns it.
   */
  recalculateTier(userId: number): LoyaltyTier | null {
    return this.deps.db.withTransaction(() => this.refreshTier(userId));
  }

  getSummary(userId: number): LoyaltySummary {
    const user = this.requireUser(userId);
    const { xpPerLevel } = this.settings;
    const level = calculateLevel(user.totalXp, xpPerLevel);
    const tiers = this.deps.tiers.list();
    return {
      userId,
      balance: this.getBalance(userId),
      totalXp: user.totalXp,
      level,
      xpToNextLevel: xpToNextLevel(user.totalXp, xpPerLevel),
      tier: LoyaltyTier.forLevel(tiers, level),
      nextTier: LoyaltyTier.nextAfter(tiers, level),
    };
  }

  listTransactions(userId: number, options: ListTransactionsOptions = {}): PointsTransaction[] {
    return this.deps.points.listByUser(userId, options);
  }

  /**
   * Points one unit of the product would earn, at the user's tier when given
   */
  getProductPotentialPoints(productId: number, userId?: number): number {
    const settings = this.settings;
    if (!settings.enabled) {
      return 0;
    }
    const product = this.deps.products.findById(productId);
    if (!product) {
      throw new ProductNotFoundError(productId);
    }
    const multiplier =
      userId === undefined ? Decimal.ONE : this.tierMultiplier(this.requireUser(userId));
    return calculateItemPoints(product, 1, multiplier, settings);
  }

  // ==================== Internals ====================

  private requireUser(userId: number): UserAccount {
    const user = this.deps.users.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    return user;
  }

  /** Multiplier of the user's cached tier, 1 without one */
  private tierMultiplier(user: UserAccount): Decimal {
    if (user.loyaltyTierId === null) {
      return Decimal.ONE;
    }
    return this.deps.tiers.findById(user.loyaltyTierId)?.pointsMultiplier ?? Decimal.ONE;
  }

  private refreshTier(userId: number): LoyaltyTier | null {
    const user = this.requireUser(userId);
    const level = calculateLevel(user.totalXp, this.settings.xpPerLevel);
    const tier = LoyaltyTier.forLevel(this.deps.tiers.list(), level);
    const tierId = tier?.id ?? null;
    if (tierId !== user.loyaltyTierId) {
      this.deps.users.setTier(userId, tierId);
      this.logger.info('Loyalty tier changed', {
        user_id: userId,
        level,
        tier: tier?.name ?? null,
      });
    }
    return tier;
  }
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_CONSTRAINT')
  );
}
