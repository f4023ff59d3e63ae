/**
 * Points and level arithmetic. Pure functions over exact decimals.
 */

import type { Product } from '../domain/catalog/product.js';
import { Decimal, type DecimalInput } from '../domain/shared/decimal.js';
import { PriceBasis, type LoyaltySettings } from './settings.js';

export type PointsSettings = Pick<
  LoyaltySettings,
  'pointsFactor' | 'priceBasis' | 'tierMultiplierEnabled'
>;

/** The parts of a product the points formula reads */
export type PointsProduct = Pick<
  Product,
  'price' | 'vatPercent' | 'discountPercent' | 'pointsCoefficient' | 'fixedBonusPoints'
>;

function percentOf(amount: Decimal, percent: Decimal): Decimal {
  // Dividing by 100 with two extra digits is exact
  return amount.times(percent).dividedBy(100, amount.scale + percent.scale + 2, 'down');
}

/**
 * Unit price the points factor applies to
 */
export function priceBasisValue(product: PointsProduct, basis: PriceBasis): Decimal {
  const price = product.price.amount;
  switch (basis) {
    case PriceBasis.PRICE_EXCL_VAT_NO_DISCOUNT:
      return price;
    case PriceBasis.PRICE_EXCL_VAT_WITH_DISCOUNT:
      return price.minus(percentOf(price, product.discountPercent));
    case PriceBasis.PRICE_INCL_VAT_NO_DISCOUNT:
      return price.plus(percentOf(price, product.vatPercent));
    case PriceBasis.FINAL_PRICE:
      return price
        .plus(percentOf(price, product.vatPercent))
        .minus(percentOf(price, product.discountPercent));
  }
}

/**
 * `trunc(basis × factor × coefficient × quantity [× tierMultiplier]) + fixedBonus × quantity`
 *
 * The tier multiplier only applies when tier multipliers are enabled and it
 * is above 1.0. Fixed bonus points are added after truncation.
 */
export function calculateItemPoints(
  product: PointsProduct,
  quantity: number,
  tierMultiplier: DecimalInput,
  settings: PointsSettings
): number {
  if (!Number.isInteger(quantity) || quantity < 0) {
    throw new RangeError(`Quantity must be a non-negative integer, got ${quantity}`);
  }

  let raw = priceBasisValue(product, settings.priceBasis)
    .times(settings.pointsFactor)
    .times(product.pointsCoefficient)
    .times(quantity);

  const multiplier = Decimal.from(tierMultiplier);
  if (settings.tierMultiplierEnabled && multiplier.greaterThan(1)) {
    raw = raw.times(multiplier);
  }

  return Number(raw.truncate()) + product.fixedBonusPoints * quantity;
}

/**
 * `1 + floor(totalXp / xpPerLevel)`, or 1 when `xpPerLevel` is not positive
 */
export function calculateLevel(totalXp: number, xpPerLevel: number): number {
  if (xpPerLevel <= 0) {
    return 1;
  }
  return 1 + Math.floor(Math.max(0, totalXp) / xpPerLevel);
}

/**
 * XP still missing to reach the next level; 0 when levels are disabled
 */
export function xpToNextLevel(totalXp: number, xpPerLevel: number): number {
  if (xpPerLevel <= 0) {
    return 0;
  }
  return calculateLevel(totalXp, xpPerLevel) * xpPerLevel - Math.max(0, totalXp);
}
