/**
 * Loyalty settings, read by key from a settings store
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { Decimal } from '../domain/shared/decimal.js';

export type SettingValue = string | number | boolean;

/**
 * Named settings with per-key reads
 */
export interface SettingsStore {
  get(key: string): SettingValue | undefined;
  set(key: string, value: SettingValue): void;
}

export class InMemorySettingsStore implements SettingsStore {
  private readonly values = new Map<string, SettingValue>();

  constructor(initial: Record<string, SettingValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  get(key: string): SettingValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: SettingValue): void {
    this.values.set(key, value);
  }
}

export const PriceBasis = {
  PRICE_EXCL_VAT_NO_DISCOUNT: 'price_excl_vat_no_discount',
  PRICE_EXCL_VAT_WITH_DISCOUNT: 'price_excl_vat_with_discount',
  PRICE_INCL_VAT_NO_DISCOUNT: 'price_incl_vat_no_discount',
  FINAL_PRICE: 'final_price',
} as const;

export type PriceBasis = (typeof PriceBasis)[keyof typeof PriceBasis];

/** Currencies points can be redeemed in */
export const REDEMPTION_CURRENCIES = ['EUR', 'USD'] as const;

export type RedemptionCurrency = (typeof REDEMPTION_CURRENCIES)[number];

export function isRedemptionCurrency(value: string): value is RedemptionCurrency {
  return REDEMPTION_CURRENCIES.some((currency) => currency === value);
}

const booleanSetting = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

const decimalSetting = z.union([z.number(), z.string()]).transform((value, ctx) => {
  try {
    return Decimal.from(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : `Invalid decimal value: ${String(value)}`,
    });
    return z.NEVER;
  }
});

const loyaltySettingsSchema = z.object({
  LOYALTY_ENABLED: booleanSetting.default(false),
  LOYALTY_POINTS_FACTOR: decimalSetting.default('1.0'),
  LOYALTY_PRICE_BASIS: z
    .enum([
      PriceBasis.PRICE_EXCL_VAT_NO_DISCOUNT,
      PriceBasis.PRICE_EXCL_VAT_WITH_DISCOUNT,
      PriceBasis.PRICE_INCL_VAT_NO_DISCOUNT,
      PriceBasis.FINAL_PRICE,
    ])
    .default(PriceBasis.FINAL_PRICE),
  LOYALTY_TIER_MULTIPLIER_ENABLED: booleanSetting.default(false),
  LOYALTY_XP_PER_LEVEL: z.coerce.number().int().default(1000),
  LOYALTY_POINTS_EXPIRATION_DAYS: z.coerce.number().int().default(0),
  LOYALTY_NEW_CUSTOMER_BONUS_ENABLED: booleanSetting.default(false),
  LOYALTY_NEW_CUSTOMER_BONUS_POINTS: z.coerce.number().int().min(0).default(100),
});

const SETTING_KEYS = Object.keys(loyaltySettingsSchema.shape);

export const DEFAULT_REDEMPTION_RATIO = '100';

export interface LoyaltySettings {
  enabled: boolean;
  pointsFactor: Decimal;
  priceBasis: PriceBasis;
  tierMultiplierEnabled: boolean;
  /** Level is 1 for any XP when this is 0 or less */
  xpPerLevel: number;
  /** 0 disables expiration */
  expirationDays: number;
  newCustomerBonusEnabled: boolean;
  newCustomerBonusPoints: number;
}

/**
 * Read and validate every loyalty setting, applying defaults
 *
 * @throws {ConfigurationError} when a stored value has the wrong shape
 */
export function readLoyaltySettings(store: SettingsStore): LoyaltySettings {
  const raw: Record<string, SettingValue | undefined> = {};
  for (const key of SETTING_KEYS) {
    raw[key] = store.get(key);
  }

  const parsed = loyaltySettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid loyalty settings',
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    enabled: values.LOYALTY_ENABLED,
    pointsFactor: values.LOYALTY_POINTS_FACTOR,
    priceBasis: values.LOYALTY_PRICE_BASIS,
    tierMultiplierEnabled: values.LOYALTY_TIER_MULTIPLIER_ENABLED,
    xpPerLevel: values.LOYALTY_XP_PER_LEVEL,
    expirationDays: values.LOYALTY_POINTS_EXPIRATION_DAYS,
    newCustomerBonusEnabled: values.LOYALTY_NEW_CUSTOMER_BONUS_ENABLED,
    newCustomerBonusPoints: values.LOYALTY_NEW_CUSTOMER_BONUS_POINTS,
  };
}

/**
 * Points per one unit of `currency` (`LOYALTY_REDEMPTION_RATIO_<CURRENCY>`)
 *
 * @throws {ConfigurationError} when the stored ratio is not a positive decimal
 */
export function readRedemptionRatio(store: SettingsStore, currency: string): Decimal {
  const key = `LOYALTY_REDEMPTION_RATIO_${currency.toUpperCase()}`;
  const parsed = decimalSetting.default(DEFAULT_REDEMPTION_RATIO).safeParse(store.get(key));
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid setting ${key}`,
      parsed.error.issues.map((issue) => issue.message)
    );
  }
  if (!parsed.data.greaterThan(0)) {
    throw new ConfigurationError(`Invalid setting ${key}`, ['must be greater than 0']);
  }
  return parsed.data;
}
