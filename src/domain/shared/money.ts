/**
 * Money Value Object
 * Currency-tagged fixed-point amount; arithmetic across currencies fails fast
 */

import { CurrencyMismatchError, InvalidMoneyError } from '../../errors.js';
import { Decimal, type DecimalInput } from './decimal.js';

/** Fraction digits kept on every stored amount */
export const MONEY_SCALE = 4;

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export interface MoneyJSON {
  amount: string;
  currency: string;
}

export class Money {
  private constructor(
    readonly amount: Decimal,
    readonly currency: string
  ) {
    Object.freeze(this);
  }

  static of(amount: DecimalInput, currency: string): Money {
    const code = currency.toUpperCase();
    if (!CURRENCY_PATTERN.test(code)) {
      throw new InvalidMoneyError(`Invalid currency code: ${currency}`);
    }
    const value = Decimal.from(amount).round(MONEY_SCALE, 'half-up');
    if (value.isNegative) {
      throw new InvalidMoneyError('Amount cannot be negative');
    }
    return new Money(value, code);
  }

  static zero(currency: string): Money {
    return Money.of(0, currency);
  }

  static fromJSON(json: MoneyJSON): Money {
    return Money.of(json.amount, json.currency);
  }

  /**
   * Sum amounts that must all be in `currency`.
   */
  static sum(values: readonly Money[], currency: string): Money {
    return values.reduce((total, value) => total.plus(value), Money.zero(currency));
  }

  plus(other: Money): Money {
    this.ensureSameCurrency(other);
    return Money.of(this.amount.plus(other.amount), this.currency);
  }

  minus(other: Money): Money {
    this.ensureSameCurrency(other);
    const result = this.amount.minus(other.amount);
    if (result.isNegative) {
      throw new InvalidMoneyError('Result would be negative');
    }
    return Money.of(result, this.currency);
  }

  times(factor: DecimalInput): Money {
    return Money.of(this.amount.times(factor), this.currency);
  }

  get isZero(): boolean {
    return this.amount.isZero;
  }

  isGreaterThan(other: Money): boolean {
    this.ensureSameCurrency(other);
    return this.amount.greaterThan(other.amount);
  }

  isGreaterThanOrEqual(other: Money): boolean {
    this.ensureSameCurrency(other);
    return this.amount.greaterThanOrEqual(other.amount);
  }

  equals(other: Money): boolean {
    return this.currency === other.currency && this.amount.equals(other.amount);
  }

  ensureSameCurrency(other: Money | string): void {
    const currency = typeof other === 'string' ? other.toUpperCase() : other.currency;
    if (this.currency !== currency) {
      throw new CurrencyMismatchError(this.currency, currency);
    }
  }

  /** Amount with two fraction digits, e.g. `12.50` */
  format(): string {
    return this.amount.toFixed(2);
  }

  toString(): string {
    return `${this.format()} ${this.currency}`;
  }

  toJSON(): MoneyJSON {
    return {
      amount: this.amount.toString(),
      currency: this.currency,
    };
  }
}
