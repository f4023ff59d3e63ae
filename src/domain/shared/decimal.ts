/**
 * Decimal Value Object
 * Exact fixed-point arithmetic on bigint units with a decimal scale
 */

import { InvalidDecimalError } from '../../errors.js';

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

export type DecimalInput = Decimal | string | number | bigint;

/**
 * `half-up` rounds halves away from zero, `down` truncates toward zero,
 * `floor` rounds toward negative infinity.
 */
export type RoundingMode = 'half-up' | 'half-even' | 'down' | 'floor';

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function divideRounded(numerator: bigint, denominator: bigint, mode: RoundingMode): bigint {
  if (denominator < 0n) {
    numerator = -numerator;
    denominator = -denominator;
  }

  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  if (remainder === 0n) return quotient;

  const sign = numerator < 0n ? -1n : 1n;
  const twice = (remainder < 0n ? -remainder : remainder) * 2n;

  switch (mode) {
    case 'down':
      return quotient;
    case 'floor':
      return numerator < 0n ? quotient - 1n : quotient;
    case 'half-up':
      return twice >= denominator ? quotient + sign : quotient;
    case 'half-even':
      if (twice > denominator) return quotient + sign;
      if (twice === denominator && quotient % 2n !== 0n) return quotient + sign;
      return quotient;
  }
}

export class Decimal {
  private constructor(
    readonly units: bigint,
    readonly scale: number
  ) {
    Object.freeze(this);
  }

  static readonly ZERO = new Decimal(0n, 0);
  static readonly ONE = new Decimal(1n, 0);

  static from(value: DecimalInput): Decimal {
    if (value instanceof Decimal) {
      return value;
    }
    if (typeof value === 'bigint') {
      return new Decimal(value, 0);
    }
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new InvalidDecimalError(value);
      }
      if (Number.isInteger(value)) {
        return new Decimal(BigInt(value), 0);
      }
      return Decimal.parse(String(value));
    }
    return Decimal.parse(value);
  }

  private static parse(text: string): Decimal {
    const match = DECIMAL_PATTERN.exec(text.trim());
    if (!match) {
      throw new InvalidDecimalError(text);
    }
    const [, sign, integer = '0', fraction = ''] = match;
    const units = BigInt(integer + fraction);
    return new Decimal(sign === '-' ? -units : units, fraction.length);
  }

  plus(other: DecimalInput): Decimal {
    const [a, b, scale] = this.align(Decimal.from(other));
    return new Decimal(a + b, scale);
  }

  minus(other: DecimalInput): Decimal {
    const [a, b, scale] = this.align(Decimal.from(other));
    return new Decimal(a - b, scale);
  }

  times(other: DecimalInput): Decimal {
    const o = Decimal.from(other);
    return new Decimal(this.units * o.units, this.scale + o.scale);
  }

  /**
   * Divide, keeping `scale` fraction digits.
   */
  dividedBy(other: DecimalInput, scale: number, mode: RoundingMode = 'half-up'): Decimal {
    const o = Decimal.from(other);
    if (o.units === 0n) {
      throw new RangeError('Division by zero');
    }
    const numerator = this.units * pow10(o.scale + scale);
    const denominator = o.units * pow10(this.scale);
    return new Decimal(divideRounded(numerator, denominator, mode), scale);
  }

  round(scale: number, mode: RoundingMode = 'half-up'): Decimal {
    if (scale >= this.scale) {
      return new Decimal(this.units * pow10(scale - this.scale), scale);
    }
    return new Decimal(divideRounded(this.units, pow10(this.scale - scale), mode), scale);
  }

  /** Integer part, truncated toward zero */
  truncate(): bigint {
    return this.units / pow10(this.scale);
  }

  negated(): Decimal {
    return new Decimal(-this.units, this.scale);
  }

  compare(other: DecimalInput): -1 | 0 | 1 {
    const [a, b] = this.align(Decimal.from(other));
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }

  equals(other: DecimalInput): boolean {
    return this.compare(other) === 0;
  }

  greaterThan(other: DecimalInput): boolean {
    return this.compare(other) > 0;
  }

  greaterThanOrEqual(other: DecimalInput): boolean {
    return this.compare(other) >= 0;
  }

  lessThan(other: DecimalInput): boolean {
    return this.compare(other) < 0;
  }

  get isZero(): boolean {
    return this.units === 0n;
  }

  get isNegative(): boolean {
    return this.units < 0n;
  }

  toFixed(digits: number): string {
    return Decimal.format(this.round(digits, 'half-up'), false);
  }

  toNumber(): number {
    return Number(this.toString());
  }

  /** Shortest exact representation, without trailing zeros */
  toString(): string {
    return Decimal.format(this, true);
  }

  toJSON(): string {
    return this.toString();
  }

  private static format(value: Decimal, trim: boolean): string {
    const negative = value.units < 0n;
    const digits = (negative ? -value.units : value.units)
      .toString()
      .padStart(value.scale + 1, '0');
    const integer = digits.slice(0, digits.length - value.scale);
    let fraction = digits.slice(digits.length - value.scale);
    if (trim) {
      fraction = fraction.replace(/0+$/, '');
    }
    const body = fraction.length > 0 ? `${integer}.${fraction}` : integer;
    return negative && /[1-9]/.test(body) ? `-${body}` : body;
  }

  private align(other: Decimal): [bigint, bigint, number] {
    if (this.scale === other.scale) {
      return [this.units, other.units, this.scale];
    }
    if (this.scale > other.scale) {
      return [this.units, other.units * pow10(this.scale - other.scale), this.scale];
    }
    return [this.units * pow10(other.scale - this.scale), other.units, other.scale];
  }
}
