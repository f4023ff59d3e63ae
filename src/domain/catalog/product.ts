/**
 * Product - catalog entry referenced by order items
 */

import { Entity } from '../shared/entity.js';
import { Decimal, type DecimalInput } from '../shared/decimal.js';
import { Money } from '../shared/money.js';

export interface ProductProps {
  id: number;
  name: string;
  price: Money;
  vatPercent?: DecimalInput;
  discountPercent?: DecimalInput;
  stock: number;
  pointsCoefficient?: DecimalInput;
  fixedBonusPoints?: number;
}

export class Product extends Entity<number> {
  readonly name: string;
  /** Unit price excluding VAT */
  readonly price: Money;
  readonly vatPercent: Decimal;
  readonly discountPercent: Decimal;
  readonly stock: number;
  readonly pointsCoefficient: Decimal;
  readonly fixedBonusPoints: number;

  constructor(props: ProductProps) {
    super(props.id);
    this.name = props.name;
    this.price = props.price;
    this.vatPercent = Decimal.from(props.vatPercent ?? 0);
    this.discountPercent = Decimal.from(props.discountPercent ?? 0);
    this.stock = props.stock;
    this.pointsCoefficient = Decimal.from(props.pointsCoefficient ?? 1);
    this.fixedBonusPoints = props.fixedBonusPoints ?? 0;

    if (!Number.isInteger(this.stock) || this.stock < 0) {
      throw new RangeError(`Product ${props.id} stock must be a non-negative integer`);
    }
    if (!Number.isInteger(this.fixedBonusPoints) || this.fixedBonusPoints < 0) {
      throw new RangeError(`Product ${props.id} fixed bonus points must be a non-negative integer`);
    }
    if (this.discountPercent.isNegative || this.discountPercent.greaterThan(100)) {
      throw new RangeError(`Product ${props.id} discount must be between 0 and 100 percent`);
    }
  }

  get currency(): string {
    return this.price.currency;
  }

  get vatValue(): Money {
    return Money.of(this.price.amount.times(this.vatPercent).dividedBy(100, 8), this.currency);
  }

  get discountValue(): Money {
    return Money.of(this.price.amount.times(this.discountPercent).dividedBy(100, 8), this.currency);
  }

  /** Price including VAT, less discount */
  get finalPrice(): Money {
    return this.price.plus(this.vatValue).minus(this.discountValue);
  }

  withStock(stock: number): Product {
    return new Product({ ...this.toProps(), stock });
  }

  toProps(): ProductProps {
    return {
      id: this.id,
      name: this.name,
      price: this.price,
      vatPercent: this.vatPercent,
      discountPercent: this.discountPercent,
      stock: this.stock,
      pointsCoefficient: this.pointsCoefficient,
      fixedBonusPoints: this.fixedBonusPoints,
    };
  }
}
