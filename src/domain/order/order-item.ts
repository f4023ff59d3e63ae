import { ErrorCollection } from '../../errors.js';
import { Entity } from '../shared/entity.js';
import { Money } from '../shared/money.js';

/**
 * OrderItem Entity
 * A line of an order with a unit price snapshot and refund bookkeeping
 */
export interface OrderItemProps {
  id: number;
  orderId: number;
  productId: number;
  productName: string;
  unitPrice: Money;
  quantity: number;
  originalQuantity: number;
  refundedQuantity: number;
  /** Units taken from product stock for this line and not yet returned */
  reservedQuantity: number;
}

export interface OrderItemFields {
  quantity: number;
  refundedQuantity?: number;
  /** Current product stock; only checked for items not yet persisted */
  availableStock?: number;
}

export class OrderItem extends Entity<number> {
  private props: OrderItemProps;

  private constructor(props: OrderItemProps) {
    super(props.id);
    this.props = { ...props };
  }

  static reconstitute(props: OrderItemProps): OrderItem {
    return new OrderItem(props);
  }

  /**
   * Field rules for a line. Errors are keyed by `prefix` + field name.
   */
  static validate(
    fields: OrderItemFields,
    errors: ErrorCollection = new ErrorCollection(),
    prefix = ''
  ): ErrorCollection {
    const refunded = fields.refundedQuantity ?? 0;

    if (!Number.isInteger(fields.quantity) || fields.quantity <= 0) {
      errors.add(`${prefix}quantity`, 'must be greater than 0');
    } else if (fields.availableStock !== undefined && fields.quantity > fields.availableStock) {
      errors.add(`${prefix}quantity`, `exceeds available stock (${fields.availableStock})`);
    }

    if (!Number.isInteger(refunded) || refunded < 0) {
      errors.add(`${prefix}refundedQuantity`, 'must be greater than or equal to 0');
    } else if (refunded > fields.quantity) {
      errors.add(`${prefix}refundedQuantity`, 'cannot exceed quantity');
    }

    return errors;
  }

  get orderId(): number { return this.props.orderId; }
  get productId(): number { return this.props.productId; }
  get productName(): string { return this.props.productName; }
  get unitPrice(): Money { return this.props.unitPrice; }
  get quantity(): number { return this.props.quantity; }
  get originalQuantity(): number { return this.props.originalQuantity; }
  get refundedQuantity(): number { return this.props.refundedQuantity; }
  get reservedQuantity(): number { return this.props.reservedQuantity; }

  get totalPrice(): Money {
    return this.props.unitPrice.times(this.props.quantity);
  }

  get netQuantity(): number {
    return this.props.quantity - this.props.refundedQuantity;
  }

  get netPrice(): Money {
    return this.props.unitPrice.times(this.netQuantity);
  }

  get refundedAmount(): Money {
    return this.props.unitPrice.times(this.props.refundedQuantity);
  }

  get isFullyRefunded(): boolean {
    return this.props.refundedQuantity >= this.props.quantity;
  }

  /**
   * Set a new quantity on a persisted line; returns the signed delta.
   * Stock is not checked here: the line already holds its reservation.
   */
  changeQuantity(quantity: number): number {
    const errors = OrderItem.validate({
      quantity,
      refundedQuantity: this.props.refundedQuantity,
    });
    if (!errors.isEmpty) {
      throw new RangeError(`Order item ${this.id}: ${errors.fullMessage}`);
    }
    const delta = quantity - this.props.quantity;
    this.props.quantity = quantity;
    return delta;
  }

  /**
   * Refund `quantity` units, or everything not yet refunded.
   * Returns the number of units refunded by this call.
   */
  refund(quantity?: number): number {
    const remaining = this.netQuantity;
    const amount = quantity ?? remaining;
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new RangeError(`Refund quantity must be a positive integer, got ${amount}`);
    }
    if (amount > remaining) {
      throw new RangeError(
        `Cannot refund ${amount} of order item ${this.id}: only ${remaining} left`
      );
    }
    this.props.refundedQuantity += amount;
    return amount;
  }

  /** Record `units` newly taken from stock for this line */
  holdStock(units: number): void {
    this.props.reservedQuantity += units;
  }

  /**
   * Give up the units held beyond what the line still needs.
   * Returns the number of units to put back into stock.
   */
  releaseExcessStock(): number {
    const excess = Math.max(0, this.props.reservedQuantity - this.netQuantity);
    this.props.reservedQuantity -= excess;
    return excess;
  }

  /** Give up every held unit; returns how many to put back into stock */
  releaseAllStock(): number {
    const held = this.props.reservedQuantity;
    this.props.reservedQuantity = 0;
    return held;
  }

  toJSON() {
    return {
      id: this.id,
      orderId: this.orderId,
      productId: this.productId,
      productName: this.productName,
      unitPrice: this.unitPrice.toJSON(),
      quantity: this.quantity,
      originalQuantity: this.originalQuantity,
      refundedQuantity: this.refundedQuantity,
      reservedQuantity: this.reservedQuantity,
      totalPrice: this.totalPrice.toJSON(),
      netPrice: this.netPrice.toJSON(),
    };
  }
}
