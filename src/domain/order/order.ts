import { z } from 'zod';
import { CurrencyMismatchError, InvalidTransitionError, PaymentError } from '../../errors.js';
import { AggregateRoot } from '../shared/aggregate-root.js';
import { Money } from '../shared/money.js';
import { OrderItem } from './order-item.js';
import { orderEvent, type OrderEvent } from './order-events.js';
import {
  OrderStatus,
  PaymentStatus,
  allowedTransitions,
  canTransition,
  isTerminal,
} from './order-status.js';

/**
 * Order Aggregate Root
 * Owns status, payment state, metadata and line items of one order
 */
export interface OrderProps {
  id: number;
  uuid: string;
  userId: number | null;
  status: OrderStatus;
  paymentStatus: PaymentStatus;
  currency: string;
  shippingPrice: Money;
  paidAmount: Money;
  metadata: Record<string, unknown>;
  trackingNumber: string | null;
  carrier: string | null;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
  statusUpdatedAt: Date;
  items: OrderItem[];
}

export interface TransitionOptions {
  at?: Date;
  reason?: string | null;
  actor?: string | null;
}

export interface TransitionOutcome {
  previous: OrderStatus;
  current: OrderStatus;
  changed: boolean;
}

const refundRecordSchema = z.object({
  amount: z.string(),
  currency: z.string(),
  reason: z.string().nullable(),
  refundedAt: z.string(),
});

export type PaymentRefundRecord = z.infer<typeof refundRecordSchema>;

const refundsSchema = z.array(refundRecordSchema);

export class Order extends AggregateRoot<number, OrderEvent> {
  private props: OrderProps;

  private constructor(props: OrderProps) {
    super(props.id);
    this.props = { ...props, metadata: { ...props.metadata }, items: [...props.items] };
  }

  /**
   * Reconstitute from persistence
   */
  static reconstitute(props: OrderProps): Order {
    const currency = props.currency;
    props.shippingPrice.ensureSameCurrency(currency);
    props.paidAmount.ensureSameCurrency(currency);
    for (const item of props.items) {
      if (item.unitPrice.currency !== currency) {
        throw new CurrencyMismatchError(currency, item.unitPrice.currency);
      }
    }
    return new Order(props);
  }

  // ==================== Getters ====================

  get uuid(): string { return this.props.uuid; }
  get userId(): number | null { return this.props.userId; }
  get isGuest(): boolean { return this.props.userId === null; }
  get status(): OrderStatus { return this.props.status; }
  get paymentStatus(): PaymentStatus { return this.props.paymentStatus; }
  get currency(): string { return this.props.currency; }
  get shippingPrice(): Money { return this.props.shippingPrice; }
  get paidAmount(): Money { return this.props.paidAmount; }
  get metadata(): Readonly<Record<string, unknown>> { return { ...this.props.metadata }; }
  get trackingNumber(): string | null { return this.props.trackingNumber; }
  get carrier(): string | null { return this.props.carrier; }
  get isDeleted(): boolean { return this.props.isDeleted; }
  get createdAt(): Date { return this.props.createdAt; }
  get updatedAt(): Date { return this.props.updatedAt; }
  get statusUpdatedAt(): Date { return this.props.statusUpdatedAt; }
  get items(): readonly OrderItem[] { return [...this.props.items]; }
  get isTerminal(): boolean { return isTerminal(this.props.status); }

  get itemsTotal(): Money {
    return Money.sum(
      this.props.items.map((item) => item.totalPrice),
      this.props.currency
    );
  }

  /** Charges on top of the items; currently shipping only */
  get extrasTotal(): Money {
    return this.props.shippingPrice;
  }

  get total(): Money {
    return this.itemsTotal.plus(this.extrasTotal);
  }

  get refundedItemsAmount(): Money {
    return Money.sum(
      this.props.items.map((item) => item.refundedAmount),
      this.props.currency
    );
  }

  get paymentRefunds(): PaymentRefundRecord[] {
    return refundsSchema.parse(this.props.metadata['refunds'] ?? []);
  }

  get refundedPaymentAmount(): Money {
    return Money.sum(
      this.paymentRefunds.map((refund) => Money.of(refund.amount, refund.currency)),
      this.props.currency
    );
  }

  findItem(itemId: number): OrderItem | undefined {
    return this.props.items.find((item) => item.id === itemId);
  }

  // ==================== Behavior ====================

  canTransitionTo(status: OrderStatus): boolean {
    return canTransition(this.props.status, status);
  }

  /**
   * Move to `status` if the transition table allows it.
   * Re-applying the current status changes nothing.
   */
  transitionTo(status: OrderStatus, options: TransitionOptions = {}): TransitionOutcome {
    const previous = this.props.status;
    if (status === previous) {
      return { previous, current: previous, changed: false };
    }
    if (!canTransition(previous, status)) {
      throw new InvalidTransitionError(this.id, previous, status, allowedTransitions(previous));
    }

    const at = options.at ?? new Date();
    const ref = { orderId: this.id, userId: this.props.userId };

    this.props.status = status;
    this.props.statusUpdatedAt = at;
    this.props.updatedAt = at;

    this.addDomainEvent(
      orderEvent('order_status_changed', { ...ref, previousStatus: previous, newStatus: status }, at)
    );

    switch (status) {
      case OrderStatus.CANCELED:
        this.storeValueInMetadata('cancellation', {
          reason: options.reason ?? null,
          canceledAt: at.toISOString(),
          canceledBy: options.actor ?? null,
          previousStatus: previous,
        });
        this.addDomainEvent(
          orderEvent(
            'order_canceled',
            {
              ...ref,
              previousStatus: previous,
              reason: options.reason ?? null,
              canceledBy: options.actor ?? null,
            },
            at
          )
        );
        break;
      case OrderStatus.COMPLETED:
        this.addDomainEvent(orderEvent('order_completed', ref, at));
        break;
      case OrderStatus.REFUNDED:
        this.addDomainEvent(
          orderEvent(
            'order_refunded',
            { ...ref, source: 'status', amount: null, reason: options.reason ?? null },
            at
          )
        );
        break;
      case OrderStatus.RETURNED:
        this.addDomainEvent(orderEvent('order_returned', ref, at));
        break;
      default:
        break;
    }

    return { previous, current: status, changed: true };
  }

  recordPayment(amount: Money, at: Date = new Date()): void {
    amount.ensureSameCurrency(this.props.currency);
    if (amount.isZero) {
      throw new PaymentError(this.id, 'Payment amount must be greater than zero');
    }
    this.props.paidAmount = amount;
    this.props.paymentStatus = PaymentStatus.COMPLETED;
    this.props.updatedAt = at;
  }

  /**
   * Refund captured payment, fully or partially. Returns the amount refunded.
   */
  refundPayment(amount?: Money, reason: string | null = null, at: Date = new Date()): Money {
    const { paymentStatus } = this.props;
    if (paymentStatus === PaymentStatus.REFUNDED) {
      throw new PaymentError(this.id, `Order ${this.id} payment is already refunded`);
    }
    if (
      (paymentStatus !== PaymentStatus.COMPLETED &&
        paymentStatus !== PaymentStatus.PARTIALLY_REFUNDED) ||
      this.props.paidAmount.isZero
    ) {
      throw new PaymentError(this.id, `Order ${this.id} has no captured payment to refund`);
    }

    const remaining = this.props.paidAmount.minus(this.refundedPaymentAmount);
    const refund = amount ?? remaining;
    refund.ensureSameCurrency(this.props.currency);
    if (refund.isZero) {
      throw new PaymentError(this.id, 'Refund amount must be greater than zero');
    }
    if (refund.isGreaterThan(remaining)) {
      throw new PaymentError(
        this.id,
        `Refund of ${refund.toString()} exceeds refundable amount ${remaining.toString()}`
      );
    }

    const record: PaymentRefundRecord = {
      amount: refund.amount.toString(),
      currency: refund.currency,
      reason,
      refundedAt: at.toISOString(),
    };
    this.storeValueInMetadata('refunds', [...this.paymentRefunds, record]);

    this.props.paymentStatus = refund.equals(remaining)
      ? PaymentStatus.REFUNDED
      : PaymentStatus.PARTIALLY_REFUNDED;
    this.props.updatedAt = at;

    this.addDomainEvent(
      orderEvent(
        'order_refunded',
        {
          orderId: this.id,
          userId: this.props.userId,
          source: 'payment',
          amount: refund.toJSON(),
          reason,
        },
        at
      )
    );
    return refund;
  }

  setTracking(trackingNumber: string, carrier: string, at: Date = new Date()): void {
    this.props.trackingNumber = trackingNumber;
    this.props.carrier = carrier;
    this.props.updatedAt = at;
  }

  storeValueInMetadata(key: string, value: unknown): void {
    this.props.metadata[key] = value;
  }

  getValueFromMetadata(key: string): unknown {
    return this.props.metadata[key];
  }

  softDelete(at: Date = new Date()): void {
    this.props.isDeleted = true;
    this.props.updatedAt = at;
  }

  touch(at: Date = new Date()): void {
    this.props.updatedAt = at;
  }

  toJSON() {
    return {
      id: this.id,
      uuid: this.uuid,
      userId: this.userId,
      status: this.status,
      paymentStatus: this.paymentStatus,
      currency: this.currency,
      items: this.props.items.map((item) => item.toJSON()),
      itemsTotal: this.itemsTotal.toJSON(),
      shippingPrice: this.shippingPrice.toJSON(),
      total: this.total.toJSON(),
      paidAmount: this.paidAmount.toJSON(),
      metadata: this.metadata,
      trackingNumber: this.trackingNumber,
      carrier: this.carrier,
      isDeleted: this.isDeleted,
      createdAt: this.createdAt.toISOString(),
      updatedAt: this.updatedAt.toISOString(),
      statusUpdatedAt: this.statusUpdatedAt.toISOString(),
    };
  }
}
