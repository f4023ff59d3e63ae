/**
 * Error taxonomy for the fulfillment ledger
 */

/**
 * Base error class for all ledger errors
 */
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when a value cannot be read as a fixed-point decimal
 */
export class InvalidDecimalError extends LedgerError {
  readonly value: unknown;

  constructor(value: unknown, message?: string) {
    super(message ?? `Invalid decimal value: ${String(value)}`);
    this.name = 'InvalidDecimalError';
    this.value = value;
  }
}

export class InvalidMoneyError extends LedgerError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMoneyError';
  }
}

export class CurrencyMismatchError extends LedgerError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Cannot operate on different currencies: ${expected} and ${actual}`);
    this.name = 'CurrencyMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when an order status change is not in the transition table.
 * Carries both statuses so the caller can pick a corrective action.
 */
export class InvalidTransitionError extends LedgerError {
  readonly orderId: number;
  readonly currentStatus: string;
  readonly requestedStatus: string;
  readonly allowed: readonly string[];

  constructor(
    orderId: number,
    currentStatus: string,
    requestedStatus: string,
    allowed: readonly string[] = []
  ) {
    super(`Cannot transition order ${orderId} from '${currentStatus}' to '${requestedStatus}'`);
    this.name = 'InvalidTransitionError';
    this.orderId = orderId;
    this.currentStatus = currentStatus;
    this.requestedStatus = requestedStatus;
    this.allowed = allowed;
  }
}

export class InsufficientStockError extends LedgerError {
  readonly productId: number;
  readonly available: number;
  readonly requested: number;

  constructor(productId: number, available: number, requested: number) {
    super(
      `Insufficient stock for product ${productId}: available ${available}, requested ${requested}`
    );
    this.name = 'InsufficientStockError';
    this.productId = productId;
    this.available = available;
    this.requested = requested;
  }
}

export class ProductNotFoundError extends LedgerError {
  readonly productId: number;

  constructor(productId: number) {
    super(`Product ${productId} not found`);
    this.name = 'ProductNotFoundError';
    this.productId = productId;
  }
}

export class OrderNotFoundError extends LedgerError {
  readonly orderId: number | string;

  constructor(orderId: number | string) {
    super(`Order ${orderId} not found`);
    this.name = 'OrderNotFoundError';
    this.orderId = orderId;
  }
}

export class OrderItemNotFoundError extends LedgerError {
  readonly itemId: number;

  constructor(itemId: number) {
    super(`Order item ${itemId} not found`);
    this.name = 'OrderItemNotFoundError';
    this.itemId = itemId;
  }
}

export class UserNotFoundError extends LedgerError {
  readonly userId: number;

  constructor(userId: number) {
    super(`User ${userId} not found`);
    this.name = 'UserNotFoundError';
    this.userId = userId;
  }
}

/**
 * Machine-readable reasons a loyalty operation was refused
 */
export type LoyaltyValidationReason =
  | 'disabled'
  | 'invalid_amount'
  | 'unsupported_currency'
  | 'insufficient_balance'
  | 'order_not_found'
  | 'currency_mismatch';

/**
 * Thrown by redemption and manual adjustment before anything is written.
 */
export class LoyaltyValidationError extends LedgerError {
  readonly reason: LoyaltyValidationReason;
  readonly details: Record<string, unknown>;

  constructor(
    reason: LoyaltyValidationReason,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'LoyaltyValidationError';
    this.reason = reason;
    this.details = details;
  }
}

/**
 * Thrown when order input fails validation; holds every field error found.
 */
export class OrderValidationError extends LedgerError {
  readonly errors: ErrorCollection;

  constructor(errors: ErrorCollection) {
    super(errors.fullMessage);
    this.name = 'OrderValidationError';
    this.errors = errors;
  }
}

export class PaymentError extends LedgerError {
  readonly orderId: number;

  constructor(orderId: number, message: string) {
    super(message);
    this.name = 'PaymentError';
    this.orderId = orderId;
  }
}

/**
 * Thrown when environment or settings values fail validation
 */
export class ConfigurationError extends LedgerError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error thrown when task execution times out
 */
export class TimeoutError extends LedgerError {
  readonly limit: number;

  constructor(limit: number, message?: string) {
    super(message ?? `Execution exceeded ${limit} seconds`);
    this.name = 'TimeoutError';
    this.limit = limit;
  }
}

/**
 * Error collection for multiple validation errors
 */
export class ErrorCollection {
  private readonly errors: Map<string, string[]> = new Map();

  add(attribute: string, message: string): void {
    const existing = this.errors.get(attribute) ?? [];
    existing.push(message);
    this.errors.set(attribute, existing);
  }

  has(attribute: string): boolean {
    return this.errors.has(attribute);
  }

  get(attribute: string): string[] {
    return this.errors.get(attribute) ?? [];
  }

  get isEmpty(): boolean {
    return this.errors.size === 0;
  }

  get size(): number {
    return this.errors.size;
  }

  get messages(): Record<string, string[]> {
    return Object.fromEntries(this.errors);
  }

  get fullMessage(): string {
    const parts: string[] = [];
    for (const [attr, msgs] of this.errors) {
      for (const msg of msgs) {
        parts.push(`${attr} ${msg}`);
      }
    }
    return parts.join('. ') + (parts.length > 0 ? '.' : '');
  }

  [Symbol.iterator](): IterableIterator<[string, string[]]> {
    return this.errors[Symbol.iterator]();
  }
}
