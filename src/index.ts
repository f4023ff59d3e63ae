/**
 * fulfillment-ledger - order lifecycle, stock reservation and loyalty points
 *
 * @example
 * ```typescript
 * import { createLedgerRuntime, OrderStatus } from 'fulfillment-ledger';
 *
 * const ledger = createLedgerRuntime({ dbPath: 'data/ledger.sqlite' });
 * ledger.settings.set('LOYALTY_ENABLED', true);
 *
 * const order = ledger.orders.createOrder({
 *   userId: 7,
 *   items: [{ productId: 3, quantity: 2 }],
 * });
 * ledger.orders.updateStatus(order.id, OrderStatus.PROCESSING);
 *
 * await ledger.queue.drain();
 * ```
 */

// Runtime
export {
  createLedgerRuntime,
  createLedgerRuntimeFromEnv,
  type LedgerRuntime,
  type LedgerRuntimeOptions,
  type LedgerRepositories,
} from './runtime.js';

// Orders
export {
  OrderService,
  type CreateOrderInput,
  type CancelOrderOptions,
  type RefundPaymentOptions,
  type StatusChangeOptions,
} from './orders/order-service.js';
export { OrderLifecycle } from './orders/lifecycle.js';
export { Order, type OrderProps, type PaymentRefundRecord } from './domain/order/order.js';
export { OrderItem } from './domain/order/order-item.js';
export {
  OrderStatus,
  PaymentStatus,
  allowedTransitions,
  canTransition,
  isTerminal,
  isEditable,
} from './domain/order/order-status.js';
export { HistoryChangeType, type OrderHistoryEntry } from './domain/order/order-history.js';
export {
  OrderEventName,
  type OrderEvent,
  type OrderEventOf,
  type OrderEventPayloads,
} from './domain/order/order-events.js';
export { EventBus, type OrderEventHandler } from './events/event-bus.js';

// Stock
export { StockGuard, type StockMutationOptions } from './stock/stock-guard.js';
export { StockOperation, type StockLogEntry } from './domain/stock/stock-log.js';
export { Product, type ProductProps } from './domain/catalog/product.js';

// Loyalty
export {
  LoyaltyService,
  NEW_CUSTOMER_BONUS_DESCRIPTION,
  type AdjustPointsOptions,
  type LoyaltySummary,
} from './loyalty/loyalty-service.js';
export {
  calculateItemPoints,
  calculateLevel,
  priceBasisValue,
  xpToNextLevel,
} from './loyalty/points-calculator.js';
export {
  InMemorySettingsStore,
  PriceBasis,
  REDEMPTION_CURRENCIES,
  readLoyaltySettings,
  readRedemptionRatio,
  type LoyaltySettings,
  type SettingsStore,
  type SettingValue,
} from './loyalty/settings.js';
export { registerLoyaltyHandlers } from './loyalty/handlers.js';
export { DEFAULT_TIERS, seedDefaultTiers } from './loyalty/default-tiers.js';
export * from './loyalty/tasks/index.js';
export { LoyaltyTier } from './domain/loyalty/loyalty-tier.js';
export { TransactionKind, type PointsTransaction } from './domain/loyalty/points-transaction.js';
export type { UserAccount } from './domain/user/user-account.js';

// Money
export { Decimal, type DecimalInput, type RoundingMode } from './domain/shared/decimal.js';
export { Money, type MoneyJSON } from './domain/shared/money.js';

// Persistence
export { LedgerDatabase, openDatabase, runMigration } from './infrastructure/sqlite/database.js';
export { SqliteSettingsStore } from './infrastructure/sqlite/settings.repository.js';

// Tasks
export {
  Task,
  required,
  optional,
  type TaskClass,
  type TaskLike,
  type TaskSettings,
  type AttributeDefinition,
  type AttributesSchema,
  type CallbackType,
  type CallbackDefinition,
  type CallbacksConfig,
  type MiddlewareFunction,
  type ExecuteOptions,
} from './task.js';
export { Context, createContext } from './context.js';
export {
  Result,
  type State,
  type Status,
  type Outcome,
  type ResultMetadata,
  type ResultJSON,
  type TaskReport,
} from './result.js';
export {
  TaskQueue,
  type TaskTicket,
  type TaskFailure,
  type TaskQueueOptions,
} from './queue/task-queue.js';
export { Container } from './container.js';
export { container, type LedgerContainer, type LedgerServices } from './services.js';

// Errors
export {
  LedgerError,
  InvalidDecimalError,
  InvalidMoneyError,
  CurrencyMismatchError,
  InvalidTransitionError,
  InsufficientStockError,
  ProductNotFoundError,
  OrderNotFoundError,
  OrderItemNotFoundError,
  UserNotFoundError,
  LoyaltyValidationError,
  OrderValidationError,
  PaymentError,
  ConfigurationError,
  TimeoutError,
  ErrorCollection,
  type LoyaltyValidationReason,
} from './errors.js';

// Configuration
export {
  configure,
  getConfiguration,
  resetConfiguration,
  loadRuntimeConfig,
  applyRuntimeConfig,
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  MiddlewareRegistry,
  CallbackRegistry,
  type LedgerConfiguration,
  type RetryPolicy,
  type RuntimeConfig,
} from './config.js';

// Logging
export {
  Logger,
  createLogger,
  LineFormatter,
  JsonFormatter,
  type LogLevel,
  type LogFormatter,
} from './logging/index.js';
