/**
 * Runtime - one fully wired ledger over a database
 */

import { applyRuntimeConfig, getConfiguration, loadRuntimeConfig } from './config.js';
import { Container } from './container.js';
import { EventBus } from './events/event-bus.js';
import { openDatabase, type LedgerDatabase } from './infrastructure/sqlite/database.js';
import { OrderRepository } from './infrastructure/sqlite/order.repository.js';
import { PointsRepository } from './infrastructure/sqlite/points.repository.js';
import { ProductRepository } from './infrastructure/sqlite/product.repository.js';
import { SqliteSettingsStore } from './infrastructure/sqlite/settings.repository.js';
import { StockLogRepository } from './infrastructure/sqlite/stock-log.repository.js';
import { TierRepository } from './infrastructure/sqlite/tier.repository.js';
import { UserRepository } from './infrastructure/sqlite/user.repository.js';
import type { Logger } from './logging/logger.js';
import { seedDefaultTiers } from './loyalty/default-tiers.js';
import { registerLoyaltyHandlers } from './loyalty/handlers.js';
import { LoyaltyService } from './loyalty/loyalty-service.js';
import type { SettingsStore } from './loyalty/settings.js';
import { OrderService } from './orders/order-service.js';
import { TaskQueue } from './queue/task-queue.js';
import type { LedgerContainer, LedgerServices } from './services.js';
import { StockGuard } from './stock/stock-guard.js';

export interface LedgerRuntimeOptions {
  /** An open database; takes precedence over `dbPath` */
  db?: LedgerDatabase;
  /** Database file, or `:memory:` (default) */
  dbPath?: string;
  /** Loyalty settings (default: the database's `settings` table) */
  settings?: SettingsStore;
  logger?: Logger;
  concurrency?: number;
  /** Insert the default tiers when the tier table is empty (default: true) */
  seedTiers?: boolean;
}

export interface LedgerRepositories {
  products: ProductRepository;
  users: UserRepository;
  tiers: TierRepository;
  orders: OrderRepository;
  points: PointsRepository;
  stockLogs: StockLogRepository;
}

export interface LedgerRuntime {
  db: LedgerDatabase;
  repositories: LedgerRepositories;
  settings: SettingsStore;
  stock: StockGuard;
  events: EventBus;
  orders: OrderService;
  loyalty: LoyaltyService;
  queue: TaskQueue;
  container: LedgerContainer;
  /** Wait for queued tasks, then close the database */
  close(): Promise<void>;
}

export function createLedgerRuntime(options: LedgerRuntimeOptions = {}): LedgerRuntime {
  const logger = options.logger ?? getConfiguration().logger;
  const db = options.db ?? openDatabase(options.dbPath ?? ':memory:', { logger });

  const repositories: LedgerRepositories = {
    products: new ProductRepository(db),
    users: new UserRepository(db),
    tiers: new TierRepository(db),
    orders: new OrderRepository(db),
    points: new PointsRepository(db),
    stockLogs: new StockLogRepository(db),
  };
  if (options.seedTiers ?? true) {
    seedDefaultTiers(repositories.tiers);
  }

  const settings = options.settings ?? new SqliteSettingsStore(db);
  const events = new EventBus(logger);
  const stock = new StockGuard({
    db,
    products: repositories.products,
    stockLogs: repositories.stockLogs,
    logger,
  });
  const orders = new OrderService({
    db,
    orders: repositories.orders,
    products: repositories.products,
    users: repositories.users,
    stock,
    events,
    logger,
  });
  const loyalty = new LoyaltyService({
    db,
    points: repositories.points,
    users: repositories.users,
    tiers: repositories.tiers,
    orders: repositories.orders,
    products: repositories.products,
    settings,
    logger,
  });

  const container = new Container<LedgerServices>();
  container.registerInstance('loyalty', loyalty);
  container.registerInstance('logger', logger);

  const queue = new TaskQueue({ container, concurrency: options.concurrency, logger });
  registerLoyaltyHandlers({ db, events, queue, logger });

  return {
    db,
    repositories,
    settings,
    stock,
    events,
    orders,
    loyalty,
    queue,
    container,
    async close() {
      await queue.drain();
      db.close();
    },
  };
}

/**
 * Configure from environment variables and open the configured database
 */
export function createLedgerRuntimeFromEnv(
  env: Record<string, string | undefined> = process.env
): LedgerRuntime {
  const runtime = loadRuntimeConfig(env);
  applyRuntimeConfig(runtime);
  return createLedgerRuntime({ dbPath: runtime.dbPath, concurrency: runtime.queueConcurrency });
}
