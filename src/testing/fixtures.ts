/**
 * Shared helpers for tests: captured logs and an in-memory ledger
 */

import { configure } from '../config.js';
import type { Product } from '../domain/catalog/product.js';
import { Money } from '../domain/shared/money.js';
import type { UserAccount } from '../domain/user/user-account.js';
import type { NewProduct } from '../infrastructure/sqlite/product.repository.js';
import { JsonFormatter } from '../logging/formatters/json.js';
import { Logger, type LogLevel, type LogOutput } from '../logging/logger.js';
import { InMemorySettingsStore, type SettingValue } from '../loyalty/settings.js';
import { createLedgerRuntime, type LedgerRuntime } from '../runtime.js';

/**
 * Keeps every written log line in memory
 */
export class MemoryLogOutput implements LogOutput {
  readonly lines: string[] = [];

  write(chunk: string): boolean {
    this.lines.push(chunk);
    return true;
  }

  /** Parsed JSON entries; assumes the logger uses `JsonFormatter` */
  entries(): Record<string, unknown>[] {
    return this.lines.map((line) => parseEntry(line));
  }

  messages(): string[] {
    return this.entries().map((entry) => String(entry['message'] ?? ''));
  }

  find(message: string): Record<string, unknown> | undefined {
    return this.entries().find((entry) => entry['message'] === message);
  }
}

function parseEntry(line: string): Record<string, unknown> {
  const value: unknown = JSON.parse(line);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new TypeError(`Log line is not a JSON object: ${line}`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function createTestLogger(level: LogLevel = 'debug'): {
  logger: Logger;
  output: MemoryLogOutput;
} {
  const output = new MemoryLogOutput();
  const logger = new Logger({ output, formatter: new JsonFormatter(), level, progname: 'test' });
  return { logger, output };
}

/**
 * Route global logging to a captured logger and retry without waiting.
 * Pair with `resetConfiguration()` after each test.
 */
export function useTestConfiguration(): { logger: Logger; output: MemoryLogOutput } {
  const captured = createTestLogger();
  configure((config) => {
    config.logger = captured.logger;
    config.retry = { ...config.retry, baseDelayMs: 0 };
  });
  return captured;
}

export interface TestLedger {
  runtime: LedgerRuntime;
  settings: InMemorySettingsStore;
  output: MemoryLogOutput;
  createUser(email?: string): UserAccount;
  createProduct(overrides?: Partial<NewProduct>): Product;
}

let emailCounter = 0;

/**
 * Ledger over a private `:memory:` database with default tiers seeded
 */
export function createTestLedger(settings: Record<string, SettingValue> = {}): TestLedger {
  const { logger, output } = useTestConfiguration();
  const store = new InMemorySettingsStore(settings);
  const runtime = createLedgerRuntime({ dbPath: ':memory:', settings: store, logger });

  return {
    runtime,
    settings: store,
    output,
    createUser(email) {
      emailCounter++;
      return runtime.repositories.users.create(email ?? `customer${emailCounter}@example.test`);
    },
    createProduct(overrides = {}) {
      return runtime.repositories.products.create({
        name: 'Widget',
        price: Money.of('100.00', 'EUR'),
        stock: 10,
        ...overrides,
      });
    },
  };
}

/**
 * Deterministic PRNG (mulberry32) for property tests
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max] */
export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}
