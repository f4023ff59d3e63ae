/**
 * Global Configuration
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { createLogger, type Logger } from './logging/logger.js';
import { JsonFormatter } from './logging/formatters/json.js';
import { LineFormatter } from './logging/formatters/line.js';
import type { CallbackDefinition, CallbackType, MiddlewareFunction } from './task.js';

/**
 * Exponential backoff between task attempts:
 * `min(maxDelayMs, baseDelayMs * factor ^ (retry - 1))`
 */
export interface RetryPolicy {
  retries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

/**
 * Global configuration options
 */
export interface LedgerConfiguration {
  logger: Logger;
  /** Used by tasks that do not set their own retry settings */
  retry: RetryPolicy;
  queueConcurrency: number;

  // Registries
  middlewares: MiddlewareRegistry;
  callbacks: CallbackRegistry;
}

/**
 * Middleware registry; registered middlewares wrap every task
 */
export class MiddlewareRegistry {
  private _middlewares: MiddlewareFunction[] = [];

  get registry(): readonly MiddlewareFunction[] {
    return this._middlewares;
  }

  register(middleware: MiddlewareFunction): void {
    this._middlewares.push(middleware);
  }

  deregister(middleware: MiddlewareFunction): boolean {
    const index = this._middlewares.indexOf(middleware);
    if (index !== -1) {
      this._middlewares.splice(index, 1);
      return true;
    }
    return false;
  }

  clear(): void {
    this._middlewares = [];
  }
}

/**
 * Callback registry; registered callbacks run before a task's own
 */
export class CallbackRegistry {
  private _callbacks: Map<CallbackType, CallbackDefinition[]> = new Map();

  register(type: CallbackType, callback: CallbackDefinition): void {
    const existing = this._callbacks.get(type) ?? [];
    existing.push(callback);
    this._callbacks.set(type, existing);
  }

  deregister(type: CallbackType, callback: CallbackDefinition): boolean {
    const existing = this._callbacks.get(type);
    if (!existing) return false;

    const index = existing.indexOf(callback);
    if (index !== -1) {
      existing.splice(index, 1);
      return true;
    }
    return false;
  }

  get(type: CallbackType): readonly CallbackDefinition[] {
    return this._callbacks.get(type) ?? [];
  }

  clear(): void {
    this._callbacks.clear();
  }
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  retries: 5,
  baseDelayMs: 300_000,
  factor: 2,
  maxDelayMs: 3_600_000,
});

function createDefaultConfiguration(): LedgerConfiguration {
  return {
    logger: createLogger(),
    retry: { ...DEFAULT_RETRY_POLICY },
    queueConcurrency: 4,
    middlewares: new MiddlewareRegistry(),
    callbacks: new CallbackRegistry(),
  };
}

let configuration: LedgerConfiguration = createDefaultConfiguration();

/**
 * Get the current configuration
 */
export function getConfiguration(): LedgerConfiguration {
  return configuration;
}

export function configure(fn: (config: LedgerConfiguration) => void): void {
  fn(configuration);
}

/**
 * Reset configuration to defaults
 */
export function resetConfiguration(): void {
  configuration = createDefaultConfiguration();
}

/**
 * Delay before retry number `retry` (1-based)
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.factor, Math.max(0, retry - 1));
  return Math.min(policy.maxDelayMs, delay);
}

// ============================================
// Environment
// ============================================

const runtimeEnvSchema = z.object({
  LEDGER_DB_PATH: z.string().min(1).default('data/ledger.sqlite'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['line', 'json']).default('line'),
  TASK_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.retries),
  TASK_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.baseDelayMs),
  TASK_QUEUE_CONCURRENCY: z.coerce.number().int().min(1).default(4),
});

export interface RuntimeConfig {
  dbPath: string;
  logLevel: z.infer<typeof runtimeEnvSchema>['LOG_LEVEL'];
  logFormat: z.infer<typeof runtimeEnvSchema>['LOG_FORMAT'];
  taskMaxRetries: number;
  taskRetryDelayMs: number;
  queueConcurrency: number;
}

/**
 * Read runtime settings from environment variables
 */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env
): RuntimeConfig {
  const parsed = runtimeEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid runtime configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }
  const values = parsed.data;
  return {
    dbPath: values.LEDGER_DB_PATH,
    logLevel: values.LOG_LEVEL,
    logFormat: values.LOG_FORMAT,
    taskMaxRetries: values.TASK_MAX_RETRIES,
    taskRetryDelayMs: values.TASK_RETRY_DELAY_MS,
    queueConcurrency: values.TASK_QUEUE_CONCURRENCY,
  };
}

/**
 * Apply runtime settings to the global configuration
 */
export function applyRuntimeConfig(runtime: RuntimeConfig): void {
  configure((config) => {
    config.logger = createLogger({
      level: runtime.logLevel,
      formatter: runtime.logFormat === 'json' ? new JsonFormatter() : new LineFormatter(),
    });
    config.retry = {
      ...config.retry,
      retries: runtime.taskMaxRetries,
      baseDelayMs: runtime.taskRetryDelayMs,
    };
    config.queueConcurrency = runtime.queueConcurrency;
  });
}
