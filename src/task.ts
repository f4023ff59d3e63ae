/**
 * Task - Base class for retryable units of work that report a Result
 */

import { backoffDelay, getConfiguration } from './config.js';
import { Context, createContext } from './context.js';
import { ErrorCollection } from './errors.js';
import { Result, type ResultMetadata, type State, type Status } from './result.js';
import { container as defaultContainer, type LedgerContainer, type LedgerServices } from './services.js';
import { generateTimeOrderedUUID } from './utils/uuid.js';

export type AttributeType = 'string' | 'integer' | 'number' | 'boolean' | 'date' | 'object' | 'array';

/**
 * Attribute definition for required/optional helpers
 */
export interface AttributeDefinition {
  required?: boolean;
  type?: AttributeType | AttributeType[];
  default?: unknown;
  description?: string;
  presence?: boolean | { message?: string };
  numeric?: {
    min?: number;
    max?: number;
    message?: string;
  };
  inclusion?: { in: readonly unknown[]; message?: string };
}

export type AttributesSchema = Record<string, AttributeDefinition>;

type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * Task settings configuration
 */
export interface TaskSettings {
  tags?: string[];

  /** Attempts after the first; falls back to the global retry policy */
  retries?: number;
  /** Error classes worth retrying (default: every Error) */
  retryOn?: ErrorClass[];
  /** Milliseconds before retry `n`, or a function of `n` */
  retryDelay?: number | ((retry: number) => number);

  rollbackOn?: Status[];
}

/**
 * Callback types
 */
export type CallbackType =
  | 'beforeValidation'
  | 'beforeExecution'
  | 'onComplete'
  | 'onInterrupted'
  | 'onExecuted'
  | 'onSuccess'
  | 'onSkipped'
  | 'onFailed';

/**
 * What callbacks get to see of a running task
 */
export interface TaskLike {
  readonly id: string;
  readonly taskName: string;
  readonly settings: TaskSettings;
  readonly state: State;
  readonly status: Status;
}

export type CallbackDefinition = (task: TaskLike) => void | Promise<void>;

export type CallbacksConfig = Partial<Record<CallbackType, CallbackDefinition[]>>;

/**
 * Middleware function type
 */
export type MiddlewareFunction = <T extends object>(
  task: Task<T>,
  next: () => Promise<Result<T>>
) => Promise<Result<T>>;

/**
 * Task class type for static methods
 */
export interface TaskClass<T extends object = Record<string, unknown>> {
  new (): Task<T>;
  readonly name: string;
  attributes?: AttributesSchema;
  settings?: TaskSettings;
  callbacks?: CallbacksConfig;
  middlewares?: MiddlewareFunction[];
}

/**
 * Execute options
 */
export interface ExecuteOptions<T extends object = Record<string, unknown>> {
  context?: Context<T>;
  container?: LedgerContainer;
}

/**
 * Internal halt signal for skip/fail
 */
class HaltSignal extends Error {
  readonly status: 'skipped' | 'failed';
  readonly reason: string;
  readonly metadata: Record<string, unknown>;

  constructor(
    status: 'skipped' | 'failed',
    reason: string,
    metadata: Record<string, unknown> = {}
  ) {
    super(reason);
    this.status = status;
    this.reason = reason;
    this.metadata = metadata;
  }
}

/**
 * Base Task class.
 *
 * @example
 * ```typescript
 * class RecalculateTier extends Task<{ tierId: number | null }> {
 *   static override attributes = {
 *     userId: required({ type: 'integer', numeric: { min: 1 } }),
 *   };
 *
 *   declare userId: number;
 *
 *   override work() {
 *     const tier = this.resolve('loyalty').recalculateTier(this.userId);
 *     this.context.set('tierId', tier?.id ?? null);
 *   }
 * }
 *
 * const result = await RecalculateTier.execute({ userId: 7 });
 * ```
 */
export abstract class Task<TContext extends object = Record<string, unknown>> implements TaskLike {
  /** Unique identifier for this task instance */
  readonly id: string;

  /** Shared context for this execution */
  context: Context<TContext>;

  /** Error collection for validation errors */
  readonly errors: ErrorCollection;

  private _container: LedgerContainer = defaultContainer;

  private _state: State = 'initialized';

  private _status: Status = 'success';

  private _reason?: string;

  private _cause?: Error;

  private _metadata: ResultMetadata = {};

  private _retries = 0;

  private _rolledBack = false;

  // Static configuration (override in subclasses)
  static attributes?: AttributesSchema;
  static settings?: TaskSettings;
  static callbacks?: CallbacksConfig;
  static middlewares?: MiddlewareFunction[];

  constructor(context?: Context<TContext>) {
    this.id = generateTimeOrderedUUID();
    this.context = context ?? createContext<TContext>();
    this.errors = new ErrorCollection();
  }

  /**
   * The main work method to be implemented by subclasses.
   */
  abstract work(): void | Promise<void>;

  /**
   * Optional rollback method called when execution fails.
   */
  rollback?(): void | Promise<void>;

  // ============================================
  // Interruption methods
  // ============================================

  /**
   * Skip task execution with optional reason and metadata.
   */
  protected skip(reason?: string, metadata?: Record<string, unknown>): never {
    throw new HaltSignal('skipped', reason ?? 'Unspecified', metadata);
  }

  /**
   * Fail task execution with optional reason and metadata.
   */
  protected fail(reason?: string, metadata?: Record<string, unknown>): never {
    throw new HaltSignal('failed', reason ?? 'Unspecified', metadata);
  }

  /**
   * Look up a service in the container this execution was given
   */
  protected resolve<K extends keyof LedgerServices>(key: K): LedgerServices[K] {
    return this._container.resolve(key);
  }

  // ============================================
  // Accessors
  // ============================================

  get taskClass(): TaskClass<TContext> {
    return taskClassOf(this);
  }

  get taskName(): string {
    return this.taskClass.name;
  }

  get attributesSchema(): AttributesSchema {
    return this.taskClass.attributes ?? {};
  }

  get settings(): TaskSettings {
    return this.taskClass.settings ?? {};
  }

  get state(): State {
    return this._state;
  }

  get status(): Status {
    return this._status;
  }

  get retries(): number {
    return this._retries;
  }

  // ============================================
  // Static execution
  // ============================================

  /**
   * Execute the task and return a Result (never throws on business logic errors).
   */
  static async execute<T extends object>(
    this: TaskClass<T>,
    args?: Record<string, unknown>,
    options?: ExecuteOptions<T>
  ): Promise<Result<T>> {
    const task = new this();
    return task.perform(args, options);
  }

  /**
   * Run this instance once. Used where the task class is only known at run
   * time, such as the task queue.
   */
  async perform(
    args?: Record<string, unknown>,
    options?: ExecuteOptions<TContext>
  ): Promise<Result<TContext>> {
    if (options?.context) {
      this.context = options.context;
    }
    if (options?.container) {
      this._container = options.container;
    }

    this._applyAttributes(args ?? {});

    return this._executeWithMiddleware();
  }

  /**
   * Global middlewares wrap class middlewares; the first listed is outermost
   */
  private async _executeWithMiddleware(): Promise<Result<TContext>> {
    const middlewares = [
      ...getConfiguration().middlewares.registry,
      ...(this.taskClass.middlewares ?? []),
    ];

    let next = (): Promise<Result<TContext>> => this._executeCore();

    for (let i = middlewares.length - 1; i >= 0; i--) {
      const middleware = middlewares[i];
      if (!middleware) continue;
      const currentNext = next;
      next = () => middleware(this, currentNext);
    }

    return next();
  }

  private async _executeCore(): Promise<Result<TContext>> {
    try {
      await this._runCallbacks('beforeValidation');

      this._validateAttributes();

      if (!this.errors.isEmpty) {
        this._state = 'interrupted';
        this._status = 'failed';
        this._reason = 'Invalid';
        this._metadata.errors = {
          fullMessage: this.errors.fullMessage,
          messages: this.errors.messages,
        };
        return this._createResult();
      }

      await this._runCallbacks('beforeExecution');

      this._state = 'executing';
      await this._executeWithRetry();

      this._state = 'complete';
      this._status = 'success';
    } catch (error) {
      this._state = 'interrupted';
      this._status = 'failed';
      if (error instanceof HaltSignal) {
        this._status = error.status;
        this._reason = error.reason;
        this._metadata = { ...this._metadata, ...error.metadata };
      } else if (error instanceof Error) {
        this._reason = `[${error.name}] ${error.message}`;
        this._cause = error;
      } else {
        this._reason = String(error);
      }

      const rollbackOn = this.settings.rollbackOn ?? ['failed'];
      if (rollbackOn.includes(this._status) && this.rollback) {
        try {
          await this.rollback();
          this._rolledBack = true;
        } catch (rollbackError) {
          getConfiguration().logger.error('Task rollback failed', {
            task: this.taskName,
            taskId: this.id,
            error: rollbackError,
          });
        }
      }
    }

    await this._runLifecycleCallbacks();

    return this._createResult();
  }

  private async _executeWithRetry(): Promise<void> {
    const policy = getConfiguration().retry;
    const maxRetries = this.settings.retries ?? policy.retries;
    const retryOn = this.settings.retryOn ?? [Error];

    for (let attempt = 0; ; attempt++) {
      try {
        await this.work();
        return;
      } catch (error) {
        if (error instanceof HaltSignal || !(error instanceof Error)) {
          throw error;
        }

        const shouldRetry = retryOn.some((cls) => error instanceof cls);
        if (!shouldRetry || attempt >= maxRetries) {
          throw error;
        }

        this._retries = attempt + 1;
        const delay = this._retryDelay(this._retries);
        getConfiguration().logger.warn('Task attempt failed; retrying', {
          task: this.taskName,
          taskId: this.id,
          retry: this._retries,
          delayMs: delay,
          error,
        });
        if (delay > 0) {
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }
  }

  private _retryDelay(retry: number): number {
    const configured = this.settings.retryDelay;
    if (typeof configured === 'number') {
      return configured;
    }
    if (typeof configured === 'function') {
      return configured(retry);
    }
    return backoffDelay(getConfiguration().retry, retry);
  }

  /**
   * Bind attribute values (or their defaults) to the instance
   */
  private _applyAttributes(args: Record<string, unknown>): void {
    for (const [name, def] of Object.entries(this.attributesSchema)) {
      let value = args[name];

      if (value === undefined) {
        value = def.default;
      }

      Reflect.set(this, name, value);
    }
  }

  private _validateAttributes(): void {
    for (const [name, def] of Object.entries(this.attributesSchema)) {
      const value: unknown = Reflect.get(this, name);

      if (value === undefined || value === null) {
        if (def.required) {
          this.errors.add(name, 'is required');
        }
        continue;
      }

      if (def.type !== undefined) {
        const types = Array.isArray(def.type) ? def.type : [def.type];
        if (!types.some((type) => matchesType(value, type))) {
          this.errors.add(name, `must be ${types.map(describeType).join(' or ')}`);
          continue;
        }
      }

      if (def.presence && typeof value === 'string' && value.trim() === '') {
        const msg = typeof def.presence === 'object' ? def.presence.message : undefined;
        this.errors.add(name, msg ?? "can't be blank");
      }

      if (def.numeric && typeof value === 'number') {
        const { min, max, message } = def.numeric;
        if (min !== undefined && value < min) {
          this.errors.add(name, message ?? `must be greater than or equal to ${min}`);
        }
        if (max !== undefined && value > max) {
          this.errors.add(name, message ?? `must be less than or equal to ${max}`);
        }
      }

      if (def.inclusion && !def.inclusion.in.includes(value)) {
        this.errors.add(name, def.inclusion.message ?? 'is not included in the list');
      }
    }
  }

  private async _runCallbacks(type: CallbackType): Promise<void> {
    const callbacks = [
      ...getConfiguration().callbacks.get(type),
      ...(this.taskClass.callbacks?.[type] ?? []),
    ];

    for (const callback of callbacks) {
      await callback(this);
    }
  }

  private async _runLifecycleCallbacks(): Promise<void> {
    if (this._state === 'complete') {
      await this._runCallbacks('onComplete');
    } else if (this._state === 'interrupted') {
      await this._runCallbacks('onInterrupted');
    }

    await this._runCallbacks('onExecuted');

    if (this._status === 'success') {
      await this._runCallbacks('onSuccess');
    } else if (this._status === 'skipped') {
      await this._runCallbacks('onSkipped');
    } else {
      await this._runCallbacks('onFailed');
    }
  }

  private _createResult(): Result<TContext> {
    return new Result<TContext>({
      task: this,
      context: this.context,
      state: this._state,
      status: this._status,
      reason: this._reason,
      cause: this._cause,
      metadata: this._metadata,
      retries: this._retries,
      rolledBack: this._rolledBack,
    });
  }

  [Symbol.toStringTag] = 'Task';
}

function taskClassOf<T extends object>(task: Task<T>): TaskClass<T> {
  const ctor: unknown = task.constructor;
  if (!isTaskClass<T>(ctor)) {
    throw new TypeError(`${String(ctor)} is not a task class`);
  }
  return ctor;
}

function isTaskClass<T extends object>(value: unknown): value is TaskClass<T> {
  return typeof value === 'function' && value.prototype instanceof Task;
}

function matchesType(value: unknown, type: AttributeType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'date':
      return value instanceof Date && !Number.isNaN(value.getTime());
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}

function describeType(type: AttributeType): string {
  return type === 'integer' || type === 'array' || type === 'object' ? `an ${type}` : `a ${type}`;
}

// ============================================
// Attribute definition helpers
// ============================================

/**
 * Define a required attribute
 */
export function required(options: Omit<AttributeDefinition, 'required'> = {}): AttributeDefinition {
  return { ...options, required: true };
}

/**
 * Define an optional attribute
 */
export function optional(options: Omit<AttributeDefinition, 'required'> = {}): AttributeDefinition {
  return { ...options, required: false };
}
