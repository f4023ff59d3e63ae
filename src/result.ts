/**
 * Result - Immutable outcome of task execution
 */

import type { Context } from './context.js';
import type { Task } from './task.js';

/**
 * Execution states
 */
export type State = 'initialized' | 'executing' | 'complete' | 'interrupted';

/**
 * Execution statuses
 */
export type Status = 'success' | 'skipped' | 'failed';

/**
 * Outcome combines state and status for pattern matching
 */
export type Outcome = 'success' | 'skipped' | 'failed' | 'interrupted';

/**
 * Result metadata
 */
export interface ResultMetadata {
  [key: string]: unknown;
  errors?: {
    fullMessage: string;
    messages: Record<string, string[]>;
  };
  runtime?: number;
  correlationId?: string;
}

/**
 * Plain report handed to queue consumers and operators
 */
export type TaskReport =
  | ({ status: 'success' } & Record<string, unknown>)
  | ({ status: 'error'; reason: string; retries: number } & Record<string, unknown>);

/**
 * Options for creating a result
 */
export interface ResultOptions<T extends object> {
  task: Task<T>;
  context: Context<T>;
  state?: State;
  status?: Status;
  reason?: string;
  cause?: Error;
  metadata?: ResultMetadata;
  retries?: number;
  rolledBack?: boolean;
}

/**
 * Immutable result object representing the outcome of task execution.
 */
export class Result<T extends object = Record<string, unknown>> {
  /** The task that produced this result */
  readonly task: Task<T>;

  /** The context at the time of result creation */
  readonly context: Context<T>;

  /** Execution lifecycle state */
  readonly state: State;

  /** Business outcome status */
  readonly status: Status;

  /** Reason for interruption (skip/fail) */
  readonly reason?: string;

  /** The exception that caused the interruption */
  readonly cause?: Error;

  readonly metadata: Readonly<ResultMetadata>;

  /** Number of retry attempts made */
  readonly retries: number;

  /** Whether rollback was executed */
  readonly rolledBack: boolean;

  constructor(options: ResultOptions<T>) {
    this.task = options.task;
    this.context = options.context;
    this.state = options.state ?? 'initialized';
    this.status = options.status ?? 'success';
    this.reason = options.reason;
    this.cause = options.cause;
    this.metadata = Object.freeze({ ...options.metadata });
    this.retries = options.retries ?? 0;
    this.rolledBack = options.rolledBack ?? false;

    Object.freeze(this);
  }

  get complete(): boolean {
    return this.state === 'complete';
  }

  get interrupted(): boolean {
    return this.state === 'interrupted';
  }

  get success(): boolean {
    return this.status === 'success';
  }

  get skipped(): boolean {
    return this.status === 'skipped';
  }

  get failed(): boolean {
    return this.status === 'failed';
  }

  /** Check if outcome is good (success or skipped) */
  get good(): boolean {
    return this.status === 'success' || this.status === 'skipped';
  }

  /** Check if outcome is bad (skipped or failed) */
  get bad(): boolean {
    return this.status === 'skipped' || this.status === 'failed';
  }

  get outcome(): Outcome {
    if (this.state === 'interrupted') {
      return this.status === 'skipped' ? 'skipped' : 'interrupted';
    }
    return this.status;
  }

  get retried(): boolean {
    return this.retries > 0;
  }

  /**
   * Copy of this result with `metadata` merged in
   */
  withMetadata(metadata: ResultMetadata): Result<T> {
    return new Result<T>({
      task: this.task,
      context: this.context,
      state: this.state,
      status: this.status,
      reason: this.reason,
      cause: this.cause,
      metadata: { ...this.metadata, ...metadata },
      retries: this.retries,
      rolledBack: this.rolledBack,
    });
  }

  /**
   * Success reports carry the context; failures carry the reason, the
   * retry count and the failure metadata.
   */
  toReport(): TaskReport {
    if (this.failed) {
      const { errors, runtime: _runtime, correlationId: _correlationId, ...details } = this.metadata;
      return {
        ...details,
        ...(errors ? { errors: errors.messages } : {}),
        status: 'error',
        reason: this.reason ?? 'Unspecified',
        retries: this.retries,
      };
    }
    return {
      ...this.context.toRecord(),
      ...(this.skipped ? { skipped: this.reason ?? 'Unspecified' } : {}),
      status: 'success',
    };
  }

  toJSON(): ResultJSON {
    return {
      type: this.task.constructor.name,
      taskId: this.task.id,
      state: this.state,
      status: this.status,
      outcome: this.outcome,
      reason: this.reason,
      metadata: this.metadata,
      retries: this.retries,
      rolledBack: this.rolledBack,
    };
  }

  [Symbol.toStringTag] = 'Result';
}

/**
 * JSON representation of a result
 */
export interface ResultJSON {
  type: string;
  taskId: string;
  state: State;
  status: Status;
  outcome: Outcome;
  reason?: string;
  metadata: Readonly<ResultMetadata>;
  retries: number;
  rolledBack: boolean;
}
