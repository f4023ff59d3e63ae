/**
 * TaskQueue - in-process asynchronous worker pool for tasks
 */

import { getConfiguration } from '../config.js';
import type { Logger } from '../logging/logger.js';
import type { TaskReport } from '../result.js';
import type { LedgerContainer } from '../services.js';
import type { TaskClass } from '../task.js';
import { generateTimeOrderedUUID } from '../utils/uuid.js';

export interface TaskTicket {
  readonly id: string;
  readonly taskName: string;
  /** Settles with the task's report once it has run; never rejects */
  readonly done: Promise<TaskReport>;
}

/**
 * A task that failed after its retry budget
 */
export interface TaskFailure {
  readonly ticketId: string;
  readonly taskName: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly reason: string;
  readonly retries: number;
  readonly failedAt: Date;
}

export type FailureListener = (failure: TaskFailure) => void;

export interface TaskQueueOptions {
  container: LedgerContainer;
  /** Tasks running at once (default: `queueConcurrency` from the configuration) */
  concurrency?: number;
  logger?: Logger;
}

interface Job {
  ticket: TaskTicket;
  run: () => Promise<void>;
}

/**
 * Runs enqueued tasks in the background with bounded concurrency. Each task
 * runs at least once; retries happen inside the task. A task that still
 * fails is recorded in `failures` and reported to failure listeners.
 */
export class TaskQueue {
  private readonly container: LedgerContainer;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly waiting: Job[] = [];
  private readonly failureLog: TaskFailure[] = [];
  private readonly failureListeners: FailureListener[] = [];
  private idleWaiters: (() => void)[] = [];
  private running = 0;
  private scheduled = false;

  constructor(options: TaskQueueOptions) {
    this.container = options.container;
    this.concurrency = Math.max(1, options.concurrency ?? getConfiguration().queueConcurrency);
    this.logger = (options.logger ?? getConfiguration().logger).child({ component: 'task-queue' });
  }

  /**
   * Queue `taskClass` to run with `args`. Returns immediately.
   */
  enqueue<T extends object>(
    taskClass: TaskClass<T>,
    args: Record<string, unknown> = {}
  ): TaskTicket {
    const id = generateTimeOrderedUUID();
    let settle: (report: TaskReport) => void = () => undefined;
    const done = new Promise<TaskReport>((resolve) => {
      settle = resolve;
    });
    const ticket: TaskTicket = { id, taskName: taskClass.name, done };

    this.waiting.push({
      ticket,
      run: async () => {
        settle(await this.execute(ticket, taskClass, args));
      },
    });
    this.logger.debug('Task enqueued', { ticket: id, task: taskClass.name });
    this.schedule();
    return ticket;
  }

  get pending(): number {
    return this.waiting.length;
  }

  get active(): number {
    return this.running;
  }

  get failures(): readonly TaskFailure[] {
    return [...this.failureLog];
  }

  onFailure(listener: FailureListener): () => void {
    this.failureListeners.push(listener);
    return () => {
      const index = this.failureListeners.indexOf(listener);
      if (index !== -1) this.failureListeners.splice(index, 1);
    };
  }

  /**
   * Resolves once nothing is waiting or running, including tasks enqueued
   * by the tasks being drained
   */
  drain(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private get isIdle(): boolean {
    return this.running === 0 && this.waiting.length === 0 && !this.scheduled;
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    queueMicrotask(() => {
      this.scheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const job = this.waiting.shift();
      if (!job) break;
      this.running++;
      void job.run().finally(() => {
        this.running--;
        this.pump();
      });
    }
    if (this.isIdle) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async execute<T extends object>(
    ticket: TaskTicket,
    taskClass: TaskClass<T>,
    args: Record<string, unknown>
  ): Promise<TaskReport> {
    try {
      const result = await new taskClass().perform(args, { container: this.container });
      this.logger.log(result, { tags: taskClass.settings?.tags });
      const report = result.toReport();
      if (result.failed) {
        this.recordFailure(ticket, args, result.reason ?? 'Unspecified', result.retries);
      }
      return report;
    } catch (error) {
      // Middleware or callbacks threw outside the task's own error handling
      const reason = error instanceof Error ? `[${error.name}] ${error.message}` : String(error);
      this.recordFailure(ticket, args, reason, 0);
      return { status: 'error', reason, retries: 0 };
    }
  }

  private recordFailure(
    ticket: TaskTicket,
    args: Record<string, unknown>,
    reason: string,
    retries: number
  ): void {
    const failure: TaskFailure = {
      ticketId: ticket.id,
      taskName: ticket.taskName,
      args: { ...args },
      reason,
      retries,
      failedAt: new Date(),
    };
    this.failureLog.push(failure);
    this.logger.error('Task failed', {
      ticket: ticket.id,
      task: ticket.taskName,
      reason,
      retries,
    });
    for (const listener of this.failureListeners) {
      try {
        listener(failure);
      } catch (error) {
        this.logger.error('Failure listener threw', { ticket: ticket.id, error });
      }
    }
  }
}
