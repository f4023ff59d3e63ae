/**
 * Timeout Middleware - Prevent tasks from running too long
 */

import { TimeoutError } from '../errors.js';
import { Result } from '../result.js';
import type { MiddlewareFunction } from '../task.js';
import { shouldApply, type MiddlewareConditions } from './conditions.js';

export interface TimeoutOptions extends MiddlewareConditions {
  /** Timeout in seconds (default: 3) */
  seconds?: number;
}

const DEFAULT_TIMEOUT_SECONDS = 3;

/**
 * Middleware that fails the task when it runs longer than `seconds`.
 * The work itself is not cancelled; its eventual outcome is discarded.
 * Only time spent awaiting is bounded: synchronous work settles the race
 * before the timer can fire.
 *
 * @example
 * ```typescript
 * static override middlewares = [TimeoutMiddleware({ seconds: 30 })];
 * ```
 */
export function TimeoutMiddleware(options: TimeoutOptions = {}): MiddlewareFunction {
  return async (task, next) => {
    if (!shouldApply(task, options)) {
      return next();
    }

    const seconds = options.seconds ?? DEFAULT_TIMEOUT_SECONDS;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<TimeoutError>((resolve) => {
      timer = setTimeout(() => resolve(new TimeoutError(seconds)), seconds * 1000);
    });

    try {
      const outcome = await Promise.race([next(), timeout]);
      if (outcome instanceof TimeoutError) {
        return new Result({
          task,
          context: task.context,
          state: 'interrupted',
          status: 'failed',
          reason: `[${outcome.name}] ${outcome.message}`,
          cause: outcome,
          retries: task.retries,
        });
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  };
}
