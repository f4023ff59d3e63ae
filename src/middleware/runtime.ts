/**
 * Runtime Middleware - Track task execution time
 */

import { performance } from 'node:perf_hooks';
import type { MiddlewareFunction } from '../task.js';
import { shouldApply, type MiddlewareConditions } from './conditions.js';

export type RuntimeOptions = MiddlewareConditions;

/**
 * Middleware that records execution time in milliseconds (monotonic clock)
 * as `metadata.runtime`.
 *
 * @example
 * ```typescript
 * configure((config) => config.middlewares.register(RuntimeMiddleware()));
 * ```
 */
export function RuntimeMiddleware(options: RuntimeOptions = {}): MiddlewareFunction {
  return async (task, next) => {
    if (!shouldApply(task, options)) {
      return next();
    }

    const startTime = performance.now();
    const result = await next();
    const runtime = Math.round(performance.now() - startTime);

    return result.withMetadata({ runtime });
  };
}
