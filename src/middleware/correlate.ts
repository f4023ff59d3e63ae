/**
 * Correlate Middleware - Add correlation IDs for tracing
 */

import type { MiddlewareFunction, TaskLike } from '../task.js';
import { generateTimeOrderedUUID } from '../utils/uuid.js';
import { shouldApply, type MiddlewareConditions } from './conditions.js';

export interface CorrelateOptions extends MiddlewareConditions {
  /** Correlation ID or function to produce one (default: a fresh UUID v7) */
  id?: string | ((task: TaskLike) => string);
}

/**
 * Middleware that stamps `metadata.correlationId` on the task result.
 *
 * @example
 * ```typescript
 * static override middlewares = [CorrelateMiddleware({ id: () => requestId })];
 * ```
 */
export function CorrelateMiddleware(options: CorrelateOptions = {}): MiddlewareFunction {
  return async (task, next) => {
    if (!shouldApply(task, options)) {
      return next();
    }

    const { id } = options;
    const correlationId =
      id === undefined ? generateTimeOrderedUUID() : typeof id === 'function' ? id(task) : id;

    const result = await next();
    return result.withMetadata({ correlationId });
  };
}
