/**
 * Built-in middleware for common cross-cutting concerns.
 */

export { TimeoutMiddleware, type TimeoutOptions } from './timeout.js';
export { CorrelateMiddleware, type CorrelateOptions } from './correlate.js';
export { RuntimeMiddleware, type RuntimeOptions } from './runtime.js';
export type { MiddlewareConditions } from './conditions.js';

export type { MiddlewareFunction } from '../task.js';
