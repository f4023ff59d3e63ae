import type { TaskLike } from '../task.js';

/**
 * `if` / `unless` guards shared by the built-in middlewares
 */
export interface MiddlewareConditions {
  if?: (task: TaskLike) => boolean;
  unless?: (task: TaskLike) => boolean;
}

export function shouldApply(task: TaskLike, options: MiddlewareConditions): boolean {
  if (options.if && !options.if(task)) {
    return false;
  }
  if (options.unless && options.unless(task)) {
    return false;
  }
  return true;
}
