export { ProcessOrderPointsTask, type ProcessOrderPointsContext } from './process-order-points.task.js';
export { ReverseOrderPointsTask, type ReverseOrderPointsContext } from './reverse-order-points.task.js';
export {
  RecalculateUserTierTask,
  type RecalculateUserTierContext,
} from './recalculate-user-tier.task.js';
export {
  ProcessPointsExpirationTask,
  type ProcessPointsExpirationContext,
} from './process-points-expiration.task.js';
