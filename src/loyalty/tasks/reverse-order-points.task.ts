// ---------------------------------------------------------------------------
// ReverseOrderPointsTask - take back points of a canceled, refunded or
// returned order
// ---------------------------------------------------------------------------

import { CorrelateMiddleware, RuntimeMiddleware } from '../../middleware/index.js';
import { Task, required, type TaskSettings } from '../../task.js';

export interface ReverseOrderPointsContext {
  orderId: number;
  pointsReversed: number;
}

export class ReverseOrderPointsTask extends Task<ReverseOrderPointsContext> {
  static override attributes = {
    orderId: required({ type: 'integer', numeric: { min: 1 } }),
  };

  static override settings: TaskSettings = {
    tags: ['loyalty'],
    retries: 5,
  };

  static override middlewares = [CorrelateMiddleware(), RuntimeMiddleware()];

  declare orderId: number;

  override work(): void {
    const loyalty = this.resolve('loyalty');

    const order = loyalty.findOrder(this.orderId);
    if (!order) {
      this.fail('order_not_found', { orderId: this.orderId });
    }

    const pointsReversed = loyalty.reverseOrderPoints(order.id);
    if (pointsReversed > 0 && order.userId !== null) {
      loyalty.recalculateTier(order.userId);
    }

    this.context.merge({ orderId: order.id, pointsReversed });
  }
}
