// ---------------------------------------------------------------------------
// ProcessOrderPointsTask - award points for a completed order
// ---------------------------------------------------------------------------

import { CorrelateMiddleware, RuntimeMiddleware } from '../../middleware/index.js';
import { Task, required, type TaskSettings } from '../../task.js';

export interface ProcessOrderPointsContext {
  orderId: number;
  pointsAwarded: number;
  bonusPoints: number;
}

export class ProcessOrderPointsTask extends Task<ProcessOrderPointsContext> {
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

    const pointsAwarded = loyalty.awardOrderPoints(order.id);
    let bonusPoints = 0;
    if (pointsAwarded > 0 && order.userId !== null) {
      bonusPoints = loyalty.checkNewCustomerBonus(order.userId, order.id);
      loyalty.recalculateTier(order.userId);
    }

    this.context.merge({ orderId: order.id, pointsAwarded, bonusPoints });
  }
}
