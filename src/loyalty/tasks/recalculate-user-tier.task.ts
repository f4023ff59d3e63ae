// ---------------------------------------------------------------------------
// RecalculateUserTierTask - refresh a user's cached loyalty tier
// ---------------------------------------------------------------------------

import { UserNotFoundError } from '../../errors.js';
import { RuntimeMiddleware } from '../../middleware/index.js';
import { Task, required, type TaskSettings } from '../../task.js';

export interface RecalculateUserTierContext {
  userId: number;
  newTier: string | null;
}

export class RecalculateUserTierTask extends Task<RecalculateUserTierContext> {
  static override attributes = {
    userId: required({ type: 'integer', numeric: { min: 1 } }),
  };

  static override settings: TaskSettings = {
    tags: ['loyalty'],
    retries: 3,
  };

  static override middlewares = [RuntimeMiddleware()];

  declare userId: number;

  override work(): void {
    const loyalty = this.resolve('loyalty');

    try {
      const tier = loyalty.recalculateTier(this.userId);
      this.context.merge({ userId: this.userId, newTier: tier?.name ?? null });
    } catch (error) {
      if (error instanceof UserNotFoundError) {
        this.fail('user_not_found', { userId: this.userId });
      }
      throw error;
    }
  }
}
