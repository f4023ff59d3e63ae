// ---------------------------------------------------------------------------
// ProcessPointsExpirationTask - periodic sweep of expired EARN rows
// ---------------------------------------------------------------------------

import { RuntimeMiddleware } from '../../middleware/index.js';
import { Task, optional, type TaskSettings } from '../../task.js';

export interface ProcessPointsExpirationContext {
  transactionsCreated: number;
}

export class ProcessPointsExpirationTask extends Task<ProcessPointsExpirationContext> {
  static override attributes = {
    now: optional({ type: 'date', description: 'Reference time (default: now)' }),
  };

  static override settings: TaskSettings = {
    tags: ['loyalty', 'periodic'],
    retries: 3,
  };

  static override middlewares = [RuntimeMiddleware()];

  declare now: Date | undefined;

  override work(): void {
    const now = this.now ?? new Date();
    const transactionsCreated = this.resolve('loyalty').processExpiration(now);
    this.context.set('transactionsCreated', transactionsCreated);
    this.resolve('logger').info('Expiration sweep finished', {
      now,
      transactions_created: transactionsCreated,
    });
  }
}
