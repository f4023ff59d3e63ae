import { Container } from './container.js';
import type { Logger } from './logging/logger.js';
import type { LoyaltyService } from './loyalty/loyalty-service.js';

/**
 * Services tasks resolve at execution time
 */
export interface LedgerServices {
  loyalty: LoyaltyService;
  logger: Logger;
}

export type LedgerContainer = Container<LedgerServices>;

/**
 * Process-wide container used when a task is executed without one
 */
export const container: LedgerContainer = new Container<LedgerServices>();
