import type { TierRepository, NewLoyaltyTier } from '../infrastructure/sqlite/tier.repository.js';
import type { LoyaltyTier } from '../domain/loyalty/loyalty-tier.js';

export const DEFAULT_TIERS: readonly NewLoyaltyTier[] = [
  { name: 'Bronze', requiredLevel: 1, pointsMultiplier: '1.0', sortOrder: 1 },
  { name: 'Silver', requiredLevel: 5, pointsMultiplier: '1.25', sortOrder: 2 },
  { name: 'Gold', requiredLevel: 10, pointsMultiplier: '1.5', sortOrder: 3 },
  { name: 'Platinum', requiredLevel: 20, pointsMultiplier: '2.0', sortOrder: 4 },
  { name: 'Diamond', requiredLevel: 50, pointsMultiplier: '3.0', sortOrder: 5 },
];

/**
 * Insert the default tiers into an empty tier table
 */
export function seedDefaultTiers(tiers: TierRepository): LoyaltyTier[] {
  if (tiers.count() > 0) {
    return tiers.list();
  }
  return DEFAULT_TIERS.map((tier) => tiers.create(tier));
}
