import { Entity } from '../shared/entity.js';
import { Decimal, type DecimalInput } from '../shared/decimal.js';

/**
 * LoyaltyTier Entity
 * Reached by level; multiplies earned points when tier multipliers are on
 */
export interface LoyaltyTierProps {
  id: number;
  name: string;
  description?: string;
  requiredLevel: number;
  pointsMultiplier: DecimalInput;
  sortOrder?: number;
}

export class LoyaltyTier extends Entity<number> {
  readonly name: string;
  readonly description: string;
  readonly requiredLevel: number;
  readonly pointsMultiplier: Decimal;
  readonly sortOrder: number;

  constructor(props: LoyaltyTierProps) {
    super(props.id);
    this.name = props.name;
    this.description = props.description ?? '';
    this.requiredLevel = props.requiredLevel;
    this.pointsMultiplier = Decimal.from(props.pointsMultiplier);
    this.sortOrder = props.sortOrder ?? 0;

    if (!Number.isInteger(this.requiredLevel) || this.requiredLevel < 1) {
      throw new RangeError(`Tier ${props.name}: required level must be a positive integer`);
    }
    if (this.pointsMultiplier.lessThan(1)) {
      throw new RangeError(`Tier ${props.name}: points multiplier must be at least 1.0`);
    }
  }

  /**
   * Highest tier whose required level is at most `level`.
   */
  static forLevel(tiers: readonly LoyaltyTier[], level: number): LoyaltyTier | null {
    let match: LoyaltyTier | null = null;
    for (const tier of tiers) {
      if (tier.requiredLevel <= level && (match === null || tier.requiredLevel > match.requiredLevel)) {
        match = tier;
      }
    }
    return match;
  }

  /**
   * Lowest tier whose required level is above `level`.
   */
  static nextAfter(tiers: readonly LoyaltyTier[], level: number): LoyaltyTier | null {
    let match: LoyaltyTier | null = null;
    for (const tier of tiers) {
      if (tier.requiredLevel > level && (match === null || tier.requiredLevel < match.requiredLevel)) {
        match = tier;
      }
    }
    return match;
  }

  toJSON() {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      requiredLevel: this.requiredLevel,
      pointsMultiplier: this.pointsMultiplier.toString(),
      sortOrder: this.sortOrder,
    };
  }
}
