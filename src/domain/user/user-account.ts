/**
 * Loyalty view of a user account
 */
export interface UserAccount {
  readonly id: number;
  readonly email: string;
  /** Cumulative experience, never negative */
  readonly totalXp: number;
  /** Cached result of the tier lookup; may be stale until recalculated */
  readonly loyaltyTierId: number | null;
}
