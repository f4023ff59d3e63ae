import type { Database } from 'better-sqlite3';
import { LoyaltyTier, type LoyaltyTierProps } from '../../domain/loyalty/loyalty-tier.js';
import type { LedgerDatabase } from './database.js';
import { toRowId, type TierRow } from './rows.js';

export type NewLoyaltyTier = Omit<LoyaltyTierProps, 'id'>;

export class TierRepository {
  private readonly conn: Database;

  constructor(db: LedgerDatabase) {
    this.conn = db.connection;
  }

  create(input: NewLoyaltyTier): LoyaltyTier {
    const draft = new LoyaltyTier({ ...input, id: 0 });
    const info = this.conn
      .prepare<[string, string, number, string, number]>(
        `INSERT INTO loyalty_tiers (name, description, required_level, points_multiplier, sort_order)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(
        draft.name,
        draft.description,
        draft.requiredLevel,
        draft.pointsMultiplier.toString(),
        draft.sortOrder
      );
    return new LoyaltyTier({ ...input, id: toRowId(info.lastInsertRowid) });
  }

  findById(id: number): LoyaltyTier | null {
    const row = this.conn
      .prepare<[number], TierRow>('SELECT * FROM loyalty_tiers WHERE id = ?')
      .get(id);
    return row ? toTier(row) : null;
  }

  /** All tiers by ascending required level */
  list(): LoyaltyTier[] {
    return this.conn
      .prepare<[], TierRow>('SELECT * FROM loyalty_tiers ORDER BY required_level, sort_order')
      .all()
      .map(toTier);
  }

  count(): number {
    return this.conn
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM loyalty_tiers')
      .get()?.count ?? 0;
  }
}

function toTier(row: TierRow): LoyaltyTier {
  return new LoyaltyTier({
    id: row.id,
    name: row.name,
    description: row.description,
    requiredLevel: row.required_level,
    pointsMultiplier: row.points_multiplier,
    sortOrder: row.sort_order,
  });
}
