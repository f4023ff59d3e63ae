import type { Database } from 'better-sqlite3';
import type { UserAccount } from '../../domain/user/user-account.js';
import type { LedgerDatabase } from './database.js';
import { toRowId, type UserRow } from './rows.js';

export class UserRepository {
  private readonly conn: Database;

  constructor(db: LedgerDatabase) {
    this.conn = db.connection;
  }

  create(email: string): UserAccount {
    const info = this.conn
      .prepare<[string]>('INSERT INTO users (email) VALUES (?)')
      .run(email);
    return { id: toRowId(info.lastInsertRowid), email, totalXp: 0, loyaltyTierId: null };
  }

  findById(id: number): UserAccount | null {
    const row = this.conn.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
    return row ? toUser(row) : null;
  }

  /**
   * Move total XP by `delta`, floored at zero. Returns the new total.
   */
  addXp(id: number, delta: number): number {
    const row = this.conn
      .prepare<[number, number], { total_xp: number }>(
        'UPDATE users SET total_xp = MAX(0, total_xp + ?) WHERE id = ? RETURNING total_xp'
      )
      .get(delta, id);
    return row?.total_xp ?? 0;
  }

  setTier(id: number, tierId: number | null): void {
    this.conn
      .prepare<[number | null, number]>('UPDATE users SET loyalty_tier_id = ? WHERE id = ?')
      .run(tierId, id);
  }
}

function toUser(row: UserRow): UserAccount {
  return {
    id: row.id,
    email: row.email,
    totalXp: row.total_xp,
    loyaltyTierId: row.loyalty_tier_id,
  };
}
