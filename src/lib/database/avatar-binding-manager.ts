// Avatar Pool - Data Access Layer (user -> avatar bindings)

import { DatabasePool, DatabaseRow, readString } from './database-connection';
import { BindingRecord, BindingStore } from '../../types/avatar';

/**
 * Bindings are bookkeeping for reconciliation; the user's pointer decides
 * which image is shown. `avatar_id` is not a foreign key: pool removal and
 * reconciliation clear stale rows.
 */
export class AvatarBindingManager implements BindingStore {
  constructor(private pool: DatabasePool) {}

  async getBinding(userId: string): Promise<string | null> {
    const res = await this.pool.query('SELECT avatar_id FROM avatar_bindings WHERE user_id = $1', [userId]);
    return res.rows[0] ? readString(res.rows[0], 'avatar_id') : null;
  }

  async setBinding(userId: string, avatarId: string): Promise<void> {
    await this.pool.query(
      `INSERT INTO avatar_bindings (user_id, avatar_id)
       VALUES ($1,$2)
       ON CONFLICT (user_id) DO UPDATE SET avatar_id = EXCLUDED.avatar_id, updated_at = NOW()`,
      [userId, avatarId]
    );
  }

  async clearBinding(userId: string): Promise<void> {
    await this.pool.query('DELETE FROM avatar_bindings WHERE user_id = $1', [userId]);
  }

  async clearBindingsForAvatar(avatarId: string): Promise<number> {
    const res = await this.pool.query('DELETE FROM avatar_bindings WHERE avatar_id = $1', [avatarId]);
    return res.rowCount;
  }

  async clearBindings(userIds: string[]): Promise<number> {
    if (!userIds.length) return 0;
    const res = await this.pool.query('DELETE FROM avatar_bindings WHERE user_id = ANY($1::text[])', [userIds]);
    return res.rowCount;
  }

  async listBindings(): Promise<BindingRecord[]> {
    const res = await this.pool.query('SELECT user_id, avatar_id FROM avatar_bindings ORDER BY user_id ASC');
    return res.rows.map(r => this.mapRowToBinding(r));
  }

  private mapRowToBinding(row: DatabaseRow): BindingRecord {
    return {
      userId: readString(row, 'user_id'),
      avatarId: readString(row, 'avatar_id')
    };
  }
}
