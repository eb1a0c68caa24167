// Avatar Pool - Data Access Layer (pool records)

import { DatabasePool, DatabaseRow, readDate, readString, isPostgresError } from './database-connection';
import { AvatarRecord, AvatarRecordRepository, CreateAvatarRecordRequest } from '../../types/avatar';

export class AvatarManager implements AvatarRecordRepository {
  constructor(private pool: DatabasePool) {}

  async insertAvatar(req: CreateAvatarRecordRequest): Promise<AvatarRecord> {
    const res = await this.pool.query(
      `INSERT INTO avatar_pool (id, name, stored_filename)
       VALUES ($1,$2,$3) RETURNING id, name, stored_filename, created_at`,
      [req.id, req.name, req.storedFilename]
    );
    if (!res.rows[0]) throw new Error(`Insert of avatar ${req.id} returned no row`);
    return this.mapRowToAvatar(res.rows[0]);
  }

  async getAvatarById(id: string): Promise<AvatarRecord | null> {
    try {
      const res = await this.pool.query(
        'SELECT id, name, stored_filename, created_at FROM avatar_pool WHERE id = $1',
        [id]
      );
      return res.rows[0] ? this.mapRowToAvatar(res.rows[0]) : null;
    } catch (e) {
      // Ids come from clients; a malformed one is simply unknown
      if (isPostgresError(e, '22P02')) return null;
      throw e;
    }
  }

  async deleteAvatar(id: string): Promise<boolean> {
    try {
      const res = await this.pool.query('DELETE FROM avatar_pool WHERE id = $1', [id]);
      return res.rowCount > 0;
    } catch (e) {
      if (isPostgresError(e, '22P02')) return false;
      throw e;
    }
  }

  async listAvatars(): Promise<AvatarRecord[]> {
    const res = await this.pool.query(
      'SELECT id, name, stored_filename, created_at FROM avatar_pool ORDER BY seq ASC'
    );
    return res.rows.map(r => this.mapRowToAvatar(r));
  }

  private mapRowToAvatar(row: DatabaseRow): AvatarRecord {
    return {
      id: readString(row, 'id'),
      name: readString(row, 'name'),
      storedFilename: readString(row, 'stored_filename'),
      createdAt: readDate(row, 'created_at')
    };
  }
}
