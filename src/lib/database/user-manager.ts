// Identity subsystem - profile image pointer access

import { DatabasePool, DatabaseRow, isPostgresError, readNullableString, readString } from './database-connection';
import { ProfileUser, UserDirectory } from '../../types/user';

export class UserManager implements UserDirectory {
  constructor(private pool: DatabasePool) {}

  async getUser(id: string): Promise<ProfileUser | null> {
    try {
      const res = await this.pool.query(
        'SELECT id, username, profile_image_path FROM users WHERE id = $1',
        [id]
      );
      return res.rows[0] ? this.mapRowToUser(res.rows[0]) : null;
    } catch (e) {
      // Malformed ids cannot name a user
      if (isPostgresError(e, '22P02')) return null;
      throw e;
    }
  }

  async listUsers(): Promise<ProfileUser[]> {
    const res = await this.pool.query(
      'SELECT id, username, profile_image_path FROM users ORDER BY created_at ASC'
    );
    return res.rows.map(r => this.mapRowToUser(r));
  }

  async persistUser(user: ProfileUser): Promise<boolean> {
    const res = await this.pool.query(
      'UPDATE users SET profile_image_path = $1 WHERE id = $2',
      [user.profileImagePath, user.id]
    );
    return res.rowCount > 0;
  }

  private mapRowToUser(row: DatabaseRow): ProfileUser {
    return {
      id: readString(row, 'id'),
      username: readString(row, 'username'),
      profileImagePath: readNullableString(row, 'profile_image_path')
    };
  }
}
