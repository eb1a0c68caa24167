import type { MigrationConfig } from '../config-driven-migration';

// Avatar pool records, user bindings and the profile image pointer column
export const AVATAR_POOL_TABLES: MigrationConfig = {
  version: '2026.10.01.1001',
  description: 'Create avatar_pool and avatar_bindings tables, add users.profile_image_path',
  steps: [
    {
      type: 'custom',
      table: 'avatar_pool',
      details: {
        sql: `CREATE TABLE IF NOT EXISTS avatar_pool (
  seq BIGSERIAL UNIQUE,
  id UUID PRIMARY KEY,
  name TEXT NOT NULL,
  stored_filename TEXT NOT NULL UNIQUE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`
      }
    },
    {
      type: 'custom',
      table: 'avatar_bindings',
      details: {
        sql: `CREATE TABLE IF NOT EXISTS avatar_bindings (
  user_id TEXT PRIMARY KEY,
  avatar_id UUID NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`
      }
    },
    {
      type: 'addIndex',
      table: 'avatar_bindings',
      details: { columns: ['avatar_id'] }
    },
    {
      type: 'addColumn',
      table: 'users',
      details: { columnName: 'profile_image_path', dataType: 'TEXT', nullable: true }
    }
  ],
  postChecks: [
    { name: 'avatar_pool_exists', sql: `SELECT COUNT(*)::int AS cnt FROM information_schema.tables WHERE table_name='avatar_pool'`, expected: { cnt: 1 } },
    { name: 'avatar_bindings_exists', sql: `SELECT COUNT(*)::int AS cnt FROM information_schema.tables WHERE table_name='avatar_bindings'`, expected: { cnt: 1 } },
    { name: 'profile_image_path_exists', sql: `SELECT COUNT(*)::int AS cnt FROM information_schema.columns WHERE table_name='users' AND column_name='profile_image_path'`, expected: { cnt: 1 } }
  ],
  rollback: [
    { sql: 'ALTER TABLE users DROP COLUMN IF EXISTS profile_image_path' },
    { sql: 'DROP TABLE IF EXISTS avatar_bindings CASCADE' },
    { sql: 'DROP TABLE IF EXISTS avatar_pool CASCADE' }
  ]
};
