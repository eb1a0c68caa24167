import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ConfigDrivenMigrationManager, MigrationError, buildStepSql } from '../config-driven-migration';
import type { DatabaseClient, DatabasePool } from '../database-connection';
import { AVATAR_POOL_TABLES as cfg } from '../migrations/avatar-pool-tables';

const clientQuery = jest.fn<DatabaseClient['query']>();
const release = jest.fn<DatabaseClient['release']>();
const mockClient: DatabaseClient = { query: clientQuery, release };
const connect = jest.fn<DatabasePool['connect']>();
const mockPool: DatabasePool = {
  query: jest.fn<DatabasePool['query']>(),
  connect,
  end: jest.fn<DatabasePool['end']>()
};

function statements(): string[] {
  return clientQuery.mock.calls.map(call => call[0]);
}

describe('buildStepSql', () => {
  it('builds an idempotent column addition', () => {
    expect(
      buildStepSql({ type: 'addColumn', table: 'users', details: { columnName: 'profile_image_path', dataType: 'TEXT', nullable: true } })
    ).toBe('ALTER TABLE users ADD COLUMN IF NOT EXISTS profile_image_path TEXT');
    expect(
      buildStepSql({ type: 'addColumn', table: 'users', details: { columnName: 'flag', dataType: 'BOOLEAN', nullable: false, defaultValue: 'false' } })
    ).toBe('ALTER TABLE users ADD COLUMN IF NOT EXISTS flag BOOLEAN NOT NULL DEFAULT false');
  });

  it('names indexes after the table and columns', () => {
    expect(buildStepSql({ type: 'addIndex', table: 'avatar_bindings', details: { columns: ['avatar_id'] } })).toBe(
      'CREATE INDEX IF NOT EXISTS idx_avatar_bindings_avatar_id ON avatar_bindings (avatar_id)'
    );
    expect(
      buildStepSql({ type: 'addIndex', table: 't', details: { columns: ['a', 'b'], indexName: 'ux_t', unique: true } })
    ).toBe('CREATE UNIQUE INDEX IF NOT EXISTS ux_t ON t (a, b)');
  });
});

describe('avatar pool tables migration', () => {
  let manager: ConfigDrivenMigrationManager;

  beforeEach(() => {
    clientQuery.mockReset();
    release.mockReset();
    connect.mockResolvedValue(mockClient);
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    manager = new ConfigDrivenMigrationManager(mockPool);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('defines the pool and binding tables', () => {
    const sql = cfg.steps.map(buildStepSql);
    expect(sql[0]).toContain('CREATE TABLE IF NOT EXISTS avatar_pool');
    expect(sql[0]).toContain('stored_filename TEXT NOT NULL UNIQUE');
    expect(sql[1]).toContain('CREATE TABLE IF NOT EXISTS avatar_bindings');
    expect(sql[1]).toContain('user_id TEXT PRIMARY KEY');
    expect(sql[3]).toBe('ALTER TABLE users ADD COLUMN IF NOT EXISTS profile_image_path TEXT');
  });

  it('applies every step and check in one transaction', async () => {
    clientQuery.mockResolvedValue({ rows: [{ cnt: 1 }], rowCount: 1 });
    const result = await manager.run(cfg);

    expect(result).toMatchObject({ version: '2026.10.01.1001', success: true, appliedSteps: 4 });
    const sent = statements();
    expect(sent).toHaveLength(1 + 4 + 3 + 1);
    expect(sent[0]).toBe('BEGIN');
    expect(sent[sent.length - 1]).toBe('COMMIT');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('rolls back when a post-check does not match', async () => {
    clientQuery.mockResolvedValue({ rows: [{ cnt: 0 }], rowCount: 1 });
    await expect(manager.run(cfg)).rejects.toMatchObject({ name: 'MigrationError', code: 'CHECK_FAILED' });
    expect(statements()).toContain('ROLLBACK');
    expect(statements()).not.toContain('COMMIT');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('wraps a failing step', async () => {
    clientQuery
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockRejectedValueOnce(new Error('permission denied'))
      .mockResolvedValue({ rows: [], rowCount: 0 });
    const failure = manager.run(cfg);
    await expect(failure).rejects.toBeInstanceOf(MigrationError);
    await expect(failure).rejects.toThrow('Step on avatar_pool failed: permission denied');
    expect(statements()).toEqual(['BEGIN', expect.stringContaining('CREATE TABLE IF NOT EXISTS avatar_pool'), 'ROLLBACK']);
  });

  it('reverts with the rollback statements', async () => {
    clientQuery.mockResolvedValue({ rows: [], rowCount: 0 });
    await manager.rollback(cfg);
    expect(statements()).toEqual([
      'BEGIN',
      'ALTER TABLE users DROP COLUMN IF EXISTS profile_image_path',
      'DROP TABLE IF EXISTS avatar_bindings CASCADE',
      'DROP TABLE IF EXISTS avatar_pool CASCADE',
      'COMMIT'
    ]);
  });

  it('reports a failed rollback', async () => {
    clientQuery
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockRejectedValueOnce(new Error('lock timeout'))
      .mockResolvedValue({ rows: [], rowCount: 0 });
    await expect(manager.rollback(cfg)).rejects.toMatchObject({ code: 'ROLLBACK_FAILED' });
  });
});
