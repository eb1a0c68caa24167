import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { AvatarManager } from '../avatar-manager';
import type { DatabasePool } from '../database-connection';

const query = jest.fn<DatabasePool['query']>();
const mockPool: DatabasePool = {
  query,
  connect: jest.fn<DatabasePool['connect']>(),
  end: jest.fn<DatabasePool['end']>()
};

const created = new Date('2026-01-01T00:00:00.000Z');

describe('AvatarManager', () => {
  let manager: AvatarManager;

  beforeEach(() => {
    jest.clearAllMocks();
    query.mockReset();
    manager = new AvatarManager(mockPool);
  });

  it('inserts a pool record and maps the returned row', async () => {
    query.mockResolvedValueOnce({
      rows: [{ id: 'a-1', name: 'cat', stored_filename: 'a-1.png', created_at: created }],
      rowCount: 1
    });
    const avatar = await manager.insertAvatar({ id: 'a-1', name: 'cat', storedFilename: 'a-1.png' });
    expect(avatar).toEqual({ id: 'a-1', name: 'cat', storedFilename: 'a-1.png', createdAt: created });
    expect(query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO avatar_pool'), ['a-1', 'cat', 'a-1.png']);
  });

  it('fails an insert that returns no row', async () => {
    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
    await expect(manager.insertAvatar({ id: 'a-1', name: 'cat', storedFilename: 'a-1.png' })).rejects.toThrow(
      'Insert of avatar a-1 returned no row'
    );
  });

  it('returns null for unknown and malformed ids', async () => {
    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
    expect(await manager.getAvatarById('a-404')).toBeNull();

    query.mockRejectedValueOnce(Object.assign(new Error('invalid input syntax for type uuid'), { code: '22P02' }));
    expect(await manager.getAvatarById('not-a-uuid')).toBeNull();
  });

  it('propagates other query failures', async () => {
    query.mockRejectedValueOnce(new Error('connection terminated'));
    await expect(manager.getAvatarById('a-1')).rejects.toThrow('connection terminated');
  });

  it('reports whether a delete removed a row', async () => {
    query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    expect(await manager.deleteAvatar('a-1')).toBe(true);
    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
    expect(await manager.deleteAvatar('a-1')).toBe(false);
    expect(query).toHaveBeenLastCalledWith('DELETE FROM avatar_pool WHERE id = $1', ['a-1']);
  });

  it('lists records in insertion order', async () => {
    query.mockResolvedValueOnce({
      rows: [
        { id: 'a-1', name: 'cat', stored_filename: 'a-1.png', created_at: '2026-01-01T00:00:00.000Z' },
        { id: 'a-2', name: 'dog', stored_filename: 'a-2.jpg', created_at: '2026-01-02T00:00:00.000Z' }
      ],
      rowCount: 2
    });
    const avatars = await manager.listAvatars();
    expect(avatars.map(a => a.id)).toEqual(['a-1', 'a-2']);
    expect(avatars[1].createdAt.toISOString()).toBe('2026-01-02T00:00:00.000Z');
    expect(query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY seq ASC'));
  });

  it('rejects rows with missing columns', async () => {
    query.mockResolvedValueOnce({ rows: [{ id: 'a-1', stored_filename: 'a-1.png', created_at: created }], rowCount: 1 });
    await expect(manager.getAvatarById('a-1')).rejects.toThrow('Column name is not a string');
  });
});
