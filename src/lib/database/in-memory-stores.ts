// In-memory implementations of the avatar pool persistence interfaces.
// Used for development without Postgres and by the test suites.

import { AvatarRecord, AvatarRecordRepository, BindingRecord, BindingStore, CreateAvatarRecordRequest } from '../../types/avatar';
import { ProfileUser, UserDirectory } from '../../types/user';

export class InMemoryAvatarRepository implements AvatarRecordRepository {
  private records: AvatarRecord[] = [];

  async insertAvatar(req: CreateAvatarRecordRequest): Promise<AvatarRecord> {
    if (this.records.some(r => r.id === req.id || r.storedFilename === req.storedFilename)) {
      throw new Error(`Duplicate avatar ${req.id}`);
    }
    const record: AvatarRecord = { ...req, createdAt: new Date() };
    this.records.push(record);
    return { ...record };
  }

  async getAvatarById(id: string): Promise<AvatarRecord | null> {
    const found = this.records.find(r => r.id === id);
    return found ? { ...found } : null;
  }

  async deleteAvatar(id: string): Promise<boolean> {
    const before = this.records.length;
    this.records = this.records.filter(r => r.id !== id);
    return this.records.length !== before;
  }

  async listAvatars(): Promise<AvatarRecord[]> {
    return this.records.map(r => ({ ...r }));
  }
}

export class InMemoryBindingStore implements BindingStore {
  private bindings = new Map<string, string>();

  constructor(initial: BindingRecord[] = []) {
    for (const b of initial) this.bindings.set(b.userId, b.avatarId);
  }

  async getBinding(userId: string): Promise<string | null> {
    return this.bindings.get(userId) ?? null;
  }

  async setBinding(userId: string, avatarId: string): Promise<void> {
    this.bindings.set(userId, avatarId);
  }

  async clearBinding(userId: string): Promise<void> {
    this.bindings.delete(userId);
  }

  async clearBindingsForAvatar(avatarId: string): Promise<number> {
    let removed = 0;
    for (const [userId, bound] of Array.from(this.bindings.entries())) {
      if (bound === avatarId) {
        this.bindings.delete(userId);
        removed++;
      }
    }
    return removed;
  }

  async clearBindings(userIds: string[]): Promise<number> {
    let removed = 0;
    for (const userId of userIds) {
      if (this.bindings.delete(userId)) removed++;
    }
    return removed;
  }

  async listBindings(): Promise<BindingRecord[]> {
    return Array.from(this.bindings.entries()).map(([userId, avatarId]) => ({ userId, avatarId }));
  }
}

export class InMemoryUserDirectory implements UserDirectory {
  private users = new Map<string, ProfileUser>();

  constructor(initial: ProfileUser[] = []) {
    for (const u of initial) this.users.set(u.id, { ...u });
  }

  // Hands out copies: a change is only visible to others after persistUser
  async getUser(id: string): Promise<ProfileUser | null> {
    const found = this.users.get(id);
    return found ? { ...found } : null;
  }

  async listUsers(): Promise<ProfileUser[]> {
    return Array.from(this.users.values()).map(u => ({ ...u }));
  }

  async persistUser(user: ProfileUser): Promise<boolean> {
    if (!this.users.has(user.id)) return false;
    this.users.set(user.id, { ...user });
    return true;
  }

  addUser(user: ProfileUser): void {
    this.users.set(user.id, { ...user });
  }

  removeUser(id: string): void {
    this.users.delete(id);
  }
}
