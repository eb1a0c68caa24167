// Avatar Pool - Service Layer
//
// Entry point for a transport layer. Owns the locking: binds and unbinds are
// serialized per user, pool mutations among themselves, and maintenance
// passes run alone.

import {
  AvatarOperationOptions,
  AvatarRecord,
  AvatarRecordRepository,
  AvatarValidationReport,
  BindingStore,
  MaterializedProfileImage,
  ResolvedAvatar,
  UserAvatar
} from '../../types/avatar';
import type { UserDirectory } from '../../types/user';
import type { AvatarConfig } from '../config/avatar-config';
import { AvatarBindingManager } from '../database/avatar-binding-manager';
import { AvatarManager } from '../database/avatar-manager';
import type { DatabasePool } from '../database/database-connection';
import { UserManager } from '../database/user-manager';
import { OperationLocks } from '../utils/operation-locks';
import { AvatarPoolStore } from './avatar-pool-store';
import { AvatarReconciler } from './avatar-reconciler';
import { ProfileImageBinder } from './profile-image-binder';

export interface AvatarServiceDeps {
  pool: AvatarPoolStore;
  bindings: BindingStore;
  binder: ProfileImageBinder;
  reconciler: AvatarReconciler;
  locks?: OperationLocks;
}

export class AvatarService {
  private pool: AvatarPoolStore;
  private bindings: BindingStore;
  private binder: ProfileImageBinder;
  private reconciler: AvatarReconciler;
  private locks: OperationLocks;

  constructor(deps: AvatarServiceDeps) {
    this.pool = deps.pool;
    this.bindings = deps.bindings;
    this.binder = deps.binder;
    this.reconciler = deps.reconciler;
    this.locks = deps.locks ?? new OperationLocks();
  }

  listAvatars(): Promise<AvatarRecord[]> {
    return this.pool.list();
  }

  addAvatar(filename: string, data: Uint8Array): Promise<AvatarRecord> {
    return this.locks.forPool(() => this.pool.add(filename, data));
  }

  removeAvatar(avatarId: string): Promise<boolean> {
    return this.locks.forPool(() => this.pool.remove(avatarId));
  }

  resolve(avatarId: string): Promise<ResolvedAvatar | null> {
    return this.pool.resolve(avatarId);
  }

  bind(userId: string, avatarId: string, options: AvatarOperationOptions = {}): Promise<MaterializedProfileImage> {
    return this.locks.forUser(userId, () => this.binder.bind(userId, avatarId, options));
  }

  unbind(userId: string): Promise<boolean> {
    return this.locks.forUser(userId, () => this.binder.unbind(userId));
  }

  getBinding(userId: string): Promise<string | null> {
    return this.bindings.getBinding(userId);
  }

  async getUserAvatar(userId: string): Promise<UserAvatar | null> {
    const avatarId = await this.bindings.getBinding(userId);
    if (!avatarId) return null;
    const [avatar, resolved] = await Promise.all([this.pool.get(avatarId), this.pool.resolve(avatarId)]);
    if (!avatar || !resolved) return null;
    return { avatar, resolved };
  }

  validate(options: AvatarOperationOptions = {}): Promise<AvatarValidationReport> {
    return this.locks.forMaintenance(() => this.reconciler.validate(options));
  }

  collectOrphans(options: AvatarOperationOptions = {}): Promise<number> {
    return this.locks.forMaintenance(() => this.reconciler.collectOrphans(options));
  }
}

export interface AvatarServiceStores {
  avatars: AvatarRecordRepository;
  bindings: BindingStore;
  users: UserDirectory;
}

/**
 * Wires the components over any set of stores and prepares the pool
 * directory.
 */
export async function buildAvatarService(
  config: Pick<AvatarConfig, 'poolDirectory' | 'userDataDirectory'>,
  stores: AvatarServiceStores
): Promise<AvatarService> {
  const pool = new AvatarPoolStore(stores.avatars, stores.bindings, config.poolDirectory);
  await pool.initialize();
  const binder = new ProfileImageBinder(pool, stores.bindings, stores.users, config.userDataDirectory);
  const reconciler = new AvatarReconciler(pool, stores.bindings, stores.users, binder, config.userDataDirectory);
  return new AvatarService({ pool, bindings: stores.bindings, binder, reconciler });
}

export function createAvatarService(config: AvatarConfig, db: DatabasePool): Promise<AvatarService> {
  return buildAvatarService(config, {
    avatars: new AvatarManager(db),
    bindings: new AvatarBindingManager(db),
    users: new UserManager(db)
  });
}
