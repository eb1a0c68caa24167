// Avatar Pool - Reconciliation & orphan collection

import { readdir } from 'fs/promises';
import { join } from 'path';
import { AvatarOperationOptions, AvatarValidationReport, BindingRecord, BindingStore } from '../../types/avatar';
import { ProfileUser, UserDirectory } from '../../types/user';
import {
  isMissingFileError,
  isProfileImageFilename,
  isReadableFile,
  removeFileIfPresent,
  samePath,
  userProfileDirectory
} from '../utils/avatar-files';
import { describeError, isAvatarError } from './avatar-errors';
import type { AvatarPoolStore } from './avatar-pool-store';
import type { ProfileImageBinder } from './profile-image-binder';

/**
 * Repairs drift between bindings, the pool and the users' profile image
 * pointers, and removes profile images nothing points at. Every entry is
 * handled on its own: one broken user never stops the pass.
 *
 * Callers must keep binds and pool removals out while a pass runs
 * (AvatarService takes the maintenance lock).
 */
export class AvatarReconciler {
  constructor(
    private pool: AvatarPoolStore,
    private bindings: BindingStore,
    private users: UserDirectory,
    private binder: ProfileImageBinder,
    private userDataDirectory: string
  ) {}

  async validate(options: AvatarOperationOptions = {}): Promise<AvatarValidationReport> {
    const { signal } = options;
    const entries = await this.bindings.listBindings();
    if (!entries.length) {
      console.log('[avatar-reconcile] No user avatars to validate');
      return { repaired: 0, removed: [] };
    }

    let repaired = 0;
    const removed: BindingRecord[] = [];

    for (const entry of entries) {
      if (signal?.aborted) {
        console.warn('[avatar-reconcile] Validation cancelled; remaining bindings left for the next pass');
        break;
      }
      try {
        const outcome = await this.validateEntry(entry, signal);
        if (outcome === 'repaired') repaired++;
        if (outcome === 'removed') removed.push(entry);
      } catch (e) {
        console.error(`[avatar-reconcile] Error validating avatar for user ${entry.userId}:`, describeError(e));
      }
    }

    if (removed.length) {
      await this.bindings.clearBindings(removed.map(r => r.userId));
      console.log(`[avatar-reconcile] Removed ${removed.length} invalid avatar mapping(s)`);
    }
    console.log(`[avatar-reconcile] Avatar validation complete. Repaired: ${repaired}, Removed invalid: ${removed.length}`);
    return { repaired, removed };
  }

  async collectOrphans(options: AvatarOperationOptions = {}): Promise<number> {
    const { signal } = options;
    let deleted = 0;
    const users = await this.users.listUsers();

    for (const user of users) {
      if (signal?.aborted) {
        console.warn('[avatar-reconcile] Orphan collection cancelled');
        break;
      }
      try {
        deleted += await this.collectUserOrphans(user, signal);
      } catch (e) {
        console.error(`[avatar-reconcile] Error cleaning profile images for user ${user.id}:`, describeError(e));
      }
    }

    console.log(`[avatar-reconcile] Cleaned up ${deleted} orphaned profile image(s)`);
    return deleted;
  }

  private async validateEntry(entry: BindingRecord, signal?: AbortSignal): Promise<'valid' | 'repaired' | 'removed' | 'skipped'> {
    const user = await this.users.getUser(entry.userId);
    if (!user) {
      console.warn(`[avatar-reconcile] User not found for avatar mapping: ${entry.userId}`);
      return 'removed';
    }

    const avatar = await this.pool.resolve(entry.avatarId);
    if (!avatar) {
      console.error(`[avatar-reconcile] Avatar ${entry.avatarId} of user ${user.username} no longer exists in pool`);
      await this.clearPointer(user);
      return 'removed';
    }

    if (await isReadableFile(user.profileImagePath)) {
      return 'valid';
    }

    console.warn(
      `[avatar-reconcile] Profile image missing for user ${user.username} (expected: ${user.profileImagePath ?? 'null'}). Attempting to repair...`
    );
    try {
      await this.binder.bind(user.id, entry.avatarId, { signal });
      console.log(`[avatar-reconcile] Successfully repaired avatar for user ${user.username}`);
      return 'repaired';
    } catch (e) {
      if (isAvatarError(e, 'ABORTED') || signal?.aborted) {
        console.warn(`[avatar-reconcile] Repair for user ${user.username} cancelled; binding kept for the next pass`);
        return 'skipped';
      }
      console.error(`[avatar-reconcile] Repair failed for user ${user.username}:`, describeError(e));
      // bind() rolled back its own copy; re-read what it left behind
      const current = await this.users.getUser(user.id);
      if (current) await this.clearPointer(current);
      return 'removed';
    }
  }

  private async clearPointer(user: ProfileUser): Promise<void> {
    if (!user.profileImagePath) return;
    const previous = user.profileImagePath;
    user.profileImagePath = null;
    try {
      const saved = await this.users.persistUser(user);
      if (saved) {
        console.log(`[avatar-reconcile] Cleared profile image reference for user ${user.username}`);
        return;
      }
      console.warn(`[avatar-reconcile] Profile image reference of ${user.username} was not cleared`);
    } catch (e) {
      console.warn(`[avatar-reconcile] Could not clear profile image reference of ${user.username}:`, describeError(e));
    }
    user.profileImagePath = previous;
  }

  private async collectUserOrphans(user: ProfileUser, signal?: AbortSignal): Promise<number> {
    const directory = userProfileDirectory(this.userDataDirectory, user.id);
    if (!directory) {
      console.warn(`[avatar-reconcile] Skipping user with unusable id: ${user.id}`);
      return 0;
    }

    let names: string[];
    try {
      names = await readdir(directory);
    } catch (e) {
      if (isMissingFileError(e)) return 0;
      throw e;
    }

    let deleted = 0;
    for (const name of names) {
      if (signal?.aborted) break;
      if (!isProfileImageFilename(name)) continue;
      const filePath = join(directory, name);
      if (samePath(filePath, user.profileImagePath)) continue;
      try {
        if (await removeFileIfPresent(filePath)) {
          deleted++;
          console.log(`[avatar-reconcile] Deleted orphaned profile image: ${filePath}`);
        }
      } catch (e) {
        console.warn(`[avatar-reconcile] Could not delete orphaned file: ${filePath}`, describeError(e));
      }
    }
    return deleted;
  }
}
