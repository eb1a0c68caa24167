// Avatar Pool - Profile Image Binder
//
// Materializes a pool avatar as a user's profile image. There is no
// transaction spanning the copy, the pointer update and the binding row, so
// the steps run in a fixed order where every prefix leaves state that
// AvatarReconciler can bring back to consistency:
//
//   resolve avatar -> resolve user -> copy to a fresh path -> commit pointer
//   -> delete previous file (best effort) -> record binding
//
// Until the pointer is committed a failure removes the fresh copy; after it,
// the bind has happened and only bookkeeping can still fail.

import { mkdir } from 'fs/promises';
import { extname, join } from 'path';
import { AvatarOperationOptions, BindingStore, MaterializedProfileImage } from '../../types/avatar';
import { ProfileUser, UserDirectory } from '../../types/user';
import {
  buildProfileImageFilename,
  copyFileCancellable,
  isAbortError,
  isWithinDirectory,
  nextDistinctToken,
  removeFileIfPresent,
  samePath,
  userProfileDirectory
} from '../utils/avatar-files';
import { AvatarError, describeError } from './avatar-errors';
import type { AvatarPoolStore } from './avatar-pool-store';

export class ProfileImageBinder {
  constructor(
    private pool: AvatarPoolStore,
    private bindings: BindingStore,
    private users: UserDirectory,
    private userDataDirectory: string
  ) {}

  profileDirectory(userId: string): string {
    const directory = userProfileDirectory(this.userDataDirectory, userId);
    if (!directory) {
      throw new AvatarError(`User id cannot be used as a directory name: ${userId}`, 'VALIDATION_FAILED', { userId });
    }
    return directory;
  }

  async bind(userId: string, avatarId: string, options: AvatarOperationOptions = {}): Promise<MaterializedProfileImage> {
    const { signal } = options;

    const avatar = await this.pool.resolve(avatarId);
    if (!avatar) {
      throw new AvatarError(`Avatar not found: ${avatarId}`, 'AVATAR_NOT_FOUND', { avatarId });
    }

    const user = await this.users.getUser(userId);
    if (!user) {
      throw new AvatarError(`User not found: ${userId}`, 'USER_NOT_FOUND', { userId });
    }

    const previousPath = user.profileImagePath || null;
    const directory = this.profileDirectory(user.id);
    const targetPath = this.nextTargetPath(directory, avatarId, extname(avatar.filePath), previousPath);

    if (signal?.aborted) {
      throw new AvatarError('Bind cancelled before copy', 'ABORTED', { userId, avatarId });
    }

    try {
      await mkdir(directory, { recursive: true });
      await copyFileCancellable(avatar.filePath, targetPath, signal);
    } catch (e) {
      await this.discardCopy(targetPath);
      if (isAbortError(e) || signal?.aborted) {
        throw new AvatarError('Bind cancelled during copy', 'ABORTED', { userId, avatarId });
      }
      throw new AvatarError(`Failed to copy avatar: ${describeError(e)}`, 'COPY_FAILED', { userId, avatarId, targetPath });
    }

    await this.commitPointer(user, targetPath, previousPath, signal);

    if (previousPath && !samePath(previousPath, targetPath)) {
      await this.deletePreviousImage(directory, previousPath, user.id);
    }

    try {
      await this.bindings.setBinding(user.id, avatarId);
    } catch (e) {
      // The pointer already references a live copy; only bookkeeping is missing
      throw new AvatarError(`Profile image applied but binding not recorded: ${describeError(e)}`, 'IO_FAILURE', {
        userId,
        avatarId,
        path: targetPath
      });
    }

    console.log(`[profile-image] Set avatar ${avatarId} for user ${user.username} (${user.id})`);
    return { userId: user.id, avatarId, path: targetPath };
  }

  /**
   * Clears the user's profile image and binding. Resolves false when the user
   * does not exist (any stale binding is still removed).
   */
  async unbind(userId: string): Promise<boolean> {
    const user = await this.users.getUser(userId);
    if (!user) {
      console.warn(`[profile-image] User not found: ${userId}`);
      await this.bindings.clearBinding(userId);
      return false;
    }

    const previousPath = user.profileImagePath || null;
    const directory = userProfileDirectory(this.userDataDirectory, user.id);
    if (previousPath) {
      user.profileImagePath = null;
      const persisted = await this.persist(user);
      if (!persisted.ok) {
        user.profileImagePath = previousPath;
        throw new AvatarError(`Failed to clear profile image: ${persisted.reason}`, 'POINTER_UPDATE_FAILED', { userId });
      }
      await this.deletePreviousImage(directory, previousPath, user.id);
    }

    await this.bindings.clearBinding(user.id);
    console.log(`[profile-image] Removed avatar assignment for user ${user.username} (${user.id})`);
    return true;
  }

  private nextTargetPath(directory: string, avatarId: string, extension: string, previousPath: string | null): string {
    let candidate = join(directory, buildProfileImageFilename(avatarId, nextDistinctToken(), extension));
    while (samePath(candidate, previousPath)) {
      candidate = join(directory, buildProfileImageFilename(avatarId, nextDistinctToken(), extension));
    }
    return candidate;
  }

  private async commitPointer(user: ProfileUser, targetPath: string, previousPath: string | null, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      await this.discardCopy(targetPath);
      throw new AvatarError('Bind cancelled before pointer update', 'ABORTED', { userId: user.id });
    }

    user.profileImagePath = targetPath;
    const persisted = await this.persist(user);
    if (persisted.ok) return;

    user.profileImagePath = previousPath;
    await this.discardCopy(targetPath);
    console.error(`[profile-image] Failed to update profile image for user ${user.id}: ${persisted.reason}`);
    throw new AvatarError(`Failed to update profile image pointer: ${persisted.reason}`, 'POINTER_UPDATE_FAILED', {
      userId: user.id
    });
  }

  private async persist(user: ProfileUser): Promise<{ ok: true } | { ok: false; reason: string }> {
    try {
      const saved = await this.users.persistUser(user);
      return saved ? { ok: true } : { ok: false, reason: 'user record was not updated' };
    } catch (e) {
      return { ok: false, reason: describeError(e) };
    }
  }

  private async deletePreviousImage(directory: string | null, previousPath: string, userId: string): Promise<void> {
    if (!directory || !isWithinDirectory(directory, previousPath)) {
      console.warn(`[profile-image] Previous profile image of ${userId} is outside its profile directory; left in place`);
      return;
    }
    try {
      if (await removeFileIfPresent(previousPath)) {
        console.log(`[profile-image] Deleted old profile image: ${previousPath}`);
      }
    } catch (e) {
      console.warn(`[profile-image] Could not delete old profile image (orphan file left): ${previousPath}`, describeError(e));
    }
  }

  // Rollback of a fresh copy. If even this fails the file is an orphan that
  // collectOrphans will remove.
  private async discardCopy(targetPath: string): Promise<void> {
    try {
      if (await removeFileIfPresent(targetPath)) {
        console.log(`[profile-image] Cleaned up orphaned file after failed update: ${targetPath}`);
      }
    } catch (e) {
      console.warn(`[profile-image] Could not clean up orphaned file: ${targetPath}`, describeError(e));
    }
  }
}
