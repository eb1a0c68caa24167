// Avatar Pool - Pool Store (files + records)

import { mkdir, stat, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AvatarRecord, AvatarRecordRepository, BindingStore, ResolvedAvatar } from '../../types/avatar';
import {
  ALLOWED_AVATAR_EXTENSIONS,
  MAX_AVATAR_BYTES,
  isAllowedAvatarExtension,
  isExistingFileError,
  isMissingFileError,
  mimeTypeForFile,
  removeFileIfPresent
} from '../utils/avatar-files';
import { AvatarError, describeError } from './avatar-errors';

/**
 * Shared pool of avatar images. The file is always written before its record
 * exists and deleted before its record goes away, so a record never points at
 * a file that was never there.
 *
 * Not synchronized: callers serialize add/remove (see AvatarService).
 */
export class AvatarPoolStore {
  private initialized = false;

  constructor(
    private repository: AvatarRecordRepository,
    private bindings: BindingStore,
    private directory: string
  ) {}

  async initialize(): Promise<void> {
    try {
      const existing = await stat(this.directory).catch((e: unknown) => {
        if (isMissingFileError(e)) return null;
        throw e;
      });
      if (existing && !existing.isDirectory()) {
        throw new Error(`${this.directory} exists and is not a directory`);
      }
      if (!existing) {
        await mkdir(this.directory, { recursive: true });
        console.log(`[avatar-pool] Created avatar directory: ${this.directory}`);
      } else {
        console.log(`[avatar-pool] Avatar directory already exists: ${this.directory}`);
      }
    } catch (e) {
      console.error(`[avatar-pool] Failed to prepare avatar directory at ${this.directory}:`, describeError(e));
      throw e;
    }
    this.initialized = true;
  }

  async add(originalFilename: string, data: Uint8Array): Promise<AvatarRecord> {
    this.assertInitialized();
    const extension = extname(originalFilename);
    if (!isAllowedAvatarExtension(extension)) {
      throw new AvatarError('Invalid file type. Only images are allowed.', 'VALIDATION_FAILED', {
        filename: originalFilename,
        allowed: [...ALLOWED_AVATAR_EXTENSIONS]
      });
    }
    if (data.byteLength === 0) {
      throw new AvatarError('No file uploaded', 'VALIDATION_FAILED', { filename: originalFilename });
    }
    if (data.byteLength > MAX_AVATAR_BYTES) {
      throw new AvatarError('File size exceeds 5MB limit', 'VALIDATION_FAILED', {
        filename: originalFilename,
        size: data.byteLength,
        max: MAX_AVATAR_BYTES
      });
    }

    const id = uuidv4();
    const storedFilename = `${id}${extension}`;
    const filePath = join(this.directory, storedFilename);
    const name = basename(originalFilename, extension) || id;

    try {
      await writeFile(filePath, data, { flag: 'wx' });
    } catch (e) {
      if (!isExistingFileError(e)) await this.discard(filePath);
      throw new AvatarError(`Failed to write avatar file: ${describeError(e)}`, 'IO_FAILURE', { filePath });
    }

    try {
      const record = await this.repository.insertAvatar({ id, name, storedFilename });
      console.log(`[avatar-pool] Saved avatar: ${record.name} (${record.id})`);
      return record;
    } catch (e) {
      await this.discard(filePath);
      throw new AvatarError(`Failed to record avatar: ${describeError(e)}`, 'IO_FAILURE', { id });
    }
  }

  /**
   * Removes an avatar from the pool. Users bound to it lose the binding but
   * keep the profile image already copied for them.
   */
  async remove(avatarId: string): Promise<boolean> {
    this.assertInitialized();
    const record = await this.repository.getAvatarById(avatarId);
    if (!record) {
      console.warn(`[avatar-pool] Avatar not found: ${avatarId}`);
      return false;
    }

    const filePath = join(this.directory, record.storedFilename);
    try {
      const deleted = await removeFileIfPresent(filePath);
      if (deleted) {
        console.log(`[avatar-pool] Deleted avatar file: ${filePath}`);
      } else {
        console.warn(`[avatar-pool] Avatar file already missing: ${filePath}`);
      }
    } catch (e) {
      throw new AvatarError(`Failed to delete avatar file: ${describeError(e)}`, 'IO_FAILURE', { avatarId, filePath });
    }

    try {
      await this.repository.deleteAvatar(avatarId);
    } catch (e) {
      throw new AvatarError(`Failed to drop avatar record: ${describeError(e)}`, 'IO_FAILURE', { avatarId });
    }

    try {
      const cleared = await this.bindings.clearBindingsForAvatar(avatarId);
      if (cleared > 0) {
        console.warn(`[avatar-pool] Avatar ${avatarId} was used by ${cleared} user(s); bindings cleared, profile images kept`);
      }
    } catch (e) {
      // Dangling bindings are dropped by the next validation pass
      console.error(`[avatar-pool] Failed to clear bindings for removed avatar ${avatarId}:`, describeError(e));
    }

    console.log(`[avatar-pool] Deleted avatar from pool: ${record.name} (${avatarId})`);
    return true;
  }

  async resolve(avatarId: string): Promise<ResolvedAvatar | null> {
    const record = await this.repository.getAvatarById(avatarId);
    if (!record) return null;
    const filePath = join(this.directory, record.storedFilename);
    const exists = await stat(filePath).then(info => info.isFile(), () => false);
    if (!exists) return null;
    return { filePath, mimeType: mimeTypeForFile(record.storedFilename) };
  }

  get(avatarId: string): Promise<AvatarRecord | null> {
    return this.repository.getAvatarById(avatarId);
  }

  list(): Promise<AvatarRecord[]> {
    return this.repository.listAvatars();
  }

  private assertInitialized(): void {
    if (!this.initialized) {
      throw new AvatarError('Avatar pool used before initialize()', 'INVARIANT_VIOLATION', { directory: this.directory });
    }
  }

  private async discard(filePath: string): Promise<void> {
    try {
      await removeFileIfPresent(filePath);
    } catch (e) {
      console.warn(`[avatar-pool] Could not remove partial avatar file ${filePath}:`, describeError(e));
    }
  }
}
