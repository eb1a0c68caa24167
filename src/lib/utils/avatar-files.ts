// Avatar Pool - file naming and file system helpers

import { constants, createReadStream, createWriteStream } from 'fs';
import { access, stat, unlink } from 'fs/promises';
import { extname, join, relative, resolve, isAbsolute } from 'path';
import { pipeline } from 'stream/promises';

export const ALLOWED_AVATAR_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp'] as const;
export const MAX_AVATAR_BYTES = 5 * 1024 * 1024;
export const PROFILE_IMAGE_PREFIX = 'profile_';
export const DEFAULT_MIME_TYPE = 'application/octet-stream';

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp'
};

const SAFE_USER_ID = /^[A-Za-z0-9_-]{1,128}$/;

export function isAllowedAvatarExtension(extension: string): boolean {
  const lower = extension.toLowerCase();
  return ALLOWED_AVATAR_EXTENSIONS.some(allowed => allowed === lower);
}

export function mimeTypeForFile(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

export function isSafeUserId(userId: string): boolean {
  return SAFE_USER_ID.test(userId);
}

export function userProfileDirectory(userDataDirectory: string, userId: string): string | null {
  if (!isSafeUserId(userId)) return null;
  return join(userDataDirectory, userId);
}

export function isProfileImageFilename(filename: string): boolean {
  return filename.startsWith(PROFILE_IMAGE_PREFIX);
}

export function buildProfileImageFilename(avatarId: string, token: string, extension: string): string {
  return `${PROFILE_IMAGE_PREFIX}avatar_${avatarId}_${token}${extension.toLowerCase()}`;
}

let lastToken = 0;

/**
 * Distinct, increasing token for profile image filenames (cache busting only).
 * Millisecond clock scaled by 1000 so several binds in the same millisecond
 * still get distinct values.
 */
export function nextDistinctToken(now: number = Date.now()): string {
  const candidate = now * 1000;
  lastToken = candidate > lastToken ? candidate : lastToken + 1;
  return String(lastToken);
}

export function isWithinDirectory(directory: string, filePath: string): boolean {
  const rel = relative(resolve(directory), resolve(filePath));
  return rel.length > 0 && !rel.startsWith('..') && !isAbsolute(rel);
}

export function samePath(a: string | null | undefined, b: string | null | undefined): boolean {
  if (!a || !b) return false;
  return resolve(a) === resolve(b);
}

export function isMissingFileError(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

export function isExistingFileError(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'EEXIST';
}

export function isAbortError(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'name' in e && e.name === 'AbortError';
}

/**
 * Deletes a file. Resolves false when it was already gone; other failures
 * propagate.
 */
export async function removeFileIfPresent(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (e) {
    if (isMissingFileError(e)) return false;
    throw e;
  }
}

export async function isReadableFile(filePath: string | null | undefined): Promise<boolean> {
  if (!filePath) return false;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) return false;
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

// Stream copy so an AbortSignal can interrupt it. The target is truncated if
// it already exists.
export async function copyFileCancellable(source: string, target: string, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();
  await pipeline(createReadStream(source), createWriteStream(target, { flags: 'w' }), { signal });
}
