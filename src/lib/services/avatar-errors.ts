import type { AvatarErrorCategory, AvatarErrorCode, AvatarServiceError } from '../../types/avatar';

const CATEGORIES: Record<AvatarErrorCode, AvatarErrorCategory> = {
  AVATAR_NOT_FOUND: 'not_found',
  USER_NOT_FOUND: 'not_found',
  VALIDATION_FAILED: 'validation',
  IO_FAILURE: 'io',
  COPY_FAILED: 'io',
  POINTER_UPDATE_FAILED: 'io',
  ABORTED: 'io',
  INVARIANT_VIOLATION: 'invariant'
};

export class AvatarError extends Error implements AvatarServiceError {
  code: AvatarErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, code: AvatarErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AvatarError';
    this.code = code;
    this.details = details;
    if (code === 'INVARIANT_VIOLATION') {
      console.error(`[avatars] Invariant violation: ${message}`, details ?? {});
    }
  }

  get category(): AvatarErrorCategory {
    return CATEGORIES[this.code];
  }
}

export function errorCategory(code: AvatarErrorCode): AvatarErrorCategory {
  return CATEGORIES[code];
}

export function isAvatarError(e: unknown, code?: AvatarErrorCode): e is AvatarError {
  return e instanceof AvatarError && (code === undefined || e.code === code);
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
