// Avatar Pool - Types

export interface AvatarRecord {
  id: string;
  name: string;
  storedFilename: string;
  createdAt: Date;
}

export interface CreateAvatarRecordRequest {
  id: string;
  name: string;
  storedFilename: string;
}

export interface ResolvedAvatar {
  filePath: string;
  mimeType: string;
}

export interface BindingRecord {
  userId: string;
  avatarId: string;
}

export interface MaterializedProfileImage {
  userId: string;
  avatarId: string;
  path: string;
}

export interface UserAvatar {
  avatar: AvatarRecord;
  resolved: ResolvedAvatar;
}

export interface AvatarValidationReport {
  repaired: number;
  removed: BindingRecord[];
}

export interface AvatarMaintenanceReport extends AvatarValidationReport {
  orphansDeleted: number;
}

export interface AvatarOperationOptions {
  signal?: AbortSignal;
}

export type AvatarErrorCode =
  | 'AVATAR_NOT_FOUND'
  | 'USER_NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'IO_FAILURE'
  | 'COPY_FAILED'
  | 'POINTER_UPDATE_FAILED'
  | 'ABORTED'
  | 'INVARIANT_VIOLATION';

export type AvatarErrorCategory = 'not_found' | 'validation' | 'io' | 'invariant';

export interface AvatarServiceError {
  code: AvatarErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Persistence of pool records. Files are owned by the pool store; this only
 * keeps the ordered list of records.
 */
export interface AvatarRecordRepository {
  insertAvatar(req: CreateAvatarRecordRequest): Promise<AvatarRecord>;
  getAvatarById(id: string): Promise<AvatarRecord | null>;
  deleteAvatar(id: string): Promise<boolean>;
  listAvatars(): Promise<AvatarRecord[]>;
}

/**
 * User -> avatar selections. Every mutation is durable once the returned
 * promise resolves.
 */
export interface BindingStore {
  getBinding(userId: string): Promise<string | null>;
  setBinding(userId: string, avatarId: string): Promise<void>;
  clearBinding(userId: string): Promise<void>;
  clearBindingsForAvatar(avatarId: string): Promise<number>;
  clearBindings(userIds: string[]): Promise<number>;
  listBindings(): Promise<BindingRecord[]>;
}
