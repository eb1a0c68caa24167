export * from './types/avatar';
export * from './types/user';
export { getAvatarConfig, getDatabaseSettings } from './lib/config/avatar-config';
export type { AvatarConfig } from './lib/config/avatar-config';
export { createDatabasePool, PostgresDatabasePool } from './lib/database/database-connection';
export type { DatabaseClient, DatabaseConfig, DatabasePool } from './lib/database/database-connection';
export { getPool, closePool } from './lib/database/pool';
export { AvatarManager } from './lib/database/avatar-manager';
export { AvatarBindingManager } from './lib/database/avatar-binding-manager';
export { UserManager } from './lib/database/user-manager';
export { InMemoryAvatarRepository, InMemoryBindingStore, InMemoryUserDirectory } from './lib/database/in-memory-stores';
export { ConfigDrivenMigrationManager } from './lib/database/config-driven-migration';
export { AVATAR_POOL_TABLES } from './lib/database/migrations/avatar-pool-tables';
export { AvatarError, errorCategory, isAvatarError } from './lib/services/avatar-errors';
export { AvatarPoolStore } from './lib/services/avatar-pool-store';
export { ProfileImageBinder } from './lib/services/profile-image-binder';
export { AvatarReconciler } from './lib/services/avatar-reconciler';
export { AvatarService, buildAvatarService, createAvatarService } from './lib/services/avatar-service';
export { AvatarValidationService } from './lib/services/avatar-validation-service';
export { OperationLocks } from './lib/utils/operation-locks';
